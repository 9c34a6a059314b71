/**
 * packages/core/src/renderer/borderStyle.ts — Border glyph sets.
 *
 * Why: A border style is a plain value (eight glyphs plus the rendering
 * family). Containers pick the family from the style, so switching a whole
 * subtree between box-drawing and half-block frames is one environment value.
 */

import { invalidProps } from "../errors.js";

/** "box": corners and edges drawn with line glyphs. "block": half-block section frames. */
export type BorderFamily = "box" | "block";

export type BorderStyleId = "line" | "double" | "heavy" | "rounded" | "ascii" | "none" | "block";

export type BorderStyle = Readonly<{
  id: BorderStyleId;
  family: BorderFamily;
  topLeft: string;
  topRight: string;
  bottomLeft: string;
  bottomRight: string;
  horizontal: string;
  vertical: string;
  leftT: string;
  rightT: string;
}>;

/** Glyphs used by the block family. */
export const HALF_BLOCK_LOWER = "▄";
export const HALF_BLOCK_UPPER = "▀";
export const FULL_BLOCK = "█";

/** Shown right after the top-left corner of a container whose focus section is active. */
export const FOCUS_INDICATOR = "●";

/** `glyphs` lists topLeft, topRight, bottomLeft, bottomRight, horizontal, vertical, leftT, rightT. */
function box(id: BorderStyleId, glyphs: string): BorderStyle {
  const g = Array.from(glyphs);
  return Object.freeze({
    id,
    family: "box",
    topLeft: g[0] ?? " ",
    topRight: g[1] ?? " ",
    bottomLeft: g[2] ?? " ",
    bottomRight: g[3] ?? " ",
    horizontal: g[4] ?? " ",
    vertical: g[5] ?? " ",
    leftT: g[6] ?? " ",
    rightT: g[7] ?? " ",
  });
}

const BORDER_STYLES: Readonly<Record<BorderStyleId, BorderStyle>> = Object.freeze({
  line: box("line", "┌┐└┘─│├┤"),
  double: box("double", "╔╗╚╝═║╠╣"),
  heavy: box("heavy", "┏┓┗┛━┃┣┫"),
  rounded: box("rounded", "╭╮╰╯─│├┤"),
  ascii: box("ascii", "++++-|++"),
  none: box("none", "        "),
  block: Object.freeze({
    id: "block",
    family: "block",
    topLeft: HALF_BLOCK_LOWER,
    topRight: HALF_BLOCK_LOWER,
    bottomLeft: HALF_BLOCK_UPPER,
    bottomRight: HALF_BLOCK_UPPER,
    horizontal: HALF_BLOCK_LOWER,
    vertical: FULL_BLOCK,
    leftT: FULL_BLOCK,
    rightT: FULL_BLOCK,
  }),
});

export function isBorderStyleId(value: unknown): value is BorderStyleId {
  return typeof value === "string" && Object.prototype.hasOwnProperty.call(BORDER_STYLES, value);
}

/** Look up a preset. Unknown ids throw CF_INVALID_PROPS. */
export function getBorderStyle(id: string): BorderStyle {
  if (!isBorderStyleId(id)) {
    return invalidProps(
      `unknown border style "${id}"; expected one of ${Object.keys(BORDER_STYLES).join(", ")}`,
    );
  }
  return BORDER_STYLES[id];
}
