/**
 * packages/core/src/renderer/borderRenderer.ts — Container frame rendering.
 *
 * Why: Turns a body buffer (plus optional title and footer) into a framed
 * buffer. Two families share one inner-width computation:
 *
 *   box    ┌─ Title ──┐     block  ▄▄▄▄▄▄▄▄▄▄▄▄
 *          │ body     │            █ Title    █
 *          ├──────────┤            ▀▀▀▀▀▀▀▀▀▀▀▀
 *          │ footer   │            █ body     █
 *          └──────────┘            ▄▄▄▄▄▄▄▄▄▄▄▄
 *                                  █ footer   █
 *                                  ▀▀▀▀▀▀▀▀▀▀▀▀
 *
 * Block seams: a transition glyph takes the background of the section above
 * as its foreground and sets no background, so the section below shows
 * through the empty half of the cell.
 *
 * Pure: reads only its input.
 */

import { padToWidth, visibleWidth } from "../buffer/ansiLine.js";
import { type StyledBuffer, createBuffer, isEmptyBuffer } from "../buffer/styledBuffer.js";
import type { Rgb24 } from "../widgets/style.js";
import { SGR_RESET, applyPersistentBackground, colorize } from "./ansi.js";
import {
  type BorderStyle,
  FOCUS_INDICATOR,
  FULL_BLOCK,
  HALF_BLOCK_LOWER,
  HALF_BLOCK_UPPER,
} from "./borderStyle.js";

/** Columns a frame adds around its inner width (one glyph per side). */
export const BORDER_WIDTH_OVERHEAD = 2;

export type ContainerFrameInput = Readonly<{
  body: StyledBuffer;
  title?: string;
  footer?: StyledBuffer;
  border: BorderStyle;
  borderColor: Rgb24;
  titleColor: Rgb24;
  /** Block family: header and footer fill. */
  headerBackground: Rgb24;
  /** Block family: body fill. Box family: body fill when `fillBody` is set. */
  bodyBackground: Rgb24;
  fillBody?: boolean;
  /** Block family only. Default true. */
  showHeaderSeparator?: boolean;
  /** Default true. */
  showFooterSeparator?: boolean;
  /** Box family: draws the focus indicator in this color. */
  focusIndicatorColor?: Rgb24;
}>;

/** `" title "` as it appears in the frame. */
export function titleLabel(title: string): string {
  return ` ${title} `;
}

/**
 * One inner width for the title block, body and footer.
 * The title block is the label plus one glyph of horizontal run on each side.
 */
export function containerInnerWidth(
  title: string | undefined,
  body: StyledBuffer,
  footer: StyledBuffer | undefined,
): number {
  const titleBlockWidth = title === undefined ? 0 : visibleWidth(titleLabel(title)) + 2;
  return Math.max(titleBlockWidth, body.width, footer?.width ?? 0);
}

/* ========== Box-drawing family ========== */

export function boxTopLine(
  style: BorderStyle,
  innerWidth: number,
  color: Rgb24,
  title?: string,
  titleColor?: Rgb24,
  focusIndicatorColor?: Rgb24,
): string {
  const corner = colorize(style.topLeft, { fg: color });
  if (title === undefined) {
    if (focusIndicatorColor !== undefined && innerWidth > 1) {
      return (
        corner +
        colorize(FOCUS_INDICATOR, { fg: focusIndicatorColor }) +
        colorize(style.horizontal.repeat(innerWidth - 1) + style.topRight, { fg: color })
      );
    }
    return colorize(style.topLeft + style.horizontal.repeat(innerWidth) + style.topRight, {
      fg: color,
    });
  }

  const label = titleLabel(title);
  const styledLabel = colorize(label, { fg: titleColor ?? color, bold: true });
  const leading =
    focusIndicatorColor !== undefined
      ? corner + colorize(FOCUS_INDICATOR, { fg: focusIndicatorColor })
      : colorize(style.topLeft + style.horizontal, { fg: color });
  const trailingRun = Math.max(0, innerWidth - 1 - visibleWidth(label));
  return (
    leading +
    styledLabel +
    colorize(style.horizontal.repeat(trailingRun) + style.topRight, { fg: color })
  );
}

export function boxBottomLine(style: BorderStyle, innerWidth: number, color: Rgb24): string {
  return colorize(style.bottomLeft + style.horizontal.repeat(innerWidth) + style.bottomRight, {
    fg: color,
  });
}

export function boxDividerLine(style: BorderStyle, innerWidth: number, color: Rgb24): string {
  return colorize(style.leftT + style.horizontal.repeat(innerWidth) + style.rightT, { fg: color });
}

/** `vertical + line + reset + vertical`; the colored vertical glyph ends in its own reset. */
export function boxContentLine(
  line: string,
  innerWidth: number,
  style: BorderStyle,
  color: Rgb24,
  background?: Rgb24,
): string {
  const padded = padToWidth(line, innerWidth);
  const content = background === undefined ? padded : applyPersistentBackground(padded, background);
  const vertical = colorize(style.vertical, { fg: color });
  return vertical + content + SGR_RESET + vertical;
}

function renderBoxFrame(input: ContainerFrameInput, innerWidth: number): StyledBuffer {
  const { border, borderColor } = input;
  const lines: string[] = [
    boxTopLine(border, innerWidth, borderColor, input.title, input.titleColor, input.focusIndicatorColor),
  ];

  const bodyBg = input.fillBody === true ? input.bodyBackground : undefined;
  for (const line of input.body.lines) {
    lines.push(boxContentLine(line, innerWidth, border, borderColor, bodyBg));
  }

  const footer = input.footer;
  if (footer !== undefined && !isEmptyBuffer(footer)) {
    if (input.showFooterSeparator !== false) lines.push(boxDividerLine(border, innerWidth, borderColor));
    for (const line of footer.lines) {
      lines.push(boxContentLine(line, innerWidth, border, borderColor));
    }
  }

  lines.push(boxBottomLine(border, innerWidth, borderColor));
  return createBuffer(lines);
}

/* ========== Half-block family ========== */

/** A full-width run of `glyph` colored `fg`, with no background. */
export function blockEdgeLine(glyph: string, innerWidth: number, fg: Rgb24): string {
  return colorize(glyph.repeat(innerWidth + BORDER_WIDTH_OVERHEAD), { fg });
}

/** `█ content █` where the sides and the content fill share the section color. */
export function blockContentLine(line: string, innerWidth: number, sectionColor: Rgb24): string {
  const side = colorize(FULL_BLOCK, { fg: sectionColor });
  const content = applyPersistentBackground(padToWidth(line, innerWidth), sectionColor);
  return side + content + SGR_RESET + side;
}

function renderBlockFrame(input: ContainerFrameInput, innerWidth: number): StyledBuffer {
  const headerBg = input.headerBackground;
  const bodyBg = input.bodyBackground;
  const hasHeader = input.title !== undefined;
  const footer = input.footer !== undefined && !isEmptyBuffer(input.footer) ? input.footer : undefined;

  const lines: string[] = [blockEdgeLine(HALF_BLOCK_LOWER, innerWidth, hasHeader ? headerBg : bodyBg)];

  if (input.title !== undefined) {
    const label = colorize(titleLabel(input.title), { fg: input.titleColor, bold: true });
    lines.push(blockContentLine(label, innerWidth, headerBg));
    if (input.showHeaderSeparator !== false) {
      lines.push(blockEdgeLine(HALF_BLOCK_UPPER, innerWidth, headerBg));
    }
  }

  for (const line of input.body.lines) {
    lines.push(blockContentLine(line, innerWidth, bodyBg));
  }

  if (footer !== undefined) {
    if (input.showFooterSeparator !== false) {
      lines.push(blockEdgeLine(HALF_BLOCK_LOWER, innerWidth, bodyBg));
    }
    for (const line of footer.lines) {
      lines.push(blockContentLine(line, innerWidth, headerBg));
    }
  }

  lines.push(blockEdgeLine(HALF_BLOCK_UPPER, innerWidth, footer !== undefined ? headerBg : bodyBg));
  return createBuffer(lines);
}

/** Frame a body (and optional title/footer) in the family selected by `input.border`. */
export function renderContainer(input: ContainerFrameInput): StyledBuffer {
  const innerWidth = containerInnerWidth(input.title, input.body, input.footer);
  return input.border.family === "block"
    ? renderBlockFrame(input, innerWidth)
    : renderBoxFrame(input, innerWidth);
}
