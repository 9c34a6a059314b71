/**
 * packages/core/src/renderer/ansi.ts — SGR and cursor control sequences.
 *
 * Why: Styled Buffers carry their styling inline as SGR sequences. Every
 * component that styles text goes through these helpers so that the same
 * TextStyle always produces the same bytes.
 *
 * Colors are always emitted as 24-bit (`38;2;r;g;b` / `48;2;r;g;b`).
 */

import { type Rgb24, type TextStyle, rgbB, rgbG, rgbR } from "../widgets/style.js";

export const ESC = "\u001b";
export const CSI = `${ESC}[`;
export const SGR_RESET = `${CSI}0m`;

/** Erase from the cursor to the end of the line. */
export const ERASE_TO_LINE_END = `${CSI}K`;
export const CLEAR_SCREEN = `${CSI}2J`;
export const CURSOR_HOME = `${CSI}H`;
export const HIDE_CURSOR = `${CSI}?25l`;
export const SHOW_CURSOR = `${CSI}?25h`;
export const ENTER_ALT_SCREEN = `${CSI}?1049h`;
export const LEAVE_ALT_SCREEN = `${CSI}?1049l`;

/** Move the cursor to a 1-based row/column. */
export function moveCursor(row: number, column: number): string {
  return `${CSI}${String(row)};${String(column)}H`;
}

function rgbParams(color: Rgb24): string {
  return `${String(rgbR(color))};${String(rgbG(color))};${String(rgbB(color))}`;
}

export function foregroundCode(color: Rgb24): string {
  return `${CSI}38;2;${rgbParams(color)}m`;
}

export function backgroundCode(color: Rgb24): string {
  return `${CSI}48;2;${rgbParams(color)}m`;
}

/**
 * Encode a style as a single SGR sequence.
 * Returns "" when the style sets nothing.
 */
export function styleToSgr(style: TextStyle | undefined): string {
  if (!style) return "";
  const params: string[] = [];
  if (style.bold) params.push("1");
  if (style.dim) params.push("2");
  if (style.italic) params.push("3");
  if (style.underline) params.push("4");
  if (style.inverse) params.push("7");
  if (style.strikethrough) params.push("9");
  if (style.fg !== undefined) params.push(`38;2;${rgbParams(style.fg)}`);
  if (style.bg !== undefined) params.push(`48;2;${rgbParams(style.bg)}`);
  if (params.length === 0) return "";
  return `${CSI}${params.join(";")}m`;
}

/** Wrap text in a style and a trailing reset. Unstyled or empty text is returned as-is. */
export function colorize(text: string, style: TextStyle | undefined): string {
  if (text.length === 0) return text;
  const open = styleToSgr(style);
  if (open.length === 0) return text;
  return `${open}${text}${SGR_RESET}`;
}

/**
 * Apply a background to a whole line so that it survives every reset inside
 * the line (nested colorized runs end with a reset that would otherwise drop it).
 */
export function applyPersistentBackground(line: string, bg: Rgb24): string {
  const code = backgroundCode(bg);
  return code + line.split(SGR_RESET).join(SGR_RESET + code);
}

/** Same as applyPersistentBackground, for an arbitrary SGR prefix (used for dimming). */
export function applyPersistentSgr(line: string, sgr: string): string {
  if (sgr.length === 0) return line;
  return sgr + line.split(SGR_RESET).join(SGR_RESET + sgr);
}
