/**
 * packages/core/src/buffer/styledBuffer.ts — The styled line grid every view renders to.
 *
 * Why: A render call produces an ordered list of lines with SGR styling
 * embedded. Width is always derived from visible cells, never from string
 * length, and a buffer is frozen once built: every transform allocates.
 */

import { padToWidth, visibleWidth } from "./ansiLine.js";

export type StyledBuffer = Readonly<{
  lines: readonly string[];
  /** Max visible width over all lines. */
  width: number;
  height: number;
}>;

export const EMPTY_BUFFER: StyledBuffer = Object.freeze({
  lines: Object.freeze([]),
  width: 0,
  height: 0,
});

export function createBuffer(lines: readonly string[]): StyledBuffer {
  if (lines.length === 0) return EMPTY_BUFFER;
  let width = 0;
  for (const line of lines) {
    const w = visibleWidth(line);
    if (w > width) width = w;
  }
  return Object.freeze({ lines: Object.freeze(lines.slice()), width, height: lines.length });
}

/** One line per `\n`-separated segment. The empty string yields the empty buffer. */
export function textBuffer(text: string): StyledBuffer {
  if (text.length === 0) return EMPTY_BUFFER;
  return createBuffer(text.split("\n"));
}

/** A width × height rectangle of spaces. */
export function blankBuffer(width: number, height: number): StyledBuffer {
  const w = Math.max(0, Math.floor(width));
  const h = Math.max(0, Math.floor(height));
  if (h === 0) return EMPTY_BUFFER;
  const row = " ".repeat(w);
  const lines: string[] = [];
  for (let i = 0; i < h; i++) lines.push(row);
  return Object.freeze({ lines: Object.freeze(lines), width: w, height: h });
}

export function isEmptyBuffer(buffer: StyledBuffer): boolean {
  return buffer.height === 0;
}

/** Stack `b` below `a` with `spacing` empty lines between them (only when both are non-empty). */
export function appendVertically(a: StyledBuffer, b: StyledBuffer, spacing = 0): StyledBuffer {
  if (isEmptyBuffer(a)) return b;
  if (isEmptyBuffer(b)) return a;
  const lines = a.lines.slice();
  for (let i = 0; i < spacing; i++) lines.push("");
  lines.push(...b.lines);
  return createBuffer(lines);
}

/**
 * Place `b` to the right of `a` with `spacing` columns between them. Rows of
 * `a` are padded to its width so `b` starts in one column.
 */
export function appendHorizontally(a: StyledBuffer, b: StyledBuffer, spacing = 0): StyledBuffer {
  if (isEmptyBuffer(a)) return b;
  if (isEmptyBuffer(b)) return a;
  const height = Math.max(a.height, b.height);
  const gap = " ".repeat(Math.max(0, spacing));
  const lines: string[] = [];
  for (let row = 0; row < height; row++) {
    const left = a.lines[row] ?? "";
    const right = b.lines[row] ?? "";
    lines.push(padToWidth(left, a.width) + gap + right);
  }
  return createBuffer(lines);
}
