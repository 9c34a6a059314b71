/**
 * packages/core/src/layout/padding.ts — Padding as a buffer transform.
 */

import { padToWidth } from "../buffer/ansiLine.js";
import { type StyledBuffer, blankBuffer, createBuffer, isEmptyBuffer } from "../buffer/styledBuffer.js";
import type { EdgeInsets } from "./types.js";

/** Surround `buffer` with blank cells. Output size is input size plus insets on each axis. */
export function padBuffer(buffer: StyledBuffer, insets: EdgeInsets): StyledBuffer {
  const { top, leading, bottom, trailing } = insets;
  if (top === 0 && leading === 0 && bottom === 0 && trailing === 0) return buffer;

  const width = buffer.width + leading + trailing;
  if (isEmptyBuffer(buffer)) return blankBuffer(width, top + bottom);

  const blankRow = " ".repeat(width);
  const left = " ".repeat(leading);
  const right = " ".repeat(trailing);
  const lines: string[] = [];
  for (let i = 0; i < top; i++) lines.push(blankRow);
  for (const line of buffer.lines) {
    lines.push(left + padToWidth(line, buffer.width) + right);
  }
  for (let i = 0; i < bottom; i++) lines.push(blankRow);
  return createBuffer(lines);
}
