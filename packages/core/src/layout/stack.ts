/**
 * packages/core/src/layout/stack.ts — Stacking rendered children.
 *
 * Why: vstack/hstack render their children first, then hand the buffers here.
 * Spacers share whatever room the content left along the stack axis; on the
 * cross axis every child is aligned into the widest (or tallest) one.
 */

import { padToWidth } from "../buffer/ansiLine.js";
import { type StyledBuffer, EMPTY_BUFFER, createBuffer, isEmptyBuffer } from "../buffer/styledBuffer.js";
import { alignBuffer } from "./frame.js";
import { distributeEvenly } from "./justify.js";
import type { HorizontalAlignment, VerticalAlignment } from "./types.js";

export type StackEntry =
  | Readonly<{ kind: "content"; buffer: StyledBuffer }>
  | Readonly<{ kind: "spacer"; minLength: number }>;

/** Drop empty content; it takes no room and no spacing. */
function visibleEntries(entries: readonly StackEntry[]): StackEntry[] {
  return entries.filter((e) => e.kind === "spacer" || !isEmptyBuffer(e.buffer));
}

/** Lengths of every entry along the stack axis, spacers expanded. */
function mainAxisLengths(
  entries: readonly StackEntry[],
  available: number,
  spacing: number,
  contentLength: (buffer: StyledBuffer) => number,
): number[] {
  let used = spacing * Math.max(0, entries.length - 1);
  let spacerCount = 0;
  for (const entry of entries) {
    if (entry.kind === "spacer") {
      used += entry.minLength;
      spacerCount++;
    } else {
      used += contentLength(entry.buffer);
    }
  }
  const shares = distributeEvenly(Math.max(0, available - used), spacerCount);
  let spacerIndex = 0;
  return entries.map((entry) => {
    if (entry.kind === "content") return contentLength(entry.buffer);
    const share = shares[spacerIndex] ?? 0;
    spacerIndex++;
    return entry.minLength + share;
  });
}

export function layoutVertical(
  entries: readonly StackEntry[],
  availableHeight: number,
  spacing: number,
  horizontal: HorizontalAlignment,
): StyledBuffer {
  const items = visibleEntries(entries);
  if (items.length === 0) return EMPTY_BUFFER;

  const heights = mainAxisLengths(items, availableHeight, spacing, (b) => b.height);
  let width = 0;
  for (const item of items) {
    if (item.kind === "content") width = Math.max(width, item.buffer.width);
  }

  const blankRow = " ".repeat(width);
  const lines: string[] = [];
  items.forEach((item, i) => {
    if (i > 0) for (let s = 0; s < spacing; s++) lines.push(blankRow);
    if (item.kind === "spacer") {
      for (let r = 0; r < (heights[i] ?? 0); r++) lines.push(blankRow);
      return;
    }
    const placed = alignBuffer(item.buffer, width, item.buffer.height, { horizontal, vertical: "top" });
    lines.push(...placed.lines);
  });
  return createBuffer(lines);
}

export function layoutHorizontal(
  entries: readonly StackEntry[],
  availableWidth: number,
  spacing: number,
  vertical: VerticalAlignment,
): StyledBuffer {
  const items = visibleEntries(entries);
  if (items.length === 0) return EMPTY_BUFFER;

  const widths = mainAxisLengths(items, availableWidth, spacing, (b) => b.width);
  let height = 0;
  for (const item of items) {
    if (item.kind === "content") height = Math.max(height, item.buffer.height);
  }
  if (height === 0) return EMPTY_BUFFER;

  const columns = items.map((item, i) => {
    const width = widths[i] ?? 0;
    if (item.kind === "spacer") return null;
    return alignBuffer(item.buffer, width, height, { horizontal: "leading", vertical });
  });

  const gap = " ".repeat(Math.max(0, spacing));
  const lines: string[] = [];
  for (let row = 0; row < height; row++) {
    let line = "";
    columns.forEach((column, i) => {
      if (i > 0) line += gap;
      const width = widths[i] ?? 0;
      line += column === null ? " ".repeat(width) : padToWidth(column.lines[row] ?? "", width);
    });
    lines.push(line);
  }
  return createBuffer(lines);
}
