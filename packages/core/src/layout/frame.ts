/**
 * packages/core/src/layout/frame.ts — Size-constrained framing and alignment.
 *
 * Why: A frame decides how much room its content gets and how large the
 * result is, independently per axis:
 *
 *   fill            content gets `available`; result is `available`
 *   fixed(n)        content gets min(n, available); result is that size
 *   unconstrained   content gets `available`; result is the content size,
 *                   capped at `available`
 *
 * The result is then raised to any explicit minimum. Content is placed into
 * the result with the requested alignment; rows and columns it does not cover
 * are spaces, and content larger than the result is clipped.
 */

import { padToWidth } from "../buffer/ansiLine.js";
import { sliceVisible } from "../buffer/compositor.js";
import { type StyledBuffer, createBuffer } from "../buffer/styledBuffer.js";
import type { Alignment, FrameConstraint, Size } from "./types.js";

function clampAvailable(available: number): number {
  return Number.isFinite(available) ? Math.max(0, Math.floor(available)) : 0;
}

/** Room handed to the content along one axis. */
export function frameContentSpace(constraint: FrameConstraint, available: number): number {
  const space = clampAvailable(available);
  if (constraint.kind === "fixed") return Math.min(constraint.value, space);
  return space;
}

/** Final extent along one axis once the content size is known. */
export function frameExtent(
  constraint: FrameConstraint,
  available: number,
  contentSize: number,
  minimum = 0,
): number {
  const space = clampAvailable(available);
  return Math.max(baseExtent(constraint, space, contentSize), minimum);
}

function baseExtent(constraint: FrameConstraint, space: number, contentSize: number): number {
  switch (constraint.kind) {
    case "fill":
      return space;
    case "fixed":
      return Math.min(constraint.value, space);
    case "unconstrained":
      return Math.min(contentSize, space);
  }
}

export type FrameSizing = Readonly<{
  width: FrameConstraint;
  height: FrameConstraint;
  minWidth?: number;
  minHeight?: number;
}>;

/** Both axes of frameExtent. */
export function resolveFrameSize(sizing: FrameSizing, available: Size, content: Size): Size {
  return {
    width: frameExtent(sizing.width, available.width, content.width, sizing.minWidth),
    height: frameExtent(sizing.height, available.height, content.height, sizing.minHeight),
  };
}

function leadingOffset(
  placement: "leading" | "top" | "center" | "trailing" | "bottom",
  space: number,
  size: number,
): number {
  switch (placement) {
    case "leading":
    case "top":
      return 0;
    case "center":
      return Math.floor((space - size) / 2);
    case "trailing":
    case "bottom":
      return space - size;
  }
}

/** Top-left cell of an `inner` block aligned inside `outer`. Negative when inner is larger. */
export function alignedOrigin(align: Alignment, outer: Size, inner: Size): Readonly<{ x: number; y: number }> {
  return {
    x: leadingOffset(align.horizontal, outer.width, inner.width),
    y: leadingOffset(align.vertical, outer.height, inner.height),
  };
}

/**
 * Place `buffer` as a block into a width × height grid of spaces.
 * Content larger than the grid is clipped; the aligned side stays visible.
 */
export function alignBuffer(
  buffer: StyledBuffer,
  width: number,
  height: number,
  align: Alignment,
): StyledBuffer {
  const w = clampAvailable(width);
  const h = clampAvailable(height);
  if (buffer.width === w && buffer.height === h && buffer.lines.every((l) => padToWidth(l, w) === l)) {
    return buffer;
  }

  const dy = leadingOffset(align.vertical, h, buffer.height);
  const dx = leadingOffset(align.horizontal, w, buffer.width);
  const blankRow = " ".repeat(w);
  const lines: string[] = [];

  const leftPad = Math.max(0, dx);
  const skip = Math.max(0, -dx);
  for (let row = 0; row < h; row++) {
    const source = buffer.lines[row - dy];
    if (source === undefined) {
      lines.push(blankRow);
      continue;
    }
    if (dx >= 0 && dx + buffer.width <= w) {
      const block = padToWidth(source, buffer.width);
      lines.push(" ".repeat(dx) + block + " ".repeat(w - dx - buffer.width));
    } else {
      const visible = sliceVisible(padToWidth(source, buffer.width), skip, skip + w - leftPad);
      lines.push(padToWidth(" ".repeat(leftPad) + visible, w));
    }
  }
  return createBuffer(lines);
}
