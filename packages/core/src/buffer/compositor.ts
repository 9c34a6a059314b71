/**
 * packages/core/src/buffer/compositor.ts — Overlay compositing and line slicing.
 *
 * Why: Modals, z-stacks and anything drawn "on top" replace a rectangle of
 * base cells with overlay cells. Rows outside the overlay are returned
 * byte-for-byte; rows inside it are rebuilt from cells, with a reset at both
 * edges of the overlay span and the base style re-applied after it.
 */

import { SGR_RESET, applyPersistentSgr, styleToSgr } from "../renderer/ansi.js";
import { stripAnsi } from "./ansiLine.js";
import { fitCells, overlayCells, parseCells, serializeCells, sliceCells } from "./cells.js";
import { type StyledBuffer, createBuffer, isEmptyBuffer } from "./styledBuffer.js";

/**
 * Cells `[start, end)` of a styled line. The slice opens with the style in
 * effect at `start` and closes with a reset when a style is still open.
 */
export function sliceVisible(line: string, start: number, end = Number.POSITIVE_INFINITY): string {
  return serializeCells(sliceCells(parseCells(line), start, end));
}

/**
 * Place `overlay` over `base` with its top-left cell at (x, y).
 *
 * The result keeps base's size: overlay cells outside base are dropped.
 * Overlay rows are padded to overlay.width so the whole rectangle replaces
 * base content, including where an overlay row is shorter.
 */
export function composite(base: StyledBuffer, overlay: StyledBuffer, x: number, y: number): StyledBuffer {
  if (isEmptyBuffer(base) || isEmptyBuffer(overlay)) return base;
  const ox = Math.trunc(x);
  const oy = Math.trunc(y);
  if (ox >= base.width || oy >= base.height) return base;
  if (ox + overlay.width <= 0 || oy + overlay.height <= 0) return base;

  const lines = base.lines.slice();
  const firstRow = Math.max(0, oy);
  const lastRow = Math.min(base.height, oy + overlay.height);
  for (let row = firstRow; row < lastRow; row++) {
    const overlayRow = fitCells(parseCells(overlay.lines[row - oy] ?? ""), overlay.width);
    const baseRow = parseCells(lines[row] ?? "");
    lines[row] = serializeCells(overlayCells(baseRow, overlayRow, ox, base.width));
  }
  return createBuffer(lines);
}

const DIM = styleToSgr({ dim: true });

/**
 * Faint every non-blank line, keeping the attribute through inner resets.
 * Blank lines are returned unchanged.
 */
export function dimBuffer(buffer: StyledBuffer): StyledBuffer {
  if (isEmptyBuffer(buffer)) return buffer;
  return createBuffer(
    buffer.lines.map((line) =>
      stripAnsi(line).trim().length === 0 ? line : applyPersistentSgr(line, DIM) + SGR_RESET,
    ),
  );
}
