/**
 * packages/core/src/buffer/cells.ts — Styled line <-> cell row conversion.
 *
 * Why: Slicing and compositing need per-column access to a styled line. A
 * line is parsed into one cell per terminal column (wide graphemes take a
 * lead cell plus a continuation cell), edited, and serialized back.
 *
 * Serialization is canonical: the bytes depend only on the cells, so two
 * edits on disjoint columns produce the same line in either order.
 *
 * A cell's `style` is the concatenation of SGR sequences in effect since the
 * last reset. `reset` records that an explicit reset precedes the cell; the
 * serializer re-emits it, which keeps overlay edges as hard style boundaries.
 */

import { forEachGrapheme } from "../layout/textMeasure.js";
import { SGR_RESET } from "../renderer/ansi.js";
import { isSgrSequence, tokenizeLine } from "./ansiLine.js";

export type Cell = Readonly<{
  /** Grapheme plus attached zero-width marks; "" for a continuation cell. */
  text: string;
  style: string;
  /** Lead cell of a two-column grapheme. */
  wide: boolean;
  /** Second column of a two-column grapheme. */
  cont: boolean;
  reset: boolean;
}>;

export type CellRow = Readonly<{
  cells: readonly Cell[];
  /** The line ends with an explicit reset. */
  trailingReset: boolean;
  /** Non-SGR escapes after the last cell (e.g. a closing hyperlink). */
  tail: string;
}>;

const BLANK: Cell = Object.freeze({ text: " ", style: "", wide: false, cont: false, reset: false });

export function blankCell(style = ""): Cell {
  return style === "" ? BLANK : { text: " ", style, wide: false, cont: false, reset: false };
}

function isResetSequence(seq: string): boolean {
  return seq === SGR_RESET || seq === "\u001b[m";
}

export function parseCells(line: string): CellRow {
  const cells: Cell[] = [];
  const active: string[] = [];
  let pendingReset = false;
  let pendingRaw = "";

  for (const tok of tokenizeLine(line)) {
    if (tok.kind === "escape") {
      if (!isSgrSequence(tok.text)) {
        pendingRaw += tok.text;
        continue;
      }
      if (isResetSequence(tok.text)) {
        active.length = 0;
        pendingReset = true;
      } else if (tok.text.startsWith("\u001b[0;")) {
        active.length = 0;
        active.push(tok.text);
        pendingReset = true;
      } else {
        active.push(tok.text);
      }
      continue;
    }

    forEachGrapheme(tok.text, (cluster, width) => {
      if (width === 0) {
        const leadIndex = findLead(cells);
        const lead = leadIndex < 0 ? undefined : cells[leadIndex];
        if (lead === undefined) {
          pendingRaw += cluster;
          return;
        }
        cells[leadIndex] = { ...lead, text: lead.text + cluster };
        return;
      }
      const style = active.join("");
      cells.push({
        text: pendingRaw + cluster,
        style,
        wide: width === 2,
        cont: false,
        reset: pendingReset,
      });
      if (width === 2) cells.push({ text: "", style, wide: false, cont: true, reset: false });
      pendingReset = false;
      pendingRaw = "";
    });
  }

  return { cells, trailingReset: pendingReset, tail: pendingRaw };
}

function findLead(cells: readonly Cell[]): number {
  for (let i = cells.length - 1; i >= 0; i--) {
    if (cells[i]?.cont !== true) return i;
  }
  return -1;
}

export function serializeCells(row: CellRow): string {
  let out = "";
  let prev = "";
  for (const cell of row.cells) {
    if (cell.cont) continue;
    if (cell.reset || (prev !== "" && cell.style !== prev)) {
      out += SGR_RESET + cell.style;
    } else if (cell.style !== prev) {
      out += cell.style;
    }
    out += cell.text;
    prev = cell.style;
  }
  if (row.trailingReset || prev !== "") out += SGR_RESET;
  return out + row.tail;
}

/** Replace a half-cut wide grapheme cell with a space in the same style. */
function spaceFor(cell: Cell): Cell {
  return { text: " ", style: cell.style, wide: false, cont: false, reset: cell.reset };
}

/**
 * Cells `[start, end)` of a row as a fresh row. Wide graphemes cut by an edge
 * become spaces; the slice starts without a leading reset.
 */
export function sliceCells(row: CellRow, start: number, end: number): CellRow {
  const from = Math.max(0, start);
  const to = Math.min(row.cells.length, end);
  if (to <= from) return { cells: [], trailingReset: false, tail: "" };
  const cells = row.cells.slice(from, to);
  const first = cells[0];
  if (first !== undefined && first.cont) cells[0] = spaceFor(first);
  const last = cells[cells.length - 1];
  if (last !== undefined && last.wide) cells[cells.length - 1] = spaceFor(last);
  const head = cells[0];
  if (head !== undefined && head.reset) cells[0] = { ...head, reset: false };
  const reachesEnd = to === row.cells.length;
  return {
    cells,
    trailingReset: reachesEnd && row.trailingReset,
    tail: reachesEnd ? row.tail : "",
  };
}

/** Cells of a row padded with blanks (or truncated) to exactly `width`. */
export function fitCells(row: CellRow, width: number): CellRow {
  if (row.cells.length === width) return row;
  if (row.cells.length > width) return sliceCells(row, 0, width);
  const cells = row.cells.slice();
  while (cells.length < width) cells.push(BLANK);
  return { cells, trailingReset: row.trailingReset, tail: row.tail };
}

/**
 * Copy `overlay` cells onto `base` starting at column `x`, clipped to
 * `[0, limit)`. Both edges of the copied span become hard reset boundaries.
 */
export function overlayCells(base: CellRow, overlay: CellRow, x: number, limit: number): CellRow {
  const start = Math.max(0, x);
  const end = Math.min(limit, x + overlay.cells.length);
  if (end <= start) return base;

  const cells = base.cells.slice();
  const padFrom = cells.length;
  while (cells.length < end) cells.push(BLANK);
  // The base's trailing reset now precedes the padding.
  if (padFrom < end && base.trailingReset) cells[padFrom] = { ...BLANK, reset: true };

  for (let col = start; col < end; col++) {
    const src = overlay.cells[col - x] ?? BLANK;
    cells[col] = col === start ? { ...src, reset: true } : src;
  }

  // Wide graphemes split by either edge of the span lose their other half.
  const first = cells[start];
  if (first !== undefined && first.cont) cells[start] = spaceFor(first);
  const last = cells[end - 1];
  if (last !== undefined && last.wide) cells[end - 1] = spaceFor(last);
  const before = cells[start - 1];
  if (before !== undefined && before.wide) cells[start - 1] = spaceFor(before);

  let trailingReset = base.trailingReset;
  const after = cells[end];
  if (after !== undefined) {
    cells[end] = after.cont ? { ...spaceFor(after), reset: true } : { ...after, reset: true };
  } else {
    trailingReset = true;
  }

  return { cells, trailingReset, tail: base.tail };
}
