/**
 * packages/core/src/layout/justify.ts — Gap justification for a row of items.
 *
 * N items get N+1 gaps (left edge, between items, right edge). The leftover
 * width is split evenly; the first `remainder` gaps, counted from the left
 * edge inward, take one extra column. When the items alone overflow the
 * width every gap is 0.
 */

import { visibleWidth } from "../buffer/ansiLine.js";

/** Split `total` into `slots` integers that differ by at most one, larger ones first. */
export function distributeEvenly(total: number, slots: number): number[] {
  const count = Math.max(0, Math.floor(slots));
  const out = new Array<number>(count).fill(0);
  if (count === 0) return out;
  const target = Number.isFinite(total) ? Math.max(0, Math.floor(total)) : 0;
  const base = Math.floor(target / count);
  const remainder = target % count;
  for (let i = 0; i < count; i++) out[i] = base + (i < remainder ? 1 : 0);
  return out;
}

export function justifyGaps(itemWidths: readonly number[], width: number): number[] {
  let content = 0;
  for (const w of itemWidths) content += w;
  return distributeEvenly(Math.max(0, width - content), itemWidths.length + 1);
}

/** Lay out `items` across `width` columns with justified gaps. */
export function justifyLine(items: readonly string[], width: number): string {
  const gaps = justifyGaps(
    items.map((item) => visibleWidth(item)),
    width,
  );
  let out = " ".repeat(gaps[0] ?? 0);
  for (let i = 0; i < items.length; i++) {
    out += (items[i] ?? "") + " ".repeat(gaps[i + 1] ?? 0);
  }
  return out;
}
