/**
 * packages/core/src/layout/textMeasure.ts — Deterministic text measurement.
 *
 * Why: Computes the display width of plain text (no control sequences) in
 * terminal cell units. Every width computed by the engine goes through
 * measureTextCells, directly or via visibleWidth.
 *
 * Width rules:
 *   - ASCII printable: 1 cell
 *   - ASCII control: 0 cells
 *   - East Asian wide / fullwidth: 2 cells
 *   - Combining marks, zero-width format characters: 0 cells (merge with base)
 *   - Emoji-presented graphemes (incl. ZWJ sequences, flags, keycaps): 2 cells
 *   - Ambiguous-width characters (box drawing, block elements): 1 cell
 *
 * Graphemes are segmented with Intl.Segmenter.
 */

/* ========== Text Measurement Cache ========== */

/** Maximum number of cached text measurements before eviction. */
const TEXT_CACHE_MAX_SIZE = 10000;
/** Maximum string length (UTF-16 code units) eligible for caching. */
const TEXT_CACHE_MAX_KEY_LENGTH = 96;

const textWidthCache = new Map<string, number>();

function evictOldestTextWidthCacheEntry(): void {
  const oldest = textWidthCache.keys().next();
  if (oldest.done === true) return;
  textWidthCache.delete(oldest.value);
}

/* ========== Unicode classification ========== */

/** Inclusive [start, end] scalar ranges rendered two cells wide. */
const WIDE_RANGES: readonly (readonly [number, number])[] = [
  [0x1100, 0x115f],
  [0x231a, 0x231b],
  [0x2329, 0x232a],
  [0x2e80, 0x303e],
  [0x3041, 0x33ff],
  [0x3400, 0x4dbf],
  [0x4e00, 0x9fff],
  [0xa000, 0xa4cf],
  [0xa960, 0xa97f],
  [0xac00, 0xd7a3],
  [0xf900, 0xfaff],
  [0xfe10, 0xfe19],
  [0xfe30, 0xfe6f],
  [0xff00, 0xff60],
  [0xffe0, 0xffe6],
  [0x1f200, 0x1f2ff],
  [0x20000, 0x2fffd],
  [0x30000, 0x3fffd],
];

function isEastAsianWide(scalar: number): boolean {
  for (const [lo, hi] of WIDE_RANGES) {
    if (scalar < lo) return false;
    if (scalar <= hi) return true;
  }
  return false;
}

const ZERO_WIDTH_RE = /^[\p{Mn}\p{Me}\p{Cf}\p{Cc}]+$/u;
const EMOJI_PRESENTATION_RE = /\p{Emoji_Presentation}/u;
const EXTENDED_PICTOGRAPHIC_RE = /\p{Extended_Pictographic}/u;
const REGIONAL_INDICATOR_RE = /\p{Regional_Indicator}/u;
const KEYCAP_RE = /^[#*0-9]\uFE0F?\u20E3$/u;

const VARIATION_SELECTOR_15 = "\uFE0E";
const VARIATION_SELECTOR_16 = "\uFE0F";
const ZWJ = "\u200D";

function isEmojiGrapheme(cluster: string): boolean {
  if (KEYCAP_RE.test(cluster)) return true;
  if (REGIONAL_INDICATOR_RE.test(cluster)) return true;
  const hasVs16 = cluster.includes(VARIATION_SELECTOR_16);
  if (cluster.includes(VARIATION_SELECTOR_15) && !hasVs16) return false;
  if (EMOJI_PRESENTATION_RE.test(cluster)) return true;
  return EXTENDED_PICTOGRAPHIC_RE.test(cluster) && (hasVs16 || cluster.includes(ZWJ));
}

/** Width of a single grapheme cluster. */
export function graphemeWidth(cluster: string): 0 | 1 | 2 {
  if (cluster.length === 0) return 0;
  const first = cluster.codePointAt(0) ?? 0;
  if (first < 0x80 && cluster.length === 1) {
    return first < 0x20 || first === 0x7f ? 0 : 1;
  }
  if (ZERO_WIDTH_RE.test(cluster)) return 0;
  if (isEmojiGrapheme(cluster)) return 2;
  if (isEastAsianWide(first)) return 2;
  return 1;
}

/* ========== Segmentation ========== */

const segmenter = new Intl.Segmenter(undefined, { granularity: "grapheme" });

export type GraphemeVisitor = (cluster: string, width: 0 | 1 | 2) => void;

/** Visit each grapheme cluster of plain text with its cell width. */
export function forEachGrapheme(text: string, visit: GraphemeVisitor): void {
  for (const { segment } of segmenter.segment(text)) {
    visit(segment, graphemeWidth(segment));
  }
}

function measureTextCellsAsciiOnly(text: string): number | null {
  let total = 0;
  for (let i = 0; i < text.length; i++) {
    const code = text.charCodeAt(i);
    if (code >= 0x80) return null;
    if (code < 0x20 || code === 0x7f) continue;
    total++;
  }
  return total;
}

function measureTextCellsUncached(text: string): number {
  let total = 0;
  forEachGrapheme(text, (_cluster, width) => {
    total += width;
  });
  return total;
}

/**
 * Width of plain text in terminal cells. Control sequences are not
 * recognized here; use visibleWidth for styled lines.
 */
export function measureTextCells(text: string): number {
  if (text.length === 0) return 0;

  const cacheable = text.length <= TEXT_CACHE_MAX_KEY_LENGTH;
  if (cacheable) {
    const cached = textWidthCache.get(text);
    if (cached !== undefined) return cached;
  }

  const width = measureTextCellsAsciiOnly(text) ?? measureTextCellsUncached(text);

  if (cacheable) {
    if (!textWidthCache.has(text) && textWidthCache.size >= TEXT_CACHE_MAX_SIZE) {
      evictOldestTextWidthCacheEntry();
    }
    textWidthCache.set(text, width);
  }

  return width;
}
