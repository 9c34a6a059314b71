/**
 * packages/core/src/buffer/ansiLine.ts — Width math over styled lines.
 *
 * Why: Buffer lines carry SGR (and occasionally OSC) sequences inline. All
 * width math must skip them; measuring raw string length is always wrong.
 */

import { measureTextCells } from "../layout/textMeasure.js";

/** CSI, OSC (BEL or ST terminated), and two-byte escapes. */
const ESCAPE_RE = /\u001b(?:\[[0-?]*[ -/]*[@-~]|\][^\u0007\u001b]*(?:\u0007|\u001b\\)|[@-Z\\-_])/g;

export type LineToken =
  | Readonly<{ kind: "escape"; text: string }>
  | Readonly<{ kind: "text"; text: string }>;

/** Split a line into runs of plain text and control sequences, in order. */
export function tokenizeLine(line: string): readonly LineToken[] {
  const out: LineToken[] = [];
  let last = 0;
  ESCAPE_RE.lastIndex = 0;
  for (let m = ESCAPE_RE.exec(line); m !== null; m = ESCAPE_RE.exec(line)) {
    if (m.index > last) out.push({ kind: "text", text: line.slice(last, m.index) });
    out.push({ kind: "escape", text: m[0] });
    last = m.index + m[0].length;
  }
  if (last < line.length) out.push({ kind: "text", text: line.slice(last) });
  return out;
}

export function isSgrSequence(seq: string): boolean {
  return seq.startsWith("\u001b[") && seq.endsWith("m");
}

export function stripAnsi(line: string): string {
  if (!line.includes("\u001b")) return line;
  return line.replace(ESCAPE_RE, "");
}

/** Cells a line occupies on screen; control sequences count zero. */
export function visibleWidth(line: string): number {
  return measureTextCells(stripAnsi(line));
}

/** Right-pad with plain spaces to `width`. No-op when already at least that wide. */
export function padToWidth(line: string, width: number): string {
  const w = visibleWidth(line);
  if (w >= width) return line;
  return line + " ".repeat(width - w);
}
