/**
 * packages/testkit/src/golden.ts — Byte-exact comparison of terminal output.
 *
 * Why: Rendered lines are mostly escape sequences. When two frames differ,
 * a side-by-side hexdump of the first differing region says far more than a
 * string diff of unprintable text.
 */

import { AssertionError } from "node:assert";

const encoder = new TextEncoder();

function toBytes(value: string | Uint8Array): Uint8Array {
  return typeof value === "string" ? encoder.encode(value) : value;
}

function hex2(n: number): string {
  return n.toString(16).padStart(2, "0");
}

/** 16 bytes per row: offset, hex, printable ASCII (others as "."). */
export function hexdump(value: string | Uint8Array, offset = 0, length?: number): string {
  const bytes = toBytes(value);
  const start = Math.max(0, offset);
  const end = Math.min(bytes.length, length === undefined ? bytes.length : start + length);
  const rows: string[] = [];
  for (let row = start; row < end; row += 16) {
    const slice = bytes.subarray(row, Math.min(end, row + 16));
    const hex = Array.from(slice, hex2).join(" ").padEnd(16 * 3 - 1, " ");
    const ascii = Array.from(slice, (b) => (b >= 0x20 && b < 0x7f ? String.fromCharCode(b) : ".")).join("");
    rows.push(`${row.toString(16).padStart(8, "0")}  ${hex}  ${ascii}`);
  }
  return rows.join("\n");
}

function firstDifference(a: Uint8Array, b: Uint8Array): number {
  const n = Math.min(a.length, b.length);
  for (let i = 0; i < n; i++) {
    if (a[i] !== b[i]) return i;
  }
  return a.length === b.length ? -1 : n;
}

/** Throw an AssertionError with hexdumps around the first differing byte. */
export function assertBytesEqual(actual: string | Uint8Array, expected: string | Uint8Array, label = "bytes"): void {
  const a = toBytes(actual);
  const e = toBytes(expected);
  const at = firstDifference(a, e);
  if (at < 0) return;

  const windowStart = Math.max(0, at - (at % 16) - 16);
  const message = [
    `${label}: first difference at byte ${String(at)} (actual ${String(a.length)} bytes, expected ${String(e.length)} bytes)`,
    "actual:",
    hexdump(a, windowStart, 64),
    "expected:",
    hexdump(e, windowStart, 64),
  ].join("\n");
  throw new AssertionError({ message, actual, expected, operator: "assertBytesEqual" });
}
