/**
 * packages/node/src/keyDecoder.ts — Terminal input bytes to KeyEvents.
 *
 * Why: In raw mode the terminal sends bytes, not keys. One `data` chunk may
 * hold several keys (fast typing, pastes), so decoding walks the chunk and
 * returns every key it finds. Unknown sequences are dropped.
 *
 * Recognized input:
 *   - printable ASCII, UTF-8 characters, space
 *   - CR/LF (enter), TAB, BS/DEL (backspace), Ctrl+A..Z
 *   - ESC alone, ESC + key (Alt+key)
 *   - CSI A/B/C/D/H/F with xterm modifier params (`ESC [1;5A` is Ctrl+Up)
 *   - CSI n~ navigation and function keys, CSI Z (Shift+Tab)
 *   - SS3 P/Q/R/S (F1-F4) and SS3 arrows
 *   - bracketed paste (`ESC [200~` ... `ESC [201~`)
 */

import {
  type KeyEvent,
  type KeyModifiers,
  type NamedKey,
  charKeyEvent,
  namedKeyEvent,
  pasteKeyEvent,
} from "@cellframe/core";

const ESC = 0x1b;
const LEFT_BRACKET = 0x5b;
const SS3_INTRO = 0x4f;
const PASTE_END = "\u001b[201~";

const CSI_FINAL_KEYS: ReadonlyMap<string, NamedKey> = new Map<string, NamedKey>([
  ["A", "up"],
  ["B", "down"],
  ["C", "right"],
  ["D", "left"],
  ["H", "home"],
  ["F", "end"],
]);

const SS3_KEYS: ReadonlyMap<string, NamedKey> = new Map<string, NamedKey>([
  ["P", "f1"],
  ["Q", "f2"],
  ["R", "f3"],
  ["S", "f4"],
  ["A", "up"],
  ["B", "down"],
  ["C", "right"],
  ["D", "left"],
  ["H", "home"],
  ["F", "end"],
]);

const TILDE_KEYS: ReadonlyMap<number, NamedKey> = new Map<number, NamedKey>([
  [1, "home"],
  [2, "insert"],
  [3, "delete"],
  [4, "end"],
  [5, "pageUp"],
  [6, "pageDown"],
  [7, "home"],
  [8, "end"],
  [11, "f1"],
  [12, "f2"],
  [13, "f3"],
  [14, "f4"],
  [15, "f5"],
  [17, "f6"],
  [18, "f7"],
  [19, "f8"],
  [20, "f9"],
  [21, "f10"],
  [23, "f11"],
  [24, "f12"],
]);

const utf8 = new TextDecoder("utf-8");

/** xterm modifier parameter: value − 1 is a bit set (1 shift, 2 alt, 4 ctrl). */
export function decodeModifierParam(param: number): Required<KeyModifiers> {
  const bits = Number.isInteger(param) && param > 1 ? param - 1 : 0;
  return { shift: (bits & 1) !== 0, alt: (bits & 2) !== 0, ctrl: (bits & 4) !== 0 };
}

type Decoded = Readonly<{ event: KeyEvent | null; next: number }>;

function withAlt(event: KeyEvent): KeyEvent {
  return Object.freeze({ ...event, alt: true });
}

/** Bytes in a UTF-8 sequence led by `lead`, or 0 for a byte that cannot start one. */
function utf8Length(lead: number): number {
  if (lead >= 0xf0 && lead <= 0xf4) return 4;
  if (lead >= 0xe0) return lead <= 0xef ? 3 : 0;
  if (lead >= 0xc2) return 2;
  return 0;
}

function decodeSingleByte(byte: number): KeyEvent | null {
  switch (byte) {
    case 0x0d:
    case 0x0a:
      return namedKeyEvent("enter");
    case 0x09:
      return namedKeyEvent("tab");
    case 0x08:
    case 0x7f:
      return namedKeyEvent("backspace");
    case ESC:
      return namedKeyEvent("escape");
    case 0x20:
      return namedKeyEvent("space");
    default:
      break;
  }
  if (byte >= 0x01 && byte <= 0x1a) {
    return charKeyEvent(String.fromCharCode(byte + 0x60), { ctrl: true });
  }
  if (byte > 0x20 && byte < 0x7f) return charKeyEvent(String.fromCharCode(byte));
  return null;
}

/** One non-escape key starting at `i`. */
function decodePlain(bytes: Uint8Array, i: number): Decoded {
  const lead = bytes[i] ?? 0;
  if (lead < 0x80) return { event: decodeSingleByte(lead), next: i + 1 };
  const length = utf8Length(lead);
  if (length === 0 || i + length > bytes.length) return { event: null, next: i + 1 };
  const char = utf8.decode(bytes.subarray(i, i + length));
  return { event: char === "\uFFFD" ? null : charKeyEvent(char), next: i + length };
}

function decodeCsi(bytes: Uint8Array, start: number): Decoded {
  // start points just past "ESC [".
  let j = start;
  while (j < bytes.length && (bytes[j] ?? 0) >= 0x30 && (bytes[j] ?? 0) <= 0x3f) j++;
  const finalByte = bytes[j];
  if (finalByte === undefined || finalByte < 0x40 || finalByte > 0x7e) {
    return { event: namedKeyEvent("escape"), next: bytes.length };
  }
  const params = String.fromCharCode(...bytes.subarray(start, j)).split(";");
  const final = String.fromCharCode(finalByte);
  const next = j + 1;

  if (final === "~" && params[0] === "200") return decodePaste(bytes, next);
  if (final === "Z") return { event: namedKeyEvent("tab", { shift: true }), next };

  const modifiers = decodeModifierParam(Number.parseInt(params[1] ?? "", 10));
  if (final === "~") {
    const name = TILDE_KEYS.get(Number.parseInt(params[0] ?? "", 10));
    return { event: name === undefined ? null : namedKeyEvent(name, modifiers), next };
  }
  const name = CSI_FINAL_KEYS.get(final);
  return { event: name === undefined ? null : namedKeyEvent(name, modifiers), next };
}

function decodePaste(bytes: Uint8Array, start: number): Decoded {
  const rest = utf8.decode(bytes.subarray(start));
  const end = rest.indexOf(PASTE_END);
  if (end < 0) return { event: pasteKeyEvent(rest), next: bytes.length };
  const text = rest.slice(0, end);
  const consumed = new TextEncoder().encode(text).length + PASTE_END.length;
  return { event: pasteKeyEvent(text), next: start + consumed };
}

function decodeEscape(bytes: Uint8Array, i: number): Decoded {
  const second = bytes[i + 1];
  if (second === undefined || second === ESC) return { event: namedKeyEvent("escape"), next: i + 1 };
  if (second === LEFT_BRACKET) return decodeCsi(bytes, i + 2);
  if (second === SS3_INTRO && i + 2 < bytes.length) {
    const name = SS3_KEYS.get(String.fromCharCode(bytes[i + 2] ?? 0));
    return { event: name === undefined ? null : namedKeyEvent(name), next: i + 3 };
  }
  const plain = decodePlain(bytes, i + 1);
  return { event: plain.event === null ? null : withAlt(plain.event), next: plain.next };
}

/** Every key in one chunk of terminal input, in order. */
export function decodeKeys(bytes: Uint8Array): KeyEvent[] {
  const events: KeyEvent[] = [];
  let i = 0;
  while (i < bytes.length) {
    const decoded = bytes[i] === ESC ? decodeEscape(bytes, i) : decodePlain(bytes, i);
    if (decoded.event !== null) events.push(decoded.event);
    i = Math.max(decoded.next, i + 1);
  }
  return events;
}
