/**
 * packages/core/src/keybindings/parser.ts — Parse key pattern strings and match events.
 *
 * Why: Apps bind keys with human-readable strings ("ctrl+c", "escape",
 * "shift+tab", "q"). Parsing returns a result union; `requireKeyPattern`
 * throws CF_INVALID_KEY for callers that want a value.
 *
 * Modifier names (case-insensitive): shift; ctrl, control; alt, meta, option.
 * Key names (case-insensitive): escape/esc, enter/return, tab, backspace,
 * delete/del, insert, space, up, down, left, right, home, end,
 * pageup, pagedown, f1-f12, plus (for "+"). Any other single character is a
 * character key; its case is kept.
 */

import { CellframeError } from "../errors.js";
import type {
  KeyEvent,
  KeyParseError,
  KeyPattern,
  NamedKey,
  ParseKeyResult,
} from "./types.js";

const NAMED_KEYS: ReadonlyMap<string, NamedKey> = new Map<string, NamedKey>([
  ["escape", "escape"],
  ["esc", "escape"],
  ["enter", "enter"],
  ["return", "enter"],
  ["tab", "tab"],
  ["backspace", "backspace"],
  ["delete", "delete"],
  ["del", "delete"],
  ["insert", "insert"],
  ["space", "space"],
  ["up", "up"],
  ["down", "down"],
  ["left", "left"],
  ["right", "right"],
  ["home", "home"],
  ["end", "end"],
  ["pageup", "pageUp"],
  ["pagedown", "pageDown"],
  ["f1", "f1"],
  ["f2", "f2"],
  ["f3", "f3"],
  ["f4", "f4"],
  ["f5", "f5"],
  ["f6", "f6"],
  ["f7", "f7"],
  ["f8", "f8"],
  ["f9", "f9"],
  ["f10", "f10"],
  ["f11", "f11"],
  ["f12", "f12"],
]);

type ModifierName = "shift" | "ctrl" | "alt";

const MODIFIERS: ReadonlyMap<string, ModifierName> = new Map<string, ModifierName>([
  ["shift", "shift"],
  ["ctrl", "ctrl"],
  ["control", "ctrl"],
  ["alt", "alt"],
  ["meta", "alt"],
  ["option", "alt"],
]);

function fail(code: KeyParseError["code"], detail: string): ParseKeyResult {
  return { ok: false, error: { code, detail } };
}

/**
 * Parse one pattern such as "ctrl+c" into a KeyPattern.
 *
 * @example
 * ```ts
 * parseKeyPattern("ctrl+c");    // { ok: true, value: { key: { kind: "char", char: "c" }, ctrl: true, ... } }
 * parseKeyPattern("shift+tab"); // named key with shift
 * parseKeyPattern("ctrl+");     // { ok: false, error: { code: "INVALID_KEY", ... } }
 * ```
 */
export function parseKeyPattern(input: string): ParseKeyResult {
  const trimmed = input.trim();
  if (trimmed.length === 0) return fail("EMPTY_PATTERN", "key pattern is empty");

  const pieces = trimmed.split("+");
  const seen = new Set<ModifierName>();
  let keyPiece: string | undefined;

  for (let i = 0; i < pieces.length; i++) {
    const piece = pieces[i];
    if (piece === undefined || piece.length === 0) {
      return fail("INVALID_KEY", `empty component in "${input}"`);
    }
    const isLast = i === pieces.length - 1;
    if (isLast) {
      keyPiece = piece;
      break;
    }
    const modifier = MODIFIERS.get(piece.toLowerCase());
    if (modifier === undefined) {
      return fail("INVALID_MODIFIER", `"${piece}" is not a valid modifier in "${input}"`);
    }
    if (seen.has(modifier)) {
      return fail("INVALID_MODIFIER", `duplicate modifier "${piece}" in "${input}"`);
    }
    seen.add(modifier);
  }

  if (keyPiece === undefined) return fail("INVALID_KEY", `no key found in "${input}"`);
  if (MODIFIERS.has(keyPiece.toLowerCase()) && pieces.length > 1) {
    return fail("INVALID_KEY", `modifier "${keyPiece}" cannot be the final key in "${input}"`);
  }

  const mods = { ctrl: seen.has("ctrl"), alt: seen.has("alt"), shift: seen.has("shift") };
  const lower = keyPiece.toLowerCase();
  const named = NAMED_KEYS.get(lower);
  if (named !== undefined) {
    return { ok: true, value: Object.freeze({ key: Object.freeze({ kind: "named", name: named }), ...mods }) };
  }
  const char = lower === "plus" ? "+" : keyPiece;
  if (Array.from(char).length !== 1) {
    return fail("INVALID_KEY", `unknown key "${keyPiece}" in "${input}"`);
  }
  return { ok: true, value: Object.freeze({ key: Object.freeze({ kind: "char", char }), ...mods }) };
}

/** parseKeyPattern, throwing CF_INVALID_KEY on failure. */
export function requireKeyPattern(input: string): KeyPattern {
  const result = parseKeyPattern(input);
  if (!result.ok) {
    throw new CellframeError("CF_INVALID_KEY", `${result.error.code}: ${result.error.detail}`);
  }
  return result.value;
}

/**
 * Whether `event` is the keystroke `pattern` describes.
 *
 * Character keys fold shift into case: "shift+a" matches "A" typed without a
 * reported shift. With ctrl or alt held, character case is ignored.
 */
export function matchesKeyPattern(pattern: KeyPattern, event: KeyEvent): boolean {
  if (pattern.ctrl !== event.ctrl || pattern.alt !== event.alt) return false;
  const key = event.key;
  if (pattern.key.kind === "named") {
    return key.kind === "named" && key.name === pattern.key.name && pattern.shift === event.shift;
  }
  if (key.kind !== "char") return false;
  const want = pattern.key.char;
  if (pattern.shift) {
    return key.char === want.toUpperCase() || (event.shift && key.char === want);
  }
  if (pattern.ctrl || pattern.alt) return key.char.toLowerCase() === want.toLowerCase();
  return key.char === want;
}

/** Render a pattern back to its canonical string form, e.g. "ctrl+shift+tab". */
export function keyPatternToString(pattern: KeyPattern): string {
  const parts: string[] = [];
  if (pattern.ctrl) parts.push("ctrl");
  if (pattern.alt) parts.push("alt");
  if (pattern.shift) parts.push("shift");
  if (pattern.key.kind === "named") {
    parts.push(pattern.key.name.toLowerCase());
  } else {
    parts.push(pattern.key.char === "+" ? "plus" : pattern.key.char);
  }
  return parts.join("+");
}
