/**
 * packages/core/src/keybindings/types.ts — Key event and key pattern types.
 *
 * Why: One decoded keystroke is a KeyEvent. Views react to events either
 * through raw handlers on the dispatcher or through human-readable patterns
 * ("ctrl+c", "escape", "q") parsed into KeyPattern values.
 */

export type FunctionKeyName =
  | "f1"
  | "f2"
  | "f3"
  | "f4"
  | "f5"
  | "f6"
  | "f7"
  | "f8"
  | "f9"
  | "f10"
  | "f11"
  | "f12";

export type NamedKey =
  | "escape"
  | "enter"
  | "tab"
  | "backspace"
  | "delete"
  | "insert"
  | "space"
  | "up"
  | "down"
  | "left"
  | "right"
  | "home"
  | "end"
  | "pageUp"
  | "pageDown"
  | FunctionKeyName;

/**
 * A key without modifiers.
 * `char` holds one printable grapheme; `paste` holds a whole bracketed paste.
 */
export type Key =
  | Readonly<{ kind: "named"; name: NamedKey }>
  | Readonly<{ kind: "char"; char: string }>
  | Readonly<{ kind: "paste"; text: string }>;

export type KeyEvent = Readonly<{
  key: Key;
  ctrl: boolean;
  alt: boolean;
  shift: boolean;
}>;

export type KeyModifiers = Readonly<{ ctrl?: boolean; alt?: boolean; shift?: boolean }>;

/**
 * A handler on the frame's dispatcher.
 * Returns true when it consumed the event; dispatch stops there.
 */
export type KeyHandler = (event: KeyEvent) => boolean;

/** Parsed form of a pattern string such as "ctrl+c" or "shift+tab". */
export type KeyPattern = Readonly<{
  key: Readonly<{ kind: "named"; name: NamedKey }> | Readonly<{ kind: "char"; char: string }>;
  ctrl: boolean;
  alt: boolean;
  shift: boolean;
}>;

/** Error returned when parsing a key pattern string fails. */
export type KeyParseError = Readonly<{
  code: "INVALID_KEY" | "EMPTY_PATTERN" | "INVALID_MODIFIER";
  detail: string;
}>;

export type ParseKeyResult =
  | Readonly<{ ok: true; value: KeyPattern }>
  | Readonly<{ ok: false; error: KeyParseError }>;
