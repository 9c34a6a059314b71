/**
 * packages/core/src/keybindings/keyEvent.ts — KeyEvent constructors and predicates.
 */

import type { KeyEvent, KeyModifiers, NamedKey } from "./types.js";

function mods(m: KeyModifiers | undefined): Pick<KeyEvent, "ctrl" | "alt" | "shift"> {
  return { ctrl: m?.ctrl === true, alt: m?.alt === true, shift: m?.shift === true };
}

export function namedKeyEvent(name: NamedKey, modifiers?: KeyModifiers): KeyEvent {
  return Object.freeze({ key: Object.freeze({ kind: "named", name }), ...mods(modifiers) });
}

/** A character keystroke. A single space becomes the named "space" key. */
export function charKeyEvent(char: string, modifiers?: KeyModifiers): KeyEvent {
  if (char === " ") return namedKeyEvent("space", modifiers);
  return Object.freeze({ key: Object.freeze({ kind: "char", char }), ...mods(modifiers) });
}

export function pasteKeyEvent(text: string): KeyEvent {
  return Object.freeze({ key: Object.freeze({ kind: "paste", text }), ...mods(undefined) });
}

/** Named key with no ctrl/alt (shift must match `shift`). */
export function isPlainNamedKey(event: KeyEvent, name: NamedKey, shift = false): boolean {
  return (
    event.key.kind === "named" &&
    event.key.name === name &&
    !event.ctrl &&
    !event.alt &&
    event.shift === shift
  );
}
