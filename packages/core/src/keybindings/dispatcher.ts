/**
 * packages/core/src/keybindings/dispatcher.ts — Frame-scoped key handler chain.
 *
 * Why: Every frame rebuilds the handler list while the tree renders. Dispatch
 * walks it newest-first and stops at the first handler that consumes the
 * event, so content rendered later (overlays) outranks content rendered
 * earlier (the base layer).
 *
 * Handlers that throw are not caught; the error reaches the caller of
 * dispatch.
 */

import type { KeyEvent, KeyHandler } from "./types.js";

export class KeyEventDispatcher {
  private handlers: KeyHandler[] = [];

  addHandler(handler: KeyHandler): void {
    this.handlers.push(handler);
  }

  /** Offer `event` to handlers in reverse registration order. Returns whether one consumed it. */
  dispatch(event: KeyEvent): boolean {
    const handlers = this.handlers;
    for (let i = handlers.length - 1; i >= 0; i--) {
      const handler = handlers[i];
      if (handler !== undefined && handler(event)) return true;
    }
    return false;
  }

  clear(): void {
    this.handlers = [];
  }

  get size(): number {
    return this.handlers.length;
  }
}
