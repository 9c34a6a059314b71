/**
 * packages/core/src/runtime/stateStore.ts — Identity-keyed view state.
 *
 * Why: Views are plain values rebuilt every frame, so anything that must
 * outlive a frame lives here, keyed by (identity, slot). `set` notifies the
 * app so it can schedule a re-render.
 *
 * Lifetime:
 *   - A cell is created on first read and kept while some frame reads it
 *   - `endFrame()` drops cells and tracked values not read during the frame
 *   - Measuring passes neither create nor keep cells alive; reading a cell
 *     that does not exist yet returns a detached cell holding `initial`
 */

import type { ViewIdentity } from "./identity.js";

export type StateCell<T> = Readonly<{
  get: () => T;
  set: (next: T | ((previous: T) => T)) => void;
}>;

export type TrackResult<T> = Readonly<{
  /** True when a previous frame tracked a different value. */
  changed: boolean;
  /** True on the first frame this slot is tracked. */
  first: boolean;
  previous: T | undefined;
}>;

type StoredCell = {
  value: unknown;
  touchedFrame: number;
};

type StoredTrack = {
  /** Value committed by the last frame that tracked this slot. */
  committed: unknown;
  hasCommitted: boolean;
  /** Value seen in the frame `pendingFrame`. */
  pending: unknown;
  pendingFrame: number;
};

export type StateStoreOptions = Readonly<{
  onChange?: () => void;
}>;

export class StateStore {
  private readonly cells = new Map<ViewIdentity, Map<string, StoredCell>>();
  private readonly tracks = new Map<ViewIdentity, Map<string, StoredTrack>>();
  private frame = 0;
  private readonly onChange: (() => void) | undefined;

  constructor(options: StateStoreOptions = {}) {
    this.onChange = options.onChange;
  }

  beginFrame(): void {
    this.frame++;
  }

  cell<T>(identity: ViewIdentity, slot: string, initial: T, measuring = false): StateCell<T> {
    let slots = this.cells.get(identity);
    let stored = slots?.get(slot);

    if (stored === undefined) {
      if (measuring) return detachedCell(initial);
      stored = { value: initial, touchedFrame: this.frame };
      if (slots === undefined) {
        slots = new Map();
        this.cells.set(identity, slots);
      }
      slots.set(slot, stored);
    } else if (!measuring) {
      stored.touchedFrame = this.frame;
    }

    // Slots are typed by their callers; one slot always holds one type.
    const entry = stored as { value: T; touchedFrame: number };
    return Object.freeze({
      get: () => entry.value,
      set: (next: T | ((previous: T) => T)) => {
        const value = typeof next === "function" ? (next as (previous: T) => T)(entry.value) : next;
        if (Object.is(value, entry.value)) return;
        entry.value = value;
        this.onChange?.();
      },
    });
  }

  /**
   * Compare `value` with the value tracked for this slot by the previous
   * frame. Repeated calls within one frame report against the same previous
   * value.
   */
  track<T>(identity: ViewIdentity, slot: string, value: T, measuring = false): TrackResult<T> {
    const stored = this.tracks.get(identity)?.get(slot);

    if (stored === undefined) {
      if (!measuring) {
        let slots = this.tracks.get(identity);
        if (slots === undefined) {
          slots = new Map();
          this.tracks.set(identity, slots);
        }
        slots.set(slot, { committed: undefined, hasCommitted: false, pending: value, pendingFrame: this.frame });
      }
      return Object.freeze({ changed: false, first: true, previous: undefined });
    }

    if (stored.pendingFrame !== this.frame && !measuring) {
      stored.committed = stored.pending;
      stored.hasCommitted = true;
    }
    const hasPrevious = stored.pendingFrame !== this.frame ? true : stored.hasCommitted;
    const previousValue = stored.pendingFrame !== this.frame ? stored.pending : stored.committed;
    if (!measuring) {
      stored.pending = value;
      stored.pendingFrame = this.frame;
    }

    if (!hasPrevious) return Object.freeze({ changed: false, first: true, previous: undefined });
    // Same slot-typing rule as cell().
    const previous = previousValue as T;
    return Object.freeze({ changed: !Object.is(previous, value), first: false, previous });
  }

  /** Drop every cell and tracked slot the current frame did not read. */
  endFrame(): void {
    for (const [identity, slots] of this.cells) {
      for (const [slot, stored] of slots) {
        if (stored.touchedFrame !== this.frame) slots.delete(slot);
      }
      if (slots.size === 0) this.cells.delete(identity);
    }
    for (const [identity, slots] of this.tracks) {
      for (const [slot, stored] of slots) {
        if (stored.pendingFrame !== this.frame) slots.delete(slot);
      }
      if (slots.size === 0) this.tracks.delete(identity);
    }
  }

  has(identity: ViewIdentity, slot: string): boolean {
    return this.cells.get(identity)?.has(slot) ?? false;
  }

  get size(): number {
    let n = 0;
    for (const slots of this.cells.values()) n += slots.size;
    return n;
  }
}

function detachedCell<T>(initial: T): StateCell<T> {
  let value = initial;
  return Object.freeze({
    get: () => value,
    set: (next: T | ((previous: T) => T)) => {
      value = typeof next === "function" ? (next as (previous: T) => T)(value) : next;
    },
  });
}
