/**
 * packages/core/src/runtime/renderContext.ts — Per-view render context.
 *
 * Why: Everything a view may read or register during a frame is reached
 * through its RenderContext: the space it may fill, the environment, its
 * identity, the frame's focus manager, key dispatcher and state store.
 * Contexts are immutable; the `with*` helpers return modified copies.
 *
 * Measuring passes (`measuring: true`) compute sizes only. The context turns
 * registrations into no-ops while measuring, so measuring a subtree never
 * activates a section, adds a key handler or keeps state alive.
 */

import { type DevWarningSink, type DevWarningTopic, NOOP_DEV_WARNINGS } from "../app/devWarnings.js";
import { KeyEventDispatcher } from "../keybindings/dispatcher.js";
import type { KeyHandler } from "../keybindings/types.js";
import type { Size } from "../layout/types.js";
import type { Environment, EnvironmentKey } from "./environment.js";
import { FocusManager, type FocusableRegistration } from "./focus.js";
import {
  ROOT_IDENTITY,
  type ViewIdentity,
  branchIdentity,
  childIdentity,
  indexedIdentity,
} from "./identity.js";
import type { StateCell, StateStore, TrackResult } from "./stateStore.js";

/** Section focusables join when no ancestor opened one. */
export const DEFAULT_SECTION_ID = "main";

export type RenderContextInit = Readonly<{
  availableWidth: number;
  availableHeight: number;
  environment: Environment;
  focus: FocusManager;
  keys: KeyEventDispatcher;
  state: StateStore;
  identity?: ViewIdentity;
  measuring?: boolean;
  sectionId?: string;
  devWarnings?: DevWarningSink;
}>;

type RenderContextFields = Readonly<{
  availableWidth: number;
  availableHeight: number;
  environment: Environment;
  focus: FocusManager;
  keys: KeyEventDispatcher;
  state: StateStore;
  identity: ViewIdentity;
  measuring: boolean;
  sectionId: string;
  devWarnings: DevWarningSink;
}>;

function clampSpace(n: number): number {
  return Number.isFinite(n) ? Math.max(0, Math.floor(n)) : 0;
}

export class RenderContext {
  readonly availableWidth: number;
  readonly availableHeight: number;
  readonly environment: Environment;
  readonly focus: FocusManager;
  readonly keys: KeyEventDispatcher;
  readonly state: StateStore;
  readonly identity: ViewIdentity;
  readonly measuring: boolean;
  readonly sectionId: string;
  private readonly devWarnings: DevWarningSink;

  private constructor(fields: RenderContextFields) {
    this.availableWidth = clampSpace(fields.availableWidth);
    this.availableHeight = clampSpace(fields.availableHeight);
    this.environment = fields.environment;
    this.focus = fields.focus;
    this.keys = fields.keys;
    this.state = fields.state;
    this.identity = fields.identity;
    this.measuring = fields.measuring;
    this.sectionId = fields.sectionId;
    this.devWarnings = fields.devWarnings;
    Object.freeze(this);
  }

  static create(init: RenderContextInit): RenderContext {
    return new RenderContext({
      ...init,
      identity: init.identity ?? ROOT_IDENTITY,
      measuring: init.measuring ?? false,
      sectionId: init.sectionId ?? DEFAULT_SECTION_ID,
      devWarnings: init.devWarnings ?? NOOP_DEV_WARNINGS,
    });
  }

  private copy(patch: Partial<RenderContextFields>): RenderContext {
    return new RenderContext({
      availableWidth: this.availableWidth,
      availableHeight: this.availableHeight,
      environment: this.environment,
      focus: this.focus,
      keys: this.keys,
      state: this.state,
      identity: this.identity,
      measuring: this.measuring,
      sectionId: this.sectionId,
      devWarnings: this.devWarnings,
      ...patch,
    });
  }

  get availableSize(): Size {
    return { width: this.availableWidth, height: this.availableHeight };
  }

  /* ---------- Copies ---------- */

  withSize(width: number, height: number): RenderContext {
    return this.copy({ availableWidth: width, availableHeight: height });
  }

  withEnvironment(environment: Environment): RenderContext {
    return this.copy({ environment });
  }

  /** Shorthand for `withEnvironment(environment.with(key, value))`. */
  withValue<T>(key: EnvironmentKey<T>, value: T): RenderContext {
    return this.copy({ environment: this.environment.with(key, value) });
  }

  withChild(name: string, index?: number): RenderContext {
    return this.copy({ identity: childIdentity(this.identity, name, index) });
  }

  withIndex(index: number): RenderContext {
    return this.copy({ identity: indexedIdentity(this.identity, index) });
  }

  withBranch(label: string): RenderContext {
    return this.copy({ identity: branchIdentity(this.identity, label) });
  }

  withSection(sectionId: string): RenderContext {
    return this.copy({ sectionId });
  }

  asMeasuring(): RenderContext {
    return this.measuring ? this : this.copy({ measuring: true });
  }

  /**
   * A copy whose registrations go to a throwaway focus manager and
   * dispatcher. Content rendered through it is visible but inert.
   */
  isolated(): RenderContext {
    return this.copy({
      focus: new FocusManager({ autoActivate: false }),
      keys: new KeyEventDispatcher(),
    });
  }

  /* ---------- Reads ---------- */

  get<T>(key: EnvironmentKey<T>): T {
    return this.environment.get(key);
  }

  cell<T>(slot: string, initial: T): StateCell<T> {
    return this.state.cell(this.identity, slot, initial, this.measuring);
  }

  track<T>(slot: string, value: T): TrackResult<T> {
    return this.state.track(this.identity, slot, value, this.measuring);
  }

  /** True when `id` is the selection of the active section and that section is this context's. */
  isFocused(id: string): boolean {
    return this.focus.isSectionActive(this.sectionId) && this.focus.isSelected(id);
  }

  isSectionActive(): boolean {
    return this.focus.isSectionActive(this.sectionId);
  }

  /* ---------- Registrations (skipped while measuring) ---------- */

  registerSection(): void {
    if (this.measuring) return;
    this.focus.registerSection(this.sectionId);
  }

  registerFocusable(registration: FocusableRegistration): void {
    if (this.measuring) return;
    this.focus.registerFocusable(this.sectionId, registration);
  }

  addKeyHandler(handler: KeyHandler): void {
    if (this.measuring) return;
    this.keys.addHandler(handler);
  }

  warn(topic: DevWarningTopic, key: string, detail: string): void {
    if (this.measuring) return;
    this.devWarnings(topic, key, detail);
  }
}
