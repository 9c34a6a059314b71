/**
 * packages/core/src/runtime/environment.ts — Typed, layered environment values.
 *
 * Why: Ancestors pass values such as the theme or the border style down to
 * every descendant without threading props. An Environment is immutable;
 * `with` returns a new layer on top of the receiver, so siblings never see
 * each other's overrides.
 *
 * Values live in a per-key WeakMap indexed by layer, which keeps `get`
 * typed without a central heterogeneous table.
 */

import { type BorderStyle, getBorderStyle } from "../renderer/borderStyle.js";
import { defaultTheme } from "../theme/defaultTheme.js";
import type { Theme } from "../theme/types.js";
import type { TextStyle } from "../widgets/style.js";

export class EnvironmentKey<T> {
  readonly name: string;
  readonly defaultValue: T;
  private readonly layers = new WeakMap<Environment, Readonly<{ value: T }>>();

  constructor(name: string, defaultValue: T) {
    this.name = name;
    this.defaultValue = defaultValue;
  }

  /** @internal */
  bind(layer: Environment, value: T): void {
    this.layers.set(layer, Object.freeze({ value }));
  }

  /** @internal */
  lookup(layer: Environment): Readonly<{ value: T }> | undefined {
    return this.layers.get(layer);
  }
}

export function createEnvironmentKey<T>(name: string, defaultValue: T): EnvironmentKey<T> {
  return new EnvironmentKey(name, defaultValue);
}

export class Environment {
  private readonly parent: Environment | null;

  private constructor(parent: Environment | null) {
    this.parent = parent;
  }

  static empty(): Environment {
    return new Environment(null);
  }

  /** Nearest value bound for `key`, or its default. */
  get<T>(key: EnvironmentKey<T>): T {
    for (let layer: Environment | null = this; layer !== null; layer = layer.parent) {
      const bound = key.lookup(layer);
      if (bound !== undefined) return bound.value;
    }
    return key.defaultValue;
  }

  /** True when some layer binds `key`. */
  has<T>(key: EnvironmentKey<T>): boolean {
    for (let layer: Environment | null = this; layer !== null; layer = layer.parent) {
      if (key.lookup(layer) !== undefined) return true;
    }
    return false;
  }

  with<T>(key: EnvironmentKey<T>, value: T): Environment {
    const layer = new Environment(this);
    key.bind(layer, value);
    return layer;
  }
}

export const themeKey = createEnvironmentKey<Theme>("theme", defaultTheme);
export const borderStyleKey = createEnvironmentKey<BorderStyle>("borderStyle", getBorderStyle("line"));
/** Style applied by text views that do not set their own. */
export const foregroundStyleKey = createEnvironmentKey<TextStyle>("foregroundStyle", Object.freeze({}));
