/**
 * packages/core/src/theme/theme.ts — Theme construction and color lookup.
 *
 * Why: Views read colors through the environment's theme so an app can
 * restyle everything by overriding a few tokens.
 */

import type { Rgb24 } from "../widgets/style.js";
import { defaultTheme } from "./defaultTheme.js";
import type { Theme, ThemeColorName, ThemeColors } from "./types.js";
export type { Theme, ThemeColorName, ThemeColors } from "./types.js";

export type ThemeOverrides = Readonly<{ colors?: Partial<ThemeColors> }>;

export function createTheme(overrides: ThemeOverrides = {}): Theme {
  const colors: ThemeColors = Object.freeze({ ...defaultTheme.colors, ...(overrides.colors ?? {}) });
  return Object.freeze({ colors });
}

/** A token name resolves through the theme; a packed color passes through. */
export function resolveColor(theme: Theme, color: ThemeColorName | Rgb24): Rgb24 {
  if (typeof color !== "string") return color;
  return theme.colors[color];
}
