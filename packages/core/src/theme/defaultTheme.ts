/**
 * packages/core/src/theme/defaultTheme.ts — Default theme values.
 *
 * Why: Provides the baseline theme used when the app does not supply one.
 * Kept separate from theme helpers to avoid accidental circular imports.
 */

import { rgb } from "../widgets/style.js";
import type { Theme } from "./types.js";

export const defaultTheme: Theme = Object.freeze({
  colors: Object.freeze({
    fg: rgb(220, 220, 220),
    accent: rgb(0, 170, 255),
    border: rgb(110, 110, 110),
    muted: rgb(128, 128, 128),
    containerBackground: rgb(40, 40, 40),
    containerHeaderBackground: rgb(28, 28, 28),
    dimmedForeground: rgb(90, 90, 90),
  }),
});
