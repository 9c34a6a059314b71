import type { Rgb24 } from "../widgets/style.js";

export type ThemeColors = Readonly<{
  fg: Rgb24;
  accent: Rgb24;
  border: Rgb24;
  muted: Rgb24;
  /** Body fill of block-style containers. */
  containerBackground: Rgb24;
  /** Header/footer fill of block-style containers; darker than the body. */
  containerHeaderBackground: Rgb24;
  /** Foreground used for content behind a presented modal. */
  dimmedForeground: Rgb24;
}>;

export type ThemeColorName = keyof ThemeColors;

export type Theme = Readonly<{
  colors: ThemeColors;
}>;
