/**
 * packages/core/src/app/config.ts — App configuration defaults and validation.
 */

import { invalidProps, requireNonNegativeInt, requirePositiveInt } from "../errors.js";
import { parseKeyPattern } from "../keybindings/parser.js";
import { isBorderStyleId } from "../renderer/borderStyle.js";
import type { AppConfig, ResolvedAppConfig } from "./types.js";

export const DEFAULT_CONFIG: ResolvedAppConfig = Object.freeze({
  devMode: false,
  quitKeys: Object.freeze(["ctrl+c"]),
  pollIntervalMs: 100,
  fullRedrawEveryFrames: 0,
  defaultBorderStyle: "line",
});

function resolveQuitKeys(keys: readonly string[]): readonly string[] {
  for (const key of keys) {
    const parsed = parseKeyPattern(key);
    if (!parsed.ok) invalidProps(`quitKeys: "${key}" is not a valid key pattern (${parsed.error.detail})`);
  }
  return Object.freeze(keys.slice());
}

/** Fill defaults and validate. Invalid fields throw CF_INVALID_PROPS naming the field. */
export function resolveAppConfig(config: AppConfig | undefined): ResolvedAppConfig {
  if (!config) return DEFAULT_CONFIG;
  const devMode = config.devMode === true;
  const quitKeys = config.quitKeys === undefined ? DEFAULT_CONFIG.quitKeys : resolveQuitKeys(config.quitKeys);
  const pollIntervalMs =
    config.pollIntervalMs === undefined
      ? DEFAULT_CONFIG.pollIntervalMs
      : requirePositiveInt("pollIntervalMs", config.pollIntervalMs);
  const fullRedrawEveryFrames =
    config.fullRedrawEveryFrames === undefined
      ? DEFAULT_CONFIG.fullRedrawEveryFrames
      : requireNonNegativeInt("fullRedrawEveryFrames", config.fullRedrawEveryFrames);
  const defaultBorderStyle = config.defaultBorderStyle ?? DEFAULT_CONFIG.defaultBorderStyle;
  if (!isBorderStyleId(defaultBorderStyle)) {
    invalidProps(`defaultBorderStyle: unknown border style "${String(defaultBorderStyle)}"`);
  }

  return Object.freeze({
    devMode,
    quitKeys,
    pollIntervalMs,
    fullRedrawEveryFrames,
    defaultBorderStyle,
  });
}
