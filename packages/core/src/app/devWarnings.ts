/**
 * packages/core/src/app/devWarnings.ts — Deduplicated development warnings.
 *
 * Why: Layout, focus and key diagnostics fire every frame while the cause
 * persists. Each distinct key is reported once per app, and only in devMode.
 */

export type DevWarningTopic = "layout" | "focus" | "keys";

/** `key` identifies the issue for deduplication; `detail` is the message. */
export type DevWarningSink = (topic: DevWarningTopic, key: string, detail: string) => void;

type DevWarningsContext = Readonly<{
  devMode: boolean;
  warn: (message: string) => void;
}>;

export const NOOP_DEV_WARNINGS: DevWarningSink = () => {};

export function createDevWarnings(ctx: DevWarningsContext): DevWarningSink {
  if (!ctx.devMode) return NOOP_DEV_WARNINGS;
  const warned = new Set<string>();
  return (topic, key, detail) => {
    const dedupeKey = `${topic}:${key}`;
    if (warned.has(dedupeKey)) return;
    warned.add(dedupeKey);
    ctx.warn(`[cellframe][${topic}] ${detail}`);
  };
}
