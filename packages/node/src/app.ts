/**
 * packages/node/src/app.ts — Node entry points: createNodeApp and runApp.
 */

import { type App, type CreateAppOptions, createApp } from "@cellframe/core";
import { type NodeTerminalOptions, createNodeTerminal } from "./terminal.js";

export type NodeAppOptions = Omit<CreateAppOptions, "host"> &
  Readonly<{
    terminal?: NodeTerminalOptions;
  }>;

/** createApp over a terminal on process.stdin/stdout (or the streams given). */
export function createNodeApp(opts: NodeAppOptions): App {
  const { terminal, ...rest } = opts;
  return createApp({ ...rest, host: createNodeTerminal(terminal) });
}

type SignalSource = Readonly<{
  once(signal: "SIGTERM", listener: () => void): unknown;
  off(signal: "SIGTERM", listener: () => void): unknown;
}>;

/**
 * Run `app` until it stops. SIGTERM stops it too, so the terminal is
 * restored when the process is asked to exit.
 */
export function runApp(app: App, signals: SignalSource = process): Promise<void> {
  const onSignal = () => {
    // A failed stop also rejects run(), which the caller receives.
    void app.stop().catch(() => undefined);
  };
  signals.once("SIGTERM", onSignal);
  return app.run().finally(() => {
    signals.off("SIGTERM", onSignal);
  });
}
