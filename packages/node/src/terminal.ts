/**
 * packages/node/src/terminal.ts — TerminalHost over Node's stdin/stdout.
 *
 * Why: The core only needs size, write, and a stream of keys. This host puts
 * the TTY in raw mode, switches to the alternate screen with a hidden
 * cursor, turns on bracketed paste, and undoes all of it on stop.
 *
 * Streams are typed structurally so tests can pass in-memory stand-ins.
 */

import {
  ENTER_ALT_SCREEN,
  HIDE_CURSOR,
  type KeyEvent,
  LEAVE_ALT_SCREEN,
  SHOW_CURSOR,
  type Size,
  type TerminalHost,
} from "@cellframe/core";
import { decodeKeys } from "./keyDecoder.js";

export const BRACKETED_PASTE_ON = "\u001b[?2004h";
export const BRACKETED_PASTE_OFF = "\u001b[?2004l";

export const FALLBACK_SIZE: Size = Object.freeze({ width: 80, height: 24 });

export interface TerminalInput {
  isTTY?: boolean;
  setRawMode?(mode: boolean): unknown;
  on(event: "data", listener: (chunk: Buffer | string) => void): unknown;
  off(event: "data", listener: (chunk: Buffer | string) => void): unknown;
  resume(): unknown;
  pause(): unknown;
}

export interface TerminalOutput {
  columns?: number;
  rows?: number;
  write(text: string): boolean;
  on(event: "resize", listener: () => void): unknown;
  off(event: "resize", listener: () => void): unknown;
}

export type NodeTerminalOptions = Readonly<{
  stdin?: TerminalInput;
  stdout?: TerminalOutput;
  /** Draw on the alternate screen. Default true. */
  altScreen?: boolean;
}>;

function dimension(value: number | undefined, fallback: number): number {
  return value !== undefined && Number.isInteger(value) && value > 0 ? value : fallback;
}

export function createNodeTerminal(opts: NodeTerminalOptions = {}): TerminalHost {
  const stdin: TerminalInput = opts.stdin ?? process.stdin;
  const stdout: TerminalOutput = opts.stdout ?? process.stdout;
  const altScreen = opts.altScreen !== false;

  let onData: ((chunk: Buffer | string) => void) | null = null;
  let onResize: (() => void) | null = null;

  function setRaw(mode: boolean): void {
    if (stdin.isTTY === true && stdin.setRawMode !== undefined) stdin.setRawMode(mode);
  }

  return Object.freeze({
    size(): Size {
      return {
        width: dimension(stdout.columns, FALLBACK_SIZE.width),
        height: dimension(stdout.rows, FALLBACK_SIZE.height),
      };
    },

    write(text: string): void {
      stdout.write(text);
    },

    start(onKey: (event: KeyEvent) => void, resize: () => void): Promise<void> {
      if (onData !== null) return Promise.resolve();
      setRaw(true);
      stdout.write((altScreen ? ENTER_ALT_SCREEN : "") + HIDE_CURSOR + BRACKETED_PASTE_ON);

      const dataListener = (chunk: Buffer | string) => {
        const bytes = typeof chunk === "string" ? Buffer.from(chunk, "utf8") : chunk;
        for (const event of decodeKeys(bytes)) onKey(event);
      };
      onData = dataListener;
      onResize = resize;
      stdin.on("data", dataListener);
      stdout.on("resize", resize);
      stdin.resume();
      return Promise.resolve();
    },

    stop(): Promise<void> {
      if (onData === null) return Promise.resolve();
      stdin.off("data", onData);
      if (onResize !== null) stdout.off("resize", onResize);
      onData = null;
      onResize = null;
      stdout.write(BRACKETED_PASTE_OFF + SHOW_CURSOR + (altScreen ? LEAVE_ALT_SCREEN : ""));
      setRaw(false);
      stdin.pause();
      return Promise.resolve();
    },
  });
}
