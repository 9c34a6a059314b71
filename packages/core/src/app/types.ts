import type { KeyEvent } from "../keybindings/types.js";
import type { Size } from "../layout/types.js";
import type { BorderStyleId } from "../renderer/borderStyle.js";
import type { FocusManager } from "../runtime/focus.js";
import type { View } from "../runtime/view.js";
import type { ThemeOverrides } from "../theme/theme.js";

/**
 * The terminal the app draws into.
 *
 * `start` begins delivering decoded keys and resize notifications; `stop`
 * ends delivery and restores the terminal. Both may complete asynchronously.
 */
export interface TerminalHost {
  size(): Size;
  write(text: string): void;
  start(onKey: (event: KeyEvent) => void, onResize: () => void): Promise<void>;
  stop(): Promise<void>;
}

export type AppFrameMetrics = Readonly<{
  frame: number;
  cols: number;
  rows: number;
  renderMs: number;
  handlerCount: number;
  focusSectionCount: number;
  changedLines: number;
}>;

export type AppConfig = Readonly<{
  devMode?: boolean;
  /** Key patterns that stop the app when nothing else consumed the key. */
  quitKeys?: readonly string[];
  /** Period of the terminal size poll while running, in milliseconds. */
  pollIntervalMs?: number;
  /** Repaint everything every N frames. 0 disables. */
  fullRedrawEveryFrames?: number;
  defaultBorderStyle?: BorderStyleId;
}>;

export type ResolvedAppConfig = Readonly<{
  devMode: boolean;
  quitKeys: readonly string[];
  pollIntervalMs: number;
  fullRedrawEveryFrames: number;
  defaultBorderStyle: BorderStyleId;
}>;

export type CreateAppOptions = Readonly<{
  /** The root view, or a function building it before every frame. */
  view: View | (() => View);
  host: TerminalHost;
  config?: AppConfig;
  theme?: ThemeOverrides;
  /** Sink for dev warnings. Default console.warn. */
  warn?: (message: string) => void;
  onFrame?: (metrics: AppFrameMetrics) => void;
}>;

export interface App {
  /** Render one frame now and write the changed lines. */
  renderFrame(): void;
  /** Route a key: frame handlers, then focus navigation, then quit keys. */
  handleKey(event: KeyEvent): boolean;
  /** Schedule a frame. Requests made before it runs coalesce. */
  requestRender(): void;
  start(): Promise<void>;
  stop(): Promise<void>;
  /** Start and resolve once the app stops. */
  run(): Promise<void>;
  readonly focus: FocusManager;
  readonly isRunning: boolean;
  readonly config: ResolvedAppConfig;
}
