/**
 * packages/core/src/app/createApp.ts — Application root and frame driver.
 *
 * Why: Owns everything that lives longer than a frame (focus manager, state
 * store, frame diff writer) and drives frames: build the root context, walk
 * the view tree, close the frame's focus and state bookkeeping, write the
 * changed lines to the host.
 *
 * Responsibilities:
 *   - Lifecycle (start/stop/run) over a TerminalHost
 *   - Key routing: frame handlers, then focus navigation, then quit keys
 *   - Render scheduling; requests made before the frame runs coalesce
 *   - Dev warnings and per-frame metrics
 *
 * Invariants:
 *   - renderFrame() during a frame throws CF_REENTRANT_RENDER
 *   - Host failures surface as CF_HOST_ERROR
 *   - An error thrown while handling a key stops the app and rejects run()
 */

import { KeyEventDispatcher } from "../keybindings/dispatcher.js";
import { matchesKeyPattern, requireKeyPattern } from "../keybindings/parser.js";
import type { KeyEvent } from "../keybindings/types.js";
import { alignBuffer } from "../layout/frame.js";
import { alignment } from "../layout/types.js";
import { getBorderStyle } from "../renderer/borderStyle.js";
import { CellframeError, describeThrown } from "../errors.js";
import { Environment, borderStyleKey, themeKey } from "../runtime/environment.js";
import { FocusManager } from "../runtime/focus.js";
import { RenderContext } from "../runtime/renderContext.js";
import { StateStore } from "../runtime/stateStore.js";
import { renderView } from "../runtime/walker.js";
import { createTheme } from "../theme/theme.js";
import { resolveAppConfig } from "./config.js";
import { createDevWarnings } from "./devWarnings.js";
import { FrameDiffWriter } from "./frameDiff.js";
import type { App, CreateAppOptions } from "./types.js";

type RunWaiter = Readonly<{ resolve: () => void; reject: (error: unknown) => void }>;

function hostError(action: string, e: unknown): CellframeError {
  return new CellframeError("CF_HOST_ERROR", `host.${action} failed: ${describeThrown(e)}`);
}

/**
 * Create an application over `opts.host`.
 *
 * @example
 * ```ts
 * const app = createApp({
 *   host: createNodeTerminal(),
 *   view: () => ui.panel("Hello", ui.text("Press q to quit")),
 *   config: { quitKeys: ["q", "ctrl+c"] },
 * });
 * await app.run();
 * ```
 */
export function createApp(opts: CreateAppOptions): App {
  const config = resolveAppConfig(opts.config);
  const host = opts.host;
  const sink = opts.warn ?? ((message: string) => console.warn(message));
  const devWarnings = createDevWarnings({ devMode: config.devMode, warn: sink });
  const environment = Environment.empty()
    .with(themeKey, createTheme(opts.theme))
    .with(borderStyleKey, getBorderStyle(config.defaultBorderStyle));
  const quitPatterns = config.quitKeys.map(requireKeyPattern);

  let running = false;
  let lifecycleBusy: "start" | "stop" | null = null;
  let inRender = false;
  let renderScheduled = false;
  let frameNo = 0;
  let lastCols = -1;
  let lastRows = -1;
  let renderTimer: ReturnType<typeof setTimeout> | null = null;
  let sizePoll: ReturnType<typeof setInterval> | null = null;
  let waiters: RunWaiter[] = [];

  const focus = new FocusManager({
    warn: (message) => devWarnings("focus", message, message),
    onChange: () => requestRender(),
  });
  const state = new StateStore({ onChange: () => requestRender() });
  const keys = new KeyEventDispatcher();
  const writer = new FrameDiffWriter();

  function settleWaiters(error?: unknown): void {
    const pending = waiters;
    waiters = [];
    for (const waiter of pending) {
      if (error === undefined) waiter.resolve();
      else waiter.reject(error);
    }
  }

  function clearTimers(): void {
    if (renderTimer !== null) clearTimeout(renderTimer);
    if (sizePoll !== null) clearInterval(sizePoll);
    renderTimer = null;
    sizePoll = null;
    renderScheduled = false;
  }

  /**
   * Stop the host and settle run() with `cause` (or the stop failure).
   * Never rejects; resolves with the stop failure, if any.
   */
  function shutdown(cause: unknown): Promise<CellframeError | undefined> {
    if (!running) {
      settleWaiters(cause);
      return Promise.resolve(undefined);
    }
    running = false;
    lifecycleBusy = "stop";
    clearTimers();
    let p: Promise<void>;
    try {
      p = host.stop();
    } catch (e: unknown) {
      lifecycleBusy = null;
      const error = hostError("stop", e);
      settleWaiters(cause ?? error);
      return Promise.resolve(error);
    }
    return p.then(
      () => {
        lifecycleBusy = null;
        settleWaiters(cause);
        return undefined;
      },
      (e: unknown) => {
        lifecycleBusy = null;
        const error = hostError("stop", e);
        settleWaiters(cause ?? error);
        return error;
      },
    );
  }

  /** Stop after an error and hand it to run(). */
  function fail(error: unknown): void {
    void shutdown(error);
  }

  function requestRender(): void {
    if (!running || renderScheduled) return;
    renderScheduled = true;
    renderTimer = setTimeout(() => {
      renderTimer = null;
      renderScheduled = false;
      if (!running) return;
      try {
        renderFrame();
      } catch (e: unknown) {
        fail(e);
      }
    }, 0);
  }

  function readSize(): Readonly<{ cols: number; rows: number }> {
    let size: Readonly<{ width: number; height: number }>;
    try {
      size = host.size();
    } catch (e: unknown) {
      throw hostError("size", e);
    }
    const clamp = (n: number) => (Number.isFinite(n) ? Math.max(0, Math.floor(n)) : 0);
    return { cols: clamp(size.width), rows: clamp(size.height) };
  }

  function write(text: string): void {
    try {
      host.write(text);
    } catch (e: unknown) {
      throw hostError("write", e);
    }
  }

  function renderFrame(): void {
    if (inRender) {
      throw new CellframeError("CF_REENTRANT_RENDER", "renderFrame: called while a frame is in progress");
    }
    inRender = true;
    try {
      const start = performance.now();
      const { cols, rows } = readSize();
      if (cols === 0 || rows === 0) {
        devWarnings(
          "layout",
          `zeroRoot:${String(cols)}x${String(rows)}`,
          `terminal reported ${String(cols)}x${String(rows)}; nothing is drawn.`,
        );
      }

      keys.clear();
      focus.beginFrame();
      state.beginFrame();
      const ctx = RenderContext.create({
        availableWidth: cols,
        availableHeight: rows,
        environment,
        focus,
        keys,
        state,
        devWarnings,
      });
      const root = typeof opts.view === "function" ? opts.view() : opts.view;
      const buffer = renderView(root, ctx);
      focus.endFrame();
      state.endFrame();

      frameNo++;
      if (config.fullRedrawEveryFrames > 0 && frameNo % config.fullRedrawEveryFrames === 0) {
        writer.invalidate();
      }
      const screen = alignBuffer(buffer, cols, rows, alignment.topLeading);
      const diff = writer.diff(screen.lines, cols);
      if (diff.output.length > 0) write(diff.output);
      lastCols = cols;
      lastRows = rows;

      opts.onFrame?.({
        frame: frameNo,
        cols,
        rows,
        renderMs: performance.now() - start,
        handlerCount: keys.size,
        focusSectionCount: focus.sectionIds().length,
        changedLines: diff.changedLines,
      });
    } finally {
      inRender = false;
    }
  }

  function handleKey(event: KeyEvent): boolean {
    let consumed = keys.dispatch(event);
    if (!consumed) consumed = focus.handleKey(event);
    if (!consumed && quitPatterns.some((pattern) => matchesKeyPattern(pattern, event))) {
      consumed = true;
      if (running) {
        void shutdown(undefined);
        return consumed;
      }
    }
    requestRender();
    return consumed;
  }

  function onHostKey(event: KeyEvent): void {
    try {
      handleKey(event);
    } catch (e: unknown) {
      fail(e);
    }
  }

  function onHostResize(): void {
    writer.invalidate();
    requestRender();
  }

  function pollSize(): void {
    try {
      const { cols, rows } = readSize();
      if (cols !== lastCols || rows !== lastRows) onHostResize();
    } catch (e: unknown) {
      fail(e);
    }
  }

  function start(): Promise<void> {
    if (running) return Promise.resolve();
    if (lifecycleBusy !== null) {
      return Promise.reject(new CellframeError("CF_HOST_ERROR", `start: ${lifecycleBusy} already in flight`));
    }
    lifecycleBusy = "start";
    let p: Promise<void>;
    try {
      p = host.start(onHostKey, onHostResize);
    } catch (e: unknown) {
      lifecycleBusy = null;
      return Promise.reject(hostError("start", e));
    }
    return p.then(
      () => {
        lifecycleBusy = null;
        running = true;
        writer.invalidate();
        sizePoll = setInterval(pollSize, config.pollIntervalMs);
        sizePoll.unref();
        try {
          renderFrame();
        } catch (e: unknown) {
          void shutdown(e);
          throw e;
        }
      },
      (e: unknown) => {
        lifecycleBusy = null;
        throw hostError("start", e);
      },
    );
  }

  function stop(): Promise<void> {
    return shutdown(undefined).then((error) => {
      if (error !== undefined) throw error;
    });
  }

  function run(): Promise<void> {
    return start().then(
      () =>
        new Promise<void>((resolve, reject) => {
          if (!running) {
            resolve();
            return;
          }
          waiters.push({ resolve, reject });
        }),
    );
  }

  return Object.freeze({
    renderFrame,
    handleKey,
    requestRender,
    start,
    stop,
    run,
    focus,
    config,
    get isRunning() {
      return running;
    },
  });
}
