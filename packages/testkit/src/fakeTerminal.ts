/**
 * packages/testkit/src/fakeTerminal.ts — Scripted in-memory terminal host.
 *
 * Why: App tests drive real frames without a TTY. The fake records every
 * write, reports a settable size, and lets the test deliver keys and resizes
 * through the callbacks the app registered in start().
 *
 * Key events are opaque here (`TKey`), so the fake fits any host interface
 * shaped like `{ size, write, start(onKey, onResize), stop }`.
 */

export type FakeTerminalOptions = Readonly<{
  cols?: number;
  rows?: number;
  /** Make start() reject with this error. */
  failStart?: Error;
  /** Make stop() reject with this error. */
  failStop?: Error;
}>;

export class FakeTerminal<TKey> {
  private cols: number;
  private rows: number;
  private onKey: ((event: TKey) => void) | null = null;
  private onResize: (() => void) | null = null;
  private readonly failStart: Error | undefined;
  private readonly failStop: Error | undefined;
  /** Every string passed to write(), in order. */
  readonly writes: string[] = [];
  startCount = 0;
  stopCount = 0;

  constructor(opts: FakeTerminalOptions = {}) {
    this.cols = opts.cols ?? 80;
    this.rows = opts.rows ?? 24;
    this.failStart = opts.failStart;
    this.failStop = opts.failStop;
  }

  size(): Readonly<{ width: number; height: number }> {
    return { width: this.cols, height: this.rows };
  }

  write(text: string): void {
    this.writes.push(text);
  }

  start(onKey: (event: TKey) => void, onResize: () => void): Promise<void> {
    this.startCount++;
    if (this.failStart !== undefined) return Promise.reject(this.failStart);
    this.onKey = onKey;
    this.onResize = onResize;
    return Promise.resolve();
  }

  stop(): Promise<void> {
    this.stopCount++;
    this.onKey = null;
    this.onResize = null;
    if (this.failStop !== undefined) return Promise.reject(this.failStop);
    return Promise.resolve();
  }

  get started(): boolean {
    return this.onKey !== null;
  }

  /** Deliver keys as the terminal would. Throws when the host is not started. */
  press(...events: readonly TKey[]): void {
    for (const event of events) {
      const deliver = this.onKey;
      if (deliver === null) throw new Error("FakeTerminal.press: host is not started");
      deliver(event);
    }
  }

  resize(cols: number, rows: number): void {
    this.cols = cols;
    this.rows = rows;
    this.onResize?.();
  }

  /** All output so far as one string. */
  output(): string {
    return this.writes.join("");
  }

  clearWrites(): void {
    this.writes.length = 0;
  }
}

export function createFakeTerminal<TKey>(opts: FakeTerminalOptions = {}): FakeTerminal<TKey> {
  return new FakeTerminal<TKey>(opts);
}
