/**
 * packages/core/src/app/frameDiff.ts — Line-level frame diffing.
 *
 * Why: Rewriting the whole screen every frame flickers on slow terminals.
 * The writer remembers the last frame and emits only the rows that changed:
 * cursor position, the row's bytes, erase to end of line.
 *
 * A change of size, or `invalidate()`, forces a full repaint.
 */

import { CLEAR_SCREEN, CURSOR_HOME, ERASE_TO_LINE_END, moveCursor } from "../renderer/ansi.js";

export type FrameDiff = Readonly<{
  output: string;
  changedLines: number;
}>;

export class FrameDiffWriter {
  private previous: readonly string[] | null = null;
  private cols = -1;

  invalidate(): void {
    this.previous = null;
  }

  /** Bytes that turn the previous frame into `lines` on a cols-wide screen. */
  diff(lines: readonly string[], cols: number): FrameDiff {
    const full = this.previous === null || cols !== this.cols || this.previous.length !== lines.length;
    const previous = full ? [] : this.previous ?? [];
    let output = full ? CURSOR_HOME + CLEAR_SCREEN : "";
    let changedLines = 0;

    lines.forEach((line, row) => {
      if (!full && previous[row] === line) return;
      output += moveCursor(row + 1, 1) + line + ERASE_TO_LINE_END;
      changedLines++;
    });

    this.previous = Object.freeze(lines.slice());
    this.cols = cols;
    return { output, changedLines };
  }
}
