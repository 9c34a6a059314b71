import { assert, describe, test } from "@cellframe/testkit";
import { CLEAR_SCREEN, CURSOR_HOME, ERASE_TO_LINE_END, moveCursor } from "../../renderer/ansi.js";
import { FrameDiffWriter } from "../frameDiff.js";

const FULL = CURSOR_HOME + CLEAR_SCREEN;

function row(n: number, line: string): string {
  return moveCursor(n, 1) + line + ERASE_TO_LINE_END;
}

describe("FrameDiffWriter", () => {
  test("the first frame repaints everything", () => {
    const writer = new FrameDiffWriter();
    assert.deepEqual(writer.diff(["ab", "cd"], 2), { output: FULL + row(1, "ab") + row(2, "cd"), changedLines: 2 });
  });

  test("later frames write only changed rows", () => {
    const writer = new FrameDiffWriter();
    writer.diff(["ab", "cd"], 2);
    assert.deepEqual(writer.diff(["ab", "xy"], 2), { output: row(2, "xy"), changedLines: 1 });
    assert.deepEqual(writer.diff(["ab", "xy"], 2), { output: "", changedLines: 0 });
  });

  test("a size change or invalidate forces a full repaint", () => {
    const writer = new FrameDiffWriter();
    writer.diff(["ab"], 2);
    assert.equal(writer.diff(["ab"], 3).output, FULL + row(1, "ab"));
    assert.equal(writer.diff(["ab", "cd"], 3).output, FULL + row(1, "ab") + row(2, "cd"));
    writer.invalidate();
    assert.equal(writer.diff(["ab", "cd"], 3).changedLines, 2);
  });
});
