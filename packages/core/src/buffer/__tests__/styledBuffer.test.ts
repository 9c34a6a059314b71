import { assert, describe, test } from "@cellframe/testkit";
import {
  EMPTY_BUFFER,
  appendHorizontally,
  appendVertically,
  blankBuffer,
  createBuffer,
  textBuffer,
} from "../styledBuffer.js";

describe("StyledBuffer", () => {
  test("width is the widest visible line", () => {
    const buffer = createBuffer(["\u001b[1mabc\u001b[0m", "de"]);
    assert.equal(buffer.width, 3);
    assert.equal(buffer.height, 2);
  });

  test("textBuffer splits on newlines; empty text is the empty buffer", () => {
    assert.equal(textBuffer(""), EMPTY_BUFFER);
    assert.deepEqual(textBuffer("ab\nc").lines, ["ab", "c"]);
  });

  test("buffers are frozen", () => {
    const buffer = textBuffer("x");
    assert.equal(Object.isFrozen(buffer), true);
    assert.equal(Object.isFrozen(buffer.lines), true);
  });

  test("blankBuffer fills with spaces", () => {
    assert.deepEqual(blankBuffer(3, 2).lines, ["   ", "   "]);
    assert.equal(blankBuffer(3, 0), EMPTY_BUFFER);
  });

  test("appendVertically inserts spacing rows between non-empty buffers", () => {
    assert.deepEqual(appendVertically(textBuffer("ab"), textBuffer("c"), 1).lines, ["ab", "", "c"]);
    assert.equal(appendVertically(EMPTY_BUFFER, textBuffer("c"), 3).height, 1);
  });

  test("appendHorizontally aligns the right buffer in one column", () => {
    const out = appendHorizontally(textBuffer("ab\nc"), textBuffer("X"), 1);
    assert.deepEqual(out.lines, ["ab X", "c  "]);
    assert.equal(out.width, 4);
  });
});
