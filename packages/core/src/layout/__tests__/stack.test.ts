import { assert, describe, test } from "@cellframe/testkit";
import { EMPTY_BUFFER, textBuffer } from "../../buffer/styledBuffer.js";
import { type StackEntry, layoutHorizontal, layoutVertical } from "../stack.js";

function content(text: string): StackEntry {
  return { kind: "content", buffer: textBuffer(text) };
}

function spacer(minLength = 0): StackEntry {
  return { kind: "spacer", minLength };
}

describe("layoutVertical", () => {
  test("spacers take the leftover rows", () => {
    const out = layoutVertical([content("ab"), spacer(), content("c")], 5, 0, "leading");
    assert.deepEqual(out.lines, ["ab", "  ", "  ", "  ", "c "]);
  });

  test("cross-axis alignment inside the widest child", () => {
    const out = layoutVertical([content("abcd"), content("x")], 10, 0, "trailing");
    assert.deepEqual(out.lines, ["abcd", "   x"]);
  });

  test("spacing separates visible children only", () => {
    const out = layoutVertical([{ kind: "content", buffer: EMPTY_BUFFER }, content("x"), content("y")], 10, 1, "leading");
    assert.deepEqual(out.lines, ["x", " ", "y"]);
  });

  test("spacers keep their minimum when there is no room", () => {
    const out = layoutVertical([content("a"), spacer(1), content("b")], 1, 0, "leading");
    assert.deepEqual(out.lines, ["a", " ", "b"]);
  });

  test("nothing visible is the empty buffer", () => {
    assert.equal(layoutVertical([], 10, 0, "leading"), EMPTY_BUFFER);
  });
});

describe("layoutHorizontal", () => {
  test("spacers push items apart", () => {
    const out = layoutHorizontal([content("a"), spacer(), content("b")], 5, 0, "center");
    assert.deepEqual(out.lines, ["a   b"]);
  });

  test("shorter columns are aligned vertically", () => {
    const out = layoutHorizontal([content("a\nb\nc"), content("x")], 10, 1, "center");
    assert.deepEqual(out.lines, ["a  ", "b x", "c  "]);
  });

  test("columns are padded to their width", () => {
    const out = layoutHorizontal([content("ab\nc"), content("x")], 10, 0, "top");
    assert.deepEqual(out.lines, ["abx", "c  "]);
  });
});
