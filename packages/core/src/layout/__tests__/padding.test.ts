import { assert, describe, test } from "@cellframe/testkit";
import { EMPTY_BUFFER, textBuffer } from "../../buffer/styledBuffer.js";
import { padBuffer } from "../padding.js";
import { insets } from "../types.js";

describe("padBuffer", () => {
  test("adds insets around the content", () => {
    const out = padBuffer(textBuffer("ab"), insets.of({ top: 1, leading: 2 }));
    assert.deepEqual(out.lines, ["    ", "  ab"]);
    assert.equal(out.width, 4);
  });

  test("pads short rows to the buffer width first", () => {
    const out = padBuffer(textBuffer("abc\nd"), insets.symmetric(1, 0));
    assert.deepEqual(out.lines, [" abc ", " d   "]);
  });

  test("empty content becomes a blank block of the inset size", () => {
    assert.deepEqual(padBuffer(EMPTY_BUFFER, insets.all(1)).lines, ["  ", "  "]);
  });

  test("zero insets return the input", () => {
    const buffer = textBuffer("x");
    assert.equal(padBuffer(buffer, insets.zero), buffer);
  });

  test("insets reject negative and fractional sides", () => {
    assert.throws(() => insets.all(-1), { code: "CF_INVALID_PROPS" });
    assert.throws(() => insets.of({ top: 0.5 }), { code: "CF_INVALID_PROPS" });
  });
});
