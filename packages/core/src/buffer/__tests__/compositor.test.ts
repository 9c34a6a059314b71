import { assert, describe, test } from "@cellframe/testkit";
import { stripAnsi } from "../ansiLine.js";
import { composite, dimBuffer, sliceVisible } from "../compositor.js";
import { createBuffer, textBuffer } from "../styledBuffer.js";

const BOLD = "\u001b[1m";
const RESET = "\u001b[0m";

describe("sliceVisible", () => {
  test("plain text slices by column", () => {
    assert.equal(sliceVisible("abcdef", 1, 3), "bc");
  });

  test("the slice opens with the style in effect and closes it", () => {
    assert.equal(sliceVisible(`${BOLD}abc${RESET}`, 1), `${BOLD}bc${RESET}`);
  });

  test("wide characters cut by either edge become spaces", () => {
    assert.equal(sliceVisible("日本", 1, 3), "  ");
  });
});

describe("composite", () => {
  test("rows outside the overlay are returned unchanged", () => {
    const base = createBuffer(["aaaa", "bbbb"]);
    const out = composite(base, textBuffer("XY"), 1, 1);
    assert.equal(out.lines[0], "aaaa");
    assert.equal(out.lines[1], `b${RESET}XY${RESET}b`);
    assert.equal(stripAnsi(out.lines[1] ?? ""), "bXYb");
  });

  test("keeps the base size and clips the overlay", () => {
    const base = createBuffer(["....", "...."]);
    const out = composite(base, createBuffer(["XYZ", "XYZ"]), 2, 1);
    assert.equal(out.width, 4);
    assert.equal(out.height, 2);
    assert.equal(stripAnsi(out.lines[1] ?? ""), "..XY");
  });

  test("overlays entirely outside the base return the base", () => {
    const base = createBuffer(["abc"]);
    assert.equal(composite(base, textBuffer("X"), 10, 0), base);
    assert.equal(composite(base, textBuffer("X"), 0, -1), base);
  });

  test("disjoint overlays give the same bytes in either order", () => {
    const base = createBuffer(["aaaa"]);
    const a = textBuffer("X");
    const b = textBuffer("Y");
    const first = composite(composite(base, a, 0, 0), b, 2, 0);
    const second = composite(composite(base, b, 2, 0), a, 0, 0);
    assert.equal(first.lines[0], second.lines[0]);
    assert.equal(stripAnsi(first.lines[0] ?? ""), "XaYa");
  });

  test("a styled base resumes its style after the overlay", () => {
    const base = createBuffer([`${BOLD}abcd${RESET}`]);
    const out = composite(base, textBuffer("X"), 1, 0);
    assert.equal(out.lines[0], `${BOLD}a${RESET}X${RESET}${BOLD}cd${RESET}`);
  });
});

describe("dimBuffer", () => {
  test("dims non-blank lines and leaves blank lines alone", () => {
    const out = dimBuffer(createBuffer(["ab", "  "]));
    assert.deepEqual(out.lines, [`\u001b[2mab${RESET}`, "  "]);
  });
});
