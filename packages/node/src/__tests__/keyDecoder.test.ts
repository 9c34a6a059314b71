import { charKeyEvent, namedKeyEvent, pasteKeyEvent } from "@cellframe/core";
import { assert, describe, test } from "@cellframe/testkit";
import { decodeKeys, decodeModifierParam } from "../keyDecoder.js";

function keys(input: string | readonly number[]) {
  return decodeKeys(typeof input === "string" ? Buffer.from(input, "utf8") : Uint8Array.from(input));
}

describe("decodeKeys - single bytes", () => {
  test("control bytes", () => {
    assert.deepEqual(keys([0x03]), [charKeyEvent("c", { ctrl: true })]);
    assert.deepEqual(keys([0x0d, 0x0a]), [namedKeyEvent("enter"), namedKeyEvent("enter")]);
    assert.deepEqual(keys([0x09]), [namedKeyEvent("tab")]);
    assert.deepEqual(keys([0x7f, 0x08]), [namedKeyEvent("backspace"), namedKeyEvent("backspace")]);
  });

  test("printable characters and space", () => {
    assert.deepEqual(keys("a B"), [charKeyEvent("a"), namedKeyEvent("space"), charKeyEvent("B")]);
  });

  test("multi-byte UTF-8 characters", () => {
    assert.deepEqual(keys("é中"), [charKeyEvent("é"), charKeyEvent("中")]);
  });

  test("truncated UTF-8 is dropped", () => {
    assert.deepEqual(keys([0xe4, 0xb8]), []);
  });
});

describe("decodeKeys - escape sequences", () => {
  test("a lone escape, and two in a row", () => {
    assert.deepEqual(keys("\u001b"), [namedKeyEvent("escape")]);
    assert.deepEqual(keys("\u001b\u001b"), [namedKeyEvent("escape"), namedKeyEvent("escape")]);
  });

  test("escape followed by a key is alt", () => {
    assert.deepEqual(keys("\u001bx"), [charKeyEvent("x", { alt: true })]);
  });

  test("CSI arrows with modifier params", () => {
    assert.deepEqual(keys("\u001b[A\u001b[1;5C"), [namedKeyEvent("up"), namedKeyEvent("right", { ctrl: true })]);
  });

  test("CSI tilde keys", () => {
    assert.deepEqual(keys("\u001b[3~\u001b[15~\u001b[5;2~"), [
      namedKeyEvent("delete"),
      namedKeyEvent("f5"),
      namedKeyEvent("pageUp", { shift: true }),
    ]);
  });

  test("CSI Z is shift+tab", () => {
    assert.deepEqual(keys("\u001b[Z"), [namedKeyEvent("tab", { shift: true })]);
  });

  test("SS3 function keys", () => {
    assert.deepEqual(keys("\u001bOP\u001bOS"), [namedKeyEvent("f1"), namedKeyEvent("f4")]);
  });

  test("unknown sequences are dropped", () => {
    assert.deepEqual(keys("\u001b[99~a"), [charKeyEvent("a")]);
  });

  test("an incomplete CSI reads as escape", () => {
    assert.deepEqual(keys("\u001b[1;"), [namedKeyEvent("escape")]);
  });

  test("bracketed paste yields one paste event", () => {
    assert.deepEqual(keys("\u001b[200~hi é\u001b[201~x"), [pasteKeyEvent("hi é"), charKeyEvent("x")]);
  });
});

describe("decodeModifierParam", () => {
  test("xterm bit set", () => {
    assert.deepEqual(decodeModifierParam(2), { shift: true, alt: false, ctrl: false });
    assert.deepEqual(decodeModifierParam(8), { shift: true, alt: true, ctrl: true });
    assert.deepEqual(decodeModifierParam(Number.NaN), { shift: false, alt: false, ctrl: false });
  });
});
