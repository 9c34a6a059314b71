import { assert, describe, test } from "@cellframe/testkit";
import { EMPTY_BUFFER, textBuffer } from "../../buffer/styledBuffer.js";
import { KeyEventDispatcher } from "../../keybindings/dispatcher.js";
import { Environment } from "../environment.js";
import { FocusManager } from "../focus.js";
import { RenderContext } from "../renderContext.js";
import { StateStore } from "../stateStore.js";
import { type View, composite, isView, primitive } from "../view.js";
import { measureView, renderView } from "../walker.js";

function rootContext(width = 20, height = 5): RenderContext {
  return RenderContext.create({
    availableWidth: width,
    availableHeight: height,
    environment: Environment.empty(),
    focus: new FocusManager(),
    keys: new KeyEventDispatcher(),
    state: new StateStore(),
  });
}

function recorder(seen: string[]): View {
  return primitive("leaf", (ctx) => {
    seen.push(ctx.identity);
    return textBuffer("x");
  });
}

describe("renderView", () => {
  test("a primitive's identity is its parent's plus its name", () => {
    const seen: string[] = [];
    renderView(recorder(seen), rootContext());
    assert.deepEqual(seen, ["root/leaf"]);
  });

  test("composites expand until a primitive draws", () => {
    const seen: string[] = [];
    const card = composite("card", () => composite("inner", () => recorder(seen)));
    const out = renderView(card, rootContext());
    assert.deepEqual(seen, ["root/card/inner/leaf"]);
    assert.deepEqual(out.lines, ["x"]);
  });

  test("a body that yields no view is a contract violation", () => {
    // Stands in for an untyped caller.
    const body = (): View => JSON.parse("[]");
    assert.throws(() => renderView(composite("broken", body), rootContext()), {
      name: "CellframeError",
      code: "CF_CONTRACT_VIOLATION",
      message: "root/broken: body must yield exactly one view, got array(0)",
    });
  });

  test("a render that returns no buffer is a contract violation", () => {
    const render = (): typeof EMPTY_BUFFER => JSON.parse("null");
    assert.throws(() => renderView(primitive("bad", render), rootContext()), {
      code: "CF_CONTRACT_VIOLATION",
      message: "root/bad: render returned null, not a buffer",
    });
  });

  test("isView checks the shape", () => {
    assert.equal(isView(primitive("p", () => EMPTY_BUFFER)), true);
    assert.equal(isView({ kind: "primitive", name: "p" }), false);
    assert.equal(isView({ kind: "other", name: "p", render: () => EMPTY_BUFFER }), false);
    assert.equal(isView(null), false);
  });
});

describe("RenderContext", () => {
  test("copies clamp sizes and extend the identity", () => {
    const ctx = rootContext().withSize(-3, Number.NaN).withChild("list", 2).withBranch("then");
    assert.equal(ctx.availableWidth, 0);
    assert.equal(ctx.availableHeight, 0);
    assert.equal(ctx.identity, "root/list.2#then");
  });

  test("measuring skips registrations", () => {
    const ctx = rootContext();
    const measuring = ctx.asMeasuring();
    measuring.registerFocusable({ id: "a" });
    measuring.addKeyHandler(() => true);
    assert.equal(ctx.focus.hasSection("main"), false);
    assert.equal(ctx.keys.size, 0);

    ctx.registerFocusable({ id: "a" });
    assert.equal(ctx.focus.selectedId("main"), "a");
    assert.equal(ctx.isFocused("a"), true);
  });

  test("isolated contexts register into throwaway managers", () => {
    const ctx = rootContext();
    const inert = ctx.isolated();
    inert.registerFocusable({ id: "a" });
    inert.addKeyHandler(() => true);
    assert.equal(ctx.focus.hasSection("main"), false);
    assert.equal(ctx.keys.size, 0);
    assert.equal(inert.focus.activeSectionId, null);
  });

  test("measureView reports a size without side effects", () => {
    const ctx = rootContext();
    const view = primitive("b", (c) => {
      c.registerFocusable({ id: "b" });
      return textBuffer("abc\nd");
    });
    assert.deepEqual(measureView(view, ctx), { width: 3, height: 2 });
    assert.equal(ctx.focus.hasSection("main"), false);
  });
});
