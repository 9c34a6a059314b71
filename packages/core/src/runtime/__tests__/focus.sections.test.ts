import { assert, describe, test } from "@cellframe/testkit";
import { charKeyEvent, namedKeyEvent } from "../../keybindings/keyEvent.js";
import { FocusManager, computeMovedFocusId } from "../focus.js";

function managerWith(ids: readonly string[], section = "main"): FocusManager {
  const focus = new FocusManager();
  for (const id of ids) focus.registerFocusable(section, { id });
  return focus;
}

describe("computeMovedFocusId", () => {
  test("wraps in both directions", () => {
    assert.equal(computeMovedFocusId(["a", "b", "c"], "c", "next"), "a");
    assert.equal(computeMovedFocusId(["a", "b", "c"], "a", "prev"), "c");
  });

  test("no current focus starts at an end", () => {
    assert.equal(computeMovedFocusId(["a", "b"], null, "next"), "a");
    assert.equal(computeMovedFocusId(["a", "b"], null, "prev"), "b");
    assert.equal(computeMovedFocusId([], null, "next"), null);
  });
});

describe("FocusManager sections", () => {
  test("the first registered section becomes active and selects its first element", () => {
    const focus = managerWith(["a", "b"]);
    assert.equal(focus.activeSectionId, "main");
    assert.equal(focus.selectedId(), "a");
    assert.equal(focus.isSelected("a"), true);
  });

  test("later sections do not steal activation", () => {
    const focus = managerWith(["a"]);
    focus.registerFocusable("side", { id: "x" });
    assert.equal(focus.activeSectionId, "main");
    assert.equal(focus.selectedId("side"), "x");
    assert.equal(focus.isSelected("x"), false);
  });

  test("autoActivate false leaves every section inactive", () => {
    const focus = new FocusManager({ autoActivate: false });
    focus.registerFocusable("main", { id: "a" });
    assert.equal(focus.activeSectionId, null);
  });

  test("inactive sections keep their selection", () => {
    const focus = managerWith(["a", "b"]);
    focus.registerFocusable("side", { id: "x" });
    focus.next();
    focus.activateSection("side");
    focus.activateSection("main");
    assert.equal(focus.selectedId(), "b");
  });

  test("reset selection policy goes back to the first element", () => {
    const focus = managerWith(["a", "b"]);
    focus.next();
    focus.activateSection("main", { selection: "reset" });
    assert.equal(focus.selectedId(), "a");
  });

  test("unknown sections are ignored with a warning", () => {
    const warnings: string[] = [];
    const focus = new FocusManager({ warn: (m) => warnings.push(m) });
    assert.equal(focus.activateSection("nope"), false);
    assert.deepEqual(warnings, ['activateSection("nope") ignored: no such section']);
  });

  test("clearSection deactivates and forgets", () => {
    const focus = managerWith(["a"]);
    focus.clearSection("main");
    assert.equal(focus.activeSectionId, null);
    assert.equal(focus.hasSection("main"), false);
  });

  test("section cycling wraps", () => {
    const focus = managerWith(["a"]);
    focus.registerSection("side");
    assert.equal(focus.activateNextSection(), true);
    assert.equal(focus.activeSectionId, "side");
    assert.equal(focus.activateNextSection(), true);
    assert.equal(focus.activeSectionId, "main");
    assert.equal(focus.activatePreviousSection(), true);
    assert.equal(focus.activeSectionId, "side");
  });
});

describe("FocusManager navigation", () => {
  test("next and previous wrap and skip disabled elements", () => {
    const focus = new FocusManager();
    focus.registerFocusable("main", { id: "a" });
    focus.registerFocusable("main", { id: "b", enabled: false });
    focus.registerFocusable("main", { id: "c" });
    focus.next();
    assert.equal(focus.selectedId(), "c");
    focus.next();
    assert.equal(focus.selectedId(), "a");
    focus.previous();
    assert.equal(focus.selectedId(), "c");
  });

  test("a disabled first element is not auto-selected", () => {
    const focus = new FocusManager();
    focus.registerFocusable("main", { id: "a", enabled: false });
    focus.registerFocusable("main", { id: "b" });
    assert.equal(focus.selectedId(), "b");
  });

  test("keys map to moves and activation", () => {
    let pressed = 0;
    const focus = new FocusManager();
    focus.registerFocusable("main", { id: "a" });
    focus.registerFocusable("main", { id: "b", onActivate: () => pressed++ });

    assert.equal(focus.handleKey(namedKeyEvent("tab")), true);
    assert.equal(focus.selectedId(), "b");
    assert.equal(focus.handleKey(namedKeyEvent("enter")), true);
    assert.equal(focus.handleKey(namedKeyEvent("space")), true);
    assert.equal(pressed, 2);
    assert.equal(focus.handleKey(namedKeyEvent("tab", { shift: true })), true);
    assert.equal(focus.selectedId(), "a");
    assert.equal(focus.handleKey(namedKeyEvent("right")), true);
    assert.equal(focus.selectedId(), "b");
    assert.equal(focus.handleKey(namedKeyEvent("up")), true);
    assert.equal(focus.selectedId(), "a");
  });

  test("modified and character keys are not consumed", () => {
    const focus = managerWith(["a", "b"]);
    assert.equal(focus.handleKey(namedKeyEvent("tab", { ctrl: true })), false);
    assert.equal(focus.handleKey(charKeyEvent("j")), false);
    assert.equal(focus.selectedId(), "a");
  });

  test("nothing to move without an active section", () => {
    const focus = new FocusManager();
    assert.equal(focus.next(), false);
    assert.equal(focus.activate(), false);
  });

  test("onChange fires on selection changes", () => {
    let changes = 0;
    const focus = new FocusManager({ onChange: () => changes++ });
    focus.registerFocusable("main", { id: "a" });
    focus.registerFocusable("main", { id: "b" });
    const afterRegistration = changes;
    focus.next();
    assert.equal(changes, afterRegistration + 1);
  });
});

describe("FocusManager frames", () => {
  test("elements not registered again are pruned", () => {
    const focus = managerWith(["a", "b", "c"]);
    focus.beginFrame();
    focus.registerFocusable("main", { id: "a" });
    focus.registerFocusable("main", { id: "c" });
    focus.endFrame();
    assert.deepEqual(focus.elementIds("main"), ["a", "c"]);
  });

  test("a pruned selection moves to the next survivor", () => {
    const focus = managerWith(["a", "b", "c"]);
    focus.next();
    focus.beginFrame();
    focus.registerFocusable("main", { id: "a" });
    focus.registerFocusable("main", { id: "c" });
    focus.endFrame();
    assert.equal(focus.selectedId(), "c");
  });

  test("with no survivor after it, the selection moves back", () => {
    const focus = managerWith(["a", "b", "c"]);
    focus.next();
    focus.next();
    focus.beginFrame();
    focus.registerFocusable("main", { id: "a" });
    focus.endFrame();
    assert.equal(focus.selectedId(), "a");
  });

  test("a section without registrations is dropped and the first registered one takes over", () => {
    const hits: string[] = [];
    const focus = new FocusManager();
    focus.registerFocusable("a", { id: "a1", onActivate: () => hits.push("a1") });
    focus.beginFrame();
    focus.registerFocusable("b", { id: "b1", onActivate: () => hits.push("b1") });
    focus.registerSection("c");
    focus.endFrame();

    assert.equal(focus.activeSectionId, "b");
    assert.equal(focus.hasSection("a"), false);
    focus.activate();
    assert.deepEqual(hits, ["b1"]);
  });

  test("with nothing registered in a frame no section stays active", () => {
    const focus = managerWith(["a"]);
    focus.beginFrame();
    focus.endFrame();
    assert.equal(focus.activeSectionId, null);
    assert.deepEqual(focus.sectionIds(), []);
  });

  test("section cycling skips sections that no longer exist", () => {
    const focus = managerWith(["a"]);
    focus.registerSection("side");
    focus.registerSection("gone");
    focus.beginFrame();
    focus.registerFocusable("main", { id: "a" });
    focus.registerSection("side");
    focus.endFrame();

    assert.deepEqual(focus.sectionIds(), ["main", "side"]);
    focus.activateNextSection();
    assert.equal(focus.activeSectionId, "side");
    focus.activateNextSection();
    assert.equal(focus.activeSectionId, "main");
  });

  test("an id registered in two sections in one frame warns", () => {
    const warnings: string[] = [];
    const focus = new FocusManager({ warn: (m) => warnings.push(m) });
    focus.beginFrame();
    focus.registerFocusable("main", { id: "dup" });
    focus.registerFocusable("side", { id: "dup" });
    focus.endFrame();
    assert.deepEqual(warnings, ['focusable "dup" registered in sections "main" and "side" in one frame']);
  });
});

describe("FocusManager layers", () => {
  function withLayer(): FocusManager {
    const focus = managerWith(["a", "b"]);
    focus.next();
    focus.registerFocusable("modal", { id: "ok" });
    assert.equal(focus.pushSection("modal"), true);
    return focus;
  }

  test("pushing activates the layer; popping hands focus back with the selection kept", () => {
    const focus = withLayer();
    assert.equal(focus.activeSectionId, "modal");
    assert.equal(focus.isPushed("modal"), true);
    assert.equal(focus.popSection("modal"), true);
    assert.equal(focus.activeSectionId, "main");
    assert.equal(focus.selectedId(), "b");
    assert.equal(focus.hasSection("modal"), false);
  });

  test("suspended sections keep everything while untouched", () => {
    const focus = withLayer();
    focus.beginFrame();
    focus.registerFocusable("modal", { id: "ok" });
    focus.endFrame();
    assert.equal(focus.activeSectionId, "modal");
    assert.deepEqual(focus.elementIds("main"), ["a", "b"]);
    assert.equal(focus.selectedId("main"), "b");
  });

  test("a layer that misses a frame is popped", () => {
    const focus = withLayer();
    focus.beginFrame();
    focus.registerFocusable("main", { id: "a" });
    focus.registerFocusable("main", { id: "b" });
    focus.endFrame();
    assert.equal(focus.activeSectionId, "main");
    assert.equal(focus.selectedId(), "b");
    assert.equal(focus.isPushed("modal"), false);
    assert.equal(focus.hasSection("modal"), false);
  });

  test("unknown or already pushed sections are not pushed", () => {
    const focus = withLayer();
    assert.equal(focus.pushSection("modal"), false);
    assert.equal(focus.pushSection("nope"), false);
    assert.equal(focus.popSection("main"), false);
  });
});
