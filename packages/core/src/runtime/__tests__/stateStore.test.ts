import { assert, describe, test } from "@cellframe/testkit";
import { StateStore } from "../stateStore.js";

describe("StateStore cells", () => {
  test("a cell keeps its value across frames while it is read", () => {
    const store = new StateStore();
    store.beginFrame();
    store.cell("root/counter", "count", 0).set(5);
    store.endFrame();

    store.beginFrame();
    assert.equal(store.cell("root/counter", "count", 0).get(), 5);
    store.endFrame();
  });

  test("set accepts an updater and notifies only on change", () => {
    let changes = 0;
    const store = new StateStore({ onChange: () => changes++ });
    store.beginFrame();
    const cell = store.cell("root/x", "n", 1);
    cell.set((n) => n + 1);
    cell.set(2);
    assert.equal(cell.get(), 2);
    assert.equal(changes, 1);
  });

  test("cells not read during a frame are dropped", () => {
    const store = new StateStore();
    store.beginFrame();
    store.cell("root/a", "v", 1).set(7);
    store.cell("root/b", "v", 1);
    store.endFrame();

    store.beginFrame();
    store.cell("root/b", "v", 1);
    store.endFrame();
    assert.equal(store.has("root/a", "v"), false);
    assert.equal(store.has("root/b", "v"), true);
    assert.equal(store.size, 1);

    store.beginFrame();
    assert.equal(store.cell("root/a", "v", 1).get(), 1);
  });

  test("identities and slots are independent", () => {
    const store = new StateStore();
    store.beginFrame();
    store.cell("root/a", "x", 0).set(1);
    store.cell("root/a", "y", 0).set(2);
    store.cell("root/b", "x", 0).set(3);
    assert.equal(store.cell("root/a", "x", 0).get(), 1);
    assert.equal(store.cell("root/a", "y", 0).get(), 2);
    assert.equal(store.cell("root/b", "x", 0).get(), 3);
  });

  test("measuring neither creates nor keeps cells", () => {
    const store = new StateStore();
    store.beginFrame();
    const detached = store.cell("root/m", "v", 1, true);
    detached.set(9);
    assert.equal(detached.get(), 9);
    assert.equal(store.has("root/m", "v"), false);

    store.cell("root/kept", "v", 1);
    store.endFrame();
    store.beginFrame();
    assert.equal(store.cell("root/kept", "v", 1, true).get(), 1);
    store.endFrame();
    assert.equal(store.has("root/kept", "v"), false);
  });
});

describe("StateStore.track", () => {
  test("reports changes against the previous frame", () => {
    const store = new StateStore();
    store.beginFrame();
    assert.deepEqual(store.track("root/o", "value", "a"), { changed: false, first: true, previous: undefined });
    store.endFrame();

    store.beginFrame();
    assert.deepEqual(store.track("root/o", "value", "b"), { changed: true, first: false, previous: "a" });
    store.endFrame();

    store.beginFrame();
    assert.deepEqual(store.track("root/o", "value", "b"), { changed: false, first: false, previous: "b" });
    store.endFrame();
  });

  test("repeated calls in one frame compare with the same previous value", () => {
    const store = new StateStore();
    store.beginFrame();
    store.track("root/o", "value", 1);
    store.endFrame();

    store.beginFrame();
    assert.equal(store.track("root/o", "value", 2).changed, true);
    assert.equal(store.track("root/o", "value", 2).changed, true);
    assert.equal(store.track("root/o", "value", 2).previous, 1);
  });

  test("a slot that skips a frame starts over", () => {
    const store = new StateStore();
    store.beginFrame();
    store.track("root/o", "value", 1);
    store.endFrame();
    store.beginFrame();
    store.endFrame();

    store.beginFrame();
    assert.equal(store.track("root/o", "value", 2).first, true);
  });
});
