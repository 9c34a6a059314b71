import { assert, describe, test } from "@cellframe/testkit";
import { defaultTheme } from "../../theme/defaultTheme.js";
import { Environment, createEnvironmentKey, themeKey } from "../environment.js";
import { branchIdentity, childIdentity, indexedIdentity } from "../identity.js";

describe("Environment", () => {
  test("unbound keys read their default", () => {
    const env = Environment.empty();
    assert.equal(env.get(themeKey), defaultTheme);
    assert.equal(env.has(themeKey), false);
  });

  test("the nearest layer wins", () => {
    const depth = createEnvironmentKey("depth", 0);
    const outer = Environment.empty().with(depth, 1);
    const inner = outer.with(depth, 2);
    assert.equal(outer.get(depth), 1);
    assert.equal(inner.get(depth), 2);
    assert.equal(inner.has(depth), true);
  });

  test("siblings do not see each other's values", () => {
    const label = createEnvironmentKey("label", "none");
    const parent = Environment.empty();
    const left = parent.with(label, "left");
    const right = parent.with(label, "right");
    assert.equal(left.get(label), "left");
    assert.equal(right.get(label), "right");
    assert.equal(parent.get(label), "none");
  });

  test("keys with the same name stay distinct", () => {
    const a = createEnvironmentKey("k", "a");
    const b = createEnvironmentKey("k", "b");
    const env = Environment.empty().with(a, "bound");
    assert.equal(env.get(a), "bound");
    assert.equal(env.get(b), "b");
  });
});

describe("identity", () => {
  test("paths compose from names, indices and branches", () => {
    const stack = childIdentity("root", "vstack");
    assert.equal(stack, "root/vstack");
    assert.equal(childIdentity(indexedIdentity(stack, 2), "text"), "root/vstack.2/text");
    assert.equal(branchIdentity("root/branch", "then"), "root/branch#then");
    assert.equal(childIdentity("root", "item", 3), "root/item.3");
  });
});
