import { assert, describe, test } from "@cellframe/testkit";
import { DEFAULT_CONFIG, resolveAppConfig } from "../config.js";
import { NOOP_DEV_WARNINGS, createDevWarnings } from "../devWarnings.js";

describe("resolveAppConfig", () => {
  test("missing config resolves to the defaults", () => {
    assert.equal(resolveAppConfig(undefined), DEFAULT_CONFIG);
    assert.deepEqual(resolveAppConfig({}), DEFAULT_CONFIG);
  });

  test("given fields override the defaults", () => {
    const config = resolveAppConfig({ devMode: true, quitKeys: ["q"], defaultBorderStyle: "rounded" });
    assert.equal(config.devMode, true);
    assert.deepEqual(config.quitKeys, ["q"]);
    assert.equal(config.defaultBorderStyle, "rounded");
    assert.equal(config.pollIntervalMs, DEFAULT_CONFIG.pollIntervalMs);
  });

  test("invalid fields throw CF_INVALID_PROPS naming the field", () => {
    assert.throws(() => resolveAppConfig({ pollIntervalMs: 0 }), {
      code: "CF_INVALID_PROPS",
      message: "pollIntervalMs must be a positive integer",
    });
    assert.throws(() => resolveAppConfig({ fullRedrawEveryFrames: -1 }), {
      code: "CF_INVALID_PROPS",
      message: "fullRedrawEveryFrames must be a non-negative integer",
    });
    assert.throws(() => resolveAppConfig({ quitKeys: ["ctrl+"] }), { code: "CF_INVALID_PROPS" });
  });
});

describe("createDevWarnings", () => {
  test("prefixes the topic and reports each key once", () => {
    const seen: string[] = [];
    const warn = createDevWarnings({ devMode: true, warn: (m) => seen.push(m) });
    warn("focus", "dup", "first");
    warn("focus", "dup", "again");
    warn("layout", "dup", "other topic");
    assert.deepEqual(seen, ["[cellframe][focus] first", "[cellframe][layout] other topic"]);
  });

  test("outside devMode nothing is reported", () => {
    assert.equal(createDevWarnings({ devMode: false, warn: () => assert.fail("warned") }), NOOP_DEV_WARNINGS);
  });
});
