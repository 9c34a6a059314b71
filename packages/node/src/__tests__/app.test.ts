import { EventEmitter } from "node:events";
import { SHOW_CURSOR, ui } from "@cellframe/core";
import { assert, describe, test } from "@cellframe/testkit";
import { createNodeApp, runApp } from "../app.js";
import { FakeInput, FakeOutput } from "./streams.js";

function tick(): Promise<void> {
  return new Promise<void>((resolve) => setImmediate(resolve));
}

function fixture() {
  const stdin = new FakeInput();
  const stdout = new FakeOutput(12, 3);
  const app = createNodeApp({ view: ui.text("hello"), terminal: { stdin, stdout } });
  return { stdin, stdout, app };
}

describe("createNodeApp", () => {
  test("draws into the given stdout and quits on ctrl+c", async () => {
    const { stdin, stdout, app } = fixture();
    const done = app.run();
    await tick();
    assert.equal(stdout.writes.some((w) => w.includes("hello")), true);

    stdin.emit("data", Buffer.from([0x03]));
    await done;
    assert.equal(app.isRunning, false);
    assert.equal(stdout.writes.at(-1)?.includes(SHOW_CURSOR), true);
    assert.deepEqual(stdin.rawModes, [true, false]);
  });
});

describe("runApp", () => {
  test("SIGTERM stops the app and the listener is removed", async () => {
    const { app } = fixture();
    const signals = new EventEmitter();
    const done = runApp(app, signals);
    await tick();
    assert.equal(signals.listenerCount("SIGTERM"), 1);
    signals.emit("SIGTERM");
    await done;
    assert.equal(app.isRunning, false);
    assert.equal(signals.listenerCount("SIGTERM"), 0);
  });

  test("a normal quit also removes the signal listener", async () => {
    const { stdin, app } = fixture();
    const signals = new EventEmitter();
    const done = runApp(app, signals);
    await tick();
    stdin.emit("data", "\u0003");
    await done;
    assert.equal(signals.listenerCount("SIGTERM"), 0);
  });
});
