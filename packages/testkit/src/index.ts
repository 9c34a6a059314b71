export { assertBytesEqual, hexdump } from "./golden.js";
export { FakeTerminal, type FakeTerminalOptions, createFakeTerminal } from "./fakeTerminal.js";
export { assert, describe, test } from "./nodeTest.js";
