/**
 * @cellframe/node
 *
 * Node.js host for @cellframe/core: a TerminalHost over stdin/stdout, key
 * decoding for raw-mode input, and app entry points.
 */

export { type NodeAppOptions, createNodeApp, runApp } from "./app.js";
export { decodeKeys, decodeModifierParam } from "./keyDecoder.js";
export {
  BRACKETED_PASTE_OFF,
  BRACKETED_PASTE_ON,
  FALLBACK_SIZE,
  type NodeTerminalOptions,
  type TerminalInput,
  type TerminalOutput,
  createNodeTerminal,
} from "./terminal.js";
