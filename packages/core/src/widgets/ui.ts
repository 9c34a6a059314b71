/**
 * packages/core/src/widgets/ui.ts — View factory functions.
 *
 * Why: One import for building view trees. Each entry delegates to the module
 * that implements it; composites written by apps use `ui.composite`.
 *
 * @example
 * ```ts
 * const view = ui.vstack([
 *   ui.panel("Settings", ui.button({ id: "save", label: "Save", onPress: save })),
 *   ui.spacer(),
 *   ui.statusBar([{ key: "q", label: "quit" }]),
 * ]);
 * ```
 */

import { composite, primitive } from "../runtime/view.js";
import { children } from "./children.js";
import { border, container, panel } from "./container.js";
import { button, statusBar, text } from "./controls.js";
import { alert, modal } from "./modal.js";
import {
  borderStyle,
  branch,
  environment,
  focusSection,
  foregroundStyle,
  frame,
  onChange,
  onKeyPress,
  padding,
  theme,
} from "./modifiers.js";
import { hstack, spacer, vstack, zstack } from "./stacks.js";

export const ui = Object.freeze({
  primitive,
  composite,
  children,

  text,
  button,
  statusBar,

  vstack,
  hstack,
  zstack,
  spacer,

  padding,
  frame,
  environment,
  foregroundStyle,
  borderStyle,
  theme,
  branch,
  focusSection,
  onKeyPress,
  onChange,

  container,
  panel,
  border,

  modal,
  alert,
});
