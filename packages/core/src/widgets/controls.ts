/**
 * packages/core/src/widgets/controls.ts — Leaf views: text, button, status bar.
 */

import { visibleWidth } from "../buffer/ansiLine.js";
import { EMPTY_BUFFER, createBuffer } from "../buffer/styledBuffer.js";
import { invalidProps } from "../errors.js";
import { justifyLine } from "../layout/justify.js";
import { colorize } from "../renderer/ansi.js";
import { foregroundStyleKey, themeKey } from "../runtime/environment.js";
import { type View, primitive } from "../runtime/view.js";
import { type TextStyle, mergeTextStyle } from "./style.js";

/** One line per `\n`. `style` is merged over the inherited foreground style. */
export function text(content: string, style?: TextStyle): View {
  return primitive("text", (ctx) => {
    if (content.length === 0) return EMPTY_BUFFER;
    const effective = mergeTextStyle(ctx.get(foregroundStyleKey), style);
    return createBuffer(content.split("\n").map((line) => colorize(line, effective)));
  });
}

export type ButtonProps = Readonly<{
  /** Focus id; unique within its section. */
  id: string;
  label: string;
  onPress?: () => void;
  disabled?: boolean;
}>;

/**
 * `[ label ]`, registered as a focusable of the enclosing section.
 * Selected: accent and bold. Disabled: dimmed, and skipped by navigation.
 */
export function button(props: ButtonProps): View {
  if (props.id.length === 0) invalidProps("button id must not be empty");
  return primitive("button", (ctx) => {
    const disabled = props.disabled === true;
    ctx.registerFocusable({ id: props.id, enabled: !disabled, onActivate: props.onPress });
    const colors = ctx.get(themeKey).colors;
    const label = `[ ${props.label} ]`;
    let style: TextStyle;
    if (disabled) style = { fg: colors.dimmedForeground };
    else if (ctx.isFocused(props.id)) style = { fg: colors.accent, bold: true };
    else style = { fg: colors.fg };
    return createBuffer([colorize(label, style)]);
  });
}

export type StatusBarItem = Readonly<{
  /** Shortcut as shown, e.g. "q" or "^S". */
  key: string;
  label: string;
}>;

export type StatusBarOptions = Readonly<{
  /** Spread items across the available width. Default true. */
  justify?: boolean;
  /** Columns between items when not justified. Default 2. */
  spacing?: number;
}>;

export function statusBarItemText(item: StatusBarItem, accent: TextStyle, muted: TextStyle): string {
  return `${colorize(item.key, accent)} ${colorize(item.label, muted)}`;
}

/** One row of shortcut labels. */
export function statusBar(items: readonly StatusBarItem[], options: StatusBarOptions = {}): View {
  const list = Object.freeze(items.slice());
  return primitive("statusBar", (ctx) => {
    if (list.length === 0) return EMPTY_BUFFER;
    const colors = ctx.get(themeKey).colors;
    const segments = list.map((item) =>
      statusBarItemText(item, { fg: colors.accent, bold: true }, { fg: colors.muted }),
    );
    const line =
      options.justify === false
        ? segments.join(" ".repeat(Math.max(0, options.spacing ?? 2)))
        : justifyLine(segments, ctx.availableWidth);
    return visibleWidth(line) === 0 ? EMPTY_BUFFER : createBuffer([line]);
  });
}
