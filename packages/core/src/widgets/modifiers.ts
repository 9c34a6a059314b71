/**
 * packages/core/src/widgets/modifiers.ts — Single-child view modifiers.
 *
 * Why: Padding, framing, environment overrides, focus sections, key handlers
 * and change observers all wrap exactly one child and adjust the context it
 * renders in (or the buffer it returns).
 */

import { EMPTY_BUFFER } from "../buffer/styledBuffer.js";
import { requireKeyPattern, matchesKeyPattern } from "../keybindings/parser.js";
import type { KeyEvent } from "../keybindings/types.js";
import { alignBuffer, frameContentSpace, resolveFrameSize } from "../layout/frame.js";
import { padBuffer } from "../layout/padding.js";
import {
  type Alignment,
  type EdgeInsets,
  type FrameConstraint,
  alignment as alignments,
  frameConstraint,
  insets as edgeInsets,
} from "../layout/types.js";
import { getBorderStyle, type BorderStyleId } from "../renderer/borderStyle.js";
import { invalidProps, requireNonNegativeInt } from "../errors.js";
import { type EnvironmentKey, borderStyleKey, foregroundStyleKey, themeKey } from "../runtime/environment.js";
import { type View, primitive } from "../runtime/view.js";
import { renderView } from "../runtime/walker.js";
import type { Theme } from "../theme/types.js";
import { type TextStyle, mergeTextStyle } from "./style.js";

/* ---------- Layout ---------- */

/** `amount` as a number pads every side. */
export function padding(amount: number | EdgeInsets, child: View): View {
  const sides = typeof amount === "number" ? edgeInsets.all(amount) : edgeInsets.of(amount);
  return primitive("padding", (ctx) => {
    const inner = ctx.withSize(
      ctx.availableWidth - sides.leading - sides.trailing,
      ctx.availableHeight - sides.top - sides.bottom,
    );
    return padBuffer(renderView(child, inner), sides);
  });
}

/** Per axis: a number is a fixed size, "fill" takes all available room, omitted hugs the content. */
export type FrameDimension = number | "fill";

export type FrameProps = Readonly<{
  width?: FrameDimension;
  height?: FrameDimension;
  minWidth?: number;
  minHeight?: number;
  /** Default center. */
  alignment?: Alignment;
}>;

function toConstraint(name: string, value: FrameDimension | undefined): FrameConstraint {
  if (value === undefined) return frameConstraint.unconstrained;
  if (value === "fill") return frameConstraint.fill;
  if (!Number.isInteger(value) || value < 0) invalidProps(`frame.${name} must be a non-negative integer or "fill"`);
  return frameConstraint.fixed(value);
}

export function frame(props: FrameProps, child: View): View {
  const sizing = Object.freeze({
    width: toConstraint("width", props.width),
    height: toConstraint("height", props.height),
    minWidth: requireNonNegativeInt("frame.minWidth", props.minWidth ?? 0),
    minHeight: requireNonNegativeInt("frame.minHeight", props.minHeight ?? 0),
  });
  const align = props.alignment ?? alignments.center;

  return primitive("frame", (ctx) => {
    const contentCtx = ctx.withSize(
      frameContentSpace(sizing.width, ctx.availableWidth),
      frameContentSpace(sizing.height, ctx.availableHeight),
    );
    const content = renderView(child, contentCtx);
    const size = resolveFrameSize(sizing, ctx.availableSize, content);
    if (sizing.width.kind === "fixed" && content.width > size.width) {
      ctx.warn(
        "layout",
        `frameOverflow:${ctx.identity}`,
        `${ctx.identity} content is ${String(content.width)} columns wide but the frame allows ${String(size.width)}; it is clipped.`,
      );
    }
    return alignBuffer(content, size.width, size.height, align);
  });
}

/* ---------- Environment ---------- */

export function environment<T>(key: EnvironmentKey<T>, value: T, child: View): View {
  return primitive("environment", (ctx) => renderView(child, ctx.withValue(key, value)));
}

/** Merge `style` over the inherited foreground style. */
export function foregroundStyle(style: TextStyle, child: View): View {
  return primitive("foregroundStyle", (ctx) =>
    renderView(child, ctx.withValue(foregroundStyleKey, mergeTextStyle(ctx.get(foregroundStyleKey), style))),
  );
}

export function borderStyle(id: BorderStyleId, child: View): View {
  return environment(borderStyleKey, getBorderStyle(id), child);
}

export function theme(value: Theme, child: View): View {
  return environment(themeKey, value, child);
}

/* ---------- Structure ---------- */

/**
 * Render one of two subtrees. Each arm gets its own identity branch
 * (`#then` / `#else`), so switching arms never hands state across.
 */
export function branch(condition: boolean, whenTrue: View, whenFalse?: View): View {
  return primitive("branch", (ctx) => {
    if (condition) return renderView(whenTrue, ctx.withBranch("then"));
    if (whenFalse === undefined) return EMPTY_BUFFER;
    return renderView(whenFalse, ctx.withBranch("else"));
  });
}

/** Focusables inside `child` join section `id`. */
export function focusSection(id: string, child: View): View {
  if (id.length === 0) invalidProps("focusSection id must not be empty");
  return primitive("focusSection", (ctx) => {
    const scoped = ctx.withSection(id);
    scoped.registerSection();
    return renderView(child, scoped);
  });
}

/* ---------- Events ---------- */

/** Return false to let the event continue to earlier handlers. */
export type KeyPressAction = (event: KeyEvent) => boolean | void;

/**
 * Run `action` for key events matching any of `patterns` ("ctrl+s", "q").
 * Patterns are parsed when the view is built; invalid ones throw CF_INVALID_KEY.
 */
export function onKeyPress(patterns: string | readonly string[], action: KeyPressAction, child: View): View {
  const parsed = (typeof patterns === "string" ? [patterns] : patterns).map(requireKeyPattern);
  return primitive("onKeyPress", (ctx) => {
    ctx.addKeyHandler((event) => {
      if (!parsed.some((pattern) => matchesKeyPattern(pattern, event))) return false;
      return action(event) !== false;
    });
    return renderView(child, ctx);
  });
}

export type OnChangeOptions = Readonly<{
  /** Also run on the first frame the view appears. Default false. */
  initial?: boolean;
}>;

/** Run `action` during the frame in which `value` differs from the previous frame's. */
export function onChange<T>(
  value: T,
  action: (value: T, previous: T | undefined) => void,
  child: View,
  options: OnChangeOptions = {},
): View {
  return primitive("onChange", (ctx) => {
    const tracked = ctx.track("value", value);
    if (!ctx.measuring && (tracked.changed || (tracked.first && options.initial === true))) {
      action(value, tracked.previous);
    }
    return renderView(child, ctx);
  });
}
