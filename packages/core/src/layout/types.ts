/**
 * packages/core/src/layout/types.ts — Layout value types.
 *
 * Why: Padding, framing and alignment are described with plain frozen
 * values. All sizes are in terminal cell units.
 */

import { requireNonNegativeInt } from "../errors.js";

/** Size dimensions (width and height) in terminal cells. */
export type Size = Readonly<{ width: number; height: number }>;

/** Four-sided insets. Every side is a non-negative integer. */
export type EdgeInsets = Readonly<{
  top: number;
  leading: number;
  bottom: number;
  trailing: number;
}>;

export type HorizontalAlignment = "leading" | "center" | "trailing";
export type VerticalAlignment = "top" | "center" | "bottom";

export type Alignment = Readonly<{
  horizontal: HorizontalAlignment;
  vertical: VerticalAlignment;
}>;

/** Per-axis size request of a frame. */
export type FrameConstraint =
  | Readonly<{ kind: "unconstrained" }>
  | Readonly<{ kind: "fixed"; value: number }>
  | Readonly<{ kind: "fill" }>;

function makeInsets(top: number, leading: number, bottom: number, trailing: number): EdgeInsets {
  return Object.freeze({
    top: requireNonNegativeInt("insets.top", top),
    leading: requireNonNegativeInt("insets.leading", leading),
    bottom: requireNonNegativeInt("insets.bottom", bottom),
    trailing: requireNonNegativeInt("insets.trailing", trailing),
  });
}

export const insets = Object.freeze({
  zero: Object.freeze({ top: 0, leading: 0, bottom: 0, trailing: 0 }) satisfies EdgeInsets,
  all(n: number): EdgeInsets {
    return makeInsets(n, n, n, n);
  },
  symmetric(horizontal: number, vertical: number): EdgeInsets {
    return makeInsets(vertical, horizontal, vertical, horizontal);
  },
  of(sides: Partial<EdgeInsets>): EdgeInsets {
    return makeInsets(sides.top ?? 0, sides.leading ?? 0, sides.bottom ?? 0, sides.trailing ?? 0);
  },
});

function align(horizontal: HorizontalAlignment, vertical: VerticalAlignment): Alignment {
  return Object.freeze({ horizontal, vertical });
}

export const alignment = Object.freeze({
  topLeading: align("leading", "top"),
  top: align("center", "top"),
  topTrailing: align("trailing", "top"),
  leading: align("leading", "center"),
  center: align("center", "center"),
  trailing: align("trailing", "center"),
  bottomLeading: align("leading", "bottom"),
  bottom: align("center", "bottom"),
  bottomTrailing: align("trailing", "bottom"),
});

export const frameConstraint = Object.freeze({
  unconstrained: Object.freeze({ kind: "unconstrained" }) satisfies FrameConstraint,
  fill: Object.freeze({ kind: "fill" }) satisfies FrameConstraint,
  fixed(value: number): FrameConstraint {
    return Object.freeze({ kind: "fixed", value: requireNonNegativeInt("frame.fixed", value) });
  },
});
