/**
 * packages/core/src/runtime/view.ts — The View union.
 *
 * Why: A view is either a primitive, which draws itself into a Styled Buffer,
 * or a composite, whose body evaluates to exactly one other view. The walker
 * only ever sees these two shapes.
 */

import type { StyledBuffer } from "../buffer/styledBuffer.js";
import type { RenderContext } from "./renderContext.js";

export type PrimitiveView = Readonly<{
  kind: "primitive";
  name: string;
  render: (ctx: RenderContext) => StyledBuffer;
}>;

export type CompositeView = Readonly<{
  kind: "composite";
  name: string;
  body: (ctx: RenderContext) => View;
}>;

export type View = PrimitiveView | CompositeView;

export function primitive(name: string, render: (ctx: RenderContext) => StyledBuffer): PrimitiveView {
  return Object.freeze({ kind: "primitive", name, render });
}

export function composite(name: string, body: (ctx: RenderContext) => View): CompositeView {
  return Object.freeze({ kind: "composite", name, body });
}

function isObject(value: unknown): value is Readonly<Record<string, unknown>> {
  return typeof value === "object" && value !== null;
}

export function isView(value: unknown): value is View {
  if (!isObject(value) || typeof value.name !== "string") return false;
  if (value.kind === "primitive") return typeof value.render === "function";
  if (value.kind === "composite") return typeof value.body === "function";
  return false;
}
