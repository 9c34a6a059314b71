/**
 * packages/core/src/runtime/walker.ts — Render tree walker.
 *
 * Why: Turns a view tree into one Styled Buffer. Composites are expanded
 * until a primitive draws; each step appends the view's name to the
 * identity so state and focus ids stay stable across frames.
 *
 * Contract violations (a value that is not a view, a body that does not
 * yield exactly one view, a render that does not return a buffer) throw
 * CF_CONTRACT_VIOLATION and are never recovered from.
 */

import type { StyledBuffer } from "../buffer/styledBuffer.js";
import { contractViolation } from "../errors.js";
import type { Size } from "../layout/types.js";
import type { RenderContext } from "./renderContext.js";
import { type View, isView } from "./view.js";

function isStyledBuffer(value: unknown): value is StyledBuffer {
  if (typeof value !== "object" || value === null) return false;
  if (!("lines" in value) || !("width" in value) || !("height" in value)) return false;
  return Array.isArray(value.lines) && typeof value.width === "number" && typeof value.height === "number";
}

function describe(value: unknown): string {
  if (value === null) return "null";
  if (Array.isArray(value)) return `array(${String(value.length)})`;
  return typeof value;
}

export function renderView(view: View, ctx: RenderContext): StyledBuffer {
  let current: unknown = view;
  let scope = ctx;

  for (;;) {
    if (!isView(current)) {
      return contractViolation(`${scope.identity}: expected a view, got ${describe(current)}`);
    }
    scope = scope.withChild(current.name);
    if (current.kind === "primitive") {
      const out: unknown = current.render(scope);
      if (!isStyledBuffer(out)) {
        return contractViolation(`${scope.identity}: render returned ${describe(out)}, not a buffer`);
      }
      return out;
    }
    const body: unknown = current.body(scope);
    if (!isView(body)) {
      return contractViolation(`${scope.identity}: body must yield exactly one view, got ${describe(body)}`);
    }
    current = body;
  }
}

/** Size `view` would take in `ctx`, without registering anything. */
export function measureView(view: View, ctx: RenderContext): Size {
  const buffer = renderView(view, ctx.asMeasuring());
  return { width: buffer.width, height: buffer.height };
}
