/**
 * packages/core/src/widgets/stacks.ts — vstack, hstack, zstack and spacer views.
 *
 * Why: Stacks render their children in order (so focus and key registrations
 * follow reading order) and then lay the buffers out. Child identities carry
 * the child's index: `root/vstack.0/text`.
 */

import { type StyledBuffer, EMPTY_BUFFER, blankBuffer } from "../buffer/styledBuffer.js";
import { composite } from "../buffer/compositor.js";
import { requireNonNegativeInt } from "../errors.js";
import { alignedOrigin } from "../layout/frame.js";
import { type StackEntry, layoutHorizontal, layoutVertical } from "../layout/stack.js";
import {
  type Alignment,
  type HorizontalAlignment,
  type VerticalAlignment,
  alignment as alignments,
} from "../layout/types.js";
import type { RenderContext } from "../runtime/renderContext.js";
import { type View, primitive } from "../runtime/view.js";
import { renderView } from "../runtime/walker.js";

const spacerLengths = new WeakMap<View, number>();

/** Flexible empty space along the enclosing stack's axis. Outside a stack it renders nothing. */
export function spacer(minLength = 0): View {
  const min = requireNonNegativeInt("spacer.minLength", minLength);
  const view = primitive("spacer", () => EMPTY_BUFFER);
  spacerLengths.set(view, min);
  return view;
}

export type VStackOptions = Readonly<{ spacing?: number; alignment?: HorizontalAlignment }>;
export type HStackOptions = Readonly<{ spacing?: number; alignment?: VerticalAlignment }>;
export type ZStackOptions = Readonly<{ alignment?: Alignment }>;

export function vstack(items: readonly View[], options: VStackOptions = {}): View {
  const spacing = requireNonNegativeInt("vstack.spacing", options.spacing ?? 0);
  const horizontal = options.alignment ?? "leading";
  const list = Object.freeze(items.slice());

  return primitive("vstack", (ctx) => {
    const entries: StackEntry[] = [];
    let used = 0;
    list.forEach((child, i) => {
      const min = spacerLengths.get(child);
      if (min !== undefined) {
        entries.push({ kind: "spacer", minLength: min });
        return;
      }
      const remaining = Math.max(0, ctx.availableHeight - used);
      const buffer = renderView(child, ctx.withIndex(i).withSize(ctx.availableWidth, remaining));
      entries.push({ kind: "content", buffer });
      if (buffer.height > 0) used += buffer.height + spacing;
    });
    return layoutVertical(entries, ctx.availableHeight, spacing, horizontal);
  });
}

export function hstack(items: readonly View[], options: HStackOptions = {}): View {
  const spacing = requireNonNegativeInt("hstack.spacing", options.spacing ?? 0);
  const vertical = options.alignment ?? "center";
  const list = Object.freeze(items.slice());

  return primitive("hstack", (ctx) => {
    const entries: StackEntry[] = [];
    let used = 0;
    list.forEach((child, i) => {
      const min = spacerLengths.get(child);
      if (min !== undefined) {
        entries.push({ kind: "spacer", minLength: min });
        return;
      }
      const remaining = Math.max(0, ctx.availableWidth - used);
      const buffer = renderView(child, ctx.withIndex(i).withSize(remaining, ctx.availableHeight));
      entries.push({ kind: "content", buffer });
      if (buffer.height > 0) used += buffer.width + spacing;
    });
    return layoutHorizontal(entries, ctx.availableWidth, spacing, vertical);
  });
}

function renderLayers(list: readonly View[], ctx: RenderContext, align: Alignment): StyledBuffer {
  const layers = list.map((child, i) => renderView(child, ctx.withIndex(i)));
  let width = 0;
  let height = 0;
  for (const layer of layers) {
    width = Math.max(width, layer.width);
    height = Math.max(height, layer.height);
  }
  let out = blankBuffer(width, height);
  for (const layer of layers) {
    const origin = alignedOrigin(align, out, layer);
    out = composite(out, layer, origin.x, origin.y);
  }
  return out;
}

/** Children drawn over each other, later ones on top. */
export function zstack(items: readonly View[], options: ZStackOptions = {}): View {
  const align = options.alignment ?? alignments.center;
  const list = Object.freeze(items.slice());
  return primitive("zstack", (ctx) => renderLayers(list, ctx, align));
}
