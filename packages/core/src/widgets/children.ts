/**
 * packages/core/src/widgets/children.ts — Child list builder.
 *
 * Why: Container factories take a plain array of views. The builder keeps
 * conditional children readable without `cond ? x : null` holes.
 */

import type { View } from "../runtime/view.js";

export class ChildListBuilder {
  private readonly items: View[] = [];

  add(child: View): this {
    this.items.push(child);
    return this;
  }

  addIf(condition: boolean, child: View | (() => View)): this {
    if (!condition) return this;
    this.items.push(typeof child === "function" ? child() : child);
    return this;
  }

  addAll(children: readonly View[]): this {
    this.items.push(...children);
    return this;
  }

  build(): readonly View[] {
    return Object.freeze(this.items.slice());
  }
}

export function children(...initial: readonly View[]): ChildListBuilder {
  return new ChildListBuilder().addAll(initial);
}
