/**
 * packages/core/src/runtime/identity.ts — Structural view identity.
 *
 * Why: A view's identity is the path of names from the root, e.g.
 * `root/vstack.0/text`. Children of containers carry their index on the
 * container's segment; conditional branches add `#label` so the two arms of
 * a condition never share state.
 */

export type ViewIdentity = string;

export const ROOT_IDENTITY: ViewIdentity = "root";

export function childIdentity(parent: ViewIdentity, name: string, index?: number): ViewIdentity {
  return index === undefined ? `${parent}/${name}` : `${parent}/${name}.${String(index)}`;
}

/** Mark the last segment with a child index: `root/vstack` → `root/vstack.2`. */
export function indexedIdentity(identity: ViewIdentity, index: number): ViewIdentity {
  return `${identity}.${String(index)}`;
}

export function branchIdentity(parent: ViewIdentity, label: string): ViewIdentity {
  return `${parent}#${label}`;
}
