/**
 * packages/core/src/runtime/inactive.ts — Elements parked until the end of the pass.
 *
 * A deactivated subtree waits here so a global key can reclaim it within the
 * same pass. `unmountAll` runs from finalizeTree and unmounts what is left,
 * deepest subtree roots first and children before their parents.
 */

import { invariant } from "../errors.js";
import { describeElement } from "./diagnostics.js";
import type { ElementNode } from "./element.js";
import { childrenOf } from "./element.js";
import type { OwnerInternals } from "./owner.js";
import { deactivateRecursively, unmountElement } from "./tree.js";

export type InactiveElements = {
  readonly elements: Set<ElementNode>;
  locked: boolean;
};

export function createInactiveElements(): InactiveElements {
  return { elements: new Set(), locked: false };
}

export function addInactive(owner: OwnerInternals, element: ElementNode): void {
  const inactive = owner.inactive;
  if (inactive.locked) throw invariant(`${describeElement(element)} deactivated while unmounting`);
  if (element.parent !== null) throw invariant(`${describeElement(element)} parked while still attached`);
  if (element.lifecycle === "active") deactivateRecursively(element);
  inactive.elements.add(element);
}

export function removeInactive(owner: OwnerInternals, element: ElementNode): void {
  const inactive = owner.inactive;
  if (inactive.locked) throw invariant(`${describeElement(element)} reclaimed while unmounting`);
  inactive.elements.delete(element);
}

function unmountSubtree(element: ElementNode): void {
  for (const child of childrenOf(element)) unmountSubtree(child);
  unmountElement(element);
}

export function unmountAll(owner: OwnerInternals): void {
  const inactive = owner.inactive;
  inactive.locked = true;
  const elements = [...inactive.elements].sort((a, b) => b.depth - a.depth);
  inactive.elements.clear();
  try {
    for (const element of elements) unmountSubtree(element);
  } finally {
    inactive.locked = false;
  }
}
