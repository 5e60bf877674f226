/**
 * packages/core/src/runtime/reconcile.ts — Child-list reconciliation.
 *
 * Why: Matches a new list of child widgets against the current child elements
 * of a multi-child element, reusing every element it can and touching as few
 * backing nodes as possible.
 *
 * Phases:
 *   1. sync from the front while old and new are pairwise updatable
 *   2. scan from the back while they match, without syncing yet
 *   3. index the remaining old children by key; unkeyed leftovers are deactivated
 *   4. walk the remaining new widgets, matching keys against the index
 *   5. sync the back segment found in phase 2, in order
 *   6. deactivate indexed old children nobody claimed
 *
 * Children stolen through a global key ("forgotten") count as absent. Every
 * child gets an IndexedSlot naming the element before it, so containers can
 * insert after a known node.
 *
 * Sibling keys must be unique; duplicate local keys are fatal before any work
 * is done. Global keys are checked at the end of the pass instead.
 */

import { TrellisError, invariant } from "../errors.js";
import { KeyMap } from "../keys/keyMap.js";
import { describeKey, isGlobalKey } from "../keys/keys.js";
import type { Widget } from "../widgets/types.js";
import { canUpdate, describeWidget } from "../widgets/widget.js";
import { describeElement } from "./diagnostics.js";
import type { ChildElement, ElementNode } from "./element.js";
import type { InstanceId } from "./instance.js";
import { indexedSlot } from "./slots.js";
import { deactivateChild, updateChild } from "./tree.js";

/** Fatal error from reconciliation (duplicate keys). */
export type ReconcileFatal = Readonly<{
  code: "TRELLIS_DUPLICATE_KEY";
  detail: string;
}>;

export type ReconcileResult<T> =
  | Readonly<{ ok: true; value: T }>
  | Readonly<{ ok: false; fatal: ReconcileFatal }>;

function duplicateKeyDetail(parentId: InstanceId, key: string, aIndex: number, bIndex: number): string {
  return `duplicate sibling key ${key} under parent instanceId=${String(parentId)} (child indices ${String(
    aIndex,
  )} and ${String(bIndex)})`;
}

/**
 * Check that no two widgets in one child list share a local key.
 *
 * @returns the number of locally keyed children, or a fatal result
 */
export function validateSiblingKeys(parentId: InstanceId, widgets: readonly Widget[]): ReconcileResult<number> {
  const seen = new KeyMap<number>();
  for (const [index, widget] of widgets.entries()) {
    const key = widget.key;
    if (key === undefined || isGlobalKey(key)) continue;
    const existing = seen.get(key);
    if (existing !== undefined) {
      return {
        ok: false,
        fatal: { code: "TRELLIS_DUPLICATE_KEY", detail: duplicateKeyDetail(parentId, describeKey(key), existing, index) },
      };
    }
    seen.set(key, index);
  }
  return { ok: true, value: seen.size };
}

export function throwIfDuplicateKeys(parent: ElementNode, widgets: readonly Widget[]): void {
  const res = validateSiblingKeys(parent.id, widgets);
  if (!res.ok) {
    throw new TrellisError(res.fatal.code, `${describeElement(parent)}: ${res.fatal.detail}`, {
      parent: describeElement(parent),
    });
  }
}

function at<T>(list: readonly T[], index: number): T {
  const value = list[index];
  if (value === undefined) throw invariant(`child list index ${String(index)} out of range`);
  return value;
}

function requireChild(parent: ElementNode, widget: Widget, child: ChildElement | null): ChildElement {
  if (child === null) throw invariant(`${describeWidget(widget)} under ${describeElement(parent)} produced no element`);
  return child;
}

/**
 * Reconcile `oldChildren` against `newWidgets` under `parent`.
 *
 * @returns the new child elements, in `newWidgets` order
 */
export function updateChildren(
  parent: ElementNode,
  oldChildren: readonly ChildElement[],
  newWidgets: readonly Widget[],
  forgotten: ReadonlySet<InstanceId>,
): ChildElement[] {
  const present = (child: ChildElement): ChildElement | null => (forgotten.has(child.id) ? null : child);

  let newChildrenTop = 0;
  let oldChildrenTop = 0;
  let newChildrenBottom = newWidgets.length - 1;
  let oldChildrenBottom = oldChildren.length - 1;

  const newChildren: ChildElement[] = [];
  let previousChild: ChildElement | null = null;

  const place = (oldChild: ChildElement | null, widget: Widget): void => {
    const slot = indexedSlot(newChildrenTop, previousChild === null ? null : previousChild.id);
    const newChild = requireChild(parent, widget, updateChild(parent, oldChild, widget, slot));
    newChildren.push(newChild);
    previousChild = newChild;
    newChildrenTop++;
  };

  // 1. Sync the top.
  while (oldChildrenTop <= oldChildrenBottom && newChildrenTop <= newChildrenBottom) {
    const oldChild = present(at(oldChildren, oldChildrenTop));
    const widget = at(newWidgets, newChildrenTop);
    if (oldChild === null || !canUpdate(oldChild.widget, widget)) break;
    place(oldChild, widget);
    oldChildrenTop++;
  }

  // 2. Scan the bottom.
  while (oldChildrenTop <= oldChildrenBottom && newChildrenTop <= newChildrenBottom) {
    const oldChild = present(at(oldChildren, oldChildrenBottom));
    const widget = at(newWidgets, newChildrenBottom);
    if (oldChild === null || !canUpdate(oldChild.widget, widget)) break;
    oldChildrenBottom--;
    newChildrenBottom--;
  }

  // 3. Index the old middle by key.
  const haveOldChildren = oldChildrenTop <= oldChildrenBottom;
  const oldKeyedChildren = new KeyMap<ChildElement>();
  while (oldChildrenTop <= oldChildrenBottom) {
    const oldChild = present(at(oldChildren, oldChildrenTop));
    if (oldChild !== null) {
      const key = oldChild.widget.key;
      if (key !== undefined) oldKeyedChildren.set(key, oldChild);
      else deactivateChild(parent, oldChild);
    }
    oldChildrenTop++;
  }

  // 4. Walk the new middle.
  while (newChildrenTop <= newChildrenBottom) {
    const widget = at(newWidgets, newChildrenTop);
    let oldChild: ChildElement | null = null;
    const key = widget.key;
    if (haveOldChildren && key !== undefined) {
      const candidate = oldKeyedChildren.get(key);
      if (candidate !== undefined && canUpdate(candidate.widget, widget)) {
        oldKeyedChildren.delete(key);
        oldChild = candidate;
      }
    }
    place(oldChild, widget);
  }

  // 5. Sync the bottom.
  newChildrenBottom = newWidgets.length - 1;
  oldChildrenBottom = oldChildren.length - 1;
  while (oldChildrenTop <= oldChildrenBottom && newChildrenTop <= newChildrenBottom) {
    // Stolen by a global key while the middle was synced: inflate afresh.
    place(present(at(oldChildren, oldChildrenTop)), at(newWidgets, newChildrenTop));
    oldChildrenTop++;
  }

  // 6. Drop unclaimed keyed children.
  for (const oldChild of oldKeyedChildren.values()) {
    if (!forgotten.has(oldChild.id) && oldChild.parent === parent.id) deactivateChild(parent, oldChild);
  }

  return newChildren;
}
