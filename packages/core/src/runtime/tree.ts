/**
 * packages/core/src/runtime/tree.ts — Element lifecycle and child reconciliation.
 *
 * Why: `updateChild` is the one path through which every parent updates every
 * child. It keeps an element when the new widget is compatible (same
 * definition, equal key), updates it in place when the widget changed, and
 * otherwise deactivates the old element and inflates a new one. Inflating a
 * widget whose global key is registered reclaims the existing element (and its
 * state) instead of building a fresh one.
 *
 * Build failures are contained at the component that threw: the error is
 * reported and an error stand-in is reconciled in place of its child.
 * TrellisErrors are contract violations and always propagate to the build
 * scope.
 */

import type { BuildErrorDetails } from "../config.js";
import { TrellisError, invariant, isTrellisError, toError } from "../errors.js";
import { type GlobalKey, isGlobalKey } from "../keys/keys.js";
import type { Widget } from "../widgets/types.js";
import { canUpdate } from "../widgets/widget.js";
import { creatorChain, describeElement } from "./diagnostics.js";
import {
  type ChildElement,
  type ComponentElement,
  type ElementNode,
  childrenOf,
  createElement,
  elementAt,
  isRenderElement,
  parentOf,
} from "./element.js";
import { addInactive, removeInactive } from "./inactive.js";
import { notifyDependents, removeDependencies } from "./inherited.js";
import type { InstanceId } from "./instance.js";
import { scheduleBuildFor } from "./owner.js";
import {
  applyParentDataToDescendants,
  attachRenderNode,
  detachRenderNode,
  mountRenderElement,
  performRenderRebuild,
  updateLeafRender,
  updateMultiChildRender,
  updateRenderSlot,
  updateSingleChildRender,
} from "./renderElement.js";
import { type Slot, slotsEqual } from "./slots.js";
import { disposeState, firstBuildStateful, flushDependencyChange, updateStateful } from "./stateful.js";

function asChild(element: ElementNode): ChildElement {
  if (element.kind === "root") throw invariant("the root element cannot be a child");
  return element;
}

function widgetMismatch(element: ElementNode, next: Widget): TrellisError {
  return invariant(`cannot update ${describeElement(element)} with a ${next.kind} widget`);
}

// ---------------------------------------------------------------------------
// Mount / rebuild
// ---------------------------------------------------------------------------

export function updateInheritance(element: ElementNode, parent: ElementNode | null): void {
  const fromParent = parent === null ? null : parent.inherited;
  if (element.kind === "inherited") {
    const lookup = new Map(fromParent ?? []);
    lookup.set(element.widget.definition, element.id);
    element.inherited = lookup;
  } else {
    element.inherited = fromParent;
  }
}

export function mountElement(element: ElementNode, parent: ElementNode | null, slot: Slot): void {
  if (element.lifecycle !== "initial") {
    throw invariant(`mount of ${describeElement(element)} while ${element.lifecycle}`);
  }
  element.parent = parent === null ? null : parent.id;
  element.slot = slot;
  element.depth = parent === null ? 1 : parent.depth + 1;
  element.lifecycle = "active";
  const key = element.widget.key;
  if (isGlobalKey(key)) element.owner.globalKeys.register(key, element);
  updateInheritance(element, parent);

  switch (element.kind) {
    case "leafRender":
    case "singleChildRender":
    case "multiChildRender":
    case "root":
      mountRenderElement(element);
      return;
    case "stateful":
      firstBuildStateful(element);
      return;
    default:
      rebuild(element);
  }
}

/** Rebuild `element` if it is active and dirty. Only valid inside a build scope. */
export function rebuild(element: ElementNode): void {
  if (element.lifecycle === "initial") {
    throw invariant(`rebuild of ${describeElement(element)} before mount`);
  }
  if (element.lifecycle !== "active" || !element.dirty) return;
  const owner = element.owner;
  if (!owner.building) {
    throw new TrellisError(
      "TRELLIS_INVALID_STATE",
      `rebuild of ${describeElement(element)} requested outside a build scope`,
    );
  }
  const previousTarget = owner.currentBuildTarget;
  owner.currentBuildTarget = element.id;
  try {
    performRebuild(element);
  } finally {
    owner.currentBuildTarget = previousTarget;
  }
  owner.globalKeys.elementWasRebuilt(element);
}

function performRebuild(element: ElementNode): void {
  switch (element.kind) {
    case "leafRender":
    case "singleChildRender":
    case "multiChildRender":
    case "root":
      performRenderRebuild(element);
      return;
    default:
      performComponentRebuild(element);
  }
}

function buildComponent(element: ComponentElement): Widget | null {
  switch (element.kind) {
    case "stateless":
      return element.widget.definition.build(element.widget.props, element.context);
    case "stateful":
      return element.state.logic.build(element.state.handle, element.context);
    default:
      return element.widget.child;
  }
}

function reportBuildFailure(element: ElementNode, error: unknown): Widget | null {
  const owner = element.owner;
  const details: BuildErrorDetails = Object.freeze({
    error: toError(error),
    context: `while building ${describeElement(element)}`,
    element: element.context,
    chain: creatorChain(element, (id) => owner.elements.get(id)),
  });
  try {
    owner.options.onError(details);
    return owner.options.errorWidgetBuilder(details);
  } catch (reportError) {
    if (isTrellisError(reportError)) throw reportError;
    throw new TrellisError(
      "TRELLIS_USER_CODE_THROW",
      `reporting the build failure of ${describeElement(element)} failed`,
      { error: reportError, original: details.error },
    );
  }
}

/**
 * Build, mark clean, then reconcile the single child. The element is clean
 * before its child is reconciled, so a child that dirties it again schedules a
 * fresh rebuild instead of being lost.
 */
function performComponentRebuild(element: ComponentElement): void {
  if (element.kind === "stateful") flushDependencyChange(element);

  let built: Widget | null;
  try {
    built = buildComponent(element);
  } catch (error) {
    if (isTrellisError(error)) throw error;
    built = reportBuildFailure(element, error);
  } finally {
    element.dirty = false;
  }

  const previous = element.child === null ? null : asChild(elementAt(element.owner, element.child));
  try {
    element.child = idOf(updateChild(element, previous, built, element.slot));
  } catch (error) {
    if (isTrellisError(error)) throw error;
    const standIn = reportBuildFailure(element, error);
    const stale = element.child === null ? undefined : element.owner.elements.get(element.child);
    if (stale !== undefined && stale.lifecycle === "active" && stale.parent === element.id) {
      deactivateChild(element, asChild(stale));
    }
    element.child = null;
    try {
      element.child = idOf(updateChild(element, null, standIn, element.slot));
    } catch (standInError) {
      if (isTrellisError(standInError)) throw standInError;
      throw new TrellisError(
        "TRELLIS_USER_CODE_THROW",
        `building the error stand-in for ${describeElement(element)} failed`,
        { error: standInError, original: error },
      );
    }
  }
}

function idOf(element: ElementNode | null): InstanceId | null {
  return element === null ? null : element.id;
}

// ---------------------------------------------------------------------------
// Update
// ---------------------------------------------------------------------------

/** Put `next` into `element` and bring its subtree up to date. */
export function updateElement(element: ChildElement, next: Widget): void {
  const owner = element.owner;
  for (const childId of element.forgottenGlobalKeyed) {
    owner.globalKeys.releaseReservation(element, childId);
  }
  element.forgottenGlobalKeyed.clear();

  switch (element.kind) {
    case "stateless":
      if (next.kind !== "stateless") throw widgetMismatch(element, next);
      element.widget = next;
      element.dirty = true;
      rebuild(element);
      return;
    case "stateful":
      if (next.kind !== "stateful") throw widgetMismatch(element, next);
      updateStateful(element, next);
      return;
    case "proxy": {
      if (next.kind !== "proxy") throw widgetMismatch(element, next);
      const old = element.widget;
      element.widget = next;
      next.definition.notifyClients?.(element.context, old.props, next.props);
      element.dirty = true;
      rebuild(element);
      return;
    }
    case "inherited": {
      if (next.kind !== "inherited") throw widgetMismatch(element, next);
      const old = element.widget;
      element.widget = next;
      if (next.definition.updateShouldNotify(old.props, next.props)) notifyDependents(element, old);
      element.dirty = true;
      rebuild(element);
      return;
    }
    case "parentData":
      if (next.kind !== "parentData") throw widgetMismatch(element, next);
      element.widget = next;
      applyParentDataToDescendants(element);
      element.dirty = true;
      rebuild(element);
      return;
    case "leafRender":
      if (next.kind !== "leafRender") throw widgetMismatch(element, next);
      updateLeafRender(element, next);
      return;
    case "singleChildRender":
      if (next.kind !== "singleChildRender") throw widgetMismatch(element, next);
      updateSingleChildRender(element, next);
      return;
    case "multiChildRender":
      if (next.kind !== "multiChildRender") throw widgetMismatch(element, next);
      updateMultiChildRender(element, next);
      return;
  }
}

/**
 * Reconcile one child slot.
 *
 * | child | newWidget | result                                   |
 * |-------|-----------|------------------------------------------|
 * | null  | null      | null                                     |
 * | null  | w         | inflate w                                |
 * | c     | null      | deactivate c, null                       |
 * | c     | same      | c (slot refreshed)                       |
 * | c     | updatable | c updated in place (slot refreshed)      |
 * | c     | otherwise | deactivate c, inflate w                  |
 *
 * The returned element is always active.
 */
export function updateChild(
  parent: ElementNode,
  child: ChildElement | null,
  newWidget: Widget | null,
  newSlot: Slot,
): ChildElement | null {
  const owner = parent.owner;
  if (newWidget === null) {
    if (child !== null) deactivateChild(parent, child);
    return null;
  }

  let result: ChildElement;
  if (child !== null) {
    if (child.widget === newWidget) {
      if (!slotsEqual(child.slot, newSlot)) updateSlotForChild(child, newSlot);
      result = child;
    } else if (canUpdate(child.widget, newWidget)) {
      if (!slotsEqual(child.slot, newSlot)) updateSlotForChild(child, newSlot);
      updateElement(child, newWidget);
      owner.globalKeys.elementWasRebuilt(child);
      result = child;
    } else {
      deactivateChild(parent, child);
      result = inflateWidget(parent, newWidget, newSlot);
    }
  } else {
    result = inflateWidget(parent, newWidget, newSlot);
  }

  if (child !== null) owner.globalKeys.releaseReservation(parent, child.id);
  const key = newWidget.key;
  if (isGlobalKey(key)) owner.globalKeys.reserve(parent, result, key);
  if (result.lifecycle !== "active") {
    throw invariant(`updateChild produced ${describeElement(result)} while ${result.lifecycle}`);
  }
  return result;
}

// ---------------------------------------------------------------------------
// Inflate / reclaim
// ---------------------------------------------------------------------------

/** Create (or reclaim through a global key) an element for `widget` under `parent`. */
export function inflateWidget(parent: ElementNode, widget: Widget, slot: Slot): ChildElement {
  const key = widget.key;
  if (isGlobalKey(key)) {
    const reclaimed = retakeInactiveElement(parent, key, widget);
    if (reclaimed !== null) {
      assertNotAncestor(parent, reclaimed);
      activateWithParent(reclaimed, parent, slot);
      const updated = updateChild(parent, reclaimed, widget, slot);
      if (updated !== reclaimed) {
        throw invariant(`reclaimed ${describeElement(reclaimed)} was replaced during update`);
      }
      return reclaimed;
    }
  }

  const element = createElement(parent.owner, widget);
  try {
    mountElement(element, parent, slot);
  } catch (error) {
    abandonFailedMount(element);
    throw error;
  }
  return element;
}

/**
 * A mount that threw leaves an element that no parent records. Park it in the
 * inactive set so the end-of-pass sweep unmounts it and frees its key.
 */
function abandonFailedMount(element: ChildElement): void {
  if (element.lifecycle === "initial") {
    element.owner.elements.delete(element.id);
    return;
  }
  if (element.lifecycle !== "active") return;
  element.parent = null;
  detachBackingTree(element);
  addInactive(element.owner, element);
}

function retakeInactiveElement(
  parent: ElementNode,
  key: GlobalKey,
  widget: Widget,
): ChildElement | null {
  const owner = parent.owner;
  const registered = owner.globalKeys.currentElement(key);
  if (registered === null || registered.kind === "root") return null;
  if (!canUpdate(registered.widget, widget)) return null;

  const oldParent = parentOf(registered);
  if (oldParent !== null) {
    // Twice in one child list: leave both in place and let finalizeTree report
    // the duplicate.
    if (oldParent === parent) return null;
    if (owner.options.trace.globalKeyLifecycle) {
      owner.trace(
        "globalKey",
        `moving ${describeElement(registered)} from ${describeElement(oldParent)} to ${describeElement(parent)}`,
      );
    }
    owner.globalKeys.trackStolen(oldParent, key);
    forgetChild(oldParent, registered);
    deactivateChild(oldParent, registered);
  }
  if (registered.parent !== null) {
    throw invariant(`reclaimed ${describeElement(registered)} still has a parent`);
  }
  removeInactive(owner, registered);
  return registered;
}

function assertNotAncestor(parent: ElementNode, candidate: ElementNode): void {
  let current: ElementNode | null = parent;
  while (current !== null) {
    if (current === candidate) {
      throw new TrellisError(
        "TRELLIS_INVARIANT",
        `cycle: ${describeElement(candidate)} cannot be reparented into its own subtree`,
        { chain: creatorChain(parent, (id) => parent.owner.elements.get(id)) },
      );
    }
    current = parentOf(current);
  }
}

/** Drop `child` from `parent`'s child bookkeeping without deactivating it. */
export function forgetChild(parent: ElementNode, child: ChildElement): void {
  if (isGlobalKey(child.widget.key)) parent.forgottenGlobalKeyed.add(child.id);
  switch (parent.kind) {
    case "leafRender":
      throw invariant(`${describeElement(parent)} has no children to forget`);
    case "multiChildRender":
      // May not be listed yet when it was inflated earlier in the same diff.
      parent.forgotten.add(child.id);
      return;
    default:
      if (parent.child !== child.id) {
        throw invariant(`${describeElement(child)} is not the child of ${describeElement(parent)}`);
      }
      parent.child = null;
  }
}

// ---------------------------------------------------------------------------
// Deactivate / activate / unmount
// ---------------------------------------------------------------------------

/** Detach `child` from `parent` and park it until the end of the pass. */
export function deactivateChild(parent: ElementNode, child: ChildElement): void {
  if (child.parent !== parent.id) {
    throw invariant(`${describeElement(child)} is not a child of ${describeElement(parent)}`);
  }
  child.parent = null;
  detachBackingTree(child);
  addInactive(parent.owner, child);
}

export function deactivateElement(element: ElementNode): void {
  if (element.lifecycle !== "active") {
    throw invariant(`deactivate of ${describeElement(element)} while ${element.lifecycle}`);
  }
  if (element.kind === "stateful" && element.state.lifecycle !== "created") {
    element.state.logic.deactivate?.(element.state.handle);
  }
  removeDependencies(element);
  element.inherited = null;
  element.lifecycle = "inactive";
}

export function deactivateRecursively(element: ElementNode): void {
  deactivateElement(element);
  for (const child of childrenOf(element)) deactivateRecursively(child);
  if (element.owner.options.devMode && element.kind === "inherited" && element.dependents.size > 0) {
    throw invariant(`${describeElement(element)} still has dependents after deactivation`);
  }
}

function activateWithParent(element: ChildElement, parent: ElementNode, slot: Slot): void {
  if (element.lifecycle !== "inactive") {
    throw invariant(`activate of ${describeElement(element)} while ${element.lifecycle}`);
  }
  element.parent = parent.id;
  updateDepth(element, parent.depth);
  activateRecursively(element);
  attachBackingTree(element, slot);
}

function activateRecursively(element: ElementNode): void {
  activateElement(element);
  for (const child of childrenOf(element)) activateRecursively(child);
}

function activateElement(element: ElementNode): void {
  const hadDependencies =
    (element.dependencies !== null && element.dependencies.size > 0) ||
    element.hadUnsatisfiedDependencies;
  element.lifecycle = "active";
  element.dependencies?.clear();
  element.hadUnsatisfiedDependencies = false;
  updateInheritance(element, parentOf(element));
  if (element.dirty) scheduleBuildFor(element.owner, element);
  if (hadDependencies) didChangeDependencies(element);
  if (element.kind === "stateful") {
    element.state.logic.activate?.(element.state.handle);
    markNeedsBuild(element);
  }
}

function updateDepth(element: ElementNode, parentDepth: number): void {
  const expected = parentDepth + 1;
  if (element.depth < expected) {
    element.depth = expected;
    for (const child of childrenOf(element)) updateDepth(child, expected);
  }
}

/** inactive → defunct. Children are unmounted first by the caller. */
export function unmountElement(element: ElementNode): void {
  if (element.lifecycle !== "inactive") {
    throw invariant(`unmount of ${describeElement(element)} while ${element.lifecycle}`);
  }
  const owner = element.owner;
  const key = element.widget.key;
  if (isGlobalKey(key)) owner.globalKeys.unregister(key, element);
  if (isRenderElement(element) && element.kind !== "root" && element.node !== null) {
    element.widget.definition.didUnmountBackingNode?.(element.node);
  }
  element.lifecycle = "defunct";
  if (element.kind === "stateful") disposeState(element);
  element.dependencies = null;
  owner.elements.delete(element.id);
}

// ---------------------------------------------------------------------------
// Dirty marking
// ---------------------------------------------------------------------------

function isInScope(element: ElementNode, targetId: InstanceId): boolean {
  let current: ElementNode | null = element;
  while (current !== null) {
    if (current.id === targetId) return true;
    current = parentOf(current);
  }
  return false;
}

/**
 * Mark `element` dirty and schedule it. During a build only the element being
 * built and its descendants may be dirtied; while the tree is locked nothing
 * may.
 */
export function markNeedsBuild(element: ElementNode): void {
  if (element.lifecycle === "defunct") {
    throw new TrellisError("TRELLIS_INVALID_STATE", `markNeedsBuild() on defunct element #${String(element.id)}`);
  }
  if (element.lifecycle !== "active") return;
  const owner = element.owner;
  if (owner.building) {
    const target = owner.currentBuildTarget;
    if (target === null) throw invariant("build in progress without a build target");
    const allowed = isInScope(element, target) || (element.allowIgnoredMarkNeedsBuild && element.dirty);
    if (!allowed) {
      const targetElement = owner.elements.get(target);
      throw new TrellisError(
        "TRELLIS_UPDATE_DURING_BUILD",
        `setState() or markNeedsBuild() called on ${describeElement(element)} while building ` +
          `${targetElement === undefined ? `#${String(target)}` : describeElement(targetElement)}. ` +
          "Only the element being built and its descendants may be marked dirty during a build.",
      );
    }
  } else if (owner.stateLockLevel > 0) {
    throw new TrellisError(
      "TRELLIS_UPDATE_DURING_BUILD",
      `setState() or markNeedsBuild() called on ${describeElement(element)} while the tree is locked`,
    );
  }
  if (element.dirty) return;
  element.dirty = true;
  scheduleBuildFor(owner, element);
}

/** A provider this element depends on changed. */
export function didChangeDependencies(element: ElementNode): void {
  if (element.kind === "stateful") element.didChangeDependenciesPending = true;
  markNeedsBuild(element);
}

// ---------------------------------------------------------------------------
// Backing-tree attachment
// ---------------------------------------------------------------------------

/** Move `child`'s backing nodes to `newSlot`, descending through components. */
export function updateSlotForChild(child: ElementNode, newSlot: Slot): void {
  if (isRenderElement(child)) {
    updateRenderSlot(child, newSlot);
    return;
  }
  child.slot = newSlot;
  for (const grandchild of childrenOf(child)) updateSlotForChild(grandchild, newSlot);
}

export function attachBackingTree(element: ElementNode, slot: Slot): void {
  if (isRenderElement(element)) {
    attachRenderNode(element, slot);
    return;
  }
  for (const child of childrenOf(element)) attachBackingTree(child, slot);
  element.slot = slot;
}

export function detachBackingTree(element: ElementNode): void {
  if (isRenderElement(element)) {
    detachRenderNode(element);
    return;
  }
  for (const child of childrenOf(element)) detachBackingTree(child);
  element.slot = null;
}

/** Dev reload: dirty every element and run the stateful `reassemble` hooks. */
export function reassembleTree(element: ElementNode): void {
  if (element.kind === "stateful") element.state.logic.reassemble?.(element.state.handle);
  markNeedsBuild(element);
  for (const child of childrenOf(element)) reassembleTree(child);
}
