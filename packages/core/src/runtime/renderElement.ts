/**
 * packages/core/src/runtime/renderElement.ts — Elements that own backing nodes.
 *
 * Why: Render elements are where the element tree meets the host's backing
 * tree. A render element inserts its node into the nearest render ancestor's
 * node, moves it when its slot changes and removes it on detach. Component
 * elements in between own no node; slot changes pass through them.
 *
 * Structural calls into the host:
 *   - single-child container: insertChild(parent, child, null), removeChild
 *   - multi-child container: insertChild / moveChild with { index, after }, removeChild
 *   - root: host.insertChild / host.removeChild
 */

import { invariant } from "../errors.js";
import type {
  BackingNode,
  ChildPosition,
  LeafRenderWidget,
  MultiChildRenderWidget,
  SingleChildRenderWidget,
  Widget,
} from "../widgets/types.js";
import { describeElement } from "./diagnostics.js";
import {
  type ChildElement,
  type ElementNode,
  type LeafRenderElement,
  type MultiChildRenderElement,
  type ParentDataElement,
  type RenderElement,
  type SingleChildRenderElement,
  childrenOf,
  elementAt,
  isRenderElement,
  parentOf,
} from "./element.js";
import { throwIfDuplicateKeys, updateChildren } from "./reconcile.js";
import { type Slot, indexedSlot } from "./slots.js";
import { inflateWidget, updateChild } from "./tree.js";

type HostedRenderElement = LeafRenderElement | SingleChildRenderElement | MultiChildRenderElement;

function requireNode(element: RenderElement): BackingNode {
  if (element.node === null) throw invariant(`${describeElement(element)} has no backing node`);
  return element.node;
}

function childIdOf(element: ChildElement | null): number | null {
  return element === null ? null : element.id;
}

function childElementOf(element: ElementNode, id: number | null): ChildElement | null {
  if (id === null) return null;
  const child = elementAt(element.owner, id);
  if (child.kind === "root") throw invariant("the root element cannot be a child");
  return child;
}

// ---------------------------------------------------------------------------
// Mount / update
// ---------------------------------------------------------------------------

export function mountRenderElement(element: RenderElement): void {
  if (element.kind !== "root") {
    element.node = element.widget.definition.createBackingNode(element.widget.props, element.context);
  }
  attachRenderNode(element, element.slot);
  element.dirty = false;

  switch (element.kind) {
    case "singleChildRender":
    case "root":
      element.child = childIdOf(updateChild(element, null, element.widget.child, null));
      return;
    case "multiChildRender":
      mountChildren(element, element.widget.children);
      return;
    case "leafRender":
      return;
  }
}

function mountChildren(element: MultiChildRenderElement, widgets: readonly Widget[]): void {
  throwIfDuplicateKeys(element, widgets);
  const ids: number[] = [];
  element.children = ids;
  let previous: ChildElement | null = null;
  for (const [i, widget] of widgets.entries()) {
    const child: ChildElement = inflateWidget(element, widget, indexedSlot(i, childIdOf(previous)));
    ids.push(child.id);
    previous = child;
  }
}

function updateBackingNode(element: HostedRenderElement): void {
  const node = requireNode(element);
  element.widget.definition.updateBackingNode?.(element.widget.props, element.context, node);
}

/** Forced rebuild of a render element: refresh its node from the current widget. */
export function performRenderRebuild(element: RenderElement): void {
  if (element.kind !== "root") updateBackingNode(element);
  element.dirty = false;
}

export function updateLeafRender(element: LeafRenderElement, next: LeafRenderWidget): void {
  element.widget = next;
  updateBackingNode(element);
  element.dirty = false;
}

export function updateSingleChildRender(
  element: SingleChildRenderElement,
  next: SingleChildRenderWidget,
): void {
  element.widget = next;
  updateBackingNode(element);
  element.dirty = false;
  const current = childElementOf(element, element.child);
  element.child = childIdOf(updateChild(element, current, next.child, null));
}

export function updateMultiChildRender(
  element: MultiChildRenderElement,
  next: MultiChildRenderWidget,
): void {
  element.widget = next;
  updateBackingNode(element);
  element.dirty = false;
  throwIfDuplicateKeys(element, next.children);

  const oldChildren: ChildElement[] = [];
  for (const id of element.children) {
    const child = element.owner.elements.get(id);
    // A forgotten child may already be gone; the diff treats it as absent anyway.
    if (child === undefined || child.kind === "root") continue;
    oldChildren.push(child);
  }
  const updated = updateChildren(element, oldChildren, next.children, element.forgotten);
  element.children = updated.filter((child) => !element.forgotten.has(child.id)).map((child) => child.id);
  element.forgotten.clear();
}

// ---------------------------------------------------------------------------
// Attach / detach / move
// ---------------------------------------------------------------------------

function findAncestorRenderElement(element: ElementNode): RenderElement | null {
  let current = parentOf(element);
  while (current !== null && !isRenderElement(current)) current = parentOf(current);
  return current;
}

function findAncestorParentData(element: ElementNode): ParentDataElement | null {
  let current = parentOf(element);
  while (current !== null && !isRenderElement(current)) {
    if (current.kind === "parentData") return current;
    current = parentOf(current);
  }
  return null;
}

function positionFor(container: MultiChildRenderElement, slot: Slot): ChildPosition {
  if (slot === null) {
    throw invariant(`child of ${describeElement(container)} placed without an indexed slot`);
  }
  const after =
    slot.previous === null ? null : findBackingNodeOf(elementAt(container.owner, slot.previous));
  return Object.freeze({ index: slot.index, after });
}

function insertChildNode(ancestor: RenderElement, node: BackingNode, slot: Slot): void {
  switch (ancestor.kind) {
    case "leafRender":
      throw invariant(`${describeElement(ancestor)} cannot hold children`);
    case "singleChildRender":
      ancestor.widget.definition.insertChild(requireNode(ancestor), node, null);
      return;
    case "multiChildRender":
      ancestor.widget.definition.insertChild(requireNode(ancestor), node, positionFor(ancestor, slot));
      return;
    case "root":
      ancestor.widget.host.insertChild(ancestor.widget.host.rootNode, node);
      return;
  }
}

function moveChildNode(ancestor: RenderElement, node: BackingNode, slot: Slot): void {
  if (ancestor.kind !== "multiChildRender") {
    throw invariant(`${describeElement(ancestor)} cannot move children`);
  }
  ancestor.widget.definition.moveChild(requireNode(ancestor), node, positionFor(ancestor, slot));
}

function removeChildNode(ancestor: RenderElement, node: BackingNode): void {
  switch (ancestor.kind) {
    case "leafRender":
      throw invariant(`${describeElement(ancestor)} cannot hold children`);
    case "singleChildRender":
    case "multiChildRender":
      ancestor.widget.definition.removeChild(requireNode(ancestor), node);
      return;
    case "root":
      ancestor.widget.host.removeChild(ancestor.widget.host.rootNode, node);
      return;
  }
}

export function attachRenderNode(element: RenderElement, slot: Slot): void {
  element.slot = slot;
  if (element.kind === "root") return;
  const ancestor = findAncestorRenderElement(element);
  element.ancestorRender = ancestor === null ? null : ancestor.id;
  const node = element.node;
  if (node === null) return;
  if (ancestor !== null) insertChildNode(ancestor, node, slot);
  const parentData = findAncestorParentData(element);
  if (parentData !== null) {
    parentData.widget.definition.applyParentData(node, parentData.widget.props);
  }
}

export function detachRenderNode(element: RenderElement): void {
  if (element.ancestorRender !== null) {
    const ancestor = elementAt(element.owner, element.ancestorRender);
    if (!isRenderElement(ancestor)) throw invariant(`${describeElement(ancestor)} is not a render element`);
    if (element.node !== null) removeChildNode(ancestor, element.node);
    element.ancestorRender = null;
  }
  element.slot = null;
}

export function updateRenderSlot(element: RenderElement, newSlot: Slot): void {
  element.slot = newSlot;
  if (element.ancestorRender === null || element.node === null) return;
  const ancestor = elementAt(element.owner, element.ancestorRender);
  if (!isRenderElement(ancestor)) throw invariant(`${describeElement(ancestor)} is not a render element`);
  moveChildNode(ancestor, element.node, newSlot);
}

// ---------------------------------------------------------------------------
// Parent data / lookups
// ---------------------------------------------------------------------------

/** Apply a parent-data widget to the nearest render node below it on every path. */
export function applyParentDataToDescendants(element: ParentDataElement): void {
  const apply = (child: ElementNode): void => {
    if (isRenderElement(child)) {
      if (child.node !== null) element.widget.definition.applyParentData(child.node, element.widget.props);
      return;
    }
    for (const grandchild of childrenOf(child)) apply(grandchild);
  };
  for (const child of childrenOf(element)) apply(child);
}

/** The element's own backing node, or that of the first render element below it. */
export function findBackingNodeOf(element: ElementNode): BackingNode | null {
  let current: ElementNode | undefined = element;
  while (current !== undefined) {
    if (isRenderElement(current)) return current.node;
    current = childrenOf(current)[0];
  }
  return null;
}
