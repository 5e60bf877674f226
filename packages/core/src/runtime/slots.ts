/**
 * packages/core/src/runtime/slots.ts — Child slots.
 *
 * A child of a multi-child element is placed by an IndexedSlot: its index and
 * the handle of the sibling before it. The previous-sibling handle lets the
 * container insert after a known node without touching unrelated siblings.
 * Single-child parents use the `null` slot.
 */

import type { InstanceId } from "./instance.js";

export type IndexedSlot = Readonly<{ index: number; previous: InstanceId | null }>;
export type Slot = IndexedSlot | null;

export function indexedSlot(index: number, previous: InstanceId | null): IndexedSlot {
  return Object.freeze({ index, previous });
}

export function slotsEqual(a: Slot, b: Slot): boolean {
  if (a === b) return true;
  if (a === null || b === null) return false;
  return a.index === b.index && a.previous === b.previous;
}
