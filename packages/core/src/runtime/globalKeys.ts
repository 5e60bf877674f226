/**
 * packages/core/src/runtime/globalKeys.ts — Per-owner global-key registry.
 *
 * Why: A global key names at most one live element per tree. The registry maps
 * each key to the element currently holding it so `inflateWidget` can reclaim
 * that element under a new parent.
 *
 * Conflicts are not failed on the spot: within one pass a key may be released
 * by one subtree and claimed by another. The registry records what it saw and
 * `verify` (run by finalizeTree) reports, in this order:
 *   1. two parents that reserved the same key for live children this pass
 *   2. elements displaced by a newer holder of their key that are still alive
 *   3. parents that lost a keyed child to another parent and were not rebuilt
 *      afterwards (they still list the child)
 * Pass bookkeeping is cleared whether or not verification throws.
 */

import { TrellisError } from "../errors.js";
import { KeyMap } from "../keys/keyMap.js";
import { type GlobalKey, describeKey, isGlobalKey } from "../keys/keys.js";
import { creatorChain, describeElement } from "./diagnostics.js";
import type { ElementNode } from "./element.js";
import type { InstanceId } from "./instance.js";

export type GlobalKeyRegistry = Readonly<{
  register: (key: GlobalKey, element: ElementNode) => void;
  unregister: (key: GlobalKey, element: ElementNode) => void;
  currentElement: (key: GlobalKey) => ElementNode | null;
  size: () => number;
  reserve: (parent: ElementNode, child: ElementNode, key: GlobalKey) => void;
  releaseReservation: (parent: ElementNode, childId: InstanceId) => void;
  trackStolen: (parent: ElementNode, key: GlobalKey) => void;
  elementWasRebuilt: (element: ElementNode) => void;
  /** Throws TRELLIS_DUPLICATE_GLOBAL_KEY; always clears pass bookkeeping. */
  verify: () => void;
}>;

function duplicateError(message: string, detail: Readonly<Record<string, unknown>>): TrellisError {
  return new TrellisError("TRELLIS_DUPLICATE_GLOBAL_KEY", message, detail);
}

export function createGlobalKeyRegistry(elements: ReadonlyMap<InstanceId, ElementNode>): GlobalKeyRegistry {
  const registry = new KeyMap<InstanceId>();
  const illFated = new Set<InstanceId>();
  const reservations = new Map<InstanceId, Map<InstanceId, GlobalKey>>();
  const stolenFrom = new Map<InstanceId, GlobalKey[]>();

  const live = (id: InstanceId): ElementNode | null => {
    const element = elements.get(id);
    return element === undefined || element.lifecycle === "defunct" ? null : element;
  };
  const chainOf = (element: ElementNode): string => creatorChain(element, (id) => elements.get(id));

  function verifyReservations(): void {
    const keyToParent = new KeyMap<InstanceId>();
    for (const [parentId, children] of reservations) {
      const parent = live(parentId);
      if (parent === null || parent.lifecycle !== "active") continue;
      for (const [childId, key] of children) {
        const child = live(childId);
        if (child === null || child.parent === null) continue;
        const otherParentId = keyToParent.get(key);
        if (otherParentId !== undefined && otherParentId !== parentId) {
          const otherParent = live(otherParentId);
          throw duplicateError(
            `Multiple widgets used the same GlobalKey ${describeKey(key)}: it was reserved by ` +
              `${describeElement(parent)} and by ${otherParent === null ? `#${String(otherParentId)}` : describeElement(otherParent)}. ` +
              "A GlobalKey can only be specified on one widget at a time in the widget tree.",
            {
              key: describeKey(key),
              parents: [chainOf(parent), otherParent === null ? null : chainOf(otherParent)],
            },
          );
        }
        keyToParent.set(key, parentId);
      }
    }
  }

  function verifyIllFated(): void {
    const duplicates = new KeyMap<Set<ElementNode>>();
    for (const id of illFated) {
      const element = live(id);
      if (element === null) continue;
      const key = element.widget.key;
      if (!isGlobalKey(key)) continue;
      let holders = duplicates.get(key);
      if (holders === undefined) {
        holders = new Set();
        duplicates.set(key, holders);
      }
      holders.add(element);
      const holderId = registry.get(key);
      const holder = holderId === undefined ? null : live(holderId);
      if (holder !== null) holders.add(holder);
    }
    if (duplicates.size === 0) return;
    const keys: string[] = [];
    const chains: string[][] = [];
    for (const [key, holders] of duplicates.entries()) {
      keys.push(describeKey(key));
      chains.push([...holders].map(chainOf));
    }
    throw duplicateError(
      `Duplicate GlobalKeys detected in widget tree: ${keys.join(", ")}. ` +
        "Each key was used by more than one live widget.",
      { keys, chains },
    );
  }

  function verifyStolen(): void {
    for (const [parentId, keys] of stolenFrom) {
      const parent = live(parentId);
      if (parent === null) continue;
      throw duplicateError(
        `Duplicate GlobalKeys detected: ${keys.map(describeKey).join(", ")}. ` +
          `${describeElement(parent)} lost a keyed child to another parent and was not rebuilt, ` +
          "so the same key is now claimed in two places.",
        { keys: keys.map(describeKey), parent: chainOf(parent) },
      );
    }
  }

  return Object.freeze({
    register(key: GlobalKey, element: ElementNode): void {
      const previous = registry.get(key);
      if (previous !== undefined && previous !== element.id) illFated.add(previous);
      registry.set(key, element.id);
    },
    unregister(key: GlobalKey, element: ElementNode): void {
      if (registry.get(key) === element.id) registry.delete(key);
    },
    currentElement(key: GlobalKey): ElementNode | null {
      const id = registry.get(key);
      return id === undefined ? null : live(id);
    },
    size: () => registry.size,
    reserve(parent: ElementNode, child: ElementNode, key: GlobalKey): void {
      let children = reservations.get(parent.id);
      if (children === undefined) {
        children = new Map();
        reservations.set(parent.id, children);
      }
      children.set(child.id, key);
    },
    releaseReservation(parent: ElementNode, childId: InstanceId): void {
      reservations.get(parent.id)?.delete(childId);
    },
    trackStolen(parent: ElementNode, key: GlobalKey): void {
      const keys = stolenFrom.get(parent.id);
      if (keys === undefined) stolenFrom.set(parent.id, [key]);
      else keys.push(key);
    },
    elementWasRebuilt(element: ElementNode): void {
      stolenFrom.delete(element.id);
    },
    verify(): void {
      try {
        verifyReservations();
        verifyIllFated();
        verifyStolen();
      } finally {
        reservations.clear();
        illFated.clear();
        stolenFrom.clear();
      }
    },
  });
}
