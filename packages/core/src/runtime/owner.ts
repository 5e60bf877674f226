/**
 * packages/core/src/runtime/owner.ts — BuildOwner: dirty list, build scopes, finalization.
 *
 * Why: The owner is the single place that decides when elements rebuild. It
 * keeps the dirty list, runs build scopes that drain it shallowest-first, and
 * finalizes each pass by unmounting what was left inactive and checking global
 * keys.
 *
 * Build scope algorithm:
 *   1. run the optional callback (usually the root's first mount)
 *   2. sort dirty elements by depth, clean before dirty at equal depth
 *   3. rebuild each active dirty entry in order
 *   4. when entries were added or an entry asked for a resort, sort again and
 *      rewind the index to just past the last clean entry
 *   5. fail if an active element is still dirty at the end
 * Flags and the dirty list are reset in `finally`, whatever happened.
 */

import { normalizeBuildOwnerOptions, type BuildOwnerOptions, type NormalizedBuildOwnerOptions } from "../config.js";
import { TrellisError, invariant } from "../errors.js";
import type { GlobalKey } from "../keys/keys.js";
import type { BuildContext, StateLogic, Widget } from "../widgets/types.js";
import { describeElement } from "./diagnostics.js";
import type { ElementNode } from "./element.js";
import { type GlobalKeyRegistry, createGlobalKeyRegistry } from "./globalKeys.js";
import { type InactiveElements, createInactiveElements, unmountAll } from "./inactive.js";
import { type InstanceId, type InstanceIdAllocator, createInstanceIdAllocator } from "./instance.js";
import { markNeedsBuild, reassembleTree, rebuild } from "./tree.js";

export type TraceArea = "schedule" | "buildScope" | "rebuild" | "globalKey";

/** Mutable owner state shared by every element of one tree. */
export type OwnerInternals = {
  readonly options: NormalizedBuildOwnerOptions;
  readonly allocator: InstanceIdAllocator;
  /** Arena: every element not yet unmounted, by handle. */
  readonly elements: Map<InstanceId, ElementNode>;
  readonly dirtyElements: ElementNode[];
  /** null outside a build scope. */
  dirtyNeedsResorting: boolean | null;
  /** onBuildScheduled already fired for this frame. */
  scheduledFlush: boolean;
  building: boolean;
  stateLockLevel: number;
  /** Element whose subtree may be dirtied during the current build. */
  currentBuildTarget: InstanceId | null;
  readonly inactive: InactiveElements;
  readonly globalKeys: GlobalKeyRegistry;
  readonly trace: (area: TraceArea, message: string) => void;
};

export type BuildOwner = Readonly<{
  /** Queue an element that is already dirty. */
  scheduleRebuild: (context: BuildContext) => void;
  /** Mark an element dirty and queue it. */
  markNeedsBuild: (context: BuildContext) => void;
  runBuildScope: (context: BuildContext, callback?: () => void) => void;
  finalizeTree: () => void;
  lockState: (fn: () => void) => void;
  /** Dirty every element under `root` and run the stateful `reassemble` hooks. */
  reassemble: (root: BuildContext) => void;
  currentContext: (key: GlobalKey) => BuildContext | null;
  currentWidget: (key: GlobalKey) => Widget | null;
  currentState: (key: GlobalKey) => StateLogic<unknown> | null;
  globalKeyCount: () => number;
  dirtyCount: () => number;
  readonly building: boolean;
  readonly options: NormalizedBuildOwnerOptions;
  /** Engine state. Used by root attachment and tests; not a stable API. */
  readonly internals: OwnerInternals;
}>;

export function createOwnerInternals(options: BuildOwnerOptions = {}): OwnerInternals {
  const normalized = normalizeBuildOwnerOptions(options);
  const elements = new Map<InstanceId, ElementNode>();
  return {
    options: normalized,
    allocator: createInstanceIdAllocator(),
    elements,
    dirtyElements: [],
    dirtyNeedsResorting: null,
    scheduledFlush: false,
    building: false,
    stateLockLevel: 0,
    currentBuildTarget: null,
    inactive: createInactiveElements(),
    globalKeys: createGlobalKeyRegistry(elements),
    trace: (area, message) => normalized.traceSink(`[trellis][${area}] ${message}`),
  };
}

/** Add a dirty element to the dirty list. */
export function scheduleBuildFor(owner: OwnerInternals, element: ElementNode): void {
  if (element.owner !== owner) {
    throw invariant(`${describeElement(element)} belongs to another build owner`);
  }
  if (!element.dirty) {
    throw new TrellisError(
      "TRELLIS_INVALID_STATE",
      `scheduleRebuild() called for ${describeElement(element)}, which is not marked dirty. ` +
        "Use markNeedsBuild() instead.",
    );
  }
  if (element.inDirtyList) {
    if (!owner.building) {
      throw new TrellisError(
        "TRELLIS_INVALID_STATE",
        `${describeElement(element)} is already scheduled and no build scope is running`,
      );
    }
    owner.dirtyNeedsResorting = true;
    return;
  }
  if (!owner.scheduledFlush && owner.options.onBuildScheduled !== null) {
    owner.scheduledFlush = true;
    owner.options.onBuildScheduled();
  }
  owner.dirtyElements.push(element);
  element.inDirtyList = true;
  if (owner.options.trace.scheduleBuild) {
    owner.trace("schedule", `${describeElement(element)} (${String(owner.dirtyElements.length)} dirty)`);
  }
}

function compareDirty(a: ElementNode, b: ElementNode): number {
  const depth = a.depth - b.depth;
  if (depth !== 0) return depth;
  if (a.dirty === b.dirty) return 0;
  // Clean sorts first: drainDirtyElements only rewinds over trailing dirty entries.
  return a.dirty ? 1 : -1;
}

function at(list: readonly ElementNode[], index: number): ElementNode {
  const element = list[index];
  if (element === undefined) throw invariant(`dirty list index ${String(index)} out of range`);
  return element;
}

function drainDirtyElements(owner: OwnerInternals): void {
  const dirty = owner.dirtyElements;
  dirty.sort(compareDirty);
  owner.dirtyNeedsResorting = false;
  let count = dirty.length;
  let index = 0;
  while (index < count) {
    const element = at(dirty, index);
    if (element.lifecycle === "active" && element.dirty) {
      if (owner.options.trace.rebuild) owner.trace("rebuild", describeElement(element));
      rebuild(element);
    }
    index++;
    if (count < dirty.length || owner.dirtyNeedsResorting) {
      dirty.sort(compareDirty);
      owner.dirtyNeedsResorting = false;
      count = dirty.length;
      while (index > 0 && at(dirty, index - 1).dirty) {
        // An entry before `index` was dirtied again: process it once more.
        index--;
      }
    }
  }

  const stuck = dirty.filter((element) => element.lifecycle === "active" && element.dirty);
  if (stuck.length > 0) {
    throw invariant("build scope ended with dirty elements", {
      elements: stuck.map(describeElement),
    });
  }
}

/**
 * Run a build scope rooted at `element`: the optional callback first, then the
 * dirty list until it converges.
 */
export function runBuildScope(owner: OwnerInternals, element: ElementNode, callback?: () => void): void {
  if (callback === undefined && owner.dirtyElements.length === 0) return;
  if (owner.building) {
    throw new TrellisError(
      "TRELLIS_REENTRANT_CALL",
      `runBuildScope() called for ${describeElement(element)} while another build scope is running`,
    );
  }
  if (owner.options.trace.buildScope) {
    owner.trace("buildScope", `begin ${describeElement(element)} (${String(owner.dirtyElements.length)} dirty)`);
  }
  owner.building = true;
  owner.scheduledFlush = true;
  owner.stateLockLevel++;
  const previousTarget = owner.currentBuildTarget;
  owner.currentBuildTarget = element.id;
  try {
    if (callback !== undefined) {
      owner.dirtyNeedsResorting = false;
      callback();
    }
    drainDirtyElements(owner);
  } finally {
    for (const dirty of owner.dirtyElements) dirty.inDirtyList = false;
    owner.dirtyElements.length = 0;
    owner.dirtyNeedsResorting = null;
    owner.scheduledFlush = false;
    owner.building = false;
    owner.stateLockLevel--;
    owner.currentBuildTarget = previousTarget;
    if (owner.options.trace.buildScope) owner.trace("buildScope", `end ${describeElement(element)}`);
  }
}

/** Run `fn` with dirtying forbidden. */
export function lockState(owner: OwnerInternals, fn: () => void): void {
  owner.stateLockLevel++;
  try {
    fn();
  } finally {
    owner.stateLockLevel--;
  }
}

/** Unmount every element still inactive, then verify global keys. */
export function finalizeTree(owner: OwnerInternals): void {
  lockState(owner, () => unmountAll(owner));
  owner.globalKeys.verify();
}

/** Resolve a context handed out by this owner to its element. */
export function elementForContext(owner: OwnerInternals, context: BuildContext): ElementNode {
  const element = owner.elements.get(context.instanceId);
  if (element === undefined || element.context !== context) {
    throw new TrellisError(
      "TRELLIS_INVALID_STATE",
      `context ${context.describe()} is unmounted or belongs to another build owner`,
    );
  }
  return element;
}

export function createBuildOwner(options: BuildOwnerOptions = {}): BuildOwner {
  const owner = createOwnerInternals(options);
  const currentElement = (key: GlobalKey): ElementNode | null => owner.globalKeys.currentElement(key);

  return Object.freeze({
    scheduleRebuild(context: BuildContext): void {
      scheduleBuildFor(owner, elementForContext(owner, context));
    },
    markNeedsBuild(context: BuildContext): void {
      markNeedsBuild(elementForContext(owner, context));
    },
    runBuildScope(context: BuildContext, callback?: () => void): void {
      runBuildScope(owner, elementForContext(owner, context), callback);
    },
    finalizeTree(): void {
      finalizeTree(owner);
    },
    lockState(fn: () => void): void {
      lockState(owner, fn);
    },
    reassemble(root: BuildContext): void {
      reassembleTree(elementForContext(owner, root));
    },
    currentContext(key: GlobalKey): BuildContext | null {
      return currentElement(key)?.context ?? null;
    },
    currentWidget(key: GlobalKey): Widget | null {
      const element = currentElement(key);
      return element === null || element.kind === "root" ? null : element.widget;
    },
    currentState(key: GlobalKey): StateLogic<unknown> | null {
      const element = currentElement(key);
      return element?.kind === "stateful" ? element.state.logic : null;
    },
    globalKeyCount: () => owner.globalKeys.size(),
    dirtyCount: () => owner.dirtyElements.length,
    get building(): boolean {
      return owner.building;
    },
    options: owner.options,
    internals: owner,
  });
}
