/**
 * packages/core/src/runtime/root.ts — Attaching a widget tree to a host.
 *
 * Why: The root element bridges the host's root backing node and the app
 * widget. Every public entry point (attach, update, flush, detach) is one build
 * scope followed by finalizeTree, so each call leaves the tree settled.
 */

import { TrellisError } from "../errors.js";
import type { BackingNode, BuildContext, Widget } from "../widgets/types.js";
import { type ChildElement, type RootElement, type RootWidget, createRootElement, elementAt } from "./element.js";
import { addInactive } from "./inactive.js";
import { type BuildOwner, finalizeTree, runBuildScope } from "./owner.js";
import { mountElement, updateChild } from "./tree.js";

/** The host's side of the root: a node to put the app's top render node into. */
export type RootHost<N extends BackingNode = BackingNode> = Readonly<{
  rootNode: N;
  insertChild(root: N, child: BackingNode): void;
  removeChild(root: N, child: BackingNode): void;
}>;

export type RootHandle = Readonly<{
  context: BuildContext;
  owner: BuildOwner;
  /** Reconcile a new app widget against the current tree. */
  update: (widget: Widget | null) => void;
  /** Rebuild everything scheduled since the last frame. */
  flush: () => void;
  /** Unmount the whole tree and remove it from the host. */
  detach: () => void;
  readonly attached: boolean;
}>;

const ROOT_DEFINITION = Object.freeze({ name: "[root]" });

function rootWidgetFor(host: RootHost, child: Widget | null): RootWidget {
  return Object.freeze({ kind: "root", definition: ROOT_DEFINITION, key: undefined, host, child });
}

function currentChild(root: RootElement): ChildElement | null {
  if (root.child === null) return null;
  const child = elementAt(root.owner, root.child);
  return child.kind === "root" ? null : child;
}

function reconcileRootChild(root: RootElement, widget: Widget | null): void {
  const owner = root.owner;
  for (const childId of root.forgottenGlobalKeyed) owner.globalKeys.releaseReservation(root, childId);
  root.forgottenGlobalKeyed.clear();
  root.widget = rootWidgetFor(root.widget.host, widget);
  const next = updateChild(root, currentChild(root), widget, null);
  root.child = next === null ? null : next.id;
  owner.globalKeys.elementWasRebuilt(root);
}

/**
 * Mount `widget` under `host.rootNode` and run the first frame.
 *
 * @example
 * ```ts
 * const owner = createBuildOwner();
 * const root = attachRootWidget(owner, App({}), host);
 * root.update(App({ theme: "dark" }));
 * root.detach();
 * ```
 */
export function attachRootWidget<N extends BackingNode>(
  owner: BuildOwner,
  widget: Widget | null,
  host: RootHost<N>,
): RootHandle {
  const internals = owner.internals;
  const root = createRootElement(internals, rootWidgetFor(host, widget));
  runBuildScope(internals, root, () => mountElement(root, null, null));
  finalizeTree(internals);

  let attached = true;
  const ensureAttached = (operation: string): void => {
    if (!attached) {
      throw new TrellisError("TRELLIS_INVALID_STATE", `root.${operation}() called after detach()`);
    }
  };

  return Object.freeze({
    context: root.context,
    owner,
    update(next: Widget | null): void {
      ensureAttached("update");
      runBuildScope(internals, root, () => reconcileRootChild(root, next));
      finalizeTree(internals);
    },
    flush(): void {
      ensureAttached("flush");
      runBuildScope(internals, root);
      finalizeTree(internals);
    },
    detach(): void {
      ensureAttached("detach");
      attached = false;
      runBuildScope(internals, root, () => reconcileRootChild(root, null));
      addInactive(internals, root);
      finalizeTree(internals);
    },
    get attached(): boolean {
      return attached;
    },
  });
}
