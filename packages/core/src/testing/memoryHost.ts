/**
 * packages/core/src/testing/memoryHost.ts — In-memory backing tree for tests.
 *
 * Why: Reconciliation tests need to see what reached the backing tree, not
 * just which elements exist. This host records every structural call and
 * keeps plain node objects that can be printed and compared.
 *
 * Each host defines its own widget types (Leaf, Box, List, Positioned), so
 * counters never leak between tests.
 */

import type { RootHost } from "../runtime/root.js";
import {
  type LeafRenderFactory,
  type MultiChildRenderFactory,
  type ParentDataFactory,
  type SingleChildRenderFactory,
  defineLeafRender,
  defineMultiChildRender,
  defineParentData,
  defineSingleChildRender,
} from "../widgets/define.js";
import { isErrorBox } from "../widgets/errorWidget.js";
import type { BackingNode, ChildPosition } from "../widgets/types.js";

export type MemoryNode = {
  readonly tag: "root" | "leaf" | "box" | "list";
  label: string;
  parent: MemoryNode | null;
  readonly children: BackingNode[];
  parentData: Readonly<Record<string, unknown>> | null;
  unmounted: boolean;
};

export type MemoryHostCounts = {
  created: number;
  updated: number;
  inserted: number;
  moved: number;
  removed: number;
  unmounted: number;
};

export type LeafProps = Readonly<{ label: string }>;
export type ContainerProps = Readonly<{ label?: string | undefined }>;
export type PositionedProps = Readonly<{ flex: number }>;

export type MemoryHost = Readonly<{
  root: MemoryNode;
  host: RootHost<MemoryNode>;
  counts: Readonly<MemoryHostCounts>;
  /** Structural calls in order: "insert leaf:b after leaf:a", "move …", "remove …". */
  ops: readonly string[];
  resetCounts: () => void;
  Leaf: LeafRenderFactory<LeafProps>;
  Box: SingleChildRenderFactory<ContainerProps>;
  List: MultiChildRenderFactory<ContainerProps>;
  /** Sets `parentData.flex` on the nearest memory node below it. */
  Positioned: ParentDataFactory<PositionedProps>;
  /** Memory node behind `node`, or undefined for nodes this host did not create. */
  nodeOf: (node: BackingNode) => MemoryNode | undefined;
  /** `root(list:main(leaf:a,leaf:b{flex=1}))` */
  describe: () => string;
}>;

function zeroCounts(): MemoryHostCounts {
  return { created: 0, updated: 0, inserted: 0, moved: 0, removed: 0, unmounted: 0 };
}

export function createMemoryHost(): MemoryHost {
  const counts = zeroCounts();
  const ops: string[] = [];
  const owned = new WeakMap<BackingNode, MemoryNode>();

  const createNode = (tag: MemoryNode["tag"], label: string): MemoryNode => {
    const node: MemoryNode = { tag, label, parent: null, children: [], parentData: null, unmounted: false };
    owned.set(node, node);
    return node;
  };

  const nameOf = (node: BackingNode | null): string => {
    if (node === null) return "-";
    const memory = owned.get(node);
    if (memory !== undefined) return memory.label === "" ? memory.tag : `${memory.tag}:${memory.label}`;
    if (isErrorBox(node)) return "error";
    return "?";
  };

  const describeNode = (node: BackingNode): string => {
    const memory = owned.get(node);
    let text = nameOf(node);
    if (memory === undefined) return text;
    if (memory.parentData !== null) {
      const entries = Object.entries(memory.parentData).map(([k, v]) => `${k}=${String(v)}`);
      text += `{${entries.join(",")}}`;
    }
    if (memory.children.length > 0) text += `(${memory.children.map(describeNode).join(",")})`;
    return text;
  };

  const setParent = (child: BackingNode, parent: MemoryNode | null): void => {
    const memory = owned.get(child);
    if (memory !== undefined) memory.parent = parent;
  };

  const detach = (parent: MemoryNode, child: BackingNode): void => {
    const index = parent.children.indexOf(child);
    if (index < 0) throw new Error(`${nameOf(child)} is not a child of ${nameOf(parent)}`);
    parent.children.splice(index, 1);
    setParent(child, null);
  };

  const insertAfter = (parent: MemoryNode, child: BackingNode, position: ChildPosition): void => {
    if (parent.children.includes(child)) throw new Error(`${nameOf(child)} is already in ${nameOf(parent)}`);
    let index = 0;
    if (position.after !== null) {
      const previous = parent.children.indexOf(position.after);
      if (previous < 0) throw new Error(`${nameOf(position.after)} is not a child of ${nameOf(parent)}`);
      index = previous + 1;
    }
    parent.children.splice(index, 0, child);
    setParent(child, parent);
  };

  const update = (node: MemoryNode, label: string): void => {
    node.label = label;
    counts.updated++;
  };
  const unmount = (node: MemoryNode): void => {
    node.unmounted = true;
    counts.unmounted++;
  };
  const remove = (parent: MemoryNode, child: BackingNode): void => {
    detach(parent, child);
    counts.removed++;
    ops.push(`remove ${nameOf(child)}`);
  };

  const root = createNode("root", "");

  const Leaf = defineLeafRender<LeafProps, MemoryNode>("Leaf", {
    createBackingNode: (props) => {
      counts.created++;
      return createNode("leaf", props.label);
    },
    updateBackingNode: (props, _context, node) => update(node, props.label),
    didUnmountBackingNode: unmount,
  });

  const Box = defineSingleChildRender<ContainerProps, MemoryNode>("Box", {
    createBackingNode: (props) => {
      counts.created++;
      return createNode("box", props.label ?? "");
    },
    updateBackingNode: (props, _context, node) => update(node, props.label ?? ""),
    didUnmountBackingNode: unmount,
    insertChild: (parent, child) => {
      if (parent.children.length > 0) throw new Error(`${nameOf(parent)} already has a child`);
      parent.children.push(child);
      setParent(child, parent);
      counts.inserted++;
      ops.push(`insert ${nameOf(child)} into ${nameOf(parent)}`);
    },
    removeChild: remove,
  });

  const List = defineMultiChildRender<ContainerProps, MemoryNode>("List", {
    createBackingNode: (props) => {
      counts.created++;
      return createNode("list", props.label ?? "");
    },
    updateBackingNode: (props, _context, node) => update(node, props.label ?? ""),
    didUnmountBackingNode: unmount,
    insertChild: (parent, child, position) => {
      insertAfter(parent, child, position);
      counts.inserted++;
      ops.push(`insert ${nameOf(child)} after ${nameOf(position.after)}`);
    },
    moveChild: (parent, child, position) => {
      detach(parent, child);
      insertAfter(parent, child, position);
      counts.moved++;
      ops.push(`move ${nameOf(child)} after ${nameOf(position.after)}`);
    },
    removeChild: remove,
  });

  const Positioned = defineParentData<PositionedProps>("Positioned", (node, props) => {
    const memory = owned.get(node);
    if (memory !== undefined) memory.parentData = Object.freeze({ flex: props.flex });
  });

  const host: RootHost<MemoryNode> = Object.freeze({
    rootNode: root,
    insertChild(parent: MemoryNode, child: BackingNode): void {
      parent.children.push(child);
      setParent(child, parent);
      counts.inserted++;
      ops.push(`insert ${nameOf(child)} into root`);
    },
    removeChild: remove,
  });

  return Object.freeze({
    root,
    host,
    counts,
    ops,
    resetCounts(): void {
      Object.assign(counts, zeroCounts());
      ops.length = 0;
    },
    Leaf,
    Box,
    List,
    Positioned,
    nodeOf: (node: BackingNode) => owned.get(node),
    describe: () => describeNode(root),
  });
}
