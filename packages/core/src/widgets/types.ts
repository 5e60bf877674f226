/**
 * packages/core/src/widgets/types.ts — Widget (configuration) and definition types.
 *
 * Why: A widget is an immutable description of one node: which definition it
 * instantiates, its key and its props. The definition is the behaviour shared by
 * every widget of that type, and definition identity is what `canUpdate`
 * compares. The set of definition kinds is closed; the runtime switches on
 * `kind` rather than dispatching through a class hierarchy.
 *
 * Definitions declare their hooks with method syntax so a definition for
 * specific props stays assignable to the `unknown`-props form the runtime
 * stores.
 */

import type { Key } from "../keys/keys.js";

/** Opaque node in the external backing (render) tree. */
export type BackingNode = object;

/** Where a child backing node goes inside a multi-child container. */
export type ChildPosition = Readonly<{
  /** Index in the new child list. */
  index: number;
  /** Backing node of the previous sibling, or null for the first child. */
  after: BackingNode | null;
}>;

export type WidgetProps = Readonly<{ key?: Key | undefined }>;
export type ChildProps = Readonly<{ key?: Key | undefined; child: Widget }>;

// ---------------------------------------------------------------------------
// Definitions
// ---------------------------------------------------------------------------

export type StatelessDefinition<P = unknown> = {
  readonly kind: "stateless";
  readonly name: string;
  build(props: P, context: BuildContext): Widget | null;
};

/** Lifecycle of the state object attached to a stateful element. */
export type StateLifecycle = "created" | "initialized" | "ready" | "defunct";

/**
 * Per-instance logic of a stateful widget. Hooks run synchronously; returning
 * a promise from `initState` or `didUpdateWidget` is rejected.
 */
export type StateLogic<P = unknown> = {
  initState?(state: StateHandle<P>): void;
  didChangeDependencies?(state: StateHandle<P>): void;
  didUpdateWidget?(state: StateHandle<P>, oldProps: P): void;
  reassemble?(state: StateHandle<P>): void;
  activate?(state: StateHandle<P>): void;
  deactivate?(state: StateHandle<P>): void;
  dispose?(state: StateHandle<P>): void;
  build(state: StateHandle<P>, context: BuildContext): Widget | null;
};

export type StatefulDefinition<P = unknown, S extends StateLogic<P> = StateLogic<P>> = {
  readonly kind: "stateful";
  readonly name: string;
  createState(props: P): S;
  /** True when `logic` was created by this definition. */
  ownsState(logic: StateLogic<unknown>): logic is S;
};

export type ProxyDefinition<P = unknown> = {
  readonly kind: "proxy";
  readonly name: string;
  notifyClients?(context: BuildContext, oldProps: P, props: P): void;
};

export type InheritedDefinition<P = unknown> = {
  readonly kind: "inherited";
  readonly name: string;
  updateShouldNotify(oldProps: P, props: P): boolean;
  /**
   * Present on aspect-filtered providers. Called per dependent that registered
   * aspects; dependents that registered without one are always notified.
   */
  updateShouldNotifyDependent?(oldProps: P, props: P, aspects: ReadonlySet<unknown>): boolean;
};

export type ParentDataDefinition<P = unknown> = {
  readonly kind: "parentData";
  readonly name: string;
  applyParentData(node: BackingNode, props: P): void;
};

export type LeafRenderDefinition<P = unknown, N extends BackingNode = BackingNode> = {
  readonly kind: "leafRender";
  readonly name: string;
  createBackingNode(props: P, context: BuildContext): N;
  updateBackingNode?(props: P, context: BuildContext, node: N): void;
  didUnmountBackingNode?(node: N): void;
};

export type SingleChildRenderDefinition<P = unknown, N extends BackingNode = BackingNode> = {
  readonly kind: "singleChildRender";
  readonly name: string;
  createBackingNode(props: P, context: BuildContext): N;
  updateBackingNode?(props: P, context: BuildContext, node: N): void;
  didUnmountBackingNode?(node: N): void;
  insertChild(parent: N, child: BackingNode, slot: null): void;
  removeChild(parent: N, child: BackingNode): void;
};

export type MultiChildRenderDefinition<P = unknown, N extends BackingNode = BackingNode> = {
  readonly kind: "multiChildRender";
  readonly name: string;
  createBackingNode(props: P, context: BuildContext): N;
  updateBackingNode?(props: P, context: BuildContext, node: N): void;
  didUnmountBackingNode?(node: N): void;
  insertChild(parent: N, child: BackingNode, slot: ChildPosition): void;
  moveChild(parent: N, child: BackingNode, slot: ChildPosition): void;
  removeChild(parent: N, child: BackingNode): void;
};

export type WidgetDefinition =
  | StatelessDefinition
  | StatefulDefinition
  | ProxyDefinition
  | InheritedDefinition
  | ParentDataDefinition
  | LeafRenderDefinition
  | SingleChildRenderDefinition
  | MultiChildRenderDefinition;

export type WidgetKind = WidgetDefinition["kind"];

// ---------------------------------------------------------------------------
// Widgets
// ---------------------------------------------------------------------------

type WidgetRecord<K extends WidgetKind, D, P> = Readonly<{
  kind: K;
  definition: D;
  key: Key | undefined;
  props: P;
}>;

export type StatelessWidget<P = unknown> = WidgetRecord<"stateless", StatelessDefinition<P>, P>;
export type StatefulWidget<P = unknown> = WidgetRecord<"stateful", StatefulDefinition<P>, P>;
export type ProxyWidget<P = unknown> = WidgetRecord<"proxy", ProxyDefinition<P>, P> &
  Readonly<{ child: Widget }>;
export type InheritedWidget<P = unknown> = WidgetRecord<"inherited", InheritedDefinition<P>, P> &
  Readonly<{ child: Widget }>;
export type ParentDataWidget<P = unknown> = WidgetRecord<
  "parentData",
  ParentDataDefinition<P>,
  P
> &
  Readonly<{ child: Widget }>;
export type LeafRenderWidget<P = unknown> = WidgetRecord<"leafRender", LeafRenderDefinition<P>, P>;
export type SingleChildRenderWidget<P = unknown> = WidgetRecord<
  "singleChildRender",
  SingleChildRenderDefinition<P>,
  P
> &
  Readonly<{ child: Widget | null }>;
export type MultiChildRenderWidget<P = unknown> = WidgetRecord<
  "multiChildRender",
  MultiChildRenderDefinition<P>,
  P
> &
  Readonly<{ children: readonly Widget[] }>;

export type Widget =
  | StatelessWidget
  | StatefulWidget
  | ProxyWidget
  | InheritedWidget
  | ParentDataWidget
  | LeafRenderWidget
  | SingleChildRenderWidget
  | MultiChildRenderWidget;

/** Widgets that pass one pre-supplied child through unchanged. */
export type ProxyLikeWidget = ProxyWidget | InheritedWidget | ParentDataWidget;

// ---------------------------------------------------------------------------
// State handle and build context
// ---------------------------------------------------------------------------

/** What stateful logic sees of its element. */
export type StateHandle<P = unknown> = Readonly<{
  /** Props of the current widget. */
  readonly props: P;
  readonly widget: StatefulWidget<P>;
  readonly context: BuildContext;
  /** False once the state has been disposed. */
  readonly mounted: boolean;
  readonly lifecycle: StateLifecycle;
  /**
   * Run `fn` synchronously, then mark the element dirty. `fn` must not return
   * a promise.
   */
  setState(fn?: () => unknown): void;
}>;

export type BuildContext = Readonly<{
  /** Arena handle of the element behind this context. */
  readonly instanceId: number;
  readonly widget: Widget;
  readonly depth: number;
  readonly mounted: boolean;
  /**
   * Nearest provider of `provider`'s definition, registering this element as
   * a dependent. Returns the provider widget, or null when there is none.
   */
  dependOnInherited<P>(provider: InheritedDefinition<P>, aspect?: unknown): InheritedWidget<P> | null;
  /** Nearest provider widget without registering a dependency. */
  getInherited<P>(provider: InheritedDefinition<P>): InheritedWidget<P> | null;
  findAncestorWidgetOfType(definition: WidgetDefinition): Widget | null;
  findAncestorStateOfType<P, S extends StateLogic<P>>(definition: StatefulDefinition<P, S>): S | null;
  findRootAncestorStateOfType<P, S extends StateLogic<P>>(
    definition: StatefulDefinition<P, S>,
  ): S | null;
  findAncestorBackingNode(predicate: (node: BackingNode) => boolean): BackingNode | null;
  /** Backing node of this element, or of its nearest render descendant. */
  findBackingNode(): BackingNode | null;
  /** Walk ancestors nearest-first until `visitor` returns false. */
  visitAncestorElements(visitor: (ancestor: BuildContext) => boolean): void;
  visitChildElements(visitor: (child: BuildContext) => void): void;
  describe(): string;
}>;
