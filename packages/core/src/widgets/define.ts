/**
 * packages/core/src/widgets/define.ts — Widget factories.
 *
 * Why: Each `define*` call creates one definition (the identity `canUpdate`
 * compares) and returns a factory that stamps out frozen widgets for it. The
 * factory carries its definition so callers can name it in ancestor lookups.
 *
 * @example
 * ```ts
 * const Counter = defineStateful("Counter", (props: { start: number }) => {
 *   let count = props.start;
 *   return {
 *     build: (state) => Label({ text: String(count) }),
 *   };
 * });
 * ```
 */

import type { Key } from "../keys/keys.js";
import type {
  BackingNode,
  BuildContext,
  ChildPosition,
  ChildProps,
  InheritedDefinition,
  InheritedWidget,
  LeafRenderDefinition,
  LeafRenderWidget,
  MultiChildRenderDefinition,
  MultiChildRenderWidget,
  ParentDataDefinition,
  ParentDataWidget,
  ProxyDefinition,
  ProxyWidget,
  SingleChildRenderDefinition,
  SingleChildRenderWidget,
  StateLogic,
  StatefulDefinition,
  StatefulWidget,
  StatelessDefinition,
  StatelessWidget,
  Widget,
  WidgetProps,
} from "./types.js";

type Factory<Props, W, D> = ((props: Props) => W) & Readonly<{ definition: D }>;

export type StatelessFactory<P> = Factory<P & WidgetProps, StatelessWidget<P>, StatelessDefinition<P>>;
export type StatefulFactory<P, S extends StateLogic<P>> = Factory<
  P & WidgetProps,
  StatefulWidget<P>,
  StatefulDefinition<P, S>
>;
export type ProxyFactory<P> = Factory<P & ChildProps, ProxyWidget<P>, ProxyDefinition<P>>;
export type ParentDataFactory<P> = Factory<
  P & ChildProps,
  ParentDataWidget<P>,
  ParentDataDefinition<P>
>;
export type InheritedFactory<P> = Factory<P & ChildProps, InheritedWidget<P>, InheritedDefinition<P>> &
  Readonly<{
    /** Props of the nearest provider; registers `context` as a dependent. */
    of: (context: BuildContext, aspect?: unknown) => P | null;
    /** Props of the nearest provider without registering a dependency. */
    peek: (context: BuildContext) => P | null;
  }>;
export type LeafRenderFactory<P> = Factory<P & WidgetProps, LeafRenderWidget<P>, LeafRenderDefinition<P>>;
export type SingleChildRenderFactory<P> = Factory<
  P & WidgetProps & Readonly<{ child?: Widget | null | undefined }>,
  SingleChildRenderWidget<P>,
  SingleChildRenderDefinition<P>
>;
export type MultiChildRenderFactory<P> = Factory<
  P & WidgetProps & Readonly<{ children?: readonly Widget[] | undefined }>,
  MultiChildRenderWidget<P>,
  MultiChildRenderDefinition<P>
>;

function keyOf(props: Readonly<{ key?: Key | undefined }>): Key | undefined {
  return props.key;
}

export function defineStateless<P extends object = object>(
  name: string,
  build: (props: P, context: BuildContext) => Widget | null,
): StatelessFactory<P> {
  const definition: StatelessDefinition<P> = Object.freeze({
    kind: "stateless",
    name,
    build(props: P, context: BuildContext): Widget | null {
      return build(props, context);
    },
  });
  const factory = (props: P & WidgetProps): StatelessWidget<P> =>
    Object.freeze({ kind: "stateless", definition, key: keyOf(props), props });
  return Object.assign(factory, { definition });
}

export function defineStateful<P extends object = object, S extends StateLogic<P> = StateLogic<P>>(
  name: string,
  createState: (props: P) => S,
): StatefulFactory<P, S> {
  const created = new WeakSet<StateLogic<unknown>>();
  const definition: StatefulDefinition<P, S> = Object.freeze({
    kind: "stateful",
    name,
    createState(props: P): S {
      const logic = createState(props);
      created.add(logic);
      return logic;
    },
    ownsState(logic: StateLogic<unknown>): logic is S {
      return created.has(logic);
    },
  });
  const factory = (props: P & WidgetProps): StatefulWidget<P> =>
    Object.freeze({ kind: "stateful", definition, key: keyOf(props), props });
  return Object.assign(factory, { definition });
}

export type ProxyHooks<P> = {
  notifyClients?(context: BuildContext, oldProps: P, props: P): void;
};

export function defineProxy<P extends object = object>(
  name: string,
  hooks: ProxyHooks<P> = {},
): ProxyFactory<P> {
  const definition: ProxyDefinition<P> = Object.freeze({ kind: "proxy", name, ...hooks });
  const factory = (props: P & ChildProps): ProxyWidget<P> =>
    Object.freeze({
      kind: "proxy",
      definition,
      key: keyOf(props),
      props,
      child: props.child,
    });
  return Object.assign(factory, { definition });
}

export function defineParentData<P extends object>(
  name: string,
  applyParentData: (node: BackingNode, props: P) => void,
): ParentDataFactory<P> {
  const definition: ParentDataDefinition<P> = Object.freeze({
    kind: "parentData",
    name,
    applyParentData(node: BackingNode, props: P): void {
      applyParentData(node, props);
    },
  });
  const factory = (props: P & ChildProps): ParentDataWidget<P> =>
    Object.freeze({
      kind: "parentData",
      definition,
      key: keyOf(props),
      props,
      child: props.child,
    });
  return Object.assign(factory, { definition });
}

/** Narrows a provider widget to the props type of `definition`. */
export function isInheritedWidgetOf<P>(
  definition: InheritedDefinition<P>,
  widget: InheritedWidget,
): widget is InheritedWidget<P> {
  return widget.definition === definition;
}

function inheritedFactory<P extends object>(definition: InheritedDefinition<P>): InheritedFactory<P> {
  const factory = (props: P & ChildProps): InheritedWidget<P> =>
    Object.freeze({
      kind: "inherited",
      definition,
      key: keyOf(props),
      props,
      child: props.child,
    });
  const read = (widget: InheritedWidget | null): P | null =>
    widget !== null && isInheritedWidgetOf(definition, widget) ? widget.props : null;
  return Object.assign(factory, {
    definition,
    of: (context: BuildContext, aspect?: unknown): P | null =>
      read(context.dependOnInherited(definition, aspect)),
    peek: (context: BuildContext): P | null => read(context.getInherited(definition)),
  });
}

/** Ambient data: descendants that read it rebuild when `updateShouldNotify` says so. */
export function defineInherited<P extends object>(
  name: string,
  updateShouldNotify: (oldProps: P, props: P) => boolean,
): InheritedFactory<P> {
  return inheritedFactory<P>(
    Object.freeze({
      kind: "inherited",
      name,
      updateShouldNotify(oldProps: P, props: P): boolean {
        return updateShouldNotify(oldProps, props);
      },
    }),
  );
}

export type InheritedModelHooks<P> = Readonly<{
  updateShouldNotify: (oldProps: P, props: P) => boolean;
  /** `aspects` holds every aspect the dependent registered with. */
  updateShouldNotifyDependent: (oldProps: P, props: P, aspects: ReadonlySet<unknown>) => boolean;
}>;

/** Ambient data whose dependents subscribe to aspects of it. */
export function defineInheritedModel<P extends object>(
  name: string,
  hooks: InheritedModelHooks<P>,
): InheritedFactory<P> {
  return inheritedFactory<P>(
    Object.freeze({
      kind: "inherited",
      name,
      updateShouldNotify(oldProps: P, props: P): boolean {
        return hooks.updateShouldNotify(oldProps, props);
      },
      updateShouldNotifyDependent(oldProps: P, props: P, aspects: ReadonlySet<unknown>): boolean {
        return hooks.updateShouldNotifyDependent(oldProps, props, aspects);
      },
    }),
  );
}

export type RenderHooks<P, N extends BackingNode> = {
  createBackingNode(props: P, context: BuildContext): N;
  updateBackingNode?(props: P, context: BuildContext, node: N): void;
  didUnmountBackingNode?(node: N): void;
};

export function defineLeafRender<P extends object, N extends BackingNode>(
  name: string,
  hooks: RenderHooks<P, N>,
): LeafRenderFactory<P> {
  const definition: LeafRenderDefinition<P, N> = Object.freeze({ kind: "leafRender", name, ...hooks });
  const factory = (props: P & WidgetProps): LeafRenderWidget<P> =>
    Object.freeze({ kind: "leafRender", definition, key: keyOf(props), props });
  return Object.assign(factory, { definition });
}

export type SingleChildHooks<P, N extends BackingNode> = RenderHooks<P, N> & {
  insertChild(parent: N, child: BackingNode, slot: null): void;
  removeChild(parent: N, child: BackingNode): void;
};

export function defineSingleChildRender<P extends object, N extends BackingNode>(
  name: string,
  hooks: SingleChildHooks<P, N>,
): SingleChildRenderFactory<P> {
  const definition: SingleChildRenderDefinition<P, N> = Object.freeze({
    kind: "singleChildRender",
    name,
    ...hooks,
  });
  const factory = (
    props: P & WidgetProps & Readonly<{ child?: Widget | null | undefined }>,
  ): SingleChildRenderWidget<P> =>
    Object.freeze({
      kind: "singleChildRender",
      definition,
      key: keyOf(props),
      props,
      child: props.child ?? null,
    });
  return Object.assign(factory, { definition });
}

export type MultiChildHooks<P, N extends BackingNode> = RenderHooks<P, N> & {
  insertChild(parent: N, child: BackingNode, slot: ChildPosition): void;
  moveChild(parent: N, child: BackingNode, slot: ChildPosition): void;
  removeChild(parent: N, child: BackingNode): void;
};

export function defineMultiChildRender<P extends object, N extends BackingNode>(
  name: string,
  hooks: MultiChildHooks<P, N>,
): MultiChildRenderFactory<P> {
  const definition: MultiChildRenderDefinition<P, N> = Object.freeze({
    kind: "multiChildRender",
    name,
    ...hooks,
  });
  const factory = (
    props: P & WidgetProps & Readonly<{ children?: readonly Widget[] | undefined }>,
  ): MultiChildRenderWidget<P> =>
    Object.freeze({
      kind: "multiChildRender",
      definition,
      key: keyOf(props),
      props,
      children: Object.freeze([...(props.children ?? [])]),
    });
  return Object.assign(factory, { definition });
}
