/**
 * packages/core/src/runtime/element.ts — Element records.
 *
 * Why: An element is the live node behind a widget: it keeps the widget's
 * position, lifecycle, dirty flag, dependencies and (for render kinds) the
 * backing node. Element kinds mirror widget kinds one to one, plus `root` for
 * the element that owns the host's root node.
 *
 * Lifecycle: initial → active ⇄ inactive → defunct. Inactive elements are
 * parked in the owner's inactive set until the end of the pass, where they are
 * either reclaimed through a global key or unmounted.
 *
 * Every cross-element reference is an InstanceId resolved in the owner's arena.
 */

import { TrellisError } from "../errors.js";
import type {
  BackingNode,
  BuildContext,
  InheritedDefinition,
  InheritedWidget,
  LeafRenderWidget,
  MultiChildRenderWidget,
  ParentDataWidget,
  ProxyWidget,
  SingleChildRenderWidget,
  StateHandle,
  StateLifecycle,
  StateLogic,
  StatefulWidget,
  StatelessWidget,
  Widget,
} from "../widgets/types.js";
import { createBuildContext } from "./context.js";
import type { InstanceId } from "./instance.js";
import type { OwnerInternals } from "./owner.js";
import type { RootHost } from "./root.js";
import type { Slot } from "./slots.js";
import { createStateHandle } from "./stateful.js";

export type ElementLifecycle = "initial" | "active" | "inactive" | "defunct";

/** Nearest provider per inherited definition, shared down the tree. */
export type InheritedLookup = ReadonlyMap<InheritedDefinition, InstanceId>;

/** Configuration of the root element: the host plus the app widget. */
export type RootWidget = Readonly<{
  kind: "root";
  definition: Readonly<{ name: string }>;
  key: undefined;
  host: RootHost;
  child: Widget | null;
}>;

type ElementFields<K extends string, W> = {
  readonly kind: K;
  readonly id: InstanceId;
  readonly owner: OwnerInternals;
  readonly context: BuildContext;
  widget: W;
  parent: InstanceId | null;
  slot: Slot;
  depth: number;
  lifecycle: ElementLifecycle;
  dirty: boolean;
  inDirtyList: boolean;
  /** Set while a build of this element may re-dirty it without an error. */
  allowIgnoredMarkNeedsBuild: boolean;
  inherited: InheritedLookup | null;
  /** Providers this element depends on. */
  dependencies: Set<InstanceId> | null;
  hadUnsatisfiedDependencies: boolean;
  /** Global-keyed children stolen from this element since its last update. */
  readonly forgottenGlobalKeyed: Set<InstanceId>;
};

type SingleChild = { child: InstanceId | null };
type RenderFields = {
  node: BackingNode | null;
  /** Nearest ancestor render element the node is inserted into. */
  ancestorRender: InstanceId | null;
};

export type StateRecord = {
  readonly logic: StateLogic<unknown>;
  readonly handle: StateHandle<unknown>;
  lifecycle: StateLifecycle;
  disposed: boolean;
};

export type StatelessElement = ElementFields<"stateless", StatelessWidget> & SingleChild;
export type StatefulElement = ElementFields<"stateful", StatefulWidget> &
  SingleChild & {
    readonly state: StateRecord;
    didChangeDependenciesPending: boolean;
  };
export type ProxyElement = ElementFields<"proxy", ProxyWidget> & SingleChild;
export type InheritedElement = ElementFields<"inherited", InheritedWidget> &
  SingleChild & {
    /** Dependent handle → registered aspects, or null for "all". */
    readonly dependents: Map<InstanceId, Set<unknown> | null>;
  };
export type ParentDataElement = ElementFields<"parentData", ParentDataWidget> & SingleChild;
export type LeafRenderElement = ElementFields<"leafRender", LeafRenderWidget> & RenderFields;
export type SingleChildRenderElement = ElementFields<"singleChildRender", SingleChildRenderWidget> &
  RenderFields &
  SingleChild;
export type MultiChildRenderElement = ElementFields<"multiChildRender", MultiChildRenderWidget> &
  RenderFields & {
    children: InstanceId[];
    /** Children stolen through a global key; treated as absent until the next update. */
    readonly forgotten: Set<InstanceId>;
  };
export type RootElement = ElementFields<"root", RootWidget> & RenderFields & SingleChild;

export type ElementNode =
  | StatelessElement
  | StatefulElement
  | ProxyElement
  | InheritedElement
  | ParentDataElement
  | LeafRenderElement
  | SingleChildRenderElement
  | MultiChildRenderElement
  | RootElement;

export type ComponentElement =
  | StatelessElement
  | StatefulElement
  | ProxyElement
  | InheritedElement
  | ParentDataElement;
export type RenderElement =
  | LeafRenderElement
  | SingleChildRenderElement
  | MultiChildRenderElement
  | RootElement;
export type ChildElement = Exclude<ElementNode, RootElement>;

export function isRenderElement(element: ElementNode): element is RenderElement {
  switch (element.kind) {
    case "leafRender":
    case "singleChildRender":
    case "multiChildRender":
    case "root":
      return true;
    default:
      return false;
  }
}

function baseFields(owner: OwnerInternals, id: InstanceId) {
  return {
    id,
    owner,
    context: createBuildContext(owner, id),
    parent: null,
    slot: null,
    depth: 0,
    lifecycle: "initial" as const,
    dirty: true,
    inDirtyList: false,
    allowIgnoredMarkNeedsBuild: false,
    inherited: null,
    dependencies: null,
    hadUnsatisfiedDependencies: false,
    forgottenGlobalKeyed: new Set<InstanceId>(),
  };
}

/** Create an element for `widget` and register it in the owner's arena. */
export function createElement(owner: OwnerInternals, widget: Widget): ChildElement {
  const id = owner.allocator.allocate();
  const base = baseFields(owner, id);
  let element: ChildElement;
  switch (widget.kind) {
    case "stateless":
      element = { ...base, kind: "stateless", widget, child: null };
      break;
    case "stateful": {
      const logic = widget.definition.createState(widget.props);
      element = {
        ...base,
        kind: "stateful",
        widget,
        child: null,
        state: { logic, handle: createStateHandle(owner, id), lifecycle: "created", disposed: false },
        didChangeDependenciesPending: false,
      };
      break;
    }
    case "proxy":
      element = { ...base, kind: "proxy", widget, child: null };
      break;
    case "inherited":
      element = { ...base, kind: "inherited", widget, child: null, dependents: new Map() };
      break;
    case "parentData":
      element = { ...base, kind: "parentData", widget, child: null };
      break;
    case "leafRender":
      element = { ...base, kind: "leafRender", widget, node: null, ancestorRender: null };
      break;
    case "singleChildRender":
      element = {
        ...base,
        kind: "singleChildRender",
        widget,
        node: null,
        ancestorRender: null,
        child: null,
      };
      break;
    case "multiChildRender":
      element = {
        ...base,
        kind: "multiChildRender",
        widget,
        node: null,
        ancestorRender: null,
        children: [],
        forgotten: new Set(),
      };
      break;
  }
  owner.elements.set(id, element);
  return element;
}

export function createRootElement(owner: OwnerInternals, widget: RootWidget): RootElement {
  const id = owner.allocator.allocate();
  const element: RootElement = {
    ...baseFields(owner, id),
    kind: "root",
    widget,
    node: widget.host.rootNode,
    ancestorRender: null,
    child: null,
  };
  owner.elements.set(id, element);
  return element;
}

/** Arena lookup that treats a missing handle as an engine bug. */
export function elementAt(owner: OwnerInternals, id: InstanceId): ElementNode {
  const element = owner.elements.get(id);
  if (element === undefined) {
    throw new TrellisError("TRELLIS_INVARIANT", `[trellis] unknown element handle #${String(id)}`);
  }
  return element;
}

export function parentOf(element: ElementNode): ElementNode | null {
  return element.parent === null ? null : elementAt(element.owner, element.parent);
}

/** Current children in order, skipping children stolen by a global key. */
export function childrenOf(element: ElementNode): ElementNode[] {
  switch (element.kind) {
    case "leafRender":
      return [];
    case "multiChildRender": {
      const out: ElementNode[] = [];
      for (const id of element.children) {
        if (!element.forgotten.has(id)) out.push(elementAt(element.owner, id));
      }
      return out;
    }
    default:
      return element.child === null ? [] : [elementAt(element.owner, element.child)];
  }
}

