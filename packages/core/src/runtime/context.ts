/**
 * packages/core/src/runtime/context.ts — BuildContext facade.
 *
 * Why: Build functions and state logic see their element only through this
 * facade. It holds the owner and the element's handle, never the element, so
 * it stays valid (and reports misuse) after the element is unmounted.
 */

import { TrellisError } from "../errors.js";
import { isInheritedWidgetOf } from "../widgets/define.js";
import type {
  BackingNode,
  BuildContext,
  InheritedDefinition,
  InheritedWidget,
  StateLogic,
  StatefulDefinition,
  Widget,
  WidgetDefinition,
} from "../widgets/types.js";
import { describeElement } from "./diagnostics.js";
import { type ElementNode, childrenOf, elementAt, isRenderElement, parentOf } from "./element.js";
import { registerDependency } from "./inherited.js";
import type { InstanceId } from "./instance.js";
import type { OwnerInternals } from "./owner.js";
import { findBackingNodeOf } from "./renderElement.js";

function activeForLookup(owner: OwnerInternals, id: InstanceId, operation: string): ElementNode {
  const element = owner.elements.get(id);
  if (element === undefined || element.lifecycle !== "active") {
    throw new TrellisError(
      "TRELLIS_INVALID_STATE",
      `${operation} called on a deactivated context (element #${String(id)}). ` +
        "Store needed ancestor values in didChangeDependencies() instead.",
    );
  }
  return element;
}

function* ancestorsOf(element: ElementNode): Generator<ElementNode> {
  let current = parentOf(element);
  while (current !== null) {
    yield current;
    current = parentOf(current);
  }
}

function lookupProvider<P>(
  element: ElementNode,
  provider: InheritedDefinition<P>,
): ElementNode | null {
  const id = element.inherited?.get(provider);
  return id === undefined ? null : elementAt(element.owner, id);
}

export function createBuildContext(owner: OwnerInternals, id: InstanceId): BuildContext {
  const self = (): ElementNode => elementAt(owner, id);

  const context: BuildContext = Object.freeze({
    instanceId: id,
    get widget(): Widget {
      const element = self();
      if (element.kind === "root") {
        throw new TrellisError("TRELLIS_INVALID_STATE", "the root context has no widget");
      }
      return element.widget;
    },
    get depth(): number {
      return self().depth;
    },
    get mounted(): boolean {
      const lifecycle = owner.elements.get(id)?.lifecycle;
      return lifecycle === "active" || lifecycle === "inactive";
    },
    dependOnInherited<P>(provider: InheritedDefinition<P>, aspect?: unknown): InheritedWidget<P> | null {
      const element = activeForLookup(owner, id, "dependOnInherited()");
      if (element.kind === "stateful" && element.state.lifecycle === "created") {
        throw new TrellisError(
          "TRELLIS_INVALID_STATE",
          `dependOnInherited() called from initState() of ${describeElement(element)}. ` +
            "Read inherited values in didChangeDependencies() or build().",
        );
      }
      const ancestor = lookupProvider(element, provider);
      if (ancestor === null) {
        element.hadUnsatisfiedDependencies = true;
        return null;
      }
      if (ancestor.kind !== "inherited") {
        throw new TrellisError("TRELLIS_INVARIANT", `provider map points at ${describeElement(ancestor)}`);
      }
      registerDependency(element, ancestor, aspect);
      return isInheritedWidgetOf(provider, ancestor.widget) ? ancestor.widget : null;
    },
    getInherited<P>(provider: InheritedDefinition<P>): InheritedWidget<P> | null {
      const element = activeForLookup(owner, id, "getInherited()");
      const ancestor = lookupProvider(element, provider);
      if (ancestor === null || ancestor.kind !== "inherited") return null;
      return isInheritedWidgetOf(provider, ancestor.widget) ? ancestor.widget : null;
    },
    findAncestorWidgetOfType(definition: WidgetDefinition): Widget | null {
      const element = activeForLookup(owner, id, "findAncestorWidgetOfType()");
      for (const ancestor of ancestorsOf(element)) {
        if (ancestor.kind !== "root" && ancestor.widget.definition === definition) return ancestor.widget;
      }
      return null;
    },
    findAncestorStateOfType<P, S extends StateLogic<P>>(definition: StatefulDefinition<P, S>): S | null {
      const element = activeForLookup(owner, id, "findAncestorStateOfType()");
      for (const ancestor of ancestorsOf(element)) {
        if (ancestor.kind === "stateful") {
          const logic = ancestor.state.logic;
          if (definition.ownsState(logic)) return logic;
        }
      }
      return null;
    },
    findRootAncestorStateOfType<P, S extends StateLogic<P>>(
      definition: StatefulDefinition<P, S>,
    ): S | null {
      const element = activeForLookup(owner, id, "findRootAncestorStateOfType()");
      let found: S | null = null;
      for (const ancestor of ancestorsOf(element)) {
        if (ancestor.kind === "stateful") {
          const logic = ancestor.state.logic;
          if (definition.ownsState(logic)) found = logic;
        }
      }
      return found;
    },
    findAncestorBackingNode(predicate: (node: BackingNode) => boolean): BackingNode | null {
      const element = activeForLookup(owner, id, "findAncestorBackingNode()");
      for (const ancestor of ancestorsOf(element)) {
        if (isRenderElement(ancestor) && ancestor.node !== null && predicate(ancestor.node)) {
          return ancestor.node;
        }
      }
      return null;
    },
    findBackingNode(): BackingNode | null {
      return findBackingNodeOf(self());
    },
    visitAncestorElements(visitor: (ancestor: BuildContext) => boolean): void {
      const element = activeForLookup(owner, id, "visitAncestorElements()");
      for (const ancestor of ancestorsOf(element)) {
        if (!visitor(ancestor.context)) return;
      }
    },
    visitChildElements(visitor: (child: BuildContext) => void): void {
      for (const child of childrenOf(self())) visitor(child.context);
    },
    describe(): string {
      const element = owner.elements.get(id);
      return element === undefined ? `<defunct #${String(id)}>` : describeElement(element);
    },
  });
  return context;
}
