/**
 * packages/core/src/runtime/inherited.ts — Dependents of inherited (ambient data) providers.
 *
 * Why: A provider keeps the handles of the elements that read it, with the
 * aspects each one asked for. When the provider updates and its definition
 * says dependents should be told, each registered dependent gets
 * didChangeDependencies and rebuilds. Dependents unregister themselves on
 * deactivation and register afresh on their next read.
 */

import type { InheritedWidget } from "../widgets/types.js";
import type { ElementNode, InheritedElement } from "./element.js";
import { didChangeDependencies } from "./tree.js";

/**
 * Record `dependent` as reading `provider`. A dependent that registers without
 * an aspect (or on a provider without aspect filtering) hears every change.
 */
export function registerDependency(dependent: ElementNode, provider: InheritedElement, aspect: unknown): void {
  if (dependent.dependencies === null) dependent.dependencies = new Set();
  dependent.dependencies.add(provider.id);

  const filtersAspects = provider.widget.definition.updateShouldNotifyDependent !== undefined;
  if (!filtersAspects || aspect === undefined) {
    provider.dependents.set(dependent.id, null);
    return;
  }
  const existing = provider.dependents.get(dependent.id);
  if (existing === null) return;
  if (existing === undefined) provider.dependents.set(dependent.id, new Set([aspect]));
  else existing.add(aspect);
}

/** Remove `element` from every provider it depends on. */
export function removeDependencies(element: ElementNode): void {
  const dependencies = element.dependencies;
  if (dependencies === null) return;
  for (const providerId of dependencies) {
    const provider = element.owner.elements.get(providerId);
    if (provider?.kind === "inherited") provider.dependents.delete(element.id);
  }
}

export function notifyDependents(provider: InheritedElement, oldWidget: InheritedWidget): void {
  const definition = provider.widget.definition;
  const props = provider.widget.props;
  for (const [dependentId, aspects] of [...provider.dependents]) {
    const dependent = provider.owner.elements.get(dependentId);
    if (dependent === undefined) continue;
    if (
      aspects !== null &&
      definition.updateShouldNotifyDependent !== undefined &&
      !definition.updateShouldNotifyDependent(oldWidget.props, props, aspects)
    ) {
      continue;
    }
    didChangeDependencies(dependent);
  }
}
