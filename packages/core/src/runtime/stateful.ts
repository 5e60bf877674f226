/**
 * packages/core/src/runtime/stateful.ts — State objects of stateful elements.
 *
 * Why: Stateful logic never touches its element directly. It gets a
 * StateHandle that resolves the element by handle on every access, so a handle
 * kept past dispose fails loudly instead of mutating a dead element.
 *
 * State lifecycle: created → initialized (after initState) → ready (after the
 * first didChangeDependencies) → defunct (after dispose).
 */

import { TrellisError, isPromiseLike } from "../errors.js";
import type { StateHandle, StateLifecycle, StatefulWidget } from "../widgets/types.js";
import { describeElement, warnDev } from "./diagnostics.js";
import type { StatefulElement } from "./element.js";
import type { InstanceId } from "./instance.js";
import type { OwnerInternals } from "./owner.js";
import { markNeedsBuild, rebuild } from "./tree.js";

function asyncCallbackError(element: StatefulElement, hook: string): TrellisError {
  return new TrellisError(
    "TRELLIS_ASYNC_CALLBACK",
    `${hook}() of ${describeElement(element)} returned a promise. ` +
      "State hooks must be synchronous: do the async work first, then call setState().",
  );
}

export function createStateHandle(owner: OwnerInternals, id: InstanceId): StateHandle<unknown> {
  const lookup = (): StatefulElement | undefined => {
    const element = owner.elements.get(id);
    return element?.kind === "stateful" ? element : undefined;
  };
  const live = (what: string): StatefulElement => {
    const element = lookup();
    if (element === undefined || element.state.disposed) {
      throw new TrellisError(
        "TRELLIS_INVALID_STATE",
        `${what} used after dispose() (element #${String(id)})`,
      );
    }
    return element;
  };

  return Object.freeze({
    get props(): unknown {
      return live("state.props").widget.props;
    },
    get widget(): StatefulWidget {
      return live("state.widget").widget;
    },
    get context() {
      return live("state.context").context;
    },
    get mounted(): boolean {
      const element = lookup();
      return element !== undefined && !element.state.disposed;
    },
    get lifecycle(): StateLifecycle {
      return lookup()?.state.lifecycle ?? "defunct";
    },
    setState(fn?: () => unknown): void {
      const element = lookup();
      if (element === undefined || element.state.disposed) {
        throw new TrellisError(
          "TRELLIS_INVALID_STATE",
          `setState() called after dispose() (element #${String(id)}). ` +
            "Cancel timers and listeners in dispose(), or check state.mounted first.",
        );
      }
      if (element.lifecycle === "initial") {
        throw new TrellisError(
          "TRELLIS_INVALID_STATE",
          `setState() called before ${describeElement(element)} was mounted`,
        );
      }
      if (fn !== undefined) {
        const result = fn();
        if (isPromiseLike(result)) throw asyncCallbackError(element, "setState callback");
      }
      if (element.lifecycle === "inactive" && element.owner.options.devMode) {
        warnDev(
          `[trellis][state] setState() called on ${describeElement(element)} while it is inactive; ` +
            "it rebuilds when reactivated",
        );
      }
      markNeedsBuild(element);
    },
  });
}

/** initState, didChangeDependencies, then the first build. */
export function firstBuildStateful(element: StatefulElement): void {
  const state = element.state;
  element.allowIgnoredMarkNeedsBuild = true;
  try {
    const result: unknown = state.logic.initState?.(state.handle);
    if (isPromiseLike(result)) throw asyncCallbackError(element, "initState");
  } finally {
    element.allowIgnoredMarkNeedsBuild = false;
  }
  state.lifecycle = "initialized";
  state.logic.didChangeDependencies?.(state.handle);
  state.lifecycle = "ready";
  rebuild(element);
}

export function updateStateful(element: StatefulElement, next: StatefulWidget): void {
  const oldProps = element.widget.props;
  element.widget = next;
  element.dirty = true;
  const result: unknown = element.state.logic.didUpdateWidget?.(element.state.handle, oldProps);
  if (isPromiseLike(result)) throw asyncCallbackError(element, "didUpdateWidget");
  rebuild(element);
}

/** Runs before each build that follows a dependency change. */
export function flushDependencyChange(element: StatefulElement): void {
  if (!element.didChangeDependenciesPending) return;
  element.didChangeDependenciesPending = false;
  element.state.logic.didChangeDependencies?.(element.state.handle);
}

export function disposeState(element: StatefulElement): void {
  const state = element.state;
  // initState never completed: nothing was set up, so nothing is torn down.
  if (state.lifecycle !== "created") state.logic.dispose?.(state.handle);
  state.lifecycle = "defunct";
  state.disposed = true;
}
