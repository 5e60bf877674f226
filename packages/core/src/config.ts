/**
 * packages/core/src/config.ts — Build owner options.
 *
 * Why: Options are normalized once when the owner is created, so the hot paths
 * read plain fields instead of re-applying defaults.
 */

import { reportToConsole, consoleTraceSink } from "./runtime/diagnostics.js";
import { ErrorWidget, errorMessageFor } from "./widgets/errorWidget.js";
import type { BuildContext, Widget } from "./widgets/types.js";

export type TraceFlags = Readonly<{
  /** Log every scheduleRebuild call. */
  scheduleBuild: boolean;
  /** Log build scope start and end with the dirty count. */
  buildScope: boolean;
  /** Log each element rebuilt from the dirty list. */
  rebuild: boolean;
  /** Log global-keyed elements moving between parents. */
  globalKeyLifecycle: boolean;
}>;

/** What the error reporter receives for a failed build. */
export type BuildErrorDetails = Readonly<{
  error: unknown;
  /** e.g. "while building Counter-[<1>]#12" */
  context: string;
  element: BuildContext;
  /** Creator chain of the failing element, nearest first. */
  chain: string;
}>;

export type ErrorWidgetBuilder = (details: BuildErrorDetails) => Widget | null;

export type BuildOwnerOptions = Readonly<{
  onBuildScheduled?: (() => void) | undefined;
  onError?: ((details: BuildErrorDetails) => void) | undefined;
  errorWidgetBuilder?: ErrorWidgetBuilder | undefined;
  devMode?: boolean | undefined;
  trace?: Partial<TraceFlags> | undefined;
  traceSink?: ((line: string) => void) | undefined;
}>;

export type NormalizedBuildOwnerOptions = Readonly<{
  onBuildScheduled: (() => void) | null;
  onError: (details: BuildErrorDetails) => void;
  errorWidgetBuilder: ErrorWidgetBuilder;
  devMode: boolean;
  trace: TraceFlags;
  traceSink: (line: string) => void;
}>;

const NODE_ENV =
  (globalThis as { process?: { env?: { NODE_ENV?: string } } }).process?.env?.NODE_ENV ??
  "development";

export const DEFAULT_DEV_MODE = NODE_ENV !== "production";

export function createDefaultErrorWidgetBuilder(devMode: boolean): ErrorWidgetBuilder {
  return (details) => ErrorWidget({ message: errorMessageFor(details.error, devMode), error: details.error });
}

export function normalizeBuildOwnerOptions(options: BuildOwnerOptions = {}): NormalizedBuildOwnerOptions {
  const devMode = options.devMode ?? DEFAULT_DEV_MODE;
  const trace = options.trace ?? {};
  return Object.freeze({
    onBuildScheduled: options.onBuildScheduled ?? null,
    onError: options.onError ?? reportToConsole,
    errorWidgetBuilder: options.errorWidgetBuilder ?? createDefaultErrorWidgetBuilder(devMode),
    devMode,
    trace: Object.freeze({
      scheduleBuild: trace.scheduleBuild ?? false,
      buildScope: trace.buildScope ?? false,
      rebuild: trace.rebuild ?? false,
      globalKeyLifecycle: trace.globalKeyLifecycle ?? false,
    }),
    traceSink: options.traceSink ?? consoleTraceSink,
  });
}
