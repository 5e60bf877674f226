/**
 * @trellis-ui/core
 *
 * Retained-mode reconciliation engine: widgets describe the tree, elements keep
 * identity and state, and render widgets drive a host-supplied backing tree.
 * This package MUST NOT use Node-specific APIs (Buffer, worker_threads, node:* imports).
 */

// =============================================================================
// Errors and configuration
// =============================================================================

export {
  TrellisError,
  isTrellisError,
  type TrellisErrorCode,
  type TrellisErrorDetail,
} from "./errors.js";

export {
  DEFAULT_DEV_MODE,
  createDefaultErrorWidgetBuilder,
  normalizeBuildOwnerOptions,
  type BuildErrorDetails,
  type BuildOwnerOptions,
  type ErrorWidgetBuilder,
  type NormalizedBuildOwnerOptions,
  type TraceFlags,
} from "./config.js";

// =============================================================================
// Keys
// =============================================================================

export {
  describeKey,
  globalKey,
  globalObjectKey,
  hashKey,
  isGlobalKey,
  keysEqual,
  objectKey,
  uniqueKey,
  valueKey,
  type GlobalKey,
  type GlobalObjectKey,
  type Key,
  type KeyValue,
  type LabeledGlobalKey,
  type LocalKey,
  type ObjectKey,
  type UniqueKey,
  type ValueKey,
} from "./keys/keys.js";
export { KeyMap } from "./keys/keyMap.js";

// =============================================================================
// Widgets
// =============================================================================

export {
  defineInherited,
  defineInheritedModel,
  defineLeafRender,
  defineMultiChildRender,
  defineParentData,
  defineProxy,
  defineSingleChildRender,
  defineStateful,
  defineStateless,
  type InheritedFactory,
  type InheritedModelHooks,
  type LeafRenderFactory,
  type MultiChildHooks,
  type MultiChildRenderFactory,
  type ParentDataFactory,
  type ProxyFactory,
  type ProxyHooks,
  type RenderHooks,
  type SingleChildHooks,
  type SingleChildRenderFactory,
  type StatefulFactory,
  type StatelessFactory,
} from "./widgets/define.js";
export { canUpdate, describeWidget } from "./widgets/widget.js";
export {
  ErrorWidget,
  errorMessageFor,
  errorWidgetDefinition,
  isErrorBox,
  type ErrorBox,
  type ErrorWidgetProps,
} from "./widgets/errorWidget.js";
export type {
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
  ProxyLikeWidget,
  ProxyWidget,
  SingleChildRenderDefinition,
  SingleChildRenderWidget,
  StateHandle,
  StateLifecycle,
  StateLogic,
  StatefulDefinition,
  StatefulWidget,
  StatelessDefinition,
  StatelessWidget,
  Widget,
  WidgetDefinition,
  WidgetKind,
  WidgetProps,
} from "./widgets/types.js";

// =============================================================================
// Runtime
// =============================================================================

export { createBuildOwner, type BuildOwner } from "./runtime/owner.js";
export { attachRootWidget, type RootHandle, type RootHost } from "./runtime/root.js";
export {
  validateSiblingKeys,
  type ReconcileFatal,
  type ReconcileResult,
} from "./runtime/reconcile.js";
export type { ElementLifecycle } from "./runtime/element.js";
export type { InstanceId } from "./runtime/instance.js";
