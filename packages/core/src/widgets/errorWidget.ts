/**
 * packages/core/src/widgets/errorWidget.ts — Stand-in shown where a build failed.
 *
 * Each ErrorWidget carries a fresh unique key, so a failed subtree is never
 * updated in place: the next successful build replaces it outright.
 */

import { uniqueKey } from "../keys/keys.js";
import { defineLeafRender } from "./define.js";
import type { LeafRenderWidget } from "./types.js";

/** Backing node produced for an ErrorWidget. Hosts render it however they like. */
export type ErrorBox = { readonly kind: "errorBox"; readonly message: string };

export type ErrorWidgetProps = Readonly<{ message: string; error: unknown }>;

export function isErrorBox(node: object): node is ErrorBox {
  return Reflect.get(node, "kind") === "errorBox" && typeof Reflect.get(node, "message") === "string";
}

const ErrorWidgetFactory = defineLeafRender<ErrorWidgetProps, ErrorBox>("ErrorWidget", {
  createBackingNode: (props) => ({ kind: "errorBox", message: props.message }),
});

export const errorWidgetDefinition = ErrorWidgetFactory.definition;

export function ErrorWidget(props: ErrorWidgetProps): LeafRenderWidget<ErrorWidgetProps> {
  return ErrorWidgetFactory({ ...props, key: uniqueKey("ErrorWidget") });
}

/** Message for the stand-in: the error text in dev mode, empty otherwise. */
export function errorMessageFor(error: unknown, devMode: boolean): string {
  if (!devMode) return "";
  if (error instanceof Error) return `${error.name}: ${error.message}`;
  return String(error);
}
