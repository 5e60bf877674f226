/**
 * packages/core/src/runtime/diagnostics.ts — Warnings, traces and element descriptions.
 *
 * Why: The core has no logging dependency. Everything it prints goes through
 * `globalThis.console` behind a guard, prefixed `[trellis][<area>]`.
 */

import type { BuildErrorDetails } from "../config.js";
import { describeWidget } from "../widgets/widget.js";
import type { ElementNode } from "./element.js";

type ConsoleLike = {
  warn?: (msg: string) => void;
  error?: (msg: string, err?: unknown) => void;
  debug?: (msg: string) => void;
};

function getConsole(): ConsoleLike | undefined {
  return (globalThis as { console?: ConsoleLike }).console;
}

export function warnDev(message: string): void {
  const c = getConsole();
  c?.warn?.(message);
}

export function consoleTraceSink(line: string): void {
  const c = getConsole();
  c?.debug?.(line);
}

/** Default `onError`: one console.error line plus the error object. */
export function reportToConsole(details: BuildErrorDetails): void {
  const c = getConsole();
  c?.error?.(`[trellis][build] exception caught ${details.context}\n  ${details.chain}`, details.error);
}

/** `Name-[key]#id`, the short form used in messages. */
export function describeElement(element: ElementNode): string {
  if (element.kind === "root") return `[root]#${String(element.id)}`;
  return `${describeWidget(element.widget)}#${String(element.id)}`;
}

/**
 * `Leaf ← Row ← Page ← ⋯`: the element and its ancestors, nearest first,
 * cut off after `limit` entries.
 */
export function creatorChain(
  element: ElementNode,
  lookup: (id: number) => ElementNode | undefined,
  limit = 10,
): string {
  const parts: string[] = [];
  let current: ElementNode | undefined = element;
  while (current !== undefined && parts.length < limit) {
    parts.push(current.kind === "root" ? "[root]" : describeWidget(current.widget));
    current = current.parent === null ? undefined : lookup(current.parent);
  }
  if (current !== undefined) parts.push("⋯");
  return parts.join(" ← ");
}
