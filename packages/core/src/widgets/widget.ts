/**
 * packages/core/src/widgets/widget.ts — Widget identity helpers.
 */

import { describeKey, keysEqual } from "../keys/keys.js";
import type { Key } from "../keys/keys.js";

type WidgetLike = Readonly<{ definition: Readonly<{ name: string }>; key: Key | undefined }>;

/**
 * Whether an element configured by `oldWidget` may be updated in place with
 * `newWidget`: same definition and equal (or absent) keys.
 */
export function canUpdate(oldWidget: WidgetLike, newWidget: WidgetLike): boolean {
  return oldWidget.definition === newWidget.definition && keysEqual(oldWidget.key, newWidget.key);
}

/** Short form used in diagnostics: `Name` or `Name-[key]`. */
export function describeWidget(widget: WidgetLike): string {
  const name = widget.definition.name;
  return widget.key === undefined ? name : `${name}-${describeKey(widget.key)}`;
}
