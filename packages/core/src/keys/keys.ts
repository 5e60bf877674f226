/**
 * packages/core/src/keys/keys.ts — Identity keys.
 *
 * Why: Keys decide reuse versus replacement when a child list changes. Local
 * keys only have to be unique among siblings; global keys are unique in the
 * whole tree and let an element (with its state) move between parents.
 *
 * Equality rules:
 *   - unique / global: the key object itself
 *   - value: same primitive value (Object.is)
 *   - object / globalObject: same referenced object
 *
 * `hashKey` is consistent with `keysEqual`: equal keys always hash equal.
 */

export type KeyValue = string | number | boolean | bigint | null;

export type UniqueKey = Readonly<{ kind: "unique"; id: number; label: string | undefined }>;
export type ValueKey = Readonly<{ kind: "value"; value: KeyValue }>;
export type ObjectKey = Readonly<{ kind: "object"; value: object }>;
export type LabeledGlobalKey = Readonly<{ kind: "global"; id: number; label: string | undefined }>;
export type GlobalObjectKey = Readonly<{ kind: "globalObject"; value: object }>;

export type LocalKey = UniqueKey | ValueKey | ObjectKey;
export type GlobalKey = LabeledGlobalKey | GlobalObjectKey;
export type Key = LocalKey | GlobalKey;

let nextKeyId = 1;

export function uniqueKey(label?: string): UniqueKey {
  return Object.freeze({ kind: "unique", id: nextKeyId++, label });
}

export function valueKey(value: KeyValue): ValueKey {
  return Object.freeze({ kind: "value", value });
}

export function objectKey(value: object): ObjectKey {
  return Object.freeze({ kind: "object", value });
}

export function globalKey(label?: string): LabeledGlobalKey {
  return Object.freeze({ kind: "global", id: nextKeyId++, label });
}

export function globalObjectKey(value: object): GlobalObjectKey {
  return Object.freeze({ kind: "globalObject", value });
}

export function isGlobalKey(key: Key | undefined): key is GlobalKey {
  return key !== undefined && (key.kind === "global" || key.kind === "globalObject");
}

export function keysEqual(a: Key | undefined, b: Key | undefined): boolean {
  if (a === b) return true;
  if (a === undefined || b === undefined) return false;
  switch (a.kind) {
    case "unique":
    case "global":
      return false;
    case "value":
      return b.kind === "value" && Object.is(a.value, b.value);
    case "object":
      return b.kind === "object" && a.value === b.value;
    case "globalObject":
      return b.kind === "globalObject" && a.value === b.value;
  }
}

const identityIds = new WeakMap<object, number>();
let nextIdentityId = 1;

function identityHash(value: object): number {
  let id = identityIds.get(value);
  if (id === undefined) {
    id = nextIdentityId++;
    identityIds.set(value, id);
  }
  return id;
}

/** FNV-1a over UTF-16 code units, 32-bit. */
function hashString(text: string): number {
  let h = 0x811c9dc5;
  for (let i = 0; i < text.length; i++) {
    h ^= text.charCodeAt(i);
    h = Math.imul(h, 0x01000193);
  }
  return h >>> 0;
}

function mix(tag: number, value: number): number {
  return (Math.imul(tag, 31) + value) >>> 0;
}

export function hashKey(key: Key): number {
  switch (key.kind) {
    case "unique":
      return mix(1, key.id);
    case "global":
      return mix(2, key.id);
    case "value":
      return mix(3, hashString(`${typeof key.value}:${String(key.value)}`));
    case "object":
      return mix(4, identityHash(key.value));
    case "globalObject":
      return mix(5, identityHash(key.value));
  }
}

function describeValue(value: KeyValue): string {
  return typeof value === "string" ? `'${value}'` : String(value);
}

export function describeKey(key: Key): string {
  switch (key.kind) {
    case "unique":
      return key.label === undefined ? `[#${String(key.id)}]` : `[#${String(key.id)} ${key.label}]`;
    case "value":
      return `[<${describeValue(key.value)}>]`;
    case "object":
      return `[Object#${String(identityHash(key.value))}]`;
    case "global":
      return key.label === undefined
        ? `[GlobalKey#${String(key.id)}]`
        : `[GlobalKey#${String(key.id)} ${key.label}]`;
    case "globalObject":
      return `[GlobalObjectKey#${String(identityHash(key.value))}]`;
  }
}
