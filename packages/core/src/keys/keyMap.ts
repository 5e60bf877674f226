/**
 * packages/core/src/keys/keyMap.ts — Map keyed by identity keys.
 *
 * Value keys are compared structurally, so a plain Map over key objects would
 * miss `valueKey(1)` against another `valueKey(1)`. Entries are bucketed by
 * `hashKey` and resolved with `keysEqual`.
 */

import { type Key, hashKey, keysEqual } from "./keys.js";

type Entry<V> = { readonly key: Key; value: V };

export class KeyMap<V> {
  private readonly buckets = new Map<number, Entry<V>[]>();
  private count = 0;

  get size(): number {
    return this.count;
  }

  get(key: Key): V | undefined {
    return this.find(key)?.value;
  }

  has(key: Key): boolean {
    return this.find(key) !== undefined;
  }

  set(key: Key, value: V): this {
    const hash = hashKey(key);
    const bucket = this.buckets.get(hash);
    if (bucket === undefined) {
      this.buckets.set(hash, [{ key, value }]);
      this.count++;
      return this;
    }
    for (const entry of bucket) {
      if (keysEqual(entry.key, key)) {
        entry.value = value;
        return this;
      }
    }
    bucket.push({ key, value });
    this.count++;
    return this;
  }

  delete(key: Key): boolean {
    const hash = hashKey(key);
    const bucket = this.buckets.get(hash);
    if (bucket === undefined) return false;
    const index = bucket.findIndex((entry) => keysEqual(entry.key, key));
    if (index < 0) return false;
    bucket.splice(index, 1);
    if (bucket.length === 0) this.buckets.delete(hash);
    this.count--;
    return true;
  }

  clear(): void {
    this.buckets.clear();
    this.count = 0;
  }

  *entries(): IterableIterator<[Key, V]> {
    for (const bucket of this.buckets.values()) {
      for (const entry of bucket) yield [entry.key, entry.value];
    }
  }

  *values(): IterableIterator<V> {
    for (const [, value] of this.entries()) yield value;
  }

  private find(key: Key): Entry<V> | undefined {
    const bucket = this.buckets.get(hashKey(key));
    return bucket?.find((entry) => keysEqual(entry.key, key));
  }
}
