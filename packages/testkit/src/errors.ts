/**
 * packages/testkit/src/errors.ts — Assertions on coded errors.
 *
 * The testkit does not depend on the core package, so errors are matched by
 * their `code` property rather than by class.
 */

import { strict as assert } from "node:assert";

function codeOf(error: unknown): unknown {
  if (typeof error !== "object" || error === null) return undefined;
  return Reflect.get(error, "code");
}

/**
 * Run `fn` and require it to throw an error whose `code` is `code`.
 *
 * @returns the thrown error, for further assertions on message or detail
 */
export function expectTrellisError(fn: () => unknown, code: string): Error {
  let thrown: unknown;
  let threw = false;
  try {
    fn();
  } catch (error) {
    threw = true;
    thrown = error;
  }
  assert.ok(threw, `expected an error with code ${code}, but nothing was thrown`);
  assert.ok(thrown instanceof Error, `expected an Error with code ${code}, got ${String(thrown)}`);
  assert.equal(codeOf(thrown), code, `unexpected error: ${thrown.message}`);
  return thrown;
}
