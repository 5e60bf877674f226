/**
 * packages/core/src/errors.ts — Error codes and the TrellisError class.
 *
 * Why: Every contract violation the engine detects surfaces as one error type
 * with a deterministic code, so hosts and tests can branch on `code` instead of
 * parsing messages. Build failures inside user code are not TrellisErrors; they
 * are reported and replaced by a stand-in widget.
 */

/**
 * Deterministic error codes for all runtime violations.
 * These are surfaced as TrellisError instances.
 */
export type TrellisErrorCode =
  | "TRELLIS_INVALID_STATE"
  | "TRELLIS_REENTRANT_CALL"
  | "TRELLIS_UPDATE_DURING_BUILD"
  | "TRELLIS_ASYNC_CALLBACK"
  | "TRELLIS_DUPLICATE_GLOBAL_KEY"
  | "TRELLIS_DUPLICATE_KEY"
  | "TRELLIS_INVARIANT"
  | "TRELLIS_USER_CODE_THROW";

/** Structured context attached to an error (creator chains, keys). */
export type TrellisErrorDetail = Readonly<Record<string, unknown>>;

export class TrellisError extends Error {
  override readonly name = "TrellisError";
  readonly code: TrellisErrorCode;
  readonly detail: TrellisErrorDetail | undefined;

  constructor(code: TrellisErrorCode, message?: string, detail?: TrellisErrorDetail) {
    super(message ?? code);
    this.code = code;
    this.detail = detail;

    // Maintain proper stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, TrellisError);
    }
  }
}

export function isTrellisError(value: unknown): value is TrellisError {
  return value instanceof TrellisError;
}

/** Internal consistency failure: always a bug in the engine, never user error. */
export function invariant(message: string, detail?: TrellisErrorDetail): TrellisError {
  return new TrellisError("TRELLIS_INVARIANT", `[trellis] invariant violated: ${message}`, detail);
}

/**
 * Normalize anything thrown by user code into an Error.
 * Non-Error throwables are wrapped so reporters always get a stack.
 */
export function toError(thrown: unknown): Error {
  if (thrown instanceof Error) return thrown;
  let text: string;
  try {
    text = typeof thrown === "string" ? thrown : JSON.stringify(thrown) ?? String(thrown);
  } catch {
    text = String(thrown);
  }
  return new TrellisError(
    "TRELLIS_USER_CODE_THROW",
    `Non-Error value thrown from user code: ${text}`,
    { thrown },
  );
}

/** True when `value` looks like a promise (has a callable `then`). */
export function isPromiseLike(value: unknown): value is PromiseLike<unknown> {
  if (value === null || (typeof value !== "object" && typeof value !== "function")) return false;
  const then: unknown = Reflect.get(value, "then");
  return typeof then === "function";
}
