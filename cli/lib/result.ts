/**
 * Result type for collecting measured combinations and failures
 * without aborting the whole sweep.
 *
 * @module
 */

import type { Operation } from "effection";

/**
 * A discriminated union representing success or failure.
 */
export type Result<T> =
  | { ok: true; value: T }
  | { ok: false; error: Error; context: string };

/**
 * Convert an unknown caught value to an Error.
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Run an operation, turning a thrown error into a failed Result.
 *
 * @param context - Identifier for error reporting (the combination label)
 */
export function* wrapResult<T>(
  context: string,
  op: Operation<T>,
): Operation<Result<T>> {
  try {
    const value = yield* op;
    return { ok: true, value };
  } catch (error: unknown) {
    return { ok: false, error: toError(error), context };
  }
}
