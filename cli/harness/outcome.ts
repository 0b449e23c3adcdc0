/**
 * Constructors for target outcomes and a formatter for dispatch errors.
 *
 * @module
 */

import type {
  DispatchError,
  Outcome,
  RunError,
  SetupError,
} from "./types.ts";

/**
 * Shared success value for steps that produce nothing.
 */
export const DONE: Outcome<void, never> = { ok: true, value: undefined };

export function ok<T>(value: T): Outcome<T, never> {
  return { ok: true, value };
}

export function invalidData(reason: string): Outcome<never, SetupError> {
  return { ok: false, error: { kind: "InvalidData", reason } };
}

export function failed(cause: string): Outcome<never, RunError> {
  return { ok: false, error: { kind: "Failed", cause } };
}

/**
 * Render a dispatch error as a single line for logs and reports.
 */
export function describeDispatchError(error: DispatchError): string {
  switch (error.kind) {
    case "Truncated":
      return `Truncated instruction (${error.length} byte(s))`;
    case "UnknownTarget":
      return `UnknownTarget(${error.targetId})`;
    case "Setup":
      return `Setup failed for target ${error.targetId}: InvalidData: ${error.error.reason}`;
    case "Run":
      return `Run failed for target ${error.targetId}: ${error.error.cause}`;
    default: {
      const _exhaustive: never = error;
      throw new Error(`Unknown dispatch error: ${JSON.stringify(_exhaustive)}`);
    }
  }
}
