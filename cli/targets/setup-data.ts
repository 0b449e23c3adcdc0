/**
 * Setup-data parsers shared by both environments.
 *
 * Each returns `InvalidData` for malformed bytes; none of them touch
 * accounts.
 *
 * @module
 */

import { invalidData, ok } from "../harness/outcome.ts";
import { MAX_RETURN_DATA } from "../harness/meter.ts";
import type { Outcome, SetupError } from "../harness/types.ts";
import { readU64 } from "./codec.ts";

export const DEFAULT_LOG_MESSAGE = "Instruction: Log";

const utf8 = new TextDecoder("utf-8", { fatal: true });

function exactly(data: Uint8Array, bytes: number, what: string): SetupError | undefined {
  if (data.length !== bytes) {
    return {
      kind: "InvalidData",
      reason: `${what} expects ${bytes} byte(s), got ${data.length}`,
    };
  }
  return undefined;
}

/**
 * Echo payload: any bytes that fit in return data.
 */
export function parseEchoPayload(data: Uint8Array): Outcome<Uint8Array, SetupError> {
  if (data.length > MAX_RETURN_DATA) {
    return invalidData(`echo payload of ${data.length} bytes exceeds ${MAX_RETURN_DATA}`);
  }
  return ok(data);
}

/**
 * Log message: UTF-8, or the default message when empty.
 */
export function parseLogMessage(data: Uint8Array): Outcome<string, SetupError> {
  if (data.length === 0) {
    return ok(DEFAULT_LOG_MESSAGE);
  }
  try {
    return ok(utf8.decode(data));
  } catch {
    return invalidData("log message is not valid UTF-8");
  }
}

/**
 * A single u64 (expected account count, lamports, slot or index).
 */
export function parseU64(data: Uint8Array, what: string): Outcome<bigint, SetupError> {
  const error = exactly(data, 8, what);
  if (error) return { ok: false, error };
  const value = readU64(data);
  return value === undefined ? invalidData(`${what} is missing its u64`) : ok(value);
}

/**
 * Number of accounts to read: one byte.
 */
export function parseReadCount(data: Uint8Array): Outcome<number, SetupError> {
  const error = exactly(data, 1, "account read");
  if (error) return { ok: false, error };
  return ok(data[0]);
}

/**
 * Create-account parameters: `lamports:u64 space:u64`.
 */
export function parseCreateAccount(
  data: Uint8Array,
): Outcome<{ lamports: bigint; space: number }, SetupError> {
  const error = exactly(data, 16, "create account");
  if (error) return { ok: false, error };
  const lamports = readU64(data, 0);
  const space = readU64(data, 8);
  if (lamports === undefined || space === undefined) {
    return invalidData("create account is missing its u64 fields");
  }
  if (space > BigInt(Number.MAX_SAFE_INTEGER)) {
    return invalidData(`create account space ${space} is out of range`);
  }
  return ok({ lamports, space: Number(space) });
}
