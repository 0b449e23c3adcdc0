/**
 * The built-in system program both environments invoke for lamport
 * transfers and account creation.
 *
 * It runs on any account type that exposes the fields below, so the
 * checks and the metering are identical across variants; what differs is
 * the bookkeeping each environment does before it gets here.
 *
 * @module
 */

import { DONE, failed } from "../harness/outcome.ts";
import { SYSTEM_CALL_COST } from "../harness/meter.ts";
import type { Outcome, RunError, Syscalls } from "../harness/types.ts";
import { SYSTEM_PROGRAM_ID } from "./addresses.ts";
import { U64_MAX } from "./codec.ts";

/** Largest account the system program will allocate */
export const MAX_PERMITTED_DATA_LENGTH = 10 * 1024 * 1024;

/** Allocated bytes covered by one extra unit of cost */
export const ALLOCATION_BYTES_PER_UNIT = 250;

/**
 * What the system program needs from an account.
 */
export interface SystemAccount {
  readonly key: string;
  readonly owner: string;
  readonly lamports: bigint;
  readonly dataLength: number;
  readonly isSigner: boolean;
  readonly isWritable: boolean;
  setLamports(value: bigint): void;
  /** Resize to `space` zeroed bytes; false when it does not fit */
  allocate(space: number): boolean;
  assign(owner: string): void;
}

function short(key: string): string {
  return `${key.slice(0, 8)}…`;
}

function moveLamports(
  from: SystemAccount,
  to: SystemAccount,
  lamports: bigint,
): Outcome<void, RunError> {
  if (!from.isSigner) {
    return failed(`MissingRequiredSignature: ${short(from.key)}`);
  }
  if (!from.isWritable || !to.isWritable) {
    return failed("ReadonlyLamportChange: transfer accounts must be writable");
  }
  if (from.owner !== SYSTEM_PROGRAM_ID || from.dataLength !== 0) {
    return failed(`InvalidAccountData: ${short(from.key)} is not a plain system account`);
  }
  if (from.lamports < lamports) {
    return failed(`InsufficientFunds: ${from.lamports} < ${lamports}`);
  }
  if (to.lamports + lamports > U64_MAX) {
    return failed(`ArithmeticOverflow: ${short(to.key)} cannot hold ${to.lamports} + ${lamports}`);
  }

  from.setLamports(from.lamports - lamports);
  to.setLamports(to.lamports + lamports);
  return DONE;
}

/**
 * Move lamports from a system-owned signer to a writable account.
 */
export function transfer(
  syscalls: Syscalls,
  from: SystemAccount,
  to: SystemAccount,
  lamports: bigint,
): Outcome<void, RunError> {
  syscalls.consume(SYSTEM_CALL_COST);
  return moveLamports(from, to, lamports);
}

/**
 * Fund, allocate and assign a fresh account.
 */
export function createAccount(
  syscalls: Syscalls,
  payer: SystemAccount,
  created: SystemAccount,
  lamports: bigint,
  space: number,
  owner: string,
): Outcome<void, RunError> {
  syscalls.consume(
    SYSTEM_CALL_COST + Math.floor(space / ALLOCATION_BYTES_PER_UNIT),
  );

  if (!created.isSigner) {
    return failed(`MissingRequiredSignature: ${short(created.key)}`);
  }
  if (created.lamports !== 0n || created.dataLength !== 0) {
    return failed(`AccountAlreadyInUse: ${short(created.key)}`);
  }
  if (space > MAX_PERMITTED_DATA_LENGTH) {
    return failed(`InvalidRealloc: ${space} exceeds ${MAX_PERMITTED_DATA_LENGTH}`);
  }

  const funded = moveLamports(payer, created, lamports);
  if (!funded.ok) {
    return funded;
  }
  if (!created.allocate(space)) {
    return failed(`InvalidRealloc: ${space} byte(s) do not fit ${short(created.key)}`);
  }
  created.assign(owner);
  return DONE;
}
