/**
 * Account fixtures for benchmark cases.
 *
 * Every address and every byte here is derived from explicit inputs, so
 * rebuilding a fixture from a variation record always gives the same
 * accounts.
 *
 * @module
 */

import type { AccountFixture } from "../harness/input.ts";
import {
  SLOT_HASHES_SYSVAR_ID,
  SYSTEM_PROGRAM_ID,
  SYSVAR_PROGRAM_ID,
  seededAddress,
} from "../targets/addresses.ts";
import {
  HASH_SIZE,
  MAX_ENTRIES,
  encodeSlotHashes,
  type SlotHashEntry,
} from "../targets/slot-hashes.ts";

/** Starting balance of funded fixture accounts */
export const BASE_LAMPORTS = 2_000_000_000n;

/** Newest slot in generated slot-hash data */
export const SLOT_HASHES_START_SLOT = 10_000n;

/** Address tags keep fixture roles apart */
const TAG_PAYER = 0xa1;
const TAG_RECIPIENT = 0xa2;
const TAG_READONLY = 0xa3;

/**
 * How consecutive slot-hash entries step down.
 * - `strictly-1`: always 1
 * - `avg-1.05`: 2 one time in 20, otherwise 1
 * - `avg-2`: 1 or 3 with equal odds
 */
export const SLOT_PATTERNS = ["strictly-1", "avg-1.05", "avg-2"] as const;

export type SlotPattern = (typeof SLOT_PATTERNS)[number];

/**
 * Lehmer / MINSTD step. A zero seed is treated as 1.
 */
export function minstd(seed: number): number {
  const state = seed === 0 ? 1 : seed;
  return Number((16807n * BigInt(state)) % 2147483647n);
}

function slotDecrement(pattern: SlotPattern, index: number): bigint {
  const r = minstd(index);
  switch (pattern) {
    case "strictly-1":
      return 1n;
    case "avg-1.05":
      return r % 20 === 0 ? 2n : 1n;
    case "avg-2":
      return r % 2 === 0 ? 1n : 3n;
    default: {
      const _exhaustive: never = pattern;
      throw new Error(`Unknown slot pattern: ${_exhaustive}`);
    }
  }
}

/**
 * Slot-hash entries, newest first. Generation stops early if the slot
 * would stop decreasing, so the result is strictly descending.
 */
export function generateSlotHashEntries(
  pattern: SlotPattern,
  count: number = MAX_ENTRIES,
): SlotHashEntry[] {
  if (!Number.isInteger(count) || count < 1 || count > MAX_ENTRIES) {
    throw new RangeError(`Entry count must be in 1..${MAX_ENTRIES}, got ${count}`);
  }

  const entries: SlotHashEntry[] = [];
  let slot = SLOT_HASHES_START_SLOT;
  for (let i = 0; i < count; i++) {
    entries.push({ slot, hash: new Uint8Array(HASH_SIZE).fill(i % 256) });

    const decrement = slotDecrement(pattern, i);
    const next = slot > decrement ? slot - decrement : 0n;
    if (next === slot) {
      break;
    }
    slot = next;
  }
  return entries;
}

/**
 * The slot-hashes sysvar account holding `entries`.
 */
export function slotHashesAccount(entries: readonly SlotHashEntry[]): AccountFixture {
  return {
    key: SLOT_HASHES_SYSVAR_ID,
    owner: SYSVAR_PROGRAM_ID,
    lamports: 1n,
    data: encodeSlotHashes(entries),
    isSigner: false,
    isWritable: false,
    executable: false,
  };
}

/**
 * A funded, writable, signing system account.
 */
export function payerAccount(seed = 0): AccountFixture {
  return {
    key: seededAddress(TAG_PAYER, seed),
    owner: SYSTEM_PROGRAM_ID,
    lamports: BASE_LAMPORTS,
    data: new Uint8Array(0),
    isSigner: true,
    isWritable: true,
    executable: false,
  };
}

/**
 * An empty writable account. It signs when it is about to be created.
 */
export function emptyAccount(seed = 0, isSigner = false): AccountFixture {
  return {
    key: seededAddress(TAG_RECIPIENT, seed),
    owner: SYSTEM_PROGRAM_ID,
    lamports: 0n,
    data: new Uint8Array(0),
    isSigner,
    isWritable: true,
    executable: false,
  };
}

/**
 * `count` funded read-only accounts, each holding `dataLen` bytes.
 */
export function readonlyAccounts(count: number, dataLen = 0): AccountFixture[] {
  return Array.from({ length: count }, (_, i) => ({
    key: seededAddress(TAG_READONLY, i),
    owner: SYSTEM_PROGRAM_ID,
    lamports: BASE_LAMPORTS,
    data: new Uint8Array(dataLen).fill((i + 1) % 256),
    isSigner: false,
    isWritable: false,
    executable: false,
  }));
}
