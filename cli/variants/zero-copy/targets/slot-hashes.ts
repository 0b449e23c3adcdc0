/**
 * Slot-hash targets for the zero-copy environment.
 *
 * The sysvar's address and owner are trusted; only the length prefix is
 * checked so reads stay inside the account.
 *
 * @module
 */

import { DONE, failed, ok } from "../../../harness/outcome.ts";
import type {
  Outcome,
  ProgramContext,
  RunError,
  Target,
  TargetDescriptor,
} from "../../../harness/types.ts";
import {
  SLOT_HASHES_GET_ENTRY,
  SLOT_HASHES_POSITION_BINARY,
  SLOT_HASHES_POSITION_INTERPOLATED,
  SLOT_HASHES_POSITION_NAIVE,
} from "../../../targets/catalog.ts";
import { parseU64 } from "../../../targets/setup-data.ts";
import {
  createSlotReader,
  entryCount,
  hashAt,
  positionBinary,
  positionInterpolated,
  positionNaive,
  type SlotReader,
} from "../../../targets/slot-hashes.ts";
import { ZERO_COPY_COSTS, type AccountView } from "../accounts.ts";

interface SlotInstance {
  program: ProgramContext;
  value: bigint;
}

function withSlotHashes(
  program: ProgramContext,
  accounts: readonly AccountView[],
  fn: (reader: SlotReader, data: Uint8Array) => Outcome<void, RunError>,
): Outcome<void, RunError> {
  const [account] = accounts;
  if (!account) {
    return failed("NotEnoughAccountKeys: slot hashes sysvar is missing");
  }
  program.syscalls.consume(ZERO_COPY_COSTS.borrow);
  const data = account.borrowDataUnchecked();
  const count = entryCount(data);
  if (typeof count === "string") {
    return failed(`InvalidAccountData: ${count}`);
  }
  return fn(
    createSlotReader(data, count, () => program.syscalls.consume(ZERO_COPY_COSTS.slotRead)),
    data,
  );
}

function setupSlot(what: string) {
  return (
    program: ProgramContext,
    _accounts: readonly AccountView[],
    data: Uint8Array,
  ) => {
    const value = parseU64(data, what);
    if (!value.ok) return value;
    return ok({ program, value: value.value });
  };
}

export const getEntry: Target<AccountView, SlotInstance> = {
  descriptor: SLOT_HASHES_GET_ENTRY,
  setup: setupSlot("entry index"),
  run({ program, value }, accounts) {
    return withSlotHashes(program, accounts, (reader, data) => {
      if (value >= BigInt(reader.length)) {
        return failed(`InvalidArgument: entry ${value} of ${reader.length}`);
      }
      const index = Number(value);
      reader.slotAt(index);
      hashAt(data, index);
      return DONE;
    });
  },
};

/**
 * A position target for one search routine.
 */
function positionTarget(
  descriptor: TargetDescriptor,
  search: (reader: SlotReader, slot: bigint) => number | undefined,
): Target<AccountView, SlotInstance> {
  return {
    descriptor,
    setup: setupSlot("target slot"),
    run({ program, value }, accounts) {
      return withSlotHashes(program, accounts, (reader) => {
        search(reader, value);
        return DONE;
      });
    },
  };
}

export const positionNaiveTarget = positionTarget(
  SLOT_HASHES_POSITION_NAIVE,
  positionNaive,
);

export const positionInterpolatedTarget = positionTarget(
  SLOT_HASHES_POSITION_INTERPOLATED,
  positionInterpolated,
);

export const positionBinaryTarget = positionTarget(
  SLOT_HASHES_POSITION_BINARY,
  positionBinary,
);
