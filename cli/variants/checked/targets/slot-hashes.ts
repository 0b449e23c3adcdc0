/**
 * Slot-hash targets for the checked environment.
 *
 * The sysvar account is validated (address, owner, layout) before any
 * entry is read.
 *
 * @module
 */

import { DONE, failed, ok } from "../../../harness/outcome.ts";
import type {
  Outcome,
  ProgramContext,
  RunError,
  Target,
} from "../../../harness/types.ts";
import {
  SLOT_HASHES_SYSVAR_ID,
  SYSVAR_PROGRAM_ID,
} from "../../../targets/addresses.ts";
import {
  SLOT_HASHES_GET_ENTRY,
  SLOT_HASHES_POSITION_BINARY,
} from "../../../targets/catalog.ts";
import { parseU64 } from "../../../targets/setup-data.ts";
import {
  createSlotReader,
  entryCount,
  hashAt,
  positionBinary,
  type SlotReader,
} from "../../../targets/slot-hashes.ts";
import { CHECKED_COSTS, type CheckedAccount } from "../accounts.ts";

interface SlotInstance {
  program: ProgramContext;
  value: bigint;
}

/**
 * Validate the sysvar and read from it under a shared borrow.
 */
function withSlotHashes<T>(
  program: ProgramContext,
  accounts: readonly CheckedAccount[],
  fn: (reader: SlotReader, data: Uint8Array) => Outcome<T, RunError>,
): Outcome<T, RunError> {
  const [account] = accounts;
  if (!account) {
    return failed("NotEnoughAccountKeys: slot hashes sysvar is missing");
  }
  if (account.key !== SLOT_HASHES_SYSVAR_ID) {
    return failed("InvalidArgument: account 0 is not the slot hashes sysvar");
  }
  if (account.owner !== SYSVAR_PROGRAM_ID) {
    return failed("InvalidAccountOwner: slot hashes is not owned by the sysvar program");
  }

  const read = account.withData((data) => {
    const count = entryCount(data);
    if (typeof count === "string") {
      return failed(`InvalidAccountData: ${count}`);
    }
    const reader = createSlotReader(data, count, () =>
      program.syscalls.consume(CHECKED_COSTS.slotRead),
    );
    return fn(reader, data);
  });
  return read.ok ? read.value : read;
}

export const getEntry: Target<CheckedAccount, SlotInstance> = {
  descriptor: SLOT_HASHES_GET_ENTRY,
  setup(program, _accounts, data) {
    const index = parseU64(data, "entry index");
    if (!index.ok) return index;
    return ok({ program, value: index.value });
  },
  run({ program, value }, accounts) {
    return withSlotHashes<void>(program, accounts, (reader, data) => {
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

export const positionBinaryTarget: Target<CheckedAccount, SlotInstance> = {
  descriptor: SLOT_HASHES_POSITION_BINARY,
  setup(program, _accounts, data) {
    const slot = parseU64(data, "target slot");
    if (!slot.ok) return slot;
    return ok({ program, value: slot.value });
  },
  run({ program, value }, accounts) {
    return withSlotHashes<void>(program, accounts, (reader) => {
      positionBinary(reader, value);
      return DONE;
    });
  },
};
