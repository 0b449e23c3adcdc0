/**
 * Cases for the slot-hash lookups.
 *
 * Every record carries the fixture's pattern and size, so `build`
 * regenerates the same sysvar data the strategy probed.
 *
 * @module
 */

import { z } from "zod";
import type { TargetDescriptor } from "../../harness/types.ts";
import {
  SLOT_HASHES_GET_ENTRY,
  SLOT_HASHES_POSITION_BINARY,
  SLOT_HASHES_POSITION_INTERPOLATED,
  SLOT_HASHES_POSITION_NAIVE,
} from "../../targets/catalog.ts";
import { encodeU64 } from "../../targets/codec.ts";
import {
  SLOT_PATTERNS,
  generateSlotHashEntries,
  slotHashesAccount,
} from "../fixtures.ts";
import type { VariationRecord } from "../schema.ts";
import { intParam, stringParam, type BenchCase, type CaseInput } from "./types.ts";

const SlotPatternSchema = z.enum(SLOT_PATTERNS);

const probes = SLOT_PATTERNS.map((pattern) => ({
  strategy: "slot-probe",
  parameters: { pattern },
}));

function slotHashesInput(record: VariationRecord, setupValue: number): CaseInput {
  const pattern = SlotPatternSchema.parse(stringParam(record, "pattern"));
  const entries = generateSlotHashEntries(pattern, intParam(record, "entries"));
  return {
    setupData: encodeU64(BigInt(setupValue)),
    accounts: [slotHashesAccount(entries)],
  };
}

export const getEntryCase: BenchCase = {
  target: SLOT_HASHES_GET_ENTRY,
  variations: probes,
  build: (record) => slotHashesInput(record, intParam(record, "index")),
};

function positionCase(target: TargetDescriptor): BenchCase {
  return {
    target,
    variations: probes,
    build: (record) => slotHashesInput(record, intParam(record, "slot")),
  };
}

export const positionNaiveCase = positionCase(SLOT_HASHES_POSITION_NAIVE);
export const positionInterpolatedCase = positionCase(SLOT_HASHES_POSITION_INTERPOLATED);
export const positionBinaryCase = positionCase(SLOT_HASHES_POSITION_BINARY);
