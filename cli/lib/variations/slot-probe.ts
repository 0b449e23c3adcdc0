/**
 * `slot-probe`: positions to look up in generated slot-hash data.
 *
 * The data is rebuilt from `pattern` and `entries`; each record names a
 * probe index and the slot stored there. Indices are spread evenly over
 * the data and emitted from last to first, without repeats.
 *
 * @module
 */

import { z } from "zod";
import { MAX_ENTRIES } from "../../targets/slot-hashes.ts";
import { SLOT_PATTERNS, generateSlotHashEntries } from "../fixtures.ts";
import type { VariationStrategy } from "./types.ts";

const SlotProbeSchema = z.object({
  pattern: z.enum(SLOT_PATTERNS),
  entries: z.number().int().min(1).max(MAX_ENTRIES).default(MAX_ENTRIES),
  probes: z.number().int().min(2).max(64).default(10),
});

export const slotProbe: VariationStrategy<z.infer<typeof SlotProbeSchema>> = {
  name: "slot-probe",
  schema: SlotProbeSchema,
  generate(_target, { pattern, entries, probes }) {
    const data = generateSlotHashEntries(pattern, entries);
    const last = data.length - 1;

    const indices: number[] = [];
    for (let k = probes - 1; k >= 0; k--) {
      const index = Math.floor((last * k) / (probes - 1));
      if (indices[indices.length - 1] !== index) {
        indices.push(index);
      }
    }

    return indices.map((index) => ({
      strategy: "slot-probe",
      parameters: {
        pattern,
        entries: data.length,
        index,
        slot: Number(data[index].slot),
      },
    }));
  },
};
