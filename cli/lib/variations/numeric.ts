/**
 * Numeric sweep strategies: `halving`, `decrement` and `values`.
 *
 * Each emits one integer parameter per record, strictly decreasing,
 * never below 1. The parameter key defaults to `n`.
 *
 * @module
 */

import { z } from "zod";
import type { VariationRecord } from "../schema.ts";
import type { VariationStrategy } from "./types.ts";

const KeySchema = z.string().regex(/^[a-z][a-z0-9-]*$/).default("n");

function records(
  strategy: string,
  key: string,
  values: readonly number[],
): VariationRecord[] {
  return values.map((value) => ({ strategy, parameters: { [key]: value } }));
}

const HalvingSchema = z
  .object({
    max: z.number().int().positive(),
    min: z.number().int().positive().default(1),
    key: KeySchema,
  })
  .refine((p) => p.min <= p.max, { message: "min must not exceed max" });

/**
 * `max, ⌊max/2⌋, ⌊max/4⌋, …` while the value is at least `min`.
 * `max = 100` gives `100, 50, 25, 12, 6, 3, 1`.
 */
export const halving: VariationStrategy<z.infer<typeof HalvingSchema>> = {
  name: "halving",
  schema: HalvingSchema,
  generate(_target, { max, min, key }) {
    const values: number[] = [];
    for (let value = max; value >= min; value = Math.floor(value / 2)) {
      values.push(value);
    }
    return records("halving", key, values);
  },
};

const DecrementSchema = z
  .object({
    max: z.number().int().positive(),
    step: z.number().int().positive().default(1),
    min: z.number().int().positive().default(1),
    key: KeySchema,
  })
  .refine((p) => p.min <= p.max, { message: "min must not exceed max" });

/**
 * `max, max - step, …` while the value is at least `min`.
 */
export const decrement: VariationStrategy<z.infer<typeof DecrementSchema>> = {
  name: "decrement",
  schema: DecrementSchema,
  generate(_target, { max, step, min, key }) {
    const values: number[] = [];
    for (let value = max; value >= min; value -= step) {
      values.push(value);
    }
    return records("decrement", key, values);
  },
};

const ValuesSchema = z.object({
  values: z.array(z.number().int().positive()).min(1),
  key: KeySchema,
});

/**
 * An explicit list, deduplicated and emitted largest first.
 */
export const values: VariationStrategy<z.infer<typeof ValuesSchema>> = {
  name: "values",
  schema: ValuesSchema,
  generate(_target, params) {
    const sorted = [...new Set(params.values)].sort((a, b) => b - a);
    return records("values", params.key, sorted);
  },
};
