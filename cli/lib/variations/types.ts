/**
 * Data variation strategy contract.
 *
 * @module
 */

import type { z } from "zod";
import type { TargetDescriptor } from "../../harness/types.ts";
import type { VariationRecord } from "../schema.ts";

/**
 * A generator of input-shape sweeps.
 *
 * `generate` must be deterministic and side-effect-free, and must
 * return a finite sequence that never repeats a parameter set.
 */
export interface VariationStrategy<P> {
  /** Name recorded in every record and label */
  name: string;
  /** Validates raw parameters and fills defaults */
  schema: z.ZodType<P, z.ZodTypeDef, unknown>;
  generate(target: TargetDescriptor, params: P): VariationRecord[];
}

/**
 * A strategy with its parameter type erased, ready for the name table.
 */
export interface RegisteredStrategy {
  name: string;
  /** @throws ZodError on invalid parameters */
  generate(target: TargetDescriptor, params: unknown): VariationRecord[];
}

/**
 * One strategy invocation requested by a benchmark case.
 */
export interface VariationPlan {
  strategy: string;
  parameters?: unknown;
}
