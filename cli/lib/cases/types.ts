/**
 * Benchmark case contract.
 *
 * A case is the host-side half of a target: which variations to sweep
 * and how to turn one variation record into instruction setup bytes and
 * account fixtures. Cases know nothing about environments; the same
 * input goes to every variant that registers the target.
 *
 * @module
 */

import type { AccountFixture } from "../../harness/input.ts";
import type { TargetDescriptor } from "../../harness/types.ts";
import type { VariationRecord } from "../schema.ts";
import type { VariationPlan } from "../variations/types.ts";

/**
 * Input for one invocation.
 */
export interface CaseInput {
  setupData: Uint8Array;
  accounts: AccountFixture[];
}

export interface BenchCase {
  target: TargetDescriptor;
  variations: readonly VariationPlan[];
  /** @throws Error if the record lacks a parameter the case needs */
  build(record: VariationRecord): CaseInput;
}

/**
 * Read an integer parameter from a record.
 */
export function intParam(record: VariationRecord, key: string): number {
  const value = record.parameters[key];
  if (typeof value !== "number" || !Number.isSafeInteger(value)) {
    throw new Error(
      `Variation ${record.strategy} is missing integer parameter "${key}"`,
    );
  }
  return value;
}

/**
 * Read a string parameter from a record.
 */
export function stringParam(record: VariationRecord, key: string): string {
  const value = record.parameters[key];
  if (typeof value !== "string") {
    throw new Error(
      `Variation ${record.strategy} is missing string parameter "${key}"`,
    );
  }
  return value;
}
