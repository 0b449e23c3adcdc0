/**
 * Benchmark case table, keyed by target id.
 *
 * @module
 */

import { accountCountCase, accountReadCase, echoCase, logCase } from "./basic.ts";
import {
  getEntryCase,
  positionBinaryCase,
  positionInterpolatedCase,
  positionNaiveCase,
} from "./slot-hashes.ts";
import { createAccountCase, transferCase } from "./system.ts";
import type { BenchCase } from "./types.ts";

export type { BenchCase, CaseInput } from "./types.ts";

/**
 * All built-in cases, ascending by target id.
 */
export const CASES: readonly BenchCase[] = [
  echoCase,
  logCase,
  accountCountCase,
  accountReadCase,
  transferCase,
  createAccountCase,
  getEntryCase,
  positionNaiveCase,
  positionInterpolatedCase,
  positionBinaryCase,
];

/**
 * Index cases by target id.
 */
export function caseTable(
  cases: readonly BenchCase[] = CASES,
): ReadonlyMap<number, BenchCase> {
  return new Map(cases.map((c) => [c.target.id, c]));
}
