/**
 * One metered invocation of a loaded variant program.
 *
 * Shared by the in-process executor and the subprocess harness so both
 * report cost and timing the same way.
 *
 * @module
 */

import type { VariantProgram } from "./entrypoint.ts";
import { serializeAccounts, type AccountFixture } from "./input.ts";
import { ComputeMeter } from "./meter.ts";
import type { DispatchError, Outcome } from "./types.ts";

/**
 * What one invocation produced.
 */
export interface Execution {
  /** Resource units consumed */
  cost: number;
  /** Wall-clock time of the program call in milliseconds */
  elapsedMs: number;
  result: Outcome<void, DispatchError>;
  returnData: Uint8Array;
  logs: string[];
}

/**
 * Serialize the fixtures, meter the call and time it.
 * Only the program call itself is inside the timed window.
 *
 * @throws ComputeBudgetExceededError, or whatever the program throws
 */
export function executeProgram(
  program: VariantProgram,
  instruction: Uint8Array,
  accounts: readonly AccountFixture[],
  computeBudget: number,
): Execution {
  const input = serializeAccounts(accounts);
  const meter = new ComputeMeter(computeBudget);

  const start = performance.now();
  const exit = program.process(instruction, input, meter);
  const elapsedMs = performance.now() - start;

  return {
    cost: meter.consumed,
    elapsedMs,
    result: exit.result,
    returnData: exit.returnData,
    logs: exit.logs,
  };
}
