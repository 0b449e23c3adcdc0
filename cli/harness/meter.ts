/**
 * Compute metering for one invocation.
 *
 * The execution service owns a `ComputeMeter` per call and reports
 * `consumed` as the invocation's cost. Programs charge it through their
 * syscalls; environments charge it for their own bookkeeping (account
 * deserialization, borrows).
 *
 * @module
 */

import type { Syscalls } from "./types.ts";

/** Default per-invocation budget in resource units */
export const DEFAULT_COMPUTE_BUDGET = 200_000;

/** Charged by the dispatcher for decoding the instruction prefix */
export const INSTRUCTION_DECODE_COST = 1;

/** Minimum charge for a log line; longer lines cost one unit per byte */
export const LOG_BASE_COST = 100;

/** Base charge for setting return data */
export const RETURN_DATA_BASE_COST = 100;

/** Bytes of return data covered by one unit */
export const RETURN_DATA_BYTES_PER_UNIT = 250;

/** Charge for invoking the built-in system program */
export const SYSTEM_CALL_COST = 1_000;

/** Largest return data an invocation may set */
export const MAX_RETURN_DATA = 1_024;

/**
 * Raised when an invocation consumes more than its budget.
 */
export class ComputeBudgetExceededError extends Error {
  constructor(
    readonly budget: number,
    readonly consumed: number,
  ) {
    super(`Compute budget exceeded: consumed ${consumed} of ${budget} units`);
    this.name = "ComputeBudgetExceededError";
  }
}

/**
 * Counts resource units against a fixed budget.
 */
export class ComputeMeter {
  private used = 0;

  constructor(readonly budget: number = DEFAULT_COMPUTE_BUDGET) {
    if (!Number.isInteger(budget) || budget <= 0) {
      throw new RangeError(`Compute budget must be a positive integer, got ${budget}`);
    }
  }

  get consumed(): number {
    return this.used;
  }

  get remaining(): number {
    return Math.max(0, this.budget - this.used);
  }

  /**
   * @throws ComputeBudgetExceededError once the budget is exhausted
   */
  consume(units: number): void {
    if (!Number.isInteger(units) || units < 0) {
      throw new RangeError(`Cannot consume ${units} units`);
    }
    this.used += units;
    if (this.used > this.budget) {
      throw new ComputeBudgetExceededError(this.budget, this.used);
    }
  }
}

/**
 * Syscalls bound to one invocation, plus what the program left behind.
 */
export interface InvocationRuntime {
  syscalls: Syscalls;
  logs: string[];
  returnData(): Uint8Array;
}

/**
 * Create the syscall table for a single invocation.
 */
export function createRuntime(meter: ComputeMeter): InvocationRuntime {
  const logs: string[] = [];
  const encoder = new TextEncoder();
  let returnData = new Uint8Array(0);

  return {
    logs,
    returnData: () => returnData,
    syscalls: {
      log(message) {
        meter.consume(Math.max(LOG_BASE_COST, encoder.encode(message).length));
        logs.push(message);
      },
      consume(units) {
        meter.consume(units);
      },
      setReturnData(data) {
        if (data.length > MAX_RETURN_DATA) {
          throw new RangeError(
            `Return data of ${data.length} bytes exceeds ${MAX_RETURN_DATA}`,
          );
        }
        meter.consume(
          RETURN_DATA_BASE_COST +
            Math.floor(data.length / RETURN_DATA_BYTES_PER_UNIT),
        );
        returnData = data.slice();
      },
    },
  };
}
