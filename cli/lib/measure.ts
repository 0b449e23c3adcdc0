/**
 * Measurement loop for one variant/target/variation combination.
 *
 * @module
 */

import type { Operation } from "effection";
import { describeDispatchError } from "../harness/outcome.ts";
import type { DispatchError } from "../harness/types.ts";
import type { Execution } from "./executors/types.ts";
import type { BenchmarkStats } from "./schema.ts";
import { calculateStats, medianCost, toStatsOnly } from "./stats.ts";

export interface MeasureOpts {
  /** Measured invocations */
  repeat: number;
  /** Discarded invocations before measuring */
  warmup: number;
}

export interface Measurement {
  /** Median resource units */
  cost: number;
  samples: number[];
  timing: BenchmarkStats;
}

/**
 * The program ran but the dispatcher reported an error.
 */
export class DispatchFailedError extends Error {
  constructor(readonly dispatchError: DispatchError) {
    super(describeDispatchError(dispatchError));
    this.name = "DispatchFailedError";
  }
}

function* checked(invoke: () => Operation<Execution>): Operation<Execution> {
  const execution = yield* invoke();
  if (!execution.result.ok) {
    throw new DispatchFailedError(execution.result.error);
  }
  return execution;
}

/**
 * Run warmups, then `repeat` measured invocations.
 *
 * @throws DispatchFailedError on the first invocation that fails to
 *   dispatch, warmups included
 */
export function* measure(
  invoke: () => Operation<Execution>,
  opts: MeasureOpts,
): Operation<Measurement> {
  for (let i = 0; i < opts.warmup; i++) {
    yield* checked(invoke);
  }

  const samples: number[] = [];
  const times: number[] = [];
  for (let i = 0; i < opts.repeat; i++) {
    const execution = yield* checked(invoke);
    samples.push(execution.cost);
    times.push(execution.elapsedMs);
  }

  return {
    cost: medianCost(samples),
    samples,
    timing: toStatsOnly(calculateStats(times)),
  };
}
