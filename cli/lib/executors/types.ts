/**
 * Execution service boundary.
 *
 * The driver hands a service a variant build, an instruction and the
 * account fixtures; the service runs the program once and reports what
 * it consumed. How the program is hosted is the service's business.
 *
 * @module
 */

import type { Operation } from "effection";
import type { Execution } from "../../harness/execute.ts";
import type { AccountFixture } from "../../harness/input.ts";
import type { VariantBuild } from "../../variants/mod.ts";

export type { Execution } from "../../harness/execute.ts";

/**
 * The service could not produce an execution: the program threw, ran out
 * of budget, or the host process failed.
 */
export class ExecutionError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "ExecutionError";
  }
}

export interface ExecutionService {
  /** Executor identifier recorded in report metadata */
  readonly id: string;
  /**
   * Invoke the variant's program once.
   * @throws ExecutionError when no execution could be produced
   */
  execute(
    variant: VariantBuild,
    instruction: Uint8Array,
    accounts: readonly AccountFixture[],
  ): Operation<Execution>;
}
