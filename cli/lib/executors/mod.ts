/**
 * Execution service selection.
 *
 * @module
 */

import type { Operation } from "effection";
import type { ExecutorId } from "../schema.ts";
import { createInProcessExecutor } from "./in-process.ts";
import { useSubprocessExecutor } from "./subprocess.ts";
import type { ExecutionService } from "./types.ts";

export { ExecutionError, type Execution, type ExecutionService } from "./types.ts";

export interface ExecutorOpts {
  computeBudget: number;
}

/**
 * Create the executor for `id`, scoped to the caller.
 * Uses exhaustive switch for type safety.
 */
export function* useExecutor(
  id: ExecutorId,
  opts: ExecutorOpts,
): Operation<ExecutionService> {
  switch (id) {
    case "in-process":
      return createInProcessExecutor(opts);
    case "subprocess":
      return yield* useSubprocessExecutor(opts);
    default: {
      const _exhaustive: never = id;
      throw new Error(`Unknown executor: ${_exhaustive}`);
    }
  }
}
