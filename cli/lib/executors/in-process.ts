/**
 * In-process execution service.
 *
 * Loads each variant's program module once and calls it directly with
 * a fresh meter per invocation.
 *
 * @module
 */

import { call, type Operation } from "effection";
import type { VariantProgram } from "../../harness/entrypoint.ts";
import { executeProgram, type Execution } from "../../harness/execute.ts";
import type { AccountFixture } from "../../harness/input.ts";
import { DEFAULT_COMPUTE_BUDGET } from "../../harness/meter.ts";
import type { VariantBuild } from "../../variants/mod.ts";
import { toError } from "../result.ts";
import { ExecutionError, type ExecutionService } from "./types.ts";

export interface InProcessOpts {
  computeBudget?: number;
}

export function createInProcessExecutor(opts: InProcessOpts = {}): ExecutionService {
  const computeBudget = opts.computeBudget ?? DEFAULT_COMPUTE_BUDGET;
  const programs = new Map<string, VariantProgram>();

  function* load(variant: VariantBuild): Operation<VariantProgram> {
    const cached = programs.get(variant.id);
    if (cached) {
      return cached;
    }
    try {
      const program = yield* call(() => variant.load());
      programs.set(variant.id, program);
      return program;
    } catch (error: unknown) {
      throw new ExecutionError(
        `Failed to load ${variant.id} build: ${toError(error).message}`,
        { cause: error },
      );
    }
  }

  return {
    id: "in-process",

    *execute(
      variant: VariantBuild,
      instruction: Uint8Array,
      accounts: readonly AccountFixture[],
    ): Operation<Execution> {
      const program = yield* load(variant);
      try {
        return executeProgram(program, instruction, accounts, computeBudget);
      } catch (error: unknown) {
        throw new ExecutionError(toError(error).message, { cause: error });
      }
    },
  };
}
