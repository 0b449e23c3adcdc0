/**
 * Subprocess execution service.
 *
 * Every invocation runs in a fresh Node.js child through the harness
 * entry point, so no program state survives between calls. The request
 * goes through a file in a scoped temp directory; the child answers with
 * one JSON line on stdout.
 *
 * @module
 */

import { writeFile } from "node:fs/promises";
import { join } from "node:path";
import { fileURLToPath } from "node:url";
import { exec } from "@effectionx/process";
import { call, race, resource, sleep, type Operation } from "effection";
import type { Execution } from "../../harness/execute.ts";
import type { AccountFixture } from "../../harness/input.ts";
import { DEFAULT_COMPUTE_BUDGET } from "../../harness/meter.ts";
import {
  decodeResponse,
  encodeAccount,
  encodeInstructionHex,
  parseHarnessOutput,
  type HarnessRequest,
} from "../../harness/protocol.ts";
import type { VariantBuild } from "../../variants/mod.ts";
import { toError } from "../result.ts";
import { EnvironmentIdSchema } from "../schema.ts";
import { useTempDir } from "../temp-dir.ts";
import { ExecutionError, type ExecutionService } from "./types.ts";

/** Repository root; tsx is resolved from here */
const ROOT_DIR = fileURLToPath(new URL("../../../", import.meta.url));

/** The harness entry point */
export const HARNESS_ENTRY = fileURLToPath(
  new URL("../../harness/entry.ts", import.meta.url),
);

export interface SubprocessOpts {
  computeBudget?: number;
  /** Kill a child that runs longer than this, in milliseconds */
  timeoutMs?: number;
}

function* timeout(ms: number): Operation<never> {
  yield* sleep(ms);
  throw new ExecutionError(`Harness timed out after ${ms}ms`);
}

/**
 * Create a subprocess executor whose request files live as long as the
 * current scope.
 */
export function useSubprocessExecutor(
  opts: SubprocessOpts = {},
): Operation<ExecutionService> {
  const computeBudget = opts.computeBudget ?? DEFAULT_COMPUTE_BUDGET;
  const timeoutMs = opts.timeoutMs ?? 60_000;

  return resource<ExecutionService>(function* (provide) {
    const dir = yield* useTempDir();
    let requests = 0;

    function* spawnHarness(requestPath: string): Operation<string> {
      const command =
        `${process.execPath} --import tsx ${HARNESS_ENTRY} --request ${requestPath}`;
      // the losing branch is halted, which kills the child
      const result = yield* race([
        exec(command, { cwd: ROOT_DIR }).join(),
        timeout(timeoutMs),
      ]);
      if (result.code !== 0) {
        const stderr = result.stderr.trim();
        throw new ExecutionError(
          stderr
            ? `Harness failed: ${stderr}`
            : `Harness exited with code ${result.code}`,
        );
      }
      return result.stdout;
    }

    yield* provide({
      id: "subprocess",

      *execute(
        variant: VariantBuild,
        instruction: Uint8Array,
        accounts: readonly AccountFixture[],
      ): Operation<Execution> {
        const environment = EnvironmentIdSchema.safeParse(variant.id);
        if (!environment.success) {
          throw new ExecutionError(
            `The subprocess executor only hosts built-in variants, not "${variant.id}"`,
          );
        }

        const request: HarnessRequest = {
          environment: environment.data,
          instruction: encodeInstructionHex(instruction),
          accounts: accounts.map(encodeAccount),
          computeBudget,
        };
        const requestPath = join(dir, `request-${requests++}.json`);
        yield* call(() => writeFile(requestPath, JSON.stringify(request)));

        const stdout = yield* spawnHarness(requestPath);
        try {
          return decodeResponse(parseHarnessOutput(stdout));
        } catch (e: unknown) {
          throw new ExecutionError(toError(e).message, { cause: e });
        }
      },
    });
  });
}
