import { run } from "effection";
import { describe, expect, it } from "vitest";
import { encodeInstruction } from "../cli/harness/instruction.ts";
import { echoCase } from "../cli/lib/cases/basic.ts";
import { transferCase } from "../cli/lib/cases/system.ts";
import type { BenchCase } from "../cli/lib/cases/types.ts";
import { runSweep } from "../cli/lib/driver.ts";
import { createInProcessExecutor } from "../cli/lib/executors/in-process.ts";
import { useSubprocessExecutor } from "../cli/lib/executors/subprocess.ts";
import { ExecutionError } from "../cli/lib/executors/types.ts";
import type { MeasurementResult } from "../cli/lib/schema.ts";
import { listVariants } from "../cli/variants/mod.ts";

// every invocation starts a fresh node process
const CHILD_TIMEOUT = 60_000;

const singleEcho: BenchCase = { ...echoCase, variations: [{ strategy: "single" }] };

function costs(results: readonly MeasurementResult[]) {
  return results.map((r) => [r.label, r.ok ? r.cost : r.error]);
}

describe("subprocess executor", () => {
  it("measures the same cost as the in-process executor", async () => {
    const sweep = { variants: listVariants(), cases: [transferCase], repeat: 1, warmup: 0 };

    const child = await run(function* () {
      const executor = yield* useSubprocessExecutor();
      return yield* runSweep({ ...sweep, executor });
    });
    const local = await run(() =>
      runSweep({ ...sweep, executor: createInProcessExecutor() })
    );

    expect(costs(child.results)).toEqual([
      ["checked · Transfer · single()", 1_101],
      ["zero-copy · Transfer · single()", 1_009],
    ]);
    expect(costs(child.results)).toEqual(costs(local.results));
  }, CHILD_TIMEOUT);

  it("records a child that runs out of budget and keeps going", async () => {
    const results = await run(function* () {
      const executor = yield* useSubprocessExecutor({ computeBudget: 500 });
      return yield* runSweep({
        variants: listVariants(),
        cases: [singleEcho, transferCase],
        executor,
        repeat: 1,
        warmup: 0,
      });
    });

    const [checkedEcho, checkedTransfer, zeroCopyEcho, zeroCopyTransfer] = results.results;
    expect(results.size).toBe(4);
    expect(results.failed).toBe(2);
    expect(checkedEcho).toMatchObject({ label: "checked · Echo · single()", ok: true, cost: 101 });
    expect(zeroCopyEcho).toMatchObject({ label: "zero-copy · Echo · single()", ok: true, cost: 101 });
    for (const failure of [checkedTransfer, zeroCopyTransfer]) {
      expect(failure?.ok).toBe(false);
      expect(failure && !failure.ok ? failure.error : "").toMatch(
        /^Harness failed: [\s\S]*Compute budget exceeded: consumed \d+ of 500 units/,
      );
    }
  }, CHILD_TIMEOUT);

  it("only hosts built-in variants", async () => {
    const [checked] = listVariants();
    const custom = { ...checked, id: "custom" };
    const instruction = encodeInstruction({ targetId: 1, setupData: new Uint8Array(0) });

    await expect(
      run(function* () {
        const executor = yield* useSubprocessExecutor();
        return yield* executor.execute(custom, instruction, []);
      }),
    ).rejects.toThrow(ExecutionError);
  });
});
