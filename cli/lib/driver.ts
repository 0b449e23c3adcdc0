/**
 * The measurement driver.
 *
 * Walks every (variant, target, variation) combination in a fixed
 * order, measures it through an execution service and collects one
 * labelled result per combination. A failing combination is recorded
 * and the sweep moves on.
 *
 * @module
 */

import type { Operation } from "effection";
import { encodeInstruction } from "../harness/instruction.ts";
import type { TargetDescriptor } from "../harness/types.ts";
import type { VariantBuild } from "../variants/mod.ts";
import type { BenchCase } from "./cases/mod.ts";
import type { ExecutionService } from "./executors/types.ts";
import { measure, type Measurement, type MeasureOpts } from "./measure.ts";
import { DuplicateLabelError, formatLabel, ResultSet } from "./report.ts";
import { wrapResult } from "./result.ts";
import type { MeasurementResult, VariationRecord } from "./schema.ts";
import { generateVariations } from "./variations/mod.ts";

export interface SweepOpts extends MeasureOpts {
  variants: readonly VariantBuild[];
  cases: readonly BenchCase[];
  executor: ExecutionService;
  /** Only these target ids; all when omitted */
  targets?: readonly number[];
  /** Stop after the first failed combination */
  failFast?: boolean;
  /** Called after each combination is recorded */
  onResult?: (result: MeasurementResult) => void;
}

/**
 * One combination the sweep will measure.
 */
export interface Combination {
  label: string;
  variant: VariantBuild;
  target: TargetDescriptor;
  benchCase: BenchCase;
  variation: VariationRecord;
}

/**
 * Enumerate combinations: variants by environment id, then each
 * variant's targets by id, then variations in case order. Targets
 * without a case are skipped.
 * @throws DuplicateLabelError if two combinations share a label
 */
export function planSweep(
  opts: Pick<SweepOpts, "variants" | "cases" | "targets">,
): Combination[] {
  const cases = new Map(opts.cases.map((c) => [c.target.id, c]));
  const wanted = opts.targets ? new Set(opts.targets) : undefined;
  const variants = [...opts.variants].sort((a, b) => (a.id < b.id ? -1 : a.id > b.id ? 1 : 0));

  const combinations: Combination[] = [];
  const labels = new Set<string>();
  for (const variant of variants) {
    const targets = [...variant.manifest].sort((a, b) => a.id - b.id);
    for (const target of targets) {
      const benchCase = cases.get(target.id);
      if (!benchCase || (wanted && !wanted.has(target.id))) {
        continue;
      }
      for (const variation of generateVariations(target, benchCase.variations)) {
        const label = formatLabel(variant.id, target.displayName, variation);
        if (labels.has(label)) {
          throw new DuplicateLabelError(label);
        }
        labels.add(label);
        combinations.push({
          label,
          variant,
          target,
          benchCase,
          variation,
        });
      }
    }
  }
  return combinations;
}

function* measureCombination(
  combination: Combination,
  executor: ExecutionService,
  opts: MeasureOpts,
): Operation<Measurement> {
  const { variant, target, benchCase, variation } = combination;
  const { setupData, accounts } = benchCase.build(variation);
  const instruction = encodeInstruction({ targetId: target.id, setupData });
  return yield* measure(
    () => executor.execute(variant, instruction, accounts),
    opts,
  );
}

/**
 * Run the sweep. The whole plan is built, and its labels checked,
 * before the first combination is measured.
 * @throws DuplicateLabelError if two combinations share a label
 */
export function* runSweep(opts: SweepOpts): Operation<ResultSet> {
  const results = new ResultSet();
  const measureOpts = { repeat: opts.repeat, warmup: opts.warmup };

  for (const combination of planSweep(opts)) {
    const { label, variant, target, variation } = combination;
    const key = {
      label,
      environment: variant.id,
      targetId: target.id,
      target: target.displayName,
      variation,
    };

    const outcome = yield* wrapResult(
      label,
      measureCombination(combination, opts.executor, measureOpts),
    );
    const result: MeasurementResult = outcome.ok
      ? { ...key, ok: true, ...outcome.value }
      : { ...key, ok: false, error: outcome.error.message };

    results.add(result);
    opts.onResult?.(result);

    if (!result.ok && opts.failFast) {
      break;
    }
  }

  return results;
}
