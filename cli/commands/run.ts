/**
 * run command implementation.
 *
 * Sweeps every variant, target and variation through the selected
 * execution service, prints the results as a markdown table and writes
 * the report.
 *
 * @module
 */

import type { Operation } from "effection";
import { z } from "zod";
import { MAX_TARGET_ID } from "../harness/instruction.ts";
import { CASES } from "../lib/cases/mod.ts";
import { loadBenchConfig } from "../lib/config.ts";
import { planSweep, runSweep } from "../lib/driver.ts";
import { useExecutor } from "../lib/executors/mod.ts";
import {
  buildReport,
  formatMarkdownTable,
  loadLatestReport,
  writeReport,
} from "../lib/report.ts";
import { toError, wrapResult } from "../lib/result.ts";
import {
  EnvironmentIdSchema,
  ExecutorIdSchema,
  type BenchConfig,
  type FailedResult,
  type Metadata,
} from "../lib/schema.ts";
import { getVariant, listVariants } from "../variants/mod.ts";

/**
 * Raw flags as given on the command line.
 */
export interface RunFlags {
  repeat?: string;
  warmup?: string;
  executor?: string;
  budget?: string;
  outDir?: string;
  env: string[];
  target: string[];
  failFast: boolean;
  write: boolean;
}

/**
 * Parse run flags.
 * @throws Error on an unknown flag or a flag missing its value
 */
export function parseRunFlags(args: readonly string[]): RunFlags {
  const flags: RunFlags = { env: [], target: [], failFast: false, write: true };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    const take = (): string => {
      const next = args[i + 1];
      if (next === undefined || next.startsWith("--")) {
        throw new Error(`Missing value for ${arg}`);
      }
      i++;
      return next;
    };

    switch (arg) {
      case "--repeat":
        flags.repeat = take();
        break;
      case "--warmup":
        flags.warmup = take();
        break;
      case "--executor":
        flags.executor = take();
        break;
      case "--budget":
        flags.budget = take();
        break;
      case "--out-dir":
        flags.outDir = take();
        break;
      case "--env":
        flags.env.push(take());
        break;
      case "--target":
        flags.target.push(take());
        break;
      case "--fail-fast":
        flags.failFast = true;
        break;
      case "--no-write":
        flags.write = false;
        break;
      default:
        throw new Error(`Unknown option: ${arg}`);
    }
  }

  return flags;
}

const RunOptionsSchema = z.object({
  repeat: z.coerce.number().int().positive(),
  warmup: z.coerce.number().int().nonnegative(),
  executor: ExecutorIdSchema,
  computeBudget: z.coerce.number().int().positive(),
  outDir: z.string().min(1),
  environments: z.array(EnvironmentIdSchema),
  targets: z.array(z.coerce.number().int().min(0).max(MAX_TARGET_ID)),
  failFast: z.boolean(),
  write: z.boolean(),
});

export type RunOptions = z.infer<typeof RunOptionsSchema>;

/**
 * Merge flags over the config file.
 * @throws ZodError for invalid values
 */
export function resolveRunOptions(flags: RunFlags, config: BenchConfig): RunOptions {
  return RunOptionsSchema.parse({
    repeat: flags.repeat ?? config.repeat,
    warmup: flags.warmup ?? config.warmup,
    executor: flags.executor ?? config.executor,
    computeBudget: flags.budget ?? config.computeBudget,
    outDir: flags.outDir ?? config.outDir,
    environments: [...new Set(flags.env)],
    targets: flags.target,
    failFast: flags.failFast,
    write: flags.write,
  });
}

/**
 * Run the benchmark sweep.
 */
export function* runCommand(args: string[]): Operation<number> {
  let options: RunOptions;
  try {
    options = resolveRunOptions(parseRunFlags(args), loadBenchConfig());
  } catch (error: unknown) {
    console.error("Error parsing arguments:");
    console.error(toError(error).message);
    return 1;
  }

  const variants = options.environments.length > 0
    ? options.environments.map(getVariant)
    : listVariants();
  const targets = options.targets.length > 0 ? options.targets : undefined;

  const known = new Set(variants.flatMap((v) => v.manifest.map((t) => t.id)));
  const unknown = options.targets.filter((id) => !known.has(id));
  if (unknown.length > 0) {
    console.error(`Unknown target id(s): ${unknown.join(", ")}`);
    return 1;
  }

  const total = planSweep({ variants, cases: CASES, targets }).length;

  console.log(`\nEnvironments: ${variants.map((v) => v.id).join(", ")}`);
  console.log(`Executor: ${options.executor}`);
  console.log(
    `Options: repeat=${options.repeat}, warmup=${options.warmup}, budget=${options.computeBudget}`,
  );
  console.log(`Combinations: ${total}\n`);

  const previous = yield* wrapResult("previous report", loadLatestReport(options.outDir));
  if (!previous.ok) {
    console.warn(`Ignoring previous report: ${previous.error.message}`);
  }

  const executor = yield* useExecutor(options.executor, {
    computeBudget: options.computeBudget,
  });

  const timestamp = new Date().toISOString();
  let done = 0;
  const results = yield* runSweep({
    variants,
    cases: CASES,
    targets,
    executor,
    repeat: options.repeat,
    warmup: options.warmup,
    failFast: options.failFast,
    onResult(result) {
      done++;
      const summary = result.ok ? `${result.cost} units` : `FAILED ${result.error}`;
      console.log(`  [${done}/${total}] ${result.label}: ${summary}`);
    },
  });

  const metadata: Metadata = {
    timestamp,
    executor: executor.id,
    computeBudget: options.computeBudget,
    repeat: options.repeat,
    warmup: options.warmup,
    runner: {
      os: process.platform,
      arch: process.arch,
      node: process.versions.node,
    },
  };
  const report = buildReport(results.results, metadata);

  console.log();
  console.log(
    formatMarkdownTable(report.results, previous.ok ? previous.value?.results : undefined),
  );

  if (options.write) {
    const path = yield* writeReport(options.outDir, report);
    console.log(`\nWrote: ${path}`);
  }

  const failed = report.results.filter((r): r is FailedResult => !r.ok);
  if (failed.length > 0) {
    console.error("\nFailures:");
    for (const result of failed) {
      console.error(`  ${result.label}: ${result.error}`);
    }
  }

  console.log(
    `\nCompleted: ${report.results.length - failed.length} measured, ${failed.length} failed`,
  );

  return failed.length > 0 ? 1 : 0;
}
