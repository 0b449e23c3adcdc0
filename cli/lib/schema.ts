/**
 * Zod schemas for reports, configuration and variation records.
 * This is the single source of truth for the report data format.
 *
 * @module
 */

import { z } from "zod";
import { DEFAULT_COMPUTE_BUDGET } from "../harness/meter.ts";

/**
 * Schema version for migration safety.
 * Increment when making breaking changes to the report format.
 */
export const SCHEMA_VERSION = 1;

/**
 * Environments with a built-in variant build.
 */
export const ENVIRONMENTS = ["checked", "zero-copy"] as const;

export const EnvironmentIdSchema = z.enum(ENVIRONMENTS);

export type EnvironmentId = z.infer<typeof EnvironmentIdSchema>;

/**
 * Execution services the CLI can drive.
 */
export const EXECUTORS = ["in-process", "subprocess"] as const;

export const ExecutorIdSchema = z.enum(EXECUTORS);

export type ExecutorId = z.infer<typeof ExecutorIdSchema>;

/**
 * One strategy parameter value.
 */
export const ParameterValueSchema = z.union([z.number().finite(), z.string()]);

/**
 * One point in an input-shape sweep.
 */
export const VariationRecordSchema = z.object({
  strategy: z.string().min(1),
  parameters: z.record(ParameterValueSchema),
});

export type VariationRecord = z.infer<typeof VariationRecordSchema>;

/**
 * Resource-unit samples from repeated invocations.
 */
export const SamplesSchema = z.array(z.number().int().nonnegative()).min(1);

/**
 * Computed wall-clock statistics.
 * All time values are in milliseconds.
 */
export interface BenchmarkStats {
  avgTime: number;
  minTime: number;
  maxTime: number;
  stdDev: number;
  p50: number;
  p95: number;
  p99: number;
}

export const BenchmarkStatsSchema = z.object({
  avgTime: z.number().nonnegative().finite(),
  minTime: z.number().nonnegative().finite(),
  maxTime: z.number().nonnegative().finite(),
  stdDev: z.number().nonnegative().finite(),
  p50: z.number().nonnegative().finite(),
  p95: z.number().nonnegative().finite(),
  p99: z.number().nonnegative().finite(),
}) satisfies z.ZodType<BenchmarkStats>;

const ResultKeySchema = z.object({
  label: z.string().min(1),
  environment: z.string().min(1),
  targetId: z.number().int().nonnegative(),
  target: z.string().min(1),
  variation: VariationRecordSchema,
});

/**
 * A measured combination.
 */
export const MeasuredResultSchema = ResultKeySchema.extend({
  ok: z.literal(true),
  /** Median resource units over the measured samples */
  cost: z.number().int().nonnegative(),
  samples: SamplesSchema,
  timing: BenchmarkStatsSchema,
});

/**
 * A combination that failed, with the reason.
 */
export const FailedResultSchema = ResultKeySchema.extend({
  ok: z.literal(false),
  error: z.string().min(1),
});

export const MeasurementResultSchema = z.discriminatedUnion("ok", [
  MeasuredResultSchema,
  FailedResultSchema,
]);

export type MeasuredResult = z.infer<typeof MeasuredResultSchema>;
export type FailedResult = z.infer<typeof FailedResultSchema>;
export type MeasurementResult = z.infer<typeof MeasurementResultSchema>;

/**
 * Runner environment information.
 */
export const RunnerSchema = z.object({
  os: z.string().min(1),
  arch: z.string().min(1),
  node: z.string().min(1),
});

export type Runner = z.infer<typeof RunnerSchema>;

/**
 * Metadata for one sweep.
 */
export const MetadataSchema = z.object({
  timestamp: z.string().datetime(),
  executor: z.string().min(1),
  computeBudget: z.number().int().positive(),
  repeat: z.number().int().positive(),
  warmup: z.number().int().nonnegative(),
  runner: RunnerSchema,
});

export type Metadata = z.infer<typeof MetadataSchema>;

/**
 * Complete report file schema.
 * This is validated before writing any report file.
 */
export const ReportSchema = z
  .object({
    schemaVersion: z.number().int().min(1),
    metadata: MetadataSchema,
    results: z.array(MeasurementResultSchema),
  })
  .superRefine((report, ctx) => {
    const seen = new Set<string>();
    report.results.forEach((result, i) => {
      if (seen.has(result.label)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["results", i, "label"],
          message: `Duplicate label: ${result.label}`,
        });
      }
      seen.add(result.label);
    });
  });

export type Report = z.infer<typeof ReportSchema>;

/**
 * Configuration file schema (bench.config.json).
 */
export const BenchConfigSchema = z.object({
  repeat: z.number().int().positive().default(5),
  warmup: z.number().int().nonnegative().default(1),
  executor: ExecutorIdSchema.default("in-process"),
  computeBudget: z.number().int().positive().default(DEFAULT_COMPUTE_BUDGET),
  outDir: z.string().min(1).default("data/reports"),
});

export type BenchConfig = z.infer<typeof BenchConfigSchema>;

/**
 * Validate a report and return typed result.
 * Throws ZodError if validation fails.
 */
export function validateReport(data: unknown): Report {
  return ReportSchema.parse(data);
}

/**
 * Safe validation that returns a result object instead of throwing.
 */
export function safeParseReport(
  data: unknown,
): ReturnType<typeof ReportSchema.safeParse> {
  return ReportSchema.safeParse(data);
}

/**
 * Validate the config file. Missing keys take their defaults.
 */
export function validateBenchConfig(data: unknown): BenchConfig {
  return BenchConfigSchema.parse(data);
}
