/**
 * Statistics over measured samples: wall-clock timings and resource
 * units. Pure functions, no operations.
 *
 * @module
 */

import type { BenchmarkStats } from "./schema.ts";

/**
 * Result of stats calculation including raw times.
 */
export interface StatsResult extends BenchmarkStats {
  reps: number;
  times: readonly number[];
}

/**
 * Calculate statistical metrics from timing samples in milliseconds.
 *
 * @throws Error if times array is empty
 */
export function calculateStats(times: readonly number[]): StatsResult {
  if (times.length === 0) {
    throw new Error("Cannot calculate stats from empty array");
  }

  const sorted = [...times].sort((a, b) => a - b);
  const sum = times.reduce((a, b) => a + b, 0);
  const avg = sum / times.length;
  const variance =
    times.reduce((acc, t) => acc + (t - avg) ** 2, 0) / times.length;

  return {
    reps: times.length,
    times,
    avgTime: avg,
    minTime: sorted[0],
    maxTime: sorted[sorted.length - 1],
    stdDev: Math.sqrt(variance),
    p50: percentile(sorted, 50),
    p95: percentile(sorted, 95),
    p99: percentile(sorted, 99),
  };
}

/**
 * Nearest-rank percentile of an ascending array.
 *
 * @param p - Percentile to calculate (0-100)
 * @throws Error if sorted array is empty
 */
export function percentile(sorted: readonly number[], p: number): number {
  if (sorted.length === 0) {
    throw new Error("Cannot calculate percentile from empty array");
  }

  const index = Math.ceil((p / 100) * sorted.length) - 1;
  return sorted[Math.max(0, index)];
}

/**
 * Median resource units, nearest rank.
 *
 * @throws Error if samples is empty
 */
export function medianCost(samples: readonly number[]): number {
  return percentile([...samples].sort((a, b) => a - b), 50);
}

/**
 * Extract just the stats fields (without reps and times) for JSON output.
 */
export function toStatsOnly(result: StatsResult): BenchmarkStats {
  return {
    avgTime: result.avgTime,
    minTime: result.minTime,
    maxTime: result.maxTime,
    stdDev: result.stdDev,
    p50: result.p50,
    p95: result.p95,
    p99: result.p99,
  };
}
