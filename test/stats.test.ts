import { describe, expect, it } from "vitest";
import { calculateStats, medianCost, percentile, toStatsOnly } from "../cli/lib/stats.ts";

describe("calculateStats", () => {
  it("summarizes timing samples", () => {
    const stats = calculateStats([4, 1, 3, 2]);

    expect(toStatsOnly(stats)).toEqual({
      avgTime: 2.5,
      minTime: 1,
      maxTime: 4,
      stdDev: Math.sqrt(1.25),
      p50: 2,
      p95: 4,
      p99: 4,
    });
    expect(stats.reps).toBe(4);
  });

  it("rejects empty samples", () => {
    expect(() => calculateStats([])).toThrow("Cannot calculate stats from empty array");
  });
});

describe("percentile", () => {
  it("uses the nearest rank", () => {
    expect(percentile([10, 20, 30, 40, 50], 50)).toBe(30);
    expect(percentile([10, 20, 30, 40, 50], 0)).toBe(10);
    expect(percentile([10, 20, 30, 40, 50], 100)).toBe(50);
  });
});

describe("medianCost", () => {
  it("sorts before picking the median", () => {
    expect(medianCost([900, 100, 500])).toBe(500);
    expect(medianCost([7])).toBe(7);
  });
});
