import { describe, expect, it } from "vitest";
import { ZodError } from "zod";
import { CASES, type BenchCase } from "../cli/lib/cases/mod.ts";
import type { VariationRecord } from "../cli/lib/schema.ts";
import {
  generateVariations,
  getStrategy,
  listStrategies,
} from "../cli/lib/variations/mod.ts";

const TARGET = { id: 1, displayName: "Echo" };

function numbers(records: VariationRecord[], key = "n"): unknown[] {
  return records.map((r) => r.parameters[key]);
}

describe("variation strategies", () => {
  it("registers every strategy by name", () => {
    expect(listStrategies()).toEqual(["single", "halving", "decrement", "values", "slot-probe"]);
    expect(getStrategy("nope")).toBeUndefined();
    expect(getStrategy("toString")).toBeUndefined();
  });

  it("single emits one record without parameters", () => {
    expect(generateVariations(TARGET, [{ strategy: "single" }])).toEqual([
      { strategy: "single", parameters: {} },
    ]);
  });

  it("halving 100 emits 100, 50, 25, 12, 6, 3, 1", () => {
    const records = generateVariations(TARGET, [
      { strategy: "halving", parameters: { max: 100 } },
    ]);

    expect(numbers(records)).toEqual([100, 50, 25, 12, 6, 3, 1]);
    expect(records[0]).toEqual({ strategy: "halving", parameters: { n: 100 } });
  });

  it("halving stops at min and uses the given key", () => {
    const records = generateVariations(TARGET, [
      { strategy: "halving", parameters: { max: 64, min: 8, key: "bytes" } },
    ]);

    expect(numbers(records, "bytes")).toEqual([64, 32, 16, 8]);
  });

  it("decrement steps down to min", () => {
    const records = generateVariations(TARGET, [
      { strategy: "decrement", parameters: { max: 10, step: 3 } },
    ]);

    expect(numbers(records)).toEqual([10, 7, 4, 1]);
  });

  it("values deduplicates and emits largest first", () => {
    const records = generateVariations(TARGET, [
      { strategy: "values", parameters: { values: [3, 10, 3, 1, 7] } },
    ]);

    expect(numbers(records)).toEqual([10, 7, 3, 1]);
  });

  it("slot-probe spreads probe indices from last to first", () => {
    const records = generateVariations(TARGET, [
      { strategy: "slot-probe", parameters: { pattern: "strictly-1" } },
    ]);

    expect(numbers(records, "index")).toEqual([511, 454, 397, 340, 283, 227, 170, 113, 56, 0]);
    expect(records[0]).toEqual({
      strategy: "slot-probe",
      parameters: { pattern: "strictly-1", entries: 512, index: 511, slot: 9_489 },
    });
  });

  it("slot-probe drops repeated indices on small data", () => {
    const records = generateVariations(TARGET, [
      { strategy: "slot-probe", parameters: { pattern: "strictly-1", entries: 3 } },
    ]);

    expect(numbers(records, "index")).toEqual([2, 1, 0]);
    expect(numbers(records, "slot")).toEqual([9_998, 9_999, 10_000]);
  });

  it("rejects invalid parameters", () => {
    expect(() =>
      generateVariations(TARGET, [{ strategy: "halving", parameters: { max: 0 } }])
    ).toThrow(ZodError);
    expect(() =>
      generateVariations(TARGET, [{ strategy: "halving", parameters: { max: 4, min: 8 } }])
    ).toThrow(ZodError);
    expect(() =>
      generateVariations(TARGET, [{ strategy: "single", parameters: { extra: 1 } }])
    ).toThrow(ZodError);
    expect(() =>
      generateVariations(TARGET, [{ strategy: "slot-probe", parameters: { pattern: "avg-3" } }])
    ).toThrow(ZodError);
  });

  it("rejects unknown strategies", () => {
    expect(() => generateVariations(TARGET, [{ strategy: "random" }])).toThrow(
      'Unknown variation strategy "random" (available: single, halving, decrement, values, slot-probe)',
    );
  });

  it("is deterministic", () => {
    const plans = [
      { strategy: "slot-probe", parameters: { pattern: "avg-2", probes: 7 } },
    ];

    expect(generateVariations(TARGET, plans)).toEqual(generateVariations(TARGET, plans));
  });

  describe.each(CASES.map((c): [string, BenchCase] => [c.target.displayName, c]))(
    "%s case",
    (_name, benchCase) => {
      it("never repeats a parameter set and never goes below 1", () => {
        for (const plan of benchCase.variations) {
          const records = generateVariations(benchCase.target, [plan]);
          const keys = records.map((r) => JSON.stringify(r.parameters));

          expect(records.length).toBeGreaterThan(0);
          expect(new Set(keys).size).toBe(keys.length);

          for (const record of records) {
            for (const value of Object.values(record.parameters)) {
              if (typeof value === "number" && record.strategy !== "slot-probe") {
                expect(value).toBeGreaterThanOrEqual(1);
              }
            }
          }
        }
      });

      it("emits a strictly decreasing sweep", () => {
        for (const plan of benchCase.variations) {
          const records = generateVariations(benchCase.target, [plan]);
          const sweep = records.map((r) => {
            const value = r.strategy === "slot-probe"
              ? r.parameters.index
              : Object.values(r.parameters)[0];
            return typeof value === "number" ? value : 0;
          });

          for (let i = 1; i < sweep.length; i++) {
            expect(sweep[i]).toBeLessThan(sweep[i - 1]);
          }
        }
      });
    },
  );
});
