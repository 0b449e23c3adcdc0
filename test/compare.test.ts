import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { run } from "effection";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { compareCommand } from "../cli/commands/compare.ts";
import { buildReport, formatMarkdownTable, writeReport } from "../cli/lib/report.ts";
import type { MeasurementResult } from "../cli/lib/schema.ts";

const TIMING = { avgTime: 0.5, minTime: 0.25, maxTime: 1, stdDev: 0.1, p50: 0.5, p95: 1, p99: 1 };

function echo(cost: number): MeasurementResult {
  return {
    label: "checked · Echo · single()",
    environment: "checked",
    targetId: 1,
    target: "Echo",
    variation: { strategy: "single", parameters: {} },
    ok: true,
    cost,
    samples: [cost],
    timing: TIMING,
  };
}

function report(timestamp: string, cost: number) {
  return buildReport([echo(cost)], {
    timestamp,
    executor: "in-process",
    computeBudget: 200_000,
    repeat: 1,
    warmup: 0,
    runner: { os: "linux", arch: "x64", node: "20.11.0" },
  });
}

describe("compareCommand", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "compare-test-"));
  });

  afterEach(() => {
    vi.restoreAllMocks();
    rmSync(dir, { recursive: true, force: true });
  });

  it("prints the newest report against the one before it", async () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => {});
    const base = report("2026-01-01T00:00:00.000Z", 100);
    const head = report("2026-01-02T00:00:00.000Z", 110);
    await run(function* () {
      yield* writeReport(dir, base);
      yield* writeReport(dir, head);
    });

    const code = await run(() => compareCommand(["--out-dir", dir]));

    expect(code).toBe(0);
    expect(log).toHaveBeenLastCalledWith(formatMarkdownTable(head.results, base.results));
  });

  it("exits 1 when a report cannot be read", async () => {
    const error = vi.spyOn(console, "error").mockImplementation(() => {});
    const good = join(dir, "good.json");
    const broken = join(dir, "broken.json");
    writeFileSync(good, JSON.stringify(report("2026-01-01T00:00:00.000Z", 100)));
    writeFileSync(broken, "{");

    const code = await run(() => compareCommand([good, broken]));

    expect(code).toBe(1);
    expect(error).toHaveBeenCalledWith(`Cannot read report: ${broken} is not JSON`);
  });

  it("exits 1 when a report file is missing", async () => {
    const error = vi.spyOn(console, "error").mockImplementation(() => {});
    const missing = join(dir, "missing.json");

    const code = await run(() => compareCommand([missing, missing]));

    expect(code).toBe(1);
    expect(error.mock.calls[0]?.[0]).toMatch(/^Cannot read report: ENOENT/);
  });
});
