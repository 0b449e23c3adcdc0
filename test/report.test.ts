import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { run } from "effection";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { ZodError } from "zod";
import {
  DuplicateLabelError,
  ResultSet,
  buildReport,
  formatLabel,
  formatMarkdownTable,
  listReports,
  loadLatestReport,
  readReport,
  reportFileName,
  writeReport,
} from "../cli/lib/report.ts";
import type { MeasurementResult, Metadata } from "../cli/lib/schema.ts";

const TIMING = { avgTime: 0.5, minTime: 0.25, maxTime: 1, stdDev: 0.1, p50: 0.5, p95: 1, p99: 1 };

function measured(label: string, cost: number): MeasurementResult {
  return {
    label,
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

function failedResult(label: string, error: string): MeasurementResult {
  return {
    label,
    environment: "checked",
    targetId: 1,
    target: "Echo",
    variation: { strategy: "single", parameters: {} },
    ok: false,
    error,
  };
}

function metadata(timestamp: string): Metadata {
  return {
    timestamp,
    executor: "in-process",
    computeBudget: 200_000,
    repeat: 1,
    warmup: 0,
    runner: { os: "linux", arch: "x64", node: "20.11.0" },
  };
}

describe("formatLabel", () => {
  it("joins environment, target and variation", () => {
    expect(
      formatLabel("zero-copy", "Account Read", {
        strategy: "halving",
        parameters: { accounts: 16 },
      }),
    ).toBe("zero-copy · Account Read · halving(accounts=16)");
    expect(formatLabel("checked", "Log", { strategy: "single", parameters: {} })).toBe(
      "checked · Log · single()",
    );
  });

  it("keeps parameter order", () => {
    expect(
      formatLabel("checked", "Get", {
        strategy: "slot-probe",
        parameters: { pattern: "avg-2", entries: 512, index: 3, slot: 9_991 },
      }),
    ).toBe("checked · Get · slot-probe(pattern=avg-2, entries=512, index=3, slot=9991)");
  });
});

describe("ResultSet", () => {
  it("appends in order and counts failures", () => {
    const set = new ResultSet();
    set.add(measured("a", 1));
    set.add(failedResult("b", "boom"));

    expect(set.results.map((r) => r.label)).toEqual(["a", "b"]);
    expect(set.size).toBe(2);
    expect(set.failed).toBe(1);
    expect(set.has("b")).toBe(true);
  });

  it("rejects a duplicate label", () => {
    const set = new ResultSet();
    set.add(measured("a", 1));

    expect(() => set.add(measured("a", 2))).toThrow(new DuplicateLabelError("a"));
    expect(set.size).toBe(1);
  });
});

describe("buildReport", () => {
  it("rejects duplicate labels", () => {
    expect(() =>
      buildReport([measured("a", 1), measured("a", 2)], metadata("2026-01-02T03:04:05.678Z"))
    ).toThrow(ZodError);
  });

  it("stamps the schema version", () => {
    const report = buildReport([measured("a", 1)], metadata("2026-01-02T03:04:05.678Z"));

    expect(report.schemaVersion).toBe(1);
  });
});

describe("formatMarkdownTable", () => {
  it("shows cost deltas against the previous results", () => {
    const table = formatMarkdownTable(
      [measured("up", 110), measured("same", 50), measured("new", 7), failedResult("bad", "a | b")],
      [measured("up", 100), measured("same", 50), failedResult("new", "earlier failure")],
    );

    expect(table.split("\n")).toEqual([
      "| Benchmark | Cost (units) | Delta | p50 (ms) |",
      "| --- | ---: | ---: | ---: |",
      "| up | 110 | +10 (10.0%) | 0.500 |",
      "| same | 50 | 0 | 0.500 |",
      "| new | 7 | n/a | 0.500 |",
      "| bad | failed: a \\| b | n/a | n/a |",
    ]);
  });

  it("shows decreases", () => {
    const table = formatMarkdownTable([measured("down", 75)], [measured("down", 100)]);

    expect(table.split("\n")[2]).toBe("| down | 75 | -25 (-25.0%) | 0.500 |");
  });
});

describe("report files", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "report-test-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("names files by timestamp", () => {
    expect(reportFileName("2026-01-02T03:04:05.678Z")).toBe("2026-01-02T03-04-05-678Z.json");
  });

  it("writes a report and loads the newest one back", async () => {
    const older = buildReport([measured("a", 1)], metadata("2026-01-02T03:04:05.678Z"));
    const newer = buildReport([measured("a", 2)], metadata("2026-02-02T03:04:05.678Z"));

    const latest = await run(function* () {
      yield* writeReport(dir, newer);
      yield* writeReport(dir, older);
      return yield* loadLatestReport(dir);
    });

    expect(latest).toEqual(newer);
  });

  it("lists reports oldest first and skips other files", async () => {
    writeFileSync(join(dir, "notes.txt"), "ignored");
    writeFileSync(join(dir, "2026-03-01T00-00-00-000Z.json"), "{}");
    writeFileSync(join(dir, "2026-01-01T00-00-00-000Z.json"), "{}");

    const paths = await run(() => listReports(dir));

    expect(paths).toEqual([
      join(dir, "2026-01-01T00-00-00-000Z.json"),
      join(dir, "2026-03-01T00-00-00-000Z.json"),
    ]);
  });

  it("treats a missing directory as empty", async () => {
    const latest = await run(() => loadLatestReport(join(dir, "missing")));

    expect(latest).toBeUndefined();
  });

  it("rejects files that are not reports", async () => {
    const path = join(dir, "bad.json");
    writeFileSync(path, JSON.stringify({ schemaVersion: 1 }));

    await expect(run(() => readReport(path))).rejects.toThrow(`${path} is not a valid report`);
  });
});
