/**
 * Result collection, report files and the markdown summary.
 *
 * @module
 */

import { mkdir, readFile, readdir, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { call, type Operation } from "effection";
import {
  SCHEMA_VERSION,
  safeParseReport,
  validateReport,
  type MeasurementResult,
  type Metadata,
  type Report,
  type VariationRecord,
} from "./schema.ts";

/**
 * A label was recorded twice in one sweep.
 */
export class DuplicateLabelError extends Error {
  constructor(readonly label: string) {
    super(`Duplicate result label: ${label}`);
    this.name = "DuplicateLabelError";
  }
}

/**
 * `strategy(k=v, …)` in parameter order.
 */
export function formatVariation(record: VariationRecord): string {
  const params = Object.entries(record.parameters)
    .map(([key, value]) => `${key}=${value}`)
    .join(", ");
  return `${record.strategy}(${params})`;
}

/**
 * `<environment> · <target> · <strategy>(k=v, …)`
 */
export function formatLabel(
  environment: string,
  target: string,
  record: VariationRecord,
): string {
  return `${environment} · ${target} · ${formatVariation(record)}`;
}

/**
 * Append-only collection of results with unique labels.
 */
export class ResultSet {
  private readonly entries: MeasurementResult[] = [];
  private readonly labels = new Set<string>();

  /**
   * @throws DuplicateLabelError if the label is already present
   */
  add(result: MeasurementResult): void {
    if (this.labels.has(result.label)) {
      throw new DuplicateLabelError(result.label);
    }
    this.labels.add(result.label);
    this.entries.push(result);
  }

  has(label: string): boolean {
    return this.labels.has(label);
  }

  get size(): number {
    return this.entries.length;
  }

  get results(): readonly MeasurementResult[] {
    return this.entries;
  }

  get failed(): number {
    return this.entries.filter((r) => !r.ok).length;
  }
}

/**
 * Assemble and validate a report.
 */
export function buildReport(
  results: readonly MeasurementResult[],
  metadata: Metadata,
): Report {
  return validateReport({
    schemaVersion: SCHEMA_VERSION,
    metadata,
    results,
  });
}

/**
 * File name for a report taken at `timestamp` (ISO 8601). Names sort in
 * time order.
 */
export function reportFileName(timestamp: string): string {
  return `${timestamp.replace(/[:.]/g, "-")}.json`;
}

/**
 * Write a report under `dir`, creating it if needed.
 * @returns The path written
 */
export function* writeReport(dir: string, report: Report): Operation<string> {
  const path = join(dir, reportFileName(report.metadata.timestamp));
  yield* call(() => mkdir(dir, { recursive: true }));
  yield* call(() => writeFile(path, `${JSON.stringify(report, null, 2)}\n`));
  return path;
}

/**
 * Read and validate one report file.
 * @throws Error naming the file when it is not a valid report
 */
export function* readReport(path: string): Operation<Report> {
  const text = yield* call(() => readFile(path, "utf8"));
  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch (error: unknown) {
    throw new Error(`${path} is not JSON`, { cause: error });
  }
  const parsed = safeParseReport(data);
  if (!parsed.success) {
    throw new Error(`${path} is not a valid report: ${parsed.error.message}`);
  }
  return parsed.data;
}

/**
 * Report file paths under `dir`, oldest first. A missing directory has
 * no reports.
 */
export function* listReports(dir: string): Operation<string[]> {
  const names = yield* call(() =>
    readdir(dir).catch((error: unknown) => {
      if (error instanceof Error && "code" in error && error.code === "ENOENT") {
        return [];
      }
      throw error;
    })
  );
  return names
    .filter((name) => name.endsWith(".json"))
    .sort()
    .map((name) => join(dir, name));
}

/**
 * The newest report under `dir`, if there is one.
 */
export function* loadLatestReport(dir: string): Operation<Report | undefined> {
  const paths = yield* listReports(dir);
  const latest = paths.at(-1);
  return latest === undefined ? undefined : yield* readReport(latest);
}

function formatDelta(
  result: MeasurementResult,
  previous: ReadonlyMap<string, MeasurementResult>,
): string {
  const before = previous.get(result.label);
  if (!result.ok || !before?.ok) {
    return "n/a";
  }
  const delta = result.cost - before.cost;
  if (delta === 0) {
    return "0";
  }
  const percent = before.cost === 0 ? "" : ` (${((delta / before.cost) * 100).toFixed(1)}%)`;
  return `${delta > 0 ? "+" : ""}${delta}${percent}`;
}

function cell(text: string): string {
  return text.replace(/\|/g, "\\|");
}

/**
 * Markdown table of results, with the cost change against `previous`
 * matched by label.
 */
export function formatMarkdownTable(
  results: readonly MeasurementResult[],
  previous: readonly MeasurementResult[] = [],
): string {
  const before = new Map(previous.map((r) => [r.label, r]));
  const lines = [
    "| Benchmark | Cost (units) | Delta | p50 (ms) |",
    "| --- | ---: | ---: | ---: |",
  ];
  for (const result of results) {
    const cost = result.ok ? String(result.cost) : `failed: ${result.error}`;
    const p50 = result.ok ? result.timing.p50.toFixed(3) : "n/a";
    lines.push(
      `| ${cell(result.label)} | ${cell(cost)} | ${formatDelta(result, before)} | ${p50} |`,
    );
  }
  return lines.join("\n");
}
