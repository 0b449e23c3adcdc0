/**
 * compare command implementation.
 *
 * Prints one report as a markdown table with cost deltas against
 * another: by default the newest report against the one before it.
 *
 * @module
 */

import type { Operation } from "effection";
import { loadBenchConfig } from "../lib/config.ts";
import { formatMarkdownTable, listReports, readReport } from "../lib/report.ts";
import { toError, wrapResult } from "../lib/result.ts";

/**
 * Compare two reports.
 */
export function* compareCommand(args: string[]): Operation<number> {
  const files: string[] = [];
  let outDir: string | undefined;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === "--out-dir") {
      outDir = args[++i];
      if (!outDir) {
        console.error("Missing value for --out-dir");
        return 1;
      }
    } else if (arg.startsWith("--")) {
      console.error(`Unknown option: ${arg}`);
      return 1;
    } else {
      files.push(arg);
    }
  }

  if (files.length !== 0 && files.length !== 2) {
    console.error("Expected two report files, or none to compare the newest two");
    return 1;
  }

  let paths = files;
  if (paths.length === 0) {
    let dir: string;
    try {
      dir = outDir ?? loadBenchConfig().outDir;
    } catch (error: unknown) {
      console.error(`Invalid config: ${toError(error).message}`);
      return 1;
    }
    const reports = yield* wrapResult(dir, listReports(dir));
    if (!reports.ok) {
      console.error(`Cannot list reports: ${reports.error.message}`);
      return 1;
    }
    if (reports.value.length < 2) {
      console.error(`Need at least two reports in ${dir}, found ${reports.value.length}`);
      return 1;
    }
    paths = reports.value.slice(-2);
  }

  const [basePath, headPath] = paths;
  const base = yield* wrapResult(basePath, readReport(basePath));
  if (!base.ok) {
    console.error(`Cannot read report: ${base.error.message}`);
    return 1;
  }
  const head = yield* wrapResult(headPath, readReport(headPath));
  if (!head.ok) {
    console.error(`Cannot read report: ${head.error.message}`);
    return 1;
  }

  console.log(`Base: ${basePath} (${base.value.metadata.timestamp})`);
  console.log(`Head: ${headPath} (${head.value.metadata.timestamp})\n`);
  console.log(formatMarkdownTable(head.value.results, base.value.results));

  return 0;
}
