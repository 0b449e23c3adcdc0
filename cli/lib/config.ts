/**
 * Loads bench.config.json.
 *
 * @module
 */

import { existsSync, readFileSync } from "node:fs";
import { validateBenchConfig, type BenchConfig } from "./schema.ts";

export const CONFIG_FILE = "bench.config.json";

/**
 * Read and validate the config file. A missing file means defaults.
 * @throws ZodError for invalid settings, SyntaxError for invalid JSON
 */
export function loadBenchConfig(path = CONFIG_FILE): BenchConfig {
  if (!existsSync(path)) {
    return validateBenchConfig({});
  }
  return validateBenchConfig(JSON.parse(readFileSync(path, "utf8")));
}
