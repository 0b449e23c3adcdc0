/**
 * Temporary directory resource.
 *
 * @module
 */

import { mkdtempSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { resource, type Operation } from "effection";

/**
 * Create a temporary directory that is removed when the scope exits.
 *
 * @param prefix - Prefix for the temp directory name
 * @returns The path to the created temp directory
 */
export function useTempDir(prefix = "variant-bench-"): Operation<string> {
  return resource(function* (provide) {
    const dir = mkdtempSync(join(tmpdir(), prefix));
    try {
      yield* provide(dir);
    } finally {
      // force: the directory may already be gone
      rmSync(dir, { recursive: true, force: true });
    }
  });
}
