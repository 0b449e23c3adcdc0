/**
 * list command implementation.
 *
 * Shows the variant builds, the targets each registers with the
 * variations its case sweeps, and the available strategies.
 *
 * @module
 */

import type { Operation } from "effection";
import { caseTable } from "../lib/cases/mod.ts";
import { formatVariation } from "../lib/report.ts";
import { generateVariations, listStrategies } from "../lib/variations/mod.ts";
import { listVariants } from "../variants/mod.ts";

export function* listCommand(args: string[]): Operation<number> {
  const verbose = args.includes("--verbose") || args.includes("-v");
  const unknown = args.filter((a) => a !== "--verbose" && a !== "-v");
  if (unknown.length > 0) {
    console.error(`Unknown option: ${unknown[0]}`);
    return 1;
  }

  const cases = caseTable();

  for (const variant of listVariants()) {
    console.log(`\n${variant.id}: ${variant.description}`);
    for (const target of variant.manifest) {
      const benchCase = cases.get(target.id);
      const records = benchCase ? generateVariations(target, benchCase.variations) : [];
      const id = String(target.id).padStart(3);
      console.log(`  ${id}  ${target.displayName} (${records.length} variation(s))`);
      if (verbose) {
        for (const record of records) {
          console.log(`         ${formatVariation(record)}`);
        }
      }
    }
  }

  console.log(`\nStrategies: ${listStrategies().join(", ")}`);
  return 0;
}
