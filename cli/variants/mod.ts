/**
 * Variant build table.
 *
 * Each environment's program module is reached only through `load()`,
 * so a process that runs the checked build never imports zero-copy
 * targets and vice versa. The manifests are plain descriptor lists and
 * safe to import anywhere.
 *
 * @module
 */

import type { VariantProgram } from "../harness/entrypoint.ts";
import type { TargetDescriptor } from "../harness/types.ts";
import { ENVIRONMENTS, type EnvironmentId } from "../lib/schema.ts";
import { checkedManifest } from "./checked/manifest.ts";
import { zeroCopyManifest } from "./zero-copy/manifest.ts";

/**
 * One compiled artifact per environment.
 */
export interface VariantBuild {
  /** Environment identifier, used as the first part of every label */
  id: string;
  /** One-line summary for `bench list` */
  description: string;
  /** Targets the build registers, ascending by id */
  manifest: readonly TargetDescriptor[];
  /** Load the program module */
  load(): Promise<VariantProgram>;
}

export const checkedVariant: VariantBuild = {
  id: "checked",
  description: "Owned account copies, borrow-tracked access, privilege checks",
  manifest: checkedManifest,
  load: () => import("./checked/program.ts").then((m) => m.program),
};

export const zeroCopyVariant: VariantBuild = {
  id: "zero-copy",
  description: "Views over the input buffer, unchecked access",
  manifest: zeroCopyManifest,
  load: () => import("./zero-copy/program.ts").then((m) => m.program),
};

/**
 * Get the variant build for an environment.
 * Uses exhaustive switch for type safety.
 */
export function getVariant(id: EnvironmentId): VariantBuild {
  switch (id) {
    case "checked":
      return checkedVariant;
    case "zero-copy":
      return zeroCopyVariant;
    default: {
      const _exhaustive: never = id;
      throw new Error(`Unknown environment: ${_exhaustive}`);
    }
  }
}

/**
 * All built-in variants, in label order.
 */
export function listVariants(): VariantBuild[] {
  return ENVIRONMENTS.map(getVariant);
}
