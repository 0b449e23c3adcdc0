/**
 * Zero-copy variant build.
 *
 * @module
 */

import { createProgram } from "../../harness/entrypoint.ts";
import { defineRegistry, register } from "../../harness/registry.ts";
import { deserializeAccountViews, type AccountView } from "./accounts.ts";
import { accountCount, accountRead, echo, log } from "./targets/basic.ts";
import {
  getEntry,
  positionBinaryTarget,
  positionInterpolatedTarget,
  positionNaiveTarget,
} from "./targets/slot-hashes.ts";
import { createAccountTarget, transferTarget } from "./targets/system.ts";
import { ZERO_COPY_PROGRAM_ID } from "./manifest.ts";

export const registry = defineRegistry<AccountView>([
  register(echo),
  register(log),
  register(accountCount),
  register(accountRead),
  register(transferTarget),
  register(createAccountTarget),
  register(getEntry),
  register(positionNaiveTarget),
  register(positionInterpolatedTarget),
  register(positionBinaryTarget),
]);

export const program = createProgram({
  environment: "zero-copy",
  programId: ZERO_COPY_PROGRAM_ID,
  registry,
  deserialize: deserializeAccountViews,
});
