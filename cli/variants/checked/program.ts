/**
 * Checked variant build.
 *
 * Imports only checked-environment targets; the zero-copy build never
 * appears in this module graph.
 *
 * @module
 */

import { createProgram } from "../../harness/entrypoint.ts";
import { defineRegistry, register } from "../../harness/registry.ts";
import { deserializeCheckedAccounts, type CheckedAccount } from "./accounts.ts";
import { accountCount, accountRead, echo, log } from "./targets/basic.ts";
import { getEntry, positionBinaryTarget } from "./targets/slot-hashes.ts";
import { createAccountTarget, transferTarget } from "./targets/system.ts";
import { CHECKED_PROGRAM_ID } from "./manifest.ts";

export const registry = defineRegistry<CheckedAccount>([
  register(echo),
  register(log),
  register(accountCount),
  register(accountRead),
  register(transferTarget),
  register(createAccountTarget),
  register(getEntry),
  register(positionBinaryTarget),
]);

export const program = createProgram({
  environment: "checked",
  programId: CHECKED_PROGRAM_ID,
  registry,
  deserialize: deserializeCheckedAccounts,
});
