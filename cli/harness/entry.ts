/**
 * Harness entry point.
 *
 * Executed as a child process by the subprocess executor: reads one
 * request file, loads that environment's build, runs the instruction
 * once and prints the response as a single JSON line.
 *
 * @module
 */

import { readFile } from "node:fs/promises";
import { call, exit, main } from "effection";
import { getVariant } from "../variants/mod.ts";
import { parseHarnessArgs, validateHarnessArgs } from "./args.ts";
import { executeProgram } from "./execute.ts";
import {
  HarnessRequestSchema,
  decodeAccount,
  decodeInstructionHex,
  encodeResponse,
} from "./protocol.ts";

main(function* () {
  const args = parseHarnessArgs(process.argv.slice(2));

  const validationError = validateHarnessArgs(args);
  if (validationError) {
    console.error(`Error: ${validationError}`);
    yield* exit(2);
    return;
  }

  const text = yield* call(() => readFile(args.request, "utf8"));
  const parsed = HarnessRequestSchema.safeParse(JSON.parse(text));
  if (!parsed.success) {
    console.error(`Invalid request ${args.request}: ${parsed.error.message}`);
    yield* exit(2);
    return;
  }

  const request = parsed.data;
  const program = yield* call(() => getVariant(request.environment).load());

  // budget exhaustion or a thrown program error exits non-zero through main()
  const execution = executeProgram(
    program,
    decodeInstructionHex(request.instruction),
    request.accounts.map(decodeAccount),
    request.computeBudget,
  );

  console.log(JSON.stringify(encodeResponse(execution)));
  yield* exit(0);
});
