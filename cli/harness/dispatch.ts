/**
 * The in-artifact router.
 *
 * Decodes the target id, looks it up and runs setup + run. Everything in
 * here is inside the measured path, so it does nothing else: no logging,
 * no retries, no cleanup beyond scope exit.
 *
 * @module
 */

import { decodeInstruction } from "./instruction.ts";
import { INSTRUCTION_DECODE_COST } from "./meter.ts";
import type { Registry } from "./registry.ts";
import type { DispatchError, Outcome, ProgramContext } from "./types.ts";

/**
 * Route one instruction to its target.
 */
export function dispatch<A>(
  registry: Registry<A>,
  program: ProgramContext,
  instruction: Uint8Array,
  accounts: readonly A[],
): Outcome<void, DispatchError> {
  program.syscalls.consume(INSTRUCTION_DECODE_COST);

  const decoded = decodeInstruction(instruction);
  if (!decoded.ok) {
    return decoded;
  }

  const { targetId, setupData } = decoded.value;
  const target = registry.lookup(targetId);
  if (!target) {
    return { ok: false, error: { kind: "UnknownTarget", targetId } };
  }

  return target.invoke(program, accounts, setupData);
}
