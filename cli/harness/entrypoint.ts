/**
 * Program entrypoint shared by every variant build.
 *
 * An execution service calls `process` once per invocation with the
 * instruction bytes, the serialized account input and a fresh meter.
 *
 * @module
 */

import { dispatch } from "./dispatch.ts";
import { createRuntime, type ComputeMeter } from "./meter.ts";
import type { Registry } from "./registry.ts";
import type {
  DispatchError,
  Outcome,
  Syscalls,
  TargetDescriptor,
} from "./types.ts";

/**
 * What an invocation left behind.
 */
export interface ProgramExit {
  result: Outcome<void, DispatchError>;
  returnData: Uint8Array;
  logs: string[];
}

/**
 * A loaded variant build.
 */
export interface VariantProgram {
  /** Environment this build was compiled for */
  readonly environment: string;
  /** Program address, 64 hex characters */
  readonly programId: string;
  /** Registered targets, ascending by id */
  readonly targets: readonly TargetDescriptor[];
  process(
    instruction: Uint8Array,
    input: Uint8Array,
    meter: ComputeMeter,
  ): ProgramExit;
}

/**
 * Parts a variant supplies to build its program.
 */
export interface ProgramOpts<A> {
  environment: string;
  programId: string;
  registry: Registry<A>;
  /** Turn the serialized input into this environment's account list */
  deserialize(input: Uint8Array, syscalls: Syscalls): A[];
}

/**
 * Wire a registry and an account deserializer into a program.
 */
export function createProgram<A>(opts: ProgramOpts<A>): VariantProgram {
  const { environment, programId, registry, deserialize } = opts;

  return {
    environment,
    programId,
    targets: registry.descriptors,
    process(instruction, input, meter) {
      const runtime = createRuntime(meter);
      const accounts = deserialize(input, runtime.syscalls);
      const result = dispatch(
        registry,
        { programId, syscalls: runtime.syscalls },
        instruction,
        accounts,
      );
      return { result, returnData: runtime.returnData(), logs: runtime.logs };
    },
  };
}
