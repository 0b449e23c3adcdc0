/**
 * Target registry for one variant build.
 *
 * The registry is a dense array indexed by target id, built once when
 * the variant's program module loads. Lookup is a bounds check plus an
 * index, so registering more targets never changes what dispatching an
 * existing one costs.
 *
 * @module
 */

import { MAX_TARGET_ID } from "./instruction.ts";
import type {
  DispatchError,
  Outcome,
  ProgramContext,
  RegisteredTarget,
  Target,
  TargetDescriptor,
} from "./types.ts";
import { DONE } from "./outcome.ts";

/**
 * A malformed registry. Thrown while a program module loads, before any
 * measurement runs.
 */
export class RegistryError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "RegistryError";
  }
}

/**
 * Lookup table from target id to registered target.
 */
export interface Registry<A> {
  /** Registered descriptors, ascending by id */
  readonly descriptors: readonly TargetDescriptor[];
  lookup(targetId: number): RegisteredTarget<A> | undefined;
}

/**
 * Fuse a target's setup and run into one invocation.
 * The instance created by setup lives only for the duration of `invoke`.
 */
export function register<A, I>(target: Target<A, I>): RegisteredTarget<A> {
  const { descriptor } = target;
  return {
    descriptor,
    invoke(
      program: ProgramContext,
      accounts: readonly A[],
      data: Uint8Array,
    ): Outcome<void, DispatchError> {
      const setup = target.setup(program, accounts, data);
      if (!setup.ok) {
        return {
          ok: false,
          error: { kind: "Setup", targetId: descriptor.id, error: setup.error },
        };
      }

      const run = target.run(setup.value, accounts);
      if (!run.ok) {
        return {
          ok: false,
          error: { kind: "Run", targetId: descriptor.id, error: run.error },
        };
      }

      return DONE;
    },
  };
}

/**
 * Build the lookup table for a variant.
 *
 * @throws RegistryError on duplicate or out-of-range ids
 */
export function defineRegistry<A>(
  targets: readonly RegisteredTarget<A>[],
): Registry<A> {
  let maxId = -1;
  const seen = new Map<number, string>();

  for (const { descriptor } of targets) {
    const { id, displayName } = descriptor;
    if (!Number.isInteger(id) || id < 0 || id > MAX_TARGET_ID) {
      throw new RegistryError(
        `Target "${displayName}" has id ${id}, outside 0..${MAX_TARGET_ID}`,
      );
    }
    const existing = seen.get(id);
    if (existing !== undefined) {
      throw new RegistryError(
        `Target id ${id} is registered twice ("${existing}" and "${displayName}")`,
      );
    }
    seen.set(id, displayName);
    maxId = Math.max(maxId, id);
  }

  const table = Array.from(
    { length: maxId + 1 },
    (): RegisteredTarget<A> | undefined => undefined,
  );
  for (const target of targets) {
    table[target.descriptor.id] = target;
  }

  const descriptors = targets
    .map((t) => t.descriptor)
    .sort((a, b) => a.id - b.id);

  return {
    descriptors,
    lookup(targetId: number): RegisteredTarget<A> | undefined {
      return targetId < table.length ? table[targetId] : undefined;
    },
  };
}
