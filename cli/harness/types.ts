/**
 * Type definitions for the target contract.
 *
 * Everything here is environment-neutral: the account type `A` is
 * supplied by each variant build, so a target written for the checked
 * environment and one written for the zero-copy environment share these
 * shapes but never each other's code.
 *
 * @module
 */

/**
 * Stable identity of a benchmark target.
 * The id is what travels on the wire, so it is never reused.
 */
export interface TargetDescriptor {
  /** Wire id, 0..65535 */
  readonly id: number;
  /** Human-readable name used in report labels */
  readonly displayName: string;
}

/**
 * A discriminated union for fallible steps inside a variant build.
 * Used instead of exceptions so the dispatcher never unwinds.
 */
export type Outcome<T, E> =
  | { ok: true; value: T }
  | { ok: false; error: E };

/**
 * Malformed or semantically invalid setup bytes.
 */
export interface SetupError {
  kind: "InvalidData";
  reason: string;
}

/**
 * The benchmarked logic itself failed.
 */
export interface RunError {
  kind: "Failed";
  cause: string;
}

/**
 * Everything the dispatcher can report back to the caller.
 */
export type DispatchError =
  | { kind: "Truncated"; length: number }
  | { kind: "UnknownTarget"; targetId: number }
  | { kind: "Setup"; targetId: number; error: SetupError }
  | { kind: "Run"; targetId: number; error: RunError };

/**
 * Runtime services an environment exposes to its programs.
 * Every call is metered by the execution service.
 */
export interface Syscalls {
  /** Append a program log line */
  log(message: string): void;
  /** Charge resource units for work the program performs */
  consume(units: number): void;
  /** Replace the invocation's return data */
  setReturnData(data: Uint8Array): void;
}

/**
 * Identity of the running program plus its environment's syscalls.
 */
export interface ProgramContext {
  /** Program address, 64 hex characters */
  readonly programId: string;
  readonly syscalls: Syscalls;
}

/**
 * The contract every benchmarkable snippet implements.
 *
 * `setup` builds a fresh instance from the setup bytes and must not
 * mutate the accounts. `run` is the measured operation and is called at
 * most once per instance.
 */
export interface Target<A, I> {
  readonly descriptor: TargetDescriptor;
  setup(
    program: ProgramContext,
    accounts: readonly A[],
    data: Uint8Array,
  ): Outcome<I, SetupError>;
  run(instance: I, accounts: readonly A[]): Outcome<void, RunError>;
}

/**
 * A target after registration: setup and run fused into one call with
 * the instance type erased.
 */
export interface RegisteredTarget<A> {
  readonly descriptor: TargetDescriptor;
  invoke(
    program: ProgramContext,
    accounts: readonly A[],
    data: Uint8Array,
  ): Outcome<void, DispatchError>;
}
