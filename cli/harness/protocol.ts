/**
 * Wire format between the subprocess executor and the harness entry.
 *
 * The executor writes a request file; the harness prints exactly one
 * JSON line on stdout. Byte fields travel as base64, the instruction as
 * hex and lamports as decimal strings.
 *
 * @module
 */

import { z } from "zod";
import { toError } from "../lib/result.ts";
import { EnvironmentIdSchema } from "../lib/schema.ts";
import type { Execution } from "./execute.ts";
import type { AccountFixture } from "./input.ts";
import type { DispatchError } from "./types.ts";

const Address = z.string().regex(/^[0-9a-f]{64}$/);
const Base64 = z.string().regex(/^[A-Za-z0-9+/]*={0,2}$/);
const Hex = z.string().regex(/^(?:[0-9a-f]{2})*$/);

export const AccountFixtureWireSchema = z.object({
  key: Address,
  owner: Address,
  lamports: z.string().regex(/^\d+$/),
  data: Base64,
  isSigner: z.boolean(),
  isWritable: z.boolean(),
  executable: z.boolean(),
});

export type AccountFixtureWire = z.infer<typeof AccountFixtureWireSchema>;

export const HarnessRequestSchema = z.object({
  environment: EnvironmentIdSchema,
  instruction: Hex,
  accounts: z.array(AccountFixtureWireSchema),
  computeBudget: z.number().int().positive(),
});

export type HarnessRequest = z.infer<typeof HarnessRequestSchema>;

export const DispatchErrorSchema = z.discriminatedUnion("kind", [
  z.object({ kind: z.literal("Truncated"), length: z.number().int().nonnegative() }),
  z.object({ kind: z.literal("UnknownTarget"), targetId: z.number().int().nonnegative() }),
  z.object({
    kind: z.literal("Setup"),
    targetId: z.number().int().nonnegative(),
    error: z.object({ kind: z.literal("InvalidData"), reason: z.string() }),
  }),
  z.object({
    kind: z.literal("Run"),
    targetId: z.number().int().nonnegative(),
    error: z.object({ kind: z.literal("Failed"), cause: z.string() }),
  }),
]) satisfies z.ZodType<DispatchError>;

const ResponseBase = z.object({
  cost: z.number().int().nonnegative(),
  elapsedMs: z.number().nonnegative().finite(),
  logs: z.array(z.string()),
});

export const HarnessResponseSchema = z.discriminatedUnion("ok", [
  ResponseBase.extend({ ok: z.literal(true), returnData: Base64 }),
  ResponseBase.extend({ ok: z.literal(false), error: DispatchErrorSchema }),
]);

export type HarnessResponse = z.infer<typeof HarnessResponseSchema>;

function toBase64(bytes: Uint8Array): string {
  return Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength).toString("base64");
}

function fromBase64(text: string): Uint8Array {
  return Uint8Array.from(Buffer.from(text, "base64"));
}

export function encodeAccount(account: AccountFixture): AccountFixtureWire {
  return {
    key: account.key,
    owner: account.owner,
    lamports: account.lamports.toString(),
    data: toBase64(account.data),
    isSigner: account.isSigner,
    isWritable: account.isWritable,
    executable: account.executable,
  };
}

export function decodeAccount(wire: AccountFixtureWire): AccountFixture {
  return {
    key: wire.key,
    owner: wire.owner,
    lamports: BigInt(wire.lamports),
    data: fromBase64(wire.data),
    isSigner: wire.isSigner,
    isWritable: wire.isWritable,
    executable: wire.executable,
  };
}

export function encodeInstructionHex(instruction: Uint8Array): string {
  return Buffer.from(
    instruction.buffer,
    instruction.byteOffset,
    instruction.byteLength,
  ).toString("hex");
}

export function decodeInstructionHex(hex: string): Uint8Array {
  return Uint8Array.from(Buffer.from(hex, "hex"));
}

export function encodeResponse(execution: Execution): HarnessResponse {
  const { cost, elapsedMs, logs, result } = execution;
  return result.ok
    ? { ok: true, cost, elapsedMs, logs, returnData: toBase64(execution.returnData) }
    : { ok: false, cost, elapsedMs, logs, error: result.error };
}

export function decodeResponse(response: HarnessResponse): Execution {
  const { cost, elapsedMs, logs } = response;
  return response.ok
    ? {
      cost,
      elapsedMs,
      logs,
      result: { ok: true, value: undefined },
      returnData: fromBase64(response.returnData),
    }
    : {
      cost,
      elapsedMs,
      logs,
      result: { ok: false, error: response.error },
      returnData: new Uint8Array(0),
    };
}

/**
 * Pick the response line out of harness stdout and validate it.
 * @throws Error naming what was wrong, with the raw output attached
 */
export function parseHarnessOutput(stdout: string): HarnessResponse {
  const lines = stdout.trim().split("\n");
  const jsonLine = lines.find((line) => line.startsWith("{"));

  if (!jsonLine) {
    throw new Error(`Harness did not output JSON. Output:\n${stdout}`);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(jsonLine);
  } catch (e) {
    throw new Error(
      `Failed to parse harness JSON output: ${toError(e).message}\nOutput:\n${stdout}`,
    );
  }

  const result = HarnessResponseSchema.safeParse(parsed);
  if (!result.success) {
    throw new Error(
      `Invalid harness output format: ${result.error.message}\nOutput:\n${stdout}`,
    );
  }
  return result.data;
}
