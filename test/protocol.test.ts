import { describe, expect, it } from "vitest";
import { parseHarnessArgs, validateHarnessArgs } from "../cli/harness/args.ts";
import type { Execution } from "../cli/harness/execute.ts";
import {
  HarnessRequestSchema,
  decodeAccount,
  decodeInstructionHex,
  decodeResponse,
  encodeAccount,
  encodeInstructionHex,
  encodeResponse,
  parseHarnessOutput,
} from "../cli/harness/protocol.ts";
import { payerAccount, readonlyAccounts } from "../cli/lib/fixtures.ts";

describe("harness args", () => {
  it("reads the request path", () => {
    const args = parseHarnessArgs(["--request", "/tmp/request-0.json"]);

    expect(args).toEqual({ request: "/tmp/request-0.json" });
    expect(validateHarnessArgs(args)).toBeNull();
  });

  it("requires a request path", () => {
    expect(validateHarnessArgs(parseHarnessArgs([]))).toBe(
      "Missing required --request argument",
    );
  });
});

describe("request encoding", () => {
  it("encodes accounts with decimal lamports and base64 data", () => {
    const [account] = readonlyAccounts(1, 3);

    expect(encodeAccount(account)).toEqual({
      key: account.key,
      owner: account.owner,
      lamports: "2000000000",
      data: "AQEB",
      isSigner: false,
      isWritable: false,
      executable: false,
    });
    expect(decodeAccount(encodeAccount(account))).toEqual(account);
  });

  it("encodes the instruction as hex", () => {
    expect(encodeInstructionHex(Uint8Array.of(0x0a, 0x00, 0xff))).toBe("0a00ff");
    expect(decodeInstructionHex("0a00ff")).toEqual(Uint8Array.of(0x0a, 0x00, 0xff));
  });

  it("validates requests", () => {
    const request = {
      environment: "zero-copy",
      instruction: "0100",
      accounts: [encodeAccount(payerAccount())],
      computeBudget: 1_000,
    };

    expect(HarnessRequestSchema.safeParse(request).success).toBe(true);
    expect(HarnessRequestSchema.safeParse({ ...request, environment: "native" }).success).toBe(
      false,
    );
    expect(HarnessRequestSchema.safeParse({ ...request, instruction: "010" }).success).toBe(
      false,
    );
  });
});

describe("response encoding", () => {
  it("carries return data for successful executions", () => {
    const execution: Execution = {
      cost: 101,
      elapsedMs: 0.25,
      result: { ok: true, value: undefined },
      returnData: Uint8Array.of(1, 2),
      logs: [],
    };

    const response = encodeResponse(execution);
    expect(response).toEqual({ ok: true, cost: 101, elapsedMs: 0.25, logs: [], returnData: "AQI=" });
    expect(decodeResponse(response)).toEqual(execution);
  });

  it("carries the dispatch error for failed executions", () => {
    const execution: Execution = {
      cost: 1,
      elapsedMs: 0.5,
      result: { ok: false, error: { kind: "UnknownTarget", targetId: 12 } },
      returnData: new Uint8Array(0),
      logs: [],
    };

    expect(decodeResponse(encodeResponse(execution))).toEqual(execution);
  });
});

describe("parseHarnessOutput", () => {
  it("finds the JSON line among other output", () => {
    const stdout = [
      "warming up",
      JSON.stringify({ ok: false, cost: 1, elapsedMs: 0, logs: [], error: { kind: "Truncated", length: 0 } }),
      "",
    ].join("\n");

    expect(parseHarnessOutput(stdout)).toEqual({
      ok: false,
      cost: 1,
      elapsedMs: 0,
      logs: [],
      error: { kind: "Truncated", length: 0 },
    });
  });

  it("rejects output without JSON", () => {
    expect(() => parseHarnessOutput("nothing here")).toThrow("Harness did not output JSON");
  });

  it("rejects malformed JSON", () => {
    expect(() => parseHarnessOutput("{not json")).toThrow(
      "Failed to parse harness JSON output",
    );
  });

  it("rejects JSON of the wrong shape", () => {
    expect(() => parseHarnessOutput(JSON.stringify({ ok: true, cost: -1 }))).toThrow(
      "Invalid harness output format",
    );
  });
});
