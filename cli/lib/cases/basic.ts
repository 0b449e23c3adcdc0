/**
 * Cases for targets that need little or no account state.
 *
 * @module
 */

import { ACCOUNT_COUNT, ACCOUNT_READ, ECHO, LOG } from "../../targets/catalog.ts";
import { encodeU64 } from "../../targets/codec.ts";
import { readonlyAccounts } from "../fixtures.ts";
import { intParam, type BenchCase } from "./types.ts";

/** Bytes of data each account-read fixture holds */
export const READ_ACCOUNT_DATA_LEN = 8;

export const echoCase: BenchCase = {
  target: ECHO,
  variations: [
    { strategy: "single" },
    { strategy: "halving", parameters: { max: 1024, key: "bytes" } },
  ],
  build(record) {
    const bytes = record.strategy === "single" ? 0 : intParam(record, "bytes");
    return {
      setupData: Uint8Array.from({ length: bytes }, (_, i) => i % 256),
      accounts: [],
    };
  },
};

export const logCase: BenchCase = {
  target: LOG,
  variations: [{ strategy: "single" }],
  build() {
    return { setupData: new Uint8Array(0), accounts: [] };
  },
};

export const accountCountCase: BenchCase = {
  target: ACCOUNT_COUNT,
  variations: [
    {
      strategy: "values",
      parameters: { values: [1, 3, 5, 10, 20, 32, 64], key: "accounts" },
    },
  ],
  build(record) {
    const count = intParam(record, "accounts");
    return {
      setupData: encodeU64(BigInt(count)),
      accounts: readonlyAccounts(count),
    };
  },
};

export const accountReadCase: BenchCase = {
  target: ACCOUNT_READ,
  variations: [
    { strategy: "halving", parameters: { max: 64, key: "accounts" } },
  ],
  build(record) {
    const count = intParam(record, "accounts");
    return {
      setupData: Uint8Array.of(count),
      accounts: readonlyAccounts(count, READ_ACCOUNT_DATA_LEN),
    };
  },
};
