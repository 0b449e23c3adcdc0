/**
 * Cases for targets that call into the system program.
 *
 * @module
 */

import { CREATE_ACCOUNT, TRANSFER } from "../../targets/catalog.ts";
import { encodeU64 } from "../../targets/codec.ts";
import { emptyAccount, payerAccount } from "../fixtures.ts";
import { intParam, type BenchCase } from "./types.ts";

export const TRANSFER_LAMPORTS = 1_000_000_000n;

export const CREATE_ACCOUNT_LAMPORTS = 500_000_000n;

export const transferCase: BenchCase = {
  target: TRANSFER,
  variations: [{ strategy: "single" }],
  build() {
    return {
      setupData: encodeU64(TRANSFER_LAMPORTS),
      accounts: [payerAccount(), emptyAccount()],
    };
  },
};

export const createAccountCase: BenchCase = {
  target: CREATE_ACCOUNT,
  variations: [
    { strategy: "halving", parameters: { max: 1024, key: "space" } },
  ],
  build(record) {
    const space = intParam(record, "space");
    return {
      setupData: encodeU64(CREATE_ACCOUNT_LAMPORTS, BigInt(space)),
      // the created account signs for its own creation
      accounts: [payerAccount(), emptyAccount(0, true)],
    };
  },
};
