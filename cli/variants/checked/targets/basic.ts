/**
 * Echo, log and account targets for the checked environment.
 *
 * @module
 */

import { DONE, failed, ok } from "../../../harness/outcome.ts";
import type { ProgramContext, Target } from "../../../harness/types.ts";
import {
  ACCOUNT_COUNT,
  ACCOUNT_READ,
  ECHO,
  LOG,
} from "../../../targets/catalog.ts";
import {
  parseEchoPayload,
  parseLogMessage,
  parseReadCount,
  parseU64,
} from "../../../targets/setup-data.ts";
import type { CheckedAccount } from "../accounts.ts";

interface EchoInstance {
  program: ProgramContext;
  payload: Uint8Array;
}

export const echo: Target<CheckedAccount, EchoInstance> = {
  descriptor: ECHO,
  setup(program, _accounts, data) {
    const payload = parseEchoPayload(data);
    if (!payload.ok) return payload;
    // owned copy, like every other buffer in this environment
    return ok({ program, payload: payload.value.slice() });
  },
  run({ program, payload }) {
    program.syscalls.setReturnData(payload);
    return DONE;
  },
};

interface LogInstance {
  program: ProgramContext;
  message: string;
}

export const log: Target<CheckedAccount, LogInstance> = {
  descriptor: LOG,
  setup(program, _accounts, data) {
    const message = parseLogMessage(data);
    if (!message.ok) return message;
    return ok({ program, message: message.value });
  },
  run({ program, message }) {
    program.syscalls.log(message);
    return DONE;
  },
};

export const accountCount: Target<CheckedAccount, bigint> = {
  descriptor: ACCOUNT_COUNT,
  setup(_program, _accounts, data) {
    return parseU64(data, "account count");
  },
  run(expected, accounts) {
    if (BigInt(accounts.length) !== expected) {
      return failed(`InvalidArgument: expected ${expected} account(s), got ${accounts.length}`);
    }
    return DONE;
  },
};

export const accountRead: Target<CheckedAccount, number> = {
  descriptor: ACCOUNT_READ,
  setup(_program, _accounts, data) {
    return parseReadCount(data);
  },
  run(count, accounts) {
    if (accounts.length < count) {
      return failed(
        `NotEnoughAccountKeys: expected at least ${count}, found ${accounts.length}`,
      );
    }
    for (let i = 0; i < count; i++) {
      const read = accounts[i].withData((data) => (data.length > 0 ? data[0] : 0));
      if (!read.ok) return read;
    }
    return DONE;
  },
};
