/**
 * Echo, log and account targets for the zero-copy environment.
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
import { ZERO_COPY_COSTS, type AccountView } from "../accounts.ts";

interface EchoInstance {
  program: ProgramContext;
  payload: Uint8Array;
}

export const echo: Target<AccountView, EchoInstance> = {
  descriptor: ECHO,
  setup(program, _accounts, data) {
    const payload = parseEchoPayload(data);
    if (!payload.ok) return payload;
    return ok({ program, payload: payload.value });
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

export const log: Target<AccountView, LogInstance> = {
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

export const accountCount: Target<AccountView, bigint> = {
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

interface ReadInstance {
  program: ProgramContext;
  count: number;
}

export const accountRead: Target<AccountView, ReadInstance> = {
  descriptor: ACCOUNT_READ,
  setup(program, _accounts, data) {
    const count = parseReadCount(data);
    if (!count.ok) return count;
    return ok({ program, count: count.value });
  },
  run({ program, count }, accounts) {
    if (accounts.length < count) {
      return failed(
        `NotEnoughAccountKeys: expected at least ${count}, found ${accounts.length}`,
      );
    }
    for (let i = 0; i < count; i++) {
      program.syscalls.consume(ZERO_COPY_COSTS.borrow);
      const data = accounts[i].borrowDataUnchecked();
      if (data.length > 0) {
        void data[0];
      }
    }
    return DONE;
  },
};
