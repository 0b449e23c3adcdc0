/**
 * System-program targets for the checked environment.
 *
 * Accounts go through a privilege check before the system program sees
 * them.
 *
 * @module
 */

import { failed, ok } from "../../../harness/outcome.ts";
import type { ProgramContext, Target } from "../../../harness/types.ts";
import { CREATE_ACCOUNT, TRANSFER } from "../../../targets/catalog.ts";
import { parseCreateAccount, parseU64 } from "../../../targets/setup-data.ts";
import { createAccount, transfer } from "../../../targets/system-program.ts";
import { checkPrivileges, type CheckedAccount } from "../accounts.ts";

interface TransferInstance {
  program: ProgramContext;
  lamports: bigint;
}

export const transferTarget: Target<CheckedAccount, TransferInstance> = {
  descriptor: TRANSFER,
  setup(program, _accounts, data) {
    const lamports = parseU64(data, "transfer");
    if (!lamports.ok) return lamports;
    return ok({ program, lamports: lamports.value });
  },
  run({ program, lamports }, accounts) {
    const [from, to] = accounts;
    if (!from || !to) {
      return failed(`NotEnoughAccountKeys: transfer needs 2, found ${accounts.length}`);
    }
    const checked = checkPrivileges(program.syscalls, [from, to]);
    if (!checked.ok) return checked;
    return transfer(program.syscalls, from, to, lamports);
  },
};

interface CreateAccountInstance {
  program: ProgramContext;
  lamports: bigint;
  space: number;
}

export const createAccountTarget: Target<CheckedAccount, CreateAccountInstance> = {
  descriptor: CREATE_ACCOUNT,
  setup(program, _accounts, data) {
    const params = parseCreateAccount(data);
    if (!params.ok) return params;
    return ok({ program, ...params.value });
  },
  run({ program, lamports, space }, accounts) {
    const [payer, created] = accounts;
    if (!payer || !created) {
      return failed(`NotEnoughAccountKeys: create account needs 2, found ${accounts.length}`);
    }
    const checked = checkPrivileges(program.syscalls, [payer, created]);
    if (!checked.ok) return checked;
    return createAccount(
      program.syscalls,
      payer,
      created,
      lamports,
      space,
      program.programId,
    );
  },
};
