/**
 * Accounts for the checked environment.
 *
 * Every account owns a copy of its data, and access goes through
 * borrow-tracked accessors that fail instead of aliasing.
 *
 * @module
 */

import {
  ACCOUNT_LAYOUT,
  REALLOC_PADDING,
  accountOffsets,
  bytesToAddress,
} from "../../harness/input.ts";
import { DONE, failed, ok } from "../../harness/outcome.ts";
import type { Outcome, RunError, Syscalls } from "../../harness/types.ts";
import type { SystemAccount } from "../../targets/system-program.ts";

/**
 * Resource units the checked environment charges for its bookkeeping.
 */
export const CHECKED_COSTS = {
  /** Per account on entry */
  deserializeAccount: 40,
  /** Copied data bytes covered by one unit on entry */
  copyBytesPerUnit: 64,
  /** Per data borrow */
  borrow: 6,
  /** Per slot-hash slot read */
  slotRead: 3,
  /** Per account checked before a system program call */
  privilegeCheck: 10,
} as const;

/**
 * Plain fields of a checked account.
 */
export interface CheckedAccountFields {
  key: string;
  owner: string;
  lamports: bigint;
  data: Uint8Array;
  capacity: number;
  isSigner: boolean;
  isWritable: boolean;
  executable: boolean;
}

/**
 * An account with owned data and borrow tracking.
 */
export class CheckedAccount implements SystemAccount {
  readonly key: string;
  readonly isSigner: boolean;
  readonly isWritable: boolean;
  readonly executable: boolean;
  private currentOwner: string;
  private balance: bigint;
  private bytes: Uint8Array;
  private readonly capacity: number;
  /** Active borrows: positive for shared, -1 for exclusive */
  private borrows = 0;

  constructor(
    fields: CheckedAccountFields,
    private readonly syscalls: Syscalls,
  ) {
    this.key = fields.key;
    this.isSigner = fields.isSigner;
    this.isWritable = fields.isWritable;
    this.executable = fields.executable;
    this.currentOwner = fields.owner;
    this.balance = fields.lamports;
    this.bytes = fields.data;
    this.capacity = fields.capacity;
  }

  get owner(): string {
    return this.currentOwner;
  }

  get lamports(): bigint {
    return this.balance;
  }

  get dataLength(): number {
    return this.bytes.length;
  }

  get isBorrowed(): boolean {
    return this.borrows !== 0;
  }

  /**
   * Read the account data for the duration of `fn`.
   */
  withData<T>(fn: (data: Uint8Array) => T): Outcome<T, RunError> {
    this.syscalls.consume(CHECKED_COSTS.borrow);
    if (this.borrows < 0) {
      return failed(`AccountBorrowFailed: ${this.key.slice(0, 8)}… is mutably borrowed`);
    }
    this.borrows++;
    try {
      return ok(fn(this.bytes));
    } finally {
      this.borrows--;
    }
  }

  /**
   * Write the account data for the duration of `fn`.
   */
  withDataMut<T>(fn: (data: Uint8Array) => T): Outcome<T, RunError> {
    this.syscalls.consume(CHECKED_COSTS.borrow);
    if (!this.isWritable) {
      return failed(`ReadonlyDataModified: ${this.key.slice(0, 8)}…`);
    }
    if (this.borrows !== 0) {
      return failed(`AccountBorrowFailed: ${this.key.slice(0, 8)}… is already borrowed`);
    }
    this.borrows = -1;
    try {
      return ok(fn(this.bytes));
    } finally {
      this.borrows = 0;
    }
  }

  setLamports(value: bigint): void {
    this.balance = value;
  }

  allocate(space: number): boolean {
    if (space > this.capacity) {
      return false;
    }
    this.bytes = new Uint8Array(space);
    return true;
  }

  assign(owner: string): void {
    this.currentOwner = owner;
  }
}

/**
 * Entry deserialization: copy every account out of the input buffer.
 */
export function deserializeCheckedAccounts(
  input: Uint8Array,
  syscalls: Syscalls,
): CheckedAccount[] {
  const view = new DataView(input.buffer, input.byteOffset, input.byteLength);

  return accountOffsets(input).map((offset) => {
    const dataLen = view.getUint32(offset + ACCOUNT_LAYOUT.dataLen, true);
    syscalls.consume(
      CHECKED_COSTS.deserializeAccount +
        Math.floor(dataLen / CHECKED_COSTS.copyBytesPerUnit),
    );

    const dataStart = offset + ACCOUNT_LAYOUT.data;
    return new CheckedAccount(
      {
        key: bytesToAddress(input.subarray(offset, offset + 32)),
        owner: bytesToAddress(
          input.subarray(offset + ACCOUNT_LAYOUT.owner, offset + ACCOUNT_LAYOUT.owner + 32),
        ),
        lamports: view.getBigUint64(offset + ACCOUNT_LAYOUT.lamports, true),
        data: input.slice(dataStart, dataStart + dataLen),
        capacity: dataLen + REALLOC_PADDING,
        isSigner: input[offset + ACCOUNT_LAYOUT.isSigner] !== 0,
        isWritable: input[offset + ACCOUNT_LAYOUT.isWritable] !== 0,
        executable: input[offset + ACCOUNT_LAYOUT.executable] !== 0,
      },
      syscalls,
    );
  });
}

/**
 * Privilege checks the checked environment performs before handing
 * accounts to the system program.
 */
export function checkPrivileges(
  syscalls: Syscalls,
  accounts: readonly CheckedAccount[],
): Outcome<void, RunError> {
  for (const account of accounts) {
    syscalls.consume(CHECKED_COSTS.privilegeCheck);
    if (account.isBorrowed) {
      return failed(`AccountBorrowFailed: ${account.key.slice(0, 8)}… is borrowed`);
    }
  }
  return DONE;
}
