/**
 * Accounts for the zero-copy environment.
 *
 * An `AccountView` is an offset into the serialized input buffer. Reads
 * and writes go straight to that buffer: nothing is copied on entry and
 * nothing tracks borrows.
 *
 * @module
 */

import {
  ACCOUNT_LAYOUT,
  ADDRESS_BYTES,
  accountOffsets,
  addressToBytes,
  bytesToAddress,
} from "../../harness/input.ts";
import type { Syscalls } from "../../harness/types.ts";
import type { SystemAccount } from "../../targets/system-program.ts";

/**
 * Resource units the zero-copy environment charges for its bookkeeping.
 */
export const ZERO_COPY_COSTS = {
  /** Per account on entry */
  deserializeAccount: 4,
  /** Per unchecked data borrow */
  borrow: 1,
  /** Per slot-hash slot read */
  slotRead: 1,
} as const;

/**
 * A view over one account inside the input buffer.
 */
export class AccountView implements SystemAccount {
  constructor(
    private readonly input: Uint8Array,
    private readonly view: DataView,
    private readonly offset: number,
  ) {}

  /** Address bytes, as a view into the input */
  keyBytes(): Uint8Array {
    const start = this.offset + ACCOUNT_LAYOUT.key;
    return this.input.subarray(start, start + ADDRESS_BYTES);
  }

  get key(): string {
    return bytesToAddress(this.keyBytes());
  }

  get owner(): string {
    const start = this.offset + ACCOUNT_LAYOUT.owner;
    return bytesToAddress(this.input.subarray(start, start + ADDRESS_BYTES));
  }

  get lamports(): bigint {
    return this.view.getBigUint64(this.offset + ACCOUNT_LAYOUT.lamports, true);
  }

  get isSigner(): boolean {
    return this.input[this.offset + ACCOUNT_LAYOUT.isSigner] !== 0;
  }

  get isWritable(): boolean {
    return this.input[this.offset + ACCOUNT_LAYOUT.isWritable] !== 0;
  }

  get executable(): boolean {
    return this.input[this.offset + ACCOUNT_LAYOUT.executable] !== 0;
  }

  get dataLength(): number {
    return this.view.getUint32(this.offset + ACCOUNT_LAYOUT.dataLen, true);
  }

  private get capacity(): number {
    return this.view.getUint32(this.offset + ACCOUNT_LAYOUT.capacity, true);
  }

  /**
   * The account data as a view into the input. The caller is
   * responsible for not holding it across a resize.
   */
  borrowDataUnchecked(): Uint8Array {
    const start = this.offset + ACCOUNT_LAYOUT.data;
    return this.input.subarray(start, start + this.dataLength);
  }

  setLamports(value: bigint): void {
    this.view.setBigUint64(this.offset + ACCOUNT_LAYOUT.lamports, value, true);
  }

  allocate(space: number): boolean {
    if (space > this.capacity) {
      return false;
    }
    const start = this.offset + ACCOUNT_LAYOUT.data;
    this.input.fill(0, start, start + space);
    this.view.setUint32(this.offset + ACCOUNT_LAYOUT.dataLen, space, true);
    return true;
  }

  assign(owner: string): void {
    this.input.set(addressToBytes(owner), this.offset + ACCOUNT_LAYOUT.owner);
  }
}

/**
 * Entry: one view per account, no copies.
 */
export function deserializeAccountViews(
  input: Uint8Array,
  syscalls: Syscalls,
): AccountView[] {
  const view = new DataView(input.buffer, input.byteOffset, input.byteLength);
  return accountOffsets(input).map((offset) => {
    syscalls.consume(ZERO_COPY_COSTS.deserializeAccount);
    return new AccountView(input, view, offset);
  });
}
