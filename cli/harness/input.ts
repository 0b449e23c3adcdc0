/**
 * Serialized account input.
 *
 * The execution service hands every variant the same byte layout; each
 * environment's entrypoint turns it into its own account type. All
 * integers are little-endian.
 *
 * ```
 * u32 count
 * per account:
 *   key[32] owner[32] lamports:u64 isSigner:u8 isWritable:u8
 *   executable:u8 dataLen:u32 capacity:u32 data[capacity]
 * ```
 *
 * `capacity` is `dataLen` plus `REALLOC_PADDING`, so zero-copy programs
 * can grow an account in place.
 *
 * @module
 */

/** Address width in bytes */
export const ADDRESS_BYTES = 32;

/** Extra writable space reserved after each account's data */
export const REALLOC_PADDING = 1_024;

/** Field offsets relative to the start of an account header */
export const ACCOUNT_LAYOUT = {
  key: 0,
  owner: 32,
  lamports: 64,
  isSigner: 72,
  isWritable: 73,
  executable: 74,
  dataLen: 75,
  capacity: 79,
  data: 83,
} as const;

/**
 * Environment-neutral description of one account passed to a program.
 */
export interface AccountFixture {
  /** Address, 64 hex characters */
  key: string;
  /** Owning program address, 64 hex characters */
  owner: string;
  lamports: bigint;
  data: Uint8Array;
  isSigner: boolean;
  isWritable: boolean;
  executable: boolean;
}

const HEX_ADDRESS = /^[0-9a-f]{64}$/;

/**
 * Decode a 64-character hex address.
 * @throws RangeError on anything else
 */
export function addressToBytes(address: string): Uint8Array {
  if (!HEX_ADDRESS.test(address)) {
    throw new RangeError(`Invalid address: ${address}`);
  }
  return Uint8Array.from(Buffer.from(address, "hex"));
}

export function bytesToAddress(bytes: Uint8Array): string {
  return Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength).toString("hex");
}

/**
 * Serialize fixtures into a fresh input buffer.
 */
export function serializeAccounts(accounts: readonly AccountFixture[]): Uint8Array {
  const size = accounts.reduce(
    (n, a) => n + ACCOUNT_LAYOUT.data + a.data.length + REALLOC_PADDING,
    4,
  );
  const bytes = new Uint8Array(size);
  const view = new DataView(bytes.buffer);

  view.setUint32(0, accounts.length, true);
  let offset = 4;
  for (const account of accounts) {
    bytes.set(addressToBytes(account.key), offset + ACCOUNT_LAYOUT.key);
    bytes.set(addressToBytes(account.owner), offset + ACCOUNT_LAYOUT.owner);
    view.setBigUint64(offset + ACCOUNT_LAYOUT.lamports, account.lamports, true);
    bytes[offset + ACCOUNT_LAYOUT.isSigner] = account.isSigner ? 1 : 0;
    bytes[offset + ACCOUNT_LAYOUT.isWritable] = account.isWritable ? 1 : 0;
    bytes[offset + ACCOUNT_LAYOUT.executable] = account.executable ? 1 : 0;
    view.setUint32(offset + ACCOUNT_LAYOUT.dataLen, account.data.length, true);
    view.setUint32(
      offset + ACCOUNT_LAYOUT.capacity,
      account.data.length + REALLOC_PADDING,
      true,
    );
    bytes.set(account.data, offset + ACCOUNT_LAYOUT.data);
    offset += ACCOUNT_LAYOUT.data + account.data.length + REALLOC_PADDING;
  }

  return bytes;
}

/**
 * Header offsets of every account in an input buffer.
 * @throws RangeError if the buffer is shorter than its headers claim
 */
export function accountOffsets(input: Uint8Array): number[] {
  if (input.length < 4) {
    throw new RangeError("Account input is missing its count");
  }
  const view = new DataView(input.buffer, input.byteOffset, input.byteLength);
  const count = view.getUint32(0, true);

  const offsets: number[] = [];
  let offset = 4;
  for (let i = 0; i < count; i++) {
    if (offset + ACCOUNT_LAYOUT.data > input.length) {
      throw new RangeError(`Account ${i} header runs past the input`);
    }
    const capacity = view.getUint32(offset + ACCOUNT_LAYOUT.capacity, true);
    const end = offset + ACCOUNT_LAYOUT.data + capacity;
    if (end > input.length) {
      throw new RangeError(`Account ${i} data runs past the input`);
    }
    offsets.push(offset);
    offset = end;
  }
  return offsets;
}
