/**
 * Slot-hash sysvar layout and search routines.
 *
 * Account data is `u64 count` followed by `count` entries of
 * `slot:u64 hash[32]`, newest slot first (strictly descending).
 * The searches are shared by both environments; each environment
 * supplies a reader that charges its own cost per slot it touches.
 *
 * @module
 */

export const NUM_ENTRIES_SIZE = 8;
export const SLOT_SIZE = 8;
export const HASH_SIZE = 32;
export const ENTRY_SIZE = SLOT_SIZE + HASH_SIZE;
export const MAX_ENTRIES = 512;

/**
 * A slot hash as stored in the sysvar.
 */
export interface SlotHashEntry {
  slot: bigint;
  hash: Uint8Array;
}

/**
 * Random access to the slots of a slot-hash account.
 */
export interface SlotReader {
  readonly length: number;
  slotAt(index: number): bigint;
}

/**
 * Entry count declared by the account data, or a reason it is unusable.
 */
export function entryCount(data: Uint8Array): number | string {
  if (data.length < NUM_ENTRIES_SIZE) {
    return `slot hashes data is ${data.length} byte(s), shorter than its length prefix`;
  }
  const view = new DataView(data.buffer, data.byteOffset, data.byteLength);
  const count = view.getBigUint64(0, true);
  if (count > BigInt(MAX_ENTRIES)) {
    return `slot hashes declares ${count} entries, more than ${MAX_ENTRIES}`;
  }
  const needed = NUM_ENTRIES_SIZE + Number(count) * ENTRY_SIZE;
  if (data.length < needed) {
    return `slot hashes declares ${count} entries but holds ${data.length} byte(s)`;
  }
  return Number(count);
}

/**
 * Reader over validated account data that calls `charge` per slot read.
 */
export function createSlotReader(
  data: Uint8Array,
  length: number,
  charge: () => void,
): SlotReader {
  const view = new DataView(data.buffer, data.byteOffset, data.byteLength);
  return {
    length,
    slotAt(index: number): bigint {
      charge();
      return view.getBigUint64(NUM_ENTRIES_SIZE + index * ENTRY_SIZE, true);
    },
  };
}

/**
 * Hash stored at `index`, as a view into `data`.
 */
export function hashAt(data: Uint8Array, index: number): Uint8Array {
  const start = NUM_ENTRIES_SIZE + index * ENTRY_SIZE + SLOT_SIZE;
  return data.subarray(start, start + HASH_SIZE);
}

/**
 * Linear scan from the newest entry.
 */
export function positionNaive(reader: SlotReader, slot: bigint): number | undefined {
  for (let i = 0; i < reader.length; i++) {
    const current = reader.slotAt(i);
    if (current === slot) return i;
    if (current < slot) return undefined;
  }
  return undefined;
}

/**
 * Binary search over descending slots.
 */
export function positionBinary(reader: SlotReader, slot: bigint): number | undefined {
  let lo = 0;
  let hi = reader.length;
  while (lo < hi) {
    const mid = (lo + hi) >>> 1;
    const current = reader.slotAt(mid);
    if (current === slot) return mid;
    if (current > slot) {
      lo = mid + 1;
    } else {
      hi = mid;
    }
  }
  return undefined;
}

/**
 * Interpolation search. Slots usually drop by about one per entry, so
 * the first estimate is close.
 */
export function positionInterpolated(
  reader: SlotReader,
  slot: bigint,
): number | undefined {
  let lo = 0;
  let hi = reader.length - 1;
  while (lo <= hi) {
    const loSlot = reader.slotAt(lo);
    if (loSlot === slot) return lo;
    const hiSlot = reader.slotAt(hi);
    if (hiSlot === slot) return hi;
    if (slot > loSlot || slot < hiSlot || lo === hi) return undefined;

    const estimate =
      lo + Number(((loSlot - slot) * BigInt(hi - lo)) / (loSlot - hiSlot));
    const current = reader.slotAt(estimate);
    if (current === slot) return estimate;
    if (current > slot) {
      lo = estimate + 1;
    } else {
      hi = estimate - 1;
    }
  }
  return undefined;
}

/**
 * Serialize entries into sysvar account data.
 */
export function encodeSlotHashes(entries: readonly SlotHashEntry[]): Uint8Array {
  const data = new Uint8Array(NUM_ENTRIES_SIZE + entries.length * ENTRY_SIZE);
  const view = new DataView(data.buffer);
  view.setBigUint64(0, BigInt(entries.length), true);
  entries.forEach((entry, i) => {
    const offset = NUM_ENTRIES_SIZE + i * ENTRY_SIZE;
    view.setBigUint64(offset, entry.slot, true);
    data.set(entry.hash.subarray(0, HASH_SIZE), offset + SLOT_SIZE);
  });
  return data;
}
