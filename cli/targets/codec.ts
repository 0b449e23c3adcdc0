/**
 * Little-endian helpers for target setup data.
 *
 * @module
 */

export const U64_MAX = 0xffff_ffff_ffff_ffffn;

/**
 * Read a u64 at `offset`, or undefined if the bytes are not there.
 */
export function readU64(data: Uint8Array, offset = 0): bigint | undefined {
  if (offset < 0 || offset + 8 > data.length) {
    return undefined;
  }
  return new DataView(data.buffer, data.byteOffset, data.byteLength)
    .getBigUint64(offset, true);
}

/**
 * Encode values as consecutive u64s.
 * @throws RangeError for values outside the u64 range
 */
export function encodeU64(...values: bigint[]): Uint8Array {
  const bytes = new Uint8Array(values.length * 8);
  const view = new DataView(bytes.buffer);
  values.forEach((value, i) => {
    if (value < 0n || value > U64_MAX) {
      throw new RangeError(`${value} does not fit in a u64`);
    }
    view.setBigUint64(i * 8, value, true);
  });
  return bytes;
}
