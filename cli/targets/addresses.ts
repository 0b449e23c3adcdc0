/**
 * Well-known addresses and deterministic fixture addresses.
 *
 * @module
 */

export const SYSTEM_PROGRAM_ID = "00".repeat(32);

export const SYSVAR_PROGRAM_ID =
  "06a7d51718c774c928566398691d5eb68b5eb8a39b4b6d5c73555b2100000000";

export const SLOT_HASHES_SYSVAR_ID =
  "06a7d517192f0aafc6f265e3fb77cc7ada82c529d0be3b136e2d005520000000";

/**
 * A stable address built from a tag byte and a counter.
 * Fixtures use this in place of random keys so reports stay reproducible.
 */
export function seededAddress(tag: number, seed: number): string {
  if (!Number.isInteger(tag) || tag < 1 || tag > 0xff) {
    throw new RangeError(`Address tag must be in 1..255, got ${tag}`);
  }
  if (!Number.isInteger(seed) || seed < 0 || seed > 0xffffffff) {
    throw new RangeError(`Address seed must be a u32, got ${seed}`);
  }
  return (
    tag.toString(16).padStart(2, "0") +
    "00".repeat(27) +
    seed.toString(16).padStart(8, "0")
  );
}
