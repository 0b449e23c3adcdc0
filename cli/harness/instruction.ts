/**
 * Instruction wire format.
 *
 * `[target_id: u16 little-endian][setup_data: remaining bytes]`
 *
 * The setup bytes are opaque here; only the selected target's `setup`
 * interprets them.
 *
 * @module
 */

import type { DispatchError, Outcome } from "./types.ts";

/** Width of the target id prefix in bytes */
export const TARGET_ID_BYTES = 2;

/** Largest id the prefix can carry */
export const MAX_TARGET_ID = 0xffff;

/**
 * Decoded instruction payload.
 */
export interface InstructionPayload {
  targetId: number;
  setupData: Uint8Array;
}

/**
 * Encode a payload into instruction bytes.
 * @throws RangeError if the id does not fit the prefix
 */
export function encodeInstruction(payload: InstructionPayload): Uint8Array {
  const { targetId, setupData } = payload;
  if (!Number.isInteger(targetId) || targetId < 0 || targetId > MAX_TARGET_ID) {
    throw new RangeError(
      `Target id must be an integer in 0..${MAX_TARGET_ID}, got ${targetId}`,
    );
  }

  const bytes = new Uint8Array(TARGET_ID_BYTES + setupData.length);
  bytes[0] = targetId & 0xff;
  bytes[1] = targetId >>> 8;
  bytes.set(setupData, TARGET_ID_BYTES);
  return bytes;
}

/**
 * Decode instruction bytes. The setup data is a view, not a copy.
 */
export function decodeInstruction(
  bytes: Uint8Array,
): Outcome<InstructionPayload, DispatchError> {
  if (bytes.length < TARGET_ID_BYTES) {
    return { ok: false, error: { kind: "Truncated", length: bytes.length } };
  }

  return {
    ok: true,
    value: {
      targetId: bytes[0] | (bytes[1] << 8),
      setupData: bytes.subarray(TARGET_ID_BYTES),
    },
  };
}
