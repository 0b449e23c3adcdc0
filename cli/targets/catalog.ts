/**
 * Catalog of every benchmark target descriptor.
 *
 * Ids are part of the wire format: once published an id keeps its
 * meaning, and a retired id is never handed to another target.
 *
 * @module
 */

import type { TargetDescriptor } from "../harness/types.ts";

export const ECHO: TargetDescriptor = { id: 1, displayName: "Echo" };
export const LOG: TargetDescriptor = { id: 2, displayName: "Log" };
export const ACCOUNT_COUNT: TargetDescriptor = { id: 3, displayName: "Account Count" };
export const ACCOUNT_READ: TargetDescriptor = { id: 4, displayName: "Account Read" };
export const TRANSFER: TargetDescriptor = { id: 5, displayName: "Transfer" };
export const CREATE_ACCOUNT: TargetDescriptor = { id: 6, displayName: "Create Account" };
export const SLOT_HASHES_GET_ENTRY: TargetDescriptor = {
  id: 7,
  displayName: "Slot Hashes Get Entry",
};
export const SLOT_HASHES_POSITION_NAIVE: TargetDescriptor = {
  id: 8,
  displayName: "Slot Hashes Position Naive",
};
export const SLOT_HASHES_POSITION_INTERPOLATED: TargetDescriptor = {
  id: 9,
  displayName: "Slot Hashes Position Interpolated",
};
export const SLOT_HASHES_POSITION_BINARY: TargetDescriptor = {
  id: 10,
  displayName: "Slot Hashes Position Binary",
};

/**
 * All descriptors, ascending by id.
 */
export const TARGETS: readonly TargetDescriptor[] = [
  ECHO,
  LOG,
  ACCOUNT_COUNT,
  ACCOUNT_READ,
  TRANSFER,
  CREATE_ACCOUNT,
  SLOT_HASHES_GET_ENTRY,
  SLOT_HASHES_POSITION_NAIVE,
  SLOT_HASHES_POSITION_INTERPOLATED,
  SLOT_HASHES_POSITION_BINARY,
];
