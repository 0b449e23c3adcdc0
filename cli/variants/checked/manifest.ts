/**
 * Checked variant manifest: what the build registers, without loading
 * any target code.
 *
 * @module
 */

import type { TargetDescriptor } from "../../harness/types.ts";
import { seededAddress } from "../../targets/addresses.ts";
import {
  ACCOUNT_COUNT,
  ACCOUNT_READ,
  CREATE_ACCOUNT,
  ECHO,
  LOG,
  SLOT_HASHES_GET_ENTRY,
  SLOT_HASHES_POSITION_BINARY,
  TRANSFER,
} from "../../targets/catalog.ts";

export const CHECKED_PROGRAM_ID = seededAddress(0xc1, 1);

export const checkedManifest: readonly TargetDescriptor[] = [
  ECHO,
  LOG,
  ACCOUNT_COUNT,
  ACCOUNT_READ,
  TRANSFER,
  CREATE_ACCOUNT,
  SLOT_HASHES_GET_ENTRY,
  SLOT_HASHES_POSITION_BINARY,
];
