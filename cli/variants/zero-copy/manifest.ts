/**
 * Zero-copy variant manifest.
 *
 * @module
 */

import type { TargetDescriptor } from "../../harness/types.ts";
import { seededAddress } from "../../targets/addresses.ts";
import { TARGETS } from "../../targets/catalog.ts";

export const ZERO_COPY_PROGRAM_ID = seededAddress(0xc2, 1);

/** Every catalog target has a zero-copy implementation */
export const zeroCopyManifest: readonly TargetDescriptor[] = TARGETS;
