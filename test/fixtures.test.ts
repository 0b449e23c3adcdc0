import { describe, expect, it } from "vitest";
import {
  BASE_LAMPORTS,
  SLOT_PATTERNS,
  emptyAccount,
  generateSlotHashEntries,
  minstd,
  payerAccount,
  readonlyAccounts,
  slotHashesAccount,
} from "../cli/lib/fixtures.ts";
import { SLOT_HASHES_SYSVAR_ID, SYSTEM_PROGRAM_ID } from "../cli/targets/addresses.ts";

describe("minstd", () => {
  it("multiplies by 16807 modulo 2^31 - 1", () => {
    expect(minstd(1)).toBe(16_807);
    expect(minstd(2)).toBe(33_614);
    expect(minstd(2_147_483_646)).toBe(2_147_466_840);
  });

  it("treats a zero seed as 1", () => {
    expect(minstd(0)).toBe(minstd(1));
  });
});

describe("generateSlotHashEntries", () => {
  it("steps strictly-1 slots down by one from 10000", () => {
    const entries = generateSlotHashEntries("strictly-1", 4);

    expect(entries.map((e) => e.slot)).toEqual([10_000n, 9_999n, 9_998n, 9_997n]);
    expect(entries[2].hash).toEqual(new Uint8Array(32).fill(2));
  });

  it("steps avg-2 slots by 1 or 3", () => {
    const entries = generateSlotHashEntries("avg-2", 4);

    // minstd(0) and minstd(1) are odd, minstd(2) is even
    expect(entries.map((e) => e.slot)).toEqual([10_000n, 9_997n, 9_994n, 9_993n]);
  });

  it.each(SLOT_PATTERNS)("keeps %s slots strictly descending", (pattern) => {
    const entries = generateSlotHashEntries(pattern);

    expect(entries).toHaveLength(512);
    for (let i = 1; i < entries.length; i++) {
      expect(entries[i].slot < entries[i - 1].slot).toBe(true);
    }
  });

  it("rejects counts outside 1..512", () => {
    expect(() => generateSlotHashEntries("strictly-1", 0)).toThrow(RangeError);
    expect(() => generateSlotHashEntries("strictly-1", 513)).toThrow(
      "Entry count must be in 1..512, got 513",
    );
  });
});

describe("account fixtures", () => {
  it("funds a signing payer", () => {
    expect(payerAccount()).toEqual({
      key: `a1${"00".repeat(31)}`,
      owner: SYSTEM_PROGRAM_ID,
      lamports: BASE_LAMPORTS,
      data: new Uint8Array(0),
      isSigner: true,
      isWritable: true,
      executable: false,
    });
  });

  it("leaves new accounts empty", () => {
    const account = emptyAccount(1, true);

    expect(account.key).toBe(`a2${"00".repeat(27)}00000001`);
    expect(account.lamports).toBe(0n);
    expect(account.isSigner).toBe(true);
  });

  it("gives read-only accounts distinct keys and data", () => {
    const accounts = readonlyAccounts(3, 2);

    expect(new Set(accounts.map((a) => a.key)).size).toBe(3);
    expect(accounts.map((a) => Array.from(a.data))).toEqual([[1, 1], [2, 2], [3, 3]]);
    expect(accounts.every((a) => !a.isWritable && !a.isSigner)).toBe(true);
  });

  it("lays out the slot hashes sysvar", () => {
    const account = slotHashesAccount(generateSlotHashEntries("strictly-1", 2));
    const view = new DataView(account.data.buffer);

    expect(account.key).toBe(SLOT_HASHES_SYSVAR_ID);
    expect(account.data).toHaveLength(8 + 2 * 40);
    expect(view.getBigUint64(0, true)).toBe(2n);
    expect(view.getBigUint64(8, true)).toBe(10_000n);
    expect(view.getBigUint64(48, true)).toBe(9_999n);
    expect(account.data[56]).toBe(1);
  });
});
