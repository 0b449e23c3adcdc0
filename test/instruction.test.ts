import { describe, expect, it } from "vitest";
import { decodeInstruction, encodeInstruction } from "../cli/harness/instruction.ts";

describe("encodeInstruction", () => {
  it("writes the id little-endian before the setup data", () => {
    const bytes = encodeInstruction({ targetId: 0x0102, setupData: Uint8Array.of(9, 8) });

    expect(bytes).toEqual(Uint8Array.of(0x02, 0x01, 9, 8));
  });

  it("rejects ids that do not fit in two bytes", () => {
    const setupData = new Uint8Array(0);

    expect(() => encodeInstruction({ targetId: 65_536, setupData })).toThrow(RangeError);
    expect(() => encodeInstruction({ targetId: -1, setupData })).toThrow(RangeError);
    expect(() => encodeInstruction({ targetId: 1.5, setupData })).toThrow(
      "Target id must be an integer in 0..65535, got 1.5",
    );
  });
});

describe("decodeInstruction", () => {
  it("splits the prefix from the setup data", () => {
    const decoded = decodeInstruction(Uint8Array.of(0xff, 0xff, 1));

    expect(decoded).toEqual({
      ok: true,
      value: { targetId: 65_535, setupData: Uint8Array.of(1) },
    });
  });

  it("returns the setup data as a view", () => {
    const bytes = Uint8Array.of(1, 0, 5, 6);
    const decoded = decodeInstruction(bytes);
    if (!decoded.ok) throw new Error("expected a payload");

    bytes[2] = 42;
    expect(decoded.value.setupData[0]).toBe(42);
  });

  it("rejects fewer than two bytes", () => {
    expect(decodeInstruction(Uint8Array.of(1))).toEqual({
      ok: false,
      error: { kind: "Truncated", length: 1 },
    });
  });
});
