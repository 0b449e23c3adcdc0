import { describe, expect, it } from "vitest";
import { DONE, ok } from "../cli/harness/outcome.ts";
import { defineRegistry, register, RegistryError } from "../cli/harness/registry.ts";
import type { Target } from "../cli/harness/types.ts";

function target(id: number, displayName = `Target ${id}`): Target<never, void> {
  return {
    descriptor: { id, displayName },
    setup: () => ok(undefined),
    run: () => DONE,
  };
}

describe("defineRegistry", () => {
  it("lists descriptors ascending by id", () => {
    const registry = defineRegistry<never>([
      register(target(7)),
      register(target(2)),
      register(target(4)),
    ]);

    expect(registry.descriptors.map((d) => d.id)).toEqual([2, 4, 7]);
  });

  it("looks up registered ids only", () => {
    const registry = defineRegistry<never>([register(target(3, "Three"))]);

    expect(registry.lookup(3)?.descriptor).toEqual({ id: 3, displayName: "Three" });
    expect(registry.lookup(0)).toBeUndefined();
    expect(registry.lookup(2)).toBeUndefined();
    expect(registry.lookup(4)).toBeUndefined();
    expect(registry.lookup(65_535)).toBeUndefined();
  });

  it("rejects a duplicate id", () => {
    expect(() =>
      defineRegistry<never>([register(target(5, "First")), register(target(5, "Second"))])
    ).toThrow(new RegistryError('Target id 5 is registered twice ("First" and "Second")'));
  });

  it("rejects ids the prefix cannot carry", () => {
    expect(() => defineRegistry<never>([register(target(65_536, "Big"))])).toThrow(
      'Target "Big" has id 65536, outside 0..65535',
    );
    expect(() => defineRegistry<never>([register(target(-1, "Negative"))])).toThrow(
      RegistryError,
    );
  });

  it("accepts an empty registry", () => {
    const registry = defineRegistry<never>([]);

    expect(registry.descriptors).toEqual([]);
    expect(registry.lookup(0)).toBeUndefined();
  });
});
