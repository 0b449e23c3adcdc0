import { describe, expect, it } from "vitest";
import { caseTable } from "../cli/lib/cases/mod.ts";
import { ENVIRONMENTS } from "../cli/lib/schema.ts";
import { TARGETS } from "../cli/targets/catalog.ts";
import { getVariant, listVariants } from "../cli/variants/mod.ts";

describe("variant builds", () => {
  it("lists one build per environment, in label order", () => {
    expect(listVariants().map((v) => v.id)).toEqual([...ENVIRONMENTS]);
  });

  it.each(ENVIRONMENTS)("%s program registers exactly its manifest", async (environment) => {
    const variant = getVariant(environment);
    const program = await variant.load();

    expect(program.environment).toBe(environment);
    expect(program.targets).toEqual(variant.manifest);
  });

  it("registers different target sets per environment", () => {
    expect(getVariant("checked").manifest.map((t) => t.id)).toEqual([1, 2, 3, 4, 5, 6, 7, 10]);
    expect(getVariant("zero-copy").manifest.map((t) => t.id)).toEqual([
      1, 2, 3, 4, 5, 6, 7, 8, 9, 10,
    ]);
  });

  it("gives each build its own program id", async () => {
    const [checked, zeroCopy] = await Promise.all(listVariants().map((v) => v.load()));

    expect(checked.programId).not.toBe(zeroCopy.programId);
  });
});

describe("target catalog", () => {
  it("never reuses an id or a display name", () => {
    expect(new Set(TARGETS.map((t) => t.id)).size).toBe(TARGETS.length);
    expect(new Set(TARGETS.map((t) => t.displayName)).size).toBe(TARGETS.length);
  });

  it("has a benchmark case for every target", () => {
    const cases = caseTable();

    expect(TARGETS.filter((t) => !cases.has(t.id))).toEqual([]);
    for (const target of TARGETS) {
      expect(cases.get(target.id)?.target).toBe(target);
    }
  });
});
