// test/catalog/catalog.spec.ts
// Tests for the recurrence catalog and the builtin library

import { describe, it, expect } from "vitest";
import { DefinitionError } from "../../src/core/errors";
import { Recurrence } from "../../src/core/recurrence";
import { RecurrenceCatalog, USER_MODULE } from "../../src/catalog/catalog";
import { createBuiltinCatalog } from "../../src/catalog/builtin";
import { fibonacci } from "../../src/catalog/builtin/combinatorics";
import { overlapE, overlapEDeriv } from "../../src/catalog/builtin/gradients";

const names = (recs: readonly Recurrence[]) => recs.map((r) => r.name);

describe("createBuiltinCatalog", () => {
  const catalog = createBuiltinCatalog();

  it("registers every builtin under its module", () => {
    expect(catalog.size).toBe(14);
    expect(catalog.modules()).toEqual(["orthogonal", "combinatorics", "mcmd", "gradients"]);
    expect(names(catalog.byModule("mcmd"))).toEqual(["HermiteE", "CoulombR"]);
    expect(catalog.moduleOf("Fibonacci")).toBe("combinatorics");
    expect(catalog.byModule("nowhere")).toEqual([]);
  });

  it("searches names, modules and descriptions", () => {
    expect(names(catalog.search("mcmd"))).toEqual(["HermiteE", "CoulombR"]);
    expect(names(catalog.search("CHEBYSHEV"))).toEqual(["ChebyshevT", "ChebyshevU"]);
    expect(catalog.search("no such thing")).toEqual([]);
  });

  it("has no dangling cross references", () => {
    expect(catalog.validate()).toEqual({ valid: true, errors: [] });
  });
});

describe("RecurrenceCatalog", () => {
  it("defaults to the user module", () => {
    const catalog = new RecurrenceCatalog().register(fibonacci());
    expect(catalog.moduleOf("Fibonacci")).toBe(USER_MODULE);
  });

  it("rejects duplicate names", () => {
    const catalog = new RecurrenceCatalog().register(fibonacci());
    expect(() => catalog.register(fibonacci())).toThrow("Duplicate recurrence: Fibonacci");
  });

  it("fails on unknown names only through require", () => {
    const catalog = new RecurrenceCatalog();
    expect(catalog.get("Nope")).toBeUndefined();
    expect(() => catalog.require("Nope")).toThrow("Unknown recurrence: Nope");
  });

  it("resolves cross calls for generators", () => {
    const catalog = new RecurrenceCatalog().register(overlapE());
    expect(catalog.resolve("E")?.name).toBe("E");
    expect(catalog.resolve("F")).toBeUndefined();
  });

  it("orders recurrences after the ones they call", () => {
    const catalog = new RecurrenceCatalog().register(overlapEDeriv()).register(overlapE());
    expect(names(catalog.ordered())).toEqual(["E", "E_deriv"]);
    expect(names(catalog.dependenciesOf(overlapEDeriv()))).toEqual(["E"]);
  });

  it("reports calls to missing or mismatched recurrences", () => {
    const missing = new RecurrenceCatalog().register(overlapEDeriv());
    expect(missing.validate()).toEqual({
      valid: false,
      errors: ["E_deriv: rule 0 calls unknown recurrence E", "E_deriv: rule 1 calls unknown recurrence E"],
    });

    const flat = new Recurrence("E", ["n"]).base({ n: 0 }, 1);
    const mismatched = new RecurrenceCatalog().register(flat).register(overlapEDeriv());
    expect(mismatched.validate().errors).toEqual([
      "E_deriv: rule 0 calls E with 3 indices, it takes 1",
      "E_deriv: rule 1 calls E with 3 indices, it takes 1",
    ]);
  });

  it("rejects cyclic cross references", () => {
    const a = new Recurrence("A", ["n"]).base({ n: 0 }, 1).rule("n > 0", "B[n-1]");
    const b = new Recurrence("B", ["n"]).base({ n: 0 }, 1).rule("n > 0", "A[n-1]");
    const catalog = new RecurrenceCatalog().register(a).register(b);
    expect(() => catalog.ordered()).toThrow(DefinitionError);
    expect(() => catalog.dependenciesOf(a)).toThrow("A: cyclic cross reference through A");
  });
});
