// test/core/recurrence.spec.ts
// Tests for the Recurrence builder and rule priority

import { describe, it, expect } from "vitest";
import { constant } from "../../src/core/ast";
import { DefinitionError, DslSyntaxError } from "../../src/core/errors";
import { DEFAULT_MAX_INDEX, Recurrence, sortRules } from "../../src/core/recurrence";
import { hermite } from "../../src/catalog/builtin/orthogonal";
import { overlapEDeriv } from "../../src/catalog/builtin/gradients";

function definitionError(fn: () => unknown): DefinitionError {
  try {
    fn();
  } catch (e) {
    if (e instanceof DefinitionError) return e;
    throw e;
  }
  throw new Error("expected a DefinitionError");
}

describe("Recurrence constructor", () => {
  it("applies default and explicit maximum indices", () => {
    const rec = new Recurrence("Grid", ["n", "k"], [], { maxIndices: { k: 4 } });
    expect(rec.maxIndices).toEqual({ n: DEFAULT_MAX_INDEX, k: 4 });
    expect(rec.selfName).toBe("E");
    expect(rec.layered).toBe(false);
  });

  it("rejects bad names and declarations", () => {
    expect(() => new Recurrence("1bad", ["n"])).toThrow(DefinitionError);
    expect(() => new Recurrence("Seq", [])).toThrow("Seq: at least one index is required");
    expect(() => new Recurrence("Seq", ["n", "n"])).toThrow("Seq: n is declared twice");
    expect(() => new Recurrence("Seq", ["n"], ["x"], { arrayVars: ["T"] })).toThrow(
      "Seq: array variable T is not a runtime variable"
    );
  });

  it("reports unknown indices with E0100", () => {
    expect(definitionError(() => new Recurrence("Seq", ["n"], [], { auxIndex: "t" })).code).toBe("E0100");
    expect(definitionError(() => new Recurrence("Seq", ["n"], [], { maxIndices: { k: 2 } })).code).toBe("E0100");
  });
});

describe("fluent definition", () => {
  it("stores bases slot-aligned with free slots as null", () => {
    const rec = new Recurrence("R", ["t", "N"], ["Boys"], { arrayVars: ["Boys"] }).base({ t: 0 }, "Boys[N]");
    expect(rec.bases[0].at).toEqual([0, null]);
  });

  it("rejects bases that bind nothing or name unknown indices", () => {
    const rec = new Recurrence("Seq", ["n"]);
    expect(() => rec.base({}, 1)).toThrow("Seq: base case binds no index");
    expect(definitionError(() => rec.base({ m: 0 }, 1)).code).toBe("E0100");
    expect(() => rec.base({ n: 0.5 }, 1)).toThrow("Seq: base case value for n must be an integer");
  });

  it("rejects guards over unknown indices", () => {
    const rec = new Recurrence("Seq", ["n"]);
    expect(() => rec.rule("m > 0", "E[n-1]")).toThrow("Seq: constraint mentions unknown index m");
  });

  it("locates syntax errors at the rule", () => {
    const rec = new Recurrence("Seq", ["n"]).rule("n > 1", "E[n-1] + E[n-2]");
    expect(() => rec.rule("n > 0", "E[n-1")).toThrow(DslSyntaxError);
    expect(() => rec.rule("n > 0", "E[n-1")).toThrow('Seq rule 1: Unbalanced brackets: "E[n-1"');
  });

  it("collects parser warnings", () => {
    const rec = new Recurrence("Seq", ["n"]).base({ n: 0 }, 1).rule("n > 0", "y * E[n-1]");
    expect(rec.diagnostics.map((d) => d.code)).toEqual(["W0101"]);
  });

  it("builds branch averages with a 1/N scale", () => {
    const rule = hermite().rules[2];
    expect(rule.expr.tag).toBe("BranchAverage");
    if (rule.expr.tag === "BranchAverage") {
      expect(rule.expr.branches).toHaveLength(2);
      expect(rule.expr.scale).toEqual(constant(0.5));
    }
  });

  it("lists cross-call dependencies", () => {
    expect(overlapEDeriv().dependencies()).toEqual(["E"]);
    expect(hermite().dependencies()).toEqual([]);
  });
});

describe("rule priority", () => {
  const build = () =>
    new Recurrence("Grid", ["n", "k"])
      .rule("n > 0", "E[n-1, k]")
      .rule("n > 0 && k > 0", "E[n-1, k-1]")
      .rule("k == 0", "E[n-1, k]")
      .rule("n == k && k > 0", "E[n-1, k-1]");

  it("puts more equalities first, then more constraints, then declaration order", () => {
    expect(build().sortedRules().map((r) => r.index)).toEqual([3, 2, 1, 0]);
  });

  it("does not depend on the input order", () => {
    const rules = build().rules;
    expect(sortRules([...rules].reverse()).map((r) => r.index)).toEqual([3, 2, 1, 0]);
  });

  it("orders an equality, then a conjunction, then a single inequality", () => {
    const rec = new Recurrence("Pair", ["n", "m"])
      .rule("n > 0", "E[n-1, m]")
      .rule("n == 0", "E[n, m-1]")
      .rule("n > 0 && m > 0", "E[n-1, m-1]");
    expect(rec.sortedRules().map((r) => r.constraints.render())).toEqual(["(n == 0)", "(n > 0) && (m > 0)", "(n > 0)"]);
    expect(sortRules([...rec.rules].reverse()).map((r) => r.index)).toEqual([1, 2, 0]);
  });

  it("breaks full ties by declaration order", () => {
    const rec = new Recurrence("Grid", ["n", "k"]).rule("k == 0", "E[n-1, k]").rule("n == k", "E[n-1, k-1]");
    expect(rec.sortedRules().map((r) => r.index)).toEqual([0, 1]);
  });
});
