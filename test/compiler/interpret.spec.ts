// test/compiler/interpret.spec.ts
// Tests for first-match selection and the reference interpreter

import { describe, it, expect } from "vitest";
import { EvaluationError } from "../../src/core/errors";
import { Recurrence } from "../../src/core/recurrence";
import { interpret } from "../../src/core/compiler/interpret";
import { exclusiveGuard, ruleGuards, select } from "../../src/core/compiler/selection";
import { binomial, fibonacci } from "../../src/catalog/builtin/combinatorics";
import { legendre } from "../../src/catalog/builtin/orthogonal";
import { overlapE, overlapEDeriv } from "../../src/catalog/builtin/gradients";

describe("select", () => {
  const rec = fibonacci();

  it("tries bases in declaration order", () => {
    expect(select(rec, new Map([["n", 1]]))).toMatchObject({ kind: "base", index: 1 });
  });

  it("falls through to the first matching rule", () => {
    const chosen = select(rec, new Map([["n", 3]]));
    expect(chosen.kind).toBe("rule");
    if (chosen.kind === "rule") expect(chosen.rule.name).toBe("Fibonacci-like");
  });

  it("selects the primary when nothing matches", () => {
    expect(select(rec, new Map([["n", -1]]))).toEqual({ kind: "primary" });
  });

  it("lets a base win over a rule whose guard also holds", () => {
    const shadowed = new Recurrence("Shadow", ["n"]).base({ n: 2 }, 7).rule("n > 0", "E[n-1]");
    expect(select(shadowed, new Map([["n", 2]]))).toMatchObject({ kind: "base", index: 0 });
    expect(interpret(shadowed, [3], {})).toBe(7);
  });
});

describe("exclusiveGuard", () => {
  it("negates only the earlier cases that may overlap", () => {
    const guards = ruleGuards(binomial());
    expect(guards.map(exclusiveGuard)).toEqual([
      "(k == 0) && (n >= 0) && (k >= 0) && (n >= k) && !((n == 0) && (k == 0))",
      "(n == k) && (n >= 0) && (k >= 0) && (n >= k) && !((n == 0) && (k == 0)) && !(k == 0)",
      "(n > k) && (k > 0) && (n >= 0) && (k >= 0) && (n >= k) && !(n == k)",
    ]);
  });
});

describe("interpret", () => {
  it("evaluates slot-aligned and named indices", () => {
    const rec = fibonacci();
    expect(interpret(rec, [5], { x: 2 })).toBe(70);
    expect(interpret(rec, { n: 5 }, { x: 2 })).toBe(70);
  });

  it("returns zero outside the domain", () => {
    expect(interpret(fibonacci(), [-1], { x: 2 })).toBe(0);
    expect(interpret(binomial(), [3, 5], {})).toBe(0);
  });

  it("follows rule priority", () => {
    expect(interpret(binomial(), [5, 2], {})).toBe(10);
    expect(interpret(binomial(), [4, 4], {})).toBe(1);
  });

  it("applies scales", () => {
    expect(interpret(legendre(), [2], { x: 0.5 })).toBe(-0.125);
    expect(interpret(legendre(), [3], { x: 0.5 })).toBe(-0.4375);
  });

  it("resolves cross calls", () => {
    const e = overlapE();
    const vars = { a: 1, b: 3, p: 2, P_tau: 0.5, A_tau: 0, B_tau: 0, Delta_sq: 0 };
    const resolve = (name: string) => (name === "E" ? e : undefined);
    expect(interpret(overlapEDeriv(), [1, 0, 0], vars, { resolve })).toBe(-0.25);
  });

  it("reports what it cannot evaluate", () => {
    const vars = { a: 1, b: 3, p: 2, P_tau: 0.5, A_tau: 0, B_tau: 0, Delta_sq: 0 };
    expect(() => interpret(overlapEDeriv(), [1, 0, 0], vars)).toThrow("E_deriv calls unknown recurrence E");
    expect(() => interpret(fibonacci(), [2], {})).toThrow("runtime variable x of Fibonacci is not bound");
    expect(() => interpret(fibonacci(), [1, 2], { x: 1 })).toThrow(EvaluationError);
    expect(() => interpret(fibonacci(), { k: 1 }, { x: 1 })).toThrow("Fibonacci: no value for index n");
  });

  it("reads tables and checks their bounds", () => {
    const rec = new Recurrence("Table", ["n"], ["T"], { arrayVars: ["T"] }).base({ n: 0 }, "T[n]").rule("n > 0", "2 * E[n-1]");
    expect(interpret(rec, [2], { T: [3] })).toBe(12);
    const direct = new Recurrence("Direct", ["t", "N"], ["T"], { arrayVars: ["T"] }).base({ t: 0 }, "T[N]");
    expect(interpret(direct, [0, 1], { T: [3, 5] })).toBe(5);
    expect(() => interpret(direct, [0, 2], { T: [3, 5] })).toThrow("T[2] is out of range (length 2)");
    expect(() => interpret(direct, [0, 0], { T: 3 })).toThrow("array variable T is not bound to an array");
  });

  it("detects self-dependence", () => {
    const rec = new Recurrence("Stuck", ["n"]).rule("n > 0", "E[n]");
    expect(() => interpret(rec, [1], {})).toThrow("Stuck[1] depends on itself");
  });
});
