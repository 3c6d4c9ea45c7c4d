// test/core/constraints.spec.ts
// Tests for guard parsing, rendering and the integer-bound solver

import { describe, it, expect } from "vitest";
import { asBound, ConstraintSet, parseConstraint } from "../../src/core/constraints";
import { ConstraintSyntaxError } from "../../src/core/errors";

describe("parseConstraint", () => {
  it("splits on the comparison operator", () => {
    expect(parseConstraint("n >= k")).toEqual({ left: "n", op: ">=", right: "k" });
    expect(parseConstraint("t <= nA + nB")).toEqual({ left: "t", op: "<=", right: "nA + nB" });
    expect(parseConstraint("n != 2")).toEqual({ left: "n", op: "!=", right: "2" });
  });

  it("rejects text without an operator", () => {
    expect(() => parseConstraint("n")).toThrow(ConstraintSyntaxError);
    expect(() => parseConstraint("n")).toThrow('No comparison operator in constraint: "n"');
  });
});

describe("ConstraintSet", () => {
  it("parses && chains across several strings", () => {
    const set = ConstraintSet.parse("n > 1 && k == 0", "k >= 0");
    expect(set.size).toBe(3);
    expect(set.equalityCount).toBe(1);
    expect(set.render()).toBe("(n > 1) && (k == 0) && (k >= 0)");
  });

  it("renders the empty set as true", () => {
    expect(new ConstraintSet().render()).toBe("true");
    expect(ConstraintSet.parse("").size).toBe(0);
  });

  it("has an order-independent key", () => {
    expect(ConstraintSet.parse("a > 0 && b == 1").key()).toBe(ConstraintSet.parse("b == 1 && a > 0").key());
  });

  it("evaluates against bindings", () => {
    const set = ConstraintSet.parse("n >= k", "k > 0");
    expect(set.holds(new Map([["n", 3], ["k", 1]]))).toBe(true);
    expect(set.holds(new Map([["n", 0], ["k", 1]]))).toBe(false);
  });

  it("checks whether an index is mentioned", () => {
    const set = ConstraintSet.parse("t <= nA + nB");
    expect(set.mentions("nB")).toBe(true);
    expect(set.mentions("n")).toBe(false);
  });

  it("proves contradictions between integer bounds", () => {
    expect(ConstraintSet.parse("n == 0", "n > 0").unsatisfiable()).toBe(true);
    expect(ConstraintSet.parse("n != 2", "n == 2").unsatisfiable()).toBe(true);
    expect(ConstraintSet.parse("n > 0", "n < 5").unsatisfiable()).toBe(false);
  });

  it("does not claim contradictions it cannot see", () => {
    expect(ConstraintSet.parse("n >= k", "k == 0").unsatisfiable()).toBe(false);
  });

  it("detects provably disjoint sets", () => {
    expect(ConstraintSet.parse("k == 0").provablyDisjoint(ConstraintSet.parse("k > 0"))).toBe(true);
    expect(ConstraintSet.parse("n == k").provablyDisjoint(ConstraintSet.parse("k > 0"))).toBe(false);
  });
});

describe("asBound", () => {
  it("flips literal-first comparisons", () => {
    expect(asBound({ left: "0", op: "<", right: "n" })).toEqual({ name: "n", op: ">", value: 0 });
  });

  it("ignores comparisons between indices", () => {
    expect(asBound({ left: "n", op: ">=", right: "k" })).toBeUndefined();
  });
});
