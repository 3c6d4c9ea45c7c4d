// test/compiler/dispatcher.spec.ts
// Tests for runtime dispatch onto compiled specializations

import { describe, it, expect } from "vitest";
import { Recurrence } from "../../src/core/recurrence";
import { dispatchName, generateDispatcher, unitFileName } from "../../src/core/compiler/dispatcher";
import { coeffFunction, loadUnits } from "../../src/core/compiler/loader";
import { generatePerValue } from "../../src/core/compiler/perValue";
import { coulombR } from "../../src/catalog/builtin/mcmd";

/** 2^n, with n at most 5. */
const doubling = () =>
  new Recurrence("Doubling", ["n"], [], { maxIndices: { n: 5 } })
    .validity("n >= 0")
    .base({ n: 0 }, 1)
    .rule("n > 0", "2 * E[n-1]");

describe("unitFileName", () => {
  it("derives file names from the recurrence name", () => {
    const rec = coulombR();
    expect(unitFileName(rec, "per-value", "hpp")).toBe("coulombr_coeff.hpp");
    expect(unitFileName(rec, "layered", "hpp")).toBe("coulombr_coeff_layered.hpp");
    expect(unitFileName(rec, "dispatcher", "js")).toBe("coulombr_dispatch.js");
    expect(dispatchName(rec)).toBe("dispatch_CoulombR");
  });
});

describe("generateDispatcher (cpp)", () => {
  it("switches over every index value up to the maximum", () => {
    const unit = generateDispatcher(doubling());
    const code = unit.code.split("\n");
    expect(code).toContain('#include "doubling_coeff.hpp"');
    expect(code).toContain("inline Vec8d dispatch_Doubling(int n) {");
    expect(code).toContain("    switch (n) {");
    expect(code).toContain("        case 0: return DoublingCoeff<0>::compute();");
    expect(code).toContain("        case 5: return DoublingCoeff<5>::compute();");
    expect(code).not.toContain("        case 6: return DoublingCoeff<6>::compute();");
    expect(code).toContain("        default: return Vec8d(0.0);");
    expect(unit.dependencies).toEqual(["DoublingCoeff"]);
  });

  it("nests switches for several indices", () => {
    const rec = new Recurrence("Pair", ["n", "k"], ["x"], { maxIndices: { n: 1, k: 1 } })
      .base({ n: 0, k: 0 }, "x")
      .rule("n > 0", "E[n-1, k]");
    const code = generateDispatcher(rec).code.split("\n");
    expect(code).toContain("inline Vec8d dispatch_Pair(int n, int k, Vec8d x) {");
    expect(code).toContain("        case 0:");
    expect(code).toContain("            switch (k) {");
    expect(code).toContain("                case 1: return PairCoeff<0, 1>::compute(x);");
  });

  it("includes the layered header when asked", () => {
    const code = generateDispatcher(coulombR(), { layered: true }).code.split("\n");
    expect(code).toContain('#include "coulombr_coeff_layered.hpp"');
    expect(code).toContain("inline Vec8d dispatch_CoulombR(int t, int u, int v, int N, Vec8d PCx, Vec8d PCy, Vec8d PCz, const Vec8d* Boys) {");
  });
});

describe("generateDispatcher (js)", () => {
  const rec = doubling();
  const mod = loadUnits([generatePerValue(rec, { target: "js" }), generateDispatcher(rec, { target: "js" })]);
  const dispatch = coeffFunction(mod, "dispatch_Doubling");

  it("forwards in-range indices", () => {
    expect(dispatch(0)).toBe(1);
    expect(dispatch(5)).toBe(32);
  });

  it("returns zero outside 0..max", () => {
    expect(dispatch(-1)).toBe(0);
    expect(dispatch(6)).toBe(0);
    expect(dispatch(2.5)).toBe(0);
  });

  it("does not clamp the coefficient function itself", () => {
    expect(coeffFunction(mod, "DoublingCoeff")(6)).toBe(64);
  });
});
