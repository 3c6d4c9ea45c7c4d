// test/compiler/loader.spec.ts
// Tests for in-process loading of generated js

import { describe, it, expect } from "vitest";
import { EvaluationError } from "../../src/core/errors";
import { coeffFunction, loadGenerated, loadUnit } from "../../src/core/compiler/loader";
import { generatePerValue } from "../../src/core/compiler/perValue";
import { fibonacci } from "../../src/catalog/builtin/combinatorics";
import { overlapE, overlapEDeriv } from "../../src/catalog/builtin/gradients";

const unit = (moduleName: string, exports: string[], dependencies: string[] = []) => ({
  recurrence: "Sample",
  moduleName,
  exports,
  dependencies,
});

describe("loadGenerated", () => {
  it("passes dependencies in as free identifiers", () => {
    const mod = loadGenerated("const M = { g: (n) => F(n) + 1 };", unit("M", ["g"], ["F"]), {
      F: (n: number) => n * 2,
    });
    expect(coeffFunction(mod, "g")(3)).toBe(7);
  });

  it("reports missing dependencies before evaluating", () => {
    expect(() => loadGenerated("throw new Error('ran');", unit("M", [], ["F", "G"]), { F: 1 })).toThrow(
      "Sample needs G to load"
    );
  });

  it("checks the module object and its exports", () => {
    expect(() => loadGenerated("const M = 3;", unit("M", []))).toThrow("Sample: module M did not evaluate to an object");
    expect(() => loadGenerated("const M = { a: 1 };", unit("M", ["a"]))).toThrow("Sample: export a is missing");
  });
});

describe("loadUnit", () => {
  it("refuses C++ output", () => {
    expect(() => loadUnit(generatePerValue(fibonacci()))).toThrow(
      "Fibonacci: only js output can be loaded, got cpp"
    );
  });

  it("needs the units a cross call reads", () => {
    const e = overlapE();
    const resolve = (name: string) => (name === "E" ? e : undefined);
    const deriv = generatePerValue(overlapEDeriv(), { target: "js", resolve });
    expect(() => loadUnit(deriv)).toThrow("E_deriv needs ECoeff to load");
    const base = loadUnit(generatePerValue(e, { target: "js", resolve }));
    expect(Object.keys(loadUnit(deriv, base))).toContain("E_derivCoeff");
  });
});

describe("coeffFunction", () => {
  it("rejects exports that are not numeric functions", () => {
    expect(() => coeffFunction({ g: 1 }, "g")).toThrow("export g is not a function");
    expect(() => coeffFunction({ f: () => "x" }, "f")()).toThrow(EvaluationError);
    expect(() => coeffFunction({ f: () => "x" }, "f")()).toThrow("f returned string, not a number");
  });
});
