// test/compiler/optimize.spec.ts
// Tests for common subexpression elimination and body strategies

import { describe, it, expect } from "vitest";
import { call, indexExpr, variable, type CallExpr } from "../../src/core/ast";
import { parseRuleBody, type ParseContext } from "../../src/core/dsl/parser";
import { Recurrence } from "../../src/core/recurrence";
import { renderBody } from "../../src/core/compiler/body";
import { coeffFunction, loadUnit } from "../../src/core/compiler/loader";
import { generatePerValue } from "../../src/core/compiler/perValue";
import {
  coeffCost,
  countOperations,
  estimateCost,
  findCandidates,
  optimize,
  shouldApplyCse,
} from "../../src/core/compiler/optimize";
import { createDialect, type RenderHooks } from "../../src/core/compiler/render";

const ctx: ParseContext = { name: "Seq", indices: ["n"], runtimeVars: ["x", "y"], selfName: "E" };
const aux: ParseContext = { name: "Aux", indices: ["t"], runtimeVars: [], selfName: "E" };
const js = createDialect("js");
const hooks: RenderHooks = { call: (c: CallExpr) => `F(${c.shifts.join(", ")})` };

describe("findCandidates", () => {
  it("names calls that repeat", () => {
    const { expr } = parseRuleBody("x * E[n-1] + y * E[n-1] + E[n-2]", ctx);
    const candidates = findCandidates(expr, ctx.indices);
    expect(candidates.map((c) => [c.name, c.kind, c.signature, c.count])).toEqual([["_cse_call_1", "call", "[n:-1]", 2]]);
  });

  it("names repeated coefficients that cost something", () => {
    const { expr } = parseRuleBody("(t + 1) * E[t-1] + (t + 1) * E[t+1] + E[t]", aux);
    expect(findCandidates(expr, aux.indices).map((c) => c.name)).toEqual(["_cse_coeff_1"]);
  });

  it("skips free coefficients", () => {
    const { expr } = parseRuleBody("x * E[n-1] + x * E[n-2]", ctx);
    expect(findCandidates(expr, ctx.indices)).toEqual([]);
  });

  it("honours the threshold", () => {
    const { expr } = parseRuleBody("x * E[n-1] + y * E[n-1] + E[n-2]", ctx);
    expect(findCandidates(expr, ctx.indices, 3)).toEqual([]);
  });
});

describe("optimize", () => {
  it("binds intermediates and rewrites uses to references", () => {
    const { expr } = parseRuleBody("x * E[n-1] + y * E[n-1] + E[n-2]", ctx);
    const opt = optimize(expr, ctx.indices);
    expect(opt.intermediates).toEqual([{ name: "_cse_call_1", expr: call([-1]) }]);
    expect(opt.result).toEqual({
      tag: "Sum",
      terms: [
        { tag: "Term", coeff: variable("x"), call: { tag: "Ref", name: "_cse_call_1" } },
        { tag: "Term", coeff: variable("y"), call: { tag: "Ref", name: "_cse_call_1" } },
        { tag: "Term", coeff: { tag: "Const", value: 1 }, call: call([-2]) },
      ],
    });
  });

  it("returns the input tree when nothing repeats", () => {
    const { expr } = parseRuleBody("x * E[n-1] + E[n-2]", ctx);
    const opt = optimize(expr, ctx.indices);
    expect(opt.intermediates).toEqual([]);
    expect(opt.result).toBe(expr);
  });
});

describe("heuristics", () => {
  it("applies CSE to repeated calls or three or more calls", () => {
    expect(shouldApplyCse(parseRuleBody("x * E[n-1] + E[n-2]", ctx).expr, ctx.indices)).toBe(false);
    expect(shouldApplyCse(parseRuleBody("x * E[n-1] + E[n-1]", ctx).expr, ctx.indices)).toBe(true);
    expect(shouldApplyCse(parseRuleBody("E[n-1] + E[n-2] + E[n-3]", ctx).expr, ctx.indices)).toBe(true);
  });

  it("prices coefficients", () => {
    expect(coeffCost(variable("x"))).toBe(0);
    expect(coeffCost(variable("(0.5 / p)"))).toBe(1);
    expect(coeffCost(indexExpr("t"))).toBe(0);
    expect(coeffCost(indexExpr("t + 1"))).toBe(1);
  });

  it("counts operations and weighs them", () => {
    const { expr } = parseRuleBody("x * E[n-1] + E[n-2]", ctx);
    expect(countOperations(expr)).toEqual({ add: 1, mul: 1, div: 0, call: 2 });
    expect(estimateCost(expr)).toBe(103);
  });
});

describe("renderBody", () => {
  const cse = { optimization: "cse" as const, cseThreshold: 2 };
  const none = { optimization: "none" as const, cseThreshold: 2 };

  it("emits cached intermediates under cse", () => {
    const { expr } = parseRuleBody("x * E[n-1] + y * E[n-1] + E[n-2]", ctx);
    expect(renderBody(expr, ctx.indices, cse, js, hooks)).toEqual({
      statements: ["// CSE: cached calls and coefficients", "const _cse_call_1 = F(-1);"],
      result: "x * _cse_call_1 + y * _cse_call_1 + F(-2)",
      strategy: "cse",
    });
  });

  it("inlines small bodies", () => {
    const { expr } = parseRuleBody("x * E[n-1] + E[n-2]", ctx);
    expect(renderBody(expr, ctx.indices, cse, js, hooks)).toEqual({
      statements: [],
      result: "x * F(-1) + F(-2)",
      strategy: "inline",
    });
  });

  it("splits large sums into temporaries", () => {
    const { expr } = parseRuleBody("E[n-1] + E[n-2] + E[n-3] + E[n-4]", ctx);
    expect(renderBody(expr, ctx.indices, none, js, hooks)).toEqual({
      statements: ["const _t1 = F(-1);", "const _t2 = F(-2);", "const _t3 = F(-3);", "const _t4 = F(-4);"],
      result: "_t1 + _t2 + _t3 + _t4",
      strategy: "sum",
    });
  });

  it("renders each branch of an average separately", () => {
    const rec = new Recurrence("Avg", ["n"]).branchAverage("n > 1", ["E[n-1] + E[n-2]", "E[n-2] + E[n-1]"]);
    const body = renderBody(rec.rules[0].expr, rec.indices, none, js, hooks);
    expect(body.strategy).toBe("branch-average");
    expect(body.statements).toEqual([
      "// Branch A",
      "const _a1 = F(-1);",
      "const _a2 = F(-2);",
      "// Branch B",
      "const _b1 = F(-2);",
      "const _b2 = F(-1);",
    ]);
    expect(body.result).toBe("((_a1 + _a2) + (_b1 + _b2)) * (0.5)");
  });

  it("keeps the division of a scaled sum", () => {
    const rec = new Recurrence("S", ["n"]).rule("n > 3", "E[n-1] + E[n-2] + E[n-3] + E[n-4]", { scale: "1/n" });
    const body = renderBody(rec.rules[0].expr, rec.indices, none, js, hooks);
    expect(body.strategy).toBe("scaled-sum");
    expect(body.result).toBe("(_t1 + _t2 + _t3 + _t4) / ((n))");
  });
});

describe("CSE safety", () => {
  it("evaluates the same with and without CSE", () => {
    const rec = new Recurrence("Mix", ["n"], ["x", "y"])
      .validity("n >= 0")
      .base({ n: 0 }, 1)
      .rule("n > 0", "x * E[n-1] + y * E[n-1] + (n + 1) * E[n-2] + (n + 1) * E[n-3]");
    const withCse = generatePerValue(rec, { target: "js", optimization: "cse" });
    const without = generatePerValue(rec, { target: "js", optimization: "none" });
    expect(withCse.strategies).toEqual(["cse"]);
    expect(without.strategies).toEqual(["sum"]);

    const a = coeffFunction(loadUnit(withCse), "MixCoeff");
    const b = coeffFunction(loadUnit(without), "MixCoeff");
    for (let n = 0; n <= 6; n++) {
      expect(a(n, 0.3, -0.7)).toBe(b(n, 0.3, -0.7));
    }
    // n = 1: (0.5 - 1) * 1 = -0.5
    expect(a(1, 0.5, -1)).toBe(-0.5);
  });
});
