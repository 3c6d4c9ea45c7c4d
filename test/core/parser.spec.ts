// test/core/parser.spec.ts
// Tests for the index-shift DSL parser and printer

import { describe, it, expect } from "vitest";
import { binop, call, constant, indexExpr, lookup, scaled, sum, term, variable } from "../../src/core/ast";
import { parseRule, parseRuleBody, parseValue, type ParseContext } from "../../src/core/dsl/parser";
import { printExpr, printRule } from "../../src/core/dsl/printer";
import { DslSyntaxError } from "../../src/core/errors";

const ctx: ParseContext = { name: "Seq", indices: ["n"], runtimeVars: ["x"], selfName: "E" };

const deriv: ParseContext = {
  name: "E_deriv",
  indices: ["i", "j", "t"],
  runtimeVars: ["p"],
  selfName: "E_deriv",
};

function syntaxError(fn: () => unknown): DslSyntaxError {
  try {
    fn();
  } catch (e) {
    if (e instanceof DslSyntaxError) return e;
    throw e;
  }
  throw new Error("expected a DslSyntaxError");
}

describe("parseRuleBody", () => {
  it("parses coefficients and self calls", () => {
    expect(parseRuleBody("x * E[n-1] + E[n-2]", ctx).expr).toEqual(
      sum([term(variable("x"), call([-1])), term(constant(1), call([-2]))])
    );
  });

  it("folds a leading minus into numeric coefficients", () => {
    const { expr } = parseRuleBody("2 * x * E[n-1] - E[n-2] - 3 * E[n-3]", ctx);
    expect(expr.terms.map((t) => t.coeff)).toEqual([
      binop("*", constant(2), variable("x")),
      constant(-1),
      constant(-3),
    ]);
  });

  it("reads a leading minus on a bare call as a -1 coefficient", () => {
    expect(parseRuleBody("-E[n-1] + x * E[n-2]", ctx).expr).toEqual(
      sum([term(constant(-1), call([-1])), term(variable("x"), call([-2]))])
    );
    expect(parseRuleBody("- E[n-1]", ctx).expr).toEqual(sum([term(constant(-1), call([-1]))]));
  });

  it("negates compound coefficients with a -1 factor", () => {
    const { expr } = parseRuleBody("E[n-1] - x * E[n-2]", ctx);
    expect(expr.terms[1].coeff).toEqual(binop("*", constant(-1), variable("x")));
  });

  it("keeps index arithmetic as index expressions", () => {
    const { expr } = parseRuleBody("(2*n-1) * x * E[n-1] + (-(n-1)) * E[n-2]", ctx);
    expect(expr.terms[0].coeff).toEqual(binop("*", indexExpr("2*n-1"), variable("x")));
    expect(expr.terms[1].coeff).toEqual(indexExpr("-(n-1)"));
  });

  it("does not split on an exponent sign", () => {
    const { expr } = parseRuleBody("1e-3 * E[n-1]", ctx);
    expect(expr.terms).toEqual([term(constant(0.001), call([-1]))]);
  });

  it("tells cross calls from self calls", () => {
    const { expr } = parseRuleBody("E[i-1, j, t] + E_deriv[i, j-1, t+1]", deriv);
    expect(expr.terms.map((t) => t.call)).toEqual([call([-1, 0, 0], "E"), call([0, -1, 1])]);
  });

  it("treats runtime arithmetic as an opaque variable", () => {
    const { expr } = parseRuleBody("(0.5 / p) * E_deriv[i-1, j, t-1]", deriv);
    expect(expr.terms[0].coeff).toEqual(variable("(0.5 / p)"));
  });

  it("warns about unknown identifiers and keeps them", () => {
    const { expr, diagnostics } = parseRuleBody("y * E[n-1]", ctx);
    expect(expr.terms[0].coeff).toEqual(variable("y"));
    expect(diagnostics).toHaveLength(1);
    expect(diagnostics[0].code).toBe("W0101");
    expect(diagnostics[0].message).toBe("Unknown identifier treated as runtime variable: y");
    expect(diagnostics[0].data).toEqual({ recurrence: "Seq", name: "y" });
  });

  it("reports malformed text with a code and location", () => {
    expect(syntaxError(() => parseRuleBody("E[n-1", ctx)).syntaxCode).toBe("E0002");
    expect(syntaxError(() => parseRuleBody("x * n", ctx)).syntaxCode).toBe("E0003");
    expect(syntaxError(() => parseRuleBody("E[0]", ctx)).syntaxCode).toBe("E0004");
    expect(syntaxError(() => parseRuleBody("E[m-1]", ctx)).syntaxCode).toBe("E0004");
    expect(syntaxError(() => parseRuleBody("x E[n-1]", ctx)).syntaxCode).toBe("E0001");

    const located = syntaxError(() => parseRuleBody("E[n-1", { ...ctx, ruleIndex: 2 }));
    expect(located.message).toBe('Seq rule 2: Unbalanced brackets: "E[n-1"');
  });
});

describe("parseRule", () => {
  it("divides by a 1/ scale", () => {
    const { expr } = parseRule("E[n-1]", "1/n", ctx);
    expect(expr).toEqual(scaled(sum([term(constant(1), call([-1]))]), indexExpr("n"), true));
  });

  it("multiplies by any other scale", () => {
    const { expr } = parseRule("E[n-1]", "0.5", ctx);
    expect(expr).toEqual(scaled(sum([term(constant(1), call([-1]))]), constant(0.5), false));
  });
});

describe("parseValue", () => {
  it("parses numbers, variables and tables", () => {
    const tables: ParseContext = { name: "R", indices: ["t", "N"], runtimeVars: ["Boys"], arrayVars: ["Boys"], selfName: "E" };
    expect(parseValue(1, ctx).expr).toEqual(constant(1));
    expect(parseValue("2.5", ctx).expr).toEqual(constant(2.5));
    expect(parseValue("x", ctx).expr).toEqual(variable("x"));
    expect(parseValue("Boys[N]", tables).expr).toEqual(lookup("Boys", "N"));
  });

  it("keeps runtime expressions verbatim", () => {
    expect(parseValue("exp(-x)", ctx).expr).toEqual(variable("(exp(-x))"));
  });
});

describe("printer", () => {
  const print = { indices: ["n"], selfName: "E" };

  it("prints a scaled rule back to builder arguments", () => {
    const { expr } = parseRule("(2*n-1) * x * E[n-1] + (-(n-1)) * E[n-2]", "1/n", ctx);
    expect(printRule(expr, print)).toEqual({
      body: "(2*n-1) * x * E[n-1] + (-(n-1)) * E[n-2]",
      scale: "1/n",
    });
  });

  it("round-trips through the parser", () => {
    const { expr } = parseRuleBody("2 * x * E[n-1] - E[n-2]", ctx);
    const text = printExpr(expr, print);
    expect(text).toBe("2 * x * E[n-1] + (-1) * E[n-2]");
    expect(parseRuleBody(text, ctx).expr).toEqual(expr);
  });

  it("prints cross calls by target name", () => {
    const { expr } = parseRuleBody("E[i-1, j, t]", deriv);
    expect(printExpr(expr, { indices: deriv.indices, selfName: deriv.selfName })).toBe("E[i-1, j, t]");
  });
});
