// src/core/compiler/body.ts
// Rule body strategies shared by the per-value and layered generators

import { collectCalls, collectLeaves, type Expr, type TermExpr } from "../ast";
import { identifiersIn } from "../arith";
import { optimize, shouldApplyCse } from "./optimize";
import { renderExpr, type Dialect, type RenderHooks } from "./render";
import type { CodegenConfig, RuleStrategy } from "./types";

export type RenderedBody = {
  statements: string[];
  /** Expression producing the rule value once the statements ran */
  result: string;
  strategy: RuleStrategy;
};

/** Rules with at most this many calls are rendered inline. */
export const INLINE_CALL_LIMIT = 3;

const BRANCH_LETTERS = "abcdefghijklmnopqrstuvwxyz";

export function renderBody(
  expr: Expr,
  indices: readonly string[],
  config: Pick<CodegenConfig, "optimization" | "cseThreshold">,
  d: Dialect,
  hooks: RenderHooks
): RenderedBody {
  const render = (e: Expr) => renderExpr(e, d, hooks);

  if (config.optimization === "cse" && shouldApplyCse(expr, indices)) {
    const opt = optimize(expr, indices, config.cseThreshold);
    if (opt.intermediates.length > 0) {
      return {
        statements: ["// CSE: cached calls and coefficients", ...opt.intermediates.map((i) => d.declare(i.name, render(i.expr)))],
        result: render(opt.result),
        strategy: "cse",
      };
    }
  }

  if (collectCalls(expr).length <= INLINE_CALL_LIMIT) {
    return { statements: [], result: render(expr), strategy: "inline" };
  }

  const temps = (terms: TermExpr[], prefix: string, statements: string[]): string => {
    const names = terms.map((t, i) => {
      const name = `_${prefix}${i + 1}`;
      statements.push(d.declare(name, render(t)));
      return name;
    });
    return names.length === 0 ? d.zero : names.join(" + ");
  };

  switch (expr.tag) {
    case "Sum": {
      const statements: string[] = [];
      return { statements, result: temps(expr.terms, "t", statements), strategy: "sum" };
    }
    case "Scaled":
      if (expr.inner.tag === "Sum") {
        const statements: string[] = [];
        const inner = temps(expr.inner.terms, "t", statements);
        return {
          statements,
          result: `(${inner}) ${expr.isDivision ? "/" : "*"} (${render(expr.scale)})`,
          strategy: "scaled-sum",
        };
      }
      break;
    case "BranchAverage": {
      const sums: TermExpr[][] = [];
      for (const b of expr.branches) {
        if (b.tag !== "Sum") break;
        sums.push(b.terms);
      }
      if (sums.length === expr.branches.length && sums.length <= BRANCH_LETTERS.length) {
        const statements: string[] = [];
        const parts = sums.map((terms, i) => {
          const letter = BRANCH_LETTERS[i];
          statements.push(`// Branch ${letter.toUpperCase()}`);
          return `(${temps(terms, letter, statements)})`;
        });
        return {
          statements,
          result: `(${parts.join(" + ")}) * (${render(expr.scale)})`,
          strategy: "branch-average",
        };
      }
      break;
    }
    default:
      break;
  }

  return { statements: [], result: render(expr), strategy: "inline" };
}

/** Identifiers read by an expression's leaves, excluding calls. */
export function usedIdentifiers(expr: Expr): Set<string> {
  const ids = new Set<string>();
  for (const leaf of collectLeaves(expr)) {
    switch (leaf.tag) {
      case "Const":
        if (typeof leaf.value === "string") identifiersIn(leaf.value).forEach((id) => ids.add(id));
        break;
      case "Var":
        identifiersIn(leaf.name).forEach((id) => ids.add(id));
        break;
      case "IndexExpr":
        identifiersIn(leaf.text).forEach((id) => ids.add(id));
        break;
      case "Lookup":
        ids.add(leaf.table);
        identifiersIn(leaf.index).forEach((id) => ids.add(id));
        break;
      default:
        break;
    }
  }
  return ids;
}
