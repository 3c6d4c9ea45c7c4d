// src/core/dsl/printer.ts
// Expression AST → DSL text (inverse of the parser for Sum/Term/Scaled shapes)

import type { CallExpr, Expr } from "../ast";
import { DefinitionError } from "../errors";

export type PrintContext = {
  indices: readonly string[];
  selfName: string;
};

export type PrintedRule = { body: string; scale?: string };

export function printCall(c: CallExpr, ctx: PrintContext): string {
  const parts = ctx.indices.map((name, slot) => {
    const s = c.shifts[slot] ?? 0;
    if (s === 0) return name;
    return s > 0 ? `${name}+${s}` : `${name}-${-s}`;
  });
  return `${c.target ?? ctx.selfName}[${parts.join(", ")}]`;
}

export function printExpr(expr: Expr, ctx: PrintContext): string {
  switch (expr.tag) {
    case "Const":
      if (typeof expr.value === "string") return expr.value;
      return expr.value < 0 ? `(${expr.value})` : String(expr.value);
    case "Var":
      return expr.name;
    case "IndexExpr":
      return /^[A-Za-z_]\w*$/.test(expr.text) ? expr.text : `(${expr.text})`;
    case "Lookup":
      return `${expr.table}[${expr.index}]`;
    case "Ref":
      return expr.name;
    case "Call":
      return printCall(expr, ctx);
    case "BinOp":
      if (expr.op === "*") return `${printExpr(expr.left, ctx)} * ${printExpr(expr.right, ctx)}`;
      return `(${printExpr(expr.left, ctx)} ${expr.op} ${printExpr(expr.right, ctx)})`;
    case "Term": {
      const callText = printExpr(expr.call, ctx);
      if (expr.coeff.tag === "Const" && expr.coeff.value === 1) return callText;
      return `${printExpr(expr.coeff, ctx)} * ${callText}`;
    }
    case "Sum":
      if (expr.terms.length === 0) return "0";
      return expr.terms.map((t) => printExpr(t, ctx)).join(" + ");
    case "Scaled":
      return `(${printExpr(expr.inner, ctx)}) ${expr.isDivision ? "/" : "*"} ${printExpr(expr.scale, ctx)}`;
    case "BranchAverage":
      throw new DefinitionError("branch averages have no single-expression DSL form");
  }
}

/** Split a rule body back into the `(expr, scale)` pair the builder accepts. */
export function printRule(expr: Expr, ctx: PrintContext): PrintedRule {
  if (expr.tag === "Scaled") {
    const scale = printExpr(expr.scale, ctx);
    return {
      body: printExpr(expr.inner, ctx),
      scale: expr.isDivision ? `1/${scale}` : scale,
    };
  }
  return { body: printExpr(expr, ctx) };
}
