// src/core/compiler/render.ts
// Target dialects and the shared expression renderer

import type { CallExpr, Expr } from "../ast";
import { isUnitCoeff } from "../ast";
import type { Target } from "./types";

export interface Dialect {
  readonly target: Target;
  readonly extension: string;
  /** Zero of the value type */
  readonly zero: string;
  readonly vecType: string;
  number(value: number): string;
  /** Integer index arithmetic lifted to the value type. */
  indexValue(text: string): string;
  declare(name: string, value: string): string;
}

export function formatCppNumber(value: number): string {
  if (Number.isInteger(value)) return `${value}.0`;
  return String(value);
}

export function createDialect(target: Target, vecType = "Vec8d"): Dialect {
  switch (target) {
    case "cpp":
      return {
        target,
        extension: "hpp",
        zero: `${vecType}(0.0)`,
        vecType,
        number: (v) => `${vecType}(${formatCppNumber(v)})`,
        indexValue: (text) => `${vecType}(${text})`,
        declare: (name, value) => `${vecType} ${name} = ${value};`,
      };
    case "js":
      return {
        target,
        extension: "js",
        zero: "0",
        vecType: "number",
        number: (v) => (v < 0 || Object.is(v, -0) ? `(${v})` : String(v)),
        indexValue: (text) => `(${text})`,
        declare: (name, value) => `const ${name} = ${value};`,
      };
  }
}

export type RenderHooks = {
  call(c: CallExpr): string;
};

function needsParens(e: Expr): boolean {
  return e.tag === "BinOp" || e.tag === "Sum" || e.tag === "Scaled" || e.tag === "BranchAverage";
}

function renderCoeff(e: Expr, d: Dialect, hooks: RenderHooks): string {
  const text = renderExpr(e, d, hooks);
  if (e.tag === "BinOp" && (e.op === "+" || e.op === "-")) return `(${text})`;
  if (e.tag === "Sum" || e.tag === "Scaled" || e.tag === "BranchAverage") return `(${text})`;
  return text;
}

export function renderExpr(expr: Expr, d: Dialect, hooks: RenderHooks): string {
  switch (expr.tag) {
    case "Const":
      return typeof expr.value === "number" ? d.number(expr.value) : expr.value;
    case "Var":
      return expr.name;
    case "IndexExpr":
      return d.indexValue(expr.text);
    case "Lookup":
      return `${expr.table}[${expr.index}]`;
    case "Ref":
      return expr.name;
    case "Call":
      return hooks.call(expr);
    case "BinOp": {
      const l = renderExpr(expr.left, d, hooks);
      const r = renderExpr(expr.right, d, hooks);
      return `${needsParens(expr.left) ? `(${l})` : l} ${expr.op} ${needsParens(expr.right) ? `(${r})` : r}`;
    }
    case "Term": {
      const c = renderExpr(expr.call, d, hooks);
      return isUnitCoeff(expr.coeff) ? c : `${renderCoeff(expr.coeff, d, hooks)} * ${c}`;
    }
    case "Sum":
      if (expr.terms.length === 0) return d.zero;
      return expr.terms.map((t) => renderExpr(t, d, hooks)).join(" + ");
    case "Scaled":
      return `(${renderExpr(expr.inner, d, hooks)}) ${expr.isDivision ? "/" : "*"} (${renderExpr(expr.scale, d, hooks)})`;
    case "BranchAverage": {
      const branches = expr.branches.map((b) => `(${renderExpr(b, d, hooks)})`).join(" + ");
      return `(${branches}) * (${renderExpr(expr.scale, d, hooks)})`;
    }
  }
}

/** `n`, `n + 1`, `n - 2` */
export function shiftedIndex(name: string, shift: number): string {
  if (shift === 0) return name;
  return shift > 0 ? `${name} + ${shift}` : `${name} - ${-shift}`;
}

export function indent(lines: string[], depth: number): string[] {
  const pad = "    ".repeat(depth);
  return lines.map((l) => (l ? pad + l : l));
}
