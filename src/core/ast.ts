// src/core/ast.ts
// Expression AST for recurrence right-hand sides

export type BinOpKind = "+" | "-" | "*" | "/";

/**
 * A recursive reference at shifted indices. `shifts` is slot-aligned with the
 * recurrence's index list; `target` names another recurrence when present.
 */
export type CallExpr = { tag: "Call"; shifts: number[]; target?: string };

/** Reference to a named intermediate introduced by CSE. */
export type RefExpr = { tag: "Ref"; name: string };

export type TermExpr = { tag: "Term"; coeff: Expr; call: CallExpr | RefExpr };

export type SumExpr = { tag: "Sum"; terms: TermExpr[] };

export type Expr =
  | { tag: "Const"; value: number | string }
  | { tag: "Var"; name: string }
  | { tag: "IndexExpr"; text: string }
  | { tag: "Lookup"; table: string; index: string }
  | CallExpr
  | { tag: "BinOp"; op: BinOpKind; left: Expr; right: Expr }
  | TermExpr
  | SumExpr
  | { tag: "Scaled"; inner: Expr; scale: Expr; isDivision: boolean }
  | { tag: "BranchAverage"; branches: Expr[]; scale: Expr }
  | RefExpr;

export type ExprTag = Expr["tag"];

// ─────────────────────────────────────────────────────────────────
// Constructors
// ─────────────────────────────────────────────────────────────────

export const constant = (value: number | string): Expr => ({ tag: "Const", value });
export const variable = (name: string): Expr => ({ tag: "Var", name });
export const indexExpr = (text: string): Expr => ({ tag: "IndexExpr", text });
export const lookup = (table: string, index: string): Expr => ({ tag: "Lookup", table, index });
export const binop = (op: BinOpKind, left: Expr, right: Expr): Expr => ({ tag: "BinOp", op, left, right });

export function call(shifts: number[], target?: string): CallExpr {
  return target === undefined ? { tag: "Call", shifts: [...shifts] } : { tag: "Call", shifts: [...shifts], target };
}

export function term(coeff: Expr, c: CallExpr | RefExpr): TermExpr {
  return { tag: "Term", coeff, call: c };
}

export function sum(terms: TermExpr[]): SumExpr {
  return { tag: "Sum", terms };
}

export function scaled(inner: Expr, scale: Expr, isDivision: boolean): Expr {
  return { tag: "Scaled", inner, scale, isDivision };
}

export function isUnitCoeff(e: Expr): boolean {
  return e.tag === "Const" && e.value === 1;
}

// ─────────────────────────────────────────────────────────────────
// Traversal
// ─────────────────────────────────────────────────────────────────

/** Every Call leaf, depth-first, left to right. */
export function collectCalls(expr: Expr, acc: CallExpr[] = []): CallExpr[] {
  switch (expr.tag) {
    case "Const":
    case "Var":
    case "IndexExpr":
    case "Lookup":
    case "Ref":
      break;
    case "Call":
      acc.push(expr);
      break;
    case "BinOp":
      collectCalls(expr.left, acc);
      collectCalls(expr.right, acc);
      break;
    case "Term":
      collectCalls(expr.coeff, acc);
      collectCalls(expr.call, acc);
      break;
    case "Sum":
      for (const t of expr.terms) collectCalls(t, acc);
      break;
    case "Scaled":
      collectCalls(expr.inner, acc);
      collectCalls(expr.scale, acc);
      break;
    case "BranchAverage":
      for (const b of expr.branches) collectCalls(b, acc);
      collectCalls(expr.scale, acc);
      break;
  }
  return acc;
}

/** Leaf nodes (including calls and refs), depth-first. */
export function collectLeaves(expr: Expr, acc: Expr[] = []): Expr[] {
  switch (expr.tag) {
    case "Const":
    case "Var":
    case "IndexExpr":
    case "Lookup":
    case "Ref":
    case "Call":
      acc.push(expr);
      break;
    case "BinOp":
      collectLeaves(expr.left, acc);
      collectLeaves(expr.right, acc);
      break;
    case "Term":
      collectLeaves(expr.coeff, acc);
      collectLeaves(expr.call, acc);
      break;
    case "Sum":
      for (const t of expr.terms) collectLeaves(t, acc);
      break;
    case "Scaled":
      collectLeaves(expr.inner, acc);
      collectLeaves(expr.scale, acc);
      break;
    case "BranchAverage":
      for (const b of expr.branches) collectLeaves(b, acc);
      collectLeaves(expr.scale, acc);
      break;
  }
  return acc;
}

/**
 * Canonical signature of a call: target plus `name:shift` pairs sorted by
 * index name, so declaration order does not matter.
 */
export function callSignature(c: CallExpr, indices: readonly string[]): string {
  const pairs = indices.map((name, slot) => `${name}:${c.shifts[slot] ?? 0}`).sort();
  return `${c.target ?? ""}[${pairs.join(",")}]`;
}

/** Structural signature of any expression; equal signatures mean equal trees. */
export function exprSignature(expr: Expr, indices: readonly string[]): string {
  switch (expr.tag) {
    case "Const":
      return `const:${expr.value}`;
    case "Var":
      return `var:${expr.name}`;
    case "IndexExpr":
      return `idx:${expr.text}`;
    case "Lookup":
      return `lookup:${expr.table}[${expr.index}]`;
    case "Ref":
      return `ref:${expr.name}`;
    case "Call":
      return `call:${callSignature(expr, indices)}`;
    case "BinOp":
      return `(${exprSignature(expr.left, indices)}${expr.op}${exprSignature(expr.right, indices)})`;
    case "Term":
      return `term(${exprSignature(expr.coeff, indices)};${exprSignature(expr.call, indices)})`;
    case "Sum":
      return `sum(${expr.terms.map((t) => exprSignature(t, indices)).join(";")})`;
    case "Scaled":
      return `scaled${expr.isDivision ? "/" : "*"}(${exprSignature(expr.inner, indices)};${exprSignature(expr.scale, indices)})`;
    case "BranchAverage":
      return `avg(${expr.branches.map((b) => exprSignature(b, indices)).join(";")};${exprSignature(expr.scale, indices)})`;
  }
}
