// src/core/compiler/optimize.ts
// Common subexpression elimination over recursive calls and coefficients

import {
  callSignature,
  collectCalls,
  exprSignature,
  isUnitCoeff,
  term,
  type CallExpr,
  type Expr,
  type RefExpr,
  type TermExpr,
} from "../ast";
import { isIdentifier } from "../arith";
import type { CSECandidate, CseKind, OperationCounts, OptimizedExpr } from "./types";

export const DEFAULT_CSE_THRESHOLD = 2;

// ─────────────────────────────────────────────────────────────────
// Occurrence counting
// ─────────────────────────────────────────────────────────────────

type Occurrence = { kind: CseKind; signature: string; count: number; expr: Expr };

function occurrenceKey(kind: CseKind, signature: string): string {
  return `${kind}|${signature}`;
}

/** Depth-first, left to right; Map insertion order is first-occurrence order. */
function countOccurrences(expr: Expr, indices: readonly string[], acc: Map<string, Occurrence>): void {
  const record = (kind: CseKind, e: Expr) => {
    const signature = e.tag === "Call" ? callSignature(e, indices) : exprSignature(e, indices);
    const key = occurrenceKey(kind, signature);
    const seen = acc.get(key);
    if (seen) seen.count++;
    else acc.set(key, { kind, signature, count: 1, expr: e });
  };

  switch (expr.tag) {
    case "Call":
      record("call", expr);
      break;
    case "Term":
      if (!isUnitCoeff(expr.coeff)) record("coeff", expr.coeff);
      if (expr.call.tag === "Call") record("call", expr.call);
      break;
    case "Sum":
      for (const t of expr.terms) countOccurrences(t, indices, acc);
      break;
    case "Scaled":
      countOccurrences(expr.inner, indices, acc);
      record("coeff", expr.scale);
      break;
    case "BranchAverage":
      for (const b of expr.branches) countOccurrences(b, indices, acc);
      record("coeff", expr.scale);
      break;
    case "BinOp":
      countOccurrences(expr.left, indices, acc);
      countOccurrences(expr.right, indices, acc);
      break;
    case "Const":
    case "Var":
    case "IndexExpr":
    case "Lookup":
    case "Ref":
      break;
  }
}

/**
 * Evaluation cost of a coefficient. Leaves that are already a register or an
 * immediate cost nothing, so naming them would only add a copy.
 */
export function coeffCost(expr: Expr): number {
  switch (expr.tag) {
    case "Const":
    case "Ref":
      return 0;
    case "Var":
      return isIdentifier(expr.name) ? 0 : 1;
    case "IndexExpr":
      return isIdentifier(expr.text) || /^\d+$/.test(expr.text) ? 0 : 1;
    case "BinOp":
      return 1 + coeffCost(expr.left) + coeffCost(expr.right);
    case "Lookup":
    case "Call":
    case "Term":
    case "Sum":
    case "Scaled":
    case "BranchAverage":
      return 1;
  }
}

// ─────────────────────────────────────────────────────────────────
// Optimization
// ─────────────────────────────────────────────────────────────────

export function findCandidates(
  expr: Expr,
  indices: readonly string[],
  threshold = DEFAULT_CSE_THRESHOLD
): CSECandidate[] {
  const occurrences = new Map<string, Occurrence>();
  countOccurrences(expr, indices, occurrences);

  const candidates: CSECandidate[] = [];
  let counter = 0;
  for (const occ of occurrences.values()) {
    if (occ.count < threshold) continue;
    if (occ.kind === "coeff" && coeffCost(occ.expr) < 1) continue;
    counter++;
    candidates.push({ ...occ, name: `_cse_${occ.kind}_${counter}` });
  }
  return candidates;
}

export function optimize(
  expr: Expr,
  indices: readonly string[],
  threshold = DEFAULT_CSE_THRESHOLD
): OptimizedExpr {
  const candidates = findCandidates(expr, indices, threshold);
  if (candidates.length === 0) {
    return { intermediates: [], result: expr, candidates };
  }

  const byKey = new Map(candidates.map((c): [string, CSECandidate] => [occurrenceKey(c.kind, c.signature), c]));

  const refFor = (kind: CseKind, e: Expr): RefExpr | undefined => {
    const signature = e.tag === "Call" ? callSignature(e, indices) : exprSignature(e, indices);
    const hit = byKey.get(occurrenceKey(kind, signature));
    return hit ? { tag: "Ref", name: hit.name } : undefined;
  };

  const rebuildTerm = (t: TermExpr): TermExpr => {
    const coeff = isUnitCoeff(t.coeff) ? t.coeff : (refFor("coeff", t.coeff) ?? t.coeff);
    const c = t.call.tag === "Call" ? (refFor("call", t.call) ?? t.call) : t.call;
    return term(coeff, c);
  };

  const rebuild = (e: Expr): Expr => {
    switch (e.tag) {
      case "Call":
        return refFor("call", e) ?? e;
      case "Term":
        return rebuildTerm(e);
      case "Sum":
        return { tag: "Sum", terms: e.terms.map(rebuildTerm) };
      case "Scaled":
        return { ...e, inner: rebuild(e.inner), scale: refFor("coeff", e.scale) ?? e.scale };
      case "BranchAverage":
        return { ...e, branches: e.branches.map(rebuild), scale: refFor("coeff", e.scale) ?? e.scale };
      case "BinOp":
        return { ...e, left: rebuild(e.left), right: rebuild(e.right) };
      case "Const":
      case "Var":
      case "IndexExpr":
      case "Lookup":
      case "Ref":
        return e;
    }
  };

  return {
    intermediates: candidates.map((c) => ({ name: c.name, expr: c.expr })),
    result: rebuild(expr),
    candidates,
  };
}

// ─────────────────────────────────────────────────────────────────
// Heuristics
// ─────────────────────────────────────────────────────────────────

/** Worth optimizing: a repeated call, or enough calls that coefficients likely repeat. */
export function shouldApplyCse(expr: Expr, indices: readonly string[]): boolean {
  const calls: CallExpr[] = collectCalls(expr);
  const unique = new Set(calls.map((c) => callSignature(c, indices)));
  return unique.size < calls.length || calls.length >= 3;
}

export function countOperations(expr: Expr, acc: OperationCounts = { add: 0, mul: 0, div: 0, call: 0 }): OperationCounts {
  switch (expr.tag) {
    case "Call":
      acc.call++;
      break;
    case "BinOp":
      if (expr.op === "+" || expr.op === "-") acc.add++;
      else if (expr.op === "*") acc.mul++;
      else acc.div++;
      countOperations(expr.left, acc);
      countOperations(expr.right, acc);
      break;
    case "Term":
      if (!isUnitCoeff(expr.coeff)) {
        acc.mul++;
        countOperations(expr.coeff, acc);
      }
      countOperations(expr.call, acc);
      break;
    case "Sum":
      acc.add += Math.max(0, expr.terms.length - 1);
      for (const t of expr.terms) countOperations(t, acc);
      break;
    case "Scaled":
      if (expr.isDivision) acc.div++;
      else acc.mul++;
      countOperations(expr.inner, acc);
      countOperations(expr.scale, acc);
      break;
    case "BranchAverage":
      acc.add += Math.max(0, expr.branches.length - 1);
      acc.mul++;
      for (const b of expr.branches) countOperations(b, acc);
      countOperations(expr.scale, acc);
      break;
    case "Const":
    case "Var":
    case "IndexExpr":
    case "Lookup":
    case "Ref":
      break;
  }
  return acc;
}

export const OPERATION_WEIGHTS: Readonly<OperationCounts> = { add: 1, mul: 2, div: 10, call: 50 };

export function estimateCost(expr: Expr): number {
  const ops = countOperations(expr);
  return (
    ops.add * OPERATION_WEIGHTS.add +
    ops.mul * OPERATION_WEIGHTS.mul +
    ops.div * OPERATION_WEIGHTS.div +
    ops.call * OPERATION_WEIGHTS.call
  );
}
