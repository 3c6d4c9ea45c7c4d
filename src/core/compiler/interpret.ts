// src/core/compiler/interpret.ts
// Reference interpreter: evaluates a recurrence straight from its definition

import { isUnitCoeff, type BinOpKind, type Expr } from "../ast";
import { evaluateArith, evaluateIndex } from "../arith";
import { EvaluationError } from "../errors";
import type { Recurrence } from "../recurrence";
import { select } from "./selection";
import type { RecurrenceResolver } from "./types";

export type RuntimeValue = number | readonly number[];
export type RuntimeVars = Readonly<Record<string, RuntimeValue>>;

export type InterpretOptions = {
  resolve?: RecurrenceResolver;
};

type Frame = {
  rec: Recurrence;
  at: readonly number[];
  /** Index bindings plus scalar runtime variables */
  env: Map<string, number>;
};

/**
 * Evaluate `rec` at `at` (slot-aligned, or keyed by index name). Selection is
 * first match: bases in declaration order, then rules by priority, else zero.
 * Results are memoized per recurrence and index tuple for one call.
 */
export function interpret(
  rec: Recurrence,
  at: readonly number[] | Readonly<Record<string, number>>,
  vars: RuntimeVars,
  options: InterpretOptions = {}
): number {
  const memo = new Map<string, number>();
  const active = new Set<string>();

  const scalars = new Map<string, number>();
  for (const [name, value] of Object.entries(vars)) {
    if (typeof value === "number") scalars.set(name, value);
  }

  const lookupTable = (name: string): readonly number[] => {
    const value = vars[name];
    if (value === undefined || typeof value === "number") {
      throw new EvaluationError(`array variable ${name} is not bound to an array`);
    }
    return value;
  };

  const evaluate = (target: Recurrence, indices: readonly number[]): number => {
    const key = `${target.name}[${indices.join(",")}]`;
    const cached = memo.get(key);
    if (cached !== undefined) return cached;
    if (active.has(key)) {
      throw new EvaluationError(`${key} depends on itself`);
    }

    for (const v of target.runtimeVars) {
      if (!(v in vars)) throw new EvaluationError(`runtime variable ${v} of ${target.name} is not bound`);
    }

    active.add(key);
    const env = new Map(scalars);
    target.indices.forEach((idx, slot) => env.set(idx, indices[slot]));
    const frame: Frame = { rec: target, at: indices, env };

    const chosen = select(target, new Map(target.indices.map((idx, slot): [string, number] => [idx, indices[slot]])));
    const value =
      chosen.kind === "base"
        ? evalExpr(chosen.base.value, frame)
        : chosen.kind === "rule"
          ? evalExpr(chosen.rule.expr, frame)
          : 0;
    active.delete(key);
    memo.set(key, value);
    return value;
  };

  const evalExpr = (expr: Expr, frame: Frame): number => {
    switch (expr.tag) {
      case "Const":
        return typeof expr.value === "number" ? expr.value : evaluateArith(expr.value, frame.env);
      case "Var":
        return evaluateArith(expr.name, frame.env);
      case "IndexExpr":
        return evaluateArith(expr.text, frame.env);
      case "Lookup": {
        const table = lookupTable(expr.table);
        const i = evaluateIndex(expr.index, frame.env);
        const v = table[i];
        if (v === undefined) {
          throw new EvaluationError(`${expr.table}[${i}] is out of range (length ${table.length})`);
        }
        return v;
      }
      case "Call": {
        const target = expr.target === undefined ? frame.rec : options.resolve?.(expr.target);
        if (!target) {
          throw new EvaluationError(`${frame.rec.name} calls unknown recurrence ${expr.target ?? ""}`);
        }
        return evaluate(
          target,
          frame.at.map((v, slot) => v + (expr.shifts[slot] ?? 0))
        );
      }
      case "BinOp":
        return applyOp(expr.op, evalExpr(expr.left, frame), evalExpr(expr.right, frame));
      case "Term": {
        const c = evalExpr(expr.call, frame);
        return isUnitCoeff(expr.coeff) ? c : evalExpr(expr.coeff, frame) * c;
      }
      case "Sum": {
        if (expr.terms.length === 0) return 0;
        let acc = evalExpr(expr.terms[0], frame);
        for (let i = 1; i < expr.terms.length; i++) acc = acc + evalExpr(expr.terms[i], frame);
        return acc;
      }
      case "Scaled": {
        const inner = evalExpr(expr.inner, frame);
        const scale = evalExpr(expr.scale, frame);
        return expr.isDivision ? inner / scale : inner * scale;
      }
      case "BranchAverage": {
        let acc = evalExpr(expr.branches[0], frame);
        for (let i = 1; i < expr.branches.length; i++) acc = acc + evalExpr(expr.branches[i], frame);
        return acc * evalExpr(expr.scale, frame);
      }
      case "Ref":
        throw new EvaluationError(`unbound intermediate ${expr.name}`);
    }
  };

  const slots = isSlotList(at) ? at : rec.indices.map((idx) => namedIndex(rec, at, idx));
  if (slots.length !== rec.indices.length) {
    throw new EvaluationError(`${rec.name} takes ${rec.indices.length} indices, got ${slots.length}`);
  }
  return evaluate(rec, slots);
}

function isSlotList(at: readonly number[] | Readonly<Record<string, number>>): at is readonly number[] {
  return Array.isArray(at);
}

function applyOp(op: BinOpKind, l: number, r: number): number {
  switch (op) {
    case "+":
      return l + r;
    case "-":
      return l - r;
    case "*":
      return l * r;
    case "/":
      return l / r;
  }
}

function namedIndex(rec: Recurrence, at: Readonly<Record<string, number>>, idx: string): number {
  const v = at[idx];
  if (v === undefined) throw new EvaluationError(`${rec.name}: no value for index ${idx}`);
  return v;
}
