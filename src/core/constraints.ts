// src/core/constraints.ts
// Guard conditions: comparisons combined by AND

import { evaluateArith, isIdentifier, mentions } from "./arith";
import { ConstraintSyntaxError } from "./errors";

export type CompareOp = "==" | "!=" | "<" | "<=" | ">" | ">=";

export type Constraint = {
  left: string;
  op: CompareOp;
  right: string;
};

/** Multi-character operators must be tried first so `>=` never splits as `>`. */
const OPERATOR_ORDER: readonly CompareOp[] = ["==", "!=", ">=", "<=", ">", "<"];

export function parseConstraint(text: string): Constraint {
  for (const op of OPERATOR_ORDER) {
    const at = text.indexOf(op);
    if (at < 0) continue;
    const left = text.slice(0, at).trim();
    const right = text.slice(at + op.length).trim();
    if (!left || !right) break;
    return { left, op, right };
  }
  throw new ConstraintSyntaxError(text);
}

export function renderConstraint(c: Constraint): string {
  return `(${c.left} ${c.op} ${c.right})`;
}

export function compare(lhs: number, op: CompareOp, rhs: number): boolean {
  switch (op) {
    case "==":
      return lhs === rhs;
    case "!=":
      return lhs !== rhs;
    case "<":
      return lhs < rhs;
    case "<=":
      return lhs <= rhs;
    case ">":
      return lhs > rhs;
    case ">=":
      return lhs >= rhs;
  }
}

const FLIPPED: Record<CompareOp, CompareOp> = {
  "==": "==",
  "!=": "!=",
  "<": ">",
  "<=": ">=",
  ">": "<",
  ">=": "<=",
};

/**
 * View a constraint as `name op value` when one side is a bare identifier and
 * the other an integer literal.
 */
export function asBound(c: Constraint): { name: string; op: CompareOp; value: number } | undefined {
  if (isIdentifier(c.left) && /^-?\d+$/.test(c.right)) {
    return { name: c.left, op: c.op, value: Number(c.right) };
  }
  if (isIdentifier(c.right) && /^-?\d+$/.test(c.left)) {
    return { name: c.right, op: FLIPPED[c.op], value: Number(c.left) };
  }
  return undefined;
}

// ─────────────────────────────────────────────────────────────────
// ConstraintSet
// ─────────────────────────────────────────────────────────────────

export class ConstraintSet {
  readonly constraints: readonly Constraint[];

  constructor(constraints: readonly Constraint[] = []) {
    this.constraints = [...constraints];
  }

  /**
   * Parse one or more strings; each may hold several comparisons joined by `&&`.
   */
  static parse(...texts: string[]): ConstraintSet {
    const parsed: Constraint[] = [];
    for (const text of texts) {
      for (const part of text.split("&&")) {
        if (part.trim()) parsed.push(parseConstraint(part));
      }
    }
    return new ConstraintSet(parsed);
  }

  get size(): number {
    return this.constraints.length;
  }

  get equalityCount(): number {
    return this.constraints.filter((c) => c.op === "==").length;
  }

  and(other: ConstraintSet): ConstraintSet {
    return new ConstraintSet([...this.constraints, ...other.constraints]);
  }

  filter(pred: (c: Constraint) => boolean): ConstraintSet {
    return new ConstraintSet(this.constraints.filter(pred));
  }

  mentions(name: string): boolean {
    return this.constraints.some((c) => mentions(c.left, name) || mentions(c.right, name));
  }

  render(): string {
    if (this.constraints.length === 0) return "true";
    return this.constraints.map(renderConstraint).join(" && ");
  }

  /** Order-independent identity, used to group rules. */
  key(): string {
    return this.constraints.map(renderConstraint).sort().join(" && ");
  }

  holds(env: ReadonlyMap<string, number>): boolean {
    return this.constraints.every((c) => compare(evaluateArith(c.left, env), c.op, evaluateArith(c.right, env)));
  }

  /**
   * True when the integer bounds in this set already contradict each other.
   * Only `name op integer` comparisons are considered, so `false` means
   * "not proven", not "satisfiable".
   */
  unsatisfiable(): boolean {
    const ranges = new Map<string, { lo: number; hi: number; excluded: Set<number> }>();

    for (const c of this.constraints) {
      const b = asBound(c);
      if (!b) continue;
      let r = ranges.get(b.name);
      if (!r) {
        r = { lo: -Infinity, hi: Infinity, excluded: new Set() };
        ranges.set(b.name, r);
      }
      switch (b.op) {
        case "==":
          r.lo = Math.max(r.lo, b.value);
          r.hi = Math.min(r.hi, b.value);
          break;
        case "!=":
          r.excluded.add(b.value);
          break;
        case "<":
          r.hi = Math.min(r.hi, b.value - 1);
          break;
        case "<=":
          r.hi = Math.min(r.hi, b.value);
          break;
        case ">":
          r.lo = Math.max(r.lo, b.value + 1);
          break;
        case ">=":
          r.lo = Math.max(r.lo, b.value);
          break;
      }
    }

    for (const r of ranges.values()) {
      if (r.lo > r.hi) return true;
      if (r.lo === r.hi && r.excluded.has(r.lo)) return true;
    }
    return false;
  }

  provablyDisjoint(other: ConstraintSet): boolean {
    return this.and(other).unsatisfiable();
  }
}
