// src/core/compiler/selection.ts
// First-match selection: bases in declaration order, then rules by priority

import { ConstraintSet, type Constraint } from "../constraints";
import type { BaseCase, Recurrence, RecurrenceRule } from "../recurrence";

export type RuleGuard = {
  rule: RecurrenceRule;
  /** Rule constraints conjoined with the validity guard */
  guard: ConstraintSet;
  /** Earlier matches that may overlap this rule and must be excluded */
  exclusions: ConstraintSet[];
};

export type Selection =
  | { kind: "base"; base: BaseCase; index: number }
  | { kind: "rule"; rule: RecurrenceRule }
  | { kind: "primary" };

/** Equalities for the bound slots of a base case. */
export function baseConstraints(rec: Recurrence, base: BaseCase): ConstraintSet {
  const constraints: Constraint[] = [];
  base.at.forEach((value, slot) => {
    if (value !== null) constraints.push({ left: rec.indices[slot], op: "==", right: String(value) });
  });
  return new ConstraintSet(constraints);
}

export function ruleGuards(rec: Recurrence): RuleGuard[] {
  const earlier: ConstraintSet[] = rec.bases.map((b) => baseConstraints(rec, b));
  const guards: RuleGuard[] = [];

  for (const rule of rec.sortedRules()) {
    const guard = rule.constraints.and(rec.validityGuard);
    guards.push({
      rule,
      guard,
      exclusions: earlier.filter((e) => !guard.provablyDisjoint(e)),
    });
    earlier.push(rule.constraints);
  }
  return guards;
}

function negate(set: ConstraintSet): string {
  const text = set.render();
  return set.size === 1 ? `!${text}` : `!(${text})`;
}

/**
 * Guard that holds exactly where first-match selection would pick this rule.
 * Returns "" when the rule is unconditional.
 */
export function exclusiveGuard(g: RuleGuard): string {
  const parts = g.guard.constraints.length > 0 ? [g.guard.render()] : [];
  for (const e of g.exclusions) parts.push(negate(e));
  return parts.join(" && ");
}

export function select(rec: Recurrence, env: ReadonlyMap<string, number>): Selection {
  for (let i = 0; i < rec.bases.length; i++) {
    if (baseConstraints(rec, rec.bases[i]).holds(env)) {
      return { kind: "base", base: rec.bases[i], index: i };
    }
  }
  for (const rule of rec.sortedRules()) {
    if (rule.constraints.and(rec.validityGuard).holds(env)) {
      return { kind: "rule", rule };
    }
  }
  return { kind: "primary" };
}
