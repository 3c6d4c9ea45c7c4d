// src/core/recurrence.ts
// Recurrence definition: the fluent builder every generator consumes

import { constant, collectCalls, type Expr } from "./ast";
import { identifiersIn, isIdentifier } from "./arith";
import { ConstraintSet } from "./constraints";
import { parseRule, parseRuleBody, parseValue, type ParseContext } from "./dsl/parser";
import { DefinitionError, DslSyntaxError } from "./errors";
import type { Diagnostic } from "../outcome/diagnostic";

export const DEFAULT_MAX_INDEX = 20;
export const DEFAULT_SELF_NAME = "E";

/**
 * Base case. `at` is slot-aligned with the index list; `null` leaves the index
 * free (e.g. `t=u=v=0` with `N` free for a tabulated base).
 */
export type BaseCase = {
  readonly at: ReadonlyArray<number | null>;
  readonly value: Expr;
};

export type RecurrenceRule = {
  readonly constraints: ConstraintSet;
  readonly expr: Expr;
  readonly name?: string;
  /** Declaration position; final tie-break of the priority order. */
  readonly index: number;
};

export type RecurrenceOptions = {
  namespace?: string;
  maxIndices?: Record<string, number>;
  /** Index that ranges inside a layer; required by the layered generator. */
  auxIndex?: string;
  /** Runtime variables that are tabulated arrays, read as `Name[expr]`. */
  arrayVars?: string[];
  /** Accessor name used for self calls in rule text. */
  selfName?: string;
  /** Ask the orchestrator for layered output too. */
  layered?: boolean;
  description?: string;
};

export type RuleOptions = {
  scale?: string;
  name?: string;
};

/** Lower sorts first: more equalities, then more constraints. */
export function priorityKey(rule: Pick<RecurrenceRule, "constraints">): [number, number] {
  return [-rule.constraints.equalityCount, -rule.constraints.size];
}

/** Deterministic priority order, independent of the input order. */
export function sortRules<R extends RecurrenceRule>(rules: readonly R[]): R[] {
  return [...rules].sort((a, b) => {
    const [ea, ca] = priorityKey(a);
    const [eb, cb] = priorityKey(b);
    if (ea !== eb) return ea - eb;
    if (ca !== cb) return ca - cb;
    return a.index - b.index;
  });
}

export class Recurrence {
  readonly name: string;
  readonly indices: readonly string[];
  readonly runtimeVars: readonly string[];
  readonly arrayVars: readonly string[];
  readonly namespace: string;
  readonly maxIndices: Readonly<Record<string, number>>;
  readonly auxIndex: string | undefined;
  readonly selfName: string;
  readonly layered: boolean;
  readonly description: string;

  private validityConstraints = new ConstraintSet();
  private readonly baseCases: BaseCase[] = [];
  private readonly ruleList: RecurrenceRule[] = [];
  private readonly parseDiagnostics: Diagnostic[] = [];

  constructor(name: string, indices: string[], runtimeVars: string[] = [], options: RecurrenceOptions = {}) {
    if (!isIdentifier(name)) {
      throw new DefinitionError(`Invalid recurrence name: ${JSON.stringify(name)}`);
    }
    if (indices.length === 0) {
      throw new DefinitionError(`${name}: at least one index is required`);
    }
    const seen = new Set<string>();
    for (const id of [...indices, ...runtimeVars]) {
      if (!isIdentifier(id)) {
        throw new DefinitionError(`${name}: invalid identifier ${JSON.stringify(id)}`);
      }
      if (seen.has(id)) {
        throw new DefinitionError(`${name}: ${id} is declared twice`);
      }
      seen.add(id);
    }

    const arrayVars = options.arrayVars ?? [];
    for (const a of arrayVars) {
      if (!runtimeVars.includes(a)) {
        throw new DefinitionError(`${name}: array variable ${a} is not a runtime variable`);
      }
    }

    if (options.auxIndex !== undefined && !indices.includes(options.auxIndex)) {
      throw new DefinitionError(`${name}: auxiliary index ${options.auxIndex} is not declared`, "E0100");
    }

    const maxIndices: Record<string, number> = {};
    for (const idx of indices) {
      maxIndices[idx] = DEFAULT_MAX_INDEX;
    }
    for (const [idx, max] of Object.entries(options.maxIndices ?? {})) {
      if (!indices.includes(idx)) {
        throw new DefinitionError(`${name}: maxIndices names unknown index ${idx}`, "E0100");
      }
      if (!Number.isInteger(max) || max < 0) {
        throw new DefinitionError(`${name}: maxIndices.${idx} must be a non-negative integer`);
      }
      maxIndices[idx] = max;
    }

    this.name = name;
    this.indices = [...indices];
    this.runtimeVars = [...runtimeVars];
    this.arrayVars = [...arrayVars];
    this.namespace = options.namespace ?? "";
    this.maxIndices = maxIndices;
    this.auxIndex = options.auxIndex;
    this.selfName = options.selfName ?? DEFAULT_SELF_NAME;
    this.layered = options.layered ?? false;
    this.description = options.description ?? "";
  }

  // ─────────────────────────────────────────────────────────────────
  // Fluent definition
  // ─────────────────────────────────────────────────────────────────

  /** Global domain restriction, conjoined into every generated guard. */
  validity(...constraints: string[]): this {
    const parsed = ConstraintSet.parse(...constraints);
    this.checkConstraintNames(parsed);
    this.validityConstraints = this.validityConstraints.and(parsed);
    return this;
  }

  base(at: Record<string, number>, value: number | string): this {
    const slots: Array<number | null> = this.indices.map(() => null);
    for (const [idx, v] of Object.entries(at)) {
      const slot = this.indices.indexOf(idx);
      if (slot < 0) {
        throw new DefinitionError(`${this.name}: base case names unknown index ${idx}`, "E0100");
      }
      if (!Number.isInteger(v)) {
        throw new DefinitionError(`${this.name}: base case value for ${idx} must be an integer`);
      }
      slots[slot] = v;
    }
    if (slots.every((s) => s === null)) {
      throw new DefinitionError(`${this.name}: base case binds no index`);
    }

    const parsed = this.withLocation(undefined, () => parseValue(value, this.parseContext()));
    this.parseDiagnostics.push(...parsed.diagnostics);
    this.baseCases.push({ at: slots, value: parsed.expr });
    return this;
  }

  rule(constraints: string, expr: string, options: RuleOptions = {}): this {
    const index = this.ruleList.length;
    const guard = ConstraintSet.parse(constraints);
    this.checkConstraintNames(guard);

    const parsed = this.withLocation(index, () => parseRule(expr, options.scale, this.parseContext(index)));
    this.parseDiagnostics.push(...parsed.diagnostics);
    this.ruleList.push({ constraints: guard, expr: parsed.expr, name: options.name, index });
    return this;
  }

  /**
   * One rule whose body averages several alternative reduction paths:
   * `(b1 + ... + bN) * (1/N)`.
   */
  branchAverage(constraints: string, branches: string[], options: Omit<RuleOptions, "scale"> = {}): this {
    if (branches.length === 0) {
      throw new DefinitionError(`${this.name}: branchAverage needs at least one branch`);
    }
    const index = this.ruleList.length;
    const guard = ConstraintSet.parse(constraints);
    this.checkConstraintNames(guard);

    const parsedBranches: Expr[] = [];
    for (const branch of branches) {
      const parsed = this.withLocation(index, () => parseRuleBody(branch, this.parseContext(index)));
      this.parseDiagnostics.push(...parsed.diagnostics);
      parsedBranches.push(parsed.expr);
    }

    this.ruleList.push({
      constraints: guard,
      expr: { tag: "BranchAverage", branches: parsedBranches, scale: constant(1 / branches.length) },
      name: options.name,
      index,
    });
    return this;
  }

  // ─────────────────────────────────────────────────────────────────
  // Accessors
  // ─────────────────────────────────────────────────────────────────

  get validityGuard(): ConstraintSet {
    return this.validityConstraints;
  }

  get bases(): readonly BaseCase[] {
    return this.baseCases;
  }

  get rules(): readonly RecurrenceRule[] {
    return this.ruleList;
  }

  /** Warnings collected while parsing rule and base text. */
  get diagnostics(): readonly Diagnostic[] {
    return this.parseDiagnostics;
  }

  sortedRules(): RecurrenceRule[] {
    return sortRules(this.ruleList);
  }

  slotOf(index: string): number {
    const slot = this.indices.indexOf(index);
    if (slot < 0) {
      throw new DefinitionError(`${this.name}: unknown index ${index}`, "E0100");
    }
    return slot;
  }

  /** Recurrences referenced by cross calls, in first-use order. */
  dependencies(): string[] {
    const deps = new Set<string>();
    for (const r of this.ruleList) {
      for (const c of collectCalls(r.expr)) {
        if (c.target !== undefined && c.target !== this.name) deps.add(c.target);
      }
    }
    return Array.from(deps);
  }

  parseContext(ruleIndex?: number): ParseContext {
    return {
      name: this.name,
      indices: this.indices,
      runtimeVars: this.runtimeVars,
      arrayVars: this.arrayVars,
      selfName: this.selfName,
      ruleIndex,
    };
  }

  private withLocation<T>(ruleIndex: number | undefined, fn: () => T): T {
    try {
      return fn();
    } catch (e) {
      if (e instanceof DslSyntaxError && e.recurrence === undefined) {
        throw e.at(this.name, ruleIndex);
      }
      throw e;
    }
  }

  private checkConstraintNames(set: ConstraintSet): void {
    for (const c of set.constraints) {
      for (const id of [...identifiersIn(c.left), ...identifiersIn(c.right)]) {
        if (!this.indices.includes(id)) {
          throw new DefinitionError(`${this.name}: constraint mentions unknown index ${id}`, "E0100");
        }
      }
    }
  }
}
