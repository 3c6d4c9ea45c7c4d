// src/core/compiler/loader.ts
// In-process loading of js-target output

import { EvaluationError } from "../errors";
import type { GeneratedUnit } from "./types";

export type LoadedModule = Readonly<Record<string, unknown>>;

export type CoeffFunction = (...args: Array<number | readonly number[]>) => number;

/**
 * Evaluate generated source and return its module object. Dependencies are
 * passed in as parameters, so the code sees them as free identifiers.
 *
 * Only generated source should be loaded: it runs in this realm.
 */
export function loadGenerated(
  source: string,
  unit: Pick<GeneratedUnit, "moduleName" | "exports" | "dependencies" | "recurrence">,
  deps: Readonly<Record<string, unknown>> = {}
): LoadedModule {
  const missing = unit.dependencies.filter((d) => !(d in deps));
  if (missing.length > 0) {
    throw new EvaluationError(`${unit.recurrence} needs ${missing.join(", ")} to load`);
  }

  const names = unit.dependencies;
  const factory = new Function(...names, `${source}\nreturn ${unit.moduleName};`);
  const result: unknown = factory(...names.map((n) => deps[n]));

  if (typeof result !== "object" || result === null) {
    throw new EvaluationError(`${unit.recurrence}: module ${unit.moduleName} did not evaluate to an object`);
  }
  const mod: Record<string, unknown> = Object.fromEntries(Object.entries(result));
  for (const name of unit.exports) {
    if (typeof mod[name] !== "function") {
      throw new EvaluationError(`${unit.recurrence}: export ${name} is missing`);
    }
  }
  return mod;
}

export function loadUnit(unit: GeneratedUnit, deps: Readonly<Record<string, unknown>> = {}): LoadedModule {
  if (unit.target !== "js") {
    throw new EvaluationError(`${unit.recurrence}: only js output can be loaded, got ${unit.target}`);
  }
  return loadGenerated(unit.code, unit, deps);
}

/** Load units in order; each sees the exports of the ones before it. */
export function loadUnits(units: readonly GeneratedUnit[]): LoadedModule {
  const scope: Record<string, unknown> = {};
  for (const unit of units) {
    Object.assign(scope, loadUnit(unit, scope));
  }
  return scope;
}

export function coeffFunction(mod: LoadedModule, name: string): CoeffFunction {
  const fn = mod[name];
  if (typeof fn !== "function") {
    throw new EvaluationError(`export ${name} is not a function`);
  }
  return (...args) => {
    const value: unknown = fn(...args);
    if (typeof value !== "number") {
      throw new EvaluationError(`${name} returned ${typeof value}, not a number`);
    }
    return value;
  };
}
