// src/catalog/definitions.ts
// JSON definition files: validation and conversion to Recurrence objects

import * as fs from "fs";
import * as path from "path";
import { DefinitionError, RecurrenceError } from "../core/errors";
import { Recurrence, type RecurrenceOptions } from "../core/recurrence";
import { USER_MODULE, type RecurrenceCatalog } from "./catalog";

export type RuleDefinition = {
  when: string;
  expr?: string;
  scale?: string;
  branches?: string[];
  name?: string;
};

export type BaseDefinition = {
  at: Record<string, number>;
  value: number | string;
};

export type RecurrenceDefinition = {
  name: string;
  indices: string[];
  runtimeVars: string[];
  module: string;
  options: RecurrenceOptions;
  validity: string[];
  bases: BaseDefinition[];
  rules: RuleDefinition[];
};

export type LoadedDefinition = {
  recurrence: Recurrence;
  module: string;
  file?: string;
};

// ─────────────────────────────────────────────────────────────────
// Field readers: each records a problem instead of throwing
// ─────────────────────────────────────────────────────────────────

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isStringList(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((v) => typeof v === "string");
}

class FieldReader {
  readonly problems: string[] = [];

  constructor(private readonly obj: Record<string, unknown>) {}

  string(field: string, required: true): string;
  string(field: string, required?: false): string | undefined;
  string(field: string, required = false): string | undefined {
    const v = this.obj[field];
    if (v === undefined) {
      if (required) this.problems.push(`${field}: required`);
      return required ? "" : undefined;
    }
    if (typeof v !== "string") {
      this.problems.push(`${field}: expected a string`);
      return required ? "" : undefined;
    }
    return v;
  }

  strings(field: string, required = false): string[] {
    const v = this.obj[field];
    if (v === undefined) {
      if (required) this.problems.push(`${field}: required`);
      return [];
    }
    if (!isStringList(v)) {
      this.problems.push(`${field}: expected a list of strings`);
      return [];
    }
    return v;
  }

  boolean(field: string): boolean | undefined {
    const v = this.obj[field];
    if (v === undefined) return undefined;
    if (typeof v !== "boolean") {
      this.problems.push(`${field}: expected true or false`);
      return undefined;
    }
    return v;
  }

  intMap(field: string): Record<string, number> | undefined {
    const v = this.obj[field];
    if (v === undefined) return undefined;
    if (!isRecord(v)) {
      this.problems.push(`${field}: expected an object of integers`);
      return undefined;
    }
    const out: Record<string, number> = {};
    for (const [k, n] of Object.entries(v)) {
      if (typeof n !== "number" || !Number.isInteger(n)) {
        this.problems.push(`${field}.${k}: expected an integer`);
      } else {
        out[k] = n;
      }
    }
    return out;
  }

  list(field: string): unknown[] {
    const v = this.obj[field];
    if (v === undefined) return [];
    if (!Array.isArray(v)) {
      this.problems.push(`${field}: expected a list`);
      return [];
    }
    return v;
  }
}

// ─────────────────────────────────────────────────────────────────
// Validation
// ─────────────────────────────────────────────────────────────────

/**
 * Check the shape of a parsed JSON object. Returns the definition and every
 * problem found; the definition is only usable when there are none.
 */
export function validateDefinition(data: unknown): { definition: RecurrenceDefinition; problems: string[] } {
  const obj = isRecord(data) ? data : {};
  const r = new FieldReader(obj);
  if (!isRecord(data)) r.problems.push("definition: expected an object");

  const name = r.string("name", true);
  const indices = r.strings("indices", true);
  if (isRecord(data) && indices.length === 0 && Array.isArray(obj.indices)) {
    r.problems.push("indices: at least one index is required");
  }

  const options: RecurrenceOptions = {
    namespace: r.string("namespace"),
    maxIndices: r.intMap("maxIndices"),
    auxIndex: r.string("auxIndex"),
    arrayVars: r.strings("arrayVars"),
    selfName: r.string("selfName"),
    layered: r.boolean("layered"),
    description: r.string("description"),
  };

  const bases: BaseDefinition[] = [];
  r.list("bases").forEach((b, i) => {
    const br = new FieldReader(isRecord(b) ? b : {});
    const at = br.intMap("at");
    const value = isRecord(b) ? b.value : undefined;
    r.problems.push(...br.problems.map((p) => `bases[${i}].${p}`));
    if (!at) {
      if (br.problems.length === 0) r.problems.push(`bases[${i}].at: required`);
    } else if (typeof value !== "number" && typeof value !== "string") {
      r.problems.push(`bases[${i}].value: expected a number or a string`);
    } else {
      bases.push({ at, value });
    }
  });

  const rules: RuleDefinition[] = [];
  r.list("rules").forEach((raw, i) => {
    if (!isRecord(raw)) {
      r.problems.push(`rules[${i}]: expected an object`);
      return;
    }
    const rr = new FieldReader(raw);
    const rule: RuleDefinition = {
      when: rr.string("when", true),
      expr: rr.string("expr"),
      scale: rr.string("scale"),
      branches: raw.branches === undefined ? undefined : rr.strings("branches"),
      name: rr.string("name"),
    };
    if ((rule.expr === undefined) === (rule.branches === undefined)) {
      rr.problems.push("give exactly one of expr and branches");
    }
    if (rule.branches !== undefined && rule.scale !== undefined) {
      rr.problems.push("scale does not apply to branches");
    }
    r.problems.push(...rr.problems.map((p) => `rules[${i}].${p}`));
    rules.push(rule);
  });

  const definition: RecurrenceDefinition = {
    name,
    indices,
    runtimeVars: r.strings("runtimeVars"),
    module: r.string("module") ?? USER_MODULE,
    options,
    validity: r.strings("validity"),
    bases,
    rules,
  };
  return { definition, problems: r.problems };
}

// ─────────────────────────────────────────────────────────────────
// Conversion
// ─────────────────────────────────────────────────────────────────

/** Collect a definition-time failure, rethrowing anything else. */
function attempt<T>(problems: string[], label: string, fn: () => T): T | undefined {
  try {
    return fn();
  } catch (e) {
    if (!(e instanceof RecurrenceError)) throw e;
    problems.push(`${label}: ${e.message}`);
    if (e instanceof DefinitionError) {
      problems.push(...e.problems.map((p) => `${label}: ${p}`));
    }
    return undefined;
  }
}

export function definitionFromObject(data: unknown): Recurrence {
  return loadDefinition(data).recurrence;
}

function loadDefinition(data: unknown, file?: string): LoadedDefinition {
  const where = file ? `${file}: ` : "";
  const { definition: def, problems } = validateDefinition(data);
  if (problems.length > 0) {
    throw new DefinitionError(`${where}invalid definition ${def.name || "<unnamed>"}`, "E0102", problems);
  }

  const built = attempt(problems, "definition", () => new Recurrence(def.name, def.indices, def.runtimeVars, def.options));
  if (!built) {
    throw new DefinitionError(`${where}invalid definition ${def.name}`, "E0102", problems);
  }

  attempt(problems, "validity", () => built.validity(...def.validity));
  def.bases.forEach((b, i) => attempt(problems, `bases[${i}]`, () => built.base(b.at, b.value)));
  def.rules.forEach((rule, i) =>
    attempt(problems, `rules[${i}]`, () => {
      if (rule.branches !== undefined) {
        built.branchAverage(rule.when, rule.branches, { name: rule.name });
      } else {
        built.rule(rule.when, rule.expr ?? "", { scale: rule.scale, name: rule.name });
      }
    })
  );

  if (problems.length > 0) {
    throw new DefinitionError(`${where}invalid definition ${def.name}`, "E0102", problems);
  }
  return { recurrence: built, module: def.module, file };
}

export function loadDefinitionFile(filePath: string): LoadedDefinition {
  const content = fs.readFileSync(filePath, "utf8");
  let data: unknown;
  try {
    data = JSON.parse(content);
  } catch (e) {
    const detail = e instanceof Error ? e.message : String(e);
    throw new DefinitionError(`${filePath}: not valid JSON`, "E0102", [detail]);
  }
  return loadDefinition(data, filePath);
}

/**
 * Register every `*.json` file in `dir`, in name order. Problems across all
 * files are reported together.
 */
export function loadDefinitionsDir(dir: string, catalog: RecurrenceCatalog): LoadedDefinition[] {
  const files = fs
    .readdirSync(dir)
    .filter((f) => f.endsWith(".json"))
    .sort();

  const loaded: LoadedDefinition[] = [];
  const problems: string[] = [];
  let failed = 0;
  for (const f of files) {
    const full = path.join(dir, f);
    const ok = attempt(problems, f, () => {
      const def = loadDefinitionFile(full);
      catalog.register(def.recurrence, def.module);
      loaded.push(def);
      return true;
    });
    if (!ok) failed++;
  }

  if (failed > 0) {
    throw new DefinitionError(`${dir}: ${failed} definition file(s) failed to load`, "E0102", problems);
  }
  return loaded;
}
