// src/catalog/catalog.ts
// Registry of recurrences, grouped by module, with cross-reference resolution

import { collectCalls } from "../core/ast";
import { DefinitionError } from "../core/errors";
import type { Recurrence } from "../core/recurrence";
import type { RecurrenceResolver } from "../core/compiler/types";
import { makeDiagnostic } from "../outcome/codes";

export type CatalogEntry = {
  recurrence: Recurrence;
  module: string;
};

export const USER_MODULE = "user";

/**
 * Recurrences available to the generators. Cross calls in rule text name
 * other entries, looked up through `resolve`.
 */
export class RecurrenceCatalog {
  private entries: Map<string, CatalogEntry> = new Map();
  private byModuleName: Map<string, Set<string>> = new Map();

  /**
   * Register a recurrence. Throws on duplicate names.
   */
  register(recurrence: Recurrence, module = USER_MODULE): this {
    if (this.entries.has(recurrence.name)) {
      throw new DefinitionError(makeDiagnostic("E0101", { name: recurrence.name }).message, "E0101");
    }

    this.entries.set(recurrence.name, { recurrence, module });
    let names = this.byModuleName.get(module);
    if (!names) {
      names = new Set();
      this.byModuleName.set(module, names);
    }
    names.add(recurrence.name);
    return this;
  }

  has(name: string): boolean {
    return this.entries.has(name);
  }

  get(name: string): Recurrence | undefined {
    return this.entries.get(name)?.recurrence;
  }

  /** Like `get`, but an unknown name is an error. */
  require(name: string): Recurrence {
    const rec = this.get(name);
    if (!rec) {
      throw new DefinitionError(makeDiagnostic("E0103", { name }).message, "E0103");
    }
    return rec;
  }

  moduleOf(name: string): string | undefined {
    return this.entries.get(name)?.module;
  }

  get size(): number {
    return this.entries.size;
  }

  /**
   * All recurrences in registration order.
   */
  getAll(): Recurrence[] {
    return Array.from(this.entries.values(), (e) => e.recurrence);
  }

  modules(): string[] {
    return Array.from(this.byModuleName.keys());
  }

  byModule(module: string): Recurrence[] {
    const names = this.byModuleName.get(module);
    if (!names) return [];
    return Array.from(names, (n) => this.require(n));
  }

  /**
   * Case-insensitive search over name, module and description.
   */
  search(query: string): Recurrence[] {
    const q = query.toLowerCase();
    return Array.from(this.entries.values())
      .filter(
        (e) =>
          e.recurrence.name.toLowerCase().includes(q) ||
          e.module.toLowerCase().includes(q) ||
          e.recurrence.description.toLowerCase().includes(q)
      )
      .map((e) => e.recurrence);
  }

  /** Resolver handed to generators and the interpreter. */
  readonly resolve: RecurrenceResolver = (name) => this.get(name);

  /**
   * Transitive cross-call dependencies of `rec`, dependencies first.
   */
  dependenciesOf(rec: Recurrence): Recurrence[] {
    const out: Recurrence[] = [];
    const done = new Set<string>();
    const visiting = new Set<string>([rec.name]);

    const visit = (r: Recurrence) => {
      for (const dep of r.dependencies()) {
        if (done.has(dep)) continue;
        if (visiting.has(dep)) {
          throw new DefinitionError(`${rec.name}: cyclic cross reference through ${dep}`);
        }
        const target = this.require(dep);
        visiting.add(dep);
        visit(target);
        visiting.delete(dep);
        done.add(dep);
        out.push(target);
      }
    };

    visit(rec);
    return out;
  }

  /**
   * Every recurrence, each after the ones it calls.
   */
  ordered(): Recurrence[] {
    const out: Recurrence[] = [];
    const placed = new Set<string>();
    for (const rec of this.getAll()) {
      for (const r of [...this.dependenciesOf(rec), rec]) {
        if (placed.has(r.name)) continue;
        placed.add(r.name);
        out.push(r);
      }
    }
    return out;
  }

  /**
   * Check that every cross call names a registered recurrence of the same
   * rank.
   */
  validate(): { valid: boolean; errors: string[] } {
    const errors: string[] = [];

    for (const { recurrence: rec } of this.entries.values()) {
      for (const rule of rec.rules) {
        for (const c of collectCalls(rule.expr)) {
          if (c.target === undefined) continue;
          const target = this.get(c.target);
          if (!target) {
            errors.push(`${rec.name}: rule ${rule.index} calls unknown recurrence ${c.target}`);
          } else if (target.indices.length !== rec.indices.length) {
            errors.push(
              `${rec.name}: rule ${rule.index} calls ${c.target} with ${rec.indices.length} indices, it takes ${target.indices.length}`
            );
          }
        }
      }
    }

    return { valid: errors.length === 0, errors };
  }
}
