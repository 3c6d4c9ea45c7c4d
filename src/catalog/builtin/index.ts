// src/catalog/builtin/index.ts
// Builtin recurrence library

import type { Recurrence } from "../../core/recurrence";
import { RecurrenceCatalog } from "../catalog";
import { COMBINATORICS } from "./combinatorics";
import { GRADIENTS } from "./gradients";
import { MCMD } from "./mcmd";
import { ORTHOGONAL } from "./orthogonal";

export const BUILTIN_MODULES: Readonly<Record<string, ReadonlyArray<() => Recurrence>>> = {
  orthogonal: ORTHOGONAL,
  combinatorics: COMBINATORICS,
  mcmd: MCMD,
  gradients: GRADIENTS,
};

/** A fresh catalog holding every builtin; callers may register more. */
export function createBuiltinCatalog(): RecurrenceCatalog {
  const catalog = new RecurrenceCatalog();
  for (const [module, factories] of Object.entries(BUILTIN_MODULES)) {
    for (const make of factories) {
      catalog.register(make(), module);
    }
  }
  return catalog;
}

export * from "./orthogonal";
export * from "./combinatorics";
export * from "./mcmd";
export * from "./gradients";
