// src/orchestrator/generate.ts
// Batch generation over a catalog and incremental writes to disk

import * as fs from "fs";
import * as path from "path";
import { performance } from "node:perf_hooks";
import type { RecurrenceCatalog } from "../catalog/catalog";
import { loadDefinitionsDir } from "../catalog/definitions";
import { createBuiltinCatalog } from "../catalog/builtin";
import { digestFiles } from "../core/artifacts/hash";
import { DefinitionError } from "../core/errors";
import type { RecurforgeConfig } from "../core/config/config";
import { generateDispatcher, unitFileName } from "../core/compiler/dispatcher";
import { generateLayered } from "../core/compiler/layered";
import { generatePerValue } from "../core/compiler/perValue";
import { createDialect } from "../core/compiler/render";
import type { CodegenConfig, GeneratedUnit, GenerationRecord } from "../core/compiler/types";
import type { Recurrence } from "../core/recurrence";
import type { Diagnostic } from "../outcome/diagnostic";

export type Artifact = {
  /** File name relative to the output directory */
  file: string;
  unit: GeneratedUnit;
  record: GenerationRecord;
};

export type GenerateAllOptions = {
  /** Only these recurrences (and what they call) */
  names?: readonly string[];
};

export type WriteResult = {
  written: string[];
  unchanged: string[];
  manifest?: string;
};

export const MANIFEST_FILE = "manifest.json";

// ─────────────────────────────────────────────────────────────────
// Catalog assembly
// ─────────────────────────────────────────────────────────────────

/** Builtins plus the definitions directory, when one is configured. */
export function buildCatalog(config: RecurforgeConfig): RecurrenceCatalog {
  const catalog = createBuiltinCatalog();
  if (config.output.definitionsDir) {
    loadDefinitionsDir(config.output.definitionsDir, catalog);
  }
  const check = catalog.validate();
  if (!check.valid) {
    throw new DefinitionError("catalog has unresolved cross references", "E0103", check.errors);
  }
  return catalog;
}

// ─────────────────────────────────────────────────────────────────
// Generation
// ─────────────────────────────────────────────────────────────────

function timed(rec: Recurrence, file: string, run: () => GeneratedUnit): Artifact {
  const start = performance.now();
  const unit = run();
  const record: GenerationRecord = {
    recurrence: rec.name,
    kind: unit.kind,
    durationMs: performance.now() - start,
    bytes: Buffer.byteLength(unit.code, "utf8"),
    metrics: { rules: rec.rules.length, bases: rec.bases.length, lines: unit.code.split("\n").length - 1 },
  };
  return { file, unit, record };
}

/**
 * Generate every unit for the catalog, dependencies first: a per-value file
 * and a dispatcher for each recurrence, plus a layered file when flagged.
 */
export function generateAll(
  catalog: RecurrenceCatalog,
  codegen: CodegenConfig,
  options: GenerateAllOptions = {}
): Artifact[] {
  const ext = createDialect(codegen.target, codegen.vecType).extension;
  const gen = { ...codegen, resolve: catalog.resolve };

  let recs = catalog.ordered();
  if (options.names) {
    const wanted = new Set<string>();
    for (const name of options.names) {
      const rec = catalog.require(name);
      wanted.add(rec.name);
      for (const dep of catalog.dependenciesOf(rec)) wanted.add(dep.name);
    }
    recs = recs.filter((r) => wanted.has(r.name));
  }

  const artifacts: Artifact[] = [];
  for (const rec of recs) {
    artifacts.push(timed(rec, unitFileName(rec, "per-value", ext), () => generatePerValue(rec, gen)));
    if (rec.layered) {
      artifacts.push(timed(rec, unitFileName(rec, "layered", ext), () => generateLayered(rec, gen)));
    }
    artifacts.push(timed(rec, unitFileName(rec, "dispatcher", ext), () => generateDispatcher(rec, gen)));
  }
  return artifacts;
}

/** Diagnostics across artifacts, each reported once. */
export function collectDiagnostics(artifacts: readonly Artifact[]): Diagnostic[] {
  const seen = new Set<string>();
  const out: Diagnostic[] = [];
  for (const a of artifacts) {
    for (const d of a.unit.diagnostics) {
      const key = `${d.code}|${d.message}|${JSON.stringify(d.data ?? {})}`;
      if (seen.has(key)) continue;
      seen.add(key);
      out.push(d);
    }
  }
  return out;
}

// ─────────────────────────────────────────────────────────────────
// Output
// ─────────────────────────────────────────────────────────────────

function writeIfChanged(file: string, content: string): boolean {
  if (fs.existsSync(file) && fs.readFileSync(file, "utf8") === content) {
    return false;
  }
  fs.writeFileSync(file, content, "utf8");
  return true;
}

/**
 * Write artifacts under `dir`, leaving files whose content is unchanged
 * untouched so downstream builds do not recompile them.
 */
export function writeArtifacts(
  dir: string,
  artifacts: readonly Artifact[],
  options: { writeManifest?: boolean } = {}
): WriteResult {
  fs.mkdirSync(dir, { recursive: true });
  const result: WriteResult = { written: [], unchanged: [] };

  const files = new Map<string, string>();
  for (const a of artifacts) {
    files.set(a.file, a.unit.code);
    if (writeIfChanged(path.join(dir, a.file), a.unit.code)) {
      result.written.push(a.file);
    } else {
      result.unchanged.push(a.file);
    }
  }

  if (options.writeManifest ?? true) {
    const manifest = JSON.stringify({ generator: "recurforge", files: digestFiles(files) }, null, 2) + "\n";
    const manifestPath = path.join(dir, MANIFEST_FILE);
    writeIfChanged(manifestPath, manifest);
    result.manifest = manifestPath;
  }

  return result;
}
