// src/core/config/config.ts
// Configuration for code generation and the output directory layout

import * as fs from "fs";
import * as path from "path";
import { makeDiagnostic } from "../../outcome/codes";
import {
  DEFAULT_CODEGEN_CONFIG,
  type CodegenConfig,
  type OptimizationLevel,
  type Target,
} from "../compiler/types";

// =========================================================================
// Configuration Types
// =========================================================================

export type OutputConfig = {
  /** Directory generated files are written to */
  outputDir: string;
  /** Directory of JSON definition files loaded next to the builtin catalog */
  definitionsDir?: string;
  /** Quiet period before `watch` regenerates */
  watchDebounceMs: number;
  /** Write manifest.json with a digest per file */
  writeManifest: boolean;
};

export type RecurforgeConfig = {
  codegen: CodegenConfig;
  output: OutputConfig;
};

/** What a single source (env, file, overrides) contributes. */
export type PartialConfig = {
  codegen?: Partial<CodegenConfig>;
  output?: Partial<OutputConfig>;
};

// =========================================================================
// Default Configuration
// =========================================================================

export const DEFAULT_OUTPUT_CONFIG: OutputConfig = {
  outputDir: "generated",
  watchDebounceMs: 2000,
  writeManifest: true,
};

export const DEFAULT_CONFIG: RecurforgeConfig = {
  codegen: DEFAULT_CODEGEN_CONFIG,
  output: DEFAULT_OUTPUT_CONFIG,
};

export const DEFAULT_CONFIG_FILES = ["recurforge.config.json", "recurforge.config.yaml", "recurforge.config.yml"];

const TARGETS: readonly Target[] = ["cpp", "js"];
const OPTIMIZATIONS: readonly OptimizationLevel[] = ["none", "cse"];

// =========================================================================
// Narrowing
// =========================================================================

function unknownValue(warnings: string[] | undefined, field: string, value: unknown): undefined {
  warnings?.push(makeDiagnostic("W0301", { field, value: String(value) }).message);
  return undefined;
}

function pickOne<T extends string>(
  allowed: readonly T[],
  value: unknown,
  field: string,
  warnings?: string[]
): T | undefined {
  if (value === undefined || value === null || value === "") return undefined;
  const hit = allowed.find((a) => a === value);
  return hit ?? unknownValue(warnings, field, value);
}

function pickInt(value: unknown, field: string, warnings?: string[]): number | undefined {
  if (value === undefined || value === null || value === "") return undefined;
  const n = typeof value === "number" ? value : typeof value === "string" ? Number(value) : NaN;
  return Number.isInteger(n) ? n : unknownValue(warnings, field, value);
}

function pickString(value: unknown, field: string, warnings?: string[]): string | undefined {
  if (value === undefined || value === null || value === "") return undefined;
  return typeof value === "string" ? value : unknownValue(warnings, field, value);
}

function pickBool(value: unknown, field: string, warnings?: string[]): boolean | undefined {
  if (value === undefined || value === null || value === "") return undefined;
  if (typeof value === "boolean") return value;
  if (value === "true" || value === "1") return true;
  if (value === "false" || value === "0") return false;
  return unknownValue(warnings, field, value);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Drop undefined entries so spreading never erases a lower-priority value. */
function defined<T extends object>(obj: T): Partial<T> {
  const out: Partial<T> = {};
  for (const key of Object.keys(obj)) {
    if (!isKeyOf(obj, key)) continue;
    if (obj[key] !== undefined) out[key] = obj[key];
  }
  return out;
}

function isKeyOf<T extends object>(obj: T, key: PropertyKey): key is keyof T {
  return key in obj;
}

// =========================================================================
// Configuration Loading
// =========================================================================

/**
 * Read `RECURFORGE_*` variables. Unset variables contribute nothing.
 */
export function configFromEnv(prefix = "RECURFORGE", env: NodeJS.ProcessEnv = process.env, warnings?: string[]): PartialConfig {
  const read = (name: string) => env[`${prefix}_${name}`];
  return {
    codegen: defined({
      target: pickOne(TARGETS, read("TARGET"), "codegen.target", warnings),
      vecType: pickString(read("VEC_TYPE"), "codegen.vecType", warnings),
      vecInclude: pickString(read("VEC_INCLUDE"), "codegen.vecInclude", warnings),
      optimization: pickOne(OPTIMIZATIONS, read("OPTIMIZATION"), "codegen.optimization", warnings),
      cseThreshold: pickInt(read("CSE_THRESHOLD"), "codegen.cseThreshold", warnings),
      tablePadding: pickInt(read("TABLE_PADDING"), "codegen.tablePadding", warnings),
    }),
    output: defined({
      outputDir: pickString(read("OUTPUT_DIR"), "output.outputDir", warnings),
      definitionsDir: pickString(read("DEFINITIONS_DIR"), "output.definitionsDir", warnings),
      watchDebounceMs: pickInt(read("WATCH_DEBOUNCE_MS"), "output.watchDebounceMs", warnings),
      writeManifest: pickBool(read("WRITE_MANIFEST"), "output.writeManifest", warnings),
    }),
  };
}

/**
 * Load configuration from a JSON or YAML file.
 */
export function configFromFile(filePath: string, warnings?: string[]): PartialConfig {
  if (!fs.existsSync(filePath)) {
    throw new Error(`Config file not found: ${filePath}`);
  }

  const content = fs.readFileSync(filePath, "utf8");
  const ext = path.extname(filePath).toLowerCase();

  let data: unknown;
  if (ext === ".json") {
    data = JSON.parse(content);
  } else if (ext === ".yaml" || ext === ".yml") {
    data = parseSimpleYaml(content);
  } else {
    throw new Error(`Unsupported config file format: ${ext}`);
  }

  if (!isRecord(data)) {
    throw new Error(`Config file must hold an object: ${filePath}`);
  }
  return configFromObject(data, warnings);
}

/**
 * Create configuration from a plain object. Keys may be camelCase or
 * snake_case.
 */
export function configFromObject(data: Record<string, unknown>, warnings?: string[]): PartialConfig {
  const codegen = isRecord(data.codegen) ? data.codegen : {};
  const output = isRecord(data.output) ? data.output : {};
  const either = (obj: Record<string, unknown>, camel: string, snake: string) => obj[camel] ?? obj[snake];

  return {
    codegen: defined({
      target: pickOne(TARGETS, codegen.target, "codegen.target", warnings),
      vecType: pickString(either(codegen, "vecType", "vec_type"), "codegen.vecType", warnings),
      vecInclude: pickString(either(codegen, "vecInclude", "vec_include"), "codegen.vecInclude", warnings),
      optimization: pickOne(OPTIMIZATIONS, codegen.optimization, "codegen.optimization", warnings),
      cseThreshold: pickInt(either(codegen, "cseThreshold", "cse_threshold"), "codegen.cseThreshold", warnings),
      tablePadding: pickInt(either(codegen, "tablePadding", "table_padding"), "codegen.tablePadding", warnings),
    }),
    output: defined({
      outputDir: pickString(either(output, "outputDir", "output_dir"), "output.outputDir", warnings),
      definitionsDir: pickString(either(output, "definitionsDir", "definitions_dir"), "output.definitionsDir", warnings),
      watchDebounceMs: pickInt(either(output, "watchDebounceMs", "watch_debounce_ms"), "output.watchDebounceMs", warnings),
      writeManifest: pickBool(either(output, "writeManifest", "write_manifest"), "output.writeManifest", warnings),
    }),
  };
}

/**
 * Merge configs over the defaults, later ones overriding earlier ones.
 */
export function mergeConfigs(...configs: PartialConfig[]): RecurforgeConfig {
  const result: RecurforgeConfig = {
    codegen: { ...DEFAULT_CONFIG.codegen },
    output: { ...DEFAULT_CONFIG.output },
  };

  for (const cfg of configs) {
    if (cfg.codegen) {
      result.codegen = { ...result.codegen, ...defined(cfg.codegen) };
    }
    if (cfg.output) {
      result.output = { ...result.output, ...defined(cfg.output) };
    }
  }

  return result;
}

/**
 * Auto-detect and load configuration.
 * Priority: overrides > config file > environment > defaults
 */
export function loadConfig(options?: {
  configFile?: string;
  overrides?: PartialConfig;
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  warnings?: string[];
}): RecurforgeConfig {
  const warnings = options?.warnings;
  const layers: PartialConfig[] = [configFromEnv("RECURFORGE", options?.env ?? process.env, warnings)];

  if (options?.configFile) {
    layers.push(configFromFile(options.configFile, warnings));
  } else {
    const cwd = options?.cwd ?? process.cwd();
    for (const name of DEFAULT_CONFIG_FILES) {
      const p = path.join(cwd, name);
      if (fs.existsSync(p)) {
        layers.push(configFromFile(p, warnings));
        break;
      }
    }
  }

  if (options?.overrides) {
    layers.push(options.overrides);
  }

  return mergeConfigs(...layers);
}

// =========================================================================
// Simple YAML Parser (nested maps of scalars only)
// =========================================================================

export function parseSimpleYaml(content: string): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  const stack: Array<{ obj: Record<string, unknown>; indent: number }> = [{ obj: result, indent: -1 }];

  for (const rawLine of content.split("\n")) {
    const trimmed = rawLine.trim();
    if (!trimmed || trimmed.startsWith("#")) continue;

    const indent = rawLine.search(/\S/);
    let top = stack[stack.length - 1];
    while (stack.length > 1 && top.indent >= indent) {
      stack.pop();
      top = stack[stack.length - 1];
    }
    const parent = top.obj;

    const colonIdx = trimmed.indexOf(":");
    if (colonIdx < 0) continue;

    const key = trimmed.slice(0, colonIdx).trim();
    const value = trimmed.slice(colonIdx + 1).trim();

    if (value === "") {
      const nested: Record<string, unknown> = {};
      parent[key] = nested;
      stack.push({ obj: nested, indent });
    } else if (value === "true") {
      parent[key] = true;
    } else if (value === "false") {
      parent[key] = false;
    } else if (value === "null") {
      parent[key] = null;
    } else if (/^-?\d+$/.test(value)) {
      parent[key] = parseInt(value, 10);
    } else if (/^-?\d+\.\d+$/.test(value)) {
      parent[key] = parseFloat(value);
    } else if ((value.startsWith('"') && value.endsWith('"')) || (value.startsWith("'") && value.endsWith("'"))) {
      parent[key] = value.slice(1, -1);
    } else {
      parent[key] = value;
    }
  }

  return result;
}

// =========================================================================
// Config Validation
// =========================================================================

export type ConfigValidation = {
  valid: boolean;
  errors: string[];
  warnings: string[];
};

export function validateConfig(config: RecurforgeConfig): ConfigValidation {
  const errors: string[] = [];
  const warnings: string[] = [];
  const { codegen, output } = config;

  if (codegen.cseThreshold < 2) {
    errors.push("cseThreshold must be at least 2");
  }
  if (codegen.tablePadding < 0) {
    errors.push("tablePadding must not be negative");
  }
  if (!/^[A-Za-z_][\w:<>]*$/.test(codegen.vecType)) {
    errors.push(`vecType is not a C++ type name: ${codegen.vecType}`);
  }
  if (!output.outputDir.trim()) {
    errors.push("outputDir must not be empty");
  }
  if (output.watchDebounceMs < 0) {
    errors.push("watchDebounceMs must not be negative");
  } else if (output.watchDebounceMs < 50) {
    warnings.push("watchDebounceMs is very low, one save may trigger several rebuilds");
  }
  if (codegen.target === "js" && codegen.vecType !== DEFAULT_CODEGEN_CONFIG.vecType) {
    warnings.push("vecType only applies to cpp output");
  }

  return {
    valid: errors.length === 0,
    errors,
    warnings,
  };
}
