// bin/recurforge-cli-lib.ts
// Shared CLI utilities for the recurforge command
// Exported functions for testing

import * as path from "path";
import type { RecurrenceCatalog } from "../src/catalog/catalog";
import { loadConfig, validateConfig, type PartialConfig, type RecurforgeConfig } from "../src/core/config/config";
import { generateLayered } from "../src/core/compiler/layered";
import { coeffFunction, loadUnits } from "../src/core/compiler/loader";
import { interpret, type RuntimeValue, type RuntimeVars } from "../src/core/compiler/interpret";
import { generatePerValue } from "../src/core/compiler/perValue";
import type { Target } from "../src/core/compiler/types";
import { RecurrenceError, DefinitionError } from "../src/core/errors";
import type { Expr } from "../src/core/ast";
import { printExpr, printRule } from "../src/core/dsl/printer";
import type { Recurrence } from "../src/core/recurrence";
import { buildCatalog, collectDiagnostics, generateAll, writeArtifacts } from "../src/orchestrator/generate";
import { watchDefinitions, type Watcher } from "../src/orchestrator/watch";
import { formatDiagnostic } from "../src/outcome/diagnostic";
import { VERSION } from "../src/version";

// ═══════════════════════════════════════════════════════════════════════════════
// TYPE DEFINITIONS
// ═══════════════════════════════════════════════════════════════════════════════

export type Command = "generate" | "list" | "watch" | "eval";

const COMMANDS: readonly Command[] = ["generate", "list", "watch", "eval"];

export type CliArgs = {
  command?: Command;
  help?: boolean;
  version?: boolean;
  verbose?: boolean;
  layered?: boolean;
  output?: string;
  target?: string;
  config?: string;
  definitions?: string;
  /** Arguments after the command */
  positionals: string[];
  /** Unknown flags and missing flag values */
  errors: string[];
};

export type Io = {
  out(line: string): void;
  err(line: string): void;
};

export const consoleIo: Io = {
  out: (line) => console.log(line),
  err: (line) => console.error(line),
};

// ═══════════════════════════════════════════════════════════════════════════════
// ARGUMENT PARSING
// ═══════════════════════════════════════════════════════════════════════════════

function isCommand(arg: string): arg is Command {
  return COMMANDS.some((c) => c === arg);
}

export function parseCliArgs(args: string[]): CliArgs {
  const result: CliArgs = { positionals: [], errors: [] };

  const value = (i: number, flag: string): string | undefined => {
    const v = args[i];
    if (v === undefined || v.startsWith("--")) {
      result.errors.push(`${flag} needs a value`);
      return undefined;
    }
    return v;
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    if (arg === "--help" || arg === "-h") {
      result.help = true;
    } else if (arg === "--version") {
      result.version = true;
    } else if (arg === "--verbose" || arg === "-v") {
      result.verbose = true;
    } else if (arg === "--layered") {
      result.layered = true;
    } else if (arg === "--output" || arg === "-o") {
      result.output = value(++i, arg);
    } else if (arg === "--target" || arg === "-t") {
      result.target = value(++i, arg);
    } else if (arg === "--config" || arg === "-c") {
      result.config = value(++i, arg);
    } else if (arg === "--definitions") {
      result.definitions = value(++i, arg);
    } else if (arg.startsWith("-") && !/^-\d/.test(arg)) {
      result.errors.push(`unknown option ${arg}`);
    } else if (result.command === undefined && result.positionals.length === 0) {
      if (isCommand(arg)) result.command = arg;
      else result.errors.push(`unknown command ${arg}`);
    } else {
      result.positionals.push(arg);
    }
  }

  return result;
}

// ═══════════════════════════════════════════════════════════════════════════════
// HELP TEXT
// ═══════════════════════════════════════════════════════════════════════════════

export function getHelpText(): string {
  return `
recurforge - compile linear recurrences to C++ templates or JavaScript

USAGE:
  recurforge generate [options]              Generate files for every recurrence
  recurforge list [-v]                       List known recurrences
  recurforge watch [options]                 Regenerate when definition files change
  recurforge eval <Name> <i,j,..> [var=value...] [--layered]
                                             Evaluate one coefficient

OPTIONS:
  -h, --help                         Show this help message
  --version                          Show version information
  -o, --output <dir>                 Output directory (default: generated)
  -t, --target <cpp|js>              Output language (default: cpp)
  -c, --config <file>                Config file (.json, .yaml, .yml)
  --definitions <dir>                Directory of JSON recurrence definitions
  --layered                          eval: use the layered generator
  -v, --verbose                      Show per-file timings and details

ENVIRONMENT:
  RECURFORGE_TARGET, RECURFORGE_VEC_TYPE, RECURFORGE_OPTIMIZATION,
  RECURFORGE_CSE_THRESHOLD, RECURFORGE_TABLE_PADDING, RECURFORGE_OUTPUT_DIR,
  RECURFORGE_DEFINITIONS_DIR, RECURFORGE_WATCH_DEBOUNCE_MS

EXAMPLES:
  recurforge generate --target js -o out
  recurforge eval Fibonacci 5 x=2
  recurforge eval CoulombR 1,0,0,0 PCx=0.5 PCy=0 PCz=0 Boys=1,0.5,0.25,0.125 --layered
`.trim();
}

// ═══════════════════════════════════════════════════════════════════════════════
// VERSION
// ═══════════════════════════════════════════════════════════════════════════════

export function getVersion(): string {
  return `recurforge v${VERSION}`;
}

// ═══════════════════════════════════════════════════════════════════════════════
// CONFIGURATION BUILDING
// ═══════════════════════════════════════════════════════════════════════════════

function parseTarget(text: string): Target {
  if (text === "cpp" || text === "js") return text;
  throw new DefinitionError(`--target must be cpp or js, got ${text}`);
}

/** Flags override the config file, which overrides the environment. */
export function buildConfig(
  args: CliArgs,
  options: { cwd?: string; env?: NodeJS.ProcessEnv } = {}
): { config: RecurforgeConfig; warnings: string[] } {
  const warnings: string[] = [];
  const overrides: PartialConfig = {
    codegen: args.target === undefined ? {} : { target: parseTarget(args.target) },
    output: {
      ...(args.output === undefined ? {} : { outputDir: args.output }),
      ...(args.definitions === undefined ? {} : { definitionsDir: args.definitions }),
    },
  };

  const config = loadConfig({
    configFile: args.config,
    overrides,
    cwd: options.cwd,
    env: options.env,
    warnings,
  });

  const check = validateConfig(config);
  if (!check.valid) {
    throw new DefinitionError("invalid configuration", "E0102", check.errors);
  }
  warnings.push(...check.warnings);
  return { config, warnings };
}

// ═══════════════════════════════════════════════════════════════════════════════
// EVAL ARGUMENTS
// ═══════════════════════════════════════════════════════════════════════════════

export function parseIndexList(text: string): number[] {
  const parts = text.split(",").map((p) => p.trim());
  return parts.map((p) => {
    if (!/^-?\d+$/.test(p)) throw new DefinitionError(`index list must be integers, got ${JSON.stringify(text)}`);
    return Number(p);
  });
}

/** `x=0.5` binds a scalar, `Boys=1,0.5,0.25` an array. */
export function parseAssignments(items: readonly string[]): Record<string, RuntimeValue> {
  const out: Record<string, RuntimeValue> = {};
  for (const item of items) {
    const eq = item.indexOf("=");
    if (eq <= 0) throw new DefinitionError(`expected name=value, got ${JSON.stringify(item)}`);
    const name = item.slice(0, eq).trim();
    const raw = item.slice(eq + 1).trim();
    const numbers = raw.split(",").map((p) => Number(p.trim()));
    if (raw === "" || numbers.some((n) => Number.isNaN(n))) {
      throw new DefinitionError(`${name}: not a number or list of numbers: ${JSON.stringify(raw)}`);
    }
    out[name] = raw.includes(",") ? numbers : numbers[0];
  }
  return out;
}

// ═══════════════════════════════════════════════════════════════════════════════
// COMMANDS
// ═══════════════════════════════════════════════════════════════════════════════

export function runGenerate(config: RecurforgeConfig, io: Io, verbose = false): number {
  const catalog = buildCatalog(config);
  const artifacts = generateAll(catalog, config.codegen);

  for (const d of collectDiagnostics(artifacts)) {
    io.err(formatDiagnostic(d));
  }

  const result = writeArtifacts(config.output.outputDir, artifacts, { writeManifest: config.output.writeManifest });
  if (verbose) {
    for (const a of artifacts) {
      const r = a.record;
      const strategies = a.unit.strategies.length > 0 ? `, strategies=${a.unit.strategies.join(",")}` : "";
      io.out(`  ${a.file}  ${r.durationMs.toFixed(1)}ms  ${r.bytes} bytes${strategies}`);
    }
  }
  io.out(
    `Wrote ${result.written.length} file(s), ${result.unchanged.length} unchanged, to ${path.resolve(config.output.outputDir)}`
  );
  return 0;
}

export function runList(catalog: RecurrenceCatalog, io: Io, verbose = false): number {
  for (const module of catalog.modules()) {
    io.out(`${module}:`);
    for (const rec of catalog.byModule(module)) {
      const sig = `${rec.name}[${rec.indices.join(", ")}](${rec.runtimeVars.join(", ")})`;
      io.out(`  ${sig}${rec.layered ? "  [layered]" : ""}`);
      if (verbose) {
        if (rec.description) io.out(`      ${rec.description}`);
        const max = rec.indices.map((i) => `${i}<=${rec.maxIndices[i]}`).join(", ");
        io.out(`      bases=${rec.bases.length} rules=${rec.rules.length} max: ${max}`);
        for (const rule of rec.sortedRules()) {
          io.out(`      ${rule.constraints.render()}: ${describeRule(rec, rule.expr)}`);
        }
      }
    }
  }
  return 0;
}

export function describeRule(rec: Recurrence, expr: Expr): string {
  if (expr.tag === "BranchAverage") {
    return `average of ${expr.branches.map((b) => printExpr(b, rec)).join(" | ")}`;
  }
  const printed = printRule(expr, rec);
  return printed.scale === undefined ? printed.body : `(${printed.body}) * ${printed.scale}`;
}

/**
 * Evaluate `name` at `at` by loading generated js, with the reference
 * interpreter alongside when verbose.
 */
export function evaluate(
  catalog: RecurrenceCatalog,
  name: string,
  at: readonly number[],
  vars: RuntimeVars,
  options: { layered?: boolean } = {}
): number {
  const rec = catalog.require(name);
  if (at.length !== rec.indices.length) {
    throw new DefinitionError(`${rec.name} takes ${rec.indices.length} indices, got ${at.length}`);
  }
  const missing = rec.runtimeVars.filter((v) => !(v in vars));
  if (missing.length > 0) {
    throw new DefinitionError(`${rec.name}: missing values for ${missing.join(", ")}`);
  }

  const chain: Recurrence[] = [...catalog.dependenciesOf(rec), rec];
  const gen = { target: "js" as const, resolve: catalog.resolve };
  const units = chain.map((r) => (options.layered ? generateLayered(r, gen) : generatePerValue(r, gen)));
  const mod = loadUnits(units);
  const fn = coeffFunction(mod, `${rec.name}Coeff`);
  return fn(...at, ...rec.runtimeVars.map((v) => vars[v]));
}

export function runEval(catalog: RecurrenceCatalog, args: CliArgs, io: Io): number {
  const [name, indexText, ...assignments] = args.positionals;
  if (name === undefined || indexText === undefined) {
    io.err("usage: recurforge eval <Name> <i,j,..> [var=value...] [--layered]");
    return 1;
  }
  const at = parseIndexList(indexText);
  const vars = parseAssignments(assignments);
  const value = evaluate(catalog, name, at, vars, { layered: args.layered });
  io.out(String(value));
  if (args.verbose) {
    const reference = interpret(catalog.require(name), at, vars, { resolve: catalog.resolve });
    io.out(`reference: ${reference}`);
  }
  return 0;
}

/** Generate once, then again after every burst of definition changes. */
export function startWatch(config: RecurforgeConfig, io: Io, verbose = false): Watcher {
  const dir = config.output.definitionsDir;
  if (!dir) {
    throw new DefinitionError("watch needs a definitions directory (--definitions or RECURFORGE_DEFINITIONS_DIR)");
  }
  runGenerate(config, io, verbose);
  io.out(`Watching ${path.resolve(dir)}`);
  return watchDefinitions(dir, () => runGenerate(config, io, verbose), {
    debounceMs: config.output.watchDebounceMs,
    onError: (error) => reportError(error, io),
  });
}

// ═══════════════════════════════════════════════════════════════════════════════
// DRIVER
// ═══════════════════════════════════════════════════════════════════════════════

export function reportError(error: unknown, io: Io): void {
  if (error instanceof RecurrenceError) {
    io.err(`Error [${error.code}]: ${error.message}`);
    if (error instanceof DefinitionError) {
      for (const p of error.problems) io.err(`  - ${p}`);
    }
  } else if (error instanceof Error) {
    io.err(`Error: ${error.message}`);
  } else {
    io.err(`Error: ${String(error)}`);
  }
}

/**
 * Run every command except `watch` to completion and return the exit code.
 */
export function runCli(argv: string[], io: Io = consoleIo, options: { cwd?: string; env?: NodeJS.ProcessEnv } = {}): number {
  const args = parseCliArgs(argv);

  if (args.help) {
    io.out(getHelpText());
    return 0;
  }
  if (args.version) {
    io.out(getVersion());
    return 0;
  }
  if (args.errors.length > 0) {
    for (const e of args.errors) io.err(`Error: ${e}`);
    io.err("Run recurforge --help for usage.");
    return 1;
  }
  if (args.command === undefined) {
    io.out(getHelpText());
    return 1;
  }

  try {
    const { config, warnings } = buildConfig(args, options);
    for (const w of warnings) io.err(`warning: ${w}`);

    switch (args.command) {
      case "generate":
        return runGenerate(config, io, args.verbose);
      case "list":
        return runList(buildCatalog(config), io, args.verbose);
      case "eval":
        return runEval(buildCatalog(config), args, io);
      case "watch":
        io.err("watch runs until interrupted; start it from the recurforge binary");
        return 1;
    }
  } catch (error) {
    reportError(error, io);
    return 1;
  }
}
