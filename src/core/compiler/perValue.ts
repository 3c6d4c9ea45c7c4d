// src/core/compiler/perValue.ts
// Per-value generator: one specialization (cpp) or function (js) per case

import type { CallExpr } from "../ast";
import { GenerationError } from "../errors";
import type { BaseCase, Recurrence } from "../recurrence";
import type { Diagnostic } from "../../outcome/diagnostic";
import { renderBody, usedIdentifiers } from "./body";
import { createDialect, indent, renderExpr, shiftedIndex, type Dialect, type RenderHooks } from "./render";
import { exclusiveGuard, ruleGuards, baseConstraints, type RuleGuard } from "./selection";
import {
  DEFAULT_CODEGEN_CONFIG,
  type CodegenConfig,
  type GenerateOptions,
  type GeneratedUnit,
  type RecurrenceResolver,
  type RuleStrategy,
} from "./types";

export const FORCEINLINE = "RECURFORGE_FORCEINLINE";

export function coeffName(name: string): string {
  return `${name}Coeff`;
}

export function moduleName(rec: Recurrence, suffix = ""): string {
  return `${rec.name}${suffix}Module`;
}

export function resolveConfig(options: GenerateOptions): CodegenConfig {
  const d = DEFAULT_CODEGEN_CONFIG;
  return {
    target: options.target ?? d.target,
    vecType: options.vecType ?? d.vecType,
    vecInclude: options.vecInclude ?? d.vecInclude,
    optimization: options.optimization ?? d.optimization,
    cseThreshold: options.cseThreshold ?? d.cseThreshold,
    tablePadding: options.tablePadding ?? d.tablePadding,
  };
}

/** Runtime variables a call into `target` passes. */
export function callVars(rec: Recurrence, target: string | undefined, resolve?: RecurrenceResolver): readonly string[] {
  if (target === undefined || target === rec.name) return rec.runtimeVars;
  return resolve?.(target)?.runtimeVars ?? rec.runtimeVars;
}

/** Names of cross-called functions, for the loader. */
export function crossDependencies(rec: Recurrence): string[] {
  return rec.dependencies().map(coeffName);
}

// ─────────────────────────────────────────────────────────────────
// C++ preamble
// ─────────────────────────────────────────────────────────────────

export function cppPreamble(rec: Recurrence, config: CodegenConfig, extraIncludes: string[] = []): string {
  const lines = [
    `// ${rec.name}: generated by recurforge, do not edit`,
    "#pragma once",
    "",
    "#include <type_traits>",
    `#include <${config.vecInclude}>`,
    ...extraIncludes.map((inc) => `#include "${inc}"`),
    "",
    `#ifndef ${FORCEINLINE}`,
    "  #ifdef _MSC_VER",
    `    #define ${FORCEINLINE} __forceinline`,
    "  #elif defined(__GNUC__) || defined(__clang__)",
    `    #define ${FORCEINLINE} inline __attribute__((always_inline))`,
    "  #else",
    `    #define ${FORCEINLINE} inline`,
    "  #endif",
    "#endif",
  ];
  if (rec.namespace) {
    lines.push("", `namespace ${rec.namespace} {`);
  }
  return lines.join("\n");
}

export function cppFooter(rec: Recurrence): string {
  return rec.namespace ? `} // namespace ${rec.namespace}` : "";
}

export function cppParam(rec: Recurrence, v: string, config: CodegenConfig, used = true): string {
  const type = rec.arrayVars.includes(v) ? `const ${config.vecType}*` : config.vecType;
  return used ? `${type} ${v}` : `${type} /*${v}*/`;
}

// ─────────────────────────────────────────────────────────────────
// Generator
// ─────────────────────────────────────────────────────────────────

type Emitter = {
  rec: Recurrence;
  config: CodegenConfig;
  dialect: Dialect;
  hooks: RenderHooks;
  strategies: RuleStrategy[];
  diagnostics: Diagnostic[];
};

export function generatePerValue(rec: Recurrence, options: GenerateOptions = {}): GeneratedUnit {
  const config = resolveConfig(options);
  const dialect = createDialect(config.target, config.vecType);
  const name = coeffName(rec.name);

  const hooks: RenderHooks =
    config.target === "cpp"
      ? {
          call: (c: CallExpr) =>
            `${coeffName(c.target ?? rec.name)}<${callArgs(rec, c)}>::compute(${callVars(rec, c.target, options.resolve).join(", ")})`,
        }
      : {
          call: (c: CallExpr) =>
            `${coeffName(c.target ?? rec.name)}(${[callArgs(rec, c), ...callVars(rec, c.target, options.resolve)].join(", ")})`,
        };

  const emitter: Emitter = { rec, config, dialect, hooks, strategies: [], diagnostics: [...rec.diagnostics] };
  const code = config.target === "cpp" ? emitCpp(emitter) : emitJs(emitter);

  return {
    recurrence: rec.name,
    kind: "per-value",
    target: config.target,
    code,
    moduleName: moduleName(rec),
    exports: [name],
    dependencies: crossDependencies(rec),
    diagnostics: emitter.diagnostics,
    strategies: emitter.strategies,
  };
}

function callArgs(rec: Recurrence, c: CallExpr): string {
  return rec.indices.map((idx, slot) => shiftedIndex(idx, c.shifts[slot] ?? 0)).join(", ");
}

function emitCpp(e: Emitter): string {
  const { rec, config, dialect, hooks } = e;
  const name = coeffName(rec.name);
  const vt = config.vecType;
  const allParams = rec.runtimeVars.map((v) => cppParam(rec, v, config)).join(", ");
  const tparams = rec.indices.map((i) => `int ${i}`).join(", ");

  const includes = rec.dependencies().map((d) => `${d.toLowerCase()}_coeff.hpp`);
  const blocks: string[] = [cppPreamble(rec, config, includes)];

  blocks.push(
    [
      `template<${tparams}, typename Enable = void>`,
      `struct ${name} {`,
      `    static ${FORCEINLINE} ${vt} compute(${rec.runtimeVars.map((v) => cppParam(rec, v, config, false)).join(", ")}) {`,
      `        return ${dialect.zero};`,
      "    }",
      "};",
    ].join("\n")
  );

  for (const base of rec.bases) {
    blocks.push(cppBase(e, base));
  }

  for (const g of ruleGuards(rec)) {
    const guard = requireGuard(rec, g);
    const body = renderBody(g.rule.expr, rec.indices, config, dialect, hooks);
    e.strategies.push(body.strategy);
    blocks.push(
      [
        `template<${tparams}>`,
        `struct ${name}<`,
        `    ${rec.indices.join(", ")},`,
        `    typename std::enable_if<${guard}>::type`,
        "> {",
        `    static ${FORCEINLINE} ${vt} compute(${allParams}) {`,
        ...(g.rule.name ? [`        // ${g.rule.name}`] : []),
        ...indent([...body.statements, `return ${body.result};`], 2),
        "    }",
        "};",
      ].join("\n")
    );
  }

  const footer = cppFooter(rec);
  if (footer) blocks.push(footer);
  return blocks.join("\n\n") + "\n";
}

/** Exclusive guard text of a rule; a rule matching everywhere would recurse forever. */
function requireGuard(rec: Recurrence, g: RuleGuard): string {
  const guard = exclusiveGuard(g);
  if (!guard) {
    throw new GenerationError(rec.name, `rule ${g.rule.index} has no guard, so its recursion never terminates`);
  }
  return guard;
}

function cppBase(e: Emitter, base: BaseCase): string {
  const { rec, config, dialect, hooks } = e;
  const free = rec.indices.filter((_, slot) => base.at[slot] === null);
  const targs = rec.indices.map((idx, slot) => {
    const v = base.at[slot];
    return v === null ? idx : String(v);
  });
  const used = usedIdentifiers(base.value);
  const params = rec.runtimeVars.map((v) => cppParam(rec, v, config, used.has(v))).join(", ");

  return [
    free.length === 0 ? "template<>" : `template<${free.map((i) => `int ${i}`).join(", ")}>`,
    `struct ${coeffName(rec.name)}<${targs.join(", ")}, void> {`,
    `    static ${FORCEINLINE} ${config.vecType} compute(${params}) {`,
    `        return ${renderExpr(base.value, dialect, hooks)};`,
    "    }",
    "};",
  ].join("\n");
}

// ─────────────────────────────────────────────────────────────────
// JavaScript
// ─────────────────────────────────────────────────────────────────

export const JS_MATH_PRELUDE = "const { exp, sqrt, log, sin, cos, pow, abs } = Math;";

function emitJs(e: Emitter): string {
  const { rec, config, dialect, hooks } = e;
  const name = coeffName(rec.name);
  const params = [...rec.indices, ...rec.runtimeVars].join(", ");
  const fns: string[] = [];
  const selector: string[] = [];

  fns.push([`function ${name}$primary(${params}) {`, `    return ${dialect.zero};`, "}"].join("\n"));

  rec.bases.forEach((base, i) => {
    fns.push(
      [`function ${name}$base${i}(${params}) {`, `    return ${renderExpr(base.value, dialect, hooks)};`, "}"].join("\n")
    );
    selector.push(`if (${baseConstraints(rec, base).render()}) return ${name}$base${i}(${params});`);
  });

  ruleGuards(rec).forEach((g, i) => {
    requireGuard(rec, g);
    const body = renderBody(g.rule.expr, rec.indices, config, dialect, hooks);
    e.strategies.push(body.strategy);
    fns.push(
      [
        `function ${name}$rule${i}(${params}) {`,
        ...(g.rule.name ? [`    // ${g.rule.name}`] : []),
        ...indent([...body.statements, `return ${body.result};`], 1),
        "}",
      ].join("\n")
    );
    selector.push(`if (${g.guard.render()}) return ${name}$rule${i}(${params});`);
  });

  fns.push(
    [
      `function ${name}(${params}) {`,
      ...indent([...selector, `return ${name}$primary(${params});`], 1),
      "}",
    ].join("\n")
  );

  return wrapJsModule(rec, moduleName(rec), fns, [name]);
}

export function wrapJsModule(rec: Recurrence, module: string, fns: string[], exports: string[]): string {
  const body = [JS_MATH_PRELUDE, "", fns.join("\n\n"), "", `return { ${exports.join(", ")} };`].join("\n");
  return [
    `// ${rec.name}: generated by recurforge, do not edit`,
    `const ${module} = (() => {`,
    ...indent(body.split("\n"), 1),
    "})();",
    "",
  ].join("\n");
}
