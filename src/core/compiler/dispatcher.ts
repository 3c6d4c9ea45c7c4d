// src/core/compiler/dispatcher.ts
// Runtime dispatcher: maps runtime indices onto compiled specializations

import type { Recurrence } from "../recurrence";
import { coeffName, cppParam, resolveConfig, wrapJsModule } from "./perValue";
import { createDialect, indent } from "./render";
import type { GenerateOptions, GeneratedUnit } from "./types";

export type DispatcherOptions = GenerateOptions & {
  /** Dispatch onto the layered accessor instead of the per-value one. */
  layered?: boolean;
};

export function fileStem(rec: Recurrence): string {
  return rec.name.toLowerCase();
}

export function dispatchName(rec: Recurrence): string {
  return `dispatch_${rec.name}`;
}

/** File name of the unit a dispatcher includes or a generator writes. */
export function unitFileName(rec: Recurrence, kind: "per-value" | "layered" | "dispatcher", extension: string): string {
  const suffix = kind === "per-value" ? "coeff" : kind === "layered" ? "coeff_layered" : "dispatch";
  return `${fileStem(rec)}_${suffix}.${extension}`;
}

export function generateDispatcher(rec: Recurrence, options: DispatcherOptions = {}): GeneratedUnit {
  const config = resolveConfig(options);
  const dialect = createDialect(config.target, config.vecType);
  const fn = dispatchName(rec);
  const callee = coeffName(rec.name);
  let code: string;

  if (config.target === "cpp") {
    const params = [...rec.indices.map((i) => `int ${i}`), ...rec.runtimeVars.map((v) => cppParam(rec, v, config))];
    const vars = rec.runtimeVars.join(", ");

    const nest = (depth: number, bound: number[]): string[] => {
      if (depth === rec.indices.length) {
        return [`return ${callee}<${bound.join(", ")}>::compute(${vars});`];
      }
      const idx = rec.indices[depth];
      const lines = [`switch (${idx}) {`];
      for (let v = 0; v <= rec.maxIndices[idx]; v++) {
        const inner = nest(depth + 1, [...bound, v]);
        if (inner.length === 1) {
          lines.push(`    case ${v}: ${inner[0]}`);
        } else {
          lines.push(`    case ${v}:`, ...indent(inner, 2));
        }
      }
      lines.push(`    default: return ${dialect.zero};`, "}");
      return lines;
    };

    const include = options.layered ? unitFileName(rec, "layered", "hpp") : unitFileName(rec, "per-value", "hpp");
    const lines = [
      `// ${rec.name}: generated by recurforge, do not edit`,
      "#pragma once",
      "",
      `#include "${include}"`,
      "",
      ...(rec.namespace ? [`namespace ${rec.namespace} {`, ""] : []),
      `inline ${config.vecType} ${fn}(${params.join(", ")}) {`,
      ...indent(nest(0, []), 1),
      "}",
      ...(rec.namespace ? ["", `} // namespace ${rec.namespace}`] : []),
      "",
    ];
    code = lines.join("\n");
  } else {
    const params = [...rec.indices, ...rec.runtimeVars].join(", ");
    const outOfRange = rec.indices
      .map((i) => `!Number.isInteger(${i}) || ${i} < 0 || ${i} > ${rec.maxIndices[i]}`)
      .join(" || ");
    code = wrapJsModule(
      rec,
      `${rec.name}DispatchModule`,
      [
        [
          `function ${fn}(${params}) {`,
          `    if (${outOfRange}) return ${dialect.zero};`,
          `    return ${callee}(${params});`,
          "}",
        ].join("\n"),
      ],
      [fn]
    );
  }

  return {
    recurrence: rec.name,
    kind: "dispatcher",
    target: config.target,
    code,
    moduleName: `${rec.name}DispatchModule`,
    exports: [fn],
    dependencies: [callee],
    diagnostics: [],
    strategies: [],
  };
}
