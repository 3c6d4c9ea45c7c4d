// src/core/compiler/types.ts
// Code generation - type definitions

import type { Expr } from "../ast";
import type { Recurrence } from "../recurrence";
import type { Diagnostic } from "../../outcome/diagnostic";

// ─────────────────────────────────────────────────────────────────
// Configuration
// ─────────────────────────────────────────────────────────────────

/** Output dialect. `js` output can be loaded and run in-process. */
export type Target = "cpp" | "js";

export type OptimizationLevel = "none" | "cse";

export type CodegenConfig = {
  target: Target;
  /** Vector type for C++ output */
  vecType: string;
  /** Header providing the vector type */
  vecInclude: string;
  optimization: OptimizationLevel;
  /** Minimum occurrences before a subexpression is named */
  cseThreshold: number;
  /** Extra auxiliary slots for layers fed from a tabulated array */
  tablePadding: number;
};

export const DEFAULT_CODEGEN_CONFIG: CodegenConfig = {
  target: "cpp",
  vecType: "Vec8d",
  vecInclude: "vectorclass.h",
  optimization: "cse",
  cseThreshold: 2,
  tablePadding: 0,
};

/** Looks up recurrences referenced by cross calls. */
export type RecurrenceResolver = (name: string) => Recurrence | undefined;

export type GenerateOptions = Partial<CodegenConfig> & {
  resolve?: RecurrenceResolver;
};

// ─────────────────────────────────────────────────────────────────
// Optimizer
// ─────────────────────────────────────────────────────────────────

export type CseKind = "call" | "coeff";

export type CSECandidate = {
  kind: CseKind;
  /** Structural signature shared by every occurrence */
  signature: string;
  /** Intermediate name, e.g. `_cse_call_1` */
  name: string;
  count: number;
  expr: Expr;
};

export type Intermediate = { name: string; expr: Expr };

/**
 * Optimizer output: bindings in dependency order, then the expression that
 * reads them. With no candidates `result` is the input tree.
 */
export type OptimizedExpr = {
  intermediates: Intermediate[];
  result: Expr;
  candidates: CSECandidate[];
};

export type OperationCounts = {
  add: number;
  mul: number;
  div: number;
  call: number;
};

// ─────────────────────────────────────────────────────────────────
// Generator output
// ─────────────────────────────────────────────────────────────────

export type UnitKind = "per-value" | "layered" | "dispatcher";

export type RuleStrategy = "cse" | "sum" | "scaled-sum" | "branch-average" | "inline";

export type LayerBoundSource = "validity" | "tabulated" | "default";

/** How the layer size was derived; `default` means nothing bounded the aux index. */
export type LayerBound = {
  /** N_VALUES as an expression over the layer indices */
  expr: string;
  source: LayerBoundSource;
};

export type GeneratedUnit = {
  recurrence: string;
  kind: UnitKind;
  target: Target;
  code: string;
  /** Module object the js output assigns (loader entry point) */
  moduleName: string;
  exports: string[];
  /** Functions from other units the code calls */
  dependencies: string[];
  diagnostics: Diagnostic[];
  /** Body strategy per rule, in priority order */
  strategies: RuleStrategy[];
  layerBound?: LayerBound;
};

/** Record of one generator run, for verbose CLI output. */
export type GenerationRecord = {
  recurrence: string;
  kind: UnitKind;
  durationMs: number;
  bytes: number;
  metrics?: Record<string, number>;
};
