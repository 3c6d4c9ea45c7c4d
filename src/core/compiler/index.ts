// src/core/compiler/index.ts
// Code generation: module exports

// ─────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────

export type {
  Target,
  OptimizationLevel,
  CodegenConfig,
  RecurrenceResolver,
  GenerateOptions,
  CseKind,
  CSECandidate,
  Intermediate,
  OptimizedExpr,
  OperationCounts,
  UnitKind,
  RuleStrategy,
  LayerBoundSource,
  LayerBound,
  GeneratedUnit,
  GenerationRecord,
} from "./types";
export { DEFAULT_CODEGEN_CONFIG } from "./types";

// ─────────────────────────────────────────────────────────────────
// Rendering
// ─────────────────────────────────────────────────────────────────

export type { Dialect, RenderHooks } from "./render";
export { createDialect, formatCppNumber, renderExpr, shiftedIndex, indent } from "./render";

export type { RenderedBody } from "./body";
export { renderBody, INLINE_CALL_LIMIT } from "./body";

// ─────────────────────────────────────────────────────────────────
// Optimization
// ─────────────────────────────────────────────────────────────────

export {
  DEFAULT_CSE_THRESHOLD,
  OPERATION_WEIGHTS,
  coeffCost,
  findCandidates,
  optimize,
  shouldApplyCse,
  countOperations,
  estimateCost,
} from "./optimize";

// ─────────────────────────────────────────────────────────────────
// Rule selection
// ─────────────────────────────────────────────────────────────────

export type { RuleGuard, Selection } from "./selection";
export { baseConstraints, ruleGuards, exclusiveGuard, select } from "./selection";

// ─────────────────────────────────────────────────────────────────
// Generators
// ─────────────────────────────────────────────────────────────────

export { FORCEINLINE, coeffName, moduleName, resolveConfig, generatePerValue } from "./perValue";

export type { AuxRole, LayerRule, LayerGroup, BaseLayer, PrevBuffer, LayerPlan } from "./layered";
export { layerBound, planLayers, prevBuffers, generateLayered } from "./layered";

export type { DispatcherOptions } from "./dispatcher";
export { fileStem, dispatchName, unitFileName, generateDispatcher } from "./dispatcher";

// ─────────────────────────────────────────────────────────────────
// Evaluation
// ─────────────────────────────────────────────────────────────────

export type { RuntimeValue, RuntimeVars, InterpretOptions } from "./interpret";
export { interpret } from "./interpret";

export type { LoadedModule, CoeffFunction } from "./loader";
export { loadGenerated, loadUnit, loadUnits, coeffFunction } from "./loader";
