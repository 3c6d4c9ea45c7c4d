// src/index.ts
// recurforge - Public API
//
// Define recurrences, generate C++ or JavaScript, evaluate them in-process.

// ═══════════════════════════════════════════════════════════════════════════════
// DEFINITIONS
// ═══════════════════════════════════════════════════════════════════════════════

export {
  Recurrence,
  priorityKey,
  sortRules,
  DEFAULT_MAX_INDEX,
  DEFAULT_SELF_NAME,
  type BaseCase,
  type RecurrenceRule,
  type RecurrenceOptions,
  type RuleOptions,
} from "./core/recurrence";
export { ConstraintSet, parseConstraint, type Constraint, type CompareOp } from "./core/constraints";
export type { Expr, ExprTag, CallExpr, TermExpr, SumExpr, BinOpKind } from "./core/ast";
export { evaluateArith, KNOWN_FUNCTIONS } from "./core/arith";
export { parseRule, parseRuleBody, parseValue, type ParseContext } from "./core/dsl/parser";
export { printExpr, printRule } from "./core/dsl/printer";

// ═══════════════════════════════════════════════════════════════════════════════
// CODE GENERATION
// ═══════════════════════════════════════════════════════════════════════════════

export * from "./core/compiler";

// ═══════════════════════════════════════════════════════════════════════════════
// CATALOG & ORCHESTRATION
// ═══════════════════════════════════════════════════════════════════════════════

export * from "./catalog";
export * from "./orchestrator";

// ═══════════════════════════════════════════════════════════════════════════════
// CONFIGURATION, ERRORS, DIAGNOSTICS
// ═══════════════════════════════════════════════════════════════════════════════

export * from "./core/config";
export {
  RecurrenceError,
  DslSyntaxError,
  ConstraintSyntaxError,
  DefinitionError,
  GenerationError,
  EvaluationError,
} from "./core/errors";
export { formatDiagnostic, type Diagnostic, type DiagnosticSeverity } from "./outcome/diagnostic";
export { DIAGNOSTIC_CODES, makeDiagnostic, type DiagnosticCode } from "./outcome/codes";
export { sha256Text } from "./core/artifacts/hash";
export { VERSION } from "./version";
