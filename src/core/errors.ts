// src/core/errors.ts
// Error taxonomy for definition, parsing and generation failures

import { makeDiagnostic, type DiagnosticCode } from "../outcome/codes";

export class RecurrenceError extends Error {
  constructor(message: string, public readonly code: string) {
    super(message);
    this.name = "RecurrenceError";
  }
}

export type SyntaxCode = Extract<DiagnosticCode, "E0001" | "E0002" | "E0003" | "E0004" | "E0005">;

/**
 * Malformed DSL text. Carries the offending fragment and, once known, the
 * recurrence and rule it belongs to.
 */
export class DslSyntaxError extends RecurrenceError {
  constructor(
    public readonly syntaxCode: SyntaxCode,
    public readonly fragment: string,
    public readonly recurrence?: string,
    public readonly ruleIndex?: number
  ) {
    super(dslMessage(syntaxCode, fragment, recurrence, ruleIndex), syntaxCode);
    this.name = "DslSyntaxError";
  }

  /** Re-raise with the location filled in. */
  at(recurrence: string, ruleIndex: number | undefined): DslSyntaxError {
    return new DslSyntaxError(this.syntaxCode, this.fragment, recurrence, ruleIndex);
  }
}

export class ConstraintSyntaxError extends RecurrenceError {
  constructor(public readonly source: string) {
    super(makeDiagnostic("E0010", { source: JSON.stringify(source) }).message, "E0010");
    this.name = "ConstraintSyntaxError";
  }
}

export class DefinitionError extends RecurrenceError {
  constructor(message: string, code = "E0102", public readonly problems: string[] = []) {
    super(message, code);
    this.name = "DefinitionError";
  }
}

export class GenerationError extends RecurrenceError {
  constructor(public readonly recurrence: string, detail: string) {
    super(`${recurrence}: ${makeDiagnostic("E0200", { detail }).message}`, "E0200");
    this.name = "GenerationError";
  }
}

export class EvaluationError extends RecurrenceError {
  constructor(detail: string) {
    super(makeDiagnostic("E0300", { detail }).message, "E0300");
    this.name = "EvaluationError";
  }
}

function dslMessage(
  code: SyntaxCode,
  fragment: string,
  recurrence: string | undefined,
  ruleIndex: number | undefined
): string {
  const base = makeDiagnostic(code, { fragment: JSON.stringify(fragment) }).message;
  if (recurrence === undefined) return base;
  const where = ruleIndex === undefined ? recurrence : `${recurrence} rule ${ruleIndex}`;
  return `${where}: ${base}`;
}

