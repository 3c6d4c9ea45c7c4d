import type { Diagnostic, DiagnosticSeverity } from "./diagnostic";

interface DiagCodeDef {
  code: string;
  severity: DiagnosticSeverity;
  category: string;
  template: string;
}

export const DIAGNOSTIC_CODES = {
  E0001: { code: "E0001", severity: "error", category: "Syntax", template: "Malformed term: {fragment}" },
  E0002: { code: "E0002", severity: "error", category: "Syntax", template: "Unbalanced brackets: {fragment}" },
  E0003: { code: "E0003", severity: "error", category: "Syntax", template: "No call found in term: {fragment}" },
  E0004: { code: "E0004", severity: "error", category: "Syntax", template: "Invalid shift component: {fragment}" },
  E0005: { code: "E0005", severity: "error", category: "Syntax", template: "Invalid arithmetic expression: {fragment}" },

  E0010: { code: "E0010", severity: "error", category: "Constraint", template: "No comparison operator in constraint: {source}" },

  E0100: { code: "E0100", severity: "error", category: "Definition", template: "Unknown index: {name}" },
  E0101: { code: "E0101", severity: "error", category: "Definition", template: "Duplicate recurrence: {name}" },
  E0102: { code: "E0102", severity: "error", category: "Definition", template: "Invalid definition field: {field}" },
  E0103: { code: "E0103", severity: "error", category: "Definition", template: "Unknown recurrence: {name}" },

  E0200: { code: "E0200", severity: "error", category: "Generation", template: "Cannot generate: {detail}" },

  E0300: { code: "E0300", severity: "error", category: "Evaluation", template: "Cannot evaluate: {detail}" },

  W0101: { code: "W0101", severity: "warning", category: "Parser", template: "Unknown identifier treated as runtime variable: {name}" },
  W0201: { code: "W0201", severity: "warning", category: "Layered", template: "Layer bound for {name} defaulted to 1: no bound on {aux}" },
  W0301: { code: "W0301", severity: "warning", category: "Config", template: "Unknown config value for {field}: {value}" },
} as const satisfies Record<string, DiagCodeDef>;

export type DiagnosticCode = keyof typeof DIAGNOSTIC_CODES;

export function makeDiagnostic(
  code: DiagnosticCode,
  params?: Record<string, string | number>,
  data?: Record<string, string | number>
): Diagnostic {
  const def: DiagCodeDef = DIAGNOSTIC_CODES[code];

  let message = def.template;
  if (params) {
    for (const [key, value] of Object.entries(params)) {
      message = message.replace(`{${key}}`, String(value));
    }
  }

  return {
    code: def.code,
    severity: def.severity,
    message,
    data: data ?? params,
  };
}
