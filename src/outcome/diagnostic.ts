// src/outcome/diagnostic.ts
// Structured warnings and errors reported by the parser, generators and config

export type DiagnosticSeverity = "error" | "warning" | "info";

export interface Diagnostic {
  code: string;
  severity: DiagnosticSeverity;
  message: string;
  /** Where the problem was found: recurrence name, rule index, fragment */
  data?: Record<string, string | number>;
}

/**
 * One-line rendering used by the CLI, e.g. `warning W0101: Unknown identifier ... (recurrence=Legendre, rule=0)`.
 */
export function formatDiagnostic(d: Diagnostic): string {
  const where = d.data
    ? Object.entries(d.data)
        .map(([k, v]) => `${k}=${v}`)
        .join(", ")
    : "";
  return `${d.severity} ${d.code}: ${d.message}${where ? ` (${where})` : ""}`;
}
