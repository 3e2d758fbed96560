export type DiagnosticSeverity = "error" | "warning" | "info";

export interface Diagnostic {
  code: string;
  severity: DiagnosticSeverity;
  message: string;
  file?: string;
  line?: number;
}

/**
 * Where diagnostics go while a file is processed.
 */
export type DiagnosticSink = (diag: Diagnostic) => void;

const SEVERITY_LABELS: Record<DiagnosticSeverity, string> = {
  error: "Error",
  warning: "Warning",
  info: "Message",
};

/**
 * One line of text for a diagnostic, e.g. `Warning: no cog code found in a.txt`.
 */
export function formatDiagnostic(diag: Diagnostic): string {
  return `${SEVERITY_LABELS[diag.severity]}: ${diag.message}`;
}
