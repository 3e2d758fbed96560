import type { Diagnostic, DiagnosticSeverity } from "./diagnostic";

interface DiagCodeDef {
  code: string;
  severity: DiagnosticSeverity;
  category: string;
  template: string;
}

export const DIAGNOSTIC_CODES = {
  I0001: { code: "I0001", severity: "info", category: "Generator", template: "{text}" },

  W0001: { code: "W0001", severity: "warning", category: "Structure", template: "no cog code found in {file}" },
  W0002: { code: "W0002", severity: "warning", category: "Config", template: "{text}" },
} satisfies Record<string, DiagCodeDef>;

export type DiagnosticCode = keyof typeof DIAGNOSTIC_CODES;

export function makeDiagnostic(
  code: DiagnosticCode,
  params?: Record<string, string | number>,
  location?: { file?: string; line?: number }
): Diagnostic {
  const def: DiagCodeDef = DIAGNOSTIC_CODES[code];

  let message = def.template;
  if (params) {
    for (const [key, value] of Object.entries(params)) {
      message = message.replace(`{${key}}`, () => String(value));
    }
  }

  return {
    code: def.code,
    severity: def.severity,
    message,
    ...location,
  };
}
