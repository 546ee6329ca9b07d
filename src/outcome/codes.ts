import type { Diagnostic, DiagnosticSeverity, Span } from "./diagnostic";

interface DiagCodeDef {
  code: string;
  severity: DiagnosticSeverity;
  category: string;
  template: string;
}

export const DIAGNOSTIC_CODES = {
  E0001: { code: "E0001", severity: "error", category: "Syntax", template: "Malformed expression" },
  E0002: { code: "E0002", severity: "error", category: "Syntax", template: "Unbalanced parentheses" },
  E0004: { code: "E0004", severity: "error", category: "Syntax", template: "Invalid number literal" },

  E0100: { code: "E0100", severity: "error", category: "Pattern", template: "Pattern misuse: {detail}" },
  E0103: { code: "E0103", severity: "error", category: "Pattern", template: "No pattern matches: {name}" },

  E0200: { code: "E0200", severity: "error", category: "Runtime", template: "Evaluation of {name} failed" },

  W0001: { code: "W0001", severity: "warning", category: "Figure", template: "Duplicate drawable skipped: {repr}" },
} satisfies Record<string, DiagCodeDef>;

export type DiagnosticCode = keyof typeof DIAGNOSTIC_CODES;

export function makeDiagnostic(
  code: DiagnosticCode,
  params?: Record<string, string | number>,
  span?: Span
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
    span,
    data: params,
  };
}
