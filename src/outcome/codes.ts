// src/outcome/codes.ts
// Stable diagnostic codes and message templates

import { errorDiag, warnDiag, type Diagnostic, type Span } from "./diagnostic";

interface DiagCodeDef {
  code: string;
  severity: "error" | "warning";
  category: string;
  template: string;
}

export const DIAGNOSTIC_CODES = {
  E0001: { code: "E0001", severity: "error", category: "Syntax", template: "Malformed pattern: {detail}" },
  E0002: { code: "E0002", severity: "error", category: "Syntax", template: "Malformed type declaration: {detail}" },

  E0100: { code: "E0100", severity: "error", category: "Registry", template: "Duplicate variant {variant} in type {type}" },
  E0101: { code: "E0101", severity: "error", category: "Registry", template: "Invalid {role} name: {name}" },
  E0102: { code: "E0102", severity: "error", category: "Registry", template: "Unknown variant: {variant}" },

  E0200: { code: "E0200", severity: "error", category: "Construction", template: "Wrong number of fields for {variant}: expected {expected}, got {actual}" },
  E0201: { code: "E0201", severity: "error", category: "Construction", template: "Field {index} ({field}) of {variant}: expected {expected}, got {actual}" },

  E0300: { code: "E0300", severity: "error", category: "Match", template: "No clause matched {subject}" },
  E0301: { code: "E0301", severity: "error", category: "Match", template: "Binding {name}: {detail}" },

  W0001: { code: "W0001", severity: "warning", category: "Match", template: "Unreachable clause {index}: follows catch-all at clause {catchall}" },
  W0002: { code: "W0002", severity: "warning", category: "Registry", template: "Variant {variant} of type {previous} redefined by type {type}" },
} as const satisfies Record<string, DiagCodeDef>;

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
      message = message.replace(`{${key}}`, () => String(value));
    }
  }

  const opts = { span, data: params ? { ...params } : undefined };
  return def.severity === "warning" ? warnDiag(def.code, message, opts) : errorDiag(def.code, message, opts);
}
