// src/outcome/diagnostic.ts
// Diagnostic records shared by errors, warnings and the diagnostic sink

export type DiagnosticSeverity = "error" | "warning" | "info" | "hint";

/** Offsets into a pattern or declaration source string. */
export interface Span {
  source: string;
  start: number;
  end: number;
}

export interface Diagnostic {
  code: string;
  severity: DiagnosticSeverity;
  message: string;
  span?: Span;
  data?: Record<string, unknown>;
}

type DiagnosticOpts = Partial<Omit<Diagnostic, "code" | "message" | "severity">>;

export function errorDiag(code: string, message: string, opts?: DiagnosticOpts): Diagnostic {
  return { code, message, severity: "error", ...opts };
}

export function warnDiag(code: string, message: string, opts?: DiagnosticOpts): Diagnostic {
  return { code, message, severity: "warning", ...opts };
}

const SEVERITY_RANK: Record<DiagnosticSeverity, number> = {
  error: 3,
  warning: 2,
  info: 1,
  hint: 0,
};

/**
 * True when `severity` is at least as severe as `threshold`.
 */
export function atLeast(severity: DiagnosticSeverity, threshold: DiagnosticSeverity): boolean {
  return SEVERITY_RANK[severity] >= SEVERITY_RANK[threshold];
}

export function isSeverity(value: unknown): value is DiagnosticSeverity {
  return value === "error" || value === "warning" || value === "info" || value === "hint";
}
