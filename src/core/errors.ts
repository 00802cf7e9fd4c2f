// src/core/errors.ts
// Error taxonomy for registration, construction, compilation and matching

import { makeDiagnostic, type DiagnosticCode } from "../outcome/codes";
import type { Diagnostic, Span } from "../outcome/diagnostic";

// ─────────────────────────────────────────────────────────────────
// Base
// ─────────────────────────────────────────────────────────────────

export class TagmatchError extends Error {
  constructor(
    public readonly code: DiagnosticCode,
    public readonly params: Record<string, string | number>,
    public readonly span?: Span
  ) {
    super(makeDiagnostic(code, params, span).message);
    this.name = "TagmatchError";
  }

  toDiagnostic(): Diagnostic {
    return makeDiagnostic(this.code, this.params, this.span);
  }
}

// ─────────────────────────────────────────────────────────────────
// Syntax
// ─────────────────────────────────────────────────────────────────

export type SourceKind = "pattern" | "declaration";

export class ParseError extends TagmatchError {
  constructor(
    public readonly kind: SourceKind,
    public readonly detail: string,
    span: Span
  ) {
    super(kind === "pattern" ? "E0001" : "E0002", { detail: `${detail} at offset ${span.start}` }, span);
    this.name = "ParseError";
  }
}

// ─────────────────────────────────────────────────────────────────
// Registry
// ─────────────────────────────────────────────────────────────────

export class DuplicateVariantError extends TagmatchError {
  constructor(
    public readonly typeName: string,
    public readonly variant: string
  ) {
    super("E0100", { variant, type: typeName });
    this.name = "DuplicateVariantError";
  }
}

export type NameRole = "type" | "variant" | "field";

export class ReservedNameError extends TagmatchError {
  constructor(
    public readonly role: NameRole,
    public readonly reservedName: string
  ) {
    super("E0101", { role, name: JSON.stringify(reservedName) });
    this.name = "ReservedNameError";
  }
}

export class UnknownVariantError extends TagmatchError {
  constructor(
    public readonly variant: string,
    public readonly typeName?: string
  ) {
    super("E0102", { variant: typeName ? `${typeName}::${variant}` : variant });
    this.name = "UnknownVariantError";
  }
}

// ─────────────────────────────────────────────────────────────────
// Construction
// ─────────────────────────────────────────────────────────────────

export class ArityMismatchError extends TagmatchError {
  constructor(
    public readonly variant: string,
    public readonly expected: number,
    public readonly actual: number,
    public readonly phase: "construct" | "match"
  ) {
    super("E0200", { variant, expected, actual });
    this.name = "ArityMismatchError";
  }
}

export class FieldTypeError extends TagmatchError {
  constructor(
    public readonly variant: string,
    public readonly fieldIndex: number,
    public readonly fieldName: string,
    public readonly expected: string,
    public readonly actual: string
  ) {
    super("E0201", { index: fieldIndex, field: fieldName, variant, expected, actual });
    this.name = "FieldTypeError";
  }
}

// ─────────────────────────────────────────────────────────────────
// Matching
// ─────────────────────────────────────────────────────────────────

export class NoMatchError extends TagmatchError {
  constructor(
    public readonly subject: unknown,
    public readonly description: string
  ) {
    super("E0300", { subject: description });
    this.name = "NoMatchError";
  }
}

export class BindingError extends TagmatchError {
  constructor(
    public readonly bindingName: string,
    public readonly detail: string
  ) {
    super("E0301", { name: bindingName, detail });
    this.name = "BindingError";
  }
}

/**
 * Reported, never thrown: a clause placed after a catch-all can never run.
 */
export class UnreachableClauseWarning {
  readonly code = "W0001";

  constructor(
    public readonly clauseIndex: number,
    public readonly catchallIndex: number
  ) {}

  get message(): string {
    return this.toDiagnostic().message;
  }

  toDiagnostic(): Diagnostic {
    return makeDiagnostic(this.code, { index: this.clauseIndex, catchall: this.catchallIndex });
  }
}
