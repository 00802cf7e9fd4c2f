// src/core/adt/types.ts
// Declaration inputs and registered definitions

import type { FieldConstraint } from "./constraint";

// ─────────────────────────────────────────────────────────────────
// Declaration inputs
// ─────────────────────────────────────────────────────────────────

/** A constraint object, a constraint or type name, or a bare predicate. */
export type ConstraintInput = string | FieldConstraint | ((value: unknown) => boolean);

/** A bare field name is unconstrained. */
export type FieldSpecInput =
  | string
  | { readonly name: string; readonly constraint?: ConstraintInput };

/** A bare variant name declares a nullary variant. */
export type VariantSpecInput =
  | string
  | { readonly name: string; readonly fields?: readonly FieldSpecInput[] };

export type VariantNameOf<S> = S extends string
  ? S
  : S extends { readonly name: infer N extends string }
    ? N
    : never;

// ─────────────────────────────────────────────────────────────────
// Registered definitions (immutable once registered)
// ─────────────────────────────────────────────────────────────────

export interface FieldDefinition {
  readonly name: string;
  readonly constraint: FieldConstraint;
}

export interface VariantDefinition {
  readonly typeName: string;
  readonly name: string;
  readonly fields: readonly FieldDefinition[];
  readonly fieldNames: readonly string[];
  readonly arity: number;
}

export interface TypeDefinition {
  readonly name: string;
  readonly variants: readonly VariantDefinition[];
}
