// src/core/adt/constraint.ts
// Field constraints: "any", a named predicate, or membership in a declared type

import { isTaggedValue } from "./value";
import type { ConstraintInput } from "./types";

export type FieldConstraint =
  | { readonly tag: "Any" }
  | { readonly tag: "Predicate"; readonly description: string; readonly test: (value: unknown) => boolean }
  | { readonly tag: "Type"; readonly typeName: string };

export const anyConstraint: FieldConstraint = { tag: "Any" };

export function predicate(description: string, test: (value: unknown) => boolean): FieldConstraint {
  return { tag: "Predicate", description, test };
}

export function ofType(typeName: string): FieldConstraint {
  return { tag: "Type", typeName };
}

const numeric = predicate("numeric", v => typeof v === "number");
const integer = predicate("integer", v => typeof v === "number" && Number.isInteger(v));
const text = predicate("text", v => typeof v === "string");
const boolean = predicate("boolean", v => typeof v === "boolean");
const fn = predicate("function", v => typeof v === "function");

export const BUILTIN_CONSTRAINTS: ReadonlyMap<string, FieldConstraint> = new Map([
  ["any", anyConstraint],
  ["numeric", numeric],
  ["integer", integer],
  ["text", text],
  ["character", text],
  ["string", text],
  ["boolean", boolean],
  ["logical", boolean],
  ["function", fn],
]);

/**
 * Names resolve to a built-in constraint first, otherwise to a type
 * constraint on the named type.
 */
export function resolveConstraint(input: ConstraintInput | undefined): FieldConstraint {
  if (input === undefined) return anyConstraint;
  if (typeof input === "function") {
    return predicate(input.name || "predicate", input);
  }
  if (typeof input === "string") {
    return BUILTIN_CONSTRAINTS.get(input) ?? ofType(input);
  }
  return input;
}

export function checkConstraint(constraint: FieldConstraint, value: unknown): boolean {
  switch (constraint.tag) {
    case "Any":
      return true;
    case "Predicate":
      return constraint.test(value);
    case "Type":
      return isTaggedValue(value) && value.type === constraint.typeName;
  }
}

export function describeConstraint(constraint: FieldConstraint): string {
  switch (constraint.tag) {
    case "Any":
      return "any";
    case "Predicate":
      return constraint.description;
    case "Type":
      return constraint.typeName;
  }
}
