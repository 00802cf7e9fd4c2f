// src/core/adt/construct.ts
// Variant constructors: validate arity and field constraints, then build

import { ArityMismatchError, FieldTypeError } from "../errors";
import { checkConstraint, describeConstraint } from "./constraint";
import type { VariantDefinition } from "./types";
import { describeValue, makeTaggedValue, type TaggedValue } from "./value";

export type Constructor = (...args: unknown[]) => TaggedValue;

/**
 * Construction is all-or-nothing: the first violation (arity, then fields
 * left to right) throws and no value exists.
 */
export function constructVariant(def: VariantDefinition, args: readonly unknown[]): TaggedValue {
  if (args.length !== def.arity) {
    throw new ArityMismatchError(def.name, def.arity, args.length, "construct");
  }
  for (const [index, field] of def.fields.entries()) {
    const value = args[index];
    if (!checkConstraint(field.constraint, value)) {
      throw new FieldTypeError(def.name, index, field.name, describeConstraint(field.constraint), describeValue(value));
    }
  }
  return makeTaggedValue(def, args);
}

export function bindConstructor(def: VariantDefinition): Constructor {
  const construct: Constructor = (...args) => constructVariant(def, args);
  Object.defineProperty(construct, "name", { value: def.name });
  return construct;
}
