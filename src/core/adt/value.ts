// src/core/adt/value.ts
// Tagged values: the runtime representation of a constructed variant

import { isTupleSubject } from "../match/tuple";
import type { VariantDefinition } from "./types";

const TAGGED_BRAND = Symbol("tagmatch.tagged");

export interface TaggedValue {
  readonly [TAGGED_BRAND]: true;
  readonly type: string;
  readonly variant: string;
  readonly fields: readonly unknown[];
  readonly fieldNames: readonly string[];
}

/**
 * Build the frozen value. Callers validate arity and constraints first.
 */
export function makeTaggedValue(def: VariantDefinition, fields: readonly unknown[]): TaggedValue {
  return Object.freeze({
    [TAGGED_BRAND]: true as const,
    type: def.typeName,
    variant: def.name,
    fields: Object.freeze([...fields]),
    fieldNames: def.fieldNames,
  });
}

export function isTaggedValue(x: unknown): x is TaggedValue {
  return typeof x === "object" && x !== null && TAGGED_BRAND in x;
}

/**
 * Structural equality. Tagged values and tuple subjects compare field by
 * field; anything else uses `===`.
 */
export function valuesEqual(a: unknown, b: unknown): boolean {
  if (isTaggedValue(a) || isTaggedValue(b)) {
    if (!isTaggedValue(a) || !isTaggedValue(b)) return false;
    if (a.type !== b.type || a.variant !== b.variant) return false;
    return itemsEqual(a.fields, b.fields);
  }
  if (isTupleSubject(a) || isTupleSubject(b)) {
    if (!isTupleSubject(a) || !isTupleSubject(b)) return false;
    return itemsEqual(a.items, b.items);
  }
  return a === b;
}

function itemsEqual(as: readonly unknown[], bs: readonly unknown[]): boolean {
  if (as.length !== bs.length) return false;
  for (let i = 0; i < as.length; i++) {
    if (!valuesEqual(as[i], bs[i])) return false;
  }
  return true;
}

/**
 * Read a field by its declared name.
 */
export function fieldOf(value: TaggedValue, name: string): unknown {
  const index = value.fieldNames.indexOf(name);
  if (index < 0) {
    throw new RangeError(`${value.variant} has no field named ${JSON.stringify(name)}`);
  }
  return value.fields[index];
}

/**
 * Short text for error messages: the tag of a tagged value, the literal
 * text of a leaf.
 */
export function describeValue(x: unknown): string {
  if (isTaggedValue(x)) return `${x.type}::${x.variant}`;
  if (isTupleSubject(x)) return `..(${x.items.map(describeValue).join(", ")})`;
  switch (typeof x) {
    case "string":
      return JSON.stringify(x);
    case "bigint":
      return `${x}n`;
    case "function":
      return "function";
    case "symbol":
      return x.toString();
    case "object":
      return x === null ? "null" : Array.isArray(x) ? "array" : "object";
    default:
      return String(x);
  }
}
