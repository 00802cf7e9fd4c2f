// src/core/match/tuple.ts
// Tuple combinator: several subjects matched jointly in one call

const TUPLE_BRAND = Symbol("tagmatch.tuple");

export interface TupleSubject {
  readonly [TUPLE_BRAND]: true;
  readonly items: readonly unknown[];
}

/**
 * Wrap values positionally so that a `..(p1, ..., pn)` pattern can
 * decompose them in lock-step. The subjects are not copied.
 */
export function zipSubjects(...subjects: unknown[]): TupleSubject {
  return Object.freeze({ [TUPLE_BRAND]: true as const, items: Object.freeze(subjects) });
}

export function isTupleSubject(x: unknown): x is TupleSubject {
  return typeof x === "object" && x !== null && TUPLE_BRAND in x;
}
