// src/core/match/matcher.ts
// Structural matcher: first matching clause wins, no backtracking

import { describeValue, isTaggedValue, valuesEqual } from "../adt/value";
import { ArityMismatchError, NoMatchError } from "../errors";
import { compileClauses, type Clause, type CompiledClauses, type VariantLookup } from "../pattern/compile";
import type { PatternTree } from "../pattern/types";
import { MatchEnv, type Bindings } from "./env";
import { isTupleSubject } from "./tuple";

export type MatchResult = {
  /** Position of the winning clause in the clause list */
  index: number;
  env: MatchEnv;
};

/**
 * Match one tree against one subject, adding to `bindings`. A repeated
 * binder keeps the last value bound.
 */
export function matchPattern(tree: PatternTree, subject: unknown, bindings: Bindings): boolean {
  switch (tree.tag) {
    case "Wildcard":
    case "Catchall":
      return true;

    case "Bind":
      bindings.set(tree.name, subject);
      return true;

    case "Literal":
      return valuesEqual(tree.value, subject);

    case "Constructor": {
      if (!isTaggedValue(subject) || subject.variant !== tree.variant) return false;
      if (tree.type !== undefined && subject.type !== tree.type) return false;
      if (subject.fields.length !== tree.subpatterns.length) {
        throw new ArityMismatchError(tree.variant, subject.fields.length, tree.subpatterns.length, "match");
      }
      return matchFields(tree.subpatterns, subject.fields, bindings);
    }

    case "Tuple": {
      if (!isTupleSubject(subject)) return false;
      if (subject.items.length !== tree.subpatterns.length) {
        throw new ArityMismatchError("..", subject.items.length, tree.subpatterns.length, "match");
      }
      return matchFields(tree.subpatterns, subject.items, bindings);
    }
  }
}

function matchFields(patterns: readonly PatternTree[], fields: readonly unknown[], bindings: Bindings): boolean {
  for (const [i, p] of patterns.entries()) {
    if (!matchPattern(p, fields[i], bindings)) return false;
  }
  return true;
}

/**
 * Try compiled clauses in order. Each clause starts from an empty
 * environment, so a clause that fails halfway leaves nothing behind.
 */
export function matchCompiled(subject: unknown, compiled: CompiledClauses): MatchResult {
  for (const [index, tree] of compiled.trees.entries()) {
    const bindings: Bindings = new Map();
    if (matchPattern(tree, subject, bindings)) {
      return { index, env: new MatchEnv(bindings) };
    }
  }
  throw new NoMatchError(subject, describeValue(subject));
}

/**
 * Call the handler of the winning clause.
 */
export function invokeHandler<R>(clauses: readonly Clause<R>[], result: MatchResult): R {
  const clause = clauses[result.index];
  if (!clause) {
    throw new RangeError(`clause ${result.index} is missing; clause lists must not change after compilation`);
  }
  const [, handler] = clause;
  return handler(result.env);
}

export function matchOne<R>(subject: unknown, clauses: readonly Clause<R>[], registry: VariantLookup): MatchResult {
  return matchCompiled(subject, compileClauses(clauses, registry));
}

/**
 * Compile, match and run the winning handler. No caching and no warning
 * reporting; `MatchRuntime.dispatch` adds both.
 */
export function dispatch<R>(subject: unknown, clauses: readonly Clause<R>[], registry: VariantLookup): R {
  return invokeHandler(clauses, matchOne(subject, clauses, registry));
}
