// src/core/pattern/compile.ts
// Pattern expressions -> pattern trees, resolved against the type registry

import { UnknownVariantError, UnreachableClauseWarning } from "../errors";
import type { VariantDefinition } from "../adt/types";
import type { MatchEnv } from "../match/env";
import { CATCHALL_TOKEN, WILDCARD_TOKEN, parsePattern } from "./parse";
import type { PatternExpr, PatternNode, PatternTree } from "./types";

/** The registry surface the compiler reads. */
export interface VariantLookup {
  readonly generation: number;
  lookupVariant(name: string): VariantDefinition | undefined;
  isNullary(name: string): boolean;
}

export type Handler<R> = (env: MatchEnv) => R;

export type Clause<R> = readonly [pattern: PatternExpr, handler: Handler<R>];

export interface CompiledClauses {
  /** Trees for the reachable clauses, in declaration order. */
  readonly trees: readonly PatternTree[];
  readonly warnings: readonly UnreachableClauseWarning[];
  /** Registry generation the trees were resolved against. */
  readonly generation: number;
}

function toNode(expr: PatternExpr): PatternNode {
  if (typeof expr === "string") return parsePattern(expr);
  if (expr === null || typeof expr !== "object") return { tag: "Lit", value: expr };
  return expr;
}

export function compilePattern(expr: PatternExpr, registry: VariantLookup): PatternTree {
  const node = toNode(expr);
  switch (node.tag) {
    case "Wild":
      return { tag: "Wildcard" };
    case "Otherwise":
      return { tag: "Catchall" };
    case "Lit":
      return { tag: "Literal", value: node.value };
    case "Name":
      if (node.name === WILDCARD_TOKEN) return { tag: "Wildcard" };
      if (node.name === CATCHALL_TOKEN) return { tag: "Catchall" };
      if (registry.isNullary(node.name)) return { tag: "Constructor", variant: node.name, subpatterns: [] };
      return { tag: "Bind", name: node.name };
    case "Apply": {
      const def = registry.lookupVariant(node.variant);
      if (!def || (node.type !== undefined && def.typeName !== node.type)) {
        throw new UnknownVariantError(node.variant, node.type);
      }
      // arity is checked against the subject at match time
      return {
        tag: "Constructor",
        type: node.type,
        variant: node.variant,
        subpatterns: node.args.map(arg => compilePattern(arg, registry)),
      };
    }
    case "Zip":
      return { tag: "Tuple", subpatterns: node.items.map(item => compilePattern(item, registry)) };
  }
}

/**
 * Compile an ordered clause list. Compilation stops at the first top-level
 * catch-all; every clause after it is reported as unreachable and never
 * compiled.
 */
export function compileClauses<R>(clauses: readonly Clause<R>[], registry: VariantLookup): CompiledClauses {
  const trees: PatternTree[] = [];
  const warnings: UnreachableClauseWarning[] = [];

  for (const [index, [pattern]] of clauses.entries()) {
    const tree = compilePattern(pattern, registry);
    trees.push(tree);
    if (tree.tag === "Catchall") {
      for (let later = index + 1; later < clauses.length; later++) {
        warnings.push(new UnreachableClauseWarning(later, index));
      }
      break;
    }
  }

  return { trees, warnings, generation: registry.generation };
}

// ─────────────────────────────────────────────────────────────────
// Clause cache
// ─────────────────────────────────────────────────────────────────

export type CacheStats = {
  hits: number;
  misses: number;
};

/**
 * Compiled clause lists keyed by the identity of the clause array. An entry
 * compiled against an older registry generation is recompiled.
 */
export class ClauseCache {
  private entries = new WeakMap<object, CompiledClauses>();
  readonly stats: CacheStats = { hits: 0, misses: 0 };

  lookup(clauses: object, generation: number): CompiledClauses | undefined {
    const entry = this.entries.get(clauses);
    if (entry && entry.generation === generation) {
      this.stats.hits++;
      return entry;
    }
    this.stats.misses++;
    return undefined;
  }

  store(clauses: object, compiled: CompiledClauses): void {
    this.entries.set(clauses, compiled);
  }

  clear(): void {
    this.entries = new WeakMap();
    this.stats.hits = 0;
    this.stats.misses = 0;
  }
}
