// src/core/pattern/types.ts
// Pattern expressions (what callers write) and pattern trees (what the matcher runs)

// ─────────────────────────────────────────────────────────────────
// Pattern expressions
// ─────────────────────────────────────────────────────────────────

/**
 * Uncompiled pattern.
 *
 * A string is pattern source text (`"CONS(_, rest)"`, `"otherwise"`,
 * `"\"text\""`); numbers, bigints, booleans and null are literals; objects
 * come from the builders below.
 */
export type PatternExpr = string | number | bigint | boolean | null | PatternNode;

export type PatternNode =
  | { readonly tag: "Name"; readonly name: string }
  | { readonly tag: "Apply"; readonly type?: string; readonly variant: string; readonly args: readonly PatternExpr[] }
  | { readonly tag: "Lit"; readonly value: unknown }
  | { readonly tag: "Wild" }
  | { readonly tag: "Otherwise" }
  | { readonly tag: "Zip"; readonly items: readonly PatternExpr[] };

/** A bare identifier: a nullary variant if one is registered, else a binder. */
export function name(n: string): PatternNode {
  return { tag: "Name", name: n };
}

export function ctor(variant: string, ...args: PatternExpr[]): PatternNode {
  return { tag: "Apply", variant, args };
}

/** Constructor pattern that also requires the subject's owning type. */
export function typed(type: string, variant: string, ...args: PatternExpr[]): PatternNode {
  return { tag: "Apply", type, variant, args };
}

/** Any value, including text and tagged values, compared structurally. */
export function lit(value: unknown): PatternNode {
  return { tag: "Lit", value };
}

export function tuple(...items: PatternExpr[]): PatternNode {
  return { tag: "Zip", items };
}

export const wildcard: PatternNode = { tag: "Wild" };

export const otherwise: PatternNode = { tag: "Otherwise" };

// ─────────────────────────────────────────────────────────────────
// Pattern trees
// ─────────────────────────────────────────────────────────────────

export type PatternTree =
  | { readonly tag: "Wildcard" }
  | { readonly tag: "Bind"; readonly name: string }
  | { readonly tag: "Literal"; readonly value: unknown }
  | { readonly tag: "Constructor"; readonly type?: string; readonly variant: string; readonly subpatterns: readonly PatternTree[] }
  | { readonly tag: "Tuple"; readonly subpatterns: readonly PatternTree[] }
  | { readonly tag: "Catchall" };
