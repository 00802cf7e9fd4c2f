// src/runtime.ts
// MatchRuntime - registry, compiler cache and diagnostics behind one API
//
// Usage:
//   import { MatchRuntime } from "tagmatch";
//
//   const rt = new MatchRuntime();
//   const nat = rt.defineFromSource("num := ZERO | ONE(x) | TWO(x, y)");
//   const n = rt.dispatch(nat.ctor("ONE")(5), [
//     ["ZERO", () => 0],
//     ["ONE(x)", env => env.number("x")],
//     ["TWO(x, y)", env => env.number("x") + env.number("y")],
//   ]);
//   console.log(n); // 5

import { parseDeclaration } from "./core/adt/declare";
import { TypeRegistry, type DefinedType } from "./core/adt/registry";
import type { Constructor } from "./core/adt/construct";
import type { VariantNameOf, VariantSpecInput } from "./core/adt/types";
import type { TaggedValue } from "./core/adt/value";
import { loadConfig, mergeConfigs, type PartialConfig, type TagmatchConfig } from "./core/config/config";
import { UnknownVariantError } from "./core/errors";
import { invokeHandler, matchCompiled, type MatchResult } from "./core/match/matcher";
import { zipSubjects, type TupleSubject } from "./core/match/tuple";
import { ClauseCache, compileClauses, compilePattern, type Clause, type CompiledClauses } from "./core/pattern/compile";
import type { PatternExpr, PatternTree } from "./core/pattern/types";
import { consoleSink, type DiagnosticSink } from "./ports/diagnostics";

export type MatchRuntimeOptions = {
  /** Merged over the defaults */
  config?: PartialConfig;
  /** Replaces the console sink; receives every warning unfiltered */
  sink?: DiagnosticSink;
};

export class MatchRuntime {
  readonly config: TagmatchConfig;
  readonly registry: TypeRegistry;
  readonly cache = new ClauseCache();
  private readonly sink: DiagnosticSink;

  constructor(options: MatchRuntimeOptions = {}) {
    this.config = mergeConfigs(options.config ?? {});
    this.sink = options.sink ?? consoleSink(this.config.diagnostics.minSeverity);
    this.registry = new TypeRegistry({
      sink: this.sink,
      reportShadowing: this.config.registry.reportShadowing,
    });
  }

  // ─────────────────────────────────────────────────────────────────
  // Types and values
  // ─────────────────────────────────────────────────────────────────

  define<const V extends readonly VariantSpecInput[]>(typeName: string, variants: V): DefinedType<VariantNameOf<V[number]>> {
    return this.registry.define(typeName, variants);
  }

  /**
   * Register a type from declaration text such as
   * `tree := L(elm : numeric) | T(left : tree, right : tree)`.
   */
  defineFromSource(source: string): DefinedType {
    const { typeName, variants } = parseDeclaration(source);
    return this.registry.define(typeName, variants);
  }

  construct(variant: string, ...args: unknown[]): TaggedValue {
    return this.registry.construct(variant, args);
  }

  /**
   * Constructor for a variant in the global namespace. The definition is
   * looked up again on every call, so a later re-definition takes effect.
   */
  ctor(variant: string): Constructor {
    if (!this.registry.lookupVariant(variant)) throw new UnknownVariantError(variant);
    return (...args) => this.registry.construct(variant, args);
  }

  rebuild(value: TaggedValue, updates: Readonly<Record<string, unknown>>): TaggedValue {
    return this.registry.rebuild(value, updates);
  }

  zip(...subjects: unknown[]): TupleSubject {
    return zipSubjects(...subjects);
  }

  // ─────────────────────────────────────────────────────────────────
  // Patterns and matching
  // ─────────────────────────────────────────────────────────────────

  compile(pattern: PatternExpr): PatternTree {
    return compilePattern(pattern, this.registry);
  }

  compileClauses<R>(clauses: readonly Clause<R>[]): CompiledClauses {
    const generation = this.registry.generation;
    const useCache = this.config.matcher.cacheCompiled;

    const cached = useCache ? this.cache.lookup(clauses, generation) : undefined;
    if (cached) return cached;

    const compiled = compileClauses(clauses, this.registry);
    if (this.config.matcher.reportUnreachable) {
      for (const warning of compiled.warnings) this.sink.report(warning.toDiagnostic());
    }
    if (useCache) this.cache.store(clauses, compiled);
    return compiled;
  }

  matchOne<R>(subject: unknown, clauses: readonly Clause<R>[]): MatchResult {
    return matchCompiled(subject, this.compileClauses(clauses));
  }

  /**
   * Run the handler of the first clause whose pattern matches `subject`.
   * Throws `NoMatchError` when none does.
   */
  dispatch<R>(subject: unknown, clauses: readonly Clause<R>[]): R {
    return invokeHandler(clauses, this.matchOne(subject, clauses));
  }
}

// ─────────────────────────────────────────────────────────────────
// Process-wide default runtime
// ─────────────────────────────────────────────────────────────────

let defaultRuntime: MatchRuntime | undefined;

/**
 * The shared runtime, created on first use from `TAGMATCH_*` environment
 * variables and the `tagmatch.config.*` file in the working directory.
 */
export function getDefaultRuntime(): MatchRuntime {
  defaultRuntime ??= new MatchRuntime({ config: loadConfig() });
  return defaultRuntime;
}

/**
 * Replace the shared runtime (for testing).
 */
export function resetDefaultRuntime(options?: MatchRuntimeOptions): MatchRuntime {
  defaultRuntime = new MatchRuntime(options ?? { config: loadConfig() });
  return defaultRuntime;
}

export function define<const V extends readonly VariantSpecInput[]>(typeName: string, variants: V): DefinedType<VariantNameOf<V[number]>> {
  return getDefaultRuntime().define(typeName, variants);
}

export function defineFromSource(source: string): DefinedType {
  return getDefaultRuntime().defineFromSource(source);
}

export function construct(variant: string, ...args: unknown[]): TaggedValue {
  return getDefaultRuntime().construct(variant, ...args);
}

export function compile(pattern: PatternExpr): PatternTree {
  return getDefaultRuntime().compile(pattern);
}

export function matchOne<R>(subject: unknown, clauses: readonly Clause<R>[]): MatchResult {
  return getDefaultRuntime().matchOne(subject, clauses);
}

export function dispatch<R>(subject: unknown, clauses: readonly Clause<R>[]): R {
  return getDefaultRuntime().dispatch(subject, clauses);
}
