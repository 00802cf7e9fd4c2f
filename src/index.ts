// src/index.ts
// tagmatch - Public API
//
// Algebraic data types declared at runtime, deconstructed with ordered
// pattern-matching clauses.

// ═══════════════════════════════════════════════════════════════════════════════
// RUNTIME
// ═══════════════════════════════════════════════════════════════════════════════

export {
  MatchRuntime,
  type MatchRuntimeOptions,
  getDefaultRuntime,
  resetDefaultRuntime,
  define,
  defineFromSource,
  construct,
  compile,
  matchOne,
  dispatch,
} from "./runtime";

// ═══════════════════════════════════════════════════════════════════════════════
// TYPES & VALUES
// ═══════════════════════════════════════════════════════════════════════════════

export { TypeRegistry, type DefinedType, type RegistryOptions } from "./core/adt/registry";
export { bindConstructor, constructVariant, type Constructor } from "./core/adt/construct";
export { parseDeclaration, type Declaration } from "./core/adt/declare";
export {
  type FieldConstraint,
  BUILTIN_CONSTRAINTS,
  anyConstraint,
  predicate,
  ofType,
  resolveConstraint,
  checkConstraint,
  describeConstraint,
} from "./core/adt/constraint";
export type {
  ConstraintInput,
  FieldSpecInput,
  VariantSpecInput,
  VariantNameOf,
  FieldDefinition,
  VariantDefinition,
  TypeDefinition,
} from "./core/adt/types";
export { type TaggedValue, isTaggedValue, valuesEqual, fieldOf, describeValue } from "./core/adt/value";

// ═══════════════════════════════════════════════════════════════════════════════
// PATTERNS & MATCHING
// ═══════════════════════════════════════════════════════════════════════════════

export {
  type PatternExpr,
  type PatternNode,
  type PatternTree,
  name,
  ctor,
  typed,
  lit,
  tuple,
  wildcard,
  otherwise,
} from "./core/pattern/types";
export { parsePattern, RESERVED_WORDS } from "./core/pattern/parse";
export {
  compilePattern,
  compileClauses,
  ClauseCache,
  type Clause,
  type Handler,
  type CompiledClauses,
  type CacheStats,
  type VariantLookup,
} from "./core/pattern/compile";
export { matchPattern, matchCompiled, invokeHandler, type MatchResult } from "./core/match/matcher";
export { MatchEnv, type Bindings } from "./core/match/env";
export { zipSubjects, isTupleSubject, type TupleSubject } from "./core/match/tuple";

// ═══════════════════════════════════════════════════════════════════════════════
// ERRORS & DIAGNOSTICS
// ═══════════════════════════════════════════════════════════════════════════════

export {
  TagmatchError,
  ParseError,
  DuplicateVariantError,
  ReservedNameError,
  UnknownVariantError,
  ArityMismatchError,
  FieldTypeError,
  NoMatchError,
  BindingError,
  UnreachableClauseWarning,
} from "./core/errors";
export { DIAGNOSTIC_CODES, makeDiagnostic, type DiagnosticCode } from "./outcome/codes";
export type { Diagnostic, DiagnosticSeverity, Span } from "./outcome/diagnostic";
export {
  consoleSink,
  collectingSink,
  silentSink,
  type DiagnosticSink,
  type CollectingSink,
  type LogLevel,
} from "./ports/diagnostics";

// ═══════════════════════════════════════════════════════════════════════════════
// CONFIGURATION
// ═══════════════════════════════════════════════════════════════════════════════

export * from "./core/config";
