// src/core/adt/registry.ts
// Type registry: type name -> ordered variant definitions, plus a global
// variant namespace used by the pattern compiler

import { makeDiagnostic } from "../../outcome/codes";
import { silentSink, type DiagnosticSink } from "../../ports/diagnostics";
import { DuplicateVariantError, ReservedNameError, UnknownVariantError, type NameRole } from "../errors";
import { RESERVED_WORDS } from "../pattern/parse";
import { resolveConstraint } from "./constraint";
import { bindConstructor, constructVariant, type Constructor } from "./construct";
import type {
  FieldDefinition,
  FieldSpecInput,
  TypeDefinition,
  VariantDefinition,
  VariantNameOf,
  VariantSpecInput,
} from "./types";
import type { TaggedValue } from "./value";

export interface DefinedType<N extends string = string> {
  readonly name: string;
  readonly definition: TypeDefinition;
  /** Constructor for one of this type's variants. */
  ctor(variant: N): Constructor;
  /** The value of a nullary variant. */
  nullary(variant: N): TaggedValue;
}

export type RegistryOptions = {
  /** Receives W0002 when a variant name moves to another type */
  sink?: DiagnosticSink;
  reportShadowing?: boolean;
};

const IDENT = /^[A-Za-z_][A-Za-z0-9_.]*$/;

function checkName(role: NameRole, name: string): void {
  if (!IDENT.test(name) || name.includes("..") || RESERVED_WORDS.has(name)) {
    throw new ReservedNameError(role, name);
  }
}

function normalizeField(spec: FieldSpecInput): FieldDefinition {
  const field = typeof spec === "string" ? { name: spec, constraint: undefined } : spec;
  checkName("field", field.name);
  return Object.freeze({ name: field.name, constraint: resolveConstraint(field.constraint) });
}

function normalizeVariant(typeName: string, spec: VariantSpecInput): VariantDefinition {
  const variantName = typeof spec === "string" ? spec : spec.name;
  const fieldSpecs: readonly FieldSpecInput[] = typeof spec === "string" ? [] : spec.fields ?? [];
  checkName("variant", variantName);
  const fields = Object.freeze(fieldSpecs.map(normalizeField));
  return Object.freeze({
    typeName,
    name: variantName,
    fields,
    fieldNames: Object.freeze(fields.map(f => f.name)),
    arity: fields.length,
  });
}

export class TypeRegistry {
  private readonly types = new Map<string, TypeDefinition>();
  private readonly variants = new Map<string, VariantDefinition>();
  private gen = 0;
  private readonly sink: DiagnosticSink;
  private readonly reportShadowing: boolean;

  constructor(options: RegistryOptions = {}) {
    this.sink = options.sink ?? silentSink;
    this.reportShadowing = options.reportShadowing ?? true;
  }

  /**
   * Bumped by every successful `define` and by `reset`. Compiled patterns
   * are only valid for the generation they were compiled against.
   */
  get generation(): number {
    return this.gen;
  }

  /**
   * Register (or replace) a type. Validation happens before any table is
   * touched, so a failed call leaves the registry unchanged.
   */
  define<const V extends readonly VariantSpecInput[]>(
    typeName: string,
    specs: V
  ): DefinedType<VariantNameOf<V[number]>> {
    checkName("type", typeName);

    const defs: VariantDefinition[] = [];
    const seen = new Set<string>();
    for (const spec of specs) {
      const def = normalizeVariant(typeName, spec);
      if (seen.has(def.name)) throw new DuplicateVariantError(typeName, def.name);
      seen.add(def.name);
      defs.push(def);
    }

    const previous = this.types.get(typeName);
    if (previous) {
      for (const old of previous.variants) {
        if (this.variants.get(old.name)?.typeName === typeName) this.variants.delete(old.name);
      }
    }

    for (const def of defs) {
      const owner = this.variants.get(def.name);
      if (owner && owner.typeName !== typeName && this.reportShadowing) {
        this.sink.report(makeDiagnostic("W0002", { variant: def.name, previous: owner.typeName, type: typeName }));
      }
      this.variants.set(def.name, def);
    }

    const definition: TypeDefinition = Object.freeze({ name: typeName, variants: Object.freeze(defs) });
    this.types.set(typeName, definition);
    this.gen++;

    return definedType<VariantNameOf<V[number]>>(definition);
  }

  lookupType(name: string): TypeDefinition | undefined {
    return this.types.get(name);
  }

  /** Variant names are global: dispatch looks at the tag alone. */
  lookupVariant(name: string): VariantDefinition | undefined {
    return this.variants.get(name);
  }

  isNullary(name: string): boolean {
    return this.variants.get(name)?.arity === 0;
  }

  typeNames(): string[] {
    return Array.from(this.types.keys());
  }

  /**
   * Construct by variant name through the global namespace.
   */
  construct(variant: string, args: readonly unknown[]): TaggedValue {
    const def = this.variants.get(variant);
    if (!def) throw new UnknownVariantError(variant);
    return constructVariant(def, args);
  }

  /**
   * A new value of the same variant with some fields replaced. The result is
   * validated like any other construction; `value` is left untouched.
   */
  rebuild(value: TaggedValue, updates: Readonly<Record<string, unknown>>): TaggedValue {
    const def = this.types.get(value.type)?.variants.find(v => v.name === value.variant);
    if (!def) throw new UnknownVariantError(value.variant, value.type);
    if (!sameFields(def.fieldNames, value.fieldNames)) {
      throw new RangeError(`${value.type}::${value.variant} was built under a definition that has since been replaced`);
    }

    for (const key of Object.keys(updates)) {
      if (!def.fieldNames.includes(key)) {
        throw new RangeError(`${def.name} has no field named ${JSON.stringify(key)}`);
      }
    }
    const args = def.fieldNames.map((field, i) => (field in updates ? updates[field] : value.fields[i]));
    return constructVariant(def, args);
  }

  /**
   * Drop every registered type (for testing).
   */
  reset(): void {
    this.types.clear();
    this.variants.clear();
    this.gen++;
  }
}

function sameFields(a: readonly string[], b: readonly string[]): boolean {
  return a.length === b.length && a.every((name, i) => name === b[i]);
}

function definedType<N extends string>(definition: TypeDefinition): DefinedType<N> {
  const ctors = new Map<string, Constructor>(definition.variants.map((v): [string, Constructor] => [v.name, bindConstructor(v)]));

  const ctor = (variant: string): Constructor => {
    const c = ctors.get(variant);
    if (!c) throw new UnknownVariantError(variant, definition.name);
    return c;
  };

  return {
    name: definition.name,
    definition,
    ctor,
    nullary: variant => ctor(variant)(),
  };
}
