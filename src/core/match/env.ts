// src/core/match/env.ts
// Binding environment handed to the winning clause's handler

import { isTaggedValue, describeValue, type TaggedValue } from "../adt/value";
import { BindingError } from "../errors";

export type Bindings = Map<string, unknown>;

/**
 * Read-only view of the names bound by one successful match.
 */
export class MatchEnv {
  private readonly values: ReadonlyMap<string, unknown>;

  constructor(bindings: Bindings) {
    this.values = new Map(bindings);
  }

  get size(): number {
    return this.values.size;
  }

  has(name: string): boolean {
    return this.values.has(name);
  }

  names(): string[] {
    return Array.from(this.values.keys());
  }

  /**
   * The bound value. Throws for a name the pattern did not bind.
   */
  get(name: string): unknown {
    if (!this.values.has(name)) throw new BindingError(name, "not bound by the matched pattern");
    return this.values.get(name);
  }

  number(name: string): number {
    const v = this.get(name);
    if (typeof v !== "number") throw this.kindError(name, "a number", v);
    return v;
  }

  text(name: string): string {
    const v = this.get(name);
    if (typeof v !== "string") throw this.kindError(name, "text", v);
    return v;
  }

  boolean(name: string): boolean {
    const v = this.get(name);
    if (typeof v !== "boolean") throw this.kindError(name, "a boolean", v);
    return v;
  }

  tagged(name: string): TaggedValue {
    const v = this.get(name);
    if (!isTaggedValue(v)) throw this.kindError(name, "a tagged value", v);
    return v;
  }

  toObject(): Record<string, unknown> {
    return Object.fromEntries(this.values);
  }

  private kindError(name: string, expected: string, actual: unknown): BindingError {
    return new BindingError(name, `expected ${expected}, got ${describeValue(actual)}`);
  }
}
