// test/core/match/tuple.spec.ts
// Tests for the tuple combinator

import { describe, it, expect, beforeEach } from "vitest";
import type { Constructor } from "../../../src/core/adt/construct";
import { TypeRegistry } from "../../../src/core/adt/registry";
import { isTaggedValue, valuesEqual, type TaggedValue } from "../../../src/core/adt/value";
import { ArityMismatchError } from "../../../src/core/errors";
import { dispatch, matchOne, matchPattern } from "../../../src/core/match/matcher";
import { isTupleSubject, zipSubjects } from "../../../src/core/match/tuple";
import { compilePattern, type Clause } from "../../../src/core/pattern/compile";

describe("zipSubjects", () => {
  it("wraps subjects without copying them", () => {
    const a = { id: 1 };
    const t = zipSubjects(a, 2);
    expect(isTupleSubject(t)).toBe(true);
    expect(t.items[0]).toBe(a);
    expect(t.items).toHaveLength(2);
    expect(Object.isFrozen(t)).toBe(true);
    expect(Object.isFrozen(t.items)).toBe(true);
    expect(isTupleSubject({ items: [] })).toBe(false);
  });
});

describe("tuple patterns", () => {
  let registry: TypeRegistry;
  let NIL: TaggedValue;
  let CONS: Constructor;

  beforeEach(() => {
    registry = new TypeRegistry();
    const list = registry.define("linked_list", [
      "NIL",
      { name: "CONS", fields: ["car", { name: "cdr", constraint: "linked_list" }] },
    ]);
    NIL = list.nullary("NIL");
    CONS = list.ctor("CONS");
  });

  it("decomposes several subjects jointly", () => {
    const { env } = matchOne(zipSubjects(CONS(1, NIL), CONS(2, NIL)), [["..(CONS(a, as), CONS(b, bs))", () => 0]], registry);
    expect(env.get("a")).toBe(1);
    expect(env.get("b")).toBe(2);
    expect(valuesEqual(env.get("as"), NIL)).toBe(true);
    expect(valuesEqual(env.get("bs"), NIL)).toBe(true);
    expect(env.names()).toEqual(["a", "as", "b", "bs"]);
  });

  it("succeeds exactly when every component matches", () => {
    const patterns = ["NIL", "CONS(h, _)", "_"];
    const subjects = [NIL, CONS(1, NIL)];
    const matches = (p: string, s: unknown) => matchPattern(compilePattern(p, registry), s, new Map());

    for (const p1 of patterns) {
      for (const p2 of patterns) {
        const joint = compilePattern(`..(${p1}, ${p2})`, registry);
        for (const s1 of subjects) {
          for (const s2 of subjects) {
            const expected = matches(p1, s1) && matches(p2, s2);
            expect(matchPattern(joint, zipSubjects(s1, s2), new Map())).toBe(expected);
          }
        }
      }
    }
  });

  it("does not match a value that is not a tuple", () => {
    const clauses: Clause<string>[] = [
      ["..(a, b)", () => "pair"],
      ["_", () => "single"],
    ];
    expect(dispatch(NIL, clauses, registry)).toBe("single");
    expect(dispatch(zipSubjects(1, 2), clauses, registry)).toBe("pair");
  });

  it("throws on a tuple of the wrong length", () => {
    expect(() => dispatch(zipSubjects(1, 2, 3), [["..(a, b)", () => 0]], registry)).toThrow(ArityMismatchError);
    expect(() => dispatch(zipSubjects(1, 2, 3), [["..(a, b)", () => 0]], registry)).toThrow(
      "Wrong number of fields for ..: expected 3, got 2"
    );
  });

  it("binds the whole tuple to a bare name", () => {
    const t = zipSubjects(1, 2);
    const { env } = matchOne(t, [["pair", () => 0]], registry);
    expect(env.get("pair")).toBe(t);
  });

  it("drives a recursive comparison of two lists", () => {
    const equalLists = (xs: unknown, ys: unknown): boolean =>
      dispatch(zipSubjects(xs, ys), [
        ["..(NIL, NIL)", () => true],
        ["..(CONS(x, xt), CONS(y, yt))", env => env.get("x") === env.get("y") && equalLists(env.get("xt"), env.get("yt"))],
        ["otherwise", () => false],
      ], registry);

    const list = (...items: number[]) => items.reduceRight<TaggedValue>((acc, x) => CONS(x, acc), NIL);

    expect(equalLists(list(1, 2, 3), list(1, 2, 3))).toBe(true);
    expect(equalLists(list(1, 2, 3), list(1, 2))).toBe(false);
    expect(equalLists(list(1, 2), list(1, 3))).toBe(false);
    expect(isTaggedValue(list())).toBe(true);
  });
});
