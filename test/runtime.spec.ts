// test/runtime.spec.ts
// Tests for MatchRuntime and the default runtime

import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { describe, it, expect, beforeEach, vi } from "vitest";
import { UnknownVariantError } from "../src/core/errors";
import { isTupleSubject } from "../src/core/match/tuple";
import type { Clause } from "../src/core/pattern/compile";
import { collectingSink, type CollectingSink } from "../src/ports/diagnostics";
import {
  MatchRuntime,
  compile,
  construct,
  define,
  defineFromSource,
  dispatch,
  getDefaultRuntime,
  matchOne,
  resetDefaultRuntime,
} from "../src/runtime";

describe("MatchRuntime", () => {
  let sink: CollectingSink;
  let rt: MatchRuntime;

  beforeEach(() => {
    sink = collectingSink();
    rt = new MatchRuntime({ sink });
  });

  it("defines types from source and dispatches on them", () => {
    const nat = rt.defineFromSource("num := ZERO | ONE(x : numeric) | TWO(x : numeric, y : numeric)");
    const clauses: Clause<number>[] = [
      ["ZERO", () => 0],
      ["ONE(x)", env => env.number("x")],
      ["TWO(x, y)", env => env.number("x") + env.number("y")],
    ];
    expect(rt.dispatch(nat.ctor("ONE")(5), clauses)).toBe(5);
    expect(rt.dispatch(rt.construct("TWO", 1, 2), clauses)).toBe(3);
    expect(rt.matchOne(nat.nullary("ZERO"), clauses).index).toBe(0);
  });

  it("hands out constructors by variant name", () => {
    rt.define("list", ["NIL", { name: "CONS", fields: ["car", "cdr"] }]);
    const cons = rt.ctor("CONS");
    expect(cons(1, rt.construct("NIL")).variant).toBe("CONS");
    expect(() => rt.ctor("NOPE")).toThrow(UnknownVariantError);
  });

  it("rebuilds values", () => {
    rt.defineFromSource("point := P(x : numeric, y : numeric)");
    const p = rt.construct("P", 1, 2);
    expect(rt.rebuild(p, { y: 5 }).fields).toEqual([1, 5]);
  });

  it("zips subjects", () => {
    expect(isTupleSubject(rt.zip(1, 2))).toBe(true);
  });

  it("compiles single patterns against its registry", () => {
    rt.define("flag", ["ON"]);
    expect(rt.compile("ON")).toEqual({ tag: "Constructor", variant: "ON", subpatterns: [] });
  });

  describe("clause cache", () => {
    it("reuses compiled clauses for the same array", () => {
      rt.define("flag", ["ON", "OFF"]);
      const clauses: Clause<boolean>[] = [
        ["ON", () => true],
        ["OFF", () => false],
      ];
      rt.dispatch(rt.construct("ON"), clauses);
      rt.dispatch(rt.construct("OFF"), clauses);
      expect(rt.cache.stats).toEqual({ hits: 1, misses: 1 });

      rt.define("other", ["X"]);
      rt.dispatch(rt.construct("ON"), clauses);
      expect(rt.cache.stats).toEqual({ hits: 1, misses: 2 });
    });

    it("re-resolves names after the registry changes", () => {
      const clauses: Clause<string>[] = [
        ["RED", () => "red"],
        ["other", () => "bound"],
      ];
      expect(rt.dispatch("x", clauses)).toBe("red");
      rt.define("colour", ["RED", "GREEN"]);
      expect(rt.dispatch("x", clauses)).toBe("bound");
      expect(rt.dispatch(rt.construct("RED"), clauses)).toBe("red");
    });

    it("can be switched off", () => {
      const uncached = new MatchRuntime({ sink, config: { matcher: { cacheCompiled: false } } });
      const clauses: Clause<number>[] = [["_", () => 1]];
      uncached.dispatch(1, clauses);
      uncached.dispatch(2, clauses);
      expect(uncached.cache.stats).toEqual({ hits: 0, misses: 0 });
    });
  });

  describe("diagnostics", () => {
    const clauses: Clause<number>[] = [
      ["otherwise", () => 0],
      ["_", () => 1],
    ];

    it("reports unreachable clauses once per compilation", () => {
      expect(rt.dispatch(5, clauses)).toBe(0);
      rt.dispatch(6, clauses);
      expect(sink.diagnostics).toHaveLength(1);
      expect(sink.diagnostics[0]?.code).toBe("W0001");
      expect(sink.diagnostics[0]?.message).toBe("Unreachable clause 1: follows catch-all at clause 0");
    });

    it("does not report unreachable clauses when disabled", () => {
      const quiet = new MatchRuntime({ sink, config: { matcher: { reportUnreachable: false } } });
      quiet.dispatch(5, clauses);
      expect(sink.diagnostics).toEqual([]);
    });

    it("reports variant shadowing", () => {
      rt.define("a", ["X"]);
      rt.define("b", ["X"]);
      expect(sink.diagnostics.map(d => d.code)).toEqual(["W0002"]);
    });

    it("passes the shadowing switch to its registry", () => {
      const quiet = new MatchRuntime({ sink, config: { registry: { reportShadowing: false } } });
      quiet.define("a", ["X"]);
      quiet.define("b", ["X"]);
      expect(sink.diagnostics).toEqual([]);
    });
  });
});

describe("default runtime", () => {
  let sink: CollectingSink;

  beforeEach(() => {
    sink = collectingSink();
    resetDefaultRuntime({ sink });
  });

  it("is shared until reset", () => {
    const rt = getDefaultRuntime();
    expect(getDefaultRuntime()).toBe(rt);
    expect(resetDefaultRuntime({ sink })).not.toBe(rt);
  });

  it("reads tagmatch.config.json from the working directory", () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), "tagmatch-runtime-"));
    try {
      fs.writeFileSync(path.join(dir, "tagmatch.config.json"), JSON.stringify({ matcher: { cacheCompiled: false } }));
      vi.spyOn(process, "cwd").mockReturnValue(dir);

      resetDefaultRuntime();
      expect(getDefaultRuntime().config.matcher.cacheCompiled).toBe(false);
      expect(getDefaultRuntime().config.matcher.reportUnreachable).toBe(true);
    } finally {
      vi.restoreAllMocks();
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });

  it("backs the module-level functions", () => {
    define("num", ["ZERO", { name: "ONE", fields: ["x"] }]);
    defineFromSource("colour := RED | GREEN");

    const clauses: Clause<string>[] = [
      ["ONE(x)", env => `one ${env.number("x")}`],
      ["RED", () => "red"],
      ["otherwise", () => "other"],
    ];
    expect(dispatch(construct("ONE", 4), clauses)).toBe("one 4");
    expect(dispatch(construct("RED"), clauses)).toBe("red");
    expect(matchOne(construct("ZERO"), clauses).index).toBe(2);
    expect(compile("GREEN")).toEqual({ tag: "Constructor", variant: "GREEN", subpatterns: [] });
    expect(getDefaultRuntime().registry.typeNames()).toEqual(["num", "colour"]);
  });
});
