// src/core/pattern/parse.ts
// Pattern source text -> pattern expression nodes

import { ParseError } from "../errors";
import { describeTok, tokenize, type Tok } from "../reader/tokenize";
import type { PatternExpr, PatternNode } from "./types";

export const WILDCARD_TOKEN = "_";
export const CATCHALL_TOKEN = "otherwise";

const BOOLEAN_WORDS: ReadonlyMap<string, boolean> = new Map([
  ["true", true],
  ["TRUE", true],
  ["false", false],
  ["FALSE", false],
]);

const NULL_WORDS = new Set(["null", "NULL"]);

/** Words that can never name a type, variant or field. */
export const RESERVED_WORDS: ReadonlySet<string> = new Set([
  WILDCARD_TOKEN,
  CATCHALL_TOKEN,
  ...BOOLEAN_WORDS.keys(),
  ...NULL_WORDS,
]);

export function parsePattern(src: string): PatternNode {
  const toks = tokenize(src, "pattern");
  const eof: Tok = { tag: "EOF", start: src.length, end: src.length };
  let i = 0;

  const peek = (): Tok => toks[i] ?? eof;
  const take = (): Tok => toks[i++] ?? eof;

  function fail(t: Tok, detail: string): never {
    throw new ParseError("pattern", detail, { source: src, start: t.start, end: t.end });
  }

  function expect(tag: Tok["tag"], what: string): void {
    const t = take();
    if (t.tag !== tag) fail(t, `expected ${what}, found ${describeTok(t)}`);
  }

  function expectIdent(what: string): string {
    const t = take();
    if (t.tag !== "Ident") fail(t, `expected ${what}, found ${describeTok(t)}`);
    return t.s;
  }

  // "(" has already been consumed
  function parseArgs(): PatternExpr[] {
    const args: PatternExpr[] = [];
    if (peek().tag === "RParen") {
      take();
      return args;
    }
    for (;;) {
      args.push(parseOne());
      const t = take();
      if (t.tag === "RParen") return args;
      if (t.tag !== "Comma") fail(t, `expected ',' or ')', found ${describeTok(t)}`);
    }
  }

  function parseOne(): PatternNode {
    const t = take();
    switch (t.tag) {
      case "Num":
        return { tag: "Lit", value: t.value };
      case "Str":
        return { tag: "Lit", value: t.s };
      case "Zip": {
        expect("LParen", "'(' after '..'");
        return { tag: "Zip", items: parseArgs() };
      }
      case "Ident":
        return parseIdent(t.s);
      default:
        return fail(t, `unexpected ${describeTok(t)}`);
    }
  }

  function parseIdent(word: string): PatternNode {
    if (word === WILDCARD_TOKEN) return { tag: "Wild" };
    if (word === CATCHALL_TOKEN) return { tag: "Otherwise" };
    const b = BOOLEAN_WORDS.get(word);
    if (b !== undefined) return { tag: "Lit", value: b };
    if (NULL_WORDS.has(word)) return { tag: "Lit", value: null };

    let type: string | undefined;
    let variant = word;
    if (peek().tag === "Scope") {
      take();
      type = word;
      variant = expectIdent("variant name after '::'");
    }

    if (peek().tag === "LParen") {
      take();
      return { tag: "Apply", type, variant, args: parseArgs() };
    }
    // T::V with no argument list names a nullary constructor explicitly
    if (type !== undefined) return { tag: "Apply", type, variant, args: [] };
    return { tag: "Name", name: word };
  }

  const node = parseOne();
  const rest = peek();
  if (rest.tag !== "EOF") fail(rest, `unexpected ${describeTok(rest)} after pattern`);
  return node;
}
