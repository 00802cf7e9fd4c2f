// src/core/adt/declare.ts
// Textual type declarations:
//   linked_list := NIL | CONS(car, cdr : linked_list)

import { ParseError } from "../errors";
import { describeTok, tokenize, type Tok } from "../reader/tokenize";
import type { FieldSpecInput, VariantSpecInput } from "./types";

export type Declaration = {
  typeName: string;
  variants: VariantSpecInput[];
};

export function parseDeclaration(src: string): Declaration {
  const toks = tokenize(src, "declaration");
  const eof: Tok = { tag: "EOF", start: src.length, end: src.length };
  let i = 0;

  const peek = (): Tok => toks[i] ?? eof;
  const take = (): Tok => toks[i++] ?? eof;

  function fail(t: Tok, detail: string): never {
    throw new ParseError("declaration", detail, { source: src, start: t.start, end: t.end });
  }

  function ident(what: string): string {
    const t = take();
    if (t.tag !== "Ident") fail(t, `expected ${what}, found ${describeTok(t)}`);
    return t.s;
  }

  function field(): FieldSpecInput {
    const name = ident("field name");
    if (peek().tag !== "Colon") return name;
    take();
    return { name, constraint: ident("constraint or type name after ':'") };
  }

  function variant(): VariantSpecInput {
    const name = ident("variant name");
    if (peek().tag !== "LParen") return name;
    take();
    const fields: FieldSpecInput[] = [];
    if (peek().tag === "RParen") {
      take();
      return { name, fields };
    }
    for (;;) {
      fields.push(field());
      const t = take();
      if (t.tag === "RParen") return { name, fields };
      if (t.tag !== "Comma") fail(t, `expected ',' or ')', found ${describeTok(t)}`);
    }
  }

  const typeName = ident("type name");
  const def = take();
  if (def.tag !== "Define") fail(def, `expected ':=', found ${describeTok(def)}`);

  const variants = [variant()];
  while (peek().tag === "Pipe") {
    take();
    variants.push(variant());
  }

  const rest = peek();
  if (rest.tag !== "EOF") fail(rest, `unexpected ${describeTok(rest)}`);
  return { typeName, variants };
}
