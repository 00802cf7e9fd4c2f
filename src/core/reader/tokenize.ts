// src/core/reader/tokenize.ts
// Lexer shared by pattern source and type declarations

import { ParseError, type SourceKind } from "../errors";

type Punct = "LParen" | "RParen" | "Comma" | "Pipe" | "Colon" | "Define" | "Scope" | "Zip" | "EOF";

export type Tok =
  | { tag: Punct; start: number; end: number }
  | { tag: "Num"; value: number | bigint; start: number; end: number }
  | { tag: "Str"; s: string; start: number; end: number }
  | { tag: "Ident"; s: string; start: number; end: number };

const ESCAPES: Record<string, string> = { n: "\n", t: "\t", r: "\r", "\\": "\\", "\"": "\"", "'": "'" };

const isWS = (c: string) => c === " " || c === "\t" || c === "\n" || c === "\r";
const isDigit = (c: string | undefined) => c !== undefined && c >= "0" && c <= "9";
const isIdentStart = (c: string | undefined) => c !== undefined && /[A-Za-z_]/.test(c);
const isIdentPart = (c: string | undefined) => c !== undefined && /[A-Za-z0-9_.]/.test(c);

export function tokenize(src: string, kind: SourceKind): Tok[] {
  const toks: Tok[] = [];
  let i = 0;

  const fail = (detail: string, start: number, end = start + 1): never => {
    throw new ParseError(kind, detail, { source: src, start, end });
  };

  while (i < src.length) {
    const c = src.charAt(i);
    const start = i;

    if (isWS(c)) { i++; continue; }

    if (c === "(") { toks.push({ tag: "LParen", start, end: ++i }); continue; }
    if (c === ")") { toks.push({ tag: "RParen", start, end: ++i }); continue; }
    if (c === ",") { toks.push({ tag: "Comma", start, end: ++i }); continue; }
    if (c === "|") { toks.push({ tag: "Pipe", start, end: ++i }); continue; }

    if (c === ":") {
      const next = src.charAt(i + 1);
      if (next === "=") { i += 2; toks.push({ tag: "Define", start, end: i }); continue; }
      if (next === ":") { i += 2; toks.push({ tag: "Scope", start, end: i }); continue; }
      toks.push({ tag: "Colon", start, end: ++i });
      continue;
    }

    if (c === "." && src.charAt(i + 1) === ".") {
      i += 2;
      toks.push({ tag: "Zip", start, end: i });
      continue;
    }

    if (c === "\"" || c === "'") {
      i++;
      let s = "";
      let closed = false;
      while (i < src.length) {
        const d = src.charAt(i);
        if (d === c) { i++; closed = true; break; }
        if (d === "\\") {
          const e = src.charAt(i + 1);
          s += ESCAPES[e] ?? e;
          i += 2;
          continue;
        }
        s += d;
        i++;
      }
      if (!closed) fail("unterminated string", start, src.length);
      toks.push({ tag: "Str", s, start, end: i });
      continue;
    }

    if (isDigit(c) || (c === "-" && isDigit(src.charAt(i + 1)))) {
      const m = /^-?\d+(\.\d+)?([eE][+-]?\d+)?(n)?/.exec(src.slice(i));
      if (!m) return fail("malformed number", start);
      const [lexeme, fraction, exponent, bigSuffix] = m;
      if (bigSuffix && (fraction || exponent)) fail("bigint literal must be an integer", start, start + lexeme.length);
      i += lexeme.length;
      const value = bigSuffix ? BigInt(lexeme.slice(0, -1)) : Number(lexeme);
      toks.push({ tag: "Num", value, start, end: i });
      continue;
    }

    if (isIdentStart(c)) {
      while (isIdentPart(src.charAt(i)) && !(src.charAt(i) === "." && src.charAt(i + 1) === ".")) i++;
      toks.push({ tag: "Ident", s: src.slice(start, i), start, end: i });
      continue;
    }

    fail(`unexpected character ${JSON.stringify(c)}`, start);
  }

  toks.push({ tag: "EOF", start: src.length, end: src.length });
  return toks;
}

export function describeTok(t: Tok): string {
  switch (t.tag) {
    case "Ident": return t.s;
    case "Str": return JSON.stringify(t.s);
    case "Num": return typeof t.value === "bigint" ? `${t.value}n` : String(t.value);
    case "LParen": return "'('";
    case "RParen": return "')'";
    case "Comma": return "','";
    case "Pipe": return "'|'";
    case "Colon": return "':'";
    case "Define": return "':='";
    case "Scope": return "'::'";
    case "Zip": return "'..'";
    case "EOF": return "end of input";
  }
}
