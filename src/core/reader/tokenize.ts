// src/core/reader/tokenize.ts
// Lexer: source text -> tokens with spans

import { makeDiagnostic } from "../../outcome/codes";
import { LexError } from "../errors";
import type { Span } from "../span";

export type Punct =
  | ";" | ":" | "[" | "]" | "(" | ")" | "@" | "$"
  | "+" | "-" | ">" | "<" | "." | "," | "~" | "^" | "&";

export type Tok =
  | { tag: "Ident"; s: string; span: Span }
  | { tag: "Int"; s: string; span: Span }
  | { tag: "Hex"; byte: number; span: Span }
  | { tag: "Punct"; ch: Punct; span: Span }
  | { tag: "EOF"; span: Span };

const PUNCT = new Set<string>([";", ":", "[", "]", "(", ")", "@", "$", "+", "-", ">", "<", ".", ",", "~", "^", "&"]);

function isPunct(c: string): c is Punct {
  return PUNCT.has(c);
}

const isWS = (c: string) =>
  c === " " || c === "\t" || c === "\n" || c === "\r" || c === "\f" || c === "\v";
const isDigit = (c: string) => c >= "0" && c <= "9";
const isIdentStart = (c: string) => (c >= "a" && c <= "z") || (c >= "A" && c <= "Z") || c === "_";
const isIdentChar = (c: string) => isIdentStart(c) || isDigit(c);
const isHexDigit = (c: string) => isDigit(c) || (c >= "a" && c <= "f") || (c >= "A" && c <= "F");

export function tokenize(src: string, filename = "<input>"): Tok[] {
  const toks: Tok[] = [];
  // byte order mark
  let i = src.startsWith("\uFEFF") ? 1 : 0;
  let line = 1;
  let col = 1;

  const here = (): Span => ({ file: filename, line, col });

  function advance(): string {
    const c = src[i++];
    if (c === "\n") {
      line++;
      col = 1;
    } else {
      col++;
    }
    return c;
  }

  while (i < src.length) {
    const c = src[i];

    // comments
    if (c === "#") {
      while (i < src.length && src[i] !== "\n") advance();
      continue;
    }

    if (isWS(c)) { advance(); continue; }

    const span = here();

    if (c === "\"") {
      advance();
      const digits = src.slice(i, i + 2);
      if (digits.length !== 2 || !isHexDigit(digits[0]) || !isHexDigit(digits[1])) {
        const found = digits.length === 0 ? "end of input" : JSON.stringify(digits);
        throw new LexError(makeDiagnostic("E0002", { found }, span));
      }
      advance();
      advance();
      toks.push({ tag: "Hex", byte: parseInt(digits, 16), span });
      continue;
    }

    if (isPunct(c)) {
      advance();
      toks.push({ tag: "Punct", ch: c, span });
      continue;
    }

    if (isDigit(c)) {
      let s = "";
      while (i < src.length && isDigit(src[i])) s += advance();
      if (i < src.length && isIdentStart(src[i])) {
        throw new LexError(makeDiagnostic("E0003", { digits: s }, here()));
      }
      toks.push({ tag: "Int", s, span });
      continue;
    }

    if (isIdentStart(c)) {
      let s = "";
      while (i < src.length && isIdentChar(src[i])) s += advance();
      toks.push({ tag: "Ident", s, span });
      continue;
    }

    throw new LexError(makeDiagnostic("E0001", { char: JSON.stringify(c) }, span));
  }

  toks.push({ tag: "EOF", span: here() });
  return toks;
}

/** Human-readable token text for diagnostics. */
export function describeTok(t: Tok): string {
  switch (t.tag) {
    case "Ident": return `identifier '${t.s}'`;
    case "Int": return `integer ${t.s}`;
    case "Hex": return `literal "${t.byte.toString(16).toUpperCase().padStart(2, "0")}`;
    case "Punct": return `'${t.ch}'`;
    case "EOF": return "end of input";
  }
}
