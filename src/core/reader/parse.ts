// src/core/reader/parse.ts
// Parser: tokens -> ParsedProgram.
// Loop brackets are checked against the innermost procedure body (named or
// anonymous) while parsing, so a `[` can never pair with a `]` across a
// `( ... )` boundary.

import type { Tok, Punct } from "./tokenize";
import { tokenize, describeTok } from "./tokenize";
import type {
  AnonymousProc,
  Instruction,
  ParsedProgram,
  ProcDecl,
  RegionDecl,
  RegionRef,
} from "../ast";
import type { Span } from "../span";
import { makeDiagnostic } from "../../outcome/codes";
import { BracketScopeError, ParseError } from "../errors";

type Scope =
  | { kind: "proc"; name: string }
  | { kind: "anon"; label: string; open: Span }
  | { kind: "loop"; open: Span };

function simpleInstruction(ch: Punct, span: Span): Instruction | null {
  switch (ch) {
    case "+": return { tag: "Inc", span };
    case "-": return { tag: "Dec", span };
    case ">": return { tag: "Right", span };
    case "<": return { tag: "Left", span };
    case "~": return { tag: "Reset", span };
    case ".": return { tag: "Output", span };
    case ",": return { tag: "Input", span };
    default: return null;
  }
}

export function parseProgram(toks: Tok[]): ParsedProgram {
  const regions: RegionDecl[] = [];
  const procedures: ProcDecl[] = [];
  const anonymous: AnonymousProc[] = [];
  let i = 0;
  let anonCount = 0;

  const peek = (): Tok => toks[Math.min(i, toks.length - 1)];
  const next = (): Tok => {
    const t = peek();
    if (t.tag !== "EOF") i++;
    return t;
  };

  function unexpected(expected: string, t: Tok): ParseError {
    return new ParseError(makeDiagnostic("E0100", { expected, actual: describeTok(t) }, t.span));
  }

  function isPunct(t: Tok, ch: Punct): boolean {
    return t.tag === "Punct" && t.ch === ch;
  }

  function expectPunct(ch: Punct): Tok {
    const t = next();
    if (!isPunct(t, ch)) throw unexpected(`'${ch}'`, t);
    return t;
  }

  function expectIdent(what: string): { s: string; span: Span } {
    const t = next();
    if (t.tag !== "Ident") throw unexpected(what, t);
    return t;
  }

  function parseRef(): RegionRef {
    const t = next();
    if (t.tag === "Ident") return { tag: "Named", name: t.s, span: t.span };
    if (isPunct(t, "$")) return { tag: "Back", span: t.span };
    throw unexpected("region name or '$'", t);
  }

  /** Optional `@<ref>` or bare `$` after a callee. */
  function parseClause(): RegionRef | null {
    const t = peek();
    if (isPunct(t, "@")) {
      next();
      return parseRef();
    }
    if (isPunct(t, "$")) {
      next();
      return { tag: "Back", span: t.span };
    }
    return null;
  }

  /**
   * Parse instructions until the terminator owned by `scopes[top]`. The
   * terminator itself is left for the caller; a terminator that belongs to a
   * different scope is an error reported against the innermost open scope.
   */
  function parseSequence(scopes: Scope[]): Instruction[] {
    const scope = scopes[scopes.length - 1];
    const out: Instruction[] = [];

    while (true) {
      const t = peek();

      if (t.tag === "EOF" || isPunct(t, ";") || isPunct(t, ")") || isPunct(t, "]")) {
        checkTerminator(scopes, scope, t);
        return out;
      }

      if (t.tag === "Hex") {
        next();
        out.push({ tag: "Quote", byte: t.byte, span: t.span });
        continue;
      }

      if (t.tag === "Ident") {
        next();
        const clause = parseClause();
        out.push({ tag: "Call", callee: { tag: "Named", name: t.s, span: t.span }, clause, span: t.span });
        continue;
      }

      if (t.tag !== "Punct") throw unexpected("instruction", t);

      const simple = simpleInstruction(t.ch, t.span);
      if (simple) {
        next();
        out.push(simple);
        continue;
      }

      switch (t.ch) {
        case "[": {
          next();
          scopes.push({ kind: "loop", open: t.span });
          const body = parseSequence(scopes);
          scopes.pop();
          expectPunct("]");
          out.push({ tag: "Loop", body, span: t.span });
          break;
        }
        case "(": {
          next();
          const proc: AnonymousProc = { label: anonLabel(scopes), body: [], span: t.span };
          anonymous.push(proc);
          scopes.push({ kind: "anon", label: proc.label, open: t.span });
          proc.body = parseSequence(scopes);
          scopes.pop();
          expectPunct(")");
          const clause = parseClause();
          out.push({ tag: "Call", callee: { tag: "Anonymous", proc }, clause, span: t.span });
          break;
        }
        case "^": {
          next();
          out.push({ tag: "Send", target: parseRef(), span: t.span });
          break;
        }
        case "&": {
          next();
          out.push({ tag: "Receive", target: parseRef(), span: t.span });
          break;
        }
        default:
          throw unexpected("instruction", t);
      }
    }
  }

  function checkTerminator(scopes: Scope[], scope: Scope, t: Tok): void {
    const owned =
      (scope.kind === "proc" && isPunct(t, ";")) ||
      (scope.kind === "anon" && isPunct(t, ")")) ||
      (scope.kind === "loop" && isPunct(t, "]"));
    if (owned) return;

    if (scope.kind === "loop") {
      throw new BracketScopeError(makeDiagnostic("E0101", { boundary: describeTok(t) }, scope.open));
    }
    if (isPunct(t, "]")) {
      const where = scope.kind === "anon" ? `anonymous procedure ${scope.label}` : `procedure ${scope.name}`;
      throw new BracketScopeError(makeDiagnostic("E0102", { scope: where }, t.span));
    }
    if (scope.kind === "anon") {
      throw new ParseError(makeDiagnostic("E0104", { actual: describeTok(t) }, scope.open));
    }
    if (isPunct(t, ")")) {
      throw new ParseError(makeDiagnostic("E0105", { name: procName(scopes) }, t.span));
    }
    throw unexpected("';'", t);
  }

  function procName(scopes: Scope[]): string {
    const root = scopes[0];
    return root.kind === "proc" ? root.name : "?";
  }

  function anonLabel(scopes: Scope[]): string {
    anonCount++;
    return `${procName(scopes)}#${anonCount}`;
  }

  function parseRegion(start: Span): RegionDecl {
    const name = expectIdent("region name");
    expectPunct("[");
    const size = next();
    if (size.tag !== "Int") throw unexpected("region size", size);
    const capacity = Number(size.s);
    if (capacity <= 0) {
      throw new ParseError(makeDiagnostic("E0103", { name: name.s }, size.span));
    }
    expectPunct("]");
    expectPunct(";");
    return { name: name.s, capacity, span: start };
  }

  function parseProc(start: Span): ProcDecl {
    const name = expectIdent("procedure name");
    expectPunct(":");
    anonCount = 0;
    const body = parseSequence([{ kind: "proc", name: name.s }]);
    expectPunct(";");
    return { name: name.s, body, span: start };
  }

  while (peek().tag !== "EOF") {
    const t = next();
    if (t.tag === "Ident" && t.s === "region") {
      regions.push(parseRegion(t.span));
    } else if (t.tag === "Ident" && t.s === "proc") {
      procedures.push(parseProc(t.span));
    } else {
      throw unexpected("'region' or 'proc'", t);
    }
  }

  return { regions, procedures, anonymous };
}

export function parseSource(src: string, filename?: string): ParsedProgram {
  return parseProgram(tokenize(src, filename));
}
