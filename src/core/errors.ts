// src/core/errors.ts
// Error taxonomy for loading and running cae programs.
// Every error carries exactly one diagnostic; the message is the diagnostic's
// message followed by its position.

import type { Diagnostic } from "../outcome/diagnostic";
import { makeDiagnostic } from "../outcome/codes";
import type { Span } from "./span";
import { formatSpan } from "./span";

export type SymbolKind = "region" | "procedure";

export class CaeError extends Error {
  constructor(public readonly diagnostic: Diagnostic) {
    super(diagnostic.span ? `${diagnostic.message} (${formatSpan(diagnostic.span)})` : diagnostic.message);
    this.name = "CaeError";
  }

  get code(): string {
    return this.diagnostic.code;
  }

  get span(): Span | undefined {
    return this.diagnostic.span;
  }
}

// ─────────────────────────────────────────────────────────────────
// Load-time errors
// ─────────────────────────────────────────────────────────────────

export class LexError extends CaeError {
  constructor(diagnostic: Diagnostic) {
    super(diagnostic);
    this.name = "LexError";
  }
}

export class ParseError extends CaeError {
  constructor(diagnostic: Diagnostic) {
    super(diagnostic);
    this.name = "ParseError";
  }
}

/** A loop bracket that does not balance inside its own procedure body. */
export class BracketScopeError extends ParseError {
  constructor(diagnostic: Diagnostic) {
    super(diagnostic);
    this.name = "BracketScopeError";
  }
}

export class ValidationError extends CaeError {
  constructor(diagnostic: Diagnostic) {
    super(diagnostic);
    this.name = "ValidationError";
  }
}

export class DuplicateNameError extends ValidationError {
  constructor(
    public readonly kind: SymbolKind,
    public readonly symbol: string,
    span: Span
  ) {
    super(makeDiagnostic("E0200", { kind, name: symbol }, span));
    this.name = "DuplicateNameError";
  }
}

export class UndefinedReferenceError extends ValidationError {
  constructor(
    public readonly kind: SymbolKind,
    public readonly symbol: string,
    span: Span
  ) {
    super(makeDiagnostic("E0201", { kind, name: symbol }, span));
    this.name = "UndefinedReferenceError";
  }
}

export class MissingEntryPointError extends ValidationError {
  constructor(public readonly kind: SymbolKind) {
    super(makeDiagnostic("E0202", { kind }));
    this.name = "MissingEntryPointError";
  }
}

// ─────────────────────────────────────────────────────────────────
// Run-time faults (environmental, never raised by the language itself)
// ─────────────────────────────────────────────────────────────────

export class StepLimitExceeded extends CaeError {
  constructor(public readonly limit: number) {
    super(makeDiagnostic("E0300", { limit }));
    this.name = "StepLimitExceeded";
  }
}

export class CallDepthExceeded extends CaeError {
  constructor(public readonly limit: number, span?: Span) {
    super(makeDiagnostic("E0301", { limit }, span));
    this.name = "CallDepthExceeded";
  }
}

export class InputExhausted extends CaeError {
  constructor(span?: Span) {
    super(makeDiagnostic("E0302", undefined, span));
    this.name = "InputExhausted";
  }
}
