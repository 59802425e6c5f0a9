// src/core/span.ts
// Source positions attached to tokens, instructions and diagnostics

export interface Span {
  file: string;
  /** 1-based */
  line: number;
  /** 1-based */
  col: number;
}

export function spanAt(file: string, line: number, col: number): Span {
  return { file, line, col };
}

export function formatSpan(span: Span): string {
  return `${span.file}:${span.line}:${span.col}`;
}
