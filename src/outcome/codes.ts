import type { Span } from "../core/span";
import type { Diagnostic, DiagnosticSeverity } from "./diagnostic";

interface DiagCodeDef {
  code: string;
  severity: DiagnosticSeverity;
  category: "Lex" | "Parse" | "Validation" | "Runtime" | "Lint";
  template: string;
}

export const DIAGNOSTIC_CODES = {
  E0001: { code: "E0001", severity: "error", category: "Lex", template: "Unexpected character: {char}" },
  E0002: { code: "E0002", severity: "error", category: "Lex", template: "Malformed hex literal: expected two hex digits after '\"', got {found}" },
  E0003: { code: "E0003", severity: "error", category: "Lex", template: "Malformed integer: identifier character after {digits}" },

  E0100: { code: "E0100", severity: "error", category: "Parse", template: "Unexpected token: expected {expected}, got {actual}" },
  E0101: { code: "E0101", severity: "error", category: "Parse", template: "Unclosed '[': loop must close before {boundary}" },
  E0102: { code: "E0102", severity: "error", category: "Parse", template: "Unmatched ']': no open loop in {scope}" },
  E0103: { code: "E0103", severity: "error", category: "Parse", template: "Region capacity must be positive: {name}" },
  E0104: { code: "E0104", severity: "error", category: "Parse", template: "Unclosed '(': anonymous procedure ends at {actual}" },
  E0105: { code: "E0105", severity: "error", category: "Parse", template: "Unmatched ')' in procedure {name}" },

  E0200: { code: "E0200", severity: "error", category: "Validation", template: "Duplicate {kind} name: {name}" },
  E0201: { code: "E0201", severity: "error", category: "Validation", template: "Undefined {kind}: {name}" },
  E0202: { code: "E0202", severity: "error", category: "Validation", template: "Missing entry point: {kind} main" },
  E0203: { code: "E0203", severity: "error", category: "Validation", template: "Region {name} capacity {capacity} exceeds limit {limit}" },

  E0300: { code: "E0300", severity: "error", category: "Runtime", template: "Step limit exceeded: {limit}" },
  E0301: { code: "E0301", severity: "error", category: "Runtime", template: "Call depth exceeded: {limit}" },
  E0302: { code: "E0302", severity: "error", category: "Runtime", template: "Input exhausted" },

  W0001: { code: "W0001", severity: "warning", category: "Lint", template: "Procedure is never called: {name}" },
  W0002: { code: "W0002", severity: "warning", category: "Lint", template: "Region is never referenced: {name}" },
} satisfies Record<string, DiagCodeDef>;

export type DiagnosticCode = keyof typeof DIAGNOSTIC_CODES;

export function makeDiagnostic(
  code: DiagnosticCode,
  params?: Record<string, string | number>,
  span?: Span
): Diagnostic {
  const def: DiagCodeDef = DIAGNOSTIC_CODES[code];

  let message = def.template;
  if (params) {
    for (const [key, value] of Object.entries(params)) {
      message = message.replace(`{${key}}`, () => String(value));
    }
  }

  return {
    code: def.code,
    severity: def.severity,
    message,
    span,
    data: params,
  };
}
