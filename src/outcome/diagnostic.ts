import type { Span } from "../core/span";

export type DiagnosticSeverity = "error" | "warning";

export interface Diagnostic {
  code: string;
  severity: DiagnosticSeverity;
  message: string;
  span?: Span;
  data?: Record<string, string | number>;
}
