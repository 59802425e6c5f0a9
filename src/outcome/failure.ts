import type { Diagnostic } from "./diagnostic";

export type FailureReason =
  | "lex-error"
  | "parse-error"
  | "validation-failed"
  | "resource-exhausted"
  | "input-exhausted";

export interface Failure {
  reason: FailureReason;
  message: string;
  diagnostics: Diagnostic[];
  context?: Record<string, unknown>;
}

export function failure(
  reason: FailureReason,
  message: string,
  opts?: Partial<Omit<Failure, "reason" | "message">>
): Failure {
  return {
    reason,
    message,
    diagnostics: opts?.diagnostics ?? [],
    context: opts?.context,
  };
}
