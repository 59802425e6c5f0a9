import type { Done, Fail, OutcomeMeta } from "./outcome";
import type { Failure } from "./failure";
import { failure } from "./failure";
import { CaeError, LexError, ParseError, ValidationError, InputExhausted } from "../core/errors";

export function done<A>(value: A, meta: OutcomeMeta = {}): Done<A> {
  return { tag: "Done", value, meta };
}

export function fail(f: Failure, meta: OutcomeMeta = {}): Fail {
  return { tag: "Fail", failure: f, meta };
}

/**
 * Lift a thrown CaeError into a Fail. The error's diagnostic becomes the
 * failure's only diagnostic; its class picks the failure reason.
 */
export function fromError(e: CaeError, meta: OutcomeMeta = {}): Fail {
  const reason =
    e instanceof LexError ? "lex-error"
    : e instanceof ParseError ? "parse-error"
    : e instanceof ValidationError ? "validation-failed"
    : e instanceof InputExhausted ? "input-exhausted"
    : "resource-exhausted";
  return fail(failure(reason, e.message, { diagnostics: [e.diagnostic] }), meta);
}
