// src/core/pipeline/load.ts
// Source text -> linked Program, in one call.

import { tokenize } from "../reader/tokenize";
import { parseProgram } from "../reader/parse";
import { checkProgram, linkProgram, validateProgram } from "../program/validate";
import type { Program } from "../program/program";
import { runProgram, type RunOptions, type RunReport } from "../eval/run";
import { CaeError } from "../errors";
import type { Outcome } from "../../outcome/outcome";
import { done, fromError } from "../../outcome/constructors";

export type LoadOptions = {
  filename?: string;
  maxRegionCapacity?: number;
};

/** Lex, parse and validate. Throws LexError / ParseError / ValidationError. */
export function loadProgram(source: string, options: LoadOptions = {}): Program {
  const parsed = parseProgram(tokenize(source, options.filename));
  return validateProgram(parsed, { maxRegionCapacity: options.maxRegionCapacity });
}

/**
 * Outcome-returning variant of loadProgram. A successful load carries the
 * lint warnings in `meta.warnings`.
 */
export function compileText(source: string, options: LoadOptions = {}): Outcome<Program> {
  const started = Date.now();
  try {
    const parsed = parseProgram(tokenize(source, options.filename));
    const { errors, warnings } = checkProgram(parsed, { maxRegionCapacity: options.maxRegionCapacity });
    if (errors.length > 0) throw errors[0];
    return done(linkProgram(parsed), { durationMs: Date.now() - started, warnings });
  } catch (e) {
    if (e instanceof CaeError) return fromError(e, { durationMs: Date.now() - started });
    throw e;
  }
}

export async function runSource(
  source: string,
  options: RunOptions & LoadOptions = {}
): Promise<RunReport> {
  return runProgram(loadProgram(source, options), options);
}
