// src/index.ts
// Public API for the cae interpreter

// Reader
export { tokenize, describeTok, type Tok, type Punct } from "./core/reader/tokenize";
export { parseProgram, parseSource } from "./core/reader/parse";
export type {
  Instruction,
  RegionRef,
  Callee,
  RegionDecl,
  ProcDecl,
  AnonymousProc,
  ParsedProgram,
} from "./core/ast";
export { type Span, spanAt, formatSpan } from "./core/span";

// Program model
export {
  checkProgram,
  validateProgram,
  linkProgram,
  type ValidateOptions,
  type ValidationReport,
} from "./core/program/validate";
export { Program, type Op, type Procedure, type RegionInfo, type RegionSlot, type Target } from "./core/program/program";

// Execution
export { Region, RegionStore, type RegionSnapshot } from "./core/eval/regions";
export { initialState, type State, type Frame, type Block, type TraceEvent, type StepOutcome } from "./core/eval/machine";
export { stepOnce, callBindings } from "./core/eval/machineStep";
export { runToCompletion, runProgram, type RunOptions, type RunReport } from "./core/eval/run";

// Pipeline
export { loadProgram, compileText, runSource, type LoadOptions } from "./core/pipeline/load";

// Errors
export {
  CaeError,
  LexError,
  ParseError,
  BracketScopeError,
  ValidationError,
  DuplicateNameError,
  UndefinedReferenceError,
  MissingEntryPointError,
  StepLimitExceeded,
  CallDepthExceeded,
  InputExhausted,
  type SymbolKind,
} from "./core/errors";

// Ports
export { bufferInput, streamInput, type InputPort } from "./ports/source";
export { collectOutput, streamOutput, type OutputPort, type CollectedOutput } from "./ports/sink";

// Configuration
export * from "./core/config";

// Outcome
export type { Outcome, Done, Fail, OutcomeMeta } from "./outcome/outcome";
export { isDone, isFail } from "./outcome/outcome";
export { type Failure, type FailureReason, failure } from "./outcome/failure";
export type { Diagnostic, DiagnosticSeverity } from "./outcome/diagnostic";
export { DIAGNOSTIC_CODES, makeDiagnostic, type DiagnosticCode } from "./outcome/codes";
export { done, fail, fromError } from "./outcome/constructors";
export { match, unwrap } from "./outcome/matchers";
