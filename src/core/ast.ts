// src/core/ast.ts
// Parsed (unresolved) program tree produced by the reader.

import type { Span } from "./span";

export type RegionRef =
  | { tag: "Named"; name: string; span: Span }
  | { tag: "Back"; span: Span };

export type Callee =
  | { tag: "Named"; name: string; span: Span }
  | { tag: "Anonymous"; proc: AnonymousProc };

export type Instruction =
  | { tag: "Inc"; span: Span }
  | { tag: "Dec"; span: Span }
  | { tag: "Right"; span: Span }
  | { tag: "Left"; span: Span }
  | { tag: "Reset"; span: Span }
  | { tag: "Quote"; byte: number; span: Span }
  | { tag: "Output"; span: Span }
  | { tag: "Input"; span: Span }
  | { tag: "Loop"; body: Instruction[]; span: Span }
  | { tag: "Send"; target: RegionRef; span: Span }
  | { tag: "Receive"; target: RegionRef; span: Span }
  /** clause === null: run on the caller's here/origin unchanged */
  | { tag: "Call"; callee: Callee; clause: RegionRef | null; span: Span };

export interface RegionDecl {
  name: string;
  capacity: number;
  span: Span;
}

export interface ProcDecl {
  name: string;
  body: Instruction[];
  span: Span;
}

/**
 * Inline `( ... )` body. `label` is `<enclosing proc>#<n>` and only exists
 * for diagnostics and tracing; nothing can call an anonymous body by label.
 */
export interface AnonymousProc {
  label: string;
  body: Instruction[];
  span: Span;
}

export interface ParsedProgram {
  regions: RegionDecl[];
  procedures: ProcDecl[];
  /** Every anonymous body in source order, nested ones included */
  anonymous: AnonymousProc[];
}
