// src/core/eval/machine.ts
// Machine state for the step interpreter.

import type { Op, Procedure, Program, RegionSlot } from "../program/program";
import type { Span } from "../span";
import { RegionStore } from "./regions";

/**
 * A body being executed inside a frame: the procedure body at the bottom,
 * one block per active loop above it. Loop blocks share their frame's
 * here/origin and re-test the head byte each time they run out.
 */
export type Block = {
  body: readonly Op[];
  pc: number;
  loop: boolean;
};

export type Frame = {
  proc: Procedure;
  /** Region that unqualified instructions act on */
  here: RegionSlot;
  /** Region `$` resolves to */
  origin: RegionSlot;
  blocks: Block[]; // bottom->top, push/pop at end
};

export type TraceEvent = {
  tag: "call";
  procedure: string;
  here: string;
  origin: string;
  depth: number;
};

export type State = {
  program: Program;
  regions: RegionStore;
  frames: Frame[]; // bottom->top, push/pop at end
  /** Deepest frame stack seen so far */
  maxDepth: number;
  maxCallDepth: number | null;
  trace?: (e: TraceEvent) => void;
};

export type IoRequest =
  | { tag: "Input"; slot: RegionSlot; span: Span }
  | { tag: "Output"; byte: number };

export type StepOutcome =
  | { tag: "State" }
  | { tag: "Done" }
  | { tag: "Op"; op: IoRequest };

export function frameFor(proc: Procedure, here: RegionSlot, origin: RegionSlot): Frame {
  return { proc, here, origin, blocks: [{ body: proc.body, pc: 0, loop: false }] };
}

/** Fresh regions and a single frame running `main` on region `main`. */
export function initialState(
  program: Program,
  options: { maxCallDepth?: number | null; trace?: (e: TraceEvent) => void } = {}
): State {
  const regions = new RegionStore(program.regions);
  const main = program.mainRegion;
  const st: State = {
    program,
    regions,
    frames: [frameFor(program.entry, main, main)],
    maxDepth: 1,
    maxCallDepth: options.maxCallDepth ?? null,
    trace: options.trace,
  };
  st.trace?.({ tag: "call", procedure: program.entry.label, here: "main", origin: "main", depth: 1 });
  return st;
}
