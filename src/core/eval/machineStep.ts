// src/core/eval/machineStep.ts
// One synchronous step of the interpreter. Input and output are not
// performed here; they come back as an Op for the driver to dispatch.

import type { Procedure, RegionSlot, Target } from "../program/program";
import type { Frame, State, StepOutcome } from "./machine";
import { frameFor } from "./machine";
import type { Region } from "./regions";
import type { Span } from "../span";
import { CallDepthExceeded } from "../errors";

const CONTINUE: StepOutcome = { tag: "State" };

function resolve(st: State, frame: Frame, target: Target): Region {
  return st.regions.slot(target.tag === "Back" ? frame.origin : target.slot);
}

/**
 * Scoping rule for a call from `caller`:
 *   no clause  -> here' = here,   origin' = origin
 *   @R         -> here' = R,      origin' = here
 *   @$         -> here' = origin, origin' = origin
 */
export function callBindings(caller: Frame, clause: Target | null): { here: RegionSlot; origin: RegionSlot } {
  if (clause === null) return { here: caller.here, origin: caller.origin };
  if (clause.tag === "Back") return { here: caller.origin, origin: caller.origin };
  return { here: clause.slot, origin: caller.here };
}

function enter(st: State, caller: Frame, proc: Procedure, clause: Target | null, span: Span): void {
  const { here, origin } = callBindings(caller, clause);

  // Tail call: the caller has no loop open and nothing left to run.
  const base = caller.blocks[0];
  if (caller.blocks.length === 1 && base.pc >= base.body.length) {
    st.frames.pop();
  }

  if (st.maxCallDepth !== null && st.frames.length >= st.maxCallDepth) {
    throw new CallDepthExceeded(st.maxCallDepth, span);
  }
  st.frames.push(frameFor(proc, here, origin));

  const depth = st.frames.length;
  if (depth > st.maxDepth) st.maxDepth = depth;
  st.trace?.({
    tag: "call",
    procedure: proc.label,
    here: st.regions.slot(here).name,
    origin: st.regions.slot(origin).name,
    depth,
  });
}

export function stepOnce(st: State): StepOutcome {
  const frame = st.frames[st.frames.length - 1];
  if (!frame) return { tag: "Done" };

  const block = frame.blocks[frame.blocks.length - 1];
  const here = st.regions.slot(frame.here);

  if (block.pc >= block.body.length) {
    if (block.loop && here.read() !== 0) {
      block.pc = 0;
      return CONTINUE;
    }
    frame.blocks.pop();
    if (frame.blocks.length === 0) st.frames.pop();
    return CONTINUE;
  }

  const op = block.body[block.pc++];
  switch (op.tag) {
    case "Inc":
      here.increment();
      break;
    case "Dec":
      here.decrement();
      break;
    case "Right":
      here.move(1);
      break;
    case "Left":
      here.move(-1);
      break;
    case "Reset":
      here.resetHead();
      break;
    case "Quote":
      here.write(op.byte);
      break;
    case "Output":
      return { tag: "Op", op: { tag: "Output", byte: here.read() } };
    case "Input":
      return { tag: "Op", op: { tag: "Input", slot: frame.here, span: op.span } };
    case "Loop":
      if (here.read() !== 0) frame.blocks.push({ body: op.body, pc: 0, loop: true });
      break;
    case "Send":
      resolve(st, frame, op.target).write(here.read());
      break;
    case "Receive":
      here.write(resolve(st, frame, op.target).read());
      break;
    case "Call":
      enter(st, frame, op.proc, op.clause, op.span);
      break;
    default: {
      const _: never = op;
      throw new Error("stepOnce: unknown op");
    }
  }
  return CONTINUE;
}
