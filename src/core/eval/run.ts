// src/core/eval/run.ts
// Drives stepOnce to completion and dispatches I/O to the ports.

import type { Program } from "../program/program";
import type { RuntimeConfig } from "../config/config";
import { DEFAULT_RUNTIME_CONFIG } from "../config/config";
import type { InputPort } from "../../ports/source";
import { bufferInput } from "../../ports/source";
import type { OutputPort } from "../../ports/sink";
import type { IoRequest, State, TraceEvent } from "./machine";
import { initialState } from "./machine";
import { stepOnce } from "./machineStep";
import type { RegionStore } from "./regions";
import { InputExhausted, StepLimitExceeded } from "../errors";

export type RunOptions = {
  input?: InputPort;
  output?: OutputPort;
  runtime?: Partial<RuntimeConfig>;
  trace?: (e: TraceEvent) => void;
};

export type RunReport = {
  steps: number;
  maxDepth: number;
  regions: RegionStore;
};

type Ports = {
  input: InputPort;
  output?: OutputPort;
};

async function dispatch(st: State, op: IoRequest, ports: Ports, runtime: RuntimeConfig): Promise<void> {
  if (op.tag === "Output") {
    await ports.output?.write(op.byte);
    return;
  }

  await ports.output?.flush?.();
  const byte = await ports.input.read();
  const cell = st.regions.slot(op.slot);
  if (byte !== null) {
    cell.write(byte);
    return;
  }
  switch (runtime.onEof) {
    case "zero":
      cell.write(0);
      return;
    case "unchanged":
      return;
    case "error":
      throw new InputExhausted(op.span);
  }
}

/**
 * Run until the frame stack is empty. Returns the number of steps taken.
 * Throws StepLimitExceeded / CallDepthExceeded / InputExhausted; output
 * produced before a fault is still flushed.
 */
export async function runToCompletion(
  st: State,
  ports: Ports,
  runtime: RuntimeConfig = DEFAULT_RUNTIME_CONFIG
): Promise<number> {
  const { maxSteps } = runtime;
  let steps = 0;

  try {
    while (st.frames.length > 0) {
      if (maxSteps !== null && steps >= maxSteps) {
        throw new StepLimitExceeded(maxSteps);
      }
      steps++;
      const out = stepOnce(st);
      if (out.tag === "Op") {
        await dispatch(st, out.op, ports, runtime);
      }
    }
  } finally {
    await ports.output?.flush?.();
  }

  return steps;
}

export async function runProgram(program: Program, options: RunOptions = {}): Promise<RunReport> {
  const runtime: RuntimeConfig = { ...DEFAULT_RUNTIME_CONFIG, ...options.runtime };
  const st = initialState(program, { maxCallDepth: runtime.maxCallDepth, trace: options.trace });
  const steps = await runToCompletion(
    st,
    { input: options.input ?? bufferInput(), output: options.output },
    runtime
  );
  return { steps, maxDepth: st.maxDepth, regions: st.regions };
}
