// test/core/eval/machine.spec.ts
// Execution engine: call scoping, loops, transfers, I/O, tail calls and limits

import { describe, it, expect } from "vitest";
import { runSource, loadProgram } from "../../../src/core/pipeline/load";
import { initialState, frameFor, type TraceEvent } from "../../../src/core/eval/machine";
import { stepOnce, callBindings } from "../../../src/core/eval/machineStep";
import { runProgram } from "../../../src/core/eval/run";
import type { RuntimeConfig } from "../../../src/core/config";
import { bufferInput, type InputPort } from "../../../src/ports/source";
import { collectOutput, type OutputPort } from "../../../src/ports/sink";
import { CaeError, CallDepthExceeded, InputExhausted, StepLimitExceeded } from "../../../src/core/errors";

async function run(src: string, opts: { input?: string; runtime?: Partial<RuntimeConfig> } = {}) {
  const out = collectOutput();
  const report = await runSource(src, { input: bufferInput(opts.input ?? ""), output: out, runtime: opts.runtime });
  return { out, report, regions: report.regions };
}

describe("callBindings", () => {
  const caller = frameFor({ name: "caller", label: "caller", body: [] }, 0, 1);

  it("keeps here and origin without a clause", () => {
    expect(callBindings(caller, null)).toEqual({ here: 0, origin: 1 });
  });

  it("enters a named region and remembers the one it left", () => {
    expect(callBindings(caller, { tag: "Region", slot: 2 })).toEqual({ here: 2, origin: 0 });
  });

  it("returns to the origin and keeps it for further nesting", () => {
    expect(callBindings(caller, { tag: "Back" })).toEqual({ here: 1, origin: 1 });
  });
});

describe("region scoping", () => {
  it("resolves $ to the region active at the enclosing call site", async () => {
    const { regions } = await run(`
      region main[1]; region a[1]; region b[1];
      proc inner: "07;
      proc mid: "05 inner@$;
      proc outer: "03 mid@b;
      proc main: outer@a;
    `);
    expect(regions.get("main").read()).toBe(0);
    expect(regions.get("a").read()).toBe(7);
    expect(regions.get("b").read()).toBe(5);
  });

  it("runs a call without a clause on the caller's regions", async () => {
    const { regions } = await run(`
      region main[1]; region r[1];
      proc bump: +;
      proc main: (bump bump ^$)@r;
    `);
    expect(regions.get("r").read()).toBe(2);
    expect(regions.get("main").read()).toBe(2);
  });

  it("shares region state across calls", async () => {
    const { regions } = await run("region main[3]; proc step: >+; proc main: step step;");
    expect(regions.get("main").snapshot()).toEqual({ head: 2, cells: [0, 1, 1] });
  });
});

describe("instructions", () => {
  it("skips a loop on zero and repeats it until zero", async () => {
    const { out } = await run("region main[2]; proc main: [+] \"03 [->+<] >.;");
    expect(Array.from(out.bytes())).toEqual([3]);
  });

  it("treats send and receive as inverses", async () => {
    const { regions } = await run("region main[1]; region r[1]; proc main: \"2A ^r \"00 &r;");
    expect(regions.get("main").read()).toBe(0x2a);
    expect(regions.get("r").read()).toBe(0x2a);
  });

  it("sends and receives through $", async () => {
    const { regions } = await run("region main[1]; region r[1]; proc main: \"11 (&$ + ^$)@r;");
    expect(regions.get("r").read()).toBe(0x12);
    expect(regions.get("main").read()).toBe(0x12);
  });

  it("transfers only the head cells", async () => {
    const { regions } = await run("region main[3]; region r[3]; proc main: >\"09 (>>&$)@r;");
    expect(regions.get("r").snapshot()).toEqual({ head: 2, cells: [0, 0, 9] });
  });

  it("resets the head with ~", async () => {
    const { regions } = await run("region main[4]; proc main: >>>~+;");
    expect(regions.get("main").snapshot()).toEqual({ head: 0, cells: [1, 0, 0, 0] });
  });
});

describe("input and output", () => {
  const echo = "region main[1]; proc main: \"09 , .;";

  it("reads one byte per ,", async () => {
    const { out } = await run(echo, { input: "A" });
    expect(out.text()).toBe("A");
  });

  it("stores 0 at end of input by default", async () => {
    const { out } = await run(echo);
    expect(Array.from(out.bytes())).toEqual([0]);
  });

  it("leaves the cell alone at end of input under 'unchanged'", async () => {
    const { out } = await run(echo, { runtime: { onEof: "unchanged" } });
    expect(Array.from(out.bytes())).toEqual([9]);
  });

  it("faults at end of input under 'error'", async () => {
    await expect(run(echo, { runtime: { onEof: "error" } })).rejects.toThrow(InputExhausted);
  });

  it("flushes output before every read and when the run ends", async () => {
    const log: string[] = [];
    const output: OutputPort = {
      write: (b) => {
        log.push(`write ${b}`);
      },
      flush: () => {
        log.push("flush");
      },
    };
    const input: InputPort = {
      read: async () => {
        log.push("read");
        return 7;
      },
    };
    await runSource("region main[1]; proc main: \"41 . , .;", { input, output });
    expect(log).toEqual(["write 65", "flush", "read", "write 7", "flush"]);
  });

  it("flushes output produced before a fault", async () => {
    const log: string[] = [];
    const output: OutputPort = {
      write: (b) => {
        log.push(`write ${b}`);
      },
      flush: () => {
        log.push("flush");
      },
    };
    await expect(
      runSource("region main[1]; proc main: \"41 . +[];", { output, runtime: { maxSteps: 50 } })
    ).rejects.toThrow(StepLimitExceeded);
    expect(log).toEqual(["write 65", "flush"]);
  });
});

describe("stepOnce", () => {
  it("hands I/O back to the caller and reports Done at the end", () => {
    const st = initialState(loadProgram("region main[1]; proc main: \"41 .;"));
    expect(stepOnce(st)).toEqual({ tag: "State" });
    expect(stepOnce(st)).toEqual({ tag: "Op", op: { tag: "Output", byte: 0x41 } });
    expect(stepOnce(st)).toEqual({ tag: "State" });
    expect(st.frames).toEqual([]);
    expect(stepOnce(st)).toEqual({ tag: "Done" });
  });

  it("names the region an input lands in", () => {
    const program = loadProgram("region aux[1]; region main[1]; proc main: (,)@aux;");
    const st = initialState(program);
    stepOnce(st);
    expect(stepOnce(st)).toEqual({ tag: "Op", op: { tag: "Input", slot: 0, span: { file: "<input>", line: 1, col: 44 } } });
  });
});

describe("calls and limits", () => {
  it("does not grow the stack for tail calls", () => {
    const st = initialState(loadProgram("region main[1]; proc main: spin; proc spin: + spin;"));
    for (let i = 0; i < 300; i++) stepOnce(st);
    expect(st.frames).toHaveLength(1);
    expect(st.maxDepth).toBe(1);
  });

  it("grows the stack for calls with work left after them", async () => {
    const { out, report } = await run("region main[1]; proc main: \"03 down; proc down: -[down] .;");
    expect(Array.from(out.bytes())).toEqual([0, 0, 0]);
    expect(report.maxDepth).toBe(3);
  });

  it("stops unbounded recursion at maxCallDepth", async () => {
    const src = "region main[1]; proc main: spin; proc spin: spin +;";
    await expect(run(src, { runtime: { maxCallDepth: 50 } })).rejects.toThrow(CallDepthExceeded);
    await expect(run(src, { runtime: { maxCallDepth: 50 } })).rejects.toThrow("Call depth exceeded: 50");
  });

  it("points a depth fault at the call that overflowed", async () => {
    const src = "region main[1]; proc main: spin; proc spin: spin +;";
    const e: unknown = await run(src, { runtime: { maxCallDepth: 50 } }).catch((err: unknown) => err);
    expect(e).toBeInstanceOf(CallDepthExceeded);
    if (!(e instanceof CaeError)) throw e;
    expect(e.span).toEqual({ file: "<input>", line: 1, col: 45 });
    expect(e.message).toBe("Call depth exceeded: 50 (<input>:1:45)");
  });

  it("points an end-of-input fault at the read", async () => {
    const src = "region main[1]; proc main: \"09 , .;";
    const e: unknown = await run(src, { runtime: { onEof: "error" } }).catch((err: unknown) => err);
    expect(e).toBeInstanceOf(InputExhausted);
    if (!(e instanceof CaeError)) throw e;
    expect(e.span).toEqual({ file: "<input>", line: 1, col: 32 });
  });

  it("stops an endless loop at maxSteps", async () => {
    await expect(run("region main[1]; proc main: +[];", { runtime: { maxSteps: 100 } })).rejects.toThrow(
      "Step limit exceeded: 100"
    );
  });

  it("counts steps, block exits included", async () => {
    const { report } = await run("region main[1]; proc main: +.;");
    expect(report.steps).toBe(3);
  });

  it("reports every call to the trace callback", async () => {
    const events: TraceEvent[] = [];
    const program = loadProgram(`
      region main[2]; region foreign[2];
      proc very_happy: "21;
      proc blah: "2A very_happy@$;
      proc main: blah@foreign (+)@foreign .;
    `);
    await runProgram(program, { output: collectOutput(), trace: (e) => events.push(e) });
    expect(events).toEqual([
      { tag: "call", procedure: "main", here: "main", origin: "main", depth: 1 },
      { tag: "call", procedure: "blah", here: "foreign", origin: "main", depth: 2 },
      { tag: "call", procedure: "very_happy", here: "main", origin: "main", depth: 2 },
      { tag: "call", procedure: "main#1", here: "foreign", origin: "main", depth: 2 },
    ]);
  });
});
