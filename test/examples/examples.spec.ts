// test/examples/examples.spec.ts
// End-to-end runs of the programs under examples/

import { readFileSync } from "node:fs";
import { describe, it, expect } from "vitest";
import { runSource, compileText } from "../../src/core/pipeline/load";
import { bufferInput } from "../../src/ports/source";
import { collectOutput } from "../../src/ports/sink";
import { isDone } from "../../src/outcome/outcome";

const EXAMPLES = new URL("../../examples/", import.meta.url);

function example(name: string): string {
  return readFileSync(new URL(name, EXAMPLES), "utf-8");
}

async function runExample(name: string, input = "") {
  const out = collectOutput();
  const report = await runSource(example(name), { filename: name, input: bufferInput(input), output: out });
  return { text: out.text(), report };
}

describe("examples", () => {
  it("adder.cae adds two digits", async () => {
    const { text, report } = await runExample("adder.cae", "34");
    expect(text).toBe("7");
    expect(report.regions.get("main").snapshot()).toEqual({ head: 0, cells: [55, 0, 0] });
    expect(report.regions.get("scratch").read()).toBe(0);
  });

  it("adder.cae handles other digit pairs", async () => {
    expect((await runExample("adder.cae", "00")).text).toBe("0");
    expect((await runExample("adder.cae", "45")).text).toBe("9");
  });

  it("back_reference.cae writes through $ into main", async () => {
    const { text, report } = await runExample("back_reference.cae");
    expect(text).toBe("!");
    expect(report.regions.get("main").read()).toBe(0x21);
    expect(report.regions.get("foreign").read()).toBe(0x2a);
  });

  it("hello.cae prints a greeting", async () => {
    expect((await runExample("hello.cae")).text).toBe("Hello\n");
  });

  it("cat.cae copies its input", async () => {
    expect((await runExample("cat.cae", "cae\n")).text).toBe("cae\n");
  });

  it("swap.cae exchanges two regions", async () => {
    const { text, report } = await runExample("swap.cae");
    expect(text).toBe("ba");
    expect(report.regions.get("tmp").read()).toBe(0x61);
  });

  it("every example loads without warnings", () => {
    for (const name of ["adder.cae", "back_reference.cae", "hello.cae", "cat.cae", "swap.cae"]) {
      const loaded = compileText(example(name), { filename: name });
      expect(isDone(loaded)).toBe(true);
      expect(loaded.meta.warnings ?? []).toEqual([]);
    }
  });
});
