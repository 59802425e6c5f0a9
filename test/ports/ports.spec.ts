import { Readable, Writable } from "node:stream";
import { describe, expect, it } from "vitest";
import { bufferInput, streamInput } from "../../src/ports/source";
import { collectOutput, streamOutput } from "../../src/ports/sink";

async function drain(read: () => Promise<number | null>): Promise<Array<number | null>> {
  const out: Array<number | null> = [];
  for (;;) {
    const b = await read();
    out.push(b);
    if (b === null) return out;
  }
}

function memoryWritable(chunks: Buffer[]): Writable {
  return new Writable({
    write(chunk: Buffer, _encoding, callback) {
      chunks.push(chunk);
      callback();
    },
  });
}

describe("bufferInput", () => {
  it("yields bytes then null", async () => {
    const input = bufferInput(Uint8Array.from([1, 255]));
    expect(await drain(() => input.read())).toEqual([1, 255, null]);
  });

  it("encodes strings as UTF-8", async () => {
    const input = bufferInput("é");
    expect(await drain(() => input.read())).toEqual([0xc3, 0xa9, null]);
  });

  it("is empty by default and stays exhausted", async () => {
    const input = bufferInput();
    expect(await input.read()).toBeNull();
    expect(await input.read()).toBeNull();
  });
});

describe("streamInput", () => {
  it("reads across chunk boundaries", async () => {
    const input = streamInput(Readable.from([Buffer.from("ab"), Buffer.from(""), Buffer.from("c")]));
    expect(await drain(() => input.read())).toEqual([97, 98, 99, null]);
  });

  it("accepts string chunks", async () => {
    const input = streamInput(Readable.from(["hi"], { objectMode: true }));
    expect(await drain(() => input.read())).toEqual([104, 105, null]);
  });

  it("does not touch the stream before the first read", async () => {
    let started = false;
    async function* source() {
      started = true;
      yield Uint8Array.from([7]);
    }
    const input = streamInput(source());
    expect(started).toBe(false);
    expect(await input.read()).toBe(7);
    expect(started).toBe(true);
  });
});

describe("collectOutput", () => {
  it("collects bytes and decodes text", () => {
    const out = collectOutput();
    for (const b of [0x6f, 0x6b]) out.write(b);
    expect(Array.from(out.bytes())).toEqual([0x6f, 0x6b]);
    expect(out.text()).toBe("ok");
  });
});

describe("streamOutput", () => {
  it("holds bytes until flushed", async () => {
    const chunks: Buffer[] = [];
    const out = streamOutput(memoryWritable(chunks));
    await out.write(0x61);
    await out.write(0x62);
    expect(chunks).toHaveLength(0);
    await out.flush?.();
    expect(Buffer.concat(chunks).toString()).toBe("ab");
  });

  it("writes a chunk whenever the buffer fills", async () => {
    const chunks: Buffer[] = [];
    const out = streamOutput(memoryWritable(chunks), 2);
    for (const b of [1, 2, 3]) await out.write(b);
    expect(chunks.map((c) => Array.from(c))).toEqual([[1, 2]]);
    await out.flush?.();
    await out.flush?.();
    expect(chunks.map((c) => Array.from(c))).toEqual([[1, 2], [3]]);
  });
});
