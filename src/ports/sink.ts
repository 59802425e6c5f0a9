import type { Writable } from "stream";

/**
 * Output port: the collaborator `.` writes to, one byte at a time.
 * `flush` is called before every input read and when a run ends.
 */
export interface OutputPort {
  write(byte: number): void | Promise<void>;
  flush?(): void | Promise<void>;
}

export type CollectedOutput = OutputPort & {
  bytes(): Uint8Array;
  text(): string;
};

/** In-memory sink. */
export function collectOutput(): CollectedOutput {
  const out: number[] = [];
  return {
    write(byte) {
      out.push(byte);
    },
    bytes() {
      return Uint8Array.from(out);
    },
    text() {
      return new TextDecoder().decode(Uint8Array.from(out));
    },
  };
}

/**
 * Buffered sink over a Node writable (e.g. `process.stdout`). Bytes are held
 * until `highWaterMark` is reached or `flush` is called.
 */
export function streamOutput(stream: Writable, highWaterMark = 4096): OutputPort {
  let buf: number[] = [];

  const flush = async (): Promise<void> => {
    if (buf.length === 0) return;
    const chunk = Buffer.from(buf);
    buf = [];
    await new Promise<void>((resolve, reject) => {
      stream.write(chunk, (error) => (error ? reject(error) : resolve()));
    });
  };

  return {
    async write(byte) {
      buf.push(byte);
      if (buf.length >= highWaterMark) await flush();
    },
    flush,
  };
}
