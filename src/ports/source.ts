/**
 * Input port: the collaborator `,` reads from.
 * `read` resolves to a byte in [0, 255], or null once the source is exhausted.
 */
export interface InputPort {
  read(): Promise<number | null>;
}

/** Fixed input; strings are encoded as UTF-8. */
export function bufferInput(data: Uint8Array | string = new Uint8Array(0)): InputPort {
  const bytes: Uint8Array = typeof data === "string" ? new TextEncoder().encode(data) : data;
  let pos = 0;
  return {
    async read() {
      return pos < bytes.length ? bytes[pos++] : null;
    },
  };
}

/**
 * Input pulled chunk by chunk from an async iterable such as
 * `process.stdin`. Nothing is read from the stream until the first `read`,
 * so programs that never use `,` leave it untouched.
 */
export function streamInput(stream: AsyncIterable<Uint8Array | string>): InputPort {
  let it: AsyncIterator<Uint8Array | string> | null = null;
  let chunk: Uint8Array = new Uint8Array(0);
  let pos = 0;
  let ended = false;

  return {
    async read() {
      while (pos >= chunk.length) {
        if (ended) return null;
        it ??= stream[Symbol.asyncIterator]();
        const next = await it.next();
        if (next.done) {
          ended = true;
          return null;
        }
        chunk = typeof next.value === "string" ? new TextEncoder().encode(next.value) : next.value;
        pos = 0;
      }
      return chunk[pos++];
    },
  };
}
