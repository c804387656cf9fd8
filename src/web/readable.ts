/**
 * @file WHATWG ReadableStream -> ByteStream adapter
 */

type ByteReader = {
  read(): Promise<{ done: boolean; value?: Uint8Array }>;
  releaseLock(): void;
};

/** Structural subset of `ReadableStream<Uint8Array>` that this module relies on. */
export type ReadableByteSource = { getReader(): ByteReader };

/**
 * Adapt a ReadableStream into an async iterable of chunks.
 * The reader is acquired on first pull and released on every exit, including early `break`.
 */
export async function* readableToByteStream(stream: ReadableByteSource): AsyncGenerator<Uint8Array, void, undefined> {
  const reader = stream.getReader();
  try {
    for (;;) {
      const { done, value } = await reader.read();
      if (done) {
        return;
      }
      if (value !== undefined) {
        yield value;
      }
    }
  } finally {
    reader.releaseLock();
  }
}

