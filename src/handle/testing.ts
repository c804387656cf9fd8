/**
 * @file Shared fixtures for handle specs
 */
import type { ByteStream } from "./types";

export type TrackedStream = { stream: ByteStream; state: { started: boolean; chunks: number } };

/** Single-pass stream over fixed chunks that records whether anyone pulled from it. */
export function trackedStream(chunks: readonly (readonly number[])[]): TrackedStream {
  const state = { started: false, chunks: 0 };
  async function* gen(): AsyncGenerator<Uint8Array> {
    state.started = true;
    for (const c of chunks) {
      state.chunks += 1;
      yield new Uint8Array(c);
    }
  }
  return { stream: gen(), state };
}

/** Stream that yields `head` then rejects. */
export async function* failingStream(head: readonly number[], error: Error): AsyncGenerator<Uint8Array> {
  yield new Uint8Array(head);
  throw error;
}

export function text(s: string): Uint8Array {
  return new TextEncoder().encode(s);
}

export function decode(b: Uint8Array): string {
  return new TextDecoder().decode(b);
}
