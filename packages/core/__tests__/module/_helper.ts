import type { ByteSource } from '../../src/types/index.js';

/** Deterministic filler bytes (LCG) so failures are reproducible. */
export function pseudoRandom(len: number, seed = 1): Uint8Array {
  const out = new Uint8Array(len);
  let x = seed >>> 0;
  for (let i = 0; i < len; i++) {
    x = (Math.imul(x, 1664525) + 1013904223) >>> 0;
    out[i] = x >>> 24;
  }
  return out;
}

export const ascii = (s: string): Uint8Array => new TextEncoder().encode(s);

export function padTo(bytes: Uint8Array, len: number): Uint8Array {
  const out = new Uint8Array(Math.max(len, bytes.byteLength));
  out.set(bytes);
  return out;
}

export function streamOf(...chunks: number[][]): ReadableStream<Uint8Array> {
  return new ReadableStream<Uint8Array>({
    start(c) {
      for (const chunk of chunks) c.enqueue(Uint8Array.from(chunk));
      c.close();
    },
  });
}

/** Endless source of `fill` bytes that reports each read to `onRead`. */
export function endlessSource(fill: number, onRead: (n: number) => void = () => {}): ByteSource {
  let reads = 0;
  return {
    label: 'endless',
    async read(max) {
      onRead(++reads);
      return new Uint8Array(max).fill(fill);
    },
  };
}
