// packages/core/src/util/ByteSource.ts
import type { ByteSource } from '../types/index.js';
import { concat } from './bytes.js';
import { raceAbort, throwIfAborted } from './abort.js';

/**
 * Forward-only reader over an in-memory Uint8Array or a Blob.
 * Blob slices are fetched on demand, so large Blobs are never loaded whole.
 */
export class BufferByteSource implements ByteSource {
  #offset = 0;

  constructor(
    private readonly src: Uint8Array | Blob,
    readonly label = 'buffer',
  ) {}

  /** Total byte length of the underlying data */
  get length(): number {
    return this.src instanceof Uint8Array ? this.src.byteLength : this.src.size;
  }

  async read(max: number, signal?: AbortSignal): Promise<Uint8Array> {
    assertReadSize(max);
    throwIfAborted(signal);

    const start = this.#offset;
    const end   = Math.min(start + max, this.length);
    this.#offset = end;

    // Uint8Array path – copy so the caller may mutate freely
    if (this.src instanceof Uint8Array) return this.src.slice(start, end);

    const buf = await this.src.slice(start, end).arrayBuffer();
    return new Uint8Array(buf);
  }
}

/**
 * Reader over a WHATWG ReadableStream (stdin, a pipe, a network body…).
 *
 * Streams hand out chunks of whatever size the producer chose, so `read`
 * keeps pulling until it has `max` bytes or the stream reports `done`.
 * A short result therefore always means end of data.
 */
export class StreamByteSource implements ByteSource {
  private readonly reader: ReadableStreamDefaultReader<Uint8Array>;
  private pending: Uint8Array[] = [];
  private pendingBytes = 0;
  private done = false;

  constructor(
    stream: ReadableStream<Uint8Array>,
    readonly label = 'stream',
  ) {
    this.reader = stream.getReader();
  }

  async read(max: number, signal?: AbortSignal): Promise<Uint8Array> {
    assertReadSize(max);

    while (!this.done && this.pendingBytes < max) {
      const { value, done } = await raceAbort(this.reader.read(), signal);
      if (done) {
        this.done = true;
        break;
      }
      if (value.byteLength === 0) continue;
      this.pending.push(value);
      this.pendingBytes += value.byteLength;
    }
    throwIfAborted(signal);

    const joined = concat(...this.pending);
    const out    = joined.slice(0, max);
    const rest   = joined.subarray(max);
    this.pending      = rest.byteLength ? [rest] : [];
    this.pendingBytes = rest.byteLength;
    return out;
  }

  /** Release the stream; a stream that was not drained is cancelled. */
  async close(): Promise<void> {
    if (!this.done) await this.reader.cancel();
    this.reader.releaseLock();
  }
}

function assertReadSize(max: number): void {
  if (!Number.isInteger(max) || max <= 0) {
    throw new RangeError(`read() size must be a positive integer, got ${max}`);
  }
}
