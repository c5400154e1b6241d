// packages/core/src/stream/TrailingZeroTrimmer.ts
import { contentEnd } from '../util/bytes.js';
import { DEFAULT_CHUNK_SIZE } from '../config/defaults.js';

/**
 * Incremental trailing-zero stripper.
 *
 * Zero bytes at the end of a pushed block are held back as a counter and only
 * re-emitted once a later block carries a non-zero byte. Whatever run is still
 * pending when the input ends is dropped by `finish()`.
 */
export class TrailingZeroTrimmer {
  private pending = 0;

  /** @param fillSize - largest zero block emitted when a held-back run is released */
  constructor(private readonly fillSize = DEFAULT_CHUNK_SIZE) {}

  get pendingZeros(): number {
    return this.pending;
  }

  /** Returns the pieces that are safe to emit, in order. */
  push(block: Uint8Array): Uint8Array[] {
    const end = contentEnd(block);
    if (end === 0) {
      this.pending += block.byteLength;
      return [];
    }

    const out = this.releasePending();
    out.push(block.subarray(0, end));
    this.pending = block.byteLength - end;
    return out;
  }

  /** End of input: discard the pending run and report its length. */
  finish(): number {
    const dropped = this.pending;
    this.pending  = 0;
    return dropped;
  }

  toTransformStream(): TransformStream<Uint8Array, Uint8Array> {
    return new TransformStream<Uint8Array, Uint8Array>({
      transform: (chunk, ctl) => {
        for (const piece of this.push(chunk)) ctl.enqueue(piece);
      },
      flush: () => {
        this.finish();
      },
    });
  }

  private releasePending(): Uint8Array[] {
    const out: Uint8Array[] = [];
    while (this.pending > 0) {
      const n = Math.min(this.pending, this.fillSize);
      out.push(new Uint8Array(n));
      this.pending -= n;
    }
    return out;
  }
}
