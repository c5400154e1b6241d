// packages/core/src/index.ts
import { DEFAULT_CHUNK_SIZE } from './config/defaults.js';
import type {
  ByteInput,
  ByteSource,
  EngineState,
  XorConfig,
  XorSummary,
} from './types/index.js';
import { XorEngine } from './engine/XorEngine.js';
import { BufferByteSource, StreamByteSource } from './util/ByteSource.js';
import { collectStream } from './util/stream.js';
import { trimTrailingZeros } from './util/bytes.js';
import {
  createLogger,
  type Verbosity,
  type Logger,
} from './util/logger.js';
import { ConfigError } from './errors/index.js';

// ────────────────────────────────────────────────────────────────────────────
//  Public configuration shape
// ────────────────────────────────────────────────────────────────────────────

/**
 * Options for configuring Xorpad instance behavior.
 */
export interface XorpadOptions {
  /** Keep the trailing run of zero bytes instead of stripping it */
  preserveTrailingZeros? : boolean;
  /** Log progress lines (at least verbosity 1) */
  showProgress?          : boolean;
  /** Bytes read from each source per iteration; defaults to 64 KiB */
  chunkSize?             : number;
  /** Verbosity level 0-4 for logging (0 = silent) */
  verbose?               : Verbosity;
  /** Optional custom logger callback (receives formatted lines) */
  logger?                : (msg: string) => void;
  /** Prefix for log lines, e.g. the program name */
  logTag?                : string;
  /** Cancels a running XOR; surfaces as AbortedError */
  signal?                : AbortSignal;
}

/**
 * Xorpad XORs two byte streams, zero-padding the shorter one, and by default
 * strips the trailing zero run from the result.
 */
export class Xorpad {
  readonly config : XorConfig;

  // — diagnostics ------------------------------------------------------------
  private readonly log    : Logger;
  private readonly signal : AbortSignal | undefined;

  /** Engine of the most recent call; exposes state and summary. */
  private last : XorEngine | null = null;

  constructor(opt: XorpadOptions = {}) {
    const showProgress = opt.showProgress ?? false;

    this.config = Object.freeze({
      preserveTrailingZeros : opt.preserveTrailingZeros ?? false,
      showProgress,
      chunkSize             : Xorpad.checkChunkSize(opt.chunkSize ?? DEFAULT_CHUNK_SIZE),
    });
    this.signal = opt.signal;

    const verbose = opt.verbose ?? 0;
    this.log = createLogger(
      showProgress && verbose < 1 ? 1 : verbose,
      opt.logger,
      opt.logTag,
    );
  }

  // ════════════════════════════════════════════════════════════════════════
  //  PUBLIC  - XOR operations
  // ════════════════════════════════════════════════════════════════════════

  /**
   * XOR two inputs and collect the (possibly trimmed) result in memory.
   */
  async xor(a: ByteInput, b: ByteInput): Promise<Uint8Array> {
    return collectStream(this.createXorStream(a, b));
  }

  /**
   * Pull-based stream of result bytes. Nothing is read from the inputs until
   * the stream is read; cancelling it stops the engine.
   */
  createXorStream(a: ByteInput, b: ByteInput): ReadableStream<Uint8Array> {
    const it = this.createEngine(a, b).blocks();

    return new ReadableStream<Uint8Array>(
      {
        async pull(ctl) {
          const res = await it.next();
          if (res.done) ctl.close();
          else ctl.enqueue(res.value);
        },
        async cancel() {
          await it.return(undefined);
        },
      },
      { highWaterMark: 0 },
    );
  }

  /**
   * Stream the result into `sink`, closing it on success.
   * @returns byte counts of the run
   */
  async xorToSink(
    a   : ByteInput,
    b   : ByteInput,
    sink: WritableStream<Uint8Array>,
  ): Promise<XorSummary> {
    return this.createEngine(a, b).run(sink);
  }

  // ════════════════════════════════════════════════════════════════════════
  //  PUBLIC  - Informational helpers
  // ════════════════════════════════════════════════════════════════════════

  /** State of the most recent run, `start` if none was started. */
  get state(): EngineState {
    return this.last?.state ?? 'start';
  }

  /** Byte counts of the most recent run. */
  get summary(): Readonly<XorSummary> {
    return this.last?.summary ?? { bytesProcessed: 0, bytesWritten: 0, blocks: 0 };
  }

  static trimTrailingZeros(bytes: Uint8Array): Uint8Array {
    return trimTrailingZeros(bytes);
  }

  static isByteSource(input: unknown): input is ByteSource {
    return (
      typeof input === 'object' &&
      input !== null &&
      typeof (input as ByteSource).read === 'function' &&
      typeof (input as ByteSource).label === 'string'
    );
  }

  static toByteSource(input: ByteInput, label?: string): ByteSource {
    if (Xorpad.isByteSource(input)) return input;
    if (input instanceof Uint8Array || input instanceof Blob) {
      return new BufferByteSource(input, label);
    }
    return new StreamByteSource(input, label);
  }

  // ════════════════════════════════════════════════════════════════════════
  //  INTERNAL
  // ════════════════════════════════════════════════════════════════════════

  private createEngine(a: ByteInput, b: ByteInput): XorEngine {
    this.last = new XorEngine(
      Xorpad.toByteSource(a, 'first input'),
      Xorpad.toByteSource(b, 'second input'),
      {
        preserveTrailingZeros : this.config.preserveTrailingZeros,
        chunkSize             : this.config.chunkSize,
        signal                : this.signal,
      },
      this.log,
    );
    return this.last;
  }

  private static checkChunkSize(n: number): number {
    if (!Number.isInteger(n) || n <= 0) {
      throw new ConfigError(`Chunk size must be a positive integer, got ${n}`);
    }
    return n;
  }
}

export { XorEngine } from './engine/XorEngine.js';
export { TrailingZeroTrimmer } from './stream/TrailingZeroTrimmer.js';
export { BufferByteSource, StreamByteSource } from './util/ByteSource.js';
export { xorPadded, trimTrailingZeros, concat } from './util/bytes.js';
export { createLogger, toVerbosity, type Logger, type Verbosity } from './util/logger.js';
export * from './errors/index.js';
export * from './config/defaults.js';
export type * from './types/index.js';
export { collectStream, memorySink } from './util/stream.js';
