// packages/core/src/engine/XorEngine.ts
import type { ByteSource, EngineOptions, EngineState, XorSummary } from '../types/index.js';
import { TrailingZeroTrimmer } from '../stream/TrailingZeroTrimmer.js';
import { xorPadded } from '../util/bytes.js';
import { raceAbort, throwIfAborted } from '../util/abort.js';
import { PROGRESS_INTERVAL } from '../config/defaults.js';
import type { Logger } from '../util/logger.js';
import { IoError, XorError } from '../errors/index.js';

/**
 * One XOR run over two sources.
 *
 *   start → reading → trimming → done
 *              └──────────────→ aborted
 *
 * An engine is single-use: `blocks()` or `run()` may be called once.
 */
export class XorEngine {
  #state: EngineState = 'start';
  readonly #summary: XorSummary = { bytesProcessed: 0, bytesWritten: 0, blocks: 0 };

  constructor(
    private readonly source1: ByteSource,
    private readonly source2: ByteSource,
    private readonly opt: EngineOptions,
    private readonly log: Logger,
  ) {}

  get state(): EngineState {
    return this.#state;
  }

  get summary(): Readonly<XorSummary> {
    return { ...this.#summary };
  }

  /**
   * Output pieces in offset order. With trimming enabled, trailing zeros are
   * held back and never yielded; interior zero runs are yielded once the next
   * non-zero byte shows up.
   */
  async *blocks(): AsyncGenerator<Uint8Array, void, undefined> {
    this.assertUnused();
    this.#state = 'reading';

    const trimmer = this.opt.preserveTrailingZeros
      ? null
      : new TrailingZeroTrimmer(this.opt.chunkSize);

    this.log.log(1, 'XORing input streams');

    try {
      while (true) {
        throwIfAborted(this.opt.signal);

        const [block1, block2] = await Promise.all([
          this.readFrom(this.source1),
          this.readFrom(this.source2),
        ]);
        if (block1.byteLength === 0 && block2.byteLength === 0) break;

        const result = xorPadded(block1, block2);
        this.account(block1.byteLength, block2.byteLength, result.byteLength);

        const pieces = trimmer ? trimmer.push(result) : [result];
        for (const piece of pieces) {
          this.#summary.bytesWritten += piece.byteLength;
          yield piece;
        }
      }
    } catch (err) {
      this.#state = 'aborted';
      throw err;
    }

    this.#state = 'trimming';
    const dropped = trimmer ? trimmer.finish() : 0;
    if (dropped > 0) this.log.log(2, `dropped ${dropped} trailing zero bytes`);
    this.#state = 'done';

    const { bytesProcessed, bytesWritten } = this.#summary;
    const zeroMsg = this.opt.preserveTrailingZeros ? 'preserved' : 'after stripping trailing zeros';
    this.log.log(1, `XOR complete: ${bytesProcessed} bytes processed, ${bytesWritten} bytes ${zeroMsg}`);
  }

  /** Drive the engine into `sink`. The sink is closed on success and left untouched on failure. */
  async run(sink: WritableStream<Uint8Array>): Promise<XorSummary> {
    this.assertUnused();
    const writer = sink.getWriter();
    try {
      for await (const piece of this.blocks()) {
        await this.writeTo(writer, piece);
      }
      await this.writeTo(writer, null);
    } catch (err) {
      this.#state = 'aborted';
      throw err;
    } finally {
      writer.releaseLock();
    }
    return this.summary;
  }

  /* ------------------------------------------------------------------ */
  /*  Internals                                                          */
  /* ------------------------------------------------------------------ */

  private assertUnused(): void {
    if (this.#state !== 'start') {
      throw new XorError(`XorEngine already used (state: ${this.#state})`);
    }
  }

  private async readFrom(src: ByteSource): Promise<Uint8Array> {
    try {
      return await src.read(this.opt.chunkSize, this.opt.signal);
    } catch (err) {
      throw asIoError(err, `read error on ${src.label}`);
    }
  }

  /** `null` closes the writer. */
  private async writeTo(
    writer: WritableStreamDefaultWriter<Uint8Array>,
    piece : Uint8Array | null,
  ): Promise<void> {
    try {
      await raceAbort(piece ? writer.write(piece) : writer.close(), this.opt.signal);
    } catch (err) {
      throw asIoError(err, 'write error');
    }
  }

  private account(read1: number, read2: number, m: number): void {
    const before = this.#summary.bytesProcessed;
    this.#summary.bytesProcessed += m;
    this.#summary.blocks++;

    this.log.log(3, `block ${this.#summary.blocks}: ${read1} + ${read2} bytes read, ${m} bytes out`);

    const after = this.#summary.bytesProcessed;
    if (Math.floor(after / PROGRESS_INTERVAL) > Math.floor(before / PROGRESS_INTERVAL)) {
      this.log.log(1, `processed ${after} bytes`);
    }
  }
}

/**
 * Cancellation and other classified errors pass through; anything else is an
 * I/O failure, keeping the underlying error as `cause`.
 */
function asIoError(err: unknown, context: string): XorError {
  if (err instanceof XorError) return err;
  const msg = err instanceof Error ? err.message : String(err);
  return new IoError(`${context}: ${msg}`, { cause: err });
}
