/* ------------------------- Byte sources ------------------------------ */

/**
 * Sequential, read-once channel of bytes.
 *
 * `read(max)` resolves to exactly `max` bytes while data remains; a shorter
 * array means the source reached its end, an empty one that it is exhausted.
 */
export interface ByteSource {
  /** Display name used in diagnostics (a path, `stdin`, …). */
  readonly label: string;
  read(max: number, signal?: AbortSignal): Promise<Uint8Array>;
  close?(): Promise<void>;
}

/** Anything the engine can turn into a ByteSource. */
export type ByteInput = ByteSource | Uint8Array | Blob | ReadableStream<Uint8Array>;

/* ------------------------- Configuration ----------------------------- */

export interface XorConfig {
  readonly preserveTrailingZeros : boolean;
  readonly showProgress          : boolean;
  readonly chunkSize             : number;
}

/* ------------------------- Engine ------------------------------------ */

export type EngineState = 'start' | 'reading' | 'trimming' | 'done' | 'aborted';

export interface XorSummary {
  /** Sum of all per-iteration block lengths, i.e. the untrimmed length. */
  bytesProcessed : number;
  /** Bytes handed to the output after trimming. */
  bytesWritten   : number;
  blocks         : number;
}

export interface EngineOptions {
  readonly preserveTrailingZeros : boolean;
  readonly chunkSize             : number;
  readonly signal?               : AbortSignal;
}
