export const VERSION   = '1.0.0';
export const PROG_NAME = 'xor';

/** Bytes read from each source per iteration. Tuning only; any positive size gives the same output. */
export const DEFAULT_CHUNK_SIZE = 64 * 1024;

/** A progress line is logged each time the processed count crosses a multiple of this. */
export const PROGRESS_INTERVAL = DEFAULT_CHUNK_SIZE * 16;

export const STDIN_LABEL = 'stdin';
