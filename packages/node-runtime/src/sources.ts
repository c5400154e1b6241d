// packages/node-runtime/src/sources.ts
import { open, stat, type FileHandle } from 'node:fs/promises';
import { constants, openSync } from 'node:fs';
import { Socket } from 'node:net';
import { stdin } from 'node:process';
import type { Readable } from 'node:stream';
import type { ByteSource } from '../../core/src/types/index.js';
import { StreamByteSource } from '../../core/src/util/ByteSource.js';
import { IoError, UsageError } from '../../core/src/errors/index.js';
import { raceAbort, throwIfAborted } from '../../core/src/util/abort.js';
import { STDIN_LABEL } from '../../core/src/config/defaults.js';
import { toWebReadable } from './streamAdapter.js';

export const STDIN_ARG = '-';

/**
 * Sequential reader over an open file handle, for regular files and character
 * devices. A single `read` may come back short on a device: it keeps reading
 * until `max` bytes or end of file. A pending read is raced against `signal`.
 */
export class FileByteSource implements ByteSource {
  private constructor(
    private readonly fh: FileHandle,
    readonly label: string,
  ) {}

  static async open(path: string): Promise<FileByteSource> {
    return new FileByteSource(await open(path, 'r'), path);
  }

  async read(max: number, signal?: AbortSignal): Promise<Uint8Array> {
    const buf = new Uint8Array(max);
    let filled = 0;
    while (filled < max) {
      throwIfAborted(signal);
      const { bytesRead } = await raceAbort(this.fh.read(buf, filled, max - filled, null), signal);
      if (bytesRead === 0) break;
      filled += bytesRead;
    }
    return filled === max ? buf : buf.slice(0, filled);
  }

  async close(): Promise<void> {
    await this.fh.close();
  }
}

/**
 * A named pipe read through the event loop instead of the fs thread pool, so a
 * read waiting on a silent writer can be cancelled and the process can exit.
 * The non-blocking open returns before a writer shows up; the socket only
 * reports end of data once a writer has come and gone.
 */
export function fifoSource(path: string): ByteSource {
  const fd   = openSync(path, constants.O_RDONLY | constants.O_NONBLOCK);
  const pipe = new Socket({ fd, readable: true, writable: false });
  return new StreamByteSource(toWebReadable(pipe), path);
}

/** Standard input as a ByteSource. Never closed by the tool. */
export function stdinSource(input: Readable = stdin): ByteSource {
  const src = new StreamByteSource(toWebReadable(input), STDIN_LABEL);
  return { label: src.label, read: (max, signal) => src.read(max, signal) };
}

/**
 * Open `path` for reading, `-` meaning standard input.
 * ENOENT and EACCES are usage errors; anything else is an I/O failure.
 */
export async function openInput(path: string, input: Readable = stdin): Promise<ByteSource> {
  if (path === STDIN_ARG) return stdinSource(input);
  try {
    const st = await stat(path);
    return st.isFIFO() ? fifoSource(path) : await FileByteSource.open(path);
  } catch (err) {
    throw classifyOpenError(err, path);
  }
}

export async function closeInput(src: ByteSource): Promise<void> {
  if (src.close) await src.close();
}

function classifyOpenError(err: unknown, path: string): Error {
  const code = errnoCode(err);
  if (code === 'ENOENT') return new UsageError('file not found');
  if (code === 'EACCES') return new UsageError('permission denied');
  const msg = err instanceof Error ? err.message : String(err);
  return new IoError(`cannot open ${path}: ${msg}`);
}

export function errnoCode(err: unknown): string | undefined {
  if (typeof err !== 'object' || err === null || !('code' in err)) return undefined;
  return typeof err.code === 'string' ? err.code : undefined;
}
