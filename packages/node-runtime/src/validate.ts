// packages/node-runtime/src/validate.ts
import { access, stat, constants as fsConstants } from 'node:fs/promises';
import type { Stats } from 'node:fs';
import { UsageError } from '../../core/src/errors/index.js';
import { STDIN_ARG } from './sources.js';

export const FIRST_INPUT  = 'first input file';
export const SECOND_INPUT = 'second input file';

/**
 * Check that `path` names something we can stream from: a regular file,
 * a FIFO or a character device, readable by this process. `-` always passes.
 */
export async function validateFileAccess(path: string, description: string): Promise<void> {
  if (path === STDIN_ARG) return;

  let st: Stats;
  try {
    st = await stat(path);
  } catch {
    throw new UsageError(`${description} not found: ${path}`);
  }

  if (!st.isFile() && !st.isFIFO() && !st.isCharacterDevice()) {
    throw new UsageError(`${description} is not a readable file: ${path}`);
  }

  try {
    await access(path, fsConstants.R_OK);
  } catch {
    throw new UsageError(`cannot read ${description}: ${path}`);
  }
}

/** Same device and inode; `-` never matches, nor does a path that cannot be stat'ed. */
export async function isSameFile(file1: string, file2: string): Promise<boolean> {
  if (file1 === STDIN_ARG || file2 === STDIN_ARG) return false;
  try {
    const [st1, st2] = await Promise.all([stat(file1), stat(file2)]);
    return st1.dev === st2.dev && st1.ino === st2.ino;
  } catch {
    return false;
  }
}

/**
 * All argument checks that run before any input is opened, in the order a
 * user sees them reported.
 */
export async function validateInputs(files: readonly string[]): Promise<[string, string]> {
  if (files.length !== 2) {
    throw new UsageError('error: requires exactly two file arguments', true);
  }
  const [file1, file2] = files;

  await validateFileAccess(file1, FIRST_INPUT);
  await validateFileAccess(file2, SECOND_INPUT);

  if (file1 === STDIN_ARG && file2 === STDIN_ARG) {
    throw new UsageError('cannot read multiple files from stdin');
  }
  if (await isSameFile(file1, file2)) {
    throw new UsageError('cannot use the same file for both inputs');
  }
  return [file1, file2];
}
