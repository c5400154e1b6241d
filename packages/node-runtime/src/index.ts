// packages/node-runtime/src/index.ts
import { Xorpad, type XorpadOptions } from '../../core/src/index.js';
import { stderr } from 'node:process';

/** Xorpad whose diagnostics go to stderr unless a logger is given. */
export function createXorpad(cfg: XorpadOptions = {}): Xorpad {
  return new Xorpad({
    logger: msg => stderr.write(msg + '\n'),
    ...cfg,
  });
}

export { Xorpad } from '../../core/src/index.js';
export { FileByteSource, fifoSource, openInput, closeInput, stdinSource, STDIN_ARG } from './sources.js';
export { validateInputs, validateFileAccess, isSameFile } from './validate.js';
export { toWebReadable, toWebWritable } from './streamAdapter.js';
