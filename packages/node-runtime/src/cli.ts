#!/usr/bin/env node
// packages/node-runtime/src/cli.ts
import { Command, CommanderError, InvalidArgumentError, Option } from 'commander';
import { stdin, stdout, stderr, exit as processExit } from 'node:process';
import { AbortedError, IoError, UsageError } from '../../core/src/errors/index.js';
import { PROG_NAME, VERSION, DEFAULT_CHUNK_SIZE, STDIN_LABEL } from '../../core/src/config/defaults.js';
import { createLogger, toVerbosity } from '../../core/src/util/logger.js';
import type { ByteSource } from '../../core/src/types/index.js';
import { createXorpad } from './index.js';
import { openInput, closeInput, errnoCode, STDIN_ARG } from './sources.js';
import { validateInputs } from './validate.js';
import { toWebWritable } from './streamAdapter.js';

const EXIT_ERROR = 1;
const EXIT_USAGE = 2;
/** 128 + SIGPIPE, what a shell reports for a writer killed by a closed pipe */
const EXIT_BROKEN_PIPE = 141;

const SIGNALS: ReadonlyArray<[NodeJS.Signals, string, number]> = [
  ['SIGINT',  'interrupted', 130],
  ['SIGTERM', 'terminated',  143],
  ['SIGHUP',  'hangup',      129],
];

const EXAMPLES = `
Examples:
  ${PROG_NAME} plaintext ciphertext > result.bin     # XOR two files
  ${PROG_NAME} file1 - < file2 > result              # Use stdin for second file
  cat file2 | ${PROG_NAME} file1 - > result          # Use stdin for second file
  ${PROG_NAME} -z file1 file2 > result.bin           # Preserve trailing zeros

XOR Properties:
  If result = A ⊕ B, then A = result ⊕ B and B = result ⊕ A
  This means any two components can recover the third:
  ${PROG_NAME} fileA fileB > result                  # XOR A and B
  ${PROG_NAME} result fileB > recovered_A            # Recover A using result and B
  ${PROG_NAME} result fileA > recovered_B            # Recover B using result and A
`;

interface CliOptions {
  progress      : boolean;
  preserveZeros : boolean;
  chunkSize     : number;
  verbose       : number;
}

const abort = new AbortController();

/** True while the engine runs and can observe `abort`. */
let running = false;

function die(message: string, code: number): never {
  stderr.write(`${PROG_NAME}: ${message}\n`);
  processExit(code);
}

/** The reader of stdout went away, as in `xor a b | head`. */
function isBrokenPipe(err: unknown): boolean {
  return err instanceof IoError && errnoCode(err.cause) === 'EPIPE';
}

function exitCodeOf(err: unknown): number {
  if (err instanceof CommanderError) return err.exitCode === 0 ? 0 : EXIT_USAGE;
  if (err instanceof AbortedError)   return err.exitCode;
  if (err instanceof UsageError)     return EXIT_USAGE;
  return EXIT_ERROR;
}

for (const [sig, message, code] of SIGNALS) {
  process.on(sig, () => {
    const reason = new AbortedError(message, code);
    // the engine stops at its next read or write; anywhere else leave right away
    if (!running) die(reason.message, reason.exitCode);
    abort.abort(reason);
  });
}

process.on('uncaughtException', err => {
  die(err.message, exitCodeOf(err));
});

process.on('unhandledRejection', (err: unknown) => {
  die(err instanceof Error ? err.message : String(err), exitCodeOf(err));
});

const program = new Command();

program
  .name(PROG_NAME)
  .usage('[-h] [-p] [-z] [-c bytes] [-v] [--version] file file')
  .description('XOR two files together, padding shorter with zeros')
  .version(`${PROG_NAME} ${VERSION}`, '--version', "show program's version number and exit")
  .helpOption('-h, --help', 'show this help message and exit')
  .argument('[files...]', "Two input files to XOR (use '-' for stdin)")
  .option('-p, --progress', 'Show progress information to stderr', false)
  .option('-z, --preserve-zeros', 'Preserve trailing zero bytes in output (default: strip them)', false)
  .addOption(
    new Option('-c, --chunk-size <bytes>', 'bytes read from each input per step')
      .argParser((v) => {
        const n = Number(v);
        if (!Number.isInteger(n) || n <= 0) {
          throw new InvalidArgumentError('Chunk size must be a positive integer');
        }
        return n;
      })
      .default(DEFAULT_CHUNK_SIZE, String(DEFAULT_CHUNK_SIZE))
  )
  // verbosity (repeatable)
  .addOption(
    new Option('-v, --verbose', 'increase verbosity (use multiple times)')
      .default(0)
      .argParser((_, previous: number) => previous + 1)
  )
  .addHelpText('after', EXAMPLES + `\nVersion ${VERSION}`)
  .configureOutput({
    outputError: (str, write) => write(`${PROG_NAME}: ${str}`),
  })
  .exitOverride()
  .action(async (files: string[], opts: CliOptions) => {
    const [file1, file2] = await validateInputs(files);
    await xorFiles(file1, file2, opts);
  });

async function xorFiles(file1: string, file2: string, opts: CliOptions): Promise<void> {
  const level = toVerbosity(Math.max(opts.verbose, opts.progress ? 1 : 0));
  const log   = createLogger(level, msg => stderr.write(msg + '\n'), PROG_NAME);
  const name  = (f: string) => (f === STDIN_ARG ? STDIN_LABEL : f);

  const stdinCount = [file1, file2].filter(f => f === STDIN_ARG).length;
  if (stdinCount === 1 && stdin.isTTY) {
    log.log(1, 'waiting for input from stdin...');
  }

  const opened: ByteSource[] = [];
  try {
    log.log(1, `reading file1: ${name(file1)}`);
    const src1 = await openInput(file1);
    opened.push(src1);

    log.log(1, `reading file2: ${name(file2)}`);
    const src2 = await openInput(file2);
    opened.push(src2);

    if (stdout.isTTY) {
      log.log(1, 'warning: output going to terminal (consider redirecting to file)');
    }

    const xor = createXorpad({
      preserveTrailingZeros: opts.preserveZeros,
      showProgress: opts.progress,
      chunkSize: opts.chunkSize,
      verbose: level,
      logTag: PROG_NAME,
      signal: abort.signal,
    });
    running = true;
    await xor.xorToSink(src1, src2, toWebWritable(stdout));
  } finally {
    running = false;
    await Promise.all(opened.map(closeInput));
  }
}

try {
  await program.parseAsync();
} catch (err) {
  const code = exitCodeOf(err);
  if (err instanceof CommanderError) {
    // commander already printed help, version or its own error line
    processExit(code);
  }
  if (isBrokenPipe(err)) processExit(EXIT_BROKEN_PIPE);
  const msg = err instanceof Error ? err.message : String(err);
  stderr.write(`${PROG_NAME}: ${msg}\n`);
  if (err instanceof UsageError && err.showHelpHint) {
    stderr.write(`Try '${PROG_NAME} --help' for more information.\n`);
  }
  processExit(code);
}
