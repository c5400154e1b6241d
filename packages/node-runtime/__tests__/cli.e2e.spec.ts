import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { fileURLToPath } from 'node:url';
import { promises as fs } from 'node:fs';
import { execa } from 'execa';
import { trimTrailingZeros, xorPadded } from '../../core/src/util/bytes.js';

/* ------------------------------------------------------------------ */
/*  Paths & runner                                                     */
/* ------------------------------------------------------------------ */
const CLI = fileURLToPath(new URL('../src/cli.ts', import.meta.url));

const spawn = (args: string[], input?: string | Uint8Array) =>
  execa(process.execPath, ['--import', 'tsx', CLI, ...args], {
    input,
    encoding: 'buffer',
    reject: false,
    stripFinalNewline: false,
  });

const run = async (args: string[], input?: string | Uint8Array) => {
  const res = await spawn(args, input);
  return {
    code  : res.exitCode,
    stdout: Buffer.from(res.stdout),
    stderr: Buffer.from(res.stderr).toString('utf8'),
  };
};

const bytes = (s: string) => Buffer.from(s, 'utf8');

/* ------------------------------------------------------------------ */
/*  Tests                                                              */
/* ------------------------------------------------------------------ */
describe('xor (CLI)', () => {
  let dir: string, text: string, key: string, tail: string, empty: string, result: string;

  beforeAll(async () => {
    dir    = await fs.mkdtemp(join(tmpdir(), 'xorpad-cli-'));
    text   = join(dir, 'text.bin');
    key    = join(dir, 'key.bin');
    tail   = join(dir, 'tail.bin');
    empty  = join(dir, 'empty.bin');
    result = join(dir, 'result.bin');
    await fs.writeFile(text, 'hello world');
    await fs.writeFile(key, 'key_data_123');
    await fs.writeFile(tail, Uint8Array.of(1, 2, 0));
    await fs.writeFile(empty, Uint8Array.of());
  });

  afterAll(() => fs.rm(dir, { recursive: true, force: true }));

  it('any two of A, B and A⊕B recover the third', async () => {
    const xored = await run([text, key]);
    expect(xored.code).toBe(0);
    expect(xored.stderr).toBe('');
    expect(xored.stdout.equals(Buffer.from(xorPadded(bytes('hello world'), bytes('key_data_123'))))).toBe(true);

    await fs.writeFile(result, xored.stdout);

    const a = await run([result, key]);
    const b = await run([result, text]);
    expect(a.stdout.toString()).toBe('hello world');
    expect(b.stdout.toString()).toBe('key_data_123');
  });

  it.each([
    ['second', (f: string) => [f, '-']],
    ['first',  (f: string) => ['-', f]],
  ])('reads stdin as the %s input', async (_pos, args) => {
    const out = await run(args(text), 'stdin_test2');
    const expected = trimTrailingZeros(xorPadded(bytes('hello world'), bytes('stdin_test2')));
    expect(out.code).toBe(0);
    expect(out.stdout.equals(Buffer.from(expected))).toBe(true);
  });

  it('strips trailing zeros unless -z / --preserve-zeros is given', async () => {
    expect(Array.from((await run([tail, empty])).stdout)).toEqual([1, 2]);
    expect(Array.from((await run(['-z', tail, empty])).stdout)).toEqual([1, 2, 0]);
    expect(Array.from((await run(['--preserve-zeros', tail, empty])).stdout)).toEqual([1, 2, 0]);
  });

  it('gives the same bytes for any chunk size', async () => {
    const [small, big] = await Promise.all([run(['-c', '1', text, key]), run([text, key])]);
    expect(small.stdout.equals(big.stdout)).toBe(true);
  });

  it('writes progress to stderr only', async () => {
    const out = await run(['-p', text, key]);
    expect(out.code).toBe(0);
    expect(out.stdout.byteLength).toBe(12);
    expect(out.stderr).toBe(
      `xor: reading file1: ${text}\n` +
      `xor: reading file2: ${key}\n` +
      'xor: XORing input streams\n' +
      'xor: XOR complete: 12 bytes processed, 12 bytes after stripping trailing zeros\n',
    );
  });

  describe('usage errors exit with status 2', () => {
    it('requires exactly two files', async () => {
      for (const args of [[], [text], [text, key, tail]]) {
        const out = await run(args);
        expect(out.code).toBe(2);
        expect(out.stderr).toBe(
          "xor: error: requires exactly two file arguments\nTry 'xor --help' for more information.\n",
        );
      }
    });

    it('names a missing input', async () => {
      const missing = join(dir, 'missing.bin');
      const out = await run([missing, text]);
      expect(out.code).toBe(2);
      expect(out.stderr).toBe(`xor: first input file not found: ${missing}\n`);
    });

    it('refuses a directory', async () => {
      const out = await run([text, dir]);
      expect(out.code).toBe(2);
      expect(out.stderr).toBe(`xor: second input file is not a readable file: ${dir}\n`);
    });

    it('refuses the same file twice', async () => {
      const out = await run([text, text]);
      expect(out.code).toBe(2);
      expect(out.stderr).toBe('xor: cannot use the same file for both inputs\n');
    });

    it('refuses stdin twice', async () => {
      const out = await run(['-', '-']);
      expect(out.code).toBe(2);
      expect(out.stderr).toBe('xor: cannot read multiple files from stdin\n');
    });

    it('rejects a bad chunk size', async () => {
      const out = await run(['-c', '0', text, key]);
      expect(out.code).toBe(2);
      expect(out.stderr).toMatch(/^xor: error: option '-c, --chunk-size <bytes>' argument '0' is invalid/);
    });

    it('rejects unknown options', async () => {
      const out = await run(['--bogus', text, key]);
      expect(out.code).toBe(2);
      expect(out.stderr).toMatch(/^xor: error: unknown option '--bogus'/);
    });
  });

  it('prints the version', async () => {
    const out = await run(['--version']);
    expect(out.code).toBe(0);
    expect(out.stdout.toString()).toBe('xor 1.0.0\n');
  });

  it('prints help with examples', async () => {
    const out  = await run(['--help']);
    const help = out.stdout.toString();
    expect(out.code).toBe(0);
    expect(help).toContain('Usage: xor [-h] [-p] [-z] [-c bytes] [-v] [--version] file file');
    expect(help).toContain('  xor result fileB > recovered_A            # Recover A using result and B');
    expect(help).toContain('Version 1.0.0');
  });

  it('exits 130 on SIGINT while a named pipe stays silent', async () => {
    const fifo = join(dir, 'silent.fifo');
    await execa('mkfifo', [fifo]);

    const sub = spawn(['-p', fifo, key]);
    let seen = '';
    let sent = false;
    sub.stderr?.on('data', (chunk: Buffer) => {
      seen += chunk.toString('utf8');
      if (!sent && seen.includes('XORing input streams')) {
        sent = true;
        sub.kill('SIGINT');
      }
    });

    const res = await sub;
    expect(res.exitCode).toBe(130);
    expect(Buffer.from(res.stderr).toString('utf8')).toMatch(/xor: interrupted\n$/);
    expect(res.stdout.byteLength).toBe(0);
  });

  it('ends quietly with 141 when the output reader goes away', async () => {
    const big1 = join(dir, 'big1.bin');
    const big2 = join(dir, 'big2.bin');
    await fs.writeFile(big1, Buffer.alloc(4 * 1024 * 1024, 0x5a));
    await fs.writeFile(big2, Buffer.alloc(4 * 1024 * 1024, 0x0f));

    const res = await execa(
      'bash',
      ['-c', '"$@" | head -c 10 > /dev/null; echo "${PIPESTATUS[0]}"', 'pipeline',
        process.execPath, '--import', 'tsx', CLI, big1, big2],
      { reject: false },
    );
    expect(res.stdout).toBe('141');
    expect(res.stderr).toBe('');
  });

  it('exits 143 on SIGTERM while waiting for stdin', async () => {
    const sub = spawn(['-p', text, '-']);
    let seen = '';
    let sent = false;
    sub.stderr?.on('data', (chunk: Buffer) => {
      seen += chunk.toString('utf8');
      if (!sent && seen.includes('XORing input streams')) {
        sent = true;
        sub.kill('SIGTERM');
      }
    });

    const res = await sub;
    expect(res.exitCode).toBe(143);
    expect(Buffer.from(res.stderr).toString('utf8')).toMatch(/xor: terminated\n$/);
    expect(res.stdout.byteLength).toBe(0);
  });
});
