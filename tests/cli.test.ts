import { Readable } from 'stream';
import { run } from '../src/cli';
import { createLogger } from '../src/logger';

async function runCli(argv: string[], stdinLines: string[] = []) {
  let out = '';
  const code = await run(argv, {
    stdin: Readable.from(stdinLines),
    stdout: {
      write: (text: string) => {
        out += text;
      },
    },
    logger: createLogger({ level: 'silent', destination: { write: () => undefined } }),
  });
  return { code, out };
}

describe('Command line', () => {
  it('should join arguments into one expression', async () => {
    expect(await runCli(['2', '+', '3', '*', '4'])).toEqual({ code: 0, out: '14\n' });
    expect(await runCli(['(2 + 3) * 4'])).toEqual({ code: 0, out: '20\n' });
    expect(await runCli(['10', '/', '4'])).toEqual({ code: 0, out: '2.5\n' });
    expect(await runCli(['10', '/', '2'])).toEqual({ code: 0, out: '5\n' });
  });

  it('should read and trim one line from stdin without arguments', async () => {
    expect(await runCli([], ['  7 * 6  \n'])).toEqual({ code: 0, out: '42\n' });
    expect(await runCli([], ['-5 + 2\n'])).toEqual({ code: 0, out: '-3\n' });
    expect(await runCli([], ['1 + 1\n2 + 2\n'])).toEqual({ code: 0, out: '2\n' });
  });

  it('should reject an empty expression before lexing', async () => {
    const blank = await runCli([], ['   \n']);
    expect(blank).toEqual({ code: 1, out: 'Error: empty expression\n' });
    const eof = await runCli([], []);
    expect(eof).toEqual({ code: 1, out: 'Error: empty expression\n' });
  });

  it('should print errors with a non-zero status', async () => {
    expect(await runCli(['1', '/', '0'])).toEqual({
      code: 1,
      out: 'Error: Division by zero\n',
    });
    expect(await runCli(['2', '+'])).toEqual({
      code: 1,
      out: 'Error: Unexpected end of expression\n',
    });
    expect(await runCli(['2 & 3'])).toEqual({
      code: 1,
      out: "Error: Unexpected character: '&' at position 2\n",
    });
    expect(await runCli(['1.2.3'])).toEqual({
      code: 1,
      out: "Error: Unexpected token: '.3'\n",
    });
  });

  it('should honour --max-depth', async () => {
    expect(await runCli(['--max-depth', '2', '((1))'])).toEqual({ code: 0, out: '1\n' });
    expect(await runCli(['--max-depth', '2', '(((1)))'])).toEqual({
      code: 1,
      out: 'Error: Maximum nesting depth of 2 exceeded\n',
    });
    expect(await runCli(['--max-depth', '0', '1'])).toEqual({
      code: 1,
      out: 'Error: --max-depth must be a positive integer\n',
    });
  });

  it('should keep a literal -- as part of the expression', async () => {
    expect(await runCli(['1', '--', '2'])).toEqual({ code: 0, out: '3\n' });
    expect(await runCli(['--', '1'])).toEqual({ code: 0, out: '1\n' });
    expect(await runCli(['2', '--', '--', '3'])).toEqual({ code: 0, out: '5\n' });
  });

  it('should print help and version to stdout and return a status', async () => {
    const exit = jest.spyOn(process, 'exit').mockImplementation((code) => {
      throw new Error(`process.exit(${code})`);
    });
    try {
      const help = await runCli(['--help']);
      expect(help.code).toBe(0);
      expect(help.out).toContain('exprcalc [expression..]');
      expect(help.out).toContain('--max-depth');
      const version = await runCli(['--version']);
      expect(version.code).toBe(0);
      expect(version.out).toMatch(/\S\n$/);
      expect(exit).not.toHaveBeenCalled();
    } finally {
      exit.mockRestore();
    }
  });

  it('should ignore the environment when evaluating', async () => {
    process.env.EXPRCALC_MAX_DEPTH = '1';
    try {
      expect(await runCli(['((1))'])).toEqual({ code: 0, out: '1\n' });
    } finally {
      delete process.env.EXPRCALC_MAX_DEPTH;
    }
  });

  it('should report nesting that exhausts the stack as an error', async () => {
    const deep = '('.repeat(200000) + '1' + ')'.repeat(200000);
    expect(await runCli(['--max-depth', '100000000', deep])).toEqual({
      code: 1,
      out: 'Error: Expression nested too deeply\n',
    });
  });
});
