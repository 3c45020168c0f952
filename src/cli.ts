#!/usr/bin/env node
// src/cli.ts - Command-line entry: argument or stdin line in, one result line out
import { createInterface } from 'readline';
import { Readable } from 'stream';
import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import { Logger } from 'pino';
import { DEFAULT_MAX_DEPTH } from './types';
import { CalcError } from './errors';
import { evaluate } from './evaluator';
import { formatNumber } from './numbers';
import { createLogger } from './logger';

export interface Output {
  write(text: string): void;
}

export interface CliIO {
  stdin: Readable;
  stdout: Output;
  logger?: Logger;
}

async function readLine(input: Readable): Promise<string> {
  // Leaving the loop early closes the interface
  const rl = createInterface({ input, terminal: false });
  for await (const line of rl) {
    return line;
  }
  return ''; // EOF before any line
}

/**
 * Runs one evaluation and returns the process exit status.
 */
export async function run(argv: string[], io: CliIO): Promise<number> {
  const logger = io.logger ?? createLogger();
  const print = (line: string) => io.stdout.write(`${line}\n`);

  const parsed: { error?: Error; output: string } = { output: '' };
  const args = yargs()
    .scriptName('exprcalc')
    .usage(
      '$0 [expression..]\n\nEvaluates an arithmetic expression. With no expression, reads one line from stdin.'
    )
    .parserConfiguration({
      // `exprcalc -5 + 2` must reach the evaluator untouched
      'unknown-options-as-args': true,
      'parse-positional-numbers': false,
      // `1 -- 2` is an expression, not an end-of-options marker
      'populate--': true,
    })
    .options({
      'max-depth': {
        default: DEFAULT_MAX_DEPTH,
        describe: 'Deepest nesting of parentheses and unary signs allowed',
        type: 'number',
      },
    })
    .strict(false)
    .help()
    .exitProcess(false)
    .parseSync(argv, {}, (err, _argv, output) => {
      parsed.error = err;
      parsed.output = output;
    });

  // --help and --version text
  if (parsed.output) {
    print(parsed.output);
    return parsed.error ? 1 : 0;
  }
  if (parsed.error) {
    print(`Error: ${parsed.error.message}`);
    return 1;
  }

  const maxDepth = args['max-depth'];
  if (!Number.isInteger(maxDepth) || maxDepth < 1) {
    print('Error: --max-depth must be a positive integer');
    return 1;
  }

  const words = args._.map(String);
  const afterDashes = args['--'];
  if (argv.includes('--')) {
    words.push('--', ...(Array.isArray(afterDashes) ? afterDashes.map(String) : []));
  }
  const expression =
    words.length > 0 ? words.join(' ').trim() : (await readLine(io.stdin)).trim();
  logger.debug({ expression, source: words.length > 0 ? 'argv' : 'stdin' }, 'resolved expression');

  if (!expression) {
    print('Error: empty expression');
    return 1;
  }

  try {
    const value = evaluate(expression, { maxDepth });
    logger.debug({ kind: value.kind }, 'evaluated');
    print(formatNumber(value));
    return 0;
  } catch (e: unknown) {
    if (e instanceof CalcError) {
      logger.debug({ err: e }, 'evaluation failed');
      print(`Error: ${e.message}`);
      return 1;
    }
    throw e;
  }
}

export async function main(): Promise<void> {
  const logger = createLogger();
  try {
    process.exitCode = await run(hideBin(process.argv), {
      stdin: process.stdin,
      stdout: process.stdout,
      logger,
    });
  } catch (e: unknown) {
    logger.fatal({ err: e }, 'unexpected failure');
    process.exitCode = 1;
  }
}

if (require.main === module) {
  void main();
}
