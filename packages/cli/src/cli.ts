#!/usr/bin/env node
// ============================================================================
// @baseshift/cli — Convert numbers between bases from the command line
// ============================================================================
// Usage:
//   baseshift -n FF0.8 -i 16 -o 10          → 4080.5
//   echo 3.1415926 | baseshift -o 16 -d 3   → 3.243
//   baseshift -n 0.1 -i 10 -o 3 --exact     → 0.[0022]
// ============================================================================

import process from 'node:process';
import { fileURLToPath } from 'node:url';
import {
  DEFAULT_MAX_DEPTH,
  type ConvertOptions,
  InvalidBaseError,
  convertToDigits,
  formatDigits,
  formatString,
  isValidBase,
} from '@baseshift/core';

export interface CliIO {
  stdout(text: string): void;
  stderr(text: string): void;
  readStdin(): Promise<string>;
}

async function readProcessStdin(): Promise<string> {
  process.stdin.setEncoding('utf8');
  let text = '';
  for await (const chunk of process.stdin) {
    text += String(chunk);
  }
  return text;
}

const processIO: CliIO = {
  stdout: (text) => process.stdout.write(`${text}\n`),
  stderr: (text) => process.stderr.write(`${text}\n`),
  readStdin: readProcessStdin,
};

function getFlag(args: readonly string[], ...names: string[]): string | undefined {
  for (const name of names) {
    const idx = args.indexOf(name);
    if (idx !== -1 && idx + 1 < args.length) return args[idx + 1];
  }
  return undefined;
}

function hasFlag(args: readonly string[], ...names: string[]): boolean {
  return names.some((name) => args.includes(name));
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error';
}

/**
 * Read a base flag. Text like "16.0" is accepted as 16; anything that is not an
 * integer >= 2 is an InvalidBaseError.
 */
function parseBase(text: string | undefined, role: 'input' | 'output'): number {
  if (text === undefined) return 10;
  const value = Number(text);
  if (text.trim() === '' || !isValidBase(value)) {
    throw new InvalidBaseError(text, role);
  }
  return value;
}

function parseDepth(text: string | undefined): number {
  if (text === undefined) return DEFAULT_MAX_DEPTH;
  return text.trim() === '' ? Number.NaN : Number(text);
}

function usage(): string {
  return `
  baseshift: convert rational numbers between bases

  Usage:
    baseshift [-n <number>] [-i <base>] [-o <base>] [-d <depth>] [--exact] [--no-recurring] [--json]

  Options:
    -n, --number <text>       Number to convert (read from stdin when omitted)
    -i, --input-base <base>   Base to convert from (default 10)
    -o, --output-base <base>  Base to convert to (default 10)
    -d, --max-depth <n>       Maximum fractional digits (default ${DEFAULT_MAX_DEPTH}; 0 = exact)
    --exact                   Expand until the fraction terminates or repeats
    --no-recurring            Print repeating digits without [ ] brackets
    --json                    Print the result, digit tokens and flags as JSON
    -h, --help                Show this help

  Environment Variables:
    BASESHIFT_DEBUG=1         Log cycle detection, truncation and timings
  `;
}

/**
 * Run the CLI with the given arguments. Resolves to the process exit code.
 */
export async function runCli(args: readonly string[], io: CliIO = processIO): Promise<number> {
  if (hasFlag(args, '-h', '--help')) {
    io.stdout(usage());
    return 0;
  }

  try {
    const inputBase = parseBase(getFlag(args, '-i', '--input-base'), 'input');
    const outputBase = parseBase(getFlag(args, '-o', '--output-base'), 'output');
    const options: ConvertOptions = {
      maxDepth: parseDepth(getFlag(args, '-d', '--max-depth')),
      exact: hasFlag(args, '--exact'),
      recurring: !hasFlag(args, '--no-recurring'),
    };

    const number = getFlag(args, '-n', '--number') ?? (await io.readStdin()).trim();
    const output = convertToDigits(number, inputBase, outputBase, options);
    const format = { recurring: options.recurring };
    const result = formatString(output, format);

    if (hasFlag(args, '--json')) {
      io.stdout(
        JSON.stringify({
          result,
          digits: formatDigits(output, format),
          truncated: output.truncated,
        }),
      );
    } else {
      io.stdout(result);
    }
    return 0;
  } catch (error: unknown) {
    io.stderr(`Error: ${errorMessage(error)}`);
    return 1;
  }
}

const isDirectExecution = process.argv[1]
  ? fileURLToPath(import.meta.url) === process.argv[1]
  : false;

if (isDirectExecution) {
  runCli(process.argv.slice(2))
    .then((code) => {
      process.exitCode = code;
    })
    .catch((error: unknown) => {
      console.error(`Error: ${errorMessage(error)}`);
      process.exitCode = 1;
    });
}
