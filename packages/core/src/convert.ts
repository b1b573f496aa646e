// ============================================================================
// @baseshift/core — Conversion Pipeline
// ============================================================================
//
//   input ─▶ normalizeNumber ─▶ CanonicalNumber
//                                 ├─▶ integer digits ─▶ bigint ─▶ output digits
//                                 └─▶ toExactFraction ─▶ convertFraction
//         ─▶ OutputDigits ─▶ formatDigits / formatString
//
// Every call is independent: no state survives between conversions.
// ============================================================================

import { convertFraction, toExactFraction, unrollCycle } from './fraction.js';
import { canonicalToSequence, formatDigits, formatString } from './formatter.js';
import { bigIntToDigits, digitsToBigInt } from './integer.js';
import { timer } from './logger.js';
import { normalizeNumber } from './normalize.js';
import {
  type ConvertOptions,
  type ResolvedConvertOptions,
  fractionDigitBound,
  resolveOptions,
} from './options.js';
import type { DigitSequence, DigitToken, NumberInput, OutputDigits } from './types.js';
import { assertValidBase } from './validate.js';

/**
 * Run the pipeline with already-validated bases and resolved options.
 */
function run(
  number: NumberInput,
  inputBase: number,
  outputBase: number,
  options: ResolvedConvertOptions,
): OutputDigits {
  const t = timer('convert');
  const canonical = normalizeNumber(number, inputBase);
  const fraction = toExactFraction(canonical);

  // A recurring tail like 0.[9] carries into the integer part.
  const carry = fraction.numerator / fraction.denominator;
  const integerValue = digitsToBigInt(canonical.integerDigits, canonical.base) + carry;

  const bound = fractionDigitBound(options);
  let expansion = convertFraction(
    { numerator: fraction.numerator % fraction.denominator, denominator: fraction.denominator },
    outputBase,
    bound,
  );
  if (!options.recurring) {
    expansion = unrollCycle(expansion, bound);
  }

  const integerDigits = bigIntToDigits(integerValue, outputBase);
  // Truncation can leave only zeros behind; zero is unsigned.
  const isZero = integerValue === 0n && expansion.digits.every((d) => d === 0);
  const output: OutputDigits = {
    sign: isZero ? 1 : canonical.sign,
    base: outputBase,
    integerDigits,
    fractionalDigits: expansion.digits,
    recurringStart: expansion.recurringStart,
    truncated: expansion.truncated,
  };

  t.endWith({
    inputBase,
    outputBase,
    fractionDigits: output.fractionalDigits.length,
    recurringStart: output.recurringStart,
    truncated: output.truncated,
  });
  return output;
}

function render(output: OutputDigits, options: ResolvedConvertOptions): string | DigitSequence {
  const format = { recurring: options.recurring };
  return options.string ? formatString(output, format) : formatDigits(output, format);
}

/**
 * Convert a number and return the structured result before rendering.
 *
 * @throws {BaseshiftError} Any of the parse, base or option errors; never for truncation.
 */
export function convertToDigits(
  number: NumberInput,
  inputBase = 10,
  outputBase = 10,
  options: ConvertOptions = {},
): OutputDigits {
  assertValidBase(inputBase, 'input');
  assertValidBase(outputBase, 'output');
  return run(number, inputBase, outputBase, resolveOptions(options));
}

/**
 * Convert a number from one base to another.
 *
 * @example
 * ```ts
 * convert([15, 15, 0, '.', 8], 16, 10);              // → [4, 0, 8, 0, '.', 5]
 * convert('FF0.8', 16, 10, { string: true });        // → '4080.5'
 * convert('0.1', 3, 10, { string: true });           // → '0.[3]'
 * convert('0.2', 10, 8, { maxDepth: 1 });            // → [0, '.', 1]
 * ```
 */
export function convert(
  number: NumberInput,
  inputBase: number,
  outputBase: number,
  options: ConvertOptions & { string: true },
): string;
export function convert(
  number: NumberInput,
  inputBase?: number,
  outputBase?: number,
  options?: ConvertOptions & { string?: false },
): DigitSequence;
export function convert(
  number: NumberInput,
  inputBase?: number,
  outputBase?: number,
  options?: ConvertOptions,
): string | DigitSequence;
export function convert(
  number: NumberInput,
  inputBase = 10,
  outputBase = 10,
  options: ConvertOptions = {},
): string | DigitSequence {
  assertValidBase(inputBase, 'input');
  assertValidBase(outputBase, 'output');
  const resolved = resolveOptions(options);
  return render(run(number, inputBase, outputBase, resolved), resolved);
}

/**
 * Parse a number string into the token sequence representation, in the same base.
 *
 * @example
 * ```ts
 * parseDigitString('868.0F', 16); // → [8, 6, 8, '.', 0, 15]
 * ```
 */
export function parseDigitString(text: string, base: number): DigitToken[] {
  return canonicalToSequence(normalizeNumber(text, base));
}

// ---------------------------------------------------------------------------
// Reusable converter
// ---------------------------------------------------------------------------

/**
 * Bases and options bound once, validated once, reused for many numbers.
 *
 * Instances are immutable and safe to share.
 *
 * @example
 * ```ts
 * const hexToOct = new BaseConverter(16, 8);
 * hexToOct.convert('FF');      // → [3, 7, 7]
 * hexToOct.format([15, 15]);   // → '377'
 * ```
 */
export class BaseConverter {
  readonly inputBase: number;
  readonly outputBase: number;
  readonly options: ResolvedConvertOptions;

  constructor(inputBase: number, outputBase: number, options: ConvertOptions = {}) {
    assertValidBase(inputBase, 'input');
    assertValidBase(outputBase, 'output');
    this.inputBase = inputBase;
    this.outputBase = outputBase;
    this.options = Object.freeze({ ...resolveOptions(options) });
  }

  /** Convert using the bound `string` option to pick the result shape. */
  convert(number: NumberInput): string | DigitSequence {
    return render(this.toDigits(number), this.options);
  }

  /** Convert and render as a string regardless of the bound `string` option. */
  format(number: NumberInput): string {
    return formatString(this.toDigits(number), { recurring: this.options.recurring });
  }

  /** Convert and lay out as tokens regardless of the bound `string` option. */
  toSequence(number: NumberInput): DigitSequence {
    return formatDigits(this.toDigits(number), { recurring: this.options.recurring });
  }

  toDigits(number: NumberInput): OutputDigits {
    return run(number, this.inputBase, this.outputBase, this.options);
  }
}

export function createConverter(
  inputBase: number,
  outputBase: number,
  options: ConvertOptions = {},
): BaseConverter {
  return new BaseConverter(inputBase, outputBase, options);
}
