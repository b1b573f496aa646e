// ============================================================================
// @baseshift/core — Output Formatting
// ============================================================================
//
// OutputDigits → digit sequence or alphabet string:
//
//   { sign: -1, integer: [2, 5], fraction: [1, 6, 6], recurringStart: 1 }
//     → ['-', 2, 5, '.', 1, '[', 6, 6, ']']
//     → "-25.1[66]"
// ============================================================================

import { encodeDigit } from './alphabet.js';
import {
  type CanonicalNumber,
  type DigitSequence,
  type DigitToken,
  NEGATIVE_SIGN,
  type OutputDigits,
  RADIX_POINT,
  RECURRING_CLOSE,
  RECURRING_OPEN,
} from './types.js';

export interface FormatOptions {
  /** Bracket the repeating tail when one was detected. Default true. */
  recurring?: boolean;
}

/**
 * Lay out sign, integer digits, radix point and fractional digits as tokens.
 * The radix point appears only with a non-empty fractional part.
 */
export function formatDigits(output: OutputDigits, options: FormatOptions = {}): DigitToken[] {
  const { recurring = true } = options;
  const tokens: DigitToken[] = [];

  if (output.sign < 0) tokens.push(NEGATIVE_SIGN);
  if (output.integerDigits.length === 0) {
    tokens.push(0);
  } else {
    tokens.push(...output.integerDigits);
  }

  const fraction = output.fractionalDigits;
  if (fraction.length === 0) return tokens;

  tokens.push(RADIX_POINT);
  const start = recurring ? output.recurringStart : undefined;
  if (start === undefined) {
    tokens.push(...fraction);
  } else {
    tokens.push(...fraction.slice(0, start), RECURRING_OPEN, ...fraction.slice(start), RECURRING_CLOSE);
  }
  return tokens;
}

/**
 * Render a token sequence with the digit alphabet; markers pass through.
 *
 * @throws {InvalidDigitError} If a digit is not below `base` or has no symbol.
 */
export function renderDigitSequence(tokens: DigitSequence, base: number): string {
  let out = '';
  for (const token of tokens) {
    out += typeof token === 'number' ? encodeDigit(token, base) : token;
  }
  return out;
}

/**
 * Render converted digits as a string, e.g. `"FF0.8"` or `"0.[3]"`.
 */
export function formatString(output: OutputDigits, options: FormatOptions = {}): string {
  return renderDigitSequence(formatDigits(output, options), output.base);
}

/**
 * Write a normalized input number back out as tokens, in its own radix.
 */
export function canonicalToSequence(number: CanonicalNumber): DigitToken[] {
  const tokens: DigitToken[] = [];
  if (number.sign < 0) tokens.push(NEGATIVE_SIGN);
  tokens.push(...number.integerDigits);
  if (number.fractionalDigits.length > 0 || number.recurringDigits.length > 0) {
    tokens.push(RADIX_POINT, ...number.fractionalDigits);
  }
  if (number.recurringDigits.length > 0) {
    tokens.push(RECURRING_OPEN, ...number.recurringDigits, RECURRING_CLOSE);
  }
  return tokens;
}
