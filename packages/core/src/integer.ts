// ============================================================================
// @baseshift/core — Integer Part Conversion
// ============================================================================
//
// Exact, unbounded re-basing of integer digit sequences through bigint.
// Inputs are assumed validated by the normalizer.
// ============================================================================

import type { Digit } from './types.js';

/**
 * Accumulate digits (most-significant first) into a bigint by Horner's rule.
 *
 * @example
 * ```ts
 * digitsToBigInt([15, 15, 0], 16); // → 4080n
 * digitsToBigInt([], 10);          // → 0n
 * ```
 */
export function digitsToBigInt(digits: readonly Digit[], base: number): bigint {
  const b = BigInt(base);
  let acc = 0n;
  for (const d of digits) {
    acc = acc * b + BigInt(d);
  }
  return acc;
}

/**
 * Write a non-negative bigint as digits in `base`, most-significant first.
 * Zero is the single digit `[0]`.
 */
export function bigIntToDigits(value: bigint, base: number): Digit[] {
  if (value === 0n) return [0];

  const b = BigInt(base);
  const out: Digit[] = [];
  let x = value < 0n ? -value : value;
  while (x > 0n) {
    out.push(Number(x % b));
    x /= b;
  }
  out.reverse();
  return out;
}

/**
 * Re-base an integer digit sequence. Always exact; an empty sequence is zero.
 */
export function convertInteger(
  digits: readonly Digit[],
  inputBase: number,
  outputBase: number,
): Digit[] {
  return bigIntToDigits(digitsToBigInt(digits, inputBase), outputBase);
}
