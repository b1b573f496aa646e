// ============================================================================
// @baseshift/core — Fractional Part Conversion
// ============================================================================
//
// The fractional digits are first turned into an exact rational p/q in lowest
// terms, then re-expanded in the output base by long division:
//
//   r ← p
//   repeat: r ← r·base;  digit ← ⌊r/q⌋;  r ← r mod q
//
// Every remainder lies in [0, q), so the sequence of remainders must either
// hit 0 (terminating expansion) or revisit a value (repeating expansion)
// within q steps. Remembering the step at which each remainder first appeared
// finds the cycle in one pass.
// ============================================================================

import { digitsToBigInt } from './integer.js';
import { logCycle, logTruncation } from './logger.js';
import type { CanonicalNumber, Digit, ExactFraction, FractionExpansion } from './types.js';

/**
 * Greatest common divisor of two non-negative bigints.
 */
export function gcd(a: bigint, b: bigint): bigint {
  let x = a < 0n ? -a : a;
  let y = b < 0n ? -b : b;
  while (y !== 0n) {
    [x, y] = [y, x % y];
  }
  return x;
}

/**
 * Reduce a fraction to lowest terms. Zero reduces to 0/1.
 */
export function reduceFraction(numerator: bigint, denominator: bigint): ExactFraction {
  if (numerator === 0n) return { numerator: 0n, denominator: 1n };
  const divisor = gcd(numerator, denominator);
  return { numerator: numerator / divisor, denominator: denominator / divisor };
}

/**
 * The exact value of a number's fractional digits, in lowest terms.
 *
 * With `n` plain digits and `k` recurring digits in base `b`:
 *
 *   plain only:     F / bⁿ
 *   with recurring: (F·(bᵏ−1) + R) / (bⁿ·(bᵏ−1))
 *
 * A recurring tail such as `0.[9]` can make the value reach 1; callers move the
 * whole part into the integer digits.
 */
export function toExactFraction(number: CanonicalNumber): ExactFraction {
  const b = BigInt(number.base);
  const plain = digitsToBigInt(number.fractionalDigits, number.base);
  const scale = b ** BigInt(number.fractionalDigits.length);

  if (number.recurringDigits.length === 0) {
    return reduceFraction(plain, scale);
  }

  const period = b ** BigInt(number.recurringDigits.length) - 1n;
  const recurring = digitsToBigInt(number.recurringDigits, number.base);
  return reduceFraction(plain * period + recurring, scale * period);
}

/**
 * Expand a proper fraction (`0 <= numerator < denominator`) in `outputBase`.
 *
 * Stops when the remainder reaches zero, when a remainder repeats (setting
 * `recurringStart`), or when `bound` digits have been produced without either
 * (setting `truncated`). A cycle that closes exactly at the bound still counts.
 */
export function convertFraction(
  fraction: ExactFraction,
  outputBase: number,
  bound: number,
): FractionExpansion {
  const { numerator, denominator } = fraction;
  const b = BigInt(outputBase);
  const firstSeen = new Map<bigint, number>();
  const digits: Digit[] = [];

  let remainder = numerator;
  while (remainder !== 0n) {
    const start = firstSeen.get(remainder);
    if (start !== undefined) {
      logCycle(outputBase, start, digits.length - start);
      return { digits, recurringStart: start, truncated: false };
    }
    if (digits.length >= bound) {
      logTruncation(outputBase, bound);
      return { digits, truncated: true };
    }

    firstSeen.set(remainder, digits.length);
    remainder *= b;
    digits.push(Number(remainder / denominator));
    remainder %= denominator;
  }

  return { digits, truncated: false };
}

/**
 * Replace a bracketed cycle by plain repetitions of it, up to `bound` digits.
 * Terminating and truncated expansions are returned unchanged.
 */
export function unrollCycle(expansion: FractionExpansion, bound: number): FractionExpansion {
  const start = expansion.recurringStart;
  if (start === undefined) return expansion;

  const cycle = expansion.digits.slice(start);
  const digits = [...expansion.digits];
  for (let i = 0; digits.length < bound; i++) {
    digits.push(cycle[i % cycle.length]);
  }
  return { digits, truncated: true };
}
