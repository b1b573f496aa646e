import fc from 'fast-check';
import { describe, expect, it } from 'vitest';
import {
  convertFraction,
  gcd,
  reduceFraction,
  toExactFraction,
  unrollCycle,
} from '../fraction.js';
import { digitsToBigInt } from '../integer.js';
import { normalizeNumber } from '../normalize.js';

describe('Fractional Conversion', () => {
  describe('gcd / reduceFraction', () => {
    it('computes greatest common divisors', () => {
      expect(gcd(12n, 18n)).toBe(6n);
      expect(gcd(0n, 5n)).toBe(5n);
      expect(gcd(17n, 4913n)).toBe(17n);
    });

    it('reduces to lowest terms', () => {
      expect(reduceFraction(8n, 16n)).toEqual({ numerator: 1n, denominator: 2n });
      expect(reduceFraction(1468n, 4913n)).toEqual({ numerator: 1468n, denominator: 4913n });
    });

    it('reduces zero to 0/1', () => {
      expect(reduceFraction(0n, 100n)).toEqual({ numerator: 0n, denominator: 1n });
    });
  });

  describe('toExactFraction', () => {
    it('builds digits / base^length', () => {
      expect(toExactFraction(normalizeNumber('FF0.8', 16))).toEqual({
        numerator: 1n,
        denominator: 2n,
      });
      expect(toExactFraction(normalizeNumber('0.25', 10))).toEqual({
        numerator: 1n,
        denominator: 4n,
      });
    });

    it('is zero for integers', () => {
      expect(toExactFraction(normalizeNumber('42', 10))).toEqual({
        numerator: 0n,
        denominator: 1n,
      });
    });

    it('folds a recurring tail into the fraction', () => {
      expect(toExactFraction(normalizeNumber('0.[1]', 3))).toEqual({
        numerator: 1n,
        denominator: 2n,
      });
      expect(toExactFraction(normalizeNumber('0.1[6]', 10))).toEqual({
        numerator: 1n,
        denominator: 6n,
      });
    });

    it('lets 0.[9] reach one', () => {
      expect(toExactFraction(normalizeNumber('0.[9]', 10))).toEqual({
        numerator: 1n,
        denominator: 1n,
      });
    });
  });

  describe('convertFraction', () => {
    it('returns no digits for zero', () => {
      expect(convertFraction({ numerator: 0n, denominator: 1n }, 10, 10)).toEqual({
        digits: [],
        truncated: false,
      });
    });

    it('stops on a terminating expansion', () => {
      expect(convertFraction({ numerator: 1n, denominator: 2n }, 10, 10)).toEqual({
        digits: [5],
        truncated: false,
      });
      expect(convertFraction({ numerator: 1n, denominator: 32n }, 10, 10)).toEqual({
        digits: [0, 3, 1, 2, 5],
        truncated: false,
      });
    });

    it('detects an immediate cycle', () => {
      expect(convertFraction({ numerator: 1n, denominator: 3n }, 10, 10)).toEqual({
        digits: [3],
        recurringStart: 0,
        truncated: false,
      });
    });

    it('detects a cycle after a non-repeating prefix', () => {
      expect(convertFraction({ numerator: 1n, denominator: 10n }, 8, 10)).toEqual({
        digits: [0, 6, 3, 1, 4],
        recurringStart: 1,
        truncated: false,
      });
    });

    it('finds the full period of 1/7', () => {
      expect(convertFraction({ numerator: 1n, denominator: 7n }, 10, 10)).toEqual({
        digits: [1, 4, 2, 8, 5, 7],
        recurringStart: 0,
        truncated: false,
      });
    });

    it('truncates at the bound', () => {
      expect(convertFraction({ numerator: 1n, denominator: 5n }, 8, 1)).toEqual({
        digits: [1],
        truncated: true,
      });
      expect(convertFraction({ numerator: 1n, denominator: 5n }, 8, 3)).toEqual({
        digits: [1, 4, 6],
        truncated: true,
      });
    });

    it('still reports a cycle that closes exactly at the bound', () => {
      expect(convertFraction({ numerator: 1n, denominator: 5n }, 8, 4)).toEqual({
        digits: [1, 4, 6, 3],
        recurringStart: 0,
        truncated: false,
      });
    });
  });

  describe('unrollCycle', () => {
    it('repeats the cycle up to the bound', () => {
      expect(unrollCycle({ digits: [3], recurringStart: 0, truncated: false }, 5)).toEqual({
        digits: [3, 3, 3, 3, 3],
        truncated: true,
      });
      expect(
        unrollCycle({ digits: [0, 6, 3, 1, 4], recurringStart: 1, truncated: false }, 10),
      ).toEqual({
        digits: [0, 6, 3, 1, 4, 6, 3, 1, 4, 6],
        truncated: true,
      });
    });

    it('leaves expansions without a cycle unchanged', () => {
      const terminating = { digits: [5], truncated: false };
      expect(unrollCycle(terminating, 10)).toBe(terminating);
    });
  });

  describe('Property: cycle correctness', () => {
    it('reconstructs the exact fraction from prefix and repeating block', () => {
      const fractionArb = fc
        .integer({ min: 2, max: 500 })
        .chain((q) => fc.tuple(fc.integer({ min: 1, max: q - 1 }), fc.constant(q)));

      fc.assert(
        fc.property(fractionArb, fc.integer({ min: 2, max: 36 }), ([p, q], base) => {
          const fraction = reduceFraction(BigInt(p), BigInt(q));
          const { digits, recurringStart, truncated } = convertFraction(fraction, base, 100_000);
          expect(truncated).toBe(false);

          const b = BigInt(base);
          let numerator: bigint;
          let denominator: bigint;
          if (recurringStart === undefined) {
            numerator = digitsToBigInt(digits, base);
            denominator = b ** BigInt(digits.length);
          } else {
            const period = b ** BigInt(digits.length - recurringStart) - 1n;
            numerator =
              digitsToBigInt(digits.slice(0, recurringStart), base) * period +
              digitsToBigInt(digits.slice(recurringStart), base);
            denominator = b ** BigInt(recurringStart) * period;
          }

          expect(numerator * fraction.denominator).toBe(fraction.numerator * denominator);
        }),
        { numRuns: 300 },
      );
    });
  });
});
