import { describe, expect, it } from 'vitest';
import { InvalidBaseError, InvalidDigitError, MalformedNumberError } from '../errors.js';
import { isValidNumber, normalizeNumber } from '../normalize.js';

describe('Number Normalization', () => {
  describe('string input', () => {
    it('splits integer and fractional digits', () => {
      expect(normalizeNumber('FF0.8', 16)).toEqual({
        sign: 1,
        base: 16,
        integerDigits: [15, 15, 0],
        fractionalDigits: [8],
        recurringDigits: [],
      });
    });

    it('ignores whitespace and letter case', () => {
      expect(normalizeNumber('  -ff 0.8\n', 16)).toEqual({
        sign: -1,
        base: 16,
        integerDigits: [15, 15, 0],
        fractionalDigits: [8],
        recurringDigits: [],
      });
    });

    it('keeps case significant above base 36', () => {
      expect(normalizeNumber('a', 62).integerDigits).toEqual([36]);
      expect(normalizeNumber('A', 62).integerDigits).toEqual([10]);
    });

    it('accepts an explicit plus sign', () => {
      expect(normalizeNumber('+12', 10).sign).toBe(1);
      expect(normalizeNumber('+12', 10).integerDigits).toEqual([1, 2]);
    });

    it('accepts an empty side of the radix point', () => {
      expect(normalizeNumber('.5', 10)).toMatchObject({ integerDigits: [], fractionalDigits: [5] });
      expect(normalizeNumber('7.', 10)).toMatchObject({ integerDigits: [7], fractionalDigits: [] });
    });

    it('reads a bracketed recurring tail', () => {
      expect(normalizeNumber('0.1[6]', 10)).toMatchObject({
        integerDigits: [0],
        fractionalDigits: [1],
        recurringDigits: [6],
      });
    });

    it('drops the sign of zero', () => {
      expect(normalizeNumber('-0.0', 10).sign).toBe(1);
    });

    it('reports the position of a bad symbol', () => {
      try {
        normalizeNumber('12x', 10);
        expect.unreachable();
      } catch (err: unknown) {
        expect(err).toBeInstanceOf(InvalidDigitError);
        if (err instanceof InvalidDigitError) {
          expect(err.position).toBe(2);
          expect(err.base).toBe(10);
          expect(err.digit).toBe('x');
        }
      }
    });

    it('counts positions in the original string, spaces included', () => {
      try {
        normalizeNumber('1 2 Z', 10);
        expect.unreachable();
      } catch (err: unknown) {
        expect(err).toBeInstanceOf(InvalidDigitError);
        if (err instanceof InvalidDigitError) {
          expect(err.position).toBe(4);
          expect(err.message).toBe('Digit "Z" (value 35) is not valid in base 10. (at position 4)');
        }
      }
    });

    it('skips only ASCII whitespace', () => {
      expect(normalizeNumber(' 1\t0\n', 10).integerDigits).toEqual([1, 0]);
      expect(normalizeNumber('\u00a0', 100).integerDigits).toEqual([99]);
      expect(normalizeNumber('1\u3000', 20000).integerDigits).toEqual([1, 0x3000 - 0x7b + 62]);
    });

    it('rejects digits too large for the base', () => {
      expect(() => normalizeNumber('G', 16)).toThrow(InvalidDigitError);
      expect(() => normalizeNumber('19', 8)).toThrow(InvalidDigitError);
    });

    it('rejects a sign anywhere but the front', () => {
      expect(() => normalizeNumber('1-2', 10)).toThrow(InvalidDigitError);
    });
  });

  describe('sequence input', () => {
    it('accepts digit values with a radix marker', () => {
      expect(normalizeNumber([15, 15, 0, '.', 8], 16)).toEqual({
        sign: 1,
        base: 16,
        integerDigits: [15, 15, 0],
        fractionalDigits: [8],
        recurringDigits: [],
      });
    });

    it('accepts a leading sign token', () => {
      expect(normalizeNumber(['-', 1, '.', 5], 10).sign).toBe(-1);
    });

    it('accepts digits beyond the symbol alphabet', () => {
      expect(normalizeNumber([999, '.', 500], 1000)).toMatchObject({
        integerDigits: [999],
        fractionalDigits: [500],
      });
    });

    it('rejects bad digit values', () => {
      expect(() => normalizeNumber([1, 10], 10)).toThrow(InvalidDigitError);
      expect(() => normalizeNumber([1.5], 10)).toThrow(InvalidDigitError);
      expect(() => normalizeNumber([-1], 10)).toThrow(InvalidDigitError);
    });

    it('rejects unknown tokens', () => {
      const tokens: unknown = JSON.parse('["A"]');
      if (!Array.isArray(tokens)) throw new Error('fixture must be an array');
      expect(() => normalizeNumber(tokens, 16)).toThrow(/Invalid token "A"/);
    });

    it('rejects a sign token after the first position', () => {
      expect(() => normalizeNumber([1, '-', 2], 10)).toThrow(MalformedNumberError);
    });
  });

  describe('native input', () => {
    it('decomposes doubles exactly in radix 2', () => {
      expect(normalizeNumber(6.25, 10)).toEqual({
        sign: 1,
        base: 2,
        integerDigits: [1, 1, 0],
        fractionalDigits: [0, 1],
        recurringDigits: [],
      });
      expect(normalizeNumber(0.5, 10)).toMatchObject({ integerDigits: [0], fractionalDigits: [1] });
    });

    it('handles negative integers and bigints', () => {
      expect(normalizeNumber(-3, 10)).toMatchObject({ sign: -1, integerDigits: [1, 1] });
      expect(normalizeNumber(10n, 10)).toMatchObject({ sign: 1, integerDigits: [1, 0, 1, 0] });
    });

    it('rejects non-finite values', () => {
      expect(() => normalizeNumber(Number.NaN, 10)).toThrow(MalformedNumberError);
      expect(() => normalizeNumber(Number.POSITIVE_INFINITY, 10)).toThrow(MalformedNumberError);
    });

    it('still validates the input base', () => {
      expect(() => normalizeNumber(5, 1)).toThrow(InvalidBaseError);
    });
  });

  describe('malformed numbers', () => {
    it.each([
      ['1.2.3', /More than one radix point/],
      ['', /Empty number/],
      ['   ', /Empty number/],
      ['-', /no digits/],
      ['.', /no digits/],
      ['1[2]', /must follow the radix point/],
      ['0.[]', /Empty recurring block/],
      ['0.[1', /Unclosed/],
      ['0.1]', /Unmatched/],
      ['0.[1]2', /after the recurring block/],
      ['0.[1][2]', /Only one recurring block/],
    ])('rejects %j', (input, message) => {
      expect(() => normalizeNumber(input, 10)).toThrow(MalformedNumberError);
      expect(() => normalizeNumber(input, 10)).toThrow(message);
    });

    it('rejects empty sequences', () => {
      expect(() => normalizeNumber([], 10)).toThrow(MalformedNumberError);
      expect(() => normalizeNumber(['.'], 10)).toThrow(MalformedNumberError);
    });
  });

  describe('base validation', () => {
    it('rejects bases below 2 and non-integers', () => {
      expect(() => normalizeNumber('1', 1)).toThrow(InvalidBaseError);
      expect(() => normalizeNumber('1', 0)).toThrow(InvalidBaseError);
      expect(() => normalizeNumber('1', 2.5)).toThrow(InvalidBaseError);
      expect(() => normalizeNumber('1', Number.NaN)).toThrow(InvalidBaseError);
    });
  });

  describe('isValidNumber', () => {
    it('reports validity without throwing', () => {
      expect(isValidNumber('FF.8', 16)).toBe(true);
      expect(isValidNumber('FG', 16)).toBe(false);
      expect(isValidNumber('1.1.1', 10)).toBe(false);
      expect(isValidNumber('1', 1)).toBe(false);
    });
  });
});
