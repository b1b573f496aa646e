// ============================================================================
// @baseshift/core — Digit Alphabet
// ============================================================================
//
// Symbol ↔ value mapping used by the string representation:
//
//   |  Value  | Symbol            |
//   |---------|-------------------|
//   |  0 -  9 | '0' - '9'         |
//   | 10 - 35 | 'A' - 'Z'         |
//   | 36 - 61 | 'a' - 'z'         |
//   | 62 +    | U+007B upward     |
//
// Values landing on UTF-16 surrogates (U+D800-U+DFFF) keep their place in the
// numbering but have no symbol: a lone surrogate cannot survive a round trip
// through a string. Sequences of raw digit values never pass through this table.
// ============================================================================

import { InvalidDigitError } from './errors.js';
import { assertValidBase } from './validate.js';

const CODE_0 = 0x30;
const CODE_9 = 0x39;
const CODE_UPPER_A = 0x41;
const CODE_UPPER_Z = 0x5a;
const CODE_LOWER_A = 0x61;
const CODE_LOWER_Z = 0x7a;
const MAX_CODE_POINT = 0x10ffff;
const SURROGATE_MIN = 0xd800;
const SURROGATE_MAX = 0xdfff;

/** First code point of the open-ended tail of the alphabet (value 62). */
export const EXTENDED_ALPHABET_START = 0x7b;

/** Number of values with an ASCII letter or digit symbol. */
export const ASCII_ALPHABET_SIZE = 62;

/** Largest value that still has a symbol. */
export const MAX_ENCODABLE_VALUE = MAX_CODE_POINT - EXTENDED_ALPHABET_START + ASCII_ALPHABET_SIZE;

function isSurrogate(code: number): boolean {
  return code >= SURROGATE_MIN && code <= SURROGATE_MAX;
}

/** Bases up to this size read letters without regard to case. */
export const CASE_INSENSITIVE_MAX_BASE = 36;

function symbolValue(symbol: string): number | undefined {
  const code = symbol.codePointAt(0);
  if (code === undefined || isSurrogate(code) || String.fromCodePoint(code) !== symbol) {
    return undefined;
  }

  if (code >= CODE_0 && code <= CODE_9) return code - CODE_0;
  if (code >= CODE_UPPER_A && code <= CODE_UPPER_Z) return code - CODE_UPPER_A + 10;
  if (code >= CODE_LOWER_A && code <= CODE_LOWER_Z) return code - CODE_LOWER_A + 36;
  if (code >= EXTENDED_ALPHABET_START) return code - EXTENDED_ALPHABET_START + ASCII_ALPHABET_SIZE;
  return undefined;
}

/**
 * Folds a lowercase ASCII letter to uppercase when the base cannot reach the
 * lowercase half of the alphabet (values 36 and up).
 */
export function foldSymbolCase(symbol: string, base: number): string {
  if (base > CASE_INSENSITIVE_MAX_BASE) return symbol;
  const code = symbol.codePointAt(0);
  if (code !== undefined && symbol.length === 1 && code >= CODE_LOWER_A && code <= CODE_LOWER_Z) {
    return symbol.toUpperCase();
  }
  return symbol;
}

/**
 * Decode one symbol (a single code point) to its digit value.
 *
 * @example
 * ```ts
 * decodeSymbol('F', 16); // → 15
 * decodeSymbol('z', 62); // → 61
 * ```
 *
 * @throws {InvalidDigitError} If the symbol is not in the alphabet or its value is not below `base`.
 */
export function decodeSymbol(symbol: string, base: number): number {
  assertValidBase(base);
  const value = symbolValue(symbol);
  if (value === undefined) {
    throw new InvalidDigitError(`Invalid digit symbol: "${symbol}".`, { digit: symbol, base });
  }
  if (value >= base) {
    throw new InvalidDigitError(`Digit "${symbol}" (value ${value}) is not valid in base ${base}.`, {
      digit: symbol,
      base,
    });
  }
  return value;
}

/**
 * Encode a digit value as its alphabet symbol.
 *
 * @throws {InvalidDigitError} If the value is not a non-negative integer below `base`,
 *   or maps to a surrogate or past the last Unicode code point.
 */
export function encodeDigit(value: number, base: number): string {
  assertValidBase(base);
  if (!Number.isSafeInteger(value) || value < 0 || value >= base) {
    throw new InvalidDigitError(`Digit value ${value} is not valid in base ${base}.`, {
      digit: value,
      base,
    });
  }
  const extendedCode = EXTENDED_ALPHABET_START + value - ASCII_ALPHABET_SIZE;
  if (value > MAX_ENCODABLE_VALUE || (value >= ASCII_ALPHABET_SIZE && isSurrogate(extendedCode))) {
    throw new InvalidDigitError(
      `Digit value ${value} has no symbol; use the sequence representation instead.`,
      { digit: value, base },
    );
  }

  if (value < 10) return String.fromCodePoint(CODE_0 + value);
  if (value < 36) return String.fromCodePoint(CODE_UPPER_A + value - 10);
  if (value < ASCII_ALPHABET_SIZE) return String.fromCodePoint(CODE_LOWER_A + value - 36);
  return String.fromCodePoint(extendedCode);
}
