// ============================================================================
// @baseshift/core — Number Normalization
// ============================================================================
//
// Turns every accepted input shape into a CanonicalNumber:
//
//   "-FF.0[8]"                → string, decoded through the alphabet
//   ['-', 15, 15, '.', 0, 8]  → sequence of raw digit values
//   255.5 / 255n              → native value, decomposed exactly in radix 2
//
// All validation of digits and structure happens here; the converters
// downstream trust what they receive.
// ============================================================================

import { decodeSymbol, foldSymbolCase } from './alphabet.js';
import { BaseshiftError, InvalidDigitError, MalformedNumberError } from './errors.js';
import { bigIntToDigits } from './integer.js';
import {
  type CanonicalNumber,
  type Digit,
  NEGATIVE_SIGN,
  type NumberInput,
  RADIX_POINT,
  RECURRING_CLOSE,
  RECURRING_OPEN,
  type Sign,
} from './types.js';
import { assertValidBase } from './validate.js';

/** Radix used for native numeric values. */
export const NATIVE_RADIX = 2;

type StructuralToken = Digit | typeof RADIX_POINT | typeof RECURRING_OPEN | typeof RECURRING_CLOSE;

type Section = 'integer' | 'fraction' | 'recurring' | 'closed';

/**
 * Normalize any supported input into a CanonicalNumber.
 *
 * @param input - String, digit sequence, number or bigint
 * @param inputBase - Radix of string and sequence input; validated for every input kind
 * @throws {InvalidBaseError} If `inputBase` is not an integer >= 2
 * @throws {InvalidDigitError} If a symbol or digit value is not valid in `inputBase`
 * @throws {MalformedNumberError} On empty input, repeated radix points or bad brackets
 */
export function normalizeNumber(input: NumberInput, inputBase: number): CanonicalNumber {
  assertValidBase(inputBase, 'input');

  if (typeof input === 'string') return normalizeString(input, inputBase);
  if (typeof input === 'number') return normalizeNative(input);
  if (typeof input === 'bigint') return normalizeBigInt(input);
  return normalizeSequence(input, inputBase);
}

/**
 * Check validity without throwing.
 */
export function isValidNumber(input: NumberInput, inputBase: number): boolean {
  try {
    normalizeNumber(input, inputBase);
    return true;
  } catch (err: unknown) {
    if (err instanceof BaseshiftError) return false;
    throw err;
  }
}

// ---------------------------------------------------------------------------
// String input
// ---------------------------------------------------------------------------

/** ASCII whitespace only; every code point from U+007B up is a digit symbol. */
const SKIPPED_WHITESPACE = new Set(['\t', '\n', '\v', '\f', '\r', ' ']);

interface PlacedSymbol {
  text: string;
  /** Code-point index in the caller's string. */
  position: number;
}

function normalizeString(input: string, base: number): CanonicalNumber {
  const symbols: PlacedSymbol[] = [];
  Array.from(input).forEach((text, position) => {
    if (!SKIPPED_WHITESPACE.has(text)) symbols.push({ text, position });
  });
  if (symbols.length === 0) {
    throw new MalformedNumberError('Empty number.');
  }

  let sign: Sign = 1;
  let start = 0;
  const first = symbols[0]?.text;
  if (first === NEGATIVE_SIGN || first === '+') {
    sign = first === NEGATIVE_SIGN ? -1 : 1;
    start = 1;
  }

  const tokens: StructuralToken[] = [];
  for (const { text, position } of symbols.slice(start)) {
    if (text === RADIX_POINT || text === RECURRING_OPEN || text === RECURRING_CLOSE) {
      tokens.push(text);
      continue;
    }
    try {
      tokens.push(decodeSymbol(foldSymbolCase(text, base), base));
    } catch (err: unknown) {
      if (err instanceof InvalidDigitError) {
        throw new InvalidDigitError(err.message, { digit: text, base, position });
      }
      throw err;
    }
  }

  return assemble(sign, base, tokens);
}

// ---------------------------------------------------------------------------
// Sequence input
// ---------------------------------------------------------------------------

function normalizeSequence(input: readonly unknown[], base: number): CanonicalNumber {
  let sign: Sign = 1;
  let start = 0;
  if (input[0] === NEGATIVE_SIGN) {
    sign = -1;
    start = 1;
  }

  const tokens: StructuralToken[] = [];
  for (let i = start; i < input.length; i++) {
    const token = input[i];
    if (token === RADIX_POINT || token === RECURRING_OPEN || token === RECURRING_CLOSE) {
      tokens.push(token);
    } else if (token === NEGATIVE_SIGN) {
      throw new MalformedNumberError('The sign must be the first token.');
    } else if (typeof token === 'number') {
      if (!Number.isSafeInteger(token) || token < 0 || token >= base) {
        throw new InvalidDigitError(`Digit value ${token} is not valid in base ${base}.`, {
          digit: token,
          base,
          position: i,
        });
      }
      tokens.push(token);
    } else {
      const shown = typeof token === 'string' ? `"${token}"` : String(token);
      throw new InvalidDigitError(`Invalid token ${shown}.`, {
        digit: token,
        base,
        position: i,
      });
    }
  }

  return assemble(sign, base, tokens);
}

// ---------------------------------------------------------------------------
// Native input
// ---------------------------------------------------------------------------

function normalizeNative(value: number): CanonicalNumber {
  if (!Number.isFinite(value)) {
    throw new MalformedNumberError(`Cannot convert non-finite value ${value}.`);
  }

  const magnitude = Math.abs(value);
  const whole = Math.trunc(magnitude);
  // x - trunc(x), doubling and subtracting 1 are all exact in binary64.
  let rest = magnitude - whole;
  const fractionalDigits: Digit[] = [];
  while (rest !== 0) {
    rest *= 2;
    const bit = rest >= 1 ? 1 : 0;
    rest -= bit;
    fractionalDigits.push(bit);
  }

  const integerDigits = bigIntToDigits(BigInt(whole), NATIVE_RADIX);
  return finish(value < 0 ? -1 : 1, NATIVE_RADIX, integerDigits, fractionalDigits, []);
}

function normalizeBigInt(value: bigint): CanonicalNumber {
  return finish(value < 0n ? -1 : 1, NATIVE_RADIX, bigIntToDigits(value, NATIVE_RADIX), [], []);
}

// ---------------------------------------------------------------------------
// Structure
// ---------------------------------------------------------------------------

function assemble(sign: Sign, base: number, tokens: readonly StructuralToken[]): CanonicalNumber {
  const integerDigits: Digit[] = [];
  const fractionalDigits: Digit[] = [];
  const recurringDigits: Digit[] = [];
  let section: Section = 'integer';

  for (const token of tokens) {
    if (token === RADIX_POINT) {
      if (section !== 'integer') throw new MalformedNumberError('More than one radix point.');
      section = 'fraction';
    } else if (token === RECURRING_OPEN) {
      if (section === 'integer') {
        throw new MalformedNumberError('Recurring digits must follow the radix point.');
      }
      if (section !== 'fraction') throw new MalformedNumberError('Only one recurring block is allowed.');
      section = 'recurring';
    } else if (token === RECURRING_CLOSE) {
      if (section !== 'recurring') throw new MalformedNumberError('Unmatched "]".');
      if (recurringDigits.length === 0) throw new MalformedNumberError('Empty recurring block.');
      section = 'closed';
    } else if (section === 'integer') {
      integerDigits.push(token);
    } else if (section === 'fraction') {
      fractionalDigits.push(token);
    } else if (section === 'recurring') {
      recurringDigits.push(token);
    } else {
      throw new MalformedNumberError('Digits after the recurring block.');
    }
  }

  if (section === 'recurring') throw new MalformedNumberError('Unclosed "[".');
  if (integerDigits.length + fractionalDigits.length + recurringDigits.length === 0) {
    throw new MalformedNumberError('Number has no digits.');
  }

  return finish(sign, base, integerDigits, fractionalDigits, recurringDigits);
}

function finish(
  sign: Sign,
  base: number,
  integerDigits: Digit[],
  fractionalDigits: Digit[],
  recurringDigits: Digit[],
): CanonicalNumber {
  const isZero = [integerDigits, fractionalDigits, recurringDigits].every((part) =>
    part.every((d) => d === 0),
  );
  return {
    sign: isZero ? 1 : sign,
    base,
    integerDigits,
    fractionalDigits,
    recurringDigits,
  };
}
