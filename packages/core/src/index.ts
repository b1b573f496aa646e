// ============================================================================
// @baseshift/core — Public API
// ============================================================================

// High-level API
export {
  convert,
  convertToDigits,
  parseDigitString,
  BaseConverter,
  createConverter,
} from './convert.js';

// Options
export {
  DEFAULT_MAX_DEPTH,
  DEFAULT_EXACT_CEILING,
  convertOptionsSchema,
  resolveOptions,
  fractionDigitBound,
} from './options.js';
export type { ConvertOptions, ResolvedConvertOptions } from './options.js';

// Digit alphabet
export {
  decodeSymbol,
  encodeDigit,
  foldSymbolCase,
  ASCII_ALPHABET_SIZE,
  EXTENDED_ALPHABET_START,
  MAX_ENCODABLE_VALUE,
} from './alphabet.js';

// Pipeline stages
export { normalizeNumber, isValidNumber, NATIVE_RADIX } from './normalize.js';
export { convertInteger, digitsToBigInt, bigIntToDigits } from './integer.js';
export {
  convertFraction,
  toExactFraction,
  reduceFraction,
  unrollCycle,
  gcd,
} from './fraction.js';
export {
  formatDigits,
  formatString,
  renderDigitSequence,
  canonicalToSequence,
} from './formatter.js';
export type { FormatOptions } from './formatter.js';
export { isValidBase, assertValidBase } from './validate.js';

// Errors
export {
  BaseshiftError,
  InvalidBaseError,
  InvalidDigitError,
  InvalidOptionsError,
  MalformedNumberError,
} from './errors.js';

// Logging
export { onLog, setLogLevel, getLogLevel, isDebugEnabled } from './logger.js';
export type { LogEntry, LogLevel, LogCallback } from './logger.js';

// Types
export type {
  Digit,
  DigitToken,
  DigitSequence,
  MarkerToken,
  NumberInput,
  Sign,
  CanonicalNumber,
  ExactFraction,
  FractionExpansion,
  OutputDigits,
} from './types.js';

export { RADIX_POINT, RECURRING_OPEN, RECURRING_CLOSE, NEGATIVE_SIGN } from './types.js';
