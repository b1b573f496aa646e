// ============================================================================
// @baseshift/core — Type Definitions & Markers
// ============================================================================
//
// Shared shapes for the conversion pipeline:
//   raw input → CanonicalNumber → ExactFraction / integer digits → OutputDigits
// All values are plain immutable data created and consumed inside one call.
// ============================================================================

/** The positional value of one digit, always below its base. */
export type Digit = number;

/** Separates integer and fractional digits. */
export const RADIX_POINT = '.';

/** Opens the repeating tail of a fractional part. */
export const RECURRING_OPEN = '[';

/** Closes the repeating tail of a fractional part. */
export const RECURRING_CLOSE = ']';

/** Leading sign marker for negative values. */
export const NEGATIVE_SIGN = '-';

export type MarkerToken =
  | typeof RADIX_POINT
  | typeof RECURRING_OPEN
  | typeof RECURRING_CLOSE
  | typeof NEGATIVE_SIGN;

/**
 * One element of the sequence representation: a raw digit value or a marker.
 * Sequences bypass the symbol alphabet, so any base is representable.
 */
export type DigitToken = Digit | MarkerToken;

/** A number written as digit values interspersed with marker tokens. */
export type DigitSequence = readonly DigitToken[];

/** Anything the normalizer accepts. */
export type NumberInput = string | DigitSequence | number | bigint;

export type Sign = 1 | -1;

/**
 * A validated number in its source radix.
 *
 * `base` equals the input base for strings and sequences; native values are
 * decomposed in radix 2, which represents every finite double exactly.
 */
export interface CanonicalNumber {
  readonly sign: Sign;
  readonly base: number;
  /** Most-significant first. */
  readonly integerDigits: readonly Digit[];
  /** Non-repeating fractional digits. */
  readonly fractionalDigits: readonly Digit[];
  /** Fractional digits that repeat forever after `fractionalDigits`. */
  readonly recurringDigits: readonly Digit[];
}

/** A non-negative fraction in lowest terms. */
export interface ExactFraction {
  readonly numerator: bigint;
  readonly denominator: bigint;
}

/** Result of long division of an ExactFraction in the output base. */
export interface FractionExpansion {
  readonly digits: readonly Digit[];
  /** Index of the first digit of the repeating block, when a cycle was found. */
  readonly recurringStart?: number;
  /** True when the depth bound stopped the expansion before it resolved. */
  readonly truncated: boolean;
}

/** Converted number in the output base, before rendering. */
export interface OutputDigits {
  readonly sign: Sign;
  readonly base: number;
  readonly integerDigits: readonly Digit[];
  readonly fractionalDigits: readonly Digit[];
  readonly recurringStart?: number;
  readonly truncated: boolean;
}
