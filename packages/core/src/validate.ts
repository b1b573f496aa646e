// ============================================================================
// @baseshift/core — Base Validation
// ============================================================================

import { InvalidBaseError } from './errors.js';

/**
 * Whether a value is a usable radix: a safe integer of at least 2.
 */
export function isValidBase(base: unknown): base is number {
  return typeof base === 'number' && Number.isSafeInteger(base) && base >= 2;
}

/**
 * Asserts that `base` is a usable radix.
 *
 * @throws {InvalidBaseError} For non-integers, non-numbers and anything below 2.
 */
export function assertValidBase(base: unknown, role?: 'input' | 'output'): asserts base is number {
  if (!isValidBase(base)) {
    throw new InvalidBaseError(base, role);
  }
}
