// ============================================================================
// @baseshift/core — Error Types
// ============================================================================

/**
 * Base error class for all baseshift errors.
 */
export class BaseshiftError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'BaseshiftError';
  }
}

// ---------------------------------------------------------------------------
// Configuration Errors
// ---------------------------------------------------------------------------

/**
 * Thrown when a base is not an integer of at least 2.
 */
export class InvalidBaseError extends BaseshiftError {
  public readonly base: unknown;

  constructor(base: unknown, role?: 'input' | 'output') {
    const label = role ? `${role} base` : 'base';
    super(`Invalid ${label}: ${String(base)}. Base must be an integer >= 2.`);
    this.name = 'InvalidBaseError';
    this.base = base;
  }
}

/**
 * Thrown when conversion options fail schema validation.
 */
export class InvalidOptionsError extends BaseshiftError {
  public readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid conversion options: ${issues.join('; ')}`);
    this.name = 'InvalidOptionsError';
    this.issues = issues;
  }
}

// ---------------------------------------------------------------------------
// Parse Errors
// ---------------------------------------------------------------------------

/**
 * Thrown when a digit symbol is outside the alphabet, or a digit value is not
 * below its base.
 */
export class InvalidDigitError extends BaseshiftError {
  public readonly digit: unknown;
  public readonly base: number;
  public readonly position?: number;

  constructor(message: string, options: { digit: unknown; base: number; position?: number }) {
    super(options.position === undefined ? message : `${message} (at position ${options.position})`);
    this.name = 'InvalidDigitError';
    this.digit = options.digit;
    this.base = options.base;
    this.position = options.position;
  }
}

/**
 * Thrown when a number has no digits, more than one radix point, or a badly
 * placed recurring bracket.
 */
export class MalformedNumberError extends BaseshiftError {
  constructor(message: string) {
    super(message);
    this.name = 'MalformedNumberError';
  }
}
