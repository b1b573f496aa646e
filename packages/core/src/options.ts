// ============================================================================
// @baseshift/core — Conversion Options
// ============================================================================

import { z } from 'zod';
import { InvalidOptionsError } from './errors.js';

/** Fractional digit budget when none is given. */
export const DEFAULT_MAX_DEPTH = 10;

/**
 * Digit ceiling used by exact mode (`exact: true` or `maxDepth: 0`).
 *
 * Long division of p/q resolves within q steps, so any reduced denominator up to
 * this size is guaranteed to terminate or show its cycle. Larger denominators
 * may still be cut at the ceiling; exact mode is exact only up to it.
 */
export const DEFAULT_EXACT_CEILING = 100_000;

export interface ConvertOptions {
  /** Render as an alphabet-encoded string instead of a digit sequence. */
  string?: boolean;
  /** Bracket a detected repeating tail. When false the cycle is unrolled up to the bound. */
  recurring?: boolean;
  /** Fractional digit budget; 0 selects exact mode. */
  maxDepth?: number;
  /** Same as `maxDepth: 0`. */
  exact?: boolean;
  /** Per-call override of {@link DEFAULT_EXACT_CEILING}. */
  exactCeiling?: number;
}

export type ResolvedConvertOptions = Readonly<Required<ConvertOptions>>;

export const convertOptionsSchema: z.ZodType<ResolvedConvertOptions, z.ZodTypeDef, ConvertOptions> =
  z
    .object({
      string: z.boolean().optional().default(false),
      recurring: z.boolean().optional().default(true),
      maxDepth: z.number().int().min(0).optional().default(DEFAULT_MAX_DEPTH),
      exact: z.boolean().optional().default(false),
      exactCeiling: z.number().int().min(1).optional().default(DEFAULT_EXACT_CEILING),
    })
    .strict();

/**
 * Validate options and fill in defaults.
 *
 * @throws {InvalidOptionsError} On unknown keys or out-of-range values.
 */
export function resolveOptions(options: ConvertOptions = {}): ResolvedConvertOptions {
  const parsed = convertOptionsSchema.safeParse(options);
  if (!parsed.success) {
    throw new InvalidOptionsError(
      parsed.error.issues.map((issue) => {
        const path = issue.path.length > 0 ? issue.path.join('.') : 'options';
        return `${path}: ${issue.message}`;
      }),
    );
  }
  return parsed.data;
}

/**
 * The number of fractional digits long division may produce.
 */
export function fractionDigitBound(options: ResolvedConvertOptions): number {
  if (options.exact || options.maxDepth === 0) return options.exactCeiling;
  return options.maxDepth;
}
