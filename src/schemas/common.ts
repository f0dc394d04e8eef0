/**
 * Common Zod Schemas - shared option types used by every stage configuration
 */

import { z } from 'zod';
import { config } from '../config/index.js';
import { ConfigurationError } from '../core/errors.js';

// ============================================
// Locale Schema
// ============================================

function isCanonicalLocale(tag: string): boolean {
  try {
    return Intl.getCanonicalLocales(tag).length === 1;
  } catch {
    return false;
  }
}

/**
 * BCP 47 language tag (e.g. "en-US", "de-DE"). Defaults to the runtime
 * locale from PIPELINE_LOCALE when omitted.
 */
export const LocaleSchema = z
  .string()
  .refine(isCanonicalLocale, { message: 'Must be a valid BCP 47 language tag' })
  .default(() => config.locale);

export type Locale = z.infer<typeof LocaleSchema>;

// ============================================
// Enumerations
// ============================================

/**
 * How midpoint values are resolved when rounding.
 * - toEven: banker's rounding (2.5 -> 2, 3.5 -> 4)
 * - awayFromZero: 2.5 -> 3, -2.5 -> -3
 * - toZero: truncate
 * - toNegativeInfinity: floor
 * - toPositiveInfinity: ceiling
 */
export const RoundingModeSchema = z.enum([
  'toEven',
  'awayFromZero',
  'toZero',
  'toNegativeInfinity',
  'toPositiveInfinity',
]);

export type RoundingMode = z.infer<typeof RoundingModeSchema>;

/**
 * String comparison policy shared by all string validations.
 * The locale variants compare through Intl.Collator.
 */
export const StringComparisonSchema = z.enum([
  'ordinal',
  'ordinalIgnoreCase',
  'locale',
  'localeIgnoreCase',
]);

export type StringComparison = z.infer<typeof StringComparisonSchema>;

/**
 * Accepted numeric notation when parsing.
 * - integer: optional sign and digits, group separators allowed
 * - float: adds a decimal part and exponent
 * - any: adds currency symbols and parenthesised negatives
 */
export const NumberStyleSchema = z.enum(['integer', 'float', 'any']);

export type NumberStyle = z.infer<typeof NumberStyleSchema>;

// ============================================
// Parsing helper
// ============================================

/**
 * Validate configuration input against a schema.
 *
 * @throws ConfigurationError listing every zod issue
 */
export function parseConfig<S extends z.ZodTypeAny>(
  schema: S,
  subject: string,
  input: unknown
): z.output<S> {
  const result = schema.safeParse(input);
  if (!result.success) {
    throw ConfigurationError.fromZodError(subject, result.error);
  }
  return result.data;
}
