/**
 * Validation Configuration Schema
 */

import { z } from 'zod';
import { LocaleSchema, StringComparisonSchema, parseConfig } from './common.js';

export const ValidationConfigSchema = z.object({
  caseSensitive: z.boolean().default(true),
  stringComparison: StringComparisonSchema.default('ordinal'),
  locale: LocaleSchema,
  /** Allowed absolute difference for numeric equality */
  tolerance: z.number().nonnegative().optional(),
  inclusiveLowerBound: z.boolean().default(true),
  inclusiveUpperBound: z.boolean().default(true),
  /** Replaces the generated failure message */
  errorMessage: z.string().min(1).optional(),
});

interface ValidationCallbacks<T> {
  /** Replaces the built-in predicate of the stage */
  customValidator?: (value: T) => boolean;
}

export type ValidationConfig<T = unknown> = z.output<typeof ValidationConfigSchema> &
  ValidationCallbacks<T>;
export type ValidationOptions<T = unknown> = z.input<typeof ValidationConfigSchema> &
  ValidationCallbacks<T>;

export function createValidationConfig<T>(options: ValidationOptions<T> = {}): ValidationConfig<T> {
  const { customValidator, ...rest } = options;
  return Object.freeze({
    ...parseConfig(ValidationConfigSchema, 'validation config', rest),
    customValidator,
  });
}
