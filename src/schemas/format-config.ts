/**
 * Format Configuration Schema
 */

import { z } from 'zod';
import { config } from '../config/index.js';
import { LocaleSchema, parseConfig } from './common.js';

export const FormatConfigSchema = z.object({
  /** date-fns pattern for dates, standard specifier (N2, C, P1...) for numbers */
  formatString: z.string().min(1).optional(),
  locale: LocaleSchema,
  currency: z
    .string()
    .regex(/^[A-Z]{3}$/, 'Expected a three-letter ISO 4217 code')
    .default(() => config.currency),
  nullValueString: z.string().default(''),
  invalidValueString: z.string().default('Invalid'),
});

interface FormatCallbacks<T> {
  customFormatter?: (value: T | null) => string;
  /** Takes precedence over `customFormatter` */
  customFormatterWithValidation?: (value: T | null, isValid: boolean) => string;
}

export type FormatConfig<T = unknown> = z.output<typeof FormatConfigSchema> & FormatCallbacks<T>;
export type FormatOptions<T = unknown> = z.input<typeof FormatConfigSchema> & FormatCallbacks<T>;

export function createFormatConfig<T>(options: FormatOptions<T> = {}): FormatConfig<T> {
  const { customFormatter, customFormatterWithValidation, ...rest } = options;
  return Object.freeze({
    ...parseConfig(FormatConfigSchema, 'format config', rest),
    customFormatter,
    customFormatterWithValidation,
  });
}
