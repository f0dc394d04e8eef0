/**
 * Format stages
 *
 * Terminal steps turning a PipelineValue into output text. Dates format
 * through date-fns tokens, numbers through standard specifiers (N2, C, P1...).
 *
 * @module stages/format
 */

import {
  createFormatConfig,
  type FormatConfig,
  type FormatOptions,
} from '../schemas/format-config.js';
import { formatDate as formatDateText } from '../formatting/dates.js';
import {
  formatNumber as formatNumberText,
  formatPlainNumber,
} from '../formatting/numbers.js';
import { runFormat, type Formatter } from './engine.js';

/** date-fns pattern used for dates when no format string is given */
export const DEFAULT_DATE_TEXT_PATTERN = 'Pp';

/**
 * Render a value as text under a format configuration.
 *
 * A format string applies to dates and numbers; other values use their
 * natural text form, objects and arrays as JSON.
 */
export function defaultText(
  value: unknown,
  config: Pick<FormatConfig, 'formatString' | 'locale' | 'currency'>
): string {
  const pattern = config.formatString;
  if (value instanceof Date) {
    return formatDateText(value, pattern ?? DEFAULT_DATE_TEXT_PATTERN, config.locale);
  }
  if (typeof value === 'number' || typeof value === 'bigint') {
    return pattern === undefined
      ? formatPlainNumber(value, config.locale)
      : formatNumberText(value, pattern, config.locale, config.currency);
  }
  if (typeof value === 'string') {
    return value;
  }
  if (typeof value === 'object' && value !== null) {
    return JSON.stringify(value);
  }
  return String(value);
}

/**
 * Format with a configuration, or with just a format string.
 *
 * @example
 * ```typescript
 * extractDate('2024-12-10').pipe(format('yyyy-MM-dd')); // '2024-12-10'
 * ```
 */
export function format<T>(options: FormatOptions<T> | string = {}): Formatter<T> {
  const config: FormatConfig<T> = createFormatConfig<T>(
    typeof options === 'string' ? { formatString: options } : options
  );
  return (input) => runFormat(input, config, (value) => defaultText(value, config));
}

/**
 * Format with a function that sees the value and its validity. The function
 * is also called for invalid and absent values.
 */
export function formatWith<T>(
  formatter: (value: T | null, isValid: boolean) => string,
  options: FormatOptions<T> = {}
): Formatter<T> {
  return format<T>({ ...options, customFormatterWithValidation: formatter });
}

/** Format with a function of the value only. */
export function formatValue<T>(
  formatter: (value: T | null) => string,
  options: FormatOptions<T> = {}
): Formatter<T> {
  return format<T>({ ...options, customFormatter: formatter });
}

/** Format a date with a date-fns pattern, localized short date by default. */
export function formatDate(pattern = 'P', options: FormatOptions<Date> = {}): Formatter<Date> {
  return format<Date>({ ...options, formatString: pattern });
}

/** Format a number with a standard specifier, "N2" by default. */
export function formatNumber(
  pattern = 'N2',
  options: FormatOptions<number> = {}
): Formatter<number> {
  return format<number>({ ...options, formatString: pattern });
}

/** Format a number as currency, in `currency` or the configured default. */
export function formatCurrency(
  currency?: string,
  options: FormatOptions<number> = {}
): Formatter<number> {
  return format<number>({
    ...options,
    formatString: 'C',
    ...(currency === undefined ? {} : { currency }),
  });
}
