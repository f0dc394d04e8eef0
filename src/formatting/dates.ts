/**
 * Date parsing and formatting collaborators
 *
 * Exact parsing and formatting go through date-fns. Free-form parsing tries
 * ISO 8601 first, then patterns derived from the locale's short date order.
 *
 * @module formatting/dates
 */

import { format, isValid, parse, parseISO } from 'date-fns';
import { ConfigurationError, describeError } from '../core/errors.js';
import { resolveDateLocale } from './locales.js';

const ISO_LIKE = /^\d{4}-\d{2}-\d{2}(?:[T ]\d{2}:\d{2}(?::\d{2}(?:\.\d+)?)?(?:Z|[+-]\d{2}:?\d{2})?)?$/;

const TIME_SUFFIXES = ['', ' HH:mm', ' HH:mm:ss', ' h:mm a', ' h:mm:ss a'] as const;

const MONTH_NAME_PATTERNS = [
  'MMMM d, yyyy',
  'MMM d, yyyy',
  'd MMMM yyyy',
  'd MMM yyyy',
  'EEEE, MMMM d, yyyy',
  'yyyy/MM/dd',
] as const;

type DatePart = 'day' | 'month' | 'year';

function isDatePart(type: string): type is DatePart {
  return type === 'day' || type === 'month' || type === 'year';
}

/**
 * Order of day/month/year in the locale's numeric short date.
 */
export function localeDateOrder(locale: string): DatePart[] {
  const parts = new Intl.DateTimeFormat(locale, {
    year: 'numeric',
    month: '2-digit',
    day: '2-digit',
  }).formatToParts(new Date(2024, 11, 25));
  const order: DatePart[] = [];
  for (const part of parts) {
    if (isDatePart(part.type)) {
      order.push(part.type);
    }
  }
  return order.length === 3 ? order : ['month', 'day', 'year'];
}

const PART_TOKENS: Record<DatePart, string> = { day: 'dd', month: 'MM', year: 'yyyy' };

/**
 * date-fns patterns tried by free-form parsing for a locale, most specific
 * culture order first. Each numeric form is tried with a two-digit year
 * before the full year, since `yyyy` also accepts "24" as the year 24.
 */
export function freeFormPatterns(locale: string): string[] {
  const order = localeDateOrder(locale);
  const tokens = (year: string) =>
    order.map((part) => (part === 'year' ? year : PART_TOKENS[part]));
  const numeric = ['/', '-', '.'].flatMap((separator) => [
    tokens('yy').join(separator),
    tokens(PART_TOKENS.year).join(separator),
  ]);
  const patterns: string[] = [];
  for (const base of [...numeric, ...MONTH_NAME_PATTERNS]) {
    for (const suffix of TIME_SUFFIXES) {
      patterns.push(`${base}${suffix}`);
    }
  }
  return patterns;
}

/**
 * Parse with a single date-fns pattern. Returns null when the text does not
 * conform.
 */
export function parseDateExact(text: string, pattern: string, locale: string): Date | null {
  let parsed: Date;
  try {
    parsed = parse(text, pattern, new Date(), { locale: resolveDateLocale(locale) });
  } catch (error) {
    throw new ConfigurationError(`Invalid date format '${pattern}': ${describeError(error)}`, [], {
      cause: error,
    });
  }
  return isValid(parsed) ? parsed : null;
}

/**
 * Culture-aware parse of an arbitrary date string.
 */
export function parseDateFreeForm(text: string, locale: string): Date | null {
  const trimmed = text.trim();
  if (ISO_LIKE.test(trimmed)) {
    const iso = parseISO(trimmed);
    if (isValid(iso)) {
      return iso;
    }
  }
  for (const pattern of freeFormPatterns(locale)) {
    const parsed = parseDateExact(trimmed, pattern, locale);
    if (parsed) {
      return parsed;
    }
  }
  return null;
}

/**
 * Format a date with a date-fns pattern.
 *
 * @throws ConfigurationError when the pattern contains unknown tokens
 */
export function formatDate(date: Date, pattern: string, locale: string): string {
  if (!isValid(date)) {
    throw new RangeError('Invalid time value');
  }
  try {
    return format(date, pattern, { locale: resolveDateLocale(locale) });
  } catch (error) {
    throw new ConfigurationError(`Invalid date format '${pattern}': ${describeError(error)}`, [], {
      cause: error,
    });
  }
}
