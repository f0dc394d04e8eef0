/**
 * Number, boolean and GUID parsing plus standard numeric format specifiers
 *
 * Parsing honours the locale's group and decimal separators as reported by
 * Intl.NumberFormat. Formatting maps the specifiers N, F, C, P, D and E onto
 * Intl.NumberFormat options.
 *
 * @module formatting/numbers
 */

import { ConfigurationError } from '../core/errors.js';
import type { NumberStyle } from '../schemas/common.js';

// ============================================================================
// Locale symbols
// ============================================================================

export interface NumberSymbols {
  group: string;
  decimal: string;
}

const symbolCache = new Map<string, NumberSymbols>();

export function getNumberSymbols(locale: string): NumberSymbols {
  const cached = symbolCache.get(locale);
  if (cached) {
    return cached;
  }
  const parts = new Intl.NumberFormat(locale, { useGrouping: true }).formatToParts(1234567.5);
  const symbols: NumberSymbols = {
    group: parts.find((part) => part.type === 'group')?.value ?? ',',
    decimal: parts.find((part) => part.type === 'decimal')?.value ?? '.',
  };
  symbolCache.set(locale, symbols);
  return symbols;
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

// ============================================================================
// Parsing
// ============================================================================

export const INT32_MIN = -2147483648;
export const INT32_MAX = 2147483647;

function formatError(text: string): Error {
  return new Error(`Input string '${text}' was not in a correct format.`);
}

const INTEGER_BODY = /^\d+$/;
const FLOAT_BODY = /^(?:\d+(?:\.\d*)?|\.\d+)(?:[eE][-+]?\d+)?$/;

/**
 * Parse a number written in the locale's notation.
 *
 * @throws Error with a format message when the text does not conform to `style`
 */
export function parseNumber(text: string, style: NumberStyle, locale: string): number {
  let body = text.trim();
  if (body.length === 0) {
    throw formatError(text);
  }

  let negative = false;
  if (style === 'any') {
    if (body.startsWith('(') && body.endsWith(')')) {
      negative = true;
      body = body.slice(1, -1).trim();
    }
    body = body.replace(/\p{Sc}/gu, '').trim();
  }

  const sign = /^[-+\u2212]/.exec(body);
  if (sign) {
    if (negative) {
      throw formatError(text);
    }
    negative = sign[0] !== '+';
    body = body.slice(1);
  }

  const { group, decimal } = getNumberSymbols(locale);
  const groupPattern = /\s/.test(group) ? /\s/g : new RegExp(escapeRegExp(group), 'g');
  body = body.replace(groupPattern, '');
  if (decimal !== '.') {
    if (body.includes('.')) {
      throw formatError(text);
    }
    body = body.replace(decimal, '.');
  }

  const valid = style === 'integer' ? INTEGER_BODY.test(body) : FLOAT_BODY.test(body);
  if (!valid) {
    throw formatError(text);
  }
  const value = Number(body);
  return negative ? -value : value;
}

/**
 * Parse a 32-bit signed integer.
 */
export function parseInt32(text: string, style: NumberStyle, locale: string): number {
  const value = parseNumber(text, style, locale);
  if (!Number.isInteger(value)) {
    throw formatError(text);
  }
  if (value < INT32_MIN || value > INT32_MAX) {
    throw new Error('Value was either too large or too small for an Int32.');
  }
  return value === 0 ? 0 : value;
}

/**
 * Parse `true` / `false`, case-insensitively and ignoring surrounding whitespace.
 */
export function parseBoolean(text: string): boolean {
  const normalized = text.trim().toLowerCase();
  if (normalized === 'true') return true;
  if (normalized === 'false') return false;
  throw new Error(`String '${text}' was not recognized as a valid Boolean.`);
}

const GUID_FORMS = [
  /^([0-9a-f]{8})-([0-9a-f]{4})-([0-9a-f]{4})-([0-9a-f]{4})-([0-9a-f]{12})$/i,
  /^([0-9a-f]{8})([0-9a-f]{4})([0-9a-f]{4})([0-9a-f]{4})([0-9a-f]{12})$/i,
  /^\{([0-9a-f]{8})-([0-9a-f]{4})-([0-9a-f]{4})-([0-9a-f]{4})-([0-9a-f]{12})\}$/i,
  /^\(([0-9a-f]{8})-([0-9a-f]{4})-([0-9a-f]{4})-([0-9a-f]{4})-([0-9a-f]{12})\)$/i,
];

/**
 * Parse a GUID in hyphenated, bare, braced or parenthesised form and return
 * the lowercase hyphenated form.
 */
export function parseGuid(text: string): string {
  const trimmed = text.trim();
  for (const form of GUID_FORMS) {
    const match = form.exec(trimmed);
    if (match) {
      return match.slice(1).join('-').toLowerCase();
    }
  }
  throw new Error(`Unrecognized Guid format: '${text}'.`);
}

// ============================================================================
// Formatting
// ============================================================================

const SPECIFIER = /^([CcDdEeFfNnPp])(\d{1,2})?$/;

/**
 * Format a number with a standard specifier such as "N2", "C", "P1", "D5", "E3".
 *
 * @throws ConfigurationError for unsupported specifiers
 */
export function formatNumber(
  value: number | bigint,
  pattern: string,
  locale: string,
  currency: string
): string {
  const match = SPECIFIER.exec(pattern);
  if (!match) {
    throw new ConfigurationError(`Unsupported number format '${pattern}'`);
  }
  const specifier = match[1].toUpperCase();
  const precision = match[2] === undefined ? undefined : Number(match[2]);
  const fixed = (digits: number) => ({
    minimumFractionDigits: digits,
    maximumFractionDigits: digits,
  });

  switch (specifier) {
    case 'N':
      return new Intl.NumberFormat(locale, fixed(precision ?? 2)).format(value);
    case 'F':
      return new Intl.NumberFormat(locale, { ...fixed(precision ?? 2), useGrouping: false }).format(
        value
      );
    case 'C':
      return new Intl.NumberFormat(locale, {
        style: 'currency',
        currency,
        ...(precision === undefined ? {} : fixed(precision)),
      }).format(value);
    case 'P':
      return new Intl.NumberFormat(locale, { style: 'percent', ...fixed(precision ?? 2) }).format(
        value
      );
    case 'D': {
      if (typeof value === 'number' && !Number.isInteger(value)) {
        throw new ConfigurationError(`Format specifier '${pattern}' requires an integral value`);
      }
      return new Intl.NumberFormat(locale, {
        minimumIntegerDigits: Math.min(21, Math.max(1, precision ?? 1)),
        useGrouping: false,
      }).format(value);
    }
    case 'E': {
      const digits = precision ?? 6;
      const [mantissa, exponent] = Number(value).toExponential(digits).split('e');
      const sign = exponent.startsWith('-') ? '-' : '+';
      const magnitude = exponent.replace(/^[-+]/, '').padStart(3, '0');
      const localized = mantissa.replace('.', getNumberSymbols(locale).decimal);
      return `${localized}${match[1]}${sign}${magnitude}`;
    }
    default:
      throw new ConfigurationError(`Unsupported number format '${pattern}'`);
  }
}

/**
 * Plain locale rendering used when no format string is given.
 */
export function formatPlainNumber(value: number | bigint, locale: string): string {
  return new Intl.NumberFormat(locale, { useGrouping: false, maximumFractionDigits: 20 }).format(
    value
  );
}
