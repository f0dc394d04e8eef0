/**
 * Tests for the date and number collaborators
 */

import { describe, it, expect } from '@jest/globals';
import { de, enGB, enUS } from 'date-fns/locale';
import {
  resolveDateLocale,
  localeDateOrder,
  parseDateExact,
  parseDateFreeForm,
  formatDate,
  parseNumber,
  parseInt32,
  parseBoolean,
  parseGuid,
  formatNumber,
  formatPlainNumber,
} from './index.js';
import { ConfigurationError } from '../core/errors.js';

// ============================================================================
// Locales
// ============================================================================

describe('resolveDateLocale', () => {
  it('resolves exact tags', () => {
    expect(resolveDateLocale('en-GB')).toBe(enGB);
  });

  it('falls back to the language subtag', () => {
    expect(resolveDateLocale('de-AT')).toBe(de);
  });

  it('falls back to en-US for unknown languages', () => {
    expect(resolveDateLocale('xx-YY')).toBe(enUS);
  });
});

describe('localeDateOrder', () => {
  it('reports month-first for en-US', () => {
    expect(localeDateOrder('en-US')).toEqual(['month', 'day', 'year']);
  });

  it('reports day-first for de-DE', () => {
    expect(localeDateOrder('de-DE')).toEqual(['day', 'month', 'year']);
  });
});

// ============================================================================
// Dates
// ============================================================================

describe('parseDateExact', () => {
  it('parses with the given pattern', () => {
    expect(parseDateExact('25/12/2024', 'dd/MM/yyyy', 'en-US')).toEqual(new Date(2024, 11, 25));
  });

  it('returns null when the text does not conform', () => {
    expect(parseDateExact('2024-12-25', 'dd/MM/yyyy', 'en-US')).toBeNull();
  });

  it('rejects trailing text', () => {
    expect(parseDateExact('2024-12-25 extra', 'yyyy-MM-dd', 'en-US')).toBeNull();
  });
});

describe('parseDateFreeForm', () => {
  it('parses ISO dates as local midnight', () => {
    expect(parseDateFreeForm('2024-12-10', 'en-US')).toEqual(new Date(2024, 11, 10));
  });

  it('parses ISO date-times', () => {
    expect(parseDateFreeForm('2024-12-10T08:30:00', 'en-US')).toEqual(
      new Date(2024, 11, 10, 8, 30, 0)
    );
  });

  it('uses the locale order for numeric dates', () => {
    expect(parseDateFreeForm('12/25/2024', 'en-US')).toEqual(new Date(2024, 11, 25));
    expect(parseDateFreeForm('25.12.2024', 'de-DE')).toEqual(new Date(2024, 11, 25));
  });

  it('reads two-digit years as recent years', () => {
    expect(parseDateFreeForm('12/10/24', 'en-US')).toEqual(new Date(2024, 11, 10));
    expect(parseDateFreeForm('25.12.24 14:05', 'de-DE')).toEqual(new Date(2024, 11, 25, 14, 5));
  });

  it('does not read a day-first date as month-first', () => {
    expect(parseDateFreeForm('25/12/2024', 'en-US')).toBeNull();
  });

  it('parses month names', () => {
    expect(parseDateFreeForm('December 25, 2024', 'en-US')).toEqual(new Date(2024, 11, 25));
  });

  it('parses a trailing time', () => {
    expect(parseDateFreeForm('12/25/2024 14:05', 'en-US')).toEqual(new Date(2024, 11, 25, 14, 5));
  });

  it('returns null for text that is not a date', () => {
    expect(parseDateFreeForm('invalid-date', 'en-US')).toBeNull();
  });
});

describe('formatDate', () => {
  const date = new Date(2024, 11, 10, 9, 5);

  it('formats with date-fns tokens', () => {
    expect(formatDate(date, 'yyyy-MM-dd', 'en-US')).toBe('2024-12-10');
  });

  it('honours the locale for localized tokens', () => {
    expect(formatDate(date, 'P', 'en-US')).toBe('12/10/2024');
    expect(formatDate(date, 'P', 'en-GB')).toBe('10/12/2024');
    expect(formatDate(date, 'P', 'de-DE')).toBe('10.12.2024');
  });

  it('throws ConfigurationError for unknown tokens', () => {
    expect(() => formatDate(date, 'yyyy-MM-dd foo', 'en-US')).toThrow(ConfigurationError);
  });

  it('throws for an invalid date', () => {
    expect(() => formatDate(new Date(Number.NaN), 'P', 'en-US')).toThrow(RangeError);
  });
});

// ============================================================================
// Number parsing
// ============================================================================

describe('parseNumber', () => {
  it('removes group separators', () => {
    expect(parseNumber('1,234.56', 'any', 'en-US')).toBe(1234.56);
  });

  it('uses the locale decimal separator', () => {
    expect(parseNumber('1.234,56', 'float', 'de-DE')).toBe(1234.56);
  });

  it('accepts spaces as group separators when the locale groups with spaces', () => {
    expect(parseNumber('1 234,5', 'float', 'fr-FR')).toBe(1234.5);
  });

  it('accepts currency symbols and parenthesised negatives with the any style', () => {
    expect(parseNumber('$1,000', 'any', 'en-US')).toBe(1000);
    expect(parseNumber('(42)', 'any', 'en-US')).toBe(-42);
  });

  it('accepts a sign and exponent', () => {
    expect(parseNumber('-12.5', 'float', 'en-US')).toBe(-12.5);
    expect(parseNumber('1.5e3', 'float', 'en-US')).toBe(1500);
  });

  it('rejects a decimal part with the integer style', () => {
    expect(() => parseNumber('12.5', 'integer', 'en-US')).toThrow(
      "Input string '12.5' was not in a correct format."
    );
  });

  it('rejects currency symbols without the any style', () => {
    expect(() => parseNumber('$5', 'float', 'en-US')).toThrow(/not in a correct format/);
  });

  it('rejects empty and non-numeric text', () => {
    expect(() => parseNumber('  ', 'any', 'en-US')).toThrow(/not in a correct format/);
    expect(() => parseNumber('abc', 'any', 'en-US')).toThrow(/not in a correct format/);
  });
});

describe('parseInt32', () => {
  it('parses integers', () => {
    expect(parseInt32('-42', 'integer', 'en-US')).toBe(-42);
  });

  it('rejects fractional values', () => {
    expect(() => parseInt32('4.5', 'any', 'en-US')).toThrow(/not in a correct format/);
  });

  it('rejects values outside the 32-bit range', () => {
    expect(() => parseInt32('2147483648', 'integer', 'en-US')).toThrow(
      'Value was either too large or too small for an Int32.'
    );
    expect(parseInt32('-2147483648', 'integer', 'en-US')).toBe(-2147483648);
  });
});

describe('parseBoolean', () => {
  it('is case-insensitive and trims', () => {
    expect(parseBoolean(' TRUE ')).toBe(true);
    expect(parseBoolean('False')).toBe(false);
  });

  it('rejects other words', () => {
    expect(() => parseBoolean('yes')).toThrow("String 'yes' was not recognized as a valid Boolean.");
  });
});

describe('parseGuid', () => {
  const canonical = '3f2504e0-4f89-11d3-9a0c-0305e82c3301';

  it('accepts every supported form', () => {
    expect(parseGuid('3F2504E0-4F89-11D3-9A0C-0305E82C3301')).toBe(canonical);
    expect(parseGuid('3F2504E04F8911D39A0C0305E82C3301')).toBe(canonical);
    expect(parseGuid('{3f2504e0-4f89-11d3-9a0c-0305e82c3301}')).toBe(canonical);
    expect(parseGuid('(3f2504e0-4f89-11d3-9a0c-0305e82c3301)')).toBe(canonical);
  });

  it('rejects malformed identifiers', () => {
    expect(() => parseGuid('3f2504e0-4f89-11d3-9a0c')).toThrow(/Unrecognized Guid format/);
  });
});

// ============================================================================
// Number formatting
// ============================================================================

describe('formatNumber', () => {
  it('formats N with grouping and two decimals by default', () => {
    expect(formatNumber(1234.5, 'N', 'en-US', 'USD')).toBe('1,234.50');
    expect(formatNumber(1234.5, 'N0', 'en-US', 'USD')).toBe('1,235');
    expect(formatNumber(1234.5, 'N2', 'de-DE', 'EUR')).toBe('1.234,50');
  });

  it('formats F without grouping', () => {
    expect(formatNumber(1234.5, 'F2', 'en-US', 'USD')).toBe('1234.50');
  });

  it('formats C with the configured currency', () => {
    expect(formatNumber(1234.5, 'C', 'en-US', 'USD')).toBe('$1,234.50');
    expect(formatNumber(1234.5, 'C0', 'en-US', 'USD')).toBe('$1,235');
  });

  it('formats P as a percentage', () => {
    expect(formatNumber(0.125, 'P1', 'en-US', 'USD')).toBe('12.5%');
    expect(formatNumber(0.5, 'P', 'en-US', 'USD')).toBe('50.00%');
  });

  it('pads D to the requested digits', () => {
    expect(formatNumber(42, 'D5', 'en-US', 'USD')).toBe('00042');
    expect(formatNumber(-42, 'D4', 'en-US', 'USD')).toBe('-0042');
  });

  it('rejects D for fractional values', () => {
    expect(() => formatNumber(4.2, 'D', 'en-US', 'USD')).toThrow(ConfigurationError);
  });

  it('formats E with a three-digit exponent', () => {
    expect(formatNumber(1234.5678, 'E3', 'en-US', 'USD')).toBe('1.235E+003');
    expect(formatNumber(0.00012, 'e2', 'en-US', 'USD')).toBe('1.20e-004');
  });

  it('rejects unsupported specifiers', () => {
    expect(() => formatNumber(1, '#,##0.00', 'en-US', 'USD')).toThrow(ConfigurationError);
  });
});

describe('formatPlainNumber', () => {
  it('renders without grouping in the locale notation', () => {
    expect(formatPlainNumber(1234.5, 'en-US')).toBe('1234.5');
    expect(formatPlainNumber(1234.5, 'de-DE')).toBe('1234,5');
  });
});
