/**
 * Normalization for Fuzzy Comparison
 *
 * Canonicalizes addresses, phone numbers and personal names so that
 * cosmetic differences do not lower similarity scores.
 *
 * @module fuzzy/normalize
 */

import type { FuzzyMatchingConfig } from '../schemas/fuzzy-config.js';

/** Street-type abbreviations, keyed by lowercase form without the dot */
const ADDRESS_ABBREVIATIONS: Readonly<Record<string, string>> = Object.freeze({
  st: 'Street',
  ave: 'Avenue',
  rd: 'Road',
  blvd: 'Boulevard',
  dr: 'Drive',
  ln: 'Lane',
  ct: 'Court',
  pl: 'Place',
  pkwy: 'Parkway',
  hwy: 'Highway',
});

const COMMON_WORDS: ReadonlySet<string> = new Set([
  'the', 'a', 'an', 'and', 'or', 'but', 'of', 'in', 'on', 'at', 'to', 'for',
]);

const TITLE_PREFIX = /^(?:mr|mrs|ms|miss|dr|doctor|prof|professor)\.?\s+/i;

const PHONE_EXTENSION = /\s*(?:x|ext|extension)[\s.:]*\d+/gi;

function collapseWhitespace(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

/**
 * Replace punctuation with spaces, expand street abbreviations and
 * optionally drop common words.
 *
 * @example
 * ```typescript
 * normalizeAddress('123 Main St.'); // '123 main street'
 * ```
 */
export function normalizeAddress(
  address: string,
  toLowercase = true,
  removeCommonWords = false
): string {
  if (!address) {
    return '';
  }

  let words = collapseWhitespace(address.replace(/[^\p{L}\p{N}_\s]/gu, ' '))
    .split(' ')
    .filter((word) => word.length > 0)
    .map((word) => ADDRESS_ABBREVIATIONS[word.toLowerCase()] ?? word);

  if (removeCommonWords) {
    words = words.filter((word) => !COMMON_WORDS.has(word.toLowerCase()));
  }

  const normalized = words.join(' ');
  return toLowercase ? normalized.toLowerCase() : normalized;
}

/**
 * Reduce a phone number to its digits.
 *
 * An international `00` prefix is dropped, and so is the leading `1` of an
 * eleven-digit North American number, so "+1 (555) 123-4567",
 * "001 555 123 4567" and "555.123.4567" all normalize to "5551234567".
 */
export function normalizePhone(phone: string, removeExtensions = true): string {
  if (!phone) {
    return '';
  }

  let digits = (removeExtensions ? phone.replace(PHONE_EXTENSION, '') : phone).replace(/\D/g, '');
  if (digits.startsWith('00')) {
    digits = digits.slice(2);
  }
  if (digits.length === 11 && digits.startsWith('1')) {
    digits = digits.slice(1);
  }
  return digits;
}

/**
 * Collapse whitespace and optionally strip a leading title.
 *
 * @example
 * ```typescript
 * normalizeName('  Dr.  Jane   Doe ', true, true); // 'jane doe'
 * ```
 */
export function normalizeName(name: string, toLowercase = true, removeTitles = false): string {
  if (!name) {
    return '';
  }

  let normalized = collapseWhitespace(name);
  if (removeTitles) {
    normalized = normalized.replace(TITLE_PREFIX, '');
  }
  return toLowercase ? normalized.toLowerCase() : normalized;
}

export interface NormalizeStringOptions {
  toLowercase?: boolean;
  removePunctuation?: boolean;
  normalizeWhitespace?: boolean;
  trim?: boolean;
}

/**
 * General-purpose normalization. Lowercases, collapses whitespace and trims
 * by default.
 */
export function normalizeString(input: string, options: NormalizeStringOptions = {}): string {
  const {
    toLowercase = true,
    removePunctuation = false,
    normalizeWhitespace = true,
    trim = true,
  } = options;
  if (!input) {
    return '';
  }

  let normalized = input;
  if (removePunctuation) normalized = normalized.replace(/[^\p{L}\p{N}_\s]/gu, ' ');
  if (normalizeWhitespace) normalized = normalized.replace(/\s+/g, ' ');
  if (toLowercase) normalized = normalized.toLowerCase();
  if (trim) normalized = normalized.trim();
  return normalized;
}

/**
 * Apply the configured normalization (address, then phone, then name; only
 * the first enabled one) and case folding before scoring.
 */
export function prepareForComparison(
  text: string,
  config: Pick<
    FuzzyMatchingConfig,
    'caseSensitive' | 'normalizeAddress' | 'normalizePhone' | 'normalizeName'
  >
): string {
  const keepCase = config.caseSensitive;
  let prepared: string;
  if (config.normalizeAddress) {
    prepared = normalizeAddress(text, !keepCase);
  } else if (config.normalizePhone) {
    prepared = normalizePhone(text);
  } else if (config.normalizeName) {
    prepared = normalizeName(text, !keepCase);
  } else {
    prepared = text;
  }
  return keepCase ? prepared : prepared.toLowerCase();
}
