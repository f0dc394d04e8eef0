/**
 * Extraction stages
 *
 * Entry points of a chain: each takes raw text (or a PipelineValue<string>)
 * and produces the first typed PipelineValue.
 *
 * @module stages/extract
 */

import type { PipelineValue } from '../core/pipeline-value.js';
import {
  createExtractConfig,
  type ExtractConfig,
  type ExtractOptions,
  type SemanticType,
} from '../schemas/extract-config.js';
import { parseDateExact, parseDateFreeForm } from '../formatting/dates.js';
import { parseBoolean, parseGuid, parseInt32, parseNumber } from '../formatting/numbers.js';
import { runExtraction, type ExtractionSource, type Parser } from './engine.js';

// ============================================================================
// Parsers
// ============================================================================

/**
 * Parse a date trying `dateTimeFormat`, then each of `dateTimeFormats` in
 * order, then culture-aware free-form parsing.
 */
export function parseDate(
  text: string,
  config: Pick<ExtractConfig, 'dateTimeFormat' | 'dateTimeFormats' | 'locale'>
): Date {
  const formats: string[] = [];
  if (config.dateTimeFormat !== undefined) formats.push(config.dateTimeFormat);
  if (config.dateTimeFormats !== undefined) formats.push(...config.dateTimeFormats);

  for (const format of formats) {
    const parsed = parseDateExact(text, format, config.locale);
    if (parsed) {
      return parsed;
    }
  }
  const parsed = parseDateFreeForm(text, config.locale);
  if (parsed) {
    return parsed;
  }
  throw new Error(`Unable to parse '${text}' as a date (tried: ${[...formats, 'free-form'].join(', ')})`);
}

const PARSERS: { readonly [K in SemanticType]: Parser<ParsedType<K>> } = {
  Date: (text, config) => parseDate(text, config),
  Int: (text, config) => parseInt32(text, config.numberStyle, config.locale),
  Double: (text, config) => parseNumber(text, config.numberStyle, config.locale),
  Decimal: (text, config) => {
    const value = parseNumber(text, config.numberStyle, config.locale);
    if (!Number.isFinite(value)) {
      throw new Error('Value was either too large or too small for a Decimal.');
    }
    return value;
  },
  Bool: (text) => parseBoolean(text),
  Guid: (text) => parseGuid(text),
};

/** Value type produced for each semantic type */
export type ParsedType<K extends SemanticType> = K extends 'Date'
  ? Date
  : K extends 'Bool'
    ? boolean
    : K extends 'Guid'
      ? string
      : number;

// ============================================================================
// Extractors
// ============================================================================

/**
 * Extract with a caller-supplied parser.
 *
 * @example
 * ```typescript
 * extract('Order #A-1042', (text) => text.toUpperCase(), { regexPattern: '#(\\S+)', groupIndex: 1 });
 * // PipelineValue { value: 'A-1042', isValid: true }
 * ```
 */
export function extract<T>(
  source: ExtractionSource,
  parser: (text: string) => T,
  options: ExtractOptions = {},
  operation = 'Extract'
): PipelineValue<T> {
  return runExtraction(source, operation, (text) => parser(text), createExtractConfig(options));
}

/**
 * Extract the value of a semantic type using its built-in parser.
 */
export function extractAs<K extends SemanticType>(
  source: ExtractionSource,
  type: K,
  options: ExtractOptions = {}
): PipelineValue<ParsedType<K>> {
  const parser: Parser<ParsedType<K>> = PARSERS[type];
  return runExtraction(source, `Extract${type}`, parser, createExtractConfig(options), type);
}

export function extractString(
  source: ExtractionSource,
  options: ExtractOptions = {}
): PipelineValue<string> {
  return runExtraction(source, 'ExtractString', (text) => text, createExtractConfig(options));
}

/**
 * @example
 * ```typescript
 * extractDate('25/12/2024', { dateTimeFormat: 'dd/MM/yyyy' }).value; // 2024-12-25 local
 * ```
 */
export function extractDate(
  source: ExtractionSource,
  options: ExtractOptions = {}
): PipelineValue<Date> {
  return extractAs(source, 'Date', options);
}

export function extractInt(
  source: ExtractionSource,
  options: ExtractOptions = {}
): PipelineValue<number> {
  return extractAs(source, 'Int', options);
}

export function extractDouble(
  source: ExtractionSource,
  options: ExtractOptions = {}
): PipelineValue<number> {
  return extractAs(source, 'Double', options);
}

export function extractDecimal(
  source: ExtractionSource,
  options: ExtractOptions = {}
): PipelineValue<number> {
  return extractAs(source, 'Decimal', options);
}

export function extractBool(
  source: ExtractionSource,
  options: ExtractOptions = {}
): PipelineValue<boolean> {
  return extractAs(source, 'Bool', options);
}

/** Yields the lowercase hyphenated form. */
export function extractGuid(
  source: ExtractionSource,
  options: ExtractOptions = {}
): PipelineValue<string> {
  return extractAs(source, 'Guid', options);
}
