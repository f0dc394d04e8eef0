/**
 * Transformation stages
 *
 * Same-type stages run through `runTransformation`, so a `customTransform`
 * in their options replaces the built-in worker. Type-changing stages run
 * through `runConversion`.
 *
 * @module stages/transform
 */

import {
  add as addDurationToDate,
  addDays as addDaysToDate,
  addHours as addHoursToDate,
  addMinutes as addMinutesToDate,
  addMonths as addMonthsToDate,
  addYears as addYearsToDate,
  type Duration,
} from 'date-fns';
import { ConfigurationError } from '../core/errors.js';
import {
  createTransformationConfig,
  type TransformationOptions,
} from '../schemas/transformation-config.js';
import { createFormatConfig, type FormatOptions } from '../schemas/format-config.js';
import { runConversion, runTransformation, type Stage } from './engine.js';
import { roundTo } from './rounding.js';
import { defaultText } from './format.js';

// ============================================================================
// Generic
// ============================================================================

/**
 * Same-type transformation with an arbitrary function.
 *
 * @example
 * ```typescript
 * PipelineValue.of(4).pipe(transform((n: number) => n * n, 'Square')).value; // 16
 * ```
 */
export function transform<T>(
  fn: (value: T) => T,
  operation = 'Transform',
  options: TransformationOptions<T> = {}
): Stage<T> {
  const config = createTransformationConfig(options);
  return (input) => runTransformation(input, operation, config, fn);
}

/** Type-changing transformation. Invalid input yields an absent result. */
export function convert<T, U>(fn: (value: T) => U, operation = 'Convert'): Stage<T, U> {
  return (input) => runConversion(input, operation, fn);
}

/** Convert to the text `format()` would produce for the value. */
export function toText<T>(options: FormatOptions<T> = {}): Stage<T, string> {
  const config = createFormatConfig(options);
  return convert((value: T) => defaultText(value, config), 'ToText');
}

function sameType<T>(
  operation: string,
  options: TransformationOptions<T>,
  worker: (value: T) => T
): Stage<T> {
  const config = createTransformationConfig(options);
  return (input) => runTransformation(input, operation, config, worker);
}

// ============================================================================
// Dates
// ============================================================================

function dateArithmetic(
  operation: string,
  apply: (date: Date) => Date,
  options: TransformationOptions<Date>
): Stage<Date> {
  return sameType(operation, options, (date) => {
    const result = apply(date);
    if (Number.isNaN(result.getTime())) {
      throw new RangeError('The added or subtracted value results in an un-representable Date.');
    }
    return result;
  });
}

export function addDays(days: number, options: TransformationOptions<Date> = {}): Stage<Date> {
  return dateArithmetic('AddDays', (date) => addDaysToDate(date, days), options);
}

export function addMonths(months: number, options: TransformationOptions<Date> = {}): Stage<Date> {
  return dateArithmetic('AddMonths', (date) => addMonthsToDate(date, months), options);
}

export function addYears(years: number, options: TransformationOptions<Date> = {}): Stage<Date> {
  return dateArithmetic('AddYears', (date) => addYearsToDate(date, years), options);
}

export function addHours(hours: number, options: TransformationOptions<Date> = {}): Stage<Date> {
  return dateArithmetic('AddHours', (date) => addHoursToDate(date, hours), options);
}

export function addMinutes(minutes: number, options: TransformationOptions<Date> = {}): Stage<Date> {
  return dateArithmetic('AddMinutes', (date) => addMinutesToDate(date, minutes), options);
}

/**
 * Add a date-fns Duration, e.g. `{ months: 1, days: -2 }`.
 */
export function addDuration(
  duration: Duration,
  options: TransformationOptions<Date> = {}
): Stage<Date> {
  return dateArithmetic('AddDuration', (date) => addDurationToDate(date, duration), options);
}

// ============================================================================
// Numbers
// ============================================================================

export function add(amount: number, options: TransformationOptions<number> = {}): Stage<number> {
  return sameType('Add', options, (value) => value + amount);
}

export function subtract(
  amount: number,
  options: TransformationOptions<number> = {}
): Stage<number> {
  return sameType('Subtract', options, (value) => value - amount);
}

export function multiply(
  factor: number,
  options: TransformationOptions<number> = {}
): Stage<number> {
  return sameType('Multiply', options, (value) => value * factor);
}

/** Records a failure instead of producing Infinity when `divisor` is zero. */
export function divide(
  divisor: number,
  options: TransformationOptions<number> = {}
): Stage<number> {
  return sameType('Divide', options, (value) => {
    if (divisor === 0) {
      throw new RangeError('Attempted to divide by zero.');
    }
    return value / divisor;
  });
}

/**
 * Round to `decimals` digits using the configured `roundingMode`
 * (ties-to-even by default).
 *
 * @throws ConfigurationError when `decimals` is not an integer in [0, 15]
 */
export function round(
  decimals = 0,
  options: TransformationOptions<number> = {}
): Stage<number> {
  if (!Number.isInteger(decimals) || decimals < 0 || decimals > 15) {
    throw new ConfigurationError(`Rounding digits must be between 0 and 15, got ${decimals}`);
  }
  const config = createTransformationConfig(options);
  return (input) =>
    runTransformation(input, 'Round', config, (value) =>
      roundTo(value, decimals, config.roundingMode)
    );
}

export function abs(options: TransformationOptions<number> = {}): Stage<number> {
  return sameType('Abs', options, (value) => Math.abs(value));
}

// ============================================================================
// Strings
// ============================================================================

function trimCharacters(value: string, chars: string): string {
  const set = new Set(chars);
  const units = [...value];
  let start = 0;
  let end = units.length;
  while (start < end && set.has(units[start])) start++;
  while (end > start && set.has(units[end - 1])) end--;
  return units.slice(start, end).join('');
}

/**
 * Trim `trimChars` when configured, else whitespace (unless
 * `trimWhitespace` is false).
 */
export function trim(options: TransformationOptions<string> = {}): Stage<string> {
  const config = createTransformationConfig(options);
  return (input) =>
    runTransformation(input, 'Trim', config, (value) => {
      if (config.trimChars !== undefined) {
        return trimCharacters(value, config.trimChars);
      }
      return config.trimWhitespace ? value.trim() : value;
    });
}

/** Upper-case using the configured locale's rules. */
export function toUpper(options: TransformationOptions<string> = {}): Stage<string> {
  const config = createTransformationConfig(options);
  return (input) =>
    runTransformation(input, 'ToUpper', config, (value) => value.toLocaleUpperCase(config.locale));
}

/** Lower-case using the configured locale's rules. */
export function toLower(options: TransformationOptions<string> = {}): Stage<string> {
  const config = createTransformationConfig(options);
  return (input) =>
    runTransformation(input, 'ToLower', config, (value) => value.toLocaleLowerCase(config.locale));
}

/**
 * Replace every occurrence of `search` (a string or a global RegExp).
 */
export function replace(
  search: string | RegExp,
  replacement: string,
  options: TransformationOptions<string> = {}
): Stage<string> {
  if (search === '') {
    throw new ConfigurationError('Replace requires a non-empty search string');
  }
  return sameType('Replace', options, (value) => value.replaceAll(search, replacement));
}

/**
 * Characters from `start`, `length` of them or to the end.
 */
export function substring(
  start: number,
  length?: number,
  options: TransformationOptions<string> = {}
): Stage<string> {
  return sameType('Substring', options, (value) => {
    if (start < 0 || start > value.length) {
      throw new RangeError(
        `Start index ${start} is out of range for a string of length ${value.length}.`
      );
    }
    if (length !== undefined && (length < 0 || start + length > value.length)) {
      throw new RangeError(
        `Length ${length} from index ${start} exceeds a string of length ${value.length}.`
      );
    }
    return length === undefined ? value.slice(start) : value.slice(start, start + length);
  });
}
