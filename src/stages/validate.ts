/**
 * Validation stages
 *
 * Each factory parses its options once and returns a Stage that leaves the
 * value untouched, recording an error when the check fails.
 *
 * @module stages/validate
 */

import { ConfigurationError, describeError } from '../core/errors.js';
import {
  createValidationConfig,
  type ValidationConfig,
  type ValidationOptions,
} from '../schemas/validation-config.js';
import {
  compareValues,
  describeValue,
  foldForPolicy,
  ignoresCase,
  type Comparable,
  type Widen,
} from './compare.js';
import { runValidation, type Stage } from './engine.js';

// ============================================================================
// Ordering
// ============================================================================

function ordering<T extends Comparable>(
  operation: string,
  bound: Comparable,
  options: ValidationOptions<T>,
  accept: (comparison: number) => boolean,
  relation: string
): Stage<T> {
  const config = createValidationConfig(options);
  return (input) =>
    runValidation(
      input,
      operation,
      config,
      (value) => accept(compareValues(value, bound, config)),
      (value) => `Value ${describeValue(value)} is not ${relation} ${describeValue(bound)}`
    );
}

/** Strictly earlier than `date`. */
export function before(date: Date, options: ValidationOptions<Date> = {}): Stage<Date> {
  return ordering('Before', date, options, (c) => c < 0, 'before');
}

/** Strictly later than `date`. */
export function after(date: Date, options: ValidationOptions<Date> = {}): Stage<Date> {
  return ordering('After', date, options, (c) => c > 0, 'after');
}

export function greaterThan<B extends Comparable>(
  bound: B,
  options: ValidationOptions<Widen<B>> = {}
): Stage<Widen<B>> {
  return ordering<Widen<B>>('GreaterThan', bound, options, (c) => c > 0, 'greater than');
}

export function greaterThanOrEqual<B extends Comparable>(
  bound: B,
  options: ValidationOptions<Widen<B>> = {}
): Stage<Widen<B>> {
  return ordering<Widen<B>>(
    'GreaterThanOrEqual',
    bound,
    options,
    (c) => c >= 0,
    'greater than or equal to'
  );
}

export function lessThan<B extends Comparable>(
  bound: B,
  options: ValidationOptions<Widen<B>> = {}
): Stage<Widen<B>> {
  return ordering<Widen<B>>('LessThan', bound, options, (c) => c < 0, 'less than');
}

export function lessThanOrEqual<B extends Comparable>(
  bound: B,
  options: ValidationOptions<Widen<B>> = {}
): Stage<Widen<B>> {
  return ordering<Widen<B>>(
    'LessThanOrEqual',
    bound,
    options,
    (c) => c <= 0,
    'less than or equal to'
  );
}

/**
 * Within `[lower, upper]`. Each bound is inclusive unless
 * `inclusiveLowerBound` / `inclusiveUpperBound` is false.
 *
 * @example
 * ```typescript
 * PipelineValue.of(50).pipe(between(20, 50)).isValid; // true
 * PipelineValue.of(50).pipe(between(20, 50, { inclusiveUpperBound: false })).isValid; // false
 * ```
 */
export function between<B extends Comparable>(
  lower: B,
  upper: B,
  options: ValidationOptions<Widen<B>> = {}
): Stage<Widen<B>> {
  const config: ValidationConfig<Widen<B>> = createValidationConfig(options);
  const open = (inclusive: boolean) => (inclusive ? '[' : '(');
  const close = (inclusive: boolean) => (inclusive ? ']' : ')');
  const range =
    `${open(config.inclusiveLowerBound)}${describeValue(lower)}, ` +
    `${describeValue(upper)}${close(config.inclusiveUpperBound)}`;

  return (input) =>
    runValidation(
      input,
      'Between',
      config,
      (value) => {
        const low = compareValues(value, lower, config);
        const high = compareValues(value, upper, config);
        const lowOk = config.inclusiveLowerBound ? low >= 0 : low > 0;
        const highOk = config.inclusiveUpperBound ? high <= 0 : high < 0;
        return lowOk && highOk;
      },
      (value) => `Value ${describeValue(value)} is not within ${range}`
    );
}

// ============================================================================
// Equality
// ============================================================================

/**
 * Equal to `other`. Numbers honour `tolerance` (exact when omitted);
 * strings honour the string comparison policy.
 */
export function equalTo<B extends Comparable>(
  other: B,
  options: ValidationOptions<Widen<B>> = {}
): Stage<Widen<B>> {
  const config: ValidationConfig<Widen<B>> = createValidationConfig(options);
  return (input) =>
    runValidation(
      input,
      'EqualTo',
      config,
      (value) => {
        if (typeof value === 'number' && typeof other === 'number' && config.tolerance !== undefined) {
          return Math.abs(value - other) <= config.tolerance;
        }
        return compareValues(value, other, config) === 0;
      },
      (value) => `Value ${describeValue(value)} is not equal to ${describeValue(other)}`
    );
}

/**
 * Within `tolerance` of `other`. Without a tolerance the smallest positive
 * double is used, i.e. effectively exact.
 */
export function approximatelyEqual(
  other: number,
  options: ValidationOptions<number> = {}
): Stage<number> {
  const config = createValidationConfig(options);
  const tolerance = config.tolerance ?? Number.MIN_VALUE;
  return (input) =>
    runValidation(
      input,
      'ApproximatelyEqual',
      config,
      (value) => Math.abs(value - other) <= tolerance,
      (value) => `Value ${value} is not within ${tolerance} of ${other}`
    );
}

// ============================================================================
// Strings
// ============================================================================

function stringCheck(
  operation: string,
  options: ValidationOptions<string>,
  test: (value: string, fold: (text: string) => string) => boolean,
  describe: (value: string) => string
): Stage<string> {
  const config = createValidationConfig(options);
  const fold = (text: string) => foldForPolicy(text, config);
  return (input) => runValidation(input, operation, config, (value) => test(value, fold), describe);
}

export function contains(substring: string, options: ValidationOptions<string> = {}): Stage<string> {
  return stringCheck(
    'Contains',
    options,
    (value, fold) => fold(value).includes(fold(substring)),
    (value) => `Value ${describeValue(value)} does not contain ${describeValue(substring)}`
  );
}

export function startsWith(prefix: string, options: ValidationOptions<string> = {}): Stage<string> {
  return stringCheck(
    'StartsWith',
    options,
    (value, fold) => fold(value).startsWith(fold(prefix)),
    (value) => `Value ${describeValue(value)} does not start with ${describeValue(prefix)}`
  );
}

export function endsWith(suffix: string, options: ValidationOptions<string> = {}): Stage<string> {
  return stringCheck(
    'EndsWith',
    options,
    (value, fold) => fold(value).endsWith(fold(suffix)),
    (value) => `Value ${describeValue(value)} does not end with ${describeValue(suffix)}`
  );
}

/**
 * Matches the regular expression. Case-insensitive when `caseSensitive`
 * is false.
 *
 * @throws ConfigurationError for a malformed pattern
 */
export function matches(pattern: string, options: ValidationOptions<string> = {}): Stage<string> {
  const policy = createValidationConfig(options);
  let regex: RegExp;
  try {
    regex = new RegExp(pattern, ignoresCase(policy) ? 'i' : '');
  } catch (error) {
    throw new ConfigurationError(`Malformed regular expression '${pattern}': ${describeError(error)}`, [], {
      cause: error,
    });
  }
  return stringCheck(
    'Matches',
    options,
    (value) => regex.test(value),
    (value) => `Value ${describeValue(value)} does not match pattern '${pattern}'`
  );
}

/** Non-empty after trimming whitespace. */
export function notEmpty(options: ValidationOptions<string> = {}): Stage<string> {
  return stringCheck(
    'NotEmpty',
    options,
    (value) => value.trim().length > 0,
    () => 'Value is empty'
  );
}

// ============================================================================
// Arbitrary predicates
// ============================================================================

/**
 * Validate with any predicate.
 *
 * @example
 * ```typescript
 * PipelineValue.of(7).pipe(satisfies((n: number) => n % 2 === 1, 'Odd'));
 * ```
 */
export function satisfies<T>(
  predicate: (value: T) => boolean,
  operation = 'Validate',
  options: ValidationOptions<T> = {}
): Stage<T> {
  const config = createValidationConfig(options);
  return (input) => runValidation(input, operation, config, predicate, () => 'Validation failed');
}
