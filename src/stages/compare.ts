/**
 * Ordering and string comparison policy shared by validation and fuzzy stages.
 *
 * @module stages/compare
 */

import type { ValidationConfig } from '../schemas/validation-config.js';

/** Types the range and ordering validations accept */
export type Comparable = number | bigint | string | Date;

/**
 * Widens a literal bound type so that `greaterThan(5)` yields a
 * `Stage<number>` rather than `Stage<5>`.
 */
export type Widen<B> = B extends Date
  ? Date
  : B extends string
    ? string
    : B extends bigint
      ? bigint
      : B extends number
        ? number
        : never;

export type StringPolicy = Pick<ValidationConfig, 'caseSensitive' | 'stringComparison' | 'locale'>;

/** True when the policy compares without regard to case. */
export function ignoresCase(policy: StringPolicy): boolean {
  return (
    !policy.caseSensitive ||
    policy.stringComparison === 'ordinalIgnoreCase' ||
    policy.stringComparison === 'localeIgnoreCase'
  );
}

function usesLocale(policy: StringPolicy): boolean {
  return policy.stringComparison === 'locale' || policy.stringComparison === 'localeIgnoreCase';
}

/**
 * Fold a string the way the policy compares it, for substring searches.
 */
export function foldForPolicy(text: string, policy: StringPolicy): string {
  if (!ignoresCase(policy)) {
    return text;
  }
  return usesLocale(policy) ? text.toLocaleUpperCase(policy.locale) : text.toUpperCase();
}

/**
 * Negative, zero or positive as `a` sorts before, equal to or after `b`.
 */
export function compareStrings(a: string, b: string, policy: StringPolicy): number {
  if (usesLocale(policy)) {
    const collator = new Intl.Collator(policy.locale, {
      sensitivity: ignoresCase(policy) ? 'accent' : 'variant',
    });
    return Math.sign(collator.compare(a, b));
  }
  const x = foldForPolicy(a, policy);
  const y = foldForPolicy(b, policy);
  return x < y ? -1 : x > y ? 1 : 0;
}

export function describeValue(value: unknown): string {
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? 'Invalid Date' : value.toISOString();
  }
  if (typeof value === 'string') {
    return `'${value}'`;
  }
  return String(value);
}

/**
 * Order two comparable values of the same kind.
 *
 * @throws TypeError for mismatched kinds, NaN or invalid dates
 */
export function compareValues(a: Comparable, b: Comparable, policy: StringPolicy): number {
  if (a instanceof Date && b instanceof Date) {
    const diff = a.getTime() - b.getTime();
    if (Number.isNaN(diff)) {
      throw new TypeError('Cannot compare an invalid date');
    }
    return Math.sign(diff);
  }
  if (typeof a === 'string' && typeof b === 'string') {
    return compareStrings(a, b, policy);
  }
  if (
    (typeof a === 'number' || typeof a === 'bigint') &&
    (typeof b === 'number' || typeof b === 'bigint')
  ) {
    if ((typeof a === 'number' && Number.isNaN(a)) || (typeof b === 'number' && Number.isNaN(b))) {
      throw new TypeError('Cannot compare NaN');
    }
    return a < b ? -1 : a > b ? 1 : 0;
  }
  throw new TypeError(`Cannot compare ${describeValue(a)} with ${describeValue(b)}`);
}
