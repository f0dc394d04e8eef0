/**
 * Option value parsers for commander.
 *
 * Each throws InvalidArgumentError so commander reports a usage error.
 *
 * @module cli/parsers
 */

import { InvalidArgumentError } from 'commander';
import { LocaleSchema } from '../schemas/common.js';

export function parseLocale(value: string): string {
  const result = LocaleSchema.safeParse(value);
  if (!result.success) {
    throw new InvalidArgumentError(`'${value}' is not a valid BCP 47 language tag.`);
  }
  return result.data;
}

/** Similarity threshold in [0, 1]. */
export function parseThreshold(value: string): number {
  const threshold = Number(value);
  if (value.trim() === '' || !Number.isFinite(threshold) || threshold < 0 || threshold > 1) {
    throw new InvalidArgumentError('Expected a number between 0 and 1.');
  }
  return threshold;
}

export function parseNonNegativeInt(value: string): number {
  if (!/^\d+$/.test(value)) {
    throw new InvalidArgumentError('Expected a non-negative integer.');
  }
  return Number(value);
}

/** Accumulate a repeatable option into an array. */
export function collect(value: string, previous: string[] = []): string[] {
  return [...previous, value];
}
