/**
 * Transformation Configuration Schema
 */

import { z } from 'zod';
import { LocaleSchema, RoundingModeSchema, parseConfig } from './common.js';

export const TransformationConfigSchema = z.object({
  roundingMode: RoundingModeSchema.default('toEven'),
  locale: LocaleSchema,
  trimWhitespace: z.boolean().default(true),
  /** Characters removed by trim instead of whitespace */
  trimChars: z.string().min(1).optional(),
});

interface TransformationCallbacks<T> {
  /** Replaces the built-in worker of same-type transformations */
  customTransform?: (value: T) => T;
}

export type TransformationConfig<T = unknown> = z.output<typeof TransformationConfigSchema> &
  TransformationCallbacks<T>;
export type TransformationOptions<T = unknown> = z.input<typeof TransformationConfigSchema> &
  TransformationCallbacks<T>;

export function createTransformationConfig<T>(
  options: TransformationOptions<T> = {}
): TransformationConfig<T> {
  const { customTransform, ...rest } = options;
  return Object.freeze({
    ...parseConfig(TransformationConfigSchema, 'transformation config', rest),
    customTransform,
  });
}
