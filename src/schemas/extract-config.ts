/**
 * Extraction Configuration Schema
 *
 * Pattern selection, date formats, number style and fuzzy fallback for the
 * extraction stages.
 */

import { z } from 'zod';
import { LocaleSchema, NumberStyleSchema, parseConfig } from './common.js';
import { FuzzyMatchingConfigSchema } from './fuzzy-config.js';

// ============================================================================
// Semantic types and default patterns
// ============================================================================

export const SemanticTypeSchema = z.enum(['Date', 'Int', 'Double', 'Decimal', 'Bool', 'Guid']);

export type SemanticType = z.infer<typeof SemanticTypeSchema>;

/**
 * Pattern used for each semantic type when `useDefaultRegex` is set and no
 * explicit `regexPattern` is given. Read-only for the life of the process.
 */
export const DEFAULT_PATTERNS: Readonly<Record<SemanticType, string>> = Object.freeze({
  Date: String.raw`\d{4}-\d{2}-\d{2}(?:[T ]\d{2}:\d{2}(?::\d{2})?)?|\d{1,2}[/.-]\d{1,2}[/.-]\d{2,4}`,
  Int: String.raw`[-+]?\d+`,
  Double: String.raw`[-+]?\d+(?:[.,]\d+)?(?:[eE][-+]?\d+)?`,
  Decimal: String.raw`[-+]?\d+(?:[.,]\d+)?`,
  Bool: 'true|True|TRUE|false|False|FALSE',
  Guid: String.raw`[0-9a-fA-F]{8}-[0-9a-fA-F]{4}-[0-9a-fA-F]{4}-[0-9a-fA-F]{4}-[0-9a-fA-F]{12}`,
});

// ============================================================================
// Fuzzy extraction mode
// ============================================================================

/**
 * - none: strict extraction only
 * - fallback: strict first, then best-scoring candidate on failure
 * - primary: best-scoring candidate directly
 */
export const FuzzyExtractionModeSchema = z.enum(['none', 'fallback', 'primary']);

export type FuzzyExtractionMode = z.infer<typeof FuzzyExtractionModeSchema>;

// ============================================================================
// ExtractConfig
// ============================================================================

function compiles(pattern: string, flags: string): string | undefined {
  try {
    new RegExp(pattern, flags);
    return undefined;
  } catch (error) {
    return error instanceof Error ? error.message : String(error);
  }
}

export const ExtractConfigSchema = z
  .object({
    regexPattern: z.string().min(1).optional(),
    /** RegExp flags other than "g" (the engine manages global scanning) */
    regexFlags: z
      .string()
      .regex(/^(?!.*(.).*\1)[dimsuy]*$/, 'Flags must be distinct and among d, i, m, s, u, y')
      .default(''),
    groupIndex: z.number().int().nonnegative().default(0),
    locale: LocaleSchema,
    /** date-fns pattern tried first, e.g. "dd/MM/yyyy" */
    dateTimeFormat: z.string().min(1).optional(),
    /** date-fns patterns tried in order after `dateTimeFormat` */
    dateTimeFormats: z.array(z.string().min(1)).optional(),
    numberStyle: NumberStyleSchema.default('any'),
    throwOnFailure: z.boolean().default(false),
    useDefaultRegex: z.boolean().default(false),
    fuzzyExtractionMode: FuzzyExtractionModeSchema.default('none'),
    fuzzyMatching: FuzzyMatchingConfigSchema.optional(),
  })
  .superRefine((value, ctx) => {
    if (value.regexPattern === undefined) {
      return;
    }
    const problem = compiles(value.regexPattern, value.regexFlags);
    if (problem !== undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['regexPattern'],
        message: `Malformed regular expression '${value.regexPattern}': ${problem}`,
      });
    }
  });

export type ExtractConfig = z.output<typeof ExtractConfigSchema>;
export type ExtractOptions = z.input<typeof ExtractConfigSchema>;

/**
 * @throws ConfigurationError for malformed patterns or out-of-range values
 */
export function createExtractConfig(options: ExtractOptions = {}): ExtractConfig {
  return Object.freeze(parseConfig(ExtractConfigSchema, 'extract config', options));
}
