/**
 * Fuzzy Matching Configuration Schema
 *
 * Controls similarity scoring for fuzzy stages and fuzzy extraction.
 */

import { z } from 'zod';
import { parseConfig } from './common.js';

/**
 * Similarity algorithm
 * - levenshtein: edit distance normalized to 1 - d / max(len)
 * - jaro: matching characters within a window, penalized by transpositions
 * - jaroWinkler: Jaro with a common-prefix boost
 */
export const FuzzyAlgorithmSchema = z.enum(['levenshtein', 'jaro', 'jaroWinkler']);

export type FuzzyAlgorithm = z.infer<typeof FuzzyAlgorithmSchema>;

/** Score two strings in [0, 1], 1 meaning identical. */
export type SimilarityFunction = (a: string, b: string) => number;

export const FuzzyMatchingConfigSchema = z.object({
  algorithm: FuzzyAlgorithmSchema.default('jaroWinkler'),
  similarityThreshold: z.number().min(0).max(1).default(0.8),
  caseSensitive: z.boolean().default(false),
  /** Upper bound on raw edit distance, checked only for levenshtein */
  maxEditDistance: z.number().int().nonnegative().optional(),
  normalizeAddress: z.boolean().default(false),
  normalizePhone: z.boolean().default(false),
  normalizeName: z.boolean().default(false),
  /** Replaces the selected algorithm; its score still faces the threshold */
  customSimilarityFunction: z
    .custom<SimilarityFunction>((value) => typeof value === 'function', {
      message: 'Expected a function',
    })
    .optional(),
  errorMessage: z.string().min(1).optional(),
  /** Return the best candidate even below threshold (marked invalid) */
  returnBestMatch: z.boolean().default(false),
});

export type FuzzyMatchingConfig = z.output<typeof FuzzyMatchingConfigSchema>;
export type FuzzyMatchingOptions = z.input<typeof FuzzyMatchingConfigSchema>;

export function createFuzzyMatchingConfig(options: FuzzyMatchingOptions = {}): FuzzyMatchingConfig {
  return Object.freeze(parseConfig(FuzzyMatchingConfigSchema, 'fuzzy matching config', options));
}

export const DEFAULT_FUZZY_MATCHING_CONFIG: FuzzyMatchingConfig = createFuzzyMatchingConfig();
