/**
 * String Similarity Algorithms
 *
 * Provides the three interchangeable scorers used by fuzzy stages:
 * - Levenshtein (edit distance normalized by the longer length)
 * - Jaro (matching characters within a window, penalized by transpositions)
 * - Jaro-Winkler (Jaro boosted by a shared prefix)
 *
 * All scorers return a value in [0, 1], 1 meaning identical.
 *
 * @module fuzzy/similarity
 */

import type { FuzzyAlgorithm } from '../schemas/fuzzy-config.js';

// ============================================================================
// Constants
// ============================================================================

/** Longest shared prefix rewarded by Jaro-Winkler */
export const JARO_WINKLER_PREFIX_LENGTH = 4;

/** Boost applied per shared prefix character */
export const JARO_WINKLER_SCALING_FACTOR = 0.1;

/** Jaro score below which no prefix boost is applied */
export const JARO_WINKLER_BOOST_THRESHOLD = 0.7;

// ============================================================================
// Levenshtein
// ============================================================================

/**
 * Minimum number of single-character insertions, deletions and
 * substitutions that turn `a` into `b`.
 *
 * @example
 * ```typescript
 * levenshteinDistance('kitten', 'sitting'); // 3
 * ```
 */
export function levenshteinDistance(a: string, b: string): number {
  if (a === b) return 0;
  if (a.length === 0) return b.length;
  if (b.length === 0) return a.length;

  // Two rolling rows of the DP matrix
  let previous = Array.from({ length: b.length + 1 }, (_, j) => j);
  let current = new Array<number>(b.length + 1).fill(0);

  for (let i = 1; i <= a.length; i++) {
    current[0] = i;
    for (let j = 1; j <= b.length; j++) {
      const cost = a[i - 1] === b[j - 1] ? 0 : 1;
      current[j] = Math.min(previous[j] + 1, current[j - 1] + 1, previous[j - 1] + cost);
    }
    [previous, current] = [current, previous];
  }

  return previous[b.length];
}

/**
 * `1 - distance / max(len)`.
 *
 * @example
 * ```typescript
 * levenshteinSimilarity('test', 'best'); // 0.75
 * ```
 */
export function levenshteinSimilarity(a: string, b: string): number {
  if (a === b) return 1;
  if (a.length === 0 || b.length === 0) return 0;
  return 1 - levenshteinDistance(a, b) / Math.max(a.length, b.length);
}

// ============================================================================
// Jaro / Jaro-Winkler
// ============================================================================

/**
 * Jaro similarity. Characters match when equal and no further apart than
 * `floor(max(len) / 2) - 1`; half the out-of-order matches count as
 * transpositions.
 */
export function jaroSimilarity(a: string, b: string): number {
  if (a === b) return 1;
  if (a.length === 0 || b.length === 0) return 0;

  const window = Math.max(0, Math.floor(Math.max(a.length, b.length) / 2) - 1);
  const aMatched = new Array<boolean>(a.length).fill(false);
  const bMatched = new Array<boolean>(b.length).fill(false);
  let matches = 0;

  for (let i = 0; i < a.length; i++) {
    const start = Math.max(0, i - window);
    const end = Math.min(i + window + 1, b.length);
    for (let j = start; j < end; j++) {
      if (!bMatched[j] && a[i] === b[j]) {
        aMatched[i] = true;
        bMatched[j] = true;
        matches++;
        break;
      }
    }
  }

  if (matches === 0) return 0;

  let outOfOrder = 0;
  let k = 0;
  for (let i = 0; i < a.length; i++) {
    if (!aMatched[i]) continue;
    while (!bMatched[k]) k++;
    if (a[i] !== b[k]) outOfOrder++;
    k++;
  }

  const transpositions = outOfOrder / 2;
  return (matches / a.length + matches / b.length + (matches - transpositions) / matches) / 3;
}

/**
 * Jaro-Winkler similarity. Applies the prefix boost only when the Jaro score
 * reaches 0.7.
 *
 * @example
 * ```typescript
 * jaroWinklerSimilarity('john smith', 'jon smith'); // ~0.973
 * ```
 */
export function jaroWinklerSimilarity(
  a: string,
  b: string,
  prefixLength = JARO_WINKLER_PREFIX_LENGTH,
  scalingFactor = JARO_WINKLER_SCALING_FACTOR
): number {
  const jaro = jaroSimilarity(a, b);
  if (jaro < JARO_WINKLER_BOOST_THRESHOLD) {
    return jaro;
  }

  const limit = Math.min(prefixLength, a.length, b.length);
  let prefix = 0;
  while (prefix < limit && a[prefix] === b[prefix]) {
    prefix++;
  }

  return jaro + scalingFactor * prefix * (1 - jaro);
}

// ============================================================================
// Dispatch
// ============================================================================

/**
 * Score two possibly absent strings with the selected algorithm.
 *
 * Both absent or both empty score 1; exactly one absent or empty scores 0.
 */
export function calculateSimilarity(
  a: string | null | undefined,
  b: string | null | undefined,
  algorithm: FuzzyAlgorithm
): number {
  if (a == null && b == null) return 1;
  if (a == null || b == null) return 0;
  if (a === b) return 1;
  if (a.length === 0 || b.length === 0) return 0;

  switch (algorithm) {
    case 'levenshtein':
      return levenshteinSimilarity(a, b);
    case 'jaro':
      return jaroSimilarity(a, b);
    case 'jaroWinkler':
      return jaroWinklerSimilarity(a, b);
  }
}
