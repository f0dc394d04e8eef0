/**
 * Tests for the similarity algorithms
 */

import { describe, it, expect } from '@jest/globals';
import {
  levenshteinDistance,
  levenshteinSimilarity,
  jaroSimilarity,
  jaroWinklerSimilarity,
  calculateSimilarity,
} from './similarity.js';

// ============================================================================
// Levenshtein
// ============================================================================

describe('levenshteinDistance', () => {
  it('counts edits between kitten and sitting', () => {
    expect(levenshteinDistance('kitten', 'sitting')).toBe(3);
  });

  it('is zero for identical strings', () => {
    expect(levenshteinDistance('same', 'same')).toBe(0);
  });

  it('equals the other length when one side is empty', () => {
    expect(levenshteinDistance('', 'abc')).toBe(3);
    expect(levenshteinDistance('abcd', '')).toBe(4);
  });

  it('is symmetric', () => {
    expect(levenshteinDistance('flaw', 'lawn')).toBe(levenshteinDistance('lawn', 'flaw'));
    expect(levenshteinDistance('flaw', 'lawn')).toBe(2);
  });
});

describe('levenshteinSimilarity', () => {
  it('normalizes by the longer length', () => {
    expect(levenshteinSimilarity('test', 'best')).toBe(0.75);
    expect(levenshteinSimilarity('kitten', 'sitting')).toBeCloseTo(4 / 7, 10);
  });

  it('scores identical strings 1 and an empty side 0', () => {
    expect(levenshteinSimilarity('abc', 'abc')).toBe(1);
    expect(levenshteinSimilarity('abc', '')).toBe(0);
  });
});

// ============================================================================
// Jaro / Jaro-Winkler
// ============================================================================

describe('jaroSimilarity', () => {
  it('accounts for transpositions', () => {
    expect(jaroSimilarity('MARTHA', 'MARHTA')).toBeCloseTo(0.944444, 5);
  });

  it('is zero without matching characters', () => {
    expect(jaroSimilarity('abc', 'xyz')).toBe(0);
  });

  it('is one for identical strings', () => {
    expect(jaroSimilarity('pipeline', 'pipeline')).toBe(1);
  });
});

describe('jaroWinklerSimilarity', () => {
  it('boosts a shared prefix', () => {
    expect(jaroWinklerSimilarity('MARTHA', 'MARHTA')).toBeCloseTo(0.961111, 5);
    expect(jaroWinklerSimilarity('john smith', 'jon smith')).toBeCloseTo(0.973333, 5);
  });

  it('applies no boost below a Jaro score of 0.7', () => {
    expect(jaroSimilarity('abcd', 'abxy')).toBeCloseTo(2 / 3, 10);
    expect(jaroWinklerSimilarity('abcd', 'abxy')).toBe(jaroSimilarity('abcd', 'abxy'));
  });

  it('never exceeds 1', () => {
    expect(jaroWinklerSimilarity('abcdef', 'abcdeg')).toBeLessThanOrEqual(1);
  });
});

// ============================================================================
// Dispatch
// ============================================================================

describe('calculateSimilarity', () => {
  it('dispatches on the algorithm', () => {
    expect(calculateSimilarity('test', 'best', 'levenshtein')).toBe(0.75);
    expect(calculateSimilarity('MARTHA', 'MARHTA', 'jaro')).toBeCloseTo(0.944444, 5);
    expect(calculateSimilarity('MARTHA', 'MARHTA', 'jaroWinkler')).toBeCloseTo(0.961111, 5);
  });

  it('applies the absent and empty rules', () => {
    expect(calculateSimilarity(null, null, 'jaro')).toBe(1);
    expect(calculateSimilarity(null, 'a', 'jaro')).toBe(0);
    expect(calculateSimilarity('a', undefined, 'jaro')).toBe(0);
    expect(calculateSimilarity('', '', 'levenshtein')).toBe(1);
    expect(calculateSimilarity('', 'a', 'levenshtein')).toBe(0);
  });

  it('is case-sensitive on its own', () => {
    expect(calculateSimilarity('ABC', 'abc', 'levenshtein')).toBe(0);
  });
});
