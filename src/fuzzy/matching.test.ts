/**
 * Tests for the fuzzy matching stages
 */

import { describe, it, expect } from '@jest/globals';
import { PipelineValue } from '../core/pipeline-value.js';
import { ConfigurationError } from '../core/errors.js';
import { createFuzzyMatchingConfig } from '../schemas/fuzzy-config.js';
import {
  scoreWithConfig,
  fuzzyMatch,
  compareWith,
  fuzzyContains,
  correctTypos,
  fuzzyMatchMany,
  fuzzyMatchManyBatch,
  crossValidate,
  crossValidateMany,
  normalizeAddressStage,
  normalizePhoneStage,
  normalizeNameStage,
} from './matching.js';

// ============================================================================
// Helpers
// ============================================================================

function failed(): PipelineValue<string> {
  return PipelineValue.fromError<string>('ExtractString', 'Source string is null or empty');
}

// ============================================================================
// scoreWithConfig
// ============================================================================

describe('scoreWithConfig', () => {
  it('folds case unless case-sensitive', () => {
    expect(scoreWithConfig('ABC', 'abc', createFuzzyMatchingConfig())).toBe(1);
    expect(
      scoreWithConfig(
        'ABC',
        'abc',
        createFuzzyMatchingConfig({ caseSensitive: true, algorithm: 'levenshtein' })
      )
    ).toBe(0);
  });

  it('lets a custom function replace the algorithm', () => {
    const config = createFuzzyMatchingConfig({ customSimilarityFunction: () => 0.42 });
    expect(scoreWithConfig('a', 'a', config)).toBe(0.42);
  });
});

// ============================================================================
// fuzzyMatch
// ============================================================================

describe('fuzzyMatch', () => {
  it('passes a close match', () => {
    const result = PipelineValue.of('Jon Smith').pipe(fuzzyMatch('John Smith'));
    expect(result.isValid).toBe(true);
    expect(result.value).toBe('Jon Smith');
    expect(result.errors).toEqual([]);
  });

  it('fails a distant match with the computed score', () => {
    const result = PipelineValue.of('Chicago').pipe(fuzzyMatch('Boston'));
    expect(result.isValid).toBe(false);
    expect(result.value).toBe('Chicago');
    expect(result.errors[0].operation).toBe('FuzzyMatch');
    expect(result.errors[0].message).toBe('Fuzzy match failed: similarity 0.44 below threshold 0.80');
  });

  it('uses the configured error message', () => {
    const result = PipelineValue.of('Chicago').pipe(
      fuzzyMatch('Boston', { errorMessage: 'Cities differ' })
    );
    expect(result.errors[0].message).toBe('Cities differ');
  });

  it('checks the maximum edit distance for levenshtein', () => {
    const result = PipelineValue.of('kitten').pipe(
      fuzzyMatch('sitting', { algorithm: 'levenshtein', maxEditDistance: 1, similarityThreshold: 0 })
    );
    expect(result.isValid).toBe(false);
    expect(result.errors[0].message).toBe('Fuzzy match failed: edit distance 3 exceeds maximum 1');
  });

  it('treats a score equal to the threshold as a match', () => {
    const result = PipelineValue.of('test').pipe(
      fuzzyMatch('best', { algorithm: 'levenshtein', similarityThreshold: 0.75 })
    );
    expect(result.isValid).toBe(true);
  });

  it('fails one ulp below the threshold', () => {
    const atThreshold = PipelineValue.of('a').pipe(
      fuzzyMatch('b', { customSimilarityFunction: () => 0.75, similarityThreshold: 0.75 })
    );
    const justBelow = PipelineValue.of('a').pipe(
      fuzzyMatch('b', {
        customSimilarityFunction: () => 0.75 - Number.EPSILON / 2,
        similarityThreshold: 0.75,
      })
    );
    expect(atThreshold.isValid).toBe(true);
    expect(justBelow.isValid).toBe(false);
    expect(justBelow.errors[0].message).toBe(
      'Fuzzy match failed: similarity 0.75 below threshold 0.75'
    );
  });

  it('honours case sensitivity', () => {
    const options = { algorithm: 'levenshtein' as const, similarityThreshold: 1 };
    expect(PipelineValue.of('abc').pipe(fuzzyMatch('ABC', options)).isValid).toBe(true);
    expect(
      PipelineValue.of('abc').pipe(fuzzyMatch('ABC', { ...options, caseSensitive: true })).isValid
    ).toBe(false);
  });

  it('normalizes phone numbers before scoring', () => {
    const result = PipelineValue.of('555.123.4567').pipe(
      fuzzyMatch('+1 (555) 123-4567', { normalizePhone: true, similarityThreshold: 1 })
    );
    expect(result.isValid).toBe(true);
  });

  it('records a throwing custom function', () => {
    const result = PipelineValue.of('a').pipe(
      fuzzyMatch('b', {
        customSimilarityFunction: () => {
          throw new Error('boom');
        },
      })
    );
    expect(result.isValid).toBe(false);
    expect(result.errors[0].message).toBe('Fuzzy matching error: boom');
  });

  it('forwards an invalid value untouched', () => {
    const input = failed();
    expect(input.pipe(fuzzyMatch('x'))).toBe(input);
  });
});

// ============================================================================
// compareWith
// ============================================================================

describe('compareWith', () => {
  it('passes when both values are similar', () => {
    const other = PipelineValue.of('John Smith');
    expect(PipelineValue.of('Jon Smith').pipe(compareWith(other)).isValid).toBe(true);
  });

  it('fails under the CompareWith operation', () => {
    const other = PipelineValue.of('Boston');
    const result = PipelineValue.of('Chicago').pipe(compareWith(other));
    expect(result.errors[0].operation).toBe('CompareWith');
    expect(result.errors[0].message).toBe('Fuzzy match failed: similarity 0.44 below threshold 0.80');
  });

  it('carries over the errors of an invalid other value', () => {
    const other = failed();
    const result = PipelineValue.of('Chicago').pipe(compareWith(other));
    expect(result.isValid).toBe(false);
    expect(result.value).toBe('Chicago');
    expect(result.errors).toEqual(other.errors);
  });

  it('fails when the other value is absent', () => {
    const result = PipelineValue.of('Chicago').pipe(compareWith(PipelineValue.create<string>(null)));
    expect(result.errors[0].message).toBe('No value to compare with');
  });
});

// ============================================================================
// fuzzyContains
// ============================================================================

describe('fuzzyContains', () => {
  it('finds an exact window regardless of case', () => {
    const result = PipelineValue.of('Order number ABC123 shipped').pipe(fuzzyContains('abc123'));
    expect(result.isValid).toBe(true);
  });

  it('reports the best window score', () => {
    const result = PipelineValue.of('hello world').pipe(fuzzyContains('xyz'));
    expect(result.isValid).toBe(false);
    expect(result.errors[0].message).toBe(
      'Fuzzy contains failed: best similarity 0.00 below threshold 0.80'
    );
  });

  it('compares whole strings when the substring is longer', () => {
    const result = PipelineValue.of('abc').pipe(
      fuzzyContains('abcd', { algorithm: 'levenshtein', similarityThreshold: 0.7 })
    );
    expect(result.isValid).toBe(true);
  });

  it('fails on empty input', () => {
    const result = PipelineValue.of('').pipe(fuzzyContains('abc'));
    expect(result.errors[0].message).toBe(
      'Fuzzy contains failed: input or substring is null or empty'
    );
  });
});

// ============================================================================
// correctTypos
// ============================================================================

describe('correctTypos', () => {
  it('replaces the value with the closest candidate', () => {
    const result = PipelineValue.of('Chicgo').pipe(correctTypos(['Chicago', 'Boston']));
    expect(result.isValid).toBe(true);
    expect(result.value).toBe('Chicago');
  });

  it('fails and keeps the value below the threshold', () => {
    const result = PipelineValue.of('Chicago').pipe(correctTypos(['Boston']));
    expect(result.isValid).toBe(false);
    expect(result.value).toBe('Chicago');
    expect(result.errors[0].message).toBe(
      'No correction found: best similarity 0.44 below threshold 0.80'
    );
  });

  it('substitutes the best candidate as invalid with returnBestMatch', () => {
    const result = PipelineValue.of('Chicago').pipe(
      correctTypos(['Boston'], { returnBestMatch: true })
    );
    expect(result.isValid).toBe(false);
    expect(result.value).toBe('Boston');
  });

  it('leaves an empty value alone', () => {
    const input = PipelineValue.of('');
    expect(input.pipe(correctTypos(['Chicago']))).toBe(input);
  });
});

// ============================================================================
// fuzzyMatchMany / fuzzyMatchManyBatch
// ============================================================================

describe('fuzzyMatchMany', () => {
  it('returns the best candidate with its score', () => {
    const result = PipelineValue.of('Chicgo').pipe(fuzzyMatchMany(['Chicago', 'Boston']));
    expect(result.isValid).toBe(true);
    expect(result.value?.match).toBe('Chicago');
    expect(result.value?.score).toBeCloseTo(0.971429, 5);
  });

  it('fails with no winner below the threshold', () => {
    const result = PipelineValue.of('Chicago').pipe(fuzzyMatchMany(['Boston']));
    expect(result.isValid).toBe(false);
    expect(result.value).toBeNull();
    expect(result.errors[0].message).toBe('No match found: best similarity 0.44 below threshold 0.80');
  });

  it('keeps the best candidate as invalid with returnBestMatch', () => {
    const result = PipelineValue.of('Chicago').pipe(
      fuzzyMatchMany(['Boston'], { returnBestMatch: true })
    );
    expect(result.isValid).toBe(false);
    expect(result.value?.match).toBe('Boston');
    expect(result.value?.score).toBeCloseTo(0.436508, 5);
  });

  it('fails without candidates', () => {
    const result = PipelineValue.of('Chicago').pipe(fuzzyMatchMany([]));
    expect(result.errors[0].message).toBe('Input value or candidates are null or empty');
  });

  it('forwards the errors of an invalid value', () => {
    const input = failed();
    const result = input.pipe(fuzzyMatchMany(['a']));
    expect(result.value).toBeNull();
    expect(result.errors).toEqual(input.errors);
  });
});

describe('fuzzyMatchManyBatch', () => {
  it('matches every item and reports misses', () => {
    const result = PipelineValue.of(['Chicgo', 'Xyz']).pipe(
      fuzzyMatchManyBatch(['Chicago', 'Boston'])
    );
    expect(result.isValid).toBe(true);
    expect(result.value).toHaveLength(2);
    expect(result.value?.[0].input).toBe('Chicgo');
    expect(result.value?.[0].match).toBe('Chicago');
    expect(result.value?.[1]).toEqual({ input: 'Xyz', match: null, score: 0 });
  });
});

// ============================================================================
// crossValidate / crossValidateMany
// ============================================================================

describe('crossValidate', () => {
  const reference = { primary: 'best', secondary: 'test', empty: null };
  const options = { algorithm: 'levenshtein' as const };

  it('scores each mapped field', () => {
    const result = PipelineValue.of('test').pipe(
      crossValidate(reference, { secondary: 'exact' }, options)
    );
    expect(result.isValid).toBe(true);
    expect(result.value?.getFieldScore('exact')).toBe(1);
  });

  it('fails naming the worst field', () => {
    const result = PipelineValue.of('test').pipe(
      crossValidate(reference, { primary: 'a', secondary: 'b' }, options)
    );
    expect(result.isValid).toBe(false);
    expect(result.value?.getFieldScore('a')).toBe(0.75);
    expect(result.value?.worstMatchingField).toBe('a');
    expect(result.errors[0].message).toBe(
      'Cross-validation failed: a similarity 0.75 below threshold 0.80'
    );
  });

  it('matches property names case-insensitively', () => {
    const result = PipelineValue.of('test').pipe(
      crossValidate(reference, { PRIMARY: 'a' }, { ...options, similarityThreshold: 0.7 })
    );
    expect(result.isValid).toBe(true);
    expect(result.value?.getFieldScore('a')).toBe(0.75);
  });

  it('scores missing and null properties 0', () => {
    const result = PipelineValue.of('test').pipe(
      crossValidate(reference, { nope: 'missing', empty: 'blank' }, options)
    );
    expect(result.value?.fieldScores).toEqual({ missing: 0, blank: 0 });
  });

  it('keeps a target field named __proto__', () => {
    const result = PipelineValue.of('test').pipe(
      crossValidate(reference, { secondary: '__proto__' }, options)
    );
    expect(result.isValid).toBe(true);
    expect(result.value?.getFieldScore('__proto__')).toBe(1);
  });

  it('rejects empty field mappings', () => {
    expect(() => crossValidate(reference, {})).toThrow(ConfigurationError);
  });
});

describe('crossValidateMany', () => {
  it('is valid only when every item is', () => {
    const result = PipelineValue.of(['test', 'best']).pipe(
      crossValidateMany({ word: 'test' }, { word: 'w' }, { algorithm: 'levenshtein' })
    );
    expect(result.isValid).toBe(false);
    expect(result.value).toHaveLength(2);
    expect(result.value?.[0].getFieldScore('w')).toBe(1);
    expect(result.value?.[1].isValid).toBe(false);
    expect(result.value?.[1].fieldScores).toEqual({});
    expect(result.errors[0].message).toBe('Cross-validation failed for 1 of 2 values');
  });
});

// ============================================================================
// Normalization stages
// ============================================================================

describe('normalization stages', () => {
  it('normalize the value', () => {
    expect(PipelineValue.of('123 Main St.').pipe(normalizeAddressStage()).value).toBe(
      '123 main street'
    );
    expect(PipelineValue.of('+1 (555) 123-4567').pipe(normalizePhoneStage()).value).toBe(
      '5551234567'
    );
    expect(
      PipelineValue.of('Dr. Jane Doe').pipe(normalizeNameStage({ removeTitles: true })).value
    ).toBe('jane doe');
  });

  it('forward an invalid value', () => {
    const input = failed();
    expect(input.pipe(normalizeAddressStage())).toBe(input);
  });
});
