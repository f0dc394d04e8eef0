import { describe, it, expect } from '@jest/globals';
import { CrossValidationResult } from './cross-validation-result.js';

describe('CrossValidationResult', () => {
  it('is valid when every field reaches the threshold', () => {
    const result = new CrossValidationResult({ name: 0.9, address: 0.85, phone: 0.95 }, 0.8);
    expect(result.isValid).toBe(true);
  });

  it('is invalid when any field falls short', () => {
    const result = new CrossValidationResult({ name: 0.9, address: 0.5 }, 0.8);
    expect(result.isValid).toBe(false);
    expect(result.getFieldMatch('name')).toBe(true);
    expect(result.getFieldMatch('address')).toBe(false);
  });

  it('treats a score equal to the threshold as a match', () => {
    expect(new CrossValidationResult({ name: 0.8 }, 0.8).isValid).toBe(true);
  });

  it('is invalid and empty without scores', () => {
    const result = new CrossValidationResult({}, 0.8);
    expect(result.isValid).toBe(false);
    expect(result.minSimilarity).toBe(0);
    expect(result.maxSimilarity).toBe(0);
    expect(result.averageSimilarity).toBe(0);
    expect(result.bestMatchingField).toBeNull();
    expect(result.worstMatchingField).toBeNull();
  });

  it('computes statistics', () => {
    const result = new CrossValidationResult({ name: 0.5, address: 1, phone: 0.75 }, 0.8);
    expect(result.minSimilarity).toBe(0.5);
    expect(result.maxSimilarity).toBe(1);
    expect(result.averageSimilarity).toBe(0.75);
    expect(result.bestMatchingField).toBe('address');
    expect(result.worstMatchingField).toBe('name');
  });

  it('returns defaults for unknown fields', () => {
    const result = new CrossValidationResult({ name: 0.9 }, 0.8);
    expect(result.getFieldScore('name')).toBe(0.9);
    expect(result.getFieldScore('missing')).toBe(0);
    expect(result.getFieldMatch('missing')).toBe(false);
  });

  it('ignores names inherited from Object.prototype', () => {
    const result = new CrossValidationResult({ name: 0.9 }, 0.8);
    expect(result.getFieldScore('constructor')).toBe(0);
    expect(result.getFieldMatch('toString')).toBe(false);
  });

  it('keeps a field named __proto__', () => {
    const result = new CrossValidationResult(Object.fromEntries([['__proto__', 0.9]]), 0.8);
    expect(result.getFieldScore('__proto__')).toBe(0.9);
    expect(result.getFieldMatch('__proto__')).toBe(true);
    expect(result.bestMatchingField).toBe('__proto__');
  });
});
