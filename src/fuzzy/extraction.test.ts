/**
 * Tests for fuzzy extraction candidate scoring
 */

import { describe, it, expect } from '@jest/globals';
import { extractionScore, collectCandidates, findBestCandidate } from './extraction.js';

function digitsOnly(text: string): number {
  if (!/^\d+$/.test(text)) {
    throw new Error(`not a number: ${text}`);
  }
  return Number(text);
}

describe('extractionScore', () => {
  it('weighs length and clean characters', () => {
    expect(extractionScore('2024-12-10')).toBeCloseTo(0.8, 10);
    expect(extractionScore('abc$')).toBeCloseTo(0.53, 10);
  });

  it('caps the length contribution at 20 characters', () => {
    expect(extractionScore('a'.repeat(40))).toBe(1);
  });

  it('scores an empty candidate 0', () => {
    expect(extractionScore('')).toBe(0);
  });
});

describe('collectCandidates', () => {
  it('collects every pattern match', () => {
    expect(collectCandidates('On 2024-12-10 or 2025-01-05.', /\d{4}-\d{2}-\d{2}/)).toEqual([
      '2024-12-10',
      '2025-01-05',
    ]);
  });

  it('collects the requested group', () => {
    expect(collectCandidates('id=4 id=17', /id=(\d+)/, 1)).toEqual(['4', '17']);
  });

  it('falls back to trimmed whitespace tokens', () => {
    expect(collectCandidates('  Due (2024-12-10), ok!', undefined)).toEqual([
      'Due',
      '2024-12-10',
      'ok',
    ]);
  });
});

describe('findBestCandidate', () => {
  it('picks the best-scoring candidate that parses', () => {
    expect(findBestCandidate(['abc', '12', '12345'], digitsOnly)).toEqual({
      text: '12345',
      value: 12345,
      score: expect.any(Number),
    });
  });

  it('keeps the first candidate on a tie', () => {
    expect(findBestCandidate(['11', '22'], digitsOnly)?.text).toBe('11');
  });

  it('returns null when nothing parses', () => {
    expect(findBestCandidate(['abc', 'def'], digitsOnly)).toBeNull();
  });
});
