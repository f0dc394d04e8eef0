/**
 * Fuzzy extraction helpers: candidate collection and scoring.
 *
 * A candidate scores higher the longer it is (up to 20 characters) and the
 * larger its share of clean characters (letters, digits, space and - / . :).
 *
 * @module fuzzy/extraction
 */

const CLEAN_CHAR = /[\p{L}\p{N}\-/.: ]/u;
const LENGTH_WEIGHT = 0.4;
const QUALITY_WEIGHT = 0.6;
const FULL_LENGTH = 20;

/** Wrapping characters stripped from whitespace tokens */
const TOKEN_EDGES = /^["'([{<]+|["')\]}>,;:!?.]+$/g;

export interface ScoredCandidate<T> {
  text: string;
  value: T;
  score: number;
}

/**
 * Heuristic likelihood that a candidate is a complete, well-formed value.
 */
export function extractionScore(candidate: string): number {
  const chars = [...candidate];
  if (chars.length === 0) {
    return 0;
  }
  const clean = chars.filter((char) => CLEAN_CHAR.test(char)).length;
  const lengthScore = Math.min(1, chars.length / FULL_LENGTH);
  const qualityScore = clean / chars.length;
  return LENGTH_WEIGHT * lengthScore + QUALITY_WEIGHT * qualityScore;
}

/**
 * Candidate substrings of `source`: every match of `pattern` (its
 * `groupIndex` group) when a pattern is given, else whitespace tokens with
 * wrapping punctuation removed.
 */
export function collectCandidates(
  source: string,
  pattern: RegExp | undefined,
  groupIndex = 0
): string[] {
  if (pattern) {
    const flags = pattern.flags.includes('g') ? pattern.flags : `${pattern.flags}g`;
    const scanner = new RegExp(pattern.source, flags);
    const candidates: string[] = [];
    for (const match of source.matchAll(scanner)) {
      const text = match[groupIndex];
      if (text !== undefined && text.length > 0) {
        candidates.push(text);
      }
    }
    return candidates;
  }

  return source
    .split(/\s+/)
    .map((token) => token.replace(TOKEN_EDGES, ''))
    .filter((token) => token.length > 0);
}

/**
 * Best-scoring candidate that `parse` accepts. The first candidate wins ties.
 * Returns null when no candidate parses.
 */
export function findBestCandidate<T>(
  candidates: readonly string[],
  parse: (text: string) => T
): ScoredCandidate<T> | null {
  let best: ScoredCandidate<T> | null = null;
  for (const text of candidates) {
    let value: T;
    try {
      value = parse(text);
    } catch {
      continue;
    }
    const score = extractionScore(text);
    if (best === null || score > best.score) {
      best = { text, value, score };
    }
  }
  return best;
}
