/**
 * Per-field outcome of comparing a record against a reference record.
 *
 * @module core/cross-validation-result
 */

export class CrossValidationResult {
  readonly fieldScores: Readonly<Record<string, number>>;
  readonly fieldMatches: Readonly<Record<string, boolean>>;
  readonly threshold: number;

  /** True when every field reached the threshold; false for an empty result */
  readonly isValid: boolean;

  readonly minSimilarity: number;
  readonly maxSimilarity: number;
  readonly averageSimilarity: number;

  /** Highest-scoring field, first one wins on ties */
  readonly bestMatchingField: string | null;
  /** Lowest-scoring field, first one wins on ties */
  readonly worstMatchingField: string | null;

  constructor(fieldScores: Record<string, number>, threshold: number) {
    const entries = Object.entries(fieldScores);
    this.threshold = threshold;
    this.fieldScores = Object.freeze(Object.fromEntries(entries));
    this.fieldMatches = Object.freeze(
      Object.fromEntries(entries.map(([field, score]) => [field, score >= threshold]))
    );

    if (entries.length === 0) {
      this.isValid = false;
      this.minSimilarity = 0;
      this.maxSimilarity = 0;
      this.averageSimilarity = 0;
      this.bestMatchingField = null;
      this.worstMatchingField = null;
    } else {
      const scores = entries.map(([, score]) => score);
      this.isValid = Object.values(this.fieldMatches).every(Boolean);
      this.minSimilarity = Math.min(...scores);
      this.maxSimilarity = Math.max(...scores);
      this.averageSimilarity = scores.reduce((sum, score) => sum + score, 0) / scores.length;

      let best = entries[0];
      let worst = entries[0];
      for (const entry of entries) {
        if (entry[1] > best[1]) best = entry;
        if (entry[1] < worst[1]) worst = entry;
      }
      this.bestMatchingField = best[0];
      this.worstMatchingField = worst[0];
    }

    Object.freeze(this);
  }

  /** Score for a field, 0 when the field was not compared. */
  getFieldScore(fieldName: string): number {
    return Object.hasOwn(this.fieldScores, fieldName) ? this.fieldScores[fieldName] : 0;
  }

  /** Whether a field matched, false when the field was not compared. */
  getFieldMatch(fieldName: string): boolean {
    return Object.hasOwn(this.fieldMatches, fieldName) ? this.fieldMatches[fieldName] : false;
  }
}
