/**
 * Fuzzy Module
 *
 * Similarity scoring, normalization, candidate scoring for fuzzy extraction
 * and the fuzzy matching stages.
 *
 * @module fuzzy
 */

export {
  JARO_WINKLER_PREFIX_LENGTH,
  JARO_WINKLER_SCALING_FACTOR,
  JARO_WINKLER_BOOST_THRESHOLD,
  levenshteinDistance,
  levenshteinSimilarity,
  jaroSimilarity,
  jaroWinklerSimilarity,
  calculateSimilarity,
} from './similarity.js';

export {
  normalizeAddress,
  normalizePhone,
  normalizeName,
  normalizeString,
  type NormalizeStringOptions,
  prepareForComparison,
} from './normalize.js';

export {
  type ScoredCandidate,
  extractionScore,
  collectCandidates,
  findBestCandidate,
} from './extraction.js';

export {
  type FuzzyMatchResult,
  type BatchMatchResult,
  type FieldMappings,
  type NormalizeAddressOptions,
  type NormalizeNameOptions,
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
