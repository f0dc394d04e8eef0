/**
 * Fuzzy Matching Stages
 *
 * Stages that score the current string against references or candidates and
 * turn the score into a validity decision. Every decision uses the same rule:
 * a score matches when it is `>=` the configured threshold.
 *
 * @module fuzzy/matching
 */

import { PipelineValue } from '../core/pipeline-value.js';
import { CrossValidationResult } from '../core/cross-validation-result.js';
import { ConfigurationError, describeError } from '../core/errors.js';
import {
  createFuzzyMatchingConfig,
  type FuzzyMatchingConfig,
  type FuzzyMatchingOptions,
} from '../schemas/fuzzy-config.js';
import { fail, type Stage } from '../stages/engine.js';
import { calculateSimilarity, levenshteinDistance } from './similarity.js';
import { normalizeAddress, normalizeName, normalizePhone, prepareForComparison } from './normalize.js';

// ============================================================================
// Types
// ============================================================================

/** Best candidate for a single value; `match` is null when none scored */
export interface FuzzyMatchResult {
  match: string | null;
  score: number;
}

export interface BatchMatchResult extends FuzzyMatchResult {
  input: string;
}

/** Reference property name → result field name */
export type FieldMappings = Readonly<Record<string, string>>;

// ============================================================================
// Scoring
// ============================================================================

function scorePrepared(a: string, b: string, config: FuzzyMatchingConfig): number {
  return config.customSimilarityFunction
    ? config.customSimilarityFunction(a, b)
    : calculateSimilarity(a, b, config.algorithm);
}

/**
 * Score two strings under a fuzzy config: normalize and case-fold both, then
 * apply the custom function when present, else the selected algorithm.
 */
export function scoreWithConfig(a: string, b: string, config: FuzzyMatchingConfig): number {
  return scorePrepared(prepareForComparison(a, config), prepareForComparison(b, config), config);
}

function formatScore(score: number): string {
  return score.toFixed(2);
}

/**
 * Highest-scoring non-empty candidate. Only a positive score can win and the
 * first candidate wins ties; the original candidate text is returned.
 */
function selectBest(
  value: string,
  candidates: readonly string[],
  config: FuzzyMatchingConfig
): FuzzyMatchResult {
  const prepared = prepareForComparison(value, config);
  let best: FuzzyMatchResult = { match: null, score: 0 };
  for (const candidate of candidates) {
    if (candidate.length === 0) continue;
    const score = scorePrepared(prepared, prepareForComparison(candidate, config), config);
    if (score > best.score) {
      best = { match: candidate, score };
    }
  }
  return best;
}

// ============================================================================
// Matching against a reference
// ============================================================================

function checkSimilarity(
  input: PipelineValue<string>,
  reference: string,
  config: FuzzyMatchingConfig,
  operation: string
): PipelineValue<string> {
  try {
    const value = prepareForComparison(input.value ?? '', config);
    const target = prepareForComparison(reference, config);

    if (config.algorithm === 'levenshtein' && config.maxEditDistance !== undefined) {
      const distance = levenshteinDistance(value, target);
      if (distance > config.maxEditDistance) {
        return fail(
          input,
          operation,
          config.errorMessage ??
            `Fuzzy match failed: edit distance ${distance} exceeds maximum ${config.maxEditDistance}`
        );
      }
    }

    const score = scorePrepared(value, target, config);
    if (score >= config.similarityThreshold) {
      return input;
    }
    return fail(
      input,
      operation,
      config.errorMessage ??
        `Fuzzy match failed: similarity ${formatScore(score)} below threshold ${formatScore(config.similarityThreshold)}`
    );
  } catch (error) {
    return fail(input, operation, `Fuzzy matching error: ${describeError(error)}`, error);
  }
}

/**
 * Pass when the value is similar enough to `reference`. With the
 * levenshtein algorithm, `maxEditDistance` is checked first.
 *
 * @example
 * ```typescript
 * PipelineValue.of('Jon Smith').pipe(fuzzyMatch('John Smith')).isValid; // true
 * ```
 */
export function fuzzyMatch(reference: string, options: FuzzyMatchingOptions = {}): Stage<string> {
  const config = createFuzzyMatchingConfig(options);
  return (input) => (input.isValid ? checkSimilarity(input, reference, config, 'FuzzyMatch') : input);
}

/**
 * Cross-value check: compare the value with the value of another pipeline.
 * An invalid `other` makes the result invalid and carries over its errors.
 */
export function compareWith(
  other: PipelineValue<string>,
  options: FuzzyMatchingOptions = {}
): Stage<string> {
  const config = createFuzzyMatchingConfig(options);
  return (input) => {
    if (!input.isValid) {
      return input;
    }
    if (!other.isValid) {
      return other.errors.reduce((value, error) => value.appendError(error), input);
    }
    if (other.value === null) {
      return fail(input, 'CompareWith', 'No value to compare with');
    }
    return checkSimilarity(input, other.value, config, 'CompareWith');
  };
}

/**
 * Pass when some window of the value, as long as `substring`, is similar
 * enough to it. A substring longer than the value is compared whole.
 */
export function fuzzyContains(substring: string, options: FuzzyMatchingOptions = {}): Stage<string> {
  const config = createFuzzyMatchingConfig(options);
  const operation = 'FuzzyContains';
  return (input) => {
    if (!input.isValid) {
      return input;
    }
    if (!input.value || substring.length === 0) {
      return fail(input, operation, 'Fuzzy contains failed: input or substring is null or empty');
    }
    try {
      const value = prepareForComparison(input.value, config);
      const target = prepareForComparison(substring, config);

      let best = 0;
      if (target.length > value.length) {
        best = scorePrepared(value, target, config);
      } else {
        for (let i = 0; i + target.length <= value.length && best < 1; i++) {
          best = Math.max(best, scorePrepared(value.slice(i, i + target.length), target, config));
        }
      }

      if (best >= config.similarityThreshold) {
        return input;
      }
      return fail(
        input,
        operation,
        config.errorMessage ??
          `Fuzzy contains failed: best similarity ${formatScore(best)} below threshold ${formatScore(config.similarityThreshold)}`
      );
    } catch (error) {
      return fail(input, operation, `Fuzzy contains error: ${describeError(error)}`, error);
    }
  };
}

// ============================================================================
// Candidate selection
// ============================================================================

/**
 * Replace the value with the closest candidate. Below the threshold the stage
 * fails; with `returnBestMatch` the best candidate is still substituted but
 * the result is invalid. An absent or empty value passes through unchanged.
 *
 * @example
 * ```typescript
 * PipelineValue.of('Chicgo').pipe(correctTypos(['Chicago', 'Boston'])).value; // 'Chicago'
 * ```
 */
export function correctTypos(
  candidates: readonly string[],
  options: FuzzyMatchingOptions = {}
): Stage<string> {
  const config = createFuzzyMatchingConfig(options);
  const operation = 'CorrectTypos';
  return (input) => {
    if (!input.isValid || !input.value) {
      return input;
    }
    try {
      const best = selectBest(input.value, candidates, config);
      if (best.match !== null && best.score >= config.similarityThreshold) {
        return input.withValue(best.match);
      }
      const message =
        config.errorMessage ??
        `No correction found: best similarity ${formatScore(best.score)} below threshold ${formatScore(config.similarityThreshold)}`;
      if (best.match !== null && config.returnBestMatch) {
        return fail(input.withValue(best.match), operation, message);
      }
      return fail(input, operation, message);
    } catch (error) {
      return fail(input, operation, `Typo correction error: ${describeError(error)}`, error);
    }
  };
}

function matchMany(
  input: PipelineValue<string>,
  candidates: readonly string[],
  config: FuzzyMatchingConfig
): PipelineValue<FuzzyMatchResult> {
  const operation = 'FuzzyMatchMany';
  if (!input.isValid) {
    return PipelineValue.absent<FuzzyMatchResult>(input.errors);
  }
  const start = input.withValue<FuzzyMatchResult>(null);
  if (!input.value || candidates.length === 0) {
    return fail(start, operation, 'Input value or candidates are null or empty');
  }
  try {
    const best = selectBest(input.value, candidates, config);
    if (best.match !== null && best.score >= config.similarityThreshold) {
      return start.withValue(best);
    }
    const message =
      config.errorMessage ??
      `No match found: best similarity ${formatScore(best.score)} below threshold ${formatScore(config.similarityThreshold)}`;
    if (best.match !== null && config.returnBestMatch) {
      return fail(start.withValue(best), operation, message);
    }
    return fail(start, operation, message);
  } catch (error) {
    return fail(start, operation, `Fuzzy match many error: ${describeError(error)}`, error);
  }
}

/**
 * Select the closest candidate and report it with its score.
 */
export function fuzzyMatchMany(
  candidates: readonly string[],
  options: FuzzyMatchingOptions = {}
): Stage<string, FuzzyMatchResult> {
  const config = createFuzzyMatchingConfig(options);
  return (input) => matchMany(input, candidates, config);
}

/**
 * Match every string of a collection. Items without a match above the
 * threshold report `match: null` and score 0; the batch itself stays valid.
 */
export function fuzzyMatchManyBatch(
  candidates: readonly string[],
  options: FuzzyMatchingOptions = {}
): Stage<readonly string[], readonly BatchMatchResult[]> {
  const config = createFuzzyMatchingConfig(options);
  return (input) => {
    if (!input.isValid) {
      return PipelineValue.absent<readonly BatchMatchResult[]>(input.errors);
    }
    if (input.value === null) {
      const start = input.withValue<readonly BatchMatchResult[]>(null);
      return fail(start, 'FuzzyMatchManyBatch', 'Input collection is null');
    }
    const results = input.value.map((item): BatchMatchResult => {
      const matched = matchMany(PipelineValue.of(item), candidates, config);
      if (matched.isValid && matched.value !== null) {
        return { input: item, ...matched.value };
      }
      return { input: item, match: null, score: 0 };
    });
    return input.withValue<readonly BatchMatchResult[]>(Object.freeze(results));
  };
}

// ============================================================================
// Cross-validation against a reference record
// ============================================================================

function referenceText(reference: object, property: string): string | undefined {
  const wanted = property.toLowerCase();
  const entry = Object.entries(reference).find(([key]) => key.toLowerCase() === wanted);
  if (entry === undefined) {
    return undefined;
  }
  const [, value] = entry;
  return value === null || value === undefined ? '' : String(value);
}

function assertMappings(fieldMappings: FieldMappings): void {
  if (Object.keys(fieldMappings).length === 0) {
    throw new ConfigurationError('Invalid field mappings: at least one mapping is required');
  }
}

function crossValidateValue(
  input: PipelineValue<string>,
  reference: object,
  fieldMappings: FieldMappings,
  config: FuzzyMatchingConfig
): PipelineValue<CrossValidationResult> {
  const operation = 'CrossValidate';
  if (!input.isValid) {
    return PipelineValue.absent<CrossValidationResult>(input.errors);
  }
  const start = input.withValue<CrossValidationResult>(null);
  try {
    const value = input.value ?? '';
    // A Map keeps field names such as __proto__ as ordinary keys
    const fieldScores = new Map<string, number>();
    for (const [property, field] of Object.entries(fieldMappings)) {
      const text = referenceText(reference, property);
      fieldScores.set(field, text === undefined ? 0 : scoreWithConfig(value, text, config));
    }

    const result = new CrossValidationResult(
      Object.fromEntries(fieldScores),
      config.similarityThreshold
    );
    if (result.isValid) {
      return start.withValue(result);
    }
    return fail(
      start.withValue(result),
      operation,
      config.errorMessage ??
        `Cross-validation failed: ${result.worstMatchingField ?? '(none)'} similarity ${formatScore(result.minSimilarity)} below threshold ${formatScore(config.similarityThreshold)}`
    );
  } catch (error) {
    return fail(start, operation, `Cross-validation error: ${describeError(error)}`, error);
  }
}

/**
 * Score the value against selected properties of a reference record.
 * Property names are matched case-insensitively; a missing property scores 0.
 *
 * @throws ConfigurationError when `fieldMappings` is empty
 */
export function crossValidate(
  reference: object,
  fieldMappings: FieldMappings,
  options: FuzzyMatchingOptions = {}
): Stage<string, CrossValidationResult> {
  assertMappings(fieldMappings);
  const config = createFuzzyMatchingConfig(options);
  return (input) => crossValidateValue(input, reference, fieldMappings, config);
}

/**
 * Cross-validate every string of a collection. A failed item contributes an
 * empty result; the collection is valid only when every item is.
 *
 * @throws ConfigurationError when `fieldMappings` is empty
 */
export function crossValidateMany(
  reference: object,
  fieldMappings: FieldMappings,
  options: FuzzyMatchingOptions = {}
): Stage<readonly string[], readonly CrossValidationResult[]> {
  assertMappings(fieldMappings);
  const config = createFuzzyMatchingConfig(options);
  const operation = 'CrossValidateMany';
  return (input) => {
    if (!input.isValid) {
      return PipelineValue.absent<readonly CrossValidationResult[]>(input.errors);
    }
    const start = input.withValue<readonly CrossValidationResult[]>(null);
    if (input.value === null) {
      return fail(start, operation, 'Input collection is null');
    }

    const results = input.value.map((item) => {
      const validated = crossValidateValue(PipelineValue.of(item), reference, fieldMappings, config);
      return validated.isValid && validated.value !== null
        ? validated.value
        : new CrossValidationResult({}, config.similarityThreshold);
    });
    const failed = results.filter((result) => !result.isValid).length;
    const next = start.withValue<readonly CrossValidationResult[]>(Object.freeze(results));
    if (failed === 0) {
      return next;
    }
    return fail(next, operation, `Cross-validation failed for ${failed} of ${results.length} values`);
  };
}

// ============================================================================
// Normalization stages
// ============================================================================

function normalizing(fn: (value: string) => string): Stage<string> {
  return (input) => (input.isValid && input.value !== null ? input.withValue(fn(input.value)) : input);
}

export interface NormalizeAddressOptions {
  toLowercase?: boolean;
  removeCommonWords?: boolean;
}

export function normalizeAddressStage(options: NormalizeAddressOptions = {}): Stage<string> {
  const { toLowercase = true, removeCommonWords = false } = options;
  return normalizing((value) => normalizeAddress(value, toLowercase, removeCommonWords));
}

export function normalizePhoneStage(options: { removeExtensions?: boolean } = {}): Stage<string> {
  const { removeExtensions = true } = options;
  return normalizing((value) => normalizePhone(value, removeExtensions));
}

export interface NormalizeNameOptions {
  toLowercase?: boolean;
  removeTitles?: boolean;
}

export function normalizeNameStage(options: NormalizeNameOptions = {}): Stage<string> {
  const { toLowercase = true, removeTitles = false } = options;
  return normalizing((value) => normalizeName(value, toLowercase, removeTitles));
}
