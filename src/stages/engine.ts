/**
 * Stage Engine
 *
 * The four stage categories share one contract: take a PipelineValue, a
 * parsed configuration and a worker, and return the next PipelineValue (or,
 * for formatting, the final string). Invalid input is forwarded without
 * running the worker; worker failures are recorded, never thrown, except for
 * extraction with `throwOnFailure`.
 *
 * @module stages/engine
 */

import { PipelineValue } from '../core/pipeline-value.js';
import { PipelineError } from '../core/pipeline-error.js';
import { ExtractionError, describeError } from '../core/errors.js';
import {
  DEFAULT_PATTERNS,
  type ExtractConfig,
  type SemanticType,
} from '../schemas/extract-config.js';
import { DEFAULT_FUZZY_MATCHING_CONFIG } from '../schemas/fuzzy-config.js';
import type { ValidationConfig } from '../schemas/validation-config.js';
import type { TransformationConfig } from '../schemas/transformation-config.js';
import type { FormatConfig } from '../schemas/format-config.js';
import { collectCandidates, findBestCandidate } from '../fuzzy/extraction.js';
import { getLogger } from '../logging/logger.js';

// ============================================================================
// Types
// ============================================================================

/** A chainable step: one PipelineValue in, the next one out. */
export type Stage<In, Out = In> = (input: PipelineValue<In>) => PipelineValue<Out>;

/** A terminal step producing the output text. */
export type Formatter<T> = (input: PipelineValue<T>) => string;

/** Parses the extracted text into the target type; throws on bad input. */
export type Parser<T> = (text: string, config: ExtractConfig) => T;

export type ExtractionSource = string | null | undefined | PipelineValue<string>;

// ============================================================================
// Failure recording
// ============================================================================

/** Record a failure on `value` and log it at debug level. */
export function fail<T>(
  value: PipelineValue<T>,
  operation: string,
  message: string,
  cause?: unknown
): PipelineValue<T> {
  getLogger().debug(`${operation}: ${message}`);
  return value.withError(operation, message, cause);
}

function logAdded(before: PipelineValue<unknown>, after: PipelineValue<unknown>): void {
  for (const error of after.errors.slice(before.errors.length)) {
    getLogger().debug(`${error.operation}: ${error.message}`);
  }
}

// ============================================================================
// Extraction
// ============================================================================

type Attempt<T> = { ok: true; value: T } | { ok: false; message: string; cause?: unknown };

/**
 * Pattern used for extraction: explicit pattern, else the default for the
 * semantic type when `useDefaultRegex` is set, else none.
 */
export function resolvePattern(
  config: ExtractConfig,
  semanticType?: SemanticType
): string | undefined {
  if (config.regexPattern !== undefined) {
    return config.regexPattern;
  }
  if (config.useDefaultRegex && semanticType !== undefined) {
    return DEFAULT_PATTERNS[semanticType];
  }
  return undefined;
}

function strictAttempt<T>(
  text: string,
  patternText: string | undefined,
  config: ExtractConfig,
  parser: Parser<T>
): Attempt<T> {
  let target = text;
  if (patternText !== undefined) {
    const match = new RegExp(patternText, config.regexFlags).exec(text);
    if (!match) {
      return { ok: false, message: `Regex pattern '${patternText}' did not match` };
    }
    if (config.groupIndex >= match.length) {
      return {
        ok: false,
        message: `Group index ${config.groupIndex} is out of range. Found ${match.length} groups.`,
      };
    }
    const group = match[config.groupIndex];
    if (group === undefined) {
      return { ok: false, message: `Group ${config.groupIndex} did not participate in the match` };
    }
    target = group;
  }

  try {
    return { ok: true, value: parser(target, config) };
  } catch (error) {
    return { ok: false, message: `Extraction failed: ${describeError(error)}`, cause: error };
  }
}

function extractValue<T>(
  text: string | null,
  operation: string,
  parser: Parser<T>,
  config: ExtractConfig,
  semanticType: SemanticType | undefined,
  history: readonly PipelineError[]
): PipelineValue<T> {
  const start = PipelineValue.create<T>(null, true, history);
  if (text === null || text.length === 0) {
    return fail(start, operation, 'Source string is null or empty');
  }

  const patternText = resolvePattern(config, semanticType);
  const mode = config.fuzzyExtractionMode;

  let strictFailure: { message: string; cause?: unknown } | undefined;
  if (mode !== 'primary') {
    const attempt = strictAttempt(text, patternText, config, parser);
    if (attempt.ok) {
      return start.withValue(attempt.value);
    }
    if (mode === 'none') {
      return fail(start, operation, attempt.message, attempt.cause);
    }
    strictFailure = attempt;
  }

  // Fuzzy: score every parseable candidate and apply the threshold
  const fuzzy = config.fuzzyMatching ?? DEFAULT_FUZZY_MATCHING_CONFIG;
  const threshold = fuzzy.similarityThreshold;
  const pattern = patternText === undefined ? undefined : new RegExp(patternText, config.regexFlags);
  const best = findBestCandidate(
    collectCandidates(text, pattern, pattern ? config.groupIndex : 0),
    (candidate) => parser(candidate, config)
  );

  if (best !== null && best.score >= threshold) {
    if (strictFailure === undefined) {
      return start.withValue(best.value);
    }
    const warning = new PipelineError(
      operation,
      `Strict extraction failed (${strictFailure.message}); fuzzy fallback selected '${best.text}' with score ${best.score.toFixed(2)}`,
      { cause: strictFailure.cause }
    );
    getLogger().debug(`${operation}: ${warning.message}`);
    return PipelineValue.create(best.value, true, [...history, warning]);
  }

  const detail =
    best === null ? '' : ` (best candidate '${best.text}' scored ${best.score.toFixed(2)})`;
  const message =
    fuzzy.errorMessage ??
    (strictFailure === undefined
      ? `Fuzzy extraction found no candidate at or above threshold ${threshold.toFixed(2)}${detail}`
      : `${strictFailure.message}; fuzzy fallback found no candidate at or above threshold ${threshold.toFixed(2)}${detail}`);

  if (best !== null && fuzzy.returnBestMatch) {
    return fail(start.withValue(best.value), operation, message, strictFailure?.cause);
  }
  return fail(start, operation, message, strictFailure?.cause);
}

/**
 * Extract a typed value from raw text.
 *
 * An invalid PipelineValue source is forwarded with an absent value. With
 * `throwOnFailure`, a new failure is thrown as an ExtractionError instead.
 *
 * @throws ExtractionError when extraction fails and `throwOnFailure` is set
 */
export function runExtraction<T>(
  source: ExtractionSource,
  operation: string,
  parser: Parser<T>,
  config: ExtractConfig,
  semanticType?: SemanticType
): PipelineValue<T> {
  let text: string | null;
  let history: readonly PipelineError[] = [];
  if (source instanceof PipelineValue) {
    if (!source.isValid) {
      return PipelineValue.absent<T>(source.errors);
    }
    text = source.value;
    history = source.errors;
  } else {
    text = source ?? null;
  }

  const result = extractValue(text, operation, parser, config, semanticType, history);
  if (!result.isValid && config.throwOnFailure) {
    const last = result.errors[result.errors.length - 1];
    throw new ExtractionError(last);
  }
  return result;
}

// ============================================================================
// Validation
// ============================================================================

/**
 * Check a value. `customValidator` replaces `predicate`; `errorMessage`
 * replaces `describe`.
 */
export function runValidation<T>(
  input: PipelineValue<T>,
  operation: string,
  config: ValidationConfig<T>,
  predicate: (value: T) => boolean,
  describe: (value: T) => string
): PipelineValue<T> {
  const check = config.customValidator ?? predicate;
  const message = config.errorMessage;
  const result = input.validate(operation, check, (value) => message ?? describe(value));
  logAdded(input, result);
  return result;
}

// ============================================================================
// Transformation
// ============================================================================

/**
 * Same-type transformation. `customTransform` replaces `worker`. A failed
 * worker keeps the last good value and records the error.
 */
export function runTransformation<T>(
  input: PipelineValue<T>,
  operation: string,
  config: TransformationConfig<T>,
  worker: (value: T) => T
): PipelineValue<T> {
  if (!input.isValid) {
    return input;
  }
  const value = input.value;
  if (value === null) {
    return fail(input, operation, 'No value to transform');
  }
  const transform = config.customTransform ?? worker;
  try {
    return input.withValue(transform(value));
  } catch (error) {
    return fail(input, operation, describeError(error), error);
  }
}

/**
 * Type-changing transformation. Invalid input yields an absent value of the
 * new type.
 */
export function runConversion<T, U>(
  input: PipelineValue<T>,
  operation: string,
  worker: (value: T) => U
): PipelineValue<U> {
  const result = input.map(operation, worker);
  logAdded(input, result);
  return result;
}

// ============================================================================
// Formatting
// ============================================================================

/**
 * Produce the output text. Precedence: customFormatterWithValidation,
 * customFormatter, nullValueString for an absent value, invalidValueString
 * for an invalid one, then `worker`.
 */
export function runFormat<T>(
  input: PipelineValue<T>,
  config: FormatConfig<T>,
  worker: (value: T) => string
): string {
  if (config.customFormatterWithValidation) {
    return config.customFormatterWithValidation(input.value, input.isValid);
  }
  if (config.customFormatter) {
    return config.customFormatter(input.value);
  }
  if (input.value === null) {
    return config.nullValueString;
  }
  if (!input.isValid) {
    return config.invalidValueString;
  }
  return worker(input.value);
}
