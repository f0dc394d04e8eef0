/**
 * Schemas Module
 *
 * Zod schemas, inferred types and factories for every stage configuration.
 *
 * @module schemas
 */

// Shared option types
export {
  LocaleSchema,
  type Locale,
  RoundingModeSchema,
  type RoundingMode,
  StringComparisonSchema,
  type StringComparison,
  NumberStyleSchema,
  type NumberStyle,
  parseConfig,
} from './common.js';

// Extraction
export {
  SemanticTypeSchema,
  type SemanticType,
  DEFAULT_PATTERNS,
  FuzzyExtractionModeSchema,
  type FuzzyExtractionMode,
  ExtractConfigSchema,
  type ExtractConfig,
  type ExtractOptions,
  createExtractConfig,
} from './extract-config.js';

// Validation
export {
  ValidationConfigSchema,
  type ValidationConfig,
  type ValidationOptions,
  createValidationConfig,
} from './validation-config.js';

// Transformation
export {
  TransformationConfigSchema,
  type TransformationConfig,
  type TransformationOptions,
  createTransformationConfig,
} from './transformation-config.js';

// Formatting
export {
  FormatConfigSchema,
  type FormatConfig,
  type FormatOptions,
  createFormatConfig,
} from './format-config.js';

// Fuzzy matching
export {
  FuzzyAlgorithmSchema,
  type FuzzyAlgorithm,
  type SimilarityFunction,
  FuzzyMatchingConfigSchema,
  type FuzzyMatchingConfig,
  type FuzzyMatchingOptions,
  createFuzzyMatchingConfig,
  DEFAULT_FUZZY_MATCHING_CONFIG,
} from './fuzzy-config.js';
