/**
 * Stages Module
 *
 * Extraction, validation, transformation, formatting and collection stages,
 * plus the engine they share.
 *
 * @module stages
 */

// Engine
export {
  type Stage,
  type Formatter,
  type Parser,
  type ExtractionSource,
  fail,
  resolvePattern,
  runExtraction,
  runValidation,
  runTransformation,
  runConversion,
  runFormat,
} from './engine.js';

// Extraction
export {
  type ParsedType,
  parseDate,
  extract,
  extractAs,
  extractString,
  extractDate,
  extractInt,
  extractDouble,
  extractDecimal,
  extractBool,
  extractGuid,
} from './extract.js';

// Comparison policy
export {
  type Comparable,
  type Widen,
  type StringPolicy,
  compareStrings,
  compareValues,
} from './compare.js';

// Validation
export {
  before,
  after,
  greaterThan,
  greaterThanOrEqual,
  lessThan,
  lessThanOrEqual,
  between,
  equalTo,
  approximatelyEqual,
  contains,
  startsWith,
  endsWith,
  matches,
  notEmpty,
  satisfies,
} from './validate.js';

// Transformation
export { MAX_ROUNDING_DIGITS, roundTo } from './rounding.js';
export {
  transform,
  convert,
  toText,
  addDays,
  addMonths,
  addYears,
  addHours,
  addMinutes,
  addDuration,
  add,
  subtract,
  multiply,
  divide,
  round,
  abs,
  trim,
  toUpper,
  toLower,
  replace,
  substring,
} from './transform.js';

// Formatting
export {
  DEFAULT_DATE_TEXT_PATTERN,
  defaultText,
  format,
  formatWith,
  formatValue,
  formatDate,
  formatNumber,
  formatCurrency,
} from './format.js';

// Collections
export {
  first,
  firstOrDefault,
  last,
  lastOrDefault,
  where,
  select,
  count,
} from './collection.js';
