/**
 * Core value types
 *
 * @module core
 */

export { PipelineValue, type PipelineValueJson } from './pipeline-value.js';
export {
  PipelineError,
  type PipelineErrorOptions,
  type PipelineErrorJson,
} from './pipeline-error.js';
export { CrossValidationResult } from './cross-validation-result.js';
export { ConfigurationError, ExtractionError, describeError } from './errors.js';
