/**
 * fluent-pipeline
 *
 * Extraction, validation, transformation and formatting of scalar values as
 * immutable, error-accumulating PipelineValue chains.
 *
 * @example
 * ```typescript
 * import { extractDate, addDays, before, formatWith } from 'fluent-pipeline';
 *
 * extractDate('2024-12-10')
 *   .pipe(addDays(1))
 *   .pipe(before(new Date(2030, 0, 1)))
 *   .pipe(formatWith<Date>((_value, isValid) => (isValid ? 'Valid Date!' : 'Invalid Date')));
 * ```
 *
 * @module fluent-pipeline
 */

export * from './core/index.js';
export * from './schemas/index.js';
export * from './stages/index.js';
export * from './fuzzy/index.js';
export * from './logging/index.js';
export { config, loadConfig, LOG_LEVELS, type Config, type LogLevel } from './config/index.js';

// Parse/format collaborators share names with the format stages
export * as formatting from './formatting/index.js';
