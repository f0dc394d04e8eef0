/**
 * Thrown Error Types
 *
 * Data-level failures never throw: they are recorded on the PipelineValue.
 * The classes here cover the two conditions that do surface to the caller:
 * programmer errors in configuration, and extraction failures when the
 * caller opted into `throwOnFailure`.
 *
 * @module core/errors
 */

import type { ZodError } from 'zod';
import type { PipelineError } from './pipeline-error.js';

/**
 * Raised when a configuration object is missing, contradictory or malformed
 * (for example an invalid regular expression or an out-of-range threshold).
 */
export class ConfigurationError extends Error {
  constructor(
    message: string,
    public readonly issues: readonly string[] = [],
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'ConfigurationError';
  }

  /**
   * Build a ConfigurationError from a failed zod parse.
   *
   * @param subject - What was being parsed (e.g. "extract config")
   * @param error - The zod error
   */
  static fromZodError(subject: string, error: ZodError): ConfigurationError {
    const issues = error.issues.map((issue) => {
      const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
      return `${path}: ${issue.message}`;
    });
    return new ConfigurationError(`Invalid ${subject}: ${issues.join('; ')}`, issues, {
      cause: error,
    });
  }
}

/**
 * Raised by an extraction stage configured with `throwOnFailure: true`
 * instead of returning an invalid PipelineValue.
 */
export class ExtractionError extends Error {
  constructor(public readonly pipelineError: PipelineError) {
    super(`${pipelineError.operation}: ${pipelineError.message}`, {
      cause: pipelineError.cause,
    });
    this.name = 'ExtractionError';
  }

  /** Name of the extraction stage that failed */
  get operation(): string {
    return this.pipelineError.operation;
  }
}

/**
 * Human-readable description of anything thrown by a worker.
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
