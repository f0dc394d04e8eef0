/**
 * PipelineError - structured record of a single stage failure
 *
 * @module core/pipeline-error
 */

import { format } from 'date-fns';

/**
 * Optional fields accepted when recording an error.
 */
export interface PipelineErrorOptions {
  /** Underlying error or diagnostic payload, never interpreted downstream */
  cause?: unknown;
  /** Override the capture time (defaults to the monotonic clock) */
  timestamp?: Date;
}

/**
 * Serialized form used by `toJSON()` and the CLI `--json` output.
 */
export interface PipelineErrorJson {
  operation: string;
  message: string;
  timestamp: string;
  cause?: string;
}

/**
 * Capture time derived from the monotonic performance clock so that errors
 * recorded later in a chain never carry an earlier timestamp.
 */
function monotonicNow(): number {
  return performance.timeOrigin + performance.now();
}

/**
 * An immutable failure record appended to a PipelineValue's error history.
 *
 * @example
 * ```typescript
 * const error = new PipelineError('ExtractDate', "Unable to parse 'soon' as a date");
 * error.toString();
 * // "[2024-12-10 09:15:02] ExtractDate: Unable to parse 'soon' as a date"
 * ```
 */
export class PipelineError {
  /** Name of the stage that raised the error (e.g. "ExtractDate", "GreaterThan") */
  readonly operation: string;

  /** Human-readable description */
  readonly message: string;

  /** Underlying cause, preserved for diagnostics only */
  readonly cause?: unknown;

  private readonly capturedAt: number;

  constructor(operation: string, message: string, options: PipelineErrorOptions = {}) {
    if (operation.length === 0) {
      throw new TypeError('PipelineError requires an operation name');
    }
    this.operation = operation;
    this.message = message;
    this.capturedAt = options.timestamp?.getTime() ?? monotonicNow();
    if (options.cause !== undefined) {
      this.cause = options.cause;
    }
    Object.freeze(this);
  }

  /** Capture time. A fresh Date is returned so the record stays immutable. */
  get timestamp(): Date {
    return new Date(this.capturedAt);
  }

  toString(): string {
    return `[${format(this.capturedAt, 'yyyy-MM-dd HH:mm:ss')}] ${this.operation}: ${this.message}`;
  }

  toJSON(): PipelineErrorJson {
    const json: PipelineErrorJson = {
      operation: this.operation,
      message: this.message,
      timestamp: new Date(this.capturedAt).toISOString(),
    };
    if (this.cause !== undefined) {
      json.cause = this.cause instanceof Error ? this.cause.message : String(this.cause);
    }
    return json;
  }
}
