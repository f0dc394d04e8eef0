/**
 * PipelineValue - the immutable carrier that flows between stages
 *
 * A PipelineValue holds the current payload (or the absent sentinel `null`),
 * a validity flag and the append-only history of failures. Every operation
 * returns a new instance; once a value is invalid, stages keep forwarding it
 * without computing anything new.
 *
 * @module core/pipeline-value
 */

import { describeError } from './errors.js';
import { PipelineError, type PipelineErrorJson } from './pipeline-error.js';

/**
 * Serialized form of a PipelineValue.
 */
export interface PipelineValueJson<T> {
  value: T | null;
  isValid: boolean;
  errors: PipelineErrorJson[];
}

const GENERIC_INVALID_OPERATION = 'PipelineValue';
const GENERIC_INVALID_MESSAGE = 'Value marked invalid without a recorded error';

function structurallyEqual(a: unknown, b: unknown): boolean {
  if (Object.is(a, b)) {
    return true;
  }
  if (a instanceof Date && b instanceof Date) {
    return a.getTime() === b.getTime();
  }
  if (Array.isArray(a) && Array.isArray(b)) {
    return a.length === b.length && a.every((item, i) => structurallyEqual(item, b[i]));
  }
  if (
    typeof a === 'object' &&
    typeof b === 'object' &&
    a !== null &&
    b !== null &&
    !Array.isArray(a) &&
    !Array.isArray(b)
  ) {
    const aKeys = Object.keys(a);
    const bKeys = Object.keys(b);
    if (aKeys.length !== bKeys.length) {
      return false;
    }
    return aKeys.every(
      (key) => Object.prototype.hasOwnProperty.call(b, key) &&
        structurallyEqual(Reflect.get(a, key), Reflect.get(b, key))
    );
  }
  return false;
}

/**
 * Immutable value wrapper with validity and error history.
 *
 * @example
 * ```typescript
 * const result = PipelineValue.of(' 42 ')
 *   .map('Trim', (s) => s.trim())
 *   .map('ParseInt', (s) => Number.parseInt(s, 10))
 *   .validate('GreaterThan', (n) => n > 10, 'Value must be greater than 10');
 *
 * result.isValid; // true
 * result.value;   // 42
 * ```
 */
export class PipelineValue<T> {
  /** Current payload, `null` when absent */
  readonly value: T | null;

  /** False once any stage has failed; never flips back to true */
  readonly isValid: boolean;

  /** Append-only failure history in the order the failures occurred */
  readonly errors: readonly PipelineError[];

  private constructor(value: T | null, isValid: boolean, errors: readonly PipelineError[]) {
    this.value = value;
    this.isValid = isValid;
    this.errors =
      !isValid && errors.length === 0
        ? Object.freeze([new PipelineError(GENERIC_INVALID_OPERATION, GENERIC_INVALID_MESSAGE)])
        : Object.freeze([...errors]);
    Object.freeze(this);
  }

  // ==========================================================================
  // Construction
  // ==========================================================================

  static create<T>(
    value: T | null,
    isValid = true,
    errors: readonly PipelineError[] = []
  ): PipelineValue<T> {
    return new PipelineValue(value, isValid, errors);
  }

  /** A valid value with no history. */
  static of<T>(value: T): PipelineValue<T> {
    return new PipelineValue<T>(value, true, []);
  }

  /** An invalid, absent value carrying the given history. */
  static absent<T>(errors: readonly PipelineError[] = []): PipelineValue<T> {
    return new PipelineValue<T>(null, false, errors);
  }

  /** An invalid, absent value with a single error. */
  static fromError<T>(operation: string, message: string, cause?: unknown): PipelineValue<T> {
    return new PipelineValue<T>(null, false, [new PipelineError(operation, message, { cause })]);
  }

  get hasValue(): boolean {
    return this.value !== null;
  }

  // ==========================================================================
  // State transitions
  // ==========================================================================

  /** Same validity and history, different payload. */
  withValue<U>(value: U | null): PipelineValue<U> {
    return new PipelineValue<U>(value, this.isValid, this.errors);
  }

  /**
   * Mark the value invalid and record an error. The current payload is kept
   * so callers can still inspect the last computed value.
   */
  withError(operation: string, message: string, cause?: unknown): PipelineValue<T> {
    return this.appendError(new PipelineError(operation, message, { cause }));
  }

  /** Append an existing error record. */
  appendError(error: PipelineError): PipelineValue<T> {
    return new PipelineValue<T>(this.value, false, [...this.errors, error]);
  }

  /**
   * AND-combine validity. The error is appended only when `isValid` is false.
   */
  withValidation(isValid: boolean, error?: PipelineError): PipelineValue<T> {
    if (isValid) {
      return this;
    }
    return new PipelineValue<T>(this.value, false, error ? [...this.errors, error] : this.errors);
  }

  // ==========================================================================
  // Composition
  // ==========================================================================

  /**
   * Apply a transformation to the payload. Invalid values are forwarded with
   * an absent payload of the new type; a throwing worker becomes an error.
   */
  map<U>(operation: string, fn: (value: T) => U): PipelineValue<U> {
    if (!this.isValid) {
      return new PipelineValue<U>(null, false, this.errors);
    }
    if (this.value === null) {
      return new PipelineValue<U>(null, false, [
        ...this.errors,
        new PipelineError(operation, 'No value to transform'),
      ]);
    }
    try {
      return new PipelineValue<U>(fn(this.value), true, this.errors);
    } catch (error) {
      return new PipelineValue<U>(null, false, [
        ...this.errors,
        new PipelineError(operation, describeError(error), { cause: error }),
      ]);
    }
  }

  /**
   * Check the payload against a predicate. Does nothing once invalid.
   */
  validate(
    operation: string,
    predicate: (value: T) => boolean,
    failureMessage: string | ((value: T) => string)
  ): PipelineValue<T> {
    if (!this.isValid) {
      return this;
    }
    const value = this.value;
    if (value === null) {
      return this.withError(operation, 'No value to validate');
    }
    try {
      if (predicate(value)) {
        return this;
      }
      const message = typeof failureMessage === 'function' ? failureMessage(value) : failureMessage;
      return this.withError(operation, message);
    } catch (error) {
      return this.withError(operation, `Validation error: ${describeError(error)}`, error);
    }
  }

  /**
   * Apply a stage or terminal formatter to this value.
   *
   * @example
   * ```typescript
   * PipelineValue.of('2024-12-10').pipe(extractDate()).pipe(addDays(1)).pipe(formatDate('yyyy-MM-dd'));
   * ```
   */
  pipe<R>(step: (input: PipelineValue<T>) => R): R {
    return step(this);
  }

  // ==========================================================================
  // Inspection
  // ==========================================================================

  /** Structural comparison of payload, validity and error history. */
  equals(other: PipelineValue<unknown>): boolean {
    return (
      this.isValid === other.isValid &&
      structurallyEqual(this.value, other.value) &&
      this.errors.length === other.errors.length &&
      this.errors.every(
        (error, i) =>
          error.operation === other.errors[i]?.operation && error.message === other.errors[i]?.message
      )
    );
  }

  toJSON(): PipelineValueJson<T> {
    return {
      value: this.value,
      isValid: this.isValid,
      errors: this.errors.map((error) => error.toJSON()),
    };
  }
}
