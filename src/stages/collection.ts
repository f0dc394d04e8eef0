/**
 * Collection stages over a PipelineValue holding an array.
 *
 * @module stages/collection
 */

import { runConversion, type Stage } from './engine.js';

const EMPTY_SEQUENCE = 'Sequence contains no elements';

/** First element; fails on an empty array. */
export function first<T>(): Stage<readonly T[], T> {
  return (input) =>
    runConversion(input, 'First', (items) => {
      if (items.length === 0) {
        throw new Error(EMPTY_SEQUENCE);
      }
      return items[0];
    });
}

/** First element, or `defaultValue` (absent by default) when empty. */
export function firstOrDefault<T>(defaultValue: T | null = null): Stage<readonly T[], T | null> {
  return (input) =>
    runConversion(input, 'FirstOrDefault', (items) => (items.length > 0 ? items[0] : defaultValue));
}

/** Last element; fails on an empty array. */
export function last<T>(): Stage<readonly T[], T> {
  return (input) =>
    runConversion(input, 'Last', (items) => {
      if (items.length === 0) {
        throw new Error(EMPTY_SEQUENCE);
      }
      return items[items.length - 1];
    });
}

/** Last element, or `defaultValue` (absent by default) when empty. */
export function lastOrDefault<T>(defaultValue: T | null = null): Stage<readonly T[], T | null> {
  return (input) =>
    runConversion(input, 'LastOrDefault', (items) =>
      items.length > 0 ? items[items.length - 1] : defaultValue
    );
}

export function where<T>(predicate: (item: T) => boolean): Stage<readonly T[], T[]> {
  return (input) => runConversion(input, 'Where', (items) => items.filter(predicate));
}

export function select<T, U>(selector: (item: T) => U): Stage<readonly T[], U[]> {
  return (input) => runConversion(input, 'Select', (items) => items.map(selector));
}

export function count<T>(): Stage<readonly T[], number> {
  return (input) => runConversion(input, 'Count', (items) => items.length);
}
