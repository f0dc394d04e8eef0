import { describe, it, expect } from '@jest/globals';
import { PipelineValue } from '../core/pipeline-value.js';
import {
  first,
  firstOrDefault,
  last,
  lastOrDefault,
  where,
  select,
  count,
} from './collection.js';

const numbers = PipelineValue.of<readonly number[]>([3, 1, 4, 1, 5]);
const empty = PipelineValue.of<readonly number[]>([]);

describe('collection stages', () => {
  it('takes the first and last elements', () => {
    expect(numbers.pipe(first<number>()).value).toBe(3);
    expect(numbers.pipe(last<number>()).value).toBe(5);
  });

  it('fails on an empty array', () => {
    const result = empty.pipe(first<number>());
    expect(result.isValid).toBe(false);
    expect(result.value).toBeNull();
    expect(result.errors[0].operation).toBe('First');
    expect(result.errors[0].message).toBe('Sequence contains no elements');
    expect(empty.pipe(last<number>()).errors[0].operation).toBe('Last');
  });

  it('falls back to a default', () => {
    expect(empty.pipe(firstOrDefault<number>()).value).toBeNull();
    expect(empty.pipe(firstOrDefault(0)).value).toBe(0);
    expect(empty.pipe(lastOrDefault(-1)).value).toBe(-1);
    expect(numbers.pipe(lastOrDefault(-1)).value).toBe(5);
  });

  it('filters, maps and counts', () => {
    expect(numbers.pipe(where((n: number) => n > 2)).value).toEqual([3, 4, 5]);
    expect(numbers.pipe(select((n: number) => n * 10)).value).toEqual([30, 10, 40, 10, 50]);
    expect(numbers.pipe(count<number>()).value).toBe(5);
  });

  it('forwards an invalid collection as absent', () => {
    const input = PipelineValue.fromError<readonly number[]>('Load', 'bad');
    const result = input.pipe(count<number>());
    expect(result.value).toBeNull();
    expect(result.errors).toEqual(input.errors);
  });
});
