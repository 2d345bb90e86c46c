/**
 * Runtime tests for the shape helpers
 */

import { describe, it, expect } from 'vitest';
import {
  AXIS_NAMES,
  MAX_TENSOR_RANK,
  MAX_TENSOR_SIZE,
  assertSameShape,
  assertValidDims,
  computeSize,
  formatShape,
  shapesEqual,
  toShapeRecord4,
} from './runtime';
import { InvalidShapeError, ShapeMismatchError } from '../tensor/errors';

describe('shape helpers', () => {
  it('should list axis names in nesting order', () => {
    expect(AXIS_NAMES).toEqual(['length', 'width', 'depth', 'depth2']);
  });

  it('should compute sizes', () => {
    expect(computeSize([2, 3, 4, 5])).toBe(120);
    expect(computeSize([3, 0])).toBe(0);
    expect(computeSize([])).toBe(1);
  });

  it('should compare shapes by rank and sizes', () => {
    expect(shapesEqual([2, 3], [2, 3])).toBe(true);
    expect(shapesEqual([2, 3], [3, 2])).toBe(false);
    expect(shapesEqual([2, 3], [2, 3, 1])).toBe(false);
  });

  it('should build the ordered record', () => {
    expect(toShapeRecord4([1, 2, 3, 4])).toEqual({ length: 1, width: 2, depth: 3, depth2: 4 });
  });

  it('should format shapes', () => {
    expect(formatShape([2, 3])).toBe('[2, 3]');
    expect(formatShape([])).toBe('scalar []');
  });
});

describe('assertValidDims', () => {
  it('should accept positive integer sizes', () => {
    expect(() => assertValidDims([1, 2, 3, 4])).not.toThrow();
  });

  it('should reject invalid sizes', () => {
    expect(() => assertValidDims([2, -1])).toThrow(InvalidShapeError);
    expect(() => assertValidDims([Number.NaN])).toThrow(
      'Invalid dimension NaN at index 0: axis sizes must be positive integers',
    );
  });

  it('should enforce the rank and size limits', () => {
    expect(() => assertValidDims(Array.from({ length: MAX_TENSOR_RANK + 1 }, () => 1))).toThrow(
      'exceeds maximum supported rank',
    );
    expect(() => assertValidDims([1e10, 1e10])).toThrow('exceeds maximum size');
    expect(() => assertValidDims([MAX_TENSOR_SIZE])).not.toThrow();
    expect(() => assertValidDims([MAX_TENSOR_SIZE, 2])).toThrow(InvalidShapeError);
  });

  it('should attach the rejected shape to the error', () => {
    try {
      assertValidDims([2, 0]);
      expect.unreachable('assertValidDims should have thrown');
    } catch (error) {
      expect(error).toBeInstanceOf(InvalidShapeError);
      if (error instanceof InvalidShapeError) {
        expect(error.shape).toEqual([2, 0]);
      }
    }
  });
});

describe('assertSameShape', () => {
  it('should pass equal shapes and reject others', () => {
    expect(() => assertSameShape('add', [1, 2], [1, 2])).not.toThrow();
    expect(() => assertSameShape('add', [1, 2], [2, 1])).toThrow(ShapeMismatchError);
    expect(() => assertSameShape('add', [1, 2], [2, 1])).toThrow(
      'Cannot add: expected shape [1, 2] but got [2, 1]',
    );
  });
});
