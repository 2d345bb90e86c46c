/**
 * Runtime tests for rank-4 storage helpers
 */

import { describe, it, expect } from 'vitest';
import {
  assertExhaustiveSwitch,
  assertRectangular,
  copyStorage,
  flattenStorage,
  iterateStorage,
  mapStorage,
  readExtents,
  sameValue,
} from './utils';
import { InvalidShapeError } from './errors';

const cube = [
  [
    [
      [1, 2, 3],
      [4, 5, 6],
    ],
  ],
  [
    [
      [7, 8, 9],
      [10, 11, 12],
    ],
  ],
];

describe('readExtents', () => {
  it('should read sizes along the first element chain', () => {
    expect(readExtents(cube)).toEqual([2, 1, 2, 3]);
  });

  it('should read zero below an empty level', () => {
    expect(readExtents([])).toEqual([0, 0, 0, 0]);
    expect(readExtents([[[]]])).toEqual([1, 1, 0, 0]);
  });
});

describe('assertRectangular', () => {
  it('should accept rectangular data', () => {
    expect(() => assertRectangular(cube)).not.toThrow();
  });

  it('should report the first jagged position', () => {
    expect(() => assertRectangular([[[[1]]], [[[1]], [[2]]]])).toThrow(
      'Jagged tensor data: expected 1 items at [1] but found 2',
    );
    expect(() => assertRectangular([[[[1, 2]], [[3]]]])).toThrow(InvalidShapeError);
  });
});

describe('copyStorage', () => {
  it('should copy every level', () => {
    const copy = copyStorage(cube);

    expect(copy).toEqual(cube);
    expect(copy).not.toBe(cube);
    expect(copy[0]).not.toBe(cube[0]);
    expect(copy[0][0][0]).not.toBe(cube[0][0][0]);
  });
});

describe('mapStorage', () => {
  it('should apply the function to every value', () => {
    expect(flattenStorage(mapStorage(cube, (v) => v % 2))).toEqual([
      1, 0, 1, 0, 1, 0, 1, 0, 1, 0, 1, 0,
    ]);
  });
});

describe('flattenStorage / iterateStorage', () => {
  it('should yield values in nesting order', () => {
    const expected = [1, 2, 3, 4, 5, 6, 7, 8, 9, 10, 11, 12];
    expect(flattenStorage(cube)).toEqual(expected);
    expect([...iterateStorage(cube)]).toEqual(expected);
  });
});

describe('sameValue', () => {
  it('should compare like === except for NaN', () => {
    expect(sameValue(1, 1)).toBe(true);
    expect(sameValue(0, -0)).toBe(true);
    expect(sameValue(Number.NaN, Number.NaN)).toBe(true);
    expect(sameValue(Number.NaN, 0)).toBe(false);
    expect(sameValue(1, 2)).toBe(false);
  });
});

describe('assertExhaustiveSwitch', () => {
  it('should throw for values that reach it at runtime', () => {
    const check = (value: 'number' | 'tensor'): string => {
      switch (value) {
        case 'number':
        case 'tensor':
          return value;
        default:
          return assertExhaustiveSwitch(value);
      }
    };
    // Untyped callers can pass values outside the union
    expect(() => Reflect.apply(check, undefined, ['matrix'])).toThrow('Unhandled case: matrix');
  });
});
