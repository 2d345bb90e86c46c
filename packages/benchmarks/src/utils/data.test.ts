import { describe, it, expect } from 'vitest';
import { Tensor4 } from '@quadra/core';
import { generateConstantData, generateRandomData, generateSequentialData } from './data';
import { SKEWED_SIZES, TENSOR4_SIZES, formatSize } from './sizes';

describe('benchmark data', () => {
  it('should build storage of the requested shape', () => {
    const t = Tensor4.from(generateRandomData([2, 3, 1, 4]));

    expect(t.dims).toEqual([2, 3, 1, 4]);
    expect(t.every((v) => v >= 0 && v < 1)).toBe(true);
  });

  it('should number cells in nesting order', () => {
    const { data, nextValue } = generateSequentialData([1, 2, 1, 2], 10);

    expect(data).toEqual([[[[10, 11]], [[12, 13]]]]);
    expect(nextValue).toBe(14);
  });

  it('should fill constant data', () => {
    expect(generateConstantData([1, 1, 2, 1], 7)).toEqual([[[[7], [7]]]]);
  });
});

describe('benchmark sizes', () => {
  it('should list element counts matching the shapes', () => {
    for (const size of [...TENSOR4_SIZES, ...SKEWED_SIZES]) {
      expect(size.shape.reduce((a, b) => a * b, 1)).toBe(size.elements);
    }
  });

  it('should describe a size', () => {
    expect(formatSize({ name: 'large', shape: [16, 16, 16, 16], elements: 65536 })).toBe(
      'large 16x16x16x16 (65,536 elements)',
    );
  });
});
