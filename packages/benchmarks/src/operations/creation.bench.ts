/**
 * Tensor4 creation benchmarks
 *
 * Tests the performance of creating tensors of various sizes and shapes.
 */

import { bench, describe } from 'vitest';
import { Tensor4 } from '@quadra/core';
import { SKEWED_SIZES, TENSOR4_SIZES, formatSize } from '../utils/sizes';
import { generateConstantData, generateRandomData, generateSequentialData } from '../utils/data';

describe('tensor creation from data', () => {
  for (const size of TENSOR4_SIZES) {
    const data = generateRandomData(size.shape);

    bench(`from ${formatSize(size)}`, () => {
      Tensor4.from(data);
    });
  }

  for (const size of SKEWED_SIZES) {
    const data = generateRandomData(size.shape);

    bench(`from ${formatSize(size)}`, () => {
      Tensor4.from(data);
    });
  }
});

describe('tensor creation by generation', () => {
  for (const size of TENSOR4_SIZES) {
    const [length, width, depth, depth2] = size.shape;

    bench(`generate ${formatSize(size)}`, () => {
      Tensor4.generate(length, width, depth, depth2, (i) => i);
    });

    bench(`zeros ${formatSize(size)}`, () => {
      Tensor4.zeros(length, width, depth, depth2);
    });
  }
});

describe('tensor creation patterns', () => {
  const shape = [8, 8, 8, 8] as const;

  bench('from random data', () => {
    Tensor4.from(generateRandomData(shape));
  });

  bench('from sequential data', () => {
    Tensor4.from(generateSequentialData(shape).data);
  });

  bench('from constant data', () => {
    Tensor4.from(generateConstantData(shape, 42));
  });

  bench('ones', () => {
    Tensor4.ones(8, 8, 8, 8);
  });
});
