/**
 * Tensor4 traversal, comparison and rendering benchmarks
 */

import { bench, describe } from 'vitest';
import { Tensor4 } from '@quadra/core';
import { TENSOR4_SIZES, formatSize } from '../utils/sizes';
import { generateRandomData } from '../utils/data';

describe('traversal', () => {
  for (const size of TENSOR4_SIZES) {
    const a = Tensor4.from(generateRandomData(size.shape));

    bench(`map ${formatSize(size)}`, () => {
      a.map((v) => v * 2);
    });

    bench(`reduce ${formatSize(size)}`, () => {
      a.reduce((x, y) => x + y);
    });

    bench(`every ${formatSize(size)}`, () => {
      a.every((v) => v >= 0);
    });

    bench(`toList ${formatSize(size)}`, () => {
      a.toList();
    });
  }
});

describe('comparison and rendering', () => {
  for (const size of TENSOR4_SIZES) {
    const a = Tensor4.from(generateRandomData(size.shape));
    const b = a.copy();

    bench(`equals ${formatSize(size)}`, () => {
      a.equals(b);
    });

    bench(`hashCode ${formatSize(size)}`, () => {
      a.hashCode();
    });

    bench(`format ${formatSize(size)}`, () => {
      a.format();
    });
  }
});
