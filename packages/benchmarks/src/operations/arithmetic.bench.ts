/**
 * Tensor4 arithmetic benchmarks
 */

import { bench, describe } from 'vitest';
import { Scalar, Tensor4 } from '@quadra/core';
import { TENSOR4_SIZES, formatSize } from '../utils/sizes';
import { generateRandomData } from '../utils/data';

describe('elementwise tensor operations', () => {
  for (const size of TENSOR4_SIZES) {
    const a = Tensor4.from(generateRandomData(size.shape));
    const b = Tensor4.from(generateRandomData(size.shape));

    bench(`add ${formatSize(size)}`, () => {
      a.add(b);
    });

    bench(`sub ${formatSize(size)}`, () => {
      a.sub(b);
    });

    bench(`mul tensor ${formatSize(size)}`, () => {
      a.mul(b);
    });
  }
});

describe('scalar operations', () => {
  for (const size of TENSOR4_SIZES) {
    const a = Tensor4.from(generateRandomData(size.shape));
    const two = new Scalar(2);

    bench(`mul number ${formatSize(size)}`, () => {
      a.mul(2);
    });

    bench(`mul Scalar ${formatSize(size)}`, () => {
      a.mul(two);
    });

    bench(`div number ${formatSize(size)}`, () => {
      a.div(3);
    });

    bench(`neg ${formatSize(size)}`, () => {
      a.neg();
    });
  }
});
