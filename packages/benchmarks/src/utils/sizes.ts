/**
 * Common tensor sizes for benchmarking
 */

import type { Shape4 } from '@quadra/core';

export interface BenchmarkSize {
  name: string;
  shape: Shape4;
  elements: number;
}

export const TENSOR4_SIZES: BenchmarkSize[] = [
  { name: 'tiny', shape: [2, 2, 2, 2], elements: 16 },
  { name: 'small', shape: [4, 4, 4, 4], elements: 256 },
  { name: 'medium', shape: [8, 8, 8, 8], elements: 4096 },
  { name: 'large', shape: [16, 16, 16, 16], elements: 65536 },
];

/**
 * Shapes that stress one axis at a time
 */
export const SKEWED_SIZES: BenchmarkSize[] = [
  { name: 'long', shape: [4096, 1, 1, 1], elements: 4096 },
  { name: 'wide', shape: [1, 4096, 1, 1], elements: 4096 },
  { name: 'deep', shape: [1, 1, 4096, 1], elements: 4096 },
  { name: 'deep2', shape: [1, 1, 1, 4096], elements: 4096 },
];

export function formatSize(size: BenchmarkSize): string {
  return `${size.name} ${size.shape.join('x')} (${size.elements.toLocaleString('en-US')} elements)`;
}
