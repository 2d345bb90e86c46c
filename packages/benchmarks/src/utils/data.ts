/**
 * Data generation utilities for benchmarks
 */

import type { Shape4, Storage4 } from '@quadra/core';

/**
 * Build nested rank-4 storage, filling cells in nesting order
 */
function buildStorage(shape: Shape4, next: () => number): Storage4 {
  const [length, width, depth, depth2] = shape;
  return Array.from({ length }, () =>
    Array.from({ length: width }, () =>
      Array.from({ length: depth }, () => Array.from({ length: depth2 }, () => next())),
    ),
  );
}

/**
 * Generate random data in `[0, 1)` for a given shape
 */
export function generateRandomData(shape: Shape4): Storage4 {
  return buildStorage(shape, () => Math.random());
}

/**
 * Generate sequential data for a given shape
 */
export function generateSequentialData(
  shape: Shape4,
  start = 0,
): { data: Storage4; nextValue: number } {
  let counter = start;
  const data = buildStorage(shape, () => counter++);
  return { data, nextValue: counter };
}

/**
 * Generate data filled with a constant value
 */
export function generateConstantData(shape: Shape4, value: number): Storage4 {
  return buildStorage(shape, () => value);
}
