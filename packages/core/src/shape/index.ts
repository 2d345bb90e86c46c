/**
 * Shape module exports
 *
 * @module shape
 *
 * Type-level shapes (literal tuples checked at compile time) and their runtime
 * helpers.
 *
 * ## System Limits
 * - Maximum generated rank: 8 dimensions
 * - Maximum generated size: 2^32 - 1 elements
 */

export type {
  Shape,
  Shape4,
  AxisName,
  ShapeRecord4,
  MaxRank,
  Product,
  ItemsCount,
  Rank,
  IsSameShape,
  ShapeToString,
  ShapeMismatchMessage,
} from './types';

export {
  MAX_TENSOR_SIZE,
  MAX_TENSOR_RANK,
  AXIS_NAMES,
  computeSize,
  shapesEqual,
  toShapeRecord4,
  formatShape,
  assertValidDims,
  assertSameShape,
} from './runtime';
