/**
 * Runtime shape management and validation
 *
 * This module provides the runtime counterparts of the shape types: axis
 * naming, limits, validation of requested sizes and shape formatting.
 */

import { InvalidShapeError, ShapeMismatchError } from '../tensor/errors';
import type { AxisName, Shape, Shape4, ShapeRecord4 } from './types';

// =============================================================================
// Configuration and Constants
// =============================================================================

/**
 * Maximum number of elements allowed in a generated tensor (the longest JS array)
 */
export const MAX_TENSOR_SIZE = 2 ** 32 - 1;

/**
 * Maximum rank (number of dimensions) for generated tensors
 */
export const MAX_TENSOR_RANK = 8;

/**
 * Axis names of a rank-4 tensor in nesting order (outermost first)
 */
export const AXIS_NAMES: readonly [AxisName, AxisName, AxisName, AxisName] = [
  'length',
  'width',
  'depth',
  'depth2',
];

// =============================================================================
// Shape Helpers
// =============================================================================

/**
 * Total number of elements for a shape
 */
export function computeSize(shape: Shape): number {
  return shape.reduce((acc, dim) => acc * dim, 1);
}

/**
 * Check whether two shapes have the same rank and sizes
 */
export function shapesEqual(a: Shape, b: Shape): boolean {
  if (a.length !== b.length) {
    return false;
  }
  for (let i = 0; i < a.length; i++) {
    if (a[i] !== b[i]) {
      return false;
    }
  }
  return true;
}

/**
 * Build the ordered record view of a rank-4 shape
 */
export function toShapeRecord4<S extends Shape4>(dims: S): ShapeRecord4<S> {
  return {
    length: dims[0],
    width: dims[1],
    depth: dims[2],
    depth2: dims[3],
  };
}

/**
 * Format a shape for display in error messages
 */
export function formatShape(shape: Shape): string {
  if (shape.length === 0) {
    return 'scalar []';
  }
  return `[${shape.join(', ')}]`;
}

// =============================================================================
// Validation
// =============================================================================

/**
 * Validate the sizes requested from the generation protocol
 *
 * Every size must be a positive integer, the rank must not exceed
 * MAX_TENSOR_RANK and the element count must not exceed MAX_TENSOR_SIZE.
 */
export function assertValidDims(dims: Shape): void {
  if (dims.length === 0) {
    throw new InvalidShapeError('Cannot generate a tensor without axes', dims);
  }
  if (dims.length > MAX_TENSOR_RANK) {
    throw new InvalidShapeError(
      `Rank ${dims.length.toString()} exceeds maximum supported rank ${MAX_TENSOR_RANK.toString()}`,
      dims,
    );
  }

  for (let i = 0; i < dims.length; i++) {
    const dim = dims[i];
    if (dim === undefined || !Number.isInteger(dim) || dim <= 0) {
      throw new InvalidShapeError(
        `Invalid dimension ${String(dim)} at index ${i.toString()}: axis sizes must be positive integers`,
        dims,
      );
    }
  }

  const size = computeSize(dims);
  if (size > MAX_TENSOR_SIZE) {
    throw new InvalidShapeError(
      `Tensor size ${size.toString()} exceeds maximum size ${MAX_TENSOR_SIZE.toString()}`,
      dims,
    );
  }
}

/**
 * Assert that the operands of an elementwise operation share one shape
 */
export function assertSameShape(operation: string, expected: Shape, actual: Shape): void {
  if (!shapesEqual(expected, actual)) {
    throw new ShapeMismatchError(operation, expected, actual);
  }
}
