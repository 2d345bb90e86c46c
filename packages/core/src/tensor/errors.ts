/**
 * Error classes raised by tensor operations
 *
 * Every error is raised where it is detected and propagated unchanged; nothing
 * in the library catches or retries them.
 */

import type { Shape } from '../shape/types';

function describeShape(shape: Shape): string {
  return `[${shape.join(', ')}]`;
}

// =============================================================================
// Error Classes
// =============================================================================

/**
 * Base class for errors raised by tensor operations
 */
export class TensorError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'TensorError';
  }
}

/**
 * Error thrown when a 1-based coordinate falls outside `[1, size]`
 */
export class IndexOutOfRangeError extends TensorError {
  constructor(
    public readonly axis: string,
    public readonly index: number,
    public readonly size: number,
  ) {
    super(
      size === 0
        ? `Index ${String(index)} out of range for empty axis '${axis}'`
        : `Index ${String(index)} out of range for axis '${axis}' (expected 1..${size.toString()})`,
    );
    this.name = 'IndexOutOfRangeError';
  }
}

/**
 * Error thrown when the operands of an elementwise operation differ in shape
 */
export class ShapeMismatchError extends TensorError {
  constructor(
    public readonly operation: string,
    public readonly expected: Shape,
    public readonly actual: Shape,
  ) {
    super(
      `Cannot ${operation}: expected shape ${describeShape(expected)} but got ${describeShape(actual)}`,
    );
    this.name = 'ShapeMismatchError';
  }
}

/**
 * Error thrown when a container is converted into, or indexed as, a different rank
 */
export class RankMismatchError extends TensorError {
  constructor(
    public readonly operation: string,
    public readonly expectedRank: number,
    public readonly actual: Shape,
  ) {
    super(
      `Cannot ${operation}: expected rank ${expectedRank.toString()} but got rank ${actual.length.toString()} ${describeShape(actual)}`,
    );
    this.name = 'RankMismatchError';
  }
}

/**
 * Error thrown when an arithmetic operand is of a kind the operation does not accept
 */
export class UnsupportedOperandError extends TensorError {
  constructor(
    public readonly operation: string,
    public readonly operand: unknown,
  ) {
    super(`Unsupported operand for ${operation}: ${describeOperand(operand)}`);
    this.name = 'UnsupportedOperandError';
  }
}

/**
 * Error thrown when storage is jagged or requested sizes are not valid axis sizes
 */
export class InvalidShapeError extends TensorError {
  constructor(
    message: string,
    public readonly shape?: Shape,
  ) {
    super(message);
    this.name = 'InvalidShapeError';
  }
}

/**
 * Error thrown when an operation needs at least one item and the tensor has none
 */
export class EmptyTensorError extends TensorError {
  constructor(public readonly operation: string) {
    super(`Cannot ${operation} a tensor with no items`);
    this.name = 'EmptyTensorError';
  }
}

function describeOperand(operand: unknown): string {
  if (operand === null) {
    return 'null';
  }
  if (typeof operand === 'object') {
    const ctor: unknown = Reflect.getPrototypeOf(operand)?.constructor;
    return typeof ctor === 'function' && ctor.name !== '' ? ctor.name : 'object';
  }
  return typeof operand;
}
