/**
 * Rank-4 dense tensor
 *
 * Values live in four nested arrays, outer to inner `length` (rows) → `width`
 * (columns) → `depth` → `depth2`. Public coordinates are 1-based and inclusive;
 * storage is 0-based.
 */

import { DivisionByZeroError } from '../number/errors';
import type { Scalar } from '../number/scalar';
import { AXIS_NAMES, assertSameShape, shapesEqual, toShapeRecord4 } from '../shape/runtime';
import type { AxisName, IsSameShape, Shape4, ShapeMismatchMessage, ShapeRecord4 } from '../shape/types';
import { EmptyTensorError, IndexOutOfRangeError, UnsupportedOperandError } from './errors';
import { formatInline, formatNested, type FormatOptions } from './format';
import { generateTensor } from './generic';
import { hashValues } from './hash';
import { classifyDivisor, classifyOperand, operandValue } from './operand';
import type {
  IndexGenerator,
  MapFn,
  PredicateFn,
  ReadonlyStorage4,
  ReduceFn,
  Storage4,
  TensorBase,
} from './types';
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

/**
 * Tensor operand of a binary operation, or a readable error when literal shapes differ
 *
 * @example
 * // Tensor4<readonly [2, 2, 2, 2]>#add(Tensor4<readonly [1, 2, 2, 2]>) expects:
 * // "[Quadra ❌] Cannot add tensors with shapes [2, 2, 2, 2] and [1, 2, 2, 2]. Shapes must match exactly."
 */
export type TensorOperand<S extends Shape4, T extends Shape4, Op extends string> =
  IsSameShape<S, T> extends true ? Tensor4<T> : ShapeMismatchMessage<Op, S, T>;

/**
 * Right-hand operands accepted by `Tensor4#mul`
 */
export type MulOperand<S extends Shape4, T extends Shape4> =
  | number
  | Scalar
  | TensorOperand<S, T, 'multiply'>;

/**
 * Right-hand operands accepted by `Tensor4#div`
 */
export type DivOperand = number | Scalar;

export type ForEachFn = (
  value: number,
  length: number,
  width: number,
  depth: number,
  depth2: number,
) => void;

/**
 * Dense rank-4 tensor with 1-based indexing and copy-on-write arithmetic
 *
 * Construction takes exclusive ownership of the supplied storage; use
 * `Tensor4.from` to copy data the caller keeps using. Every operation except
 * `setItem` leaves the receiver and its operands untouched.
 *
 * @template S - Shape tuple `[length, width, depth, depth2]`; literal when known
 */
export class Tensor4<S extends Shape4 = Shape4> implements TensorBase<Tensor4<S>> {
  /** Compile-time shape carrier; never set at runtime */
  declare readonly __shape: S;

  readonly rank = 4;

  private readonly _data: Storage4;

  /**
   * @throws InvalidShapeError when `data` is jagged
   */
  constructor(data: Storage4) {
    assertRectangular(data);
    this._data = data;
  }

  // =============================================================================
  // Creation
  // =============================================================================

  /**
   * Create a tensor from a deep copy of `data`
   */
  static from(data: ReadonlyStorage4): Tensor4 {
    return new Tensor4(copyStorage(data));
  }

  /**
   * Generate a tensor whose cells are filled by `generator`
   *
   * The generator receives a sequential index starting at 0, once per cell, in
   * nesting order `length → width → depth → depth2`.
   *
   * @example
   * const t = Tensor4.generate(1, 1, 1, 2, (i) => i);
   * t.itemAt(1, 1, 1, 2); // 1
   *
   * @throws InvalidShapeError when a size is not a positive integer
   */
  static generate<L extends number, W extends number, D extends number, D2 extends number>(
    length: L,
    width: W,
    depth: D,
    depth2: D2,
    generator: IndexGenerator,
  ): Tensor4<readonly [L, W, D, D2]> {
    return generateTensor([length, width, depth, depth2] as const, generator, {
      axisNames: AXIS_NAMES,
    }).toTensor4();
  }

  static zeros<L extends number, W extends number, D extends number, D2 extends number>(
    length: L,
    width: W,
    depth: D,
    depth2: D2,
  ): Tensor4<readonly [L, W, D, D2]> {
    return Tensor4.full(length, width, depth, depth2, 0);
  }

  static ones<L extends number, W extends number, D extends number, D2 extends number>(
    length: L,
    width: W,
    depth: D,
    depth2: D2,
  ): Tensor4<readonly [L, W, D, D2]> {
    return Tensor4.full(length, width, depth, depth2, 1);
  }

  static full<L extends number, W extends number, D extends number, D2 extends number>(
    length: L,
    width: W,
    depth: D,
    depth2: D2,
    value: number,
  ): Tensor4<readonly [L, W, D, D2]> {
    return Tensor4.generate(length, width, depth, depth2, () => value);
  }

  // =============================================================================
  // Shape
  // =============================================================================

  /** Number of rows */
  get length(): number {
    return this._data.length;
  }

  /** Number of columns */
  get width(): number {
    return readExtents(this._data)[1];
  }

  get depth(): number {
    return readExtents(this._data)[2];
  }

  get depth2(): number {
    return readExtents(this._data)[3];
  }

  /** Axis sizes as `[length, width, depth, depth2]` */
  get dims(): Shape4 {
    return readExtents(this._data);
  }

  get shape(): ShapeRecord4 {
    return toShapeRecord4(this.dims);
  }

  get itemsCount(): number {
    const [length, width, depth, depth2] = this.dims;
    return length * width * depth * depth2;
  }

  /**
   * Independent deep copy of the stored values
   */
  get data(): Storage4 {
    return copyStorage(this._data);
  }

  // =============================================================================
  // Indexed Access
  // =============================================================================

  /**
   * Value at the given 1-based coordinates
   *
   * @throws IndexOutOfRangeError when a coordinate is outside `[1, axis size]`
   */
  itemAt(length: number, width: number, depth: number, depth2: number): number {
    this.checkIndices(length, width, depth, depth2);
    return this._data[length - 1][width - 1][depth - 1][depth2 - 1];
  }

  /**
   * Store `value` at the given 1-based coordinates, in place
   *
   * @returns the stored value
   * @throws IndexOutOfRangeError when a coordinate is outside `[1, axis size]`
   */
  setItem(length: number, width: number, depth: number, depth2: number, value: number): number {
    this.checkIndices(length, width, depth, depth2);
    this._data[length - 1][width - 1][depth - 1][depth2 - 1] = value;
    return value;
  }

  private checkIndices(length: number, width: number, depth: number, depth2: number): void {
    const dims = this.dims;
    [length, width, depth, depth2].forEach((index, axis) => {
      const size = dims[axis] ?? 0;
      if (!Number.isInteger(index) || index < 1 || index > size) {
        throw new IndexOutOfRangeError(axisName(axis), index, size);
      }
    });
  }

  // =============================================================================
  // Functional Traversal
  // =============================================================================

  map(f: MapFn): Tensor4<S> {
    return new Tensor4<S>(mapStorage(this._data, f));
  }

  /**
   * Left fold over the values in nesting order
   *
   * @throws EmptyTensorError when the tensor holds no items
   */
  reduce(f: ReduceFn): number {
    const values = this.toList();
    if (values.length === 0) {
      throw new EmptyTensorError('reduce');
    }
    return values.reduce((previous, next) => f(previous, next));
  }

  any(f: PredicateFn): boolean {
    for (const value of iterateStorage(this._data)) {
      if (f(value)) {
        return true;
      }
    }
    return false;
  }

  every(f: PredicateFn): boolean {
    for (const value of iterateStorage(this._data)) {
      if (!f(value)) {
        return false;
      }
    }
    return true;
  }

  /**
   * Visit every cell with its value and 1-based coordinates, in nesting order
   */
  forEach(f: ForEachFn): void {
    this._data.forEach((row, l) => {
      row.forEach((column, w) => {
        column.forEach((cell, d) => {
          cell.forEach((value, dd) => {
            f(value, l + 1, w + 1, d + 1, dd + 1);
          });
        });
      });
    });
  }

  /**
   * Values flattened in nesting order `length → width → depth → depth2`
   */
  toList(): number[] {
    return flattenStorage(this._data);
  }

  // =============================================================================
  // Elementwise Arithmetic
  // =============================================================================

  /**
   * Elementwise sum
   *
   * @throws ShapeMismatchError when the shapes differ
   */
  add<T extends Shape4>(other: TensorOperand<S, T, 'add'>): Tensor4<S> {
    return this.combine('add', expectTensor4('add', other), (a, b) => a + b);
  }

  /**
   * Elementwise difference, computed as `this + (-other)`
   *
   * @throws ShapeMismatchError when the shapes differ
   */
  sub<T extends Shape4>(other: TensorOperand<S, T, 'subtract'>): Tensor4<S> {
    const negated = expectTensor4('subtract', other).neg();
    return this.combine('subtract', negated, (a, b) => a + b);
  }

  neg(): Tensor4<S> {
    return this.map((v) => -v);
  }

  /**
   * Multiply by a number, a Scalar or a tensor of the same shape (elementwise)
   *
   * @throws ShapeMismatchError when a tensor operand differs in shape
   * @throws UnsupportedOperandError for any other operand
   */
  mul<T extends Shape4 = Shape4>(other: MulOperand<S, T>): Tensor4<S> {
    const operand = classifyOperand('multiply', other, isTensor4);
    switch (operand.kind) {
      case 'number':
        return this.map((v) => v * operand.value);
      case 'scalar':
        return this.map((v) => v * operand.scalar.data);
      case 'tensor':
        return this.combine('multiply', operand.tensor, (a, b) => a * b);
      default:
        return assertExhaustiveSwitch(operand);
    }
  }

  /**
   * Divide by a number or a Scalar, computed as `this * (1 / divisor)`
   *
   * @throws DivisionByZeroError when the divisor is zero
   * @throws UnsupportedOperandError for tensors and any other operand
   */
  div(other: DivOperand): Tensor4<S> {
    const divisor = operandValue(classifyDivisor(other));
    if (divisor === 0) {
      throw new DivisionByZeroError(`tensor of shape [${this.dims.join(', ')}]`);
    }
    return this.mul(1 / divisor);
  }

  /**
   * Copy this tensor, then fold each value of `other` into the copy in place
   */
  private combine(
    operation: string,
    other: Tensor4,
    f: (left: number, right: number) => number,
  ): Tensor4<S> {
    assertSameShape(operation, this.dims, other.dims);
    const result = this.copy();
    const target = result._data;
    const source = other._data;
    const [length, width, depth, depth2] = this.dims;

    for (let l = 0; l < length; l++) {
      for (let w = 0; w < width; w++) {
        for (let d = 0; d < depth; d++) {
          const cell = target[l][w][d];
          const operand = source[l][w][d];
          for (let dd = 0; dd < depth2; dd++) {
            cell[dd] = f(cell[dd], operand[dd]);
          }
        }
      }
    }
    return result;
  }

  copy(): Tensor4<S> {
    return new Tensor4<S>(copyStorage(this._data));
  }

  // =============================================================================
  // Equality & Representation
  // =============================================================================

  /**
   * Structural equality: same shape and equal values in nesting order
   *
   * Values compare with `sameValue`: `0` equals `-0` and NaN equals NaN, so
   * `t.equals(t)` holds for every tensor.
   */
  equals(other: unknown): boolean {
    if (!isTensor4(other) || !shapesEqual(this.dims, other.dims)) {
      return false;
    }
    const theirs = other._data;
    return this._data.every((row, l) =>
      row.every((column, w) =>
        column.every((cell, d) => cell.every((value, dd) => sameValue(value, theirs[l][w][d][dd]))),
      ),
    );
  }

  /**
   * Hash for hash-based containers; equal tensors hash equal
   */
  hashCode(): number {
    return hashValues(this.dims, iterateStorage(this._data));
  }

  toString(): string {
    return `Tensor4(${formatInline(this._data)})`;
  }

  /**
   * Multi-line rendering with long axes truncated
   *
   * @example
   * Tensor4.generate(1, 1, 2, 2, (i) => i).format();
   * // Tensor4([[[[0, 1],
   * //            [2, 3]]]])
   */
  format(options?: FormatOptions): string {
    return formatNested('Tensor4', this._data, this.dims, options);
  }
}

/**
 * Type guard for rank-4 tensors
 */
export function isTensor4(value: unknown): value is Tensor4 {
  return value instanceof Tensor4;
}

function expectTensor4(operation: string, value: unknown): Tensor4 {
  if (!isTensor4(value)) {
    throw new UnsupportedOperandError(operation, value);
  }
  return value;
}

function axisName(axis: number): AxisName {
  return AXIS_NAMES[axis] ?? 'length';
}
