/**
 * Generation protocol and the generic rank-N container it produces
 *
 * `generateTensor` fills a dense container of any supported rank from a flat
 * index generator. Fixed-rank tensors convert the result into their own
 * storage layout (see `GenericTensor#toTensor4`).
 */

import { assertValidDims, computeSize, shapesEqual } from '../shape/runtime';
import type { Shape, Shape4 } from '../shape/types';
import { EmptyTensorError, IndexOutOfRangeError, InvalidShapeError, RankMismatchError } from './errors';
import { formatInline, formatNested, type FormatOptions } from './format';
import { hashValues } from './hash';
import { Tensor4 } from './tensor4';
import { sameValue } from './utils';
import type {
  IndexGenerator,
  MapFn,
  NestedNumbers,
  PredicateFn,
  ReduceFn,
  Storage4,
  TensorBase,
} from './types';

export interface GenerateOptions {
  /** Name of each axis, outermost first; defaults to `dim0`, `dim1`, ... */
  axisNames?: readonly string[];
}

/**
 * Generate a dense tensor of the given shape
 *
 * The generator is called once per cell with indices `0..n-1`, in row-major
 * order (the outermost axis varies slowest).
 *
 * @example
 * const t = generateTensor([2, 3] as const, (i) => i * 10);
 * t.toList(); // [0, 10, 20, 30, 40, 50]
 *
 * @throws InvalidShapeError when a size is not a positive integer or limits are exceeded
 */
export function generateTensor<S extends Shape>(
  dims: S,
  generator: IndexGenerator,
  options: GenerateOptions = {},
): GenericTensor<S> {
  assertValidDims(dims);
  const values = Array.from({ length: computeSize(dims) }, (_, index) => generator(index));
  return new GenericTensor(dims, values, options.axisNames);
}

/**
 * Dense row-major container of any rank
 *
 * @template S - Shape tuple
 */
export class GenericTensor<S extends Shape = Shape> implements TensorBase<GenericTensor<S>> {
  readonly axisNames: readonly string[];
  private readonly strides: readonly number[];

  constructor(
    readonly dims: S,
    private readonly values: number[],
    axisNames?: readonly string[],
  ) {
    const size = computeSize(dims);
    if (values.length !== size) {
      throw new InvalidShapeError(
        `Expected ${size.toString()} values for shape [${dims.join(', ')}] but got ${values.length.toString()}`,
        dims,
      );
    }
    if (axisNames !== undefined && axisNames.length !== dims.length) {
      throw new InvalidShapeError(
        `Expected ${dims.length.toString()} axis names but got ${axisNames.length.toString()}`,
        dims,
      );
    }
    this.axisNames = axisNames ?? dims.map((_, i) => `dim${i.toString()}`);
    this.strides = computeStrides(dims);
  }

  get rank(): number {
    return this.dims.length;
  }

  get itemsCount(): number {
    return this.values.length;
  }

  /**
   * Ordered record from axis name to size
   */
  get shape(): Readonly<Record<string, number>> {
    const record: Record<string, number> = {};
    this.axisNames.forEach((name, i) => {
      record[name] = this.dims[i] ?? 0;
    });
    return record;
  }

  /**
   * Value at 1-based coordinates, one per axis
   */
  itemAt(...indices: number[]): number {
    if (indices.length !== this.rank) {
      throw new RankMismatchError('index tensor', this.rank, indices);
    }
    let offset = 0;
    indices.forEach((index, axis) => {
      const size = this.dims[axis] ?? 0;
      if (!Number.isInteger(index) || index < 1 || index > size) {
        throw new IndexOutOfRangeError(this.axisNames[axis] ?? `dim${axis.toString()}`, index, size);
      }
      offset += (index - 1) * (this.strides[axis] ?? 0);
    });
    return this.values[offset] ?? Number.NaN;
  }

  map(f: MapFn): GenericTensor<S> {
    return new GenericTensor(
      this.dims,
      this.values.map((v) => f(v)),
      this.axisNames,
    );
  }

  reduce(f: ReduceFn): number {
    if (this.values.length === 0) {
      throw new EmptyTensorError('reduce');
    }
    return this.values.reduce((previous, next) => f(previous, next));
  }

  any(f: PredicateFn): boolean {
    return this.values.some((v) => f(v));
  }

  every(f: PredicateFn): boolean {
    return this.values.every((v) => f(v));
  }

  toList(): number[] {
    return this.values.slice();
  }

  copy(): GenericTensor<S> {
    return new GenericTensor(this.dims, this.values.slice(), this.axisNames);
  }

  equals(other: unknown): boolean {
    if (!(other instanceof GenericTensor) || !shapesEqual(this.dims, other.dims)) {
      return false;
    }
    const theirs = other.values;
    return this.values.every((v, i) => sameValue(v, theirs[i]));
  }

  hashCode(): number {
    return hashValues(this.dims, this.values);
  }

  /**
   * Values rebuilt into nested arrays following the shape
   */
  toNested(): NestedNumbers {
    return nest(this.values, this.dims, 0);
  }

  /**
   * Storage of a rank-4 container in `length → width → depth → depth2` layout
   *
   * @throws RankMismatchError unless the rank is 4
   */
  toStorage4(): Storage4 {
    const [length, width, depth, depth2] = this.dims;
    if (
      this.rank !== 4 ||
      length === undefined ||
      width === undefined ||
      depth === undefined ||
      depth2 === undefined
    ) {
      throw new RankMismatchError('convert to Tensor4', 4, this.dims);
    }

    let offset = 0;
    const storage: Storage4 = [];
    for (let l = 0; l < length; l++) {
      const row: number[][][] = [];
      for (let w = 0; w < width; w++) {
        const column: number[][] = [];
        for (let d = 0; d < depth; d++) {
          column.push(this.values.slice(offset, offset + depth2));
          offset += depth2;
        }
        row.push(column);
      }
      storage.push(row);
    }
    return storage;
  }

  /**
   * Convert a rank-4 container into a Tensor4, keeping a literal shape when known
   *
   * @throws RankMismatchError unless the rank is 4
   */
  toTensor4<T extends Shape4>(this: GenericTensor<T>): Tensor4<T>;
  toTensor4(): Tensor4;
  toTensor4(): Tensor4 {
    return new Tensor4(this.toStorage4());
  }

  toString(): string {
    return `GenericTensor(${formatInline(this.toNested())})`;
  }

  format(options?: FormatOptions): string {
    return formatNested('GenericTensor', this.toNested(), this.dims, options);
  }
}

/**
 * Row-major strides (in items) for a shape
 */
function computeStrides(dims: Shape): number[] {
  const strides: number[] = [];
  let stride = 1;
  for (let i = dims.length - 1; i >= 0; i--) {
    strides.unshift(stride);
    stride *= dims[i] ?? 0;
  }
  return strides;
}

function nest(values: readonly number[], dims: Shape, start: number): NestedNumbers {
  const [first, ...rest] = dims;
  if (first === undefined) {
    return values[start] ?? Number.NaN;
  }
  const span = computeSize(rest);
  return Array.from({ length: first }, (_, i) => nest(values, rest, start + i * span));
}
