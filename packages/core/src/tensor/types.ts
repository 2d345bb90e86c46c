/**
 * Type utilities for tensor operations
 *
 * Storage layouts, callback signatures and the capability set every
 * fixed-rank tensor implements.
 */

import type { Shape } from '../shape/types';

/**
 * Mutable storage of a rank-4 tensor: length → width → depth → depth2
 */
export type Storage4 = number[][][][];

/**
 * Readonly nested input accepted by `Tensor4.from`
 */
export type ReadonlyStorage4 = readonly (readonly (readonly (readonly number[])[])[])[];

/**
 * Arbitrarily nested numbers, as produced by containers of any rank
 */
export type NestedNumbers = number | NestedNumbers[];

/**
 * Value generator used by the generation protocol
 *
 * Receives the sequential index of the cell being filled, starting at 0 and
 * advancing by one per cell in nesting order.
 */
export type IndexGenerator = (index: number) => number;

export type MapFn = (value: number) => number;
export type ReduceFn = (previous: number, next: number) => number;
export type PredicateFn = (value: number) => boolean;

/**
 * Capabilities shared by every tensor rank
 *
 * @template Self - The concrete tensor type returned by shape-preserving operations
 */
export interface TensorBase<Self> {
  /** Number of axes */
  readonly rank: number;

  /** Axis sizes, outermost first */
  readonly dims: Shape;

  /** Product of the axis sizes */
  readonly itemsCount: number;

  /** New tensor of identical shape with `f` applied to every value */
  map(f: MapFn): Self;

  /** Left fold over the values in nesting order; throws on an empty tensor */
  reduce(f: ReduceFn): number;

  any(f: PredicateFn): boolean;

  every(f: PredicateFn): boolean;

  /** Values flattened in nesting order */
  toList(): number[];

  copy(): Self;

  equals(other: unknown): boolean;

  hashCode(): number;
}
