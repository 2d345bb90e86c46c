/**
 * Type-level shape operations for compile-time tensor shape validation
 *
 * Shapes are readonly tuples of axis sizes. Literal sizes (`readonly [2, 3, 4, 5]`)
 * are checked at compile time; `number` sizes behave as wildcards whose
 * agreement is only known at runtime.
 */

import type { Multiply } from 'ts-arithmetic';

// =============================================================================
// Basic Shape Types
// =============================================================================

/**
 * A tensor shape represented as a readonly tuple of axis sizes
 */
export type Shape = readonly number[];

/**
 * Shape of a rank-4 tensor, outer to inner: length, width, depth, depth2
 */
export type Shape4 = readonly [number, number, number, number];

/**
 * Names of the four axes of a rank-4 tensor, in nesting order
 */
export type AxisName = 'length' | 'width' | 'depth' | 'depth2';

/**
 * Ordered record view of a rank-4 shape
 *
 * @example
 * type R = ShapeRecord4<readonly [1, 1, 1, 2]>;
 * // { readonly length: 1; readonly width: 1; readonly depth: 1; readonly depth2: 2 }
 */
export interface ShapeRecord4<S extends Shape4 = Shape4> {
  readonly length: S[0];
  readonly width: S[1];
  readonly depth: S[2];
  readonly depth2: S[3];
}

/**
 * Maximum supported tensor rank (number of dimensions)
 */
export type MaxRank = 8;

// =============================================================================
// Shape Arithmetic and Utilities
// =============================================================================

/**
 * Calculate the product of all dimensions in a shape (total number of elements)
 *
 * @example
 * type Size = Product<[2, 3, 4]> // 24
 */
export type Product<T extends Shape> = T extends readonly []
  ? 1
  : T extends readonly [infer Head extends number, ...infer Tail extends Shape]
    ? number extends Head
      ? number
      : Head extends 0
        ? 0
        : Product<Tail> extends infer P extends number
          ? number extends P
            ? number
            : Multiply<Head, P>
          : never
    : number;

/**
 * Number of items held by a rank-4 tensor of shape S
 *
 * @example
 * type N = ItemsCount<readonly [2, 3, 4, 5]> // 120
 * type Unknown = ItemsCount<Shape4> // number
 */
export type ItemsCount<S extends Shape4> = Product<S>;

/**
 * Get the rank of a shape
 *
 * @example
 * type Rank = Rank<[2, 3, 4]> // 3
 */
export type Rank<T extends Shape> = T['length'];

// =============================================================================
// Shape Compatibility
// =============================================================================

/**
 * Compare two axis sizes, treating `number` as a wildcard
 */
type SameDim<A extends number, B extends number> = number extends A
  ? true
  : number extends B
    ? true
    : [A] extends [B]
      ? [B] extends [A]
        ? true
        : false
      : false;

/**
 * Check whether two shapes can meet in an elementwise operation
 *
 * Shapes must have the same rank and agree on every literal dimension.
 *
 * @example
 * type Ok = IsSameShape<readonly [2, 3], readonly [2, 3]>;       // true
 * type Unknown = IsSameShape<readonly [2, number], readonly [2, 3]>; // true
 * type Bad = IsSameShape<readonly [2, 3], readonly [3, 2]>;      // false
 */
export type IsSameShape<A extends Shape, B extends Shape> = A extends readonly []
  ? B extends readonly []
    ? true
    : false
  : A extends readonly [infer HA extends number, ...infer TA extends Shape]
    ? B extends readonly [infer HB extends number, ...infer TB extends Shape]
      ? SameDim<HA, HB> extends true
        ? IsSameShape<TA, TB>
        : false
      : false
    : true;

/**
 * Convert a shape to a readable string for error messages
 *
 * @example
 * type S = ShapeToString<readonly [2, 3, 4]> // "2, 3, 4"
 */
export type ShapeToString<S extends Shape> = S extends readonly []
  ? ''
  : S extends readonly [infer H extends number]
    ? `${H}`
    : S extends readonly [infer H extends number, ...infer T extends Shape]
      ? `${H}, ${ShapeToString<T>}`
      : string;

/**
 * Branded error message produced when two literal shapes cannot meet
 *
 * @example
 * type E = ShapeMismatchMessage<'add', readonly [2, 2], readonly [1, 2]>;
 * // "[Quadra ❌] Cannot add tensors with shapes [2, 2] and [1, 2]. Shapes must match exactly."
 */
export type ShapeMismatchMessage<
  Op extends string,
  A extends Shape,
  B extends Shape,
> = `[Quadra ❌] Cannot ${Op} tensors with shapes [${ShapeToString<A>}] and [${ShapeToString<B>}]. Shapes must match exactly.`;
