/**
 * Type tests for the shape system
 *
 * These tests validate the type-level shape operations at compile time.
 */

import { expectTypeOf } from 'expect-type';
import type {
  IsSameShape,
  ItemsCount,
  Product,
  Rank,
  Shape4,
  ShapeMismatchMessage,
  ShapeRecord4,
  ShapeToString,
} from './types';

// =============================================================================
// Shape Arithmetic
// =============================================================================

{
  expectTypeOf<Product<readonly []>>().toEqualTypeOf<1>();
  expectTypeOf<Product<readonly [2, 3, 4]>>().toEqualTypeOf<24>();
  expectTypeOf<Product<readonly [2, 0, 4]>>().toEqualTypeOf<0>();
  expectTypeOf<Product<readonly [2, number]>>().toEqualTypeOf<number>();
  expectTypeOf<Product<readonly number[]>>().toEqualTypeOf<number>();
}

{
  expectTypeOf<ItemsCount<readonly [2, 3, 4, 5]>>().toEqualTypeOf<120>();
  expectTypeOf<ItemsCount<Shape4>>().toEqualTypeOf<number>();
  expectTypeOf<Rank<readonly [1, 1, 1, 2]>>().toEqualTypeOf<4>();
}

{
  expectTypeOf<ShapeRecord4<readonly [1, 2, 3, 4]>>().toEqualTypeOf<{
    readonly length: 1;
    readonly width: 2;
    readonly depth: 3;
    readonly depth2: 4;
  }>();
}

// =============================================================================
// Shape Compatibility
// =============================================================================

{
  expectTypeOf<IsSameShape<readonly [2, 3], readonly [2, 3]>>().toEqualTypeOf<true>();
  expectTypeOf<IsSameShape<readonly [2, 3], readonly [3, 2]>>().toEqualTypeOf<false>();
  expectTypeOf<IsSameShape<readonly [2, 3], readonly [2, 3, 1]>>().toEqualTypeOf<false>();
  expectTypeOf<IsSameShape<readonly [2, number], readonly [2, 3]>>().toEqualTypeOf<true>();
  expectTypeOf<IsSameShape<Shape4, readonly [1, 1, 1, 2]>>().toEqualTypeOf<true>();
}

{
  expectTypeOf<ShapeToString<readonly [2, 3, 4]>>().toEqualTypeOf<'2, 3, 4'>();
  expectTypeOf<
    ShapeMismatchMessage<'add', readonly [2, 2], readonly [1, 2]>
  >().toEqualTypeOf<'[Quadra ❌] Cannot add tensors with shapes [2, 2] and [1, 2]. Shapes must match exactly.'>();
}
