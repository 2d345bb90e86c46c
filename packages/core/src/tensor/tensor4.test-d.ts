/**
 * Type tests for Tensor4 shape tracking
 */

import { expectTypeOf } from 'expect-type';
import type { Shape4 } from '../shape/types';
import { generateTensor } from './generic';
import { Tensor4 } from './tensor4';

{
  const t = Tensor4.generate(1, 1, 1, 2, (i) => i);
  expectTypeOf(t).toEqualTypeOf<Tensor4<readonly [1, 1, 1, 2]>>();
  expectTypeOf(Tensor4.zeros(2, 3, 4, 5)).toEqualTypeOf<Tensor4<readonly [2, 3, 4, 5]>>();
  expectTypeOf(t.add(t)).toEqualTypeOf<Tensor4<readonly [1, 1, 1, 2]>>();
  expectTypeOf(t.mul(2)).toEqualTypeOf<Tensor4<readonly [1, 1, 1, 2]>>();
  expectTypeOf(t.div(2)).toEqualTypeOf<Tensor4<readonly [1, 1, 1, 2]>>();
  expectTypeOf(t.itemAt(1, 1, 1, 1)).toEqualTypeOf<number>();
}

{
  // Tensors built from nested data carry a dynamic shape
  const dynamic = Tensor4.from([[[[1, 2]]]]);
  expectTypeOf(dynamic).toEqualTypeOf<Tensor4<Shape4>>();

  const fixed = Tensor4.ones(1, 1, 1, 2);
  expectTypeOf(fixed.add(dynamic)).toEqualTypeOf<Tensor4<readonly [1, 1, 1, 2]>>();
}

{
  // Mismatched literal shapes turn the parameter into a readable error
  const a = Tensor4.ones(2, 2, 2, 2);
  const b = Tensor4.ones(1, 2, 2, 2);
  expectTypeOf(a.add<readonly [1, 2, 2, 2]>)
    .parameter(0)
    .toEqualTypeOf<'[Quadra ❌] Cannot add tensors with shapes [2, 2, 2, 2] and [1, 2, 2, 2]. Shapes must match exactly.'>();
  expectTypeOf(a.sub<readonly [1, 2, 2, 2]>)
    .parameter(0)
    .toEqualTypeOf<'[Quadra ❌] Cannot subtract tensors with shapes [2, 2, 2, 2] and [1, 2, 2, 2]. Shapes must match exactly.'>();
  expectTypeOf(b).not.toMatchTypeOf<Parameters<typeof a.add<readonly [1, 2, 2, 2]>>[0]>();
}

{
  // The generic bridge keeps literal rank-4 shapes
  expectTypeOf(generateTensor([1, 1, 1, 2] as const, (i) => i).toTensor4()).toEqualTypeOf<
    Tensor4<readonly [1, 1, 1, 2]>
  >();
  expectTypeOf(generateTensor([1, 2, 1, 2], (i) => i).toTensor4()).toEqualTypeOf<Tensor4<Shape4>>();
}
