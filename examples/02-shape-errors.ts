/**
 * Shape errors at compile time and at runtime
 *
 * Run with: npm run example examples/02-shape-errors.ts
 */

import {
  DivisionByZeroError,
  IndexOutOfRangeError,
  ShapeMismatchError,
  Tensor4,
  TensorError,
} from '@quadra/core';

function attempt(label: string, operation: () => unknown): void {
  try {
    operation();
    console.log(`${label}: ok`);
  } catch (error) {
    if (error instanceof TensorError || error instanceof DivisionByZeroError) {
      console.log(`${label}: ${error.name}: ${error.message}`);
      return;
    }
    throw error;
  }
}

function main(): void {
  // Literal shapes are tracked in the type
  const a = Tensor4.ones(2, 2, 2, 2);
  const b = Tensor4.ones(1, 2, 2, 2);

  // Adding tensors with different literal shapes
  // a.add(b);
  //       ^ error: [Quadra ❌] Cannot add tensors with shapes [2, 2, 2, 2] and [1, 2, 2, 2]. Shapes must match exactly.
  // Error is detected at compile time when both shapes are literal!
  console.log(a.shape, b.shape);

  // Tensors built from nested data have a dynamic shape, so the check moves to runtime
  const dynamic = Tensor4.from([[[[1, 2]]]]);
  attempt('add mismatched', () => a.add(dynamic));

  // Runtime failures carry structured context
  try {
    a.itemAt(3, 1, 1, 1);
  } catch (error) {
    if (error instanceof IndexOutOfRangeError) {
      console.log(`axis=${error.axis} index=${error.index} size=${error.size}`);
    }
  }

  try {
    a.sub(dynamic);
  } catch (error) {
    if (error instanceof ShapeMismatchError) {
      console.log(`expected [${error.expected.join(', ')}], got [${error.actual.join(', ')}]`);
    }
  }

  attempt('divide by zero', () => a.div(0));
  attempt('jagged data', () => Tensor4.from([[[[1, 2], [3]]]]));
  attempt('zero-sized axis', () => Tensor4.generate(1, 0, 1, 1, () => 0));

  // Operands arriving from untyped code are classified at runtime
  attempt('multiply by string', () => Reflect.apply(a.mul, a, ['two']));
}

main();
