/**
 * Quadra: Rank-4 Tensors in TypeScript
 *
 * This example walks through creating, reading, transforming and comparing
 * Tensor4 values.
 *
 * Run with: npm run example examples/01-tensor4-basics.ts
 */

import { Scalar, Tensor4 } from '@quadra/core';

function main(): void {
  console.log('Quadra: Tensor4 Basics\n');
  console.log('='.repeat(50));

  // ============================================================================
  // 1. Creation
  // ============================================================================
  console.log('\n1. Creating tensors:');

  // Cells are filled in nesting order with indices 0, 1, 2, ...
  const counting = Tensor4.generate(1, 2, 2, 3, (i) => i);
  console.log(counting.format());
  console.log('shape:', counting.shape);

  // From nested data (copied, so the source array stays independent)
  const source = [[[[1, 2]], [[3, 4]]]];
  const fromData = Tensor4.from(source);
  source[0][0][0][0] = 100;
  console.log(fromData.toString());

  console.log(Tensor4.zeros(1, 1, 2, 2).toString());
  console.log(Tensor4.full(1, 1, 1, 3, 0.5).toString());

  // ============================================================================
  // 2. Indexed Access (1-based)
  // ============================================================================
  console.log('\n\n2. Reading and writing cells:');

  const grid = Tensor4.generate(2, 2, 2, 2, (i) => i);
  console.log('first cell:', grid.itemAt(1, 1, 1, 1));
  console.log('last cell:', grid.itemAt(2, 2, 2, 2));

  grid.setItem(1, 1, 1, 1, -1);
  console.log('after setItem:', grid.itemAt(1, 1, 1, 1));

  // ============================================================================
  // 3. Arithmetic
  // ============================================================================
  console.log('\n\n3. Elementwise arithmetic:');

  const a = Tensor4.generate(1, 1, 2, 2, (i) => i + 1);
  const b = Tensor4.full(1, 1, 2, 2, 10);

  console.log('a + b =', a.add(b).toString());
  console.log('a - b =', a.sub(b).toString());
  console.log('a * b =', a.mul(b).toString());
  console.log('a * 3 =', a.mul(3).toString());
  console.log('a * Scalar(0.5) =', a.mul(new Scalar(0.5)).toString());
  console.log('a / 4 =', a.div(4).toString());
  console.log('-a =', a.neg().toString());

  // ============================================================================
  // 4. Traversal
  // ============================================================================
  console.log('\n\n4. Traversal:');

  console.log('sum:', a.reduce((x, y) => x + y));
  console.log('any > 3:', a.any((v) => v > 3));
  console.log('all positive:', a.every((v) => v > 0));
  console.log('flattened:', a.toList());
  a.forEach((value, length, width, depth, depth2) => {
    console.log(`  [${length}, ${width}, ${depth}, ${depth2}] = ${value}`);
  });

  // ============================================================================
  // 5. Equality and Hashing
  // ============================================================================
  console.log('\n\n5. Structural equality:');

  const copy = a.copy();
  console.log('equals copy:', a.equals(copy));
  console.log('same hash:', a.hashCode() === copy.hashCode());

  // Tensors work as Map keys through their hash
  const seen = new Map<number, Tensor4>();
  seen.set(a.hashCode(), a);
  console.log('found by hash:', seen.get(copy.hashCode())?.equals(copy) ?? false);
}

main();
