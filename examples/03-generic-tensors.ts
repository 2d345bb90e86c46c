/**
 * The generation protocol beyond rank 4
 *
 * `generateTensor` fills a container of any rank from a flat index; rank-4
 * results convert into Tensor4.
 *
 * Run with: npm run example examples/03-generic-tensors.ts
 */

import { RankMismatchError, generateTensor } from '@quadra/core';

function main(): void {
  // A 3 x 4 multiplication table
  const table = generateTensor([3, 4] as const, (i) => (Math.floor(i / 4) + 1) * ((i % 4) + 1), {
    axisNames: ['row', 'col'],
  });
  console.log(table.format());
  console.log('shape:', table.shape);
  console.log('row 3, col 4:', table.itemAt(3, 4));

  // Rank 4 converts into a Tensor4
  const volume = generateTensor([1, 2, 2, 2], (i) => i * i);
  const t = volume.toTensor4();
  console.log(t.format());
  console.log('equal values:', t.toList().join(',') === volume.toList().join(','));

  // Other ranks refuse
  try {
    table.toTensor4();
  } catch (error) {
    if (error instanceof RankMismatchError) {
      console.log(error.message);
    } else {
      throw error;
    }
  }
}

main();
