import { describe, it, expect } from 'vitest';
import { Bench } from 'tinybench';
import { addTensor4Tasks, findUnstableTasks } from './tensor4-ops';
import { TENSOR4_SIZES } from '../utils/sizes';

describe('addTensor4Tasks', () => {
  it('should register every operation for every size', () => {
    const bench = addTensor4Tasks(new Bench());

    expect(bench.tasks).toHaveLength(TENSOR4_SIZES.length * 8);
    expect(bench.tasks[0]?.name).toBe('from tiny 2x2x2x2 (16 elements)');
  });
});

describe('findUnstableTasks', () => {
  it('should report tasks whose samples vary too much', () => {
    const tasks = [
      { name: 'steady', result: { samples: [3, 3, 3, 3] } },
      { name: 'noisy', result: { samples: [2, 4, 4, 4, 5, 5, 7, 9] } },
    ];
    expect(findUnstableTasks(tasks)).toEqual(['noisy']);
  });

  it('should skip tasks without enough samples', () => {
    const tasks = [{ name: 'single', result: { samples: [1] } }, { name: 'pending' }];
    expect(findUnstableTasks(tasks)).toEqual([]);
    expect(findUnstableTasks(new Bench().add('idle', () => undefined).tasks)).toEqual([]);
  });
});
