// Re-export tinybench types
export { Bench } from 'tinybench';
export type { Options, Task, TaskResult } from 'tinybench';

// Export utilities
export * from './utils/config';
export * from './utils/sizes';
export * from './utils/data';
export * from './utils/formatting';
export * from './utils/tracking';

// Export runners
export { addTensor4Tasks, findUnstableTasks, runTensor4Benchmarks } from './runners/tensor4-ops';
