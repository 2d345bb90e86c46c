/**
 * Standalone Tensor4 benchmark runner using tinybench directly
 *
 * Gives more control over the benchmarking process and result formatting
 * than `vitest bench`. Run with `npm run bench:run`.
 */

import { pathToFileURL } from 'node:url';
import { Bench } from 'tinybench';
import { Scalar, Tensor4 } from '@quadra/core';
import {
  analyzeResults,
  getBenchmarkConfig,
  getBenchmarkRecommendations,
  getProfileName,
} from '../utils/config';
import { generateRandomData } from '../utils/data';
import { exportForTracking, formatBenchResults, formatIndividualResults } from '../utils/formatting';
import { TENSOR4_SIZES, formatSize } from '../utils/sizes';
import { DEFAULT_HISTORY_PATH, compareWithHistory, saveBenchmarkHistory } from '../utils/tracking';

/**
 * Register creation, arithmetic and traversal tasks for every benchmark size
 */
export function addTensor4Tasks(bench: Bench): Bench {
  for (const size of TENSOR4_SIZES) {
    const [length, width, depth, depth2] = size.shape;
    const data = generateRandomData(size.shape);
    const a = Tensor4.from(data);
    const b = Tensor4.from(generateRandomData(size.shape));
    const label = formatSize(size);

    bench
      .add(`from ${label}`, () => {
        Tensor4.from(data);
      })
      .add(`generate ${label}`, () => {
        Tensor4.generate(length, width, depth, depth2, (i) => i);
      })
      .add(`add ${label}`, () => {
        a.add(b);
      })
      .add(`sub ${label}`, () => {
        a.sub(b);
      })
      .add(`mul scalar ${label}`, () => {
        a.mul(new Scalar(2));
      })
      .add(`div ${label}`, () => {
        a.div(3);
      })
      .add(`reduce ${label}`, () => {
        a.reduce((x, y) => x + y);
      })
      .add(`hashCode ${label}`, () => {
        a.hashCode();
      });
  }
  return bench;
}

/**
 * Names of tasks whose latency samples are too noisy to trust
 *
 * Tasks with fewer than two samples cannot be judged and are skipped.
 */
export function findUnstableTasks(
  tasks: Iterable<{ readonly name: string; readonly result?: { readonly samples: readonly number[] } }>,
): string[] {
  const unstable: string[] = [];
  for (const task of tasks) {
    const samples = task.result?.samples ?? [];
    if (samples.length >= 2 && !analyzeResults(samples).isStable) {
      unstable.push(task.name);
    }
  }
  return unstable;
}

export async function runTensor4Benchmarks(): Promise<Bench> {
  console.log('🚀 Running Tensor4 Benchmarks\n');

  console.log('💡 Benchmark Reliability Tips:');
  for (const tip of getBenchmarkRecommendations()) {
    console.log(`   ${tip}`);
  }
  console.log('');

  const profile = getProfileName();
  const config = getBenchmarkConfig(profile);
  const bench = addTensor4Tasks(new Bench(config));

  console.log(`📊 Using profile: ${profile}`);
  console.log(`⏱️  Runtime: ${String(config.time)}ms per benchmark\n`);

  const totalTasks = bench.tasks.length;
  let completed = 0;
  bench.addEventListener('cycle', (evt) => {
    completed++;
    console.log(`[${completed.toString()}/${totalTasks.toString()}] Completed: ${evt.task?.name ?? 'unknown'}`);
  });

  console.log(`\nRunning ${totalTasks.toString()} benchmarks...\n`);
  await bench.run();

  console.log('\n📊 Benchmark Results\n');
  console.log('='.repeat(80));
  console.table(bench.table());

  const results = formatBenchResults(bench);
  console.log(formatIndividualResults(results));

  const unstable = findUnstableTasks(bench.tasks);
  if (unstable.length > 0) {
    console.log('⚠️  Unstable results (CV ≥ 5% or ≥ 5% outliers); consider BENCHMARK_PROFILE=precise:');
    for (const name of unstable) {
      console.log(`   ${name}`);
    }
  }

  const historyPath = process.env.BENCHMARK_HISTORY ?? DEFAULT_HISTORY_PATH;
  const current = exportForTracking(results);
  compareWithHistory(current, historyPath);
  saveBenchmarkHistory(current, historyPath);

  return bench;
}

// Run if executed directly
if (process.argv[1] !== undefined && import.meta.url === pathToFileURL(process.argv[1]).href) {
  runTensor4Benchmarks().catch((error: unknown) => {
    console.error(error);
    process.exitCode = 1;
  });
}
