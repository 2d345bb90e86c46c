/**
 * Benchmark result formatting utilities
 */

import type { Bench, Task } from 'tinybench';
import type { BenchmarkHistory } from './tracking';

export interface FormattedResult {
  name: string;
  ops: number;
  /** Latencies in nanoseconds */
  mean: number;
  p75: number;
  p99: number;
  stdDev: number;
  margin: number;
  samples: number;
  /** Coefficient of variation */
  cv: number;
}

const NS_PER_MS = 1_000_000;

/**
 * Format a single benchmark task result
 *
 * tinybench reports latencies in milliseconds; results are kept in nanoseconds.
 */
export function formatTaskResult(task: Task): FormattedResult | null {
  const result = task.result;
  if (result === undefined) {
    return null;
  }

  const meanNs = result.mean * NS_PER_MS;
  const stdDevNs = result.sd * NS_PER_MS;

  return {
    name: task.name,
    ops: result.hz,
    mean: meanNs,
    p75: result.p75 * NS_PER_MS,
    p99: result.p99 * NS_PER_MS,
    stdDev: stdDevNs,
    margin: result.moe * NS_PER_MS,
    samples: result.samples.length,
    cv: meanNs > 0 ? stdDevNs / meanNs : 0,
  };
}

/**
 * Format all benchmark results from a Bench instance
 */
export function formatBenchResults(bench: Bench): FormattedResult[] {
  const results: FormattedResult[] = [];
  for (const task of bench.tasks) {
    const formatted = formatTaskResult(task);
    if (formatted !== null) {
      results.push(formatted);
    }
  }
  return results;
}

/**
 * Human-readable latency, choosing the unit by magnitude
 */
export function formatLatency(ns: number): string {
  if (ns >= 1_000_000) {
    return `${(ns / 1_000_000).toFixed(3)}ms`;
  }
  if (ns >= 1_000) {
    return `${(ns / 1_000).toFixed(1)}μs`;
  }
  return `${ns.toFixed(0)}ns`;
}

/**
 * Create a markdown table from benchmark results
 */
export function resultsToMarkdownTable(results: readonly FormattedResult[]): string {
  const headers = ['Name', 'Ops/sec', 'Mean', 'P75', 'P99', 'Std Dev', 'Margin'];
  const separator = headers.map((h) => '-'.repeat(h.length));

  const rows = results.map((r) => [
    r.name,
    r.ops.toFixed(2),
    formatLatency(r.mean),
    formatLatency(r.p75),
    formatLatency(r.p99),
    formatLatency(r.stdDev),
    `±${formatLatency(r.margin)}`,
  ]);

  return [headers.join(' | '), separator.join(' | '), ...rows.map((row) => row.join(' | '))].join(
    '\n',
  );
}

export function stabilityLabel(cv: number): string {
  if (cv < 0.05) {
    return '🟢 Stable';
  }
  return cv < 0.1 ? '🟡 Moderate' : '🔴 High variance';
}

/**
 * Format results for individual scenario tracking
 */
export function formatIndividualResults(results: readonly FormattedResult[]): string {
  const lines: string[] = ['## Individual Scenario Results', ''];

  for (const result of results) {
    lines.push(`### ${result.name}`);
    lines.push(`- **Ops/sec**: ${result.ops.toFixed(2)}`);
    lines.push(`- **Mean latency**: ${formatLatency(result.mean)}`);
    lines.push(`- **P99 latency**: ${formatLatency(result.p99)}`);
    lines.push(
      `- **Samples**: ${result.samples.toString()} (CV: ${(result.cv * 100).toFixed(1)}%) ${stabilityLabel(result.cv)}`,
    );
    lines.push(`- **Standard deviation**: ±${formatLatency(result.stdDev)}`);
    lines.push('');
  }

  return lines.join('\n');
}

/**
 * Export results in a format suitable for continuous benchmarking
 */
export function exportForTracking(
  results: readonly FormattedResult[],
  commit = process.env.GITHUB_SHA ?? 'local',
  timestamp = new Date().toISOString(),
): BenchmarkHistory {
  const scenarios: BenchmarkHistory['scenarios'] = {};
  for (const result of results) {
    scenarios[result.name] = {
      ops_per_sec: result.ops,
      mean_ns: result.mean,
      p75_ns: result.p75,
      p99_ns: result.p99,
      std_dev_ns: result.stdDev,
      margin_of_error_ns: result.margin,
      samples: result.samples,
      cv: result.cv,
    };
  }
  return { timestamp, commit, scenarios };
}
