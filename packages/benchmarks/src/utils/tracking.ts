/**
 * Utilities for tracking benchmark results over time
 */

import { existsSync, readFileSync, writeFileSync } from 'node:fs';
import { formatLatency } from './formatting';

export interface ScenarioMetrics {
  ops_per_sec: number;
  mean_ns: number;
  p75_ns: number;
  p99_ns: number;
  std_dev_ns: number;
  margin_of_error_ns: number;
  samples: number;
  cv: number;
}

export interface BenchmarkHistory {
  timestamp: string;
  commit: string;
  scenarios: Record<string, ScenarioMetrics>;
}

export const DEFAULT_HISTORY_PATH = 'benchmark-history.json';

/** Throughput drop (percent) reported as a regression */
export const THROUGHPUT_REGRESSION_PERCENT = 5;

/** Latency increase (percent) reported as a regression */
export const LATENCY_REGRESSION_PERCENT = 10;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isScenarioMetrics(value: unknown): value is ScenarioMetrics {
  return (
    isRecord(value) &&
    typeof value.ops_per_sec === 'number' &&
    typeof value.mean_ns === 'number' &&
    typeof value.samples === 'number'
  );
}

function isBenchmarkHistory(value: unknown): value is BenchmarkHistory {
  if (!isRecord(value) || typeof value.timestamp !== 'string' || typeof value.commit !== 'string') {
    return false;
  }
  const scenarios = value.scenarios;
  return isRecord(scenarios) && Object.values(scenarios).every(isScenarioMetrics);
}

/**
 * Parse a history file's contents
 *
 * @throws Error when the contents are not a list of history entries
 */
export function parseBenchmarkHistory(json: string): BenchmarkHistory[] {
  const parsed: unknown = JSON.parse(json);
  if (!Array.isArray(parsed) || !parsed.every(isBenchmarkHistory)) {
    throw new Error('Benchmark history must be an array of history entries');
  }
  return parsed;
}

/**
 * Load the history file, or an empty history when it does not exist
 */
export function loadBenchmarkHistory(filepath = DEFAULT_HISTORY_PATH): BenchmarkHistory[] {
  if (!existsSync(filepath)) {
    return [];
  }
  return parseBenchmarkHistory(readFileSync(filepath, 'utf8'));
}

/**
 * Append results to the history file
 */
export function saveBenchmarkHistory(data: BenchmarkHistory, filepath = DEFAULT_HISTORY_PATH): void {
  const history = loadBenchmarkHistory(filepath);
  history.push(data);
  writeFileSync(filepath, JSON.stringify(history, null, 2));
  console.log(`Saved benchmark results to ${filepath}`);
}

function percentChange(current: number, previous: number): number {
  return previous === 0 ? 0 : ((current - previous) / previous) * 100;
}

function direction(change: number): string {
  if (change > 0) {
    return '⬆️';
  }
  return change < 0 ? '⬇️' : '➡️';
}

/**
 * Report lines comparing current results with a previous entry
 */
export function compareResults(current: BenchmarkHistory, previous: BenchmarkHistory): string[] {
  const lines: string[] = [];

  for (const [scenarioName, metrics] of Object.entries(current.scenarios)) {
    const prev = previous.scenarios[scenarioName];
    if (prev === undefined) {
      lines.push(`${scenarioName}: NEW SCENARIO`);
      continue;
    }

    const opsChange = percentChange(metrics.ops_per_sec, prev.ops_per_sec);
    const latencyChange = percentChange(metrics.mean_ns, prev.mean_ns);

    lines.push(`${scenarioName}:`);
    lines.push(
      `  Throughput: ${direction(opsChange)} ${opsChange.toFixed(2)}% (${metrics.ops_per_sec.toFixed(0)} ops/sec)`,
    );
    lines.push(
      `  Latency: ${direction(latencyChange)} ${latencyChange.toFixed(2)}% (${formatLatency(metrics.mean_ns)})`,
    );
    if (opsChange < -THROUGHPUT_REGRESSION_PERCENT) {
      lines.push(
        `  ⚠️  POTENTIAL REGRESSION: Throughput dropped by ${Math.abs(opsChange).toFixed(2)}%`,
      );
    }
    if (latencyChange > LATENCY_REGRESSION_PERCENT) {
      lines.push(`  ⚠️  POTENTIAL REGRESSION: Latency increased by ${latencyChange.toFixed(2)}%`);
    }
  }

  return lines;
}

/**
 * Compare current results with the last entry of the history file
 */
export function compareWithHistory(current: BenchmarkHistory, historyPath = DEFAULT_HISTORY_PATH): void {
  const previous = loadBenchmarkHistory(historyPath).at(-1);
  if (previous === undefined) {
    console.log('No historical data found for comparison');
    return;
  }

  console.log('\n📈 Performance Comparison vs Previous Run:\n');
  for (const line of compareResults(current, previous)) {
    console.log(line);
  }
}
