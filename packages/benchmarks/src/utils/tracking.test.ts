import { mkdtempSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, describe, it, expect, vi } from 'vitest';
import {
  compareResults,
  loadBenchmarkHistory,
  parseBenchmarkHistory,
  saveBenchmarkHistory,
  type BenchmarkHistory,
  type ScenarioMetrics,
} from './tracking';

function metrics(ops: number, meanNs: number): ScenarioMetrics {
  return {
    ops_per_sec: ops,
    mean_ns: meanNs,
    p75_ns: meanNs,
    p99_ns: meanNs,
    std_dev_ns: 0,
    margin_of_error_ns: 0,
    samples: 10,
    cv: 0,
  };
}

function entry(scenarios: Record<string, ScenarioMetrics>): BenchmarkHistory {
  return { timestamp: '2024-01-01T00:00:00.000Z', commit: 'local', scenarios };
}

describe('compareResults', () => {
  it('should report new scenarios', () => {
    const lines = compareResults(entry({ add: metrics(100, 1000) }), entry({}));
    expect(lines).toEqual(['add: NEW SCENARIO']);
  });

  it('should flag regressions past the thresholds', () => {
    const lines = compareResults(
      entry({ add: metrics(90, 1200) }),
      entry({ add: metrics(100, 1000) }),
    );

    expect(lines).toEqual([
      'add:',
      '  Throughput: ⬇️ -10.00% (90 ops/sec)',
      '  Latency: ⬆️ 20.00% (1.2μs)',
      '  ⚠️  POTENTIAL REGRESSION: Throughput dropped by 10.00%',
      '  ⚠️  POTENTIAL REGRESSION: Latency increased by 20.00%',
    ]);
  });

  it('should not flag small changes', () => {
    const lines = compareResults(
      entry({ add: metrics(98, 1050) }),
      entry({ add: metrics(100, 1000) }),
    );
    expect(lines).toHaveLength(3);
  });
});

describe('history files', () => {
  let dir: string | undefined;

  afterEach(() => {
    if (dir !== undefined) {
      rmSync(dir, { recursive: true, force: true });
      dir = undefined;
    }
    vi.restoreAllMocks();
  });

  it('should reject malformed history', () => {
    expect(() => parseBenchmarkHistory('{"timestamp": 1}')).toThrow(
      'Benchmark history must be an array of history entries',
    );
  });

  it('should append entries to the history file', () => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    dir = mkdtempSync(join(tmpdir(), 'bench-history-'));
    const file = join(dir, 'history.json');

    expect(loadBenchmarkHistory(file)).toEqual([]);
    saveBenchmarkHistory(entry({ add: metrics(100, 1000) }), file);
    saveBenchmarkHistory(entry({ add: metrics(110, 900) }), file);

    const history = loadBenchmarkHistory(file);
    expect(history).toHaveLength(2);
    expect(history[1]?.scenarios.add?.ops_per_sec).toBe(110);
  });
});
