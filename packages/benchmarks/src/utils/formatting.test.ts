import { describe, it, expect } from 'vitest';
import { Bench } from 'tinybench';
import {
  exportForTracking,
  formatBenchResults,
  formatIndividualResults,
  formatLatency,
  resultsToMarkdownTable,
  stabilityLabel,
  type FormattedResult,
} from './formatting';

const sample: FormattedResult = {
  name: 'add tiny',
  ops: 1000,
  mean: 1500,
  p75: 1600,
  p99: 2_500_000,
  stdDev: 30,
  margin: 12,
  samples: 50,
  cv: 0.02,
};

describe('formatLatency', () => {
  it('should pick the unit by magnitude', () => {
    expect(formatLatency(512)).toBe('512ns');
    expect(formatLatency(1500)).toBe('1.5μs');
    expect(formatLatency(2_500_000)).toBe('2.500ms');
  });
});

describe('stabilityLabel', () => {
  it('should grade the coefficient of variation', () => {
    expect(stabilityLabel(0.02)).toBe('🟢 Stable');
    expect(stabilityLabel(0.07)).toBe('🟡 Moderate');
    expect(stabilityLabel(0.2)).toBe('🔴 High variance');
  });
});

describe('result tables', () => {
  it('should render a markdown table row per result', () => {
    const table = resultsToMarkdownTable([sample]).split('\n');

    expect(table[0]).toBe('Name | Ops/sec | Mean | P75 | P99 | Std Dev | Margin');
    expect(table[1]).toBe('---- | ------- | ---- | --- | --- | ------- | ------');
    expect(table[2]).toBe('add tiny | 1000.00 | 1.5μs | 1.6μs | 2.500ms | 30ns | ±12ns');
  });

  it('should render an individual section per result', () => {
    const lines = formatIndividualResults([sample]).split('\n');

    expect(lines[2]).toBe('### add tiny');
    expect(lines[6]).toBe('- **Samples**: 50 (CV: 2.0%) 🟢 Stable');
  });
});

describe('exportForTracking', () => {
  it('should key scenarios by name', () => {
    const exported = exportForTracking([sample], 'abc123', '2024-01-01T00:00:00.000Z');

    expect(exported.commit).toBe('abc123');
    expect(exported.timestamp).toBe('2024-01-01T00:00:00.000Z');
    expect(exported.scenarios['add tiny']).toEqual({
      ops_per_sec: 1000,
      mean_ns: 1500,
      p75_ns: 1600,
      p99_ns: 2_500_000,
      std_dev_ns: 30,
      margin_of_error_ns: 12,
      samples: 50,
      cv: 0.02,
    });
  });
});

describe('formatBenchResults', () => {
  it('should skip tasks that have not run', () => {
    const bench = new Bench().add('noop', () => undefined);
    expect(formatBenchResults(bench)).toEqual([]);
  });

  it('should convert finished tasks', async () => {
    const bench = new Bench({ time: 0, iterations: 3, warmupTime: 0, warmupIterations: 0 }).add(
      'sum',
      () => {
        [1, 2, 3].reduce((a, b) => a + b);
      },
    );
    await bench.run();

    const [result] = formatBenchResults(bench);
    expect(result?.name).toBe('sum');
    expect(result?.samples).toBeGreaterThanOrEqual(3);
    expect(result?.mean).toBeGreaterThanOrEqual(0);
  });
});
