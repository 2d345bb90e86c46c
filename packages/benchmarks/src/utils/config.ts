/**
 * Benchmark configuration utilities for statistical reliability
 */

import type { Options } from 'tinybench';

export type BenchmarkProfile = 'quick' | 'standard' | 'precise';

/**
 * Collect garbage between samples when Node.js runs with `--expose-gc`
 */
function collectGarbage(): void {
  if (globalThis.gc !== undefined) {
    globalThis.gc();
  }
}

/**
 * Configuration profiles for different benchmark scenarios
 */
export const BENCHMARK_PROFILES = {
  /**
   * Quick profile for development/debugging
   * Faster but less reliable results
   */
  quick: {
    time: 250,
    iterations: 10,
    warmupIterations: 2,
  },

  /**
   * Standard profile for regular benchmarking
   */
  standard: {
    time: 1000,
    warmupTime: 100,
  },

  /**
   * High-precision profile for CI
   */
  precise: {
    time: 2000,
    iterations: 200,
    warmupTime: 250,
    setup(_task, mode) {
      if (mode === 'warmup') {
        collectGarbage();
      }
    },
    teardown() {
      collectGarbage();
    },
  },
} as const satisfies Record<BenchmarkProfile, Options>;

export function isBenchmarkProfile(value: string): value is BenchmarkProfile {
  return value === 'quick' || value === 'standard' || value === 'precise';
}

/**
 * Profile selected by `BENCHMARK_PROFILE`; unknown values fall back to `standard`
 */
export function getProfileName(value = process.env.BENCHMARK_PROFILE): BenchmarkProfile {
  return value !== undefined && isBenchmarkProfile(value) ? value : 'standard';
}

/**
 * Get benchmark configuration based on environment
 */
export function getBenchmarkConfig(profile: BenchmarkProfile = getProfileName()): Options {
  return BENCHMARK_PROFILES[profile];
}

export interface SampleAnalysis {
  mean: number;
  median: number;
  stdDev: number;
  /** Coefficient of variation */
  cv: number;
  outliers: number;
  isStable: boolean;
}

/**
 * Statistical analysis helpers
 *
 * @throws Error when fewer than two samples are given
 */
export function analyzeResults(samples: readonly number[]): SampleAnalysis {
  const n = samples.length;
  if (n < 2) {
    throw new Error(`Need at least 2 samples to analyze, got ${n.toString()}`);
  }
  const sorted = [...samples].sort((a, b) => a - b);
  const at = (i: number): number => sorted[i] ?? Number.NaN;

  const mean = samples.reduce((sum, val) => sum + val, 0) / n;
  const median = n % 2 === 0 ? (at(n / 2 - 1) + at(n / 2)) / 2 : at(Math.floor(n / 2));

  const variance = samples.reduce((sum, val) => sum + (val - mean) ** 2, 0) / (n - 1);
  const stdDev = Math.sqrt(variance);
  const cv = mean === 0 ? 0 : stdDev / mean;

  // Outlier detection using the IQR method
  const q1 = at(Math.floor(n * 0.25));
  const q3 = at(Math.floor(n * 0.75));
  const iqr = q3 - q1;
  const lowerBound = q1 - 1.5 * iqr;
  const upperBound = q3 + 1.5 * iqr;
  const outliers = samples.filter((val) => val < lowerBound || val > upperBound).length;

  // Stable if CV < 5% and outliers < 5%
  const isStable = cv < 0.05 && outliers / n < 0.05;

  return { mean, median, stdDev, cv, outliers, isStable };
}

/**
 * Recommendations for benchmark reliability
 */
export function getBenchmarkRecommendations(env: NodeJS.ProcessEnv = process.env): string[] {
  const recommendations = [
    '🔧 For best results, run benchmarks on a dedicated machine',
    '🔋 Ensure stable power supply (avoid battery mode)',
    '🔇 Close unnecessary applications to reduce system noise',
    '⚡ Consider using Node.js with --expose-gc flag for garbage collection control',
    '📊 Run multiple benchmark sessions and compare results',
  ];

  if (env.NODE_ENV === 'development') {
    recommendations.push('🚀 Use BENCHMARK_PROFILE=quick for faster development cycles');
  }

  if (env.CI !== undefined) {
    recommendations.push('🏗️  CI environments may have higher variance - consider dedicated runners');
  }

  return recommendations;
}
