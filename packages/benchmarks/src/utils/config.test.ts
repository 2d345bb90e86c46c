import { describe, it, expect } from 'vitest';
import {
  BENCHMARK_PROFILES,
  analyzeResults,
  getBenchmarkConfig,
  getBenchmarkRecommendations,
  getProfileName,
} from './config';

describe('benchmark profiles', () => {
  it('should select the profile named in the environment', () => {
    expect(getProfileName('quick')).toBe('quick');
    expect(getProfileName('precise')).toBe('precise');
  });

  it('should fall back to the standard profile', () => {
    expect(getProfileName(undefined)).toBe('standard');
    expect(getProfileName('turbo')).toBe('standard');
    expect(getBenchmarkConfig('standard')).toBe(BENCHMARK_PROFILES.standard);
  });

  it('should give the quick profile a short runtime', () => {
    expect(getBenchmarkConfig('quick').time).toBe(250);
    expect(getBenchmarkConfig('quick').iterations).toBe(10);
  });
});

describe('analyzeResults', () => {
  it('should compute summary statistics', () => {
    const analysis = analyzeResults([2, 4, 4, 4, 5, 5, 7, 9]);

    expect(analysis.mean).toBe(5);
    expect(analysis.median).toBe(4.5);
    expect(analysis.stdDev).toBeCloseTo(Math.sqrt(32 / 7), 10);
    expect(analysis.outliers).toBe(0);
    expect(analysis.isStable).toBe(false);
  });

  it('should flag outliers by the IQR rule', () => {
    const analysis = analyzeResults([10, 10, 10, 10, 10, 10, 10, 100]);
    expect(analysis.outliers).toBe(1);
  });

  it('should treat identical samples as stable', () => {
    const analysis = analyzeResults([3, 3, 3, 3]);
    expect(analysis.cv).toBe(0);
    expect(analysis.isStable).toBe(true);
  });

  it('should reject too few samples', () => {
    expect(() => analyzeResults([1])).toThrow('Need at least 2 samples to analyze, got 1');
  });
});

describe('getBenchmarkRecommendations', () => {
  it('should add environment-specific tips', () => {
    const base = getBenchmarkRecommendations({});
    const ci = getBenchmarkRecommendations({ CI: 'true' });
    const dev = getBenchmarkRecommendations({ NODE_ENV: 'development' });

    expect(ci).toHaveLength(base.length + 1);
    expect(dev.at(-1)).toBe('🚀 Use BENCHMARK_PROFILE=quick for faster development cycles');
  });
});
