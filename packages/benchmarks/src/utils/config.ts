/**
 * Benchmark configuration utilities for statistical reliability
 */

import type { Options } from 'tinybench';

export type BenchmarkProfileName = 'quick' | 'standard' | 'thorough';

/**
 * Configuration profiles for different benchmark scenarios
 */
export const BENCHMARK_PROFILES: Record<BenchmarkProfileName, Options> = {
  /**
   * Quick profile for development
   * Faster but less reliable results
   */
  quick: {
    time: 250,
    iterations: 10,
    warmupTime: 50,
    warmupIterations: 5,
  },

  /**
   * Standard profile for regular benchmarking
   */
  standard: {
    time: 1000,
    iterations: 10,
    warmupTime: 100,
    warmupIterations: 5,
  },

  /**
   * Long-running profile for CI comparisons
   */
  thorough: {
    time: 2000,
    iterations: 200,
    warmupTime: 500,
    warmupIterations: 20,
  },
};

export function isBenchmarkProfileName(name: string): name is BenchmarkProfileName {
  return Object.prototype.hasOwnProperty.call(BENCHMARK_PROFILES, name);
}

/**
 * Resolve the profile named by `BENCH_PROFILE`, falling back to `standard`
 *
 * @throws {Error} when the variable names an unknown profile
 */
export function getBenchmarkProfile(
  name: string | undefined = process.env['BENCH_PROFILE'],
): BenchmarkProfileName {
  if (name === undefined || name === '') {
    return 'standard';
  }
  if (!isBenchmarkProfileName(name)) {
    throw new Error(
      `Unknown benchmark profile "${name}", expected one of: ${Object.keys(BENCHMARK_PROFILES).join(', ')}`,
    );
  }
  return name;
}

export function getBenchmarkConfig(profile = getBenchmarkProfile()): Options {
  return BENCHMARK_PROFILES[profile];
}

/**
 * Recommendations for benchmark reliability
 */
export function getBenchmarkRecommendations(): string[] {
  const recommendations = [
    '🔧 For best results, run benchmarks on a dedicated machine',
    '🔋 Ensure stable power supply (avoid battery mode)',
    '🔇 Close unnecessary applications to reduce system noise',
    '📊 Run multiple benchmark sessions and compare results',
  ];

  if (process.env['CI']) {
    recommendations.push('🏗️  CI environments may have higher variance, use BENCH_PROFILE=thorough');
  } else {
    recommendations.push('🚀 Use BENCH_PROFILE=quick for faster development cycles');
  }

  return recommendations;
}
