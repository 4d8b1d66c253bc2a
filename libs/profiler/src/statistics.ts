/**
 * Statistical utilities for benchmark analysis
 */

import { ArgumentError } from '@dispatch-perf/types';

/**
 * Reduction of a sequence of duration samples (milliseconds)
 */
export interface SampleStatistics {
  count: number;
  total: number;
  min: number;
  max: number;
  mean: number;
  /** Population standard deviation (divides by count) */
  stdDev: number;
}

export interface LatencySummary extends SampleStatistics {
  p50: number;
  p95: number;
  p99: number;
}

/**
 * Calculate a specific percentile from a sorted array
 */
export function percentile(sorted: readonly number[], p: number): number {
  if (sorted.length === 0) return 0;
  if (p <= 0) return sorted[0];
  if (p >= 1) return sorted[sorted.length - 1];

  const index = (sorted.length - 1) * p;
  const lower = Math.floor(index);
  const upper = Math.ceil(index);
  const weight = index - lower;

  if (lower === upper) return sorted[lower];
  return sorted[lower] * (1 - weight) + sorted[upper] * weight;
}

/**
 * Reduce samples to total, extremes, mean and population standard deviation.
 *
 * @throws ArgumentError for an empty sequence
 */
export function reduceSamples(samples: readonly number[]): SampleStatistics {
  const count = samples.length;
  if (count === 0) {
    throw new ArgumentError('samples', 'at least one sample is required');
  }

  let total = 0;
  let min = Infinity;
  let max = -Infinity;
  for (const sample of samples) {
    total += sample;
    if (sample < min) min = sample;
    if (sample > max) max = sample;
  }

  // Rounding in the sum can push the quotient an ulp past the extremes
  const mean = Math.min(max, Math.max(min, total / count));

  let squaredDiffs = 0;
  for (const sample of samples) {
    squaredDiffs += (sample - mean) ** 2;
  }

  return {
    count,
    total,
    min,
    max,
    mean,
    stdDev: Math.sqrt(squaredDiffs / count),
  };
}

/**
 * Reduce samples and add the p50/p95/p99 latencies
 *
 * @throws ArgumentError for an empty sequence
 */
export function summarizeLatency(samples: readonly number[]): LatencySummary {
  const stats = reduceSamples(samples);
  const sorted = [...samples].sort((a, b) => a - b);

  return {
    ...stats,
    p50: percentile(sorted, 0.5),
    p95: percentile(sorted, 0.95),
    p99: percentile(sorted, 0.99),
  };
}

/**
 * Format bytes as a human-readable string
 */
export function formatBytes(bytes: number): string {
  const sign = bytes < 0 ? '-' : '';
  const absBytes = Math.abs(bytes);

  if (absBytes < 1024) return `${sign}${absBytes} B`;
  if (absBytes < 1024 * 1024) return `${sign}${(absBytes / 1024).toFixed(2)} KB`;
  if (absBytes < 1024 * 1024 * 1024) return `${sign}${(absBytes / (1024 * 1024)).toFixed(2)} MB`;
  return `${sign}${(absBytes / (1024 * 1024 * 1024)).toFixed(2)} GB`;
}

/**
 * Format milliseconds, switching to seconds from one second up
 */
export function formatDuration(ms: number): string {
  if (Math.abs(ms) < 1000) return `${ms.toFixed(2)}ms`;
  return `${(ms / 1000).toFixed(2)}s`;
}
