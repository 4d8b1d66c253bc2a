/**
 * @dispatch-perf/types - Benchmark results
 */

/**
 * Derived throughput and latency distribution of a run
 */
export interface BenchmarkMetrics {
  /** Iterations per second of measured time, 0 when no time was measured */
  readonly requestsPerSecond: number;
  readonly p50: number;
  readonly p95: number;
  readonly p99: number;
}

/**
 * Output of one benchmark run. All times are milliseconds.
 *
 * Invariant: `minTime <= averageTime <= maxTime` and
 * `averageTime === totalTime / iterations`.
 */
export interface BenchmarkResult {
  readonly requestType: string;
  readonly handlerType: string;
  /** Equals the requested iteration count */
  readonly iterations: number;
  readonly totalTime: number;
  readonly minTime: number;
  readonly maxTime: number;
  readonly averageTime: number;
  /** Population standard deviation of the samples */
  readonly standardDeviation: number;
  /** Heap growth over the run, clamped at 0 */
  readonly totalAllocatedBytes: number;
  /** Epoch milliseconds at which measurement started */
  readonly timestamp: number;
  readonly metrics: BenchmarkMetrics;
}
