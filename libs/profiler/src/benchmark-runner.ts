/**
 * Benchmark Runner
 *
 * Runs an operation a fixed number of times and reduces the timings.
 *
 * @packageDocumentation
 */

import {
  ArgumentError,
  CancelledError,
  DEFAULT_HANDLER_TYPE,
  DEFAULT_ITERATIONS,
  DEFAULT_REQUEST_TYPE,
  DEFAULT_WARMUP_ITERATIONS,
  IterationsSchema,
  WarmupIterationsSchema,
  parseArgument,
} from '@dispatch-perf/types';
import type { BenchmarkResult, MemorySnapshotProvider } from '@dispatch-perf/types';
import { loadConfig } from './config';
import type { PerfConfig } from './config';
import { childLogger } from './logger';
import type { Logger } from './logger';
import { heapMemoryProvider } from './memory';
import { summarizeLatency } from './statistics';

/**
 * Operation under measurement. A `void` result covers command-style work.
 */
export type BenchmarkOperation<T = unknown> = () => PromiseLike<T> | T;

/**
 * Options for a single run
 */
export interface BenchmarkRunOptions {
  /**
   * Number of sampled invocations
   * @default runner's defaultIterations (100)
   */
  iterations?: number;

  /**
   * Unsampled invocations before measurement starts
   * @default runner's warmupIterations (0)
   */
  warmupIterations?: number;

  /**
   * Checked before every iteration; an aborted signal ends the run
   */
  signal?: AbortSignal;

  /**
   * Label for what is being sent
   */
  requestType?: string;

  /**
   * Label for what handles it
   */
  handlerType?: string;
}

/**
 * Runner configuration
 */
export interface BenchmarkRunnerOptions {
  memory?: MemorySnapshotProvider;
  logger?: Logger;
  defaultIterations?: number;
  warmupIterations?: number;
}

/**
 * Benchmark Runner
 *
 * Iterations run strictly one after another; the runner never overlaps two
 * invocations of the operation.
 */
export class BenchmarkRunner {
  private readonly memory: MemorySnapshotProvider;
  private readonly logger: Logger;
  private readonly defaultIterations: number;
  private readonly warmupIterations: number;

  constructor(options: BenchmarkRunnerOptions = {}) {
    this.memory = options.memory ?? heapMemoryProvider;
    this.logger = options.logger ?? childLogger('benchmark-runner');
    this.defaultIterations = parseArgument(
      IterationsSchema,
      options.defaultIterations ?? DEFAULT_ITERATIONS,
      'defaultIterations',
    );
    this.warmupIterations = parseArgument(
      WarmupIterationsSchema,
      options.warmupIterations ?? DEFAULT_WARMUP_ITERATIONS,
      'warmupIterations',
    );
  }

  /**
   * Run `operation` and summarize its timings.
   *
   * Failures of the operation propagate unchanged and no result is produced.
   *
   * @throws ArgumentError for a non-function operation or invalid counts
   * @throws CancelledError when the signal is aborted at an iteration boundary
   */
  async run<T>(operation: BenchmarkOperation<T>, options: BenchmarkRunOptions = {}): Promise<BenchmarkResult> {
    if (typeof operation !== 'function') {
      throw new ArgumentError('operation', 'must be a function');
    }
    const iterations = parseArgument(IterationsSchema, options.iterations ?? this.defaultIterations, 'iterations');
    const warmupIterations = parseArgument(
      WarmupIterationsSchema,
      options.warmupIterations ?? this.warmupIterations,
      'warmupIterations',
    );
    const requestType = options.requestType ?? DEFAULT_REQUEST_TYPE;
    const handlerType = options.handlerType ?? DEFAULT_HANDLER_TYPE;
    const { signal } = options;

    for (let i = 0; i < warmupIterations; i++) {
      throwIfCancelled(signal, `Benchmark cancelled during warm-up (${i} of ${warmupIterations} done)`);
      await operation();
    }

    const timestamp = Date.now();
    const memoryBefore = this.memory.currentAllocatedBytes(true);
    const samples: number[] = [];

    for (let i = 0; i < iterations; i++) {
      throwIfCancelled(signal, `Benchmark cancelled before iteration ${i + 1} of ${iterations}`);
      const start = performance.now();
      await operation();
      samples.push(performance.now() - start);
    }

    const memoryAfter = this.memory.currentAllocatedBytes(false);
    const stats = summarizeLatency(samples);

    const result: BenchmarkResult = Object.freeze({
      requestType,
      handlerType,
      iterations,
      totalTime: stats.total,
      minTime: stats.min,
      maxTime: stats.max,
      averageTime: stats.mean,
      standardDeviation: stats.stdDev,
      totalAllocatedBytes: Math.max(0, memoryAfter - memoryBefore),
      timestamp,
      metrics: Object.freeze({
        requestsPerSecond: stats.total > 0 ? (iterations / stats.total) * 1000 : 0,
        p50: stats.p50,
        p95: stats.p95,
        p99: stats.p99,
      }),
    });

    this.logger.debug(
      { requestType, handlerType, iterations, averageTime: result.averageTime },
      'benchmark completed',
    );
    return result;
  }
}

function throwIfCancelled(signal: AbortSignal | undefined, message: string): void {
  if (signal?.aborted) {
    throw new CancelledError(message, signal.reason);
  }
}

/**
 * Create a runner whose defaults come from configuration
 */
export function createBenchmarkRunner(
  config: Partial<PerfConfig> = loadConfig(),
  options: Omit<BenchmarkRunnerOptions, 'defaultIterations' | 'warmupIterations'> = {},
): BenchmarkRunner {
  return new BenchmarkRunner({
    ...options,
    defaultIterations: config.defaultIterations,
    warmupIterations: config.warmupIterations,
  });
}
