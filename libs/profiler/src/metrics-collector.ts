/**
 * Metrics Collector
 *
 * Measures a single invocation and turns it into an OperationMetrics record.
 *
 * @packageDocumentation
 */

import { ArgumentError, NameSchema, createOperationMetrics, parseArgument } from '@dispatch-perf/types';
import type { MemorySnapshotProvider, OperationMetrics } from '@dispatch-perf/types';
import { heapMemoryProvider } from './memory';

/**
 * Value returned by the measured function, with its metrics
 */
export interface CollectedMetrics<T> {
  result: T;
  metrics: OperationMetrics;
}

export interface MetricsCollectorOptions {
  memory?: MemorySnapshotProvider;
}

interface Mark {
  wallClock: number;
  monotonic: number;
  memory: number;
}

/**
 * Metrics Collector
 *
 * `memoryUsed` is the heap growth across the call, clamped at 0. The runtime
 * has no per-call allocation counter, so `allocations` is always 0.
 */
export class MetricsCollector {
  private readonly memory: MemorySnapshotProvider;

  constructor(options: MetricsCollectorOptions = {}) {
    this.memory = options.memory ?? heapMemoryProvider;
  }

  /**
   * Measure a synchronous function
   *
   * @throws ArgumentError for a blank name or a non-function
   */
  collect<T>(name: string, fn: () => T): CollectedMetrics<T> {
    const start = this.begin(name, fn);
    const result = fn();
    return { result, metrics: this.finish(name, start) };
  }

  /**
   * Measure an asynchronous function, awaiting its completion
   *
   * @throws ArgumentError for a blank name or a non-function
   */
  async collectAsync<T>(name: string, fn: () => PromiseLike<T> | T): Promise<CollectedMetrics<T>> {
    const start = this.begin(name, fn);
    const result = await fn();
    return { result, metrics: this.finish(name, start) };
  }

  private begin(name: string, fn: unknown): Mark {
    parseArgument(NameSchema, name, 'name');
    if (typeof fn !== 'function') {
      throw new ArgumentError('operation', 'must be a function');
    }
    return {
      wallClock: Date.now(),
      memory: this.memory.currentAllocatedBytes(false),
      monotonic: performance.now(),
    };
  }

  private finish(name: string, start: Mark): OperationMetrics {
    const duration = performance.now() - start.monotonic;
    const memoryAfter = this.memory.currentAllocatedBytes(false);

    return createOperationMetrics({
      name,
      duration,
      memoryUsed: Math.max(0, memoryAfter - start.memory),
      allocations: 0,
      startTime: start.wallClock,
      endTime: start.wallClock + duration,
    });
  }
}
