/**
 * Dispatch Benchmark
 *
 * Measures the latency of sending one request through a dispatcher.
 *
 * @packageDocumentation
 */

import { ArgumentError, DEFAULT_REQUEST_TYPE } from '@dispatch-perf/types';
import type { BenchmarkResult, Dispatcher } from '@dispatch-perf/types';
import { BenchmarkRunner } from './benchmark-runner';
import type { BenchmarkRunOptions } from './benchmark-runner';

export type DispatchBenchmarkOptions = Omit<BenchmarkRunOptions, 'requestType'> & {
  /**
   * Runner to use
   * @default a new BenchmarkRunner with its defaults
   */
  runner?: BenchmarkRunner;
};

/**
 * Label a request by its class name, falling back to its `typeof`
 */
export function requestTypeOf(request: unknown): string {
  if (request === null || request === undefined) {
    return DEFAULT_REQUEST_TYPE;
  }
  if (typeof request === 'object') {
    const name: unknown = request.constructor?.name;
    if (typeof name === 'string' && name.length > 0 && name !== 'Object') {
      return name;
    }
  }
  return typeof request;
}

/**
 * Send `request` through `dispatcher` repeatedly and summarize the latency.
 *
 * The same request instance is sent on every iteration, with the run's signal.
 */
export async function benchmarkDispatch<TRequest, TResponse>(
  dispatcher: Dispatcher<TRequest, TResponse>,
  request: TRequest,
  options: DispatchBenchmarkOptions = {},
): Promise<BenchmarkResult> {
  if (!dispatcher || typeof dispatcher.send !== 'function') {
    throw new ArgumentError('dispatcher', 'must expose a send() method');
  }
  const { runner = new BenchmarkRunner(), ...runOptions } = options;

  return runner.run(() => dispatcher.send(request, runOptions.signal), {
    ...runOptions,
    requestType: requestTypeOf(request),
  });
}
