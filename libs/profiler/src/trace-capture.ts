/**
 * Trace Capture
 *
 * Wraps one dispatch in a trace.
 *
 * @packageDocumentation
 */

import type { Dispatcher, Tracer } from '@dispatch-perf/types';
import { childLogger } from './logger';

/**
 * Response of the dispatch with the handle the tracer produced
 */
export interface TraceCaptureResult<TResponse, THandle> {
  response: TResponse;
  /** Undefined when the tracer has tracing disabled */
  trace: THandle | undefined;
}

/**
 * Dispatch `request` inside a trace.
 *
 * Calls `startTrace` before sending and `completeTrace(true)` after a
 * successful send. When the send fails, calls `recordException` then
 * `completeTrace(false)` and rethrows the dispatch error object. A tracer
 * call that throws is logged and never replaces the dispatch error.
 */
export async function captureTrace<TRequest, TResponse, THandle>(
  dispatcher: Dispatcher<TRequest, TResponse>,
  tracer: Tracer<TRequest, THandle>,
  request: TRequest,
  signal?: AbortSignal,
): Promise<TraceCaptureResult<TResponse, THandle>> {
  const trace = tracer.startTrace(request);

  let response: TResponse;
  try {
    response = await dispatcher.send(request, signal);
  } catch (error) {
    reportFailure(tracer, error);
    throw error;
  }

  tracer.completeTrace(true);
  return { response, trace };
}

function reportFailure<TRequest, THandle>(tracer: Tracer<TRequest, THandle>, error: unknown): void {
  try {
    tracer.recordException(error);
  } catch (tracerError) {
    childLogger('trace-capture').warn({ err: tracerError }, 'tracer failed to record exception');
  }
  try {
    tracer.completeTrace(false);
  } catch (tracerError) {
    childLogger('trace-capture').warn({ err: tracerError }, 'tracer failed to complete trace');
  }
}
