/**
 * @dispatch-perf/types - External collaborators
 *
 * Contracts for the pieces the toolkit measures or reports to but does not own.
 */

/**
 * Sends a request to its handler. Command-style requests use `void` as the
 * response type.
 */
export interface Dispatcher<TRequest = unknown, TResponse = unknown> {
  send(request: TRequest, signal?: AbortSignal): Promise<TResponse>;
}

/**
 * Records one trace around a dispatch. The handle returned by `startTrace` is
 * passed back to callers untouched; `undefined` means tracing is disabled.
 */
export interface Tracer<TRequest = unknown, THandle = unknown> {
  startTrace(request: TRequest): THandle | undefined;
  recordException(error: unknown): void;
  completeTrace(success: boolean): void;
}

/**
 * Reports how many bytes the runtime currently holds.
 */
export interface MemorySnapshotProvider {
  /**
   * @param forceCollection run a full collection first, where the runtime allows it
   */
  currentAllocatedBytes(forceCollection: boolean): number;
}
