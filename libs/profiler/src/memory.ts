/**
 * Memory measurement utilities for benchmarking
 */

import type { MemorySnapshotProvider } from '@dispatch-perf/types';

/**
 * Force garbage collection if available (requires --expose-gc flag)
 */
export function forceGC(): boolean {
  if (global.gc) {
    global.gc();
    return true;
  }
  return false;
}

/**
 * Heap-used bytes of the current process.
 *
 * A forced snapshot collects first when the process runs with --expose-gc and
 * reads the heap as-is otherwise.
 */
export const heapMemoryProvider: MemorySnapshotProvider = {
  currentAllocatedBytes(forceCollection: boolean): number {
    if (forceCollection) {
      forceGC();
    }
    return process.memoryUsage().heapUsed;
  },
};
