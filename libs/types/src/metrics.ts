/**
 * @dispatch-perf/types - Operation metrics
 */

import type { z } from 'zod';
import { OperationMetricsSchema, parseArgument } from './schemas';

/**
 * Fields accepted when recording an operation.
 */
export type OperationMetricsInput = z.input<typeof OperationMetricsSchema>;

/**
 * One measured unit of work. Durations are milliseconds, memory is bytes.
 */
export type OperationMetrics = Readonly<z.output<typeof OperationMetricsSchema>>;

/**
 * Validate and freeze an operation record.
 *
 * The result is a fresh object, so later changes to `input` are not seen.
 *
 * @throws ArgumentError (parameter `metrics`) when a field is invalid
 */
export function createOperationMetrics(input: OperationMetricsInput): OperationMetrics {
  return Object.freeze(parseArgument(OperationMetricsSchema, input, 'metrics'));
}

/**
 * Bytes per millisecond, 0 for an instantaneous operation.
 */
export function memoryPerMs(metrics: OperationMetrics): number {
  return metrics.duration > 0 ? metrics.memoryUsed / metrics.duration : 0;
}

/**
 * Allocations per millisecond, 0 for an instantaneous operation.
 */
export function allocationsPerMs(metrics: OperationMetrics): number {
  return metrics.duration > 0 ? metrics.allocations / metrics.duration : 0;
}
