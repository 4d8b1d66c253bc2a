/**
 * @dispatch-perf/types - Zod schemas
 *
 * Runtime validation for every value that crosses a public boundary.
 */

import { z } from 'zod';
import { ArgumentError } from './errors';

// ============================================================================
// Base Schemas
// ============================================================================

/**
 * Non-blank name (sessions, operations).
 */
export const NameSchema = z.string().refine((value) => value.trim().length > 0, {
  message: 'must be a non-empty string',
});

/**
 * Duration in milliseconds.
 */
export const DurationSchema = z.number().finite().nonnegative();

/**
 * Epoch milliseconds.
 */
export const InstantSchema = z.number().finite();

/**
 * Benchmark iteration count.
 */
export const IterationsSchema = z.number().int().positive();

/**
 * Warm-up iteration count.
 */
export const WarmupIterationsSchema = z.number().int().nonnegative();

// ============================================================================
// Model Schemas
// ============================================================================

/**
 * One measured unit of work.
 */
export const OperationMetricsSchema = z.object({
  name: NameSchema,
  duration: DurationSchema,
  memoryUsed: z.number().int().nonnegative(),
  allocations: z.number().int().nonnegative(),
  startTime: InstantSchema.optional(),
  endTime: InstantSchema.optional(),
});

/**
 * Limits a profile report checks a session against. A value is exceeded when
 * the measured value is strictly greater.
 */
export const PerformanceThresholdsSchema = z.object({
  maxDuration: z.number().finite().optional(),
  maxMemory: z.number().finite().optional(),
  maxAllocations: z.number().finite().optional(),
  maxOperationDuration: z.number().finite().optional(),
  maxOperationMemory: z.number().finite().optional(),
});

// ============================================================================
// Helpers
// ============================================================================

/**
 * Describe the first issue of a failed parse, prefixed with its path.
 */
export function describeIssue(error: z.ZodError): string {
  const issue = error.issues[0];
  if (!issue) {
    return 'is invalid';
  }
  return issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message;
}

/**
 * Validate an argument, raising ArgumentError for the named parameter.
 *
 * @throws ArgumentError when the value is missing or fails the schema
 */
export function parseArgument<S extends z.ZodTypeAny>(schema: S, value: unknown, paramName: string): z.output<S> {
  if (value === undefined || value === null) {
    throw new ArgumentError(paramName, 'is required');
  }
  const result = schema.safeParse(value);
  if (!result.success) {
    throw new ArgumentError(paramName, describeIssue(result.error));
  }
  return result.data;
}
