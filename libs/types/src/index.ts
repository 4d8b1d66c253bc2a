/**
 * @dispatch-perf/types
 *
 * Data model, error taxonomy and collaborator contracts shared by the
 * dispatch-perf libraries.
 *
 * @packageDocumentation
 */

// Defaults and states
export {
  DEFAULT_ITERATIONS,
  DEFAULT_WARMUP_ITERATIONS,
  DEFAULT_REQUEST_TYPE,
  DEFAULT_HANDLER_TYPE,
  LOGGER_NAME,
  SessionState,
} from './constants';
export type { SessionStateValue } from './constants';

// Errors
export {
  PerfErrorCode,
  PerfError,
  ArgumentError,
  InvalidStateError,
  CancelledError,
  ProfilerNotStartedError,
  isPerfError,
} from './errors';

// Schemas
export {
  NameSchema,
  DurationSchema,
  InstantSchema,
  IterationsSchema,
  WarmupIterationsSchema,
  OperationMetricsSchema,
  PerformanceThresholdsSchema,
  describeIssue,
  parseArgument,
} from './schemas';

// Model
export { createOperationMetrics, memoryPerMs, allocationsPerMs } from './metrics';
export type { OperationMetrics, OperationMetricsInput } from './metrics';
export type { BenchmarkResult, BenchmarkMetrics } from './benchmark';
export type { Dispatcher, Tracer, MemorySnapshotProvider } from './collaborators';
