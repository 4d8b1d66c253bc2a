/**
 * @dispatch-perf/profiler
 *
 * Benchmarking, profiling sessions and trace capture for request handlers.
 *
 * @packageDocumentation
 */

// Benchmarks
export { BenchmarkRunner, createBenchmarkRunner } from './benchmark-runner';
export type { BenchmarkOperation, BenchmarkRunOptions, BenchmarkRunnerOptions } from './benchmark-runner';
export { benchmarkDispatch, requestTypeOf } from './dispatch-benchmark';
export type { DispatchBenchmarkOptions } from './dispatch-benchmark';
export {
  reduceSamples,
  summarizeLatency,
  percentile,
  formatBytes,
  formatDuration,
} from './statistics';
export type { SampleStatistics, LatencySummary } from './statistics';
export { heapMemoryProvider, forceGC } from './memory';

// Profiling
export { MetricsCollector } from './metrics-collector';
export type { CollectedMetrics, MetricsCollectorOptions } from './metrics-collector';
export { ProfileSession, createProfileSession, SessionStateMachine, createSessionStateMachine } from './session';
export type { ProfileSessionSnapshot, StateTransitionEvent, StateTransitionHandler } from './session';
export { PerformanceProfiler, createPerformanceProfiler } from './performance-profiler';
export type { PerformanceProfilerOptions } from './performance-profiler';
export { ProfileReport, escapeCsv } from './profile-report';
export type { PerformanceThresholds } from './profile-report';

// Tracing
export { captureTrace } from './trace-capture';
export type { TraceCaptureResult } from './trace-capture';

// Configuration and logging
export { loadConfig, LOG_LEVELS } from './config';
export type { PerfConfig, LogLevel } from './config';
export { createLogger, getLogger, childLogger } from './logger';
export type { Logger, LoggerOptions } from './logger';
