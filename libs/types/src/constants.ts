/**
 * @dispatch-perf/types - Defaults
 */

/**
 * Iterations a benchmark runs when the caller does not say otherwise.
 */
export const DEFAULT_ITERATIONS = 100;

/**
 * Unsampled invocations before measurement starts.
 */
export const DEFAULT_WARMUP_ITERATIONS = 0;

/**
 * Labels used when a benchmark is not told what it measures.
 */
export const DEFAULT_REQUEST_TYPE = 'anonymous';
export const DEFAULT_HANDLER_TYPE = 'unknown';

/**
 * Name given to the shared logger and prefixed to component loggers.
 */
export const LOGGER_NAME = 'dispatch-perf';

/**
 * Session lifecycle states.
 */
export const SessionState = {
  NotStarted: 'not_started',
  Running: 'running',
  Stopped: 'stopped',
} as const;

export type SessionStateValue = (typeof SessionState)[keyof typeof SessionState];
