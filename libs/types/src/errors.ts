/**
 * @dispatch-perf/types - Error taxonomy
 *
 * Every failure raised by the toolkit itself is a PerfError with a stable code.
 * Failures of the measured operation are never wrapped in one of these.
 */

/**
 * Error codes for identification without instanceof checks.
 */
export const PerfErrorCode = {
  InvalidArgument: 'INVALID_ARGUMENT',
  InvalidState: 'INVALID_STATE',
  Cancelled: 'CANCELLED',
  ProfilerNotStarted: 'PROFILER_NOT_STARTED',
} as const;

export type PerfErrorCode = (typeof PerfErrorCode)[keyof typeof PerfErrorCode];

/**
 * Base class for toolkit errors
 */
export abstract class PerfError extends Error {
  abstract readonly code: PerfErrorCode;

  protected constructor(message: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = new.target.name;
    // Maintain proper stack trace in V8
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }
}

/**
 * Invalid constructor or method argument. Raised before any state is touched.
 */
export class ArgumentError extends PerfError {
  readonly code = PerfErrorCode.InvalidArgument;

  constructor(
    /** Name of the offending parameter */
    public readonly paramName: string,
    detail: string,
  ) {
    super(`Invalid argument "${paramName}": ${detail}`);
  }
}

/**
 * Illegal state transition or lookup of a session that does not exist.
 */
export class InvalidStateError extends PerfError {
  readonly code = PerfErrorCode.InvalidState;

  constructor(
    message: string,
    /** State the target was in when the call was rejected, if it has one */
    public readonly currentState?: string,
  ) {
    super(message);
  }
}

/**
 * A benchmark was aborted through its cancellation signal.
 */
export class CancelledError extends PerfError {
  readonly code = PerfErrorCode.Cancelled;

  constructor(message: string, reason?: unknown) {
    super(message, reason);
  }
}

/**
 * Profiling was requested while no session is active.
 */
export class ProfilerNotStartedError extends PerfError {
  readonly code = PerfErrorCode.ProfilerNotStarted;

  constructor(message = 'No active profiling session. Call startSession() first.') {
    super(message);
  }
}

/**
 * Check whether a value is one of the toolkit's own errors
 */
export function isPerfError(value: unknown): value is PerfError {
  return value instanceof PerfError;
}
