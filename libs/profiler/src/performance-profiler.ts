/**
 * Performance Profiler
 *
 * Keeps named profile sessions and records measured calls into the active one.
 *
 * @packageDocumentation
 */

import { InvalidStateError, NameSchema, ProfilerNotStartedError, parseArgument } from '@dispatch-perf/types';
import type { MemorySnapshotProvider } from '@dispatch-perf/types';
import { childLogger } from './logger';
import type { Logger } from './logger';
import { MetricsCollector } from './metrics-collector';
import { ProfileReport } from './profile-report';
import type { PerformanceThresholds } from './profile-report';
import { ProfileSession } from './session';

/**
 * Profiler configuration
 */
export interface PerformanceProfilerOptions {
  /**
   * Collector used by profile() and profileAsync()
   * @default a MetricsCollector reading the process heap
   */
  collector?: MetricsCollector;

  /**
   * Memory provider for the default collector
   */
  memory?: MemorySnapshotProvider;

  logger?: Logger;
}

/**
 * Performance Profiler
 *
 * Manages the lifecycle of multiple profile sessions:
 * - Session creation, lookup and removal
 * - One active session that profile() records into
 * - Report generation with optional thresholds
 */
export class PerformanceProfiler {
  private readonly registry: Map<string, ProfileSession>;
  private readonly collector: MetricsCollector;
  private readonly logger: Logger;
  private active: ProfileSession | undefined;

  constructor(options: PerformanceProfilerOptions = {}) {
    this.registry = new Map();
    this.collector = options.collector ?? new MetricsCollector({ memory: options.memory });
    this.logger = options.logger ?? childLogger('performance-profiler');
  }

  /**
   * Session that profile() records into, if any
   */
  get activeSession(): ProfileSession | undefined {
    return this.active;
  }

  /**
   * Copy of the registered sessions; later changes to the profiler are not reflected
   */
  get sessions(): ReadonlyMap<string, ProfileSession> {
    return new Map(this.registry);
  }

  /**
   * Create, start and activate a session
   *
   * @throws ArgumentError for a blank name
   * @throws InvalidStateError if a session with this name exists
   */
  startSession(sessionName: string): ProfileSession {
    const name = parseArgument(NameSchema, sessionName, 'sessionName');
    if (this.registry.has(name)) {
      throw new InvalidStateError(`Session '${name}' already exists`);
    }

    const session = new ProfileSession(name);
    session.start();
    this.registry.set(name, session);
    this.active = session;
    this.logger.info({ session: name }, 'profiling session started');
    return session;
  }

  /**
   * Stop a session; stopping the active session deactivates it
   *
   * @throws InvalidStateError if the session is unknown or not running
   */
  stopSession(sessionName: string): ProfileSession {
    const session = this.requireSession(sessionName);
    session.stop();
    if (this.active === session) {
      this.active = undefined;
    }
    this.logger.info(
      { session: session.sessionName, durationMs: session.duration, operations: session.operationCount },
      'profiling session stopped',
    );
    return session;
  }

  /**
   * @throws InvalidStateError if no session is active
   */
  stopActiveSession(): ProfileSession {
    if (!this.active) {
      throw new InvalidStateError('No active session to stop');
    }
    return this.stopSession(this.active.sessionName);
  }

  /**
   * Run `fn` and record its metrics in the active session
   *
   * @throws ProfilerNotStartedError if no session is active; `fn` is not called
   */
  profile<T>(operationName: string, fn: () => T): T {
    const session = this.requireActive();
    const { result, metrics } = this.collector.collect(operationName, fn);
    session.addOperation(metrics);
    return result;
  }

  /**
   * Await `fn` and record its metrics in the session that was active when it began
   *
   * @throws ProfilerNotStartedError if no session is active; `fn` is not called
   */
  async profileAsync<T>(operationName: string, fn: () => PromiseLike<T> | T): Promise<T> {
    const session = this.requireActive();
    const { result, metrics } = await this.collector.collectAsync(operationName, fn);
    session.addOperation(metrics);
    return result;
  }

  getSession(sessionName: string): ProfileSession | undefined {
    return this.registry.get(sessionName);
  }

  /**
   * Forget a session; removing the active session deactivates it
   */
  removeSession(sessionName: string): boolean {
    const session = this.registry.get(sessionName);
    if (!session) {
      return false;
    }
    this.registry.delete(sessionName);
    if (this.active === session) {
      this.active = undefined;
    }
    return true;
  }

  /**
   * Forget every session
   */
  clear(): void {
    this.registry.clear();
    this.active = undefined;
  }

  /**
   * @throws InvalidStateError if the session is unknown
   */
  generateReport(sessionName: string, thresholds?: PerformanceThresholds): ProfileReport {
    return new ProfileReport(this.requireSession(sessionName), thresholds);
  }

  /**
   * @throws InvalidStateError if no session is active
   */
  generateActiveReport(thresholds?: PerformanceThresholds): ProfileReport {
    if (!this.active) {
      throw new InvalidStateError('No active session to report on');
    }
    return new ProfileReport(this.active, thresholds);
  }

  private requireSession(sessionName: string): ProfileSession {
    const session = this.registry.get(sessionName);
    if (!session) {
      throw new InvalidStateError(`Session '${sessionName}' not found`);
    }
    return session;
  }

  private requireActive(): ProfileSession {
    if (!this.active) {
      throw new ProfilerNotStartedError();
    }
    return this.active;
  }
}

/**
 * Create a performance profiler
 */
export function createPerformanceProfiler(options?: PerformanceProfilerOptions): PerformanceProfiler {
  return new PerformanceProfiler(options);
}
