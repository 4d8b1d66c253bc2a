/**
 * Profile Session
 *
 * Accumulates operation metrics over an open-ended recording window.
 *
 * @packageDocumentation
 */

import { NameSchema, SessionState, createOperationMetrics, parseArgument } from '@dispatch-perf/types';
import type { OperationMetrics, OperationMetricsInput, SessionStateValue } from '@dispatch-perf/types';
import { createReadonlyView } from './readonly-view';
import { SessionStateMachine, createSessionStateMachine } from './session-state-machine';
import type { StateTransitionHandler } from './session-state-machine';

/**
 * Plain snapshot of a session, as written by the JSON report
 */
export interface ProfileSessionSnapshot {
  sessionName: string;
  state: SessionStateValue;
  startTime?: number;
  endTime?: number;
  duration: number;
  totalMemoryUsed: number;
  totalAllocations: number;
  averageOperationDuration: number;
  operations: OperationMetrics[];
}

/**
 * Profile Session
 *
 * Every method runs to completion without yielding, so an append and the
 * matching update of both running sums are never observed half-done by
 * another task. `operations` is one live read-only view for the lifetime of
 * the session.
 */
export class ProfileSession {
  readonly sessionName: string;

  private readonly stateMachine: SessionStateMachine;
  private readonly recorded: OperationMetrics[] = [];
  private readonly operationsView: readonly OperationMetrics[];
  private memoryTotal = 0;
  private allocationTotal = 0;
  private startedAt: number | undefined;
  private endedAt: number | undefined;
  private startMark = 0;
  private stopMark = 0;

  /**
   * @throws ArgumentError (parameter `sessionName`) for a missing or blank name
   */
  constructor(sessionName: string) {
    this.sessionName = parseArgument(NameSchema, sessionName, 'sessionName');
    this.stateMachine = createSessionStateMachine(this.sessionName);
    this.operationsView = createReadonlyView(this.recorded, `operations of session '${this.sessionName}'`);
  }

  get state(): SessionStateValue {
    return this.stateMachine.getState();
  }

  get isRunning(): boolean {
    return this.state === SessionState.Running;
  }

  /**
   * Epoch milliseconds of the latest start, undefined before the first
   */
  get startTime(): number | undefined {
    return this.startedAt;
  }

  /**
   * Epoch milliseconds of the latest stop, undefined unless stopped
   */
  get endTime(): number | undefined {
    return this.endedAt;
  }

  /**
   * Milliseconds recorded: live while running, fixed once stopped, 0 before start
   */
  get duration(): number {
    switch (this.state) {
      case SessionState.NotStarted:
        return 0;
      case SessionState.Running:
        return performance.now() - this.startMark;
      case SessionState.Stopped:
        return this.stopMark - this.startMark;
    }
  }

  get operations(): readonly OperationMetrics[] {
    return this.operationsView;
  }

  get operationCount(): number {
    return this.recorded.length;
  }

  get totalMemoryUsed(): number {
    return this.memoryTotal;
  }

  get totalAllocations(): number {
    return this.allocationTotal;
  }

  /**
   * Mean duration of the recorded operations, 0 when there are none
   */
  get averageOperationDuration(): number {
    if (this.recorded.length === 0) {
      return 0;
    }
    let total = 0;
    for (const operation of this.recorded) {
      total += operation.duration;
    }
    return total / this.recorded.length;
  }

  /**
   * Begin recording. A stopped session may be started again.
   *
   * @throws InvalidStateError if the session is already running
   */
  start(): void {
    const startedAt = Date.now();
    const startMark = performance.now();
    this.stateMachine.transition({ type: 'start' }, () => {
      this.startedAt = startedAt;
      this.startMark = startMark;
      this.endedAt = undefined;
    });
  }

  /**
   * End recording and freeze `duration`
   *
   * @throws InvalidStateError if the session is not running
   */
  stop(): void {
    const stopMark = performance.now();
    const endedAt = Date.now();
    this.stateMachine.transition({ type: 'stop' }, () => {
      this.stopMark = stopMark;
      this.endedAt = endedAt;
    });
  }

  /**
   * Append a copy of `metrics` and add it to the running sums. Allowed in any state.
   *
   * @throws ArgumentError (parameter `metrics`) when missing or invalid; nothing is recorded
   */
  addOperation(metrics: OperationMetricsInput): void {
    const operation = createOperationMetrics(metrics);
    this.recorded.push(operation);
    this.memoryTotal += operation.memoryUsed;
    this.allocationTotal += operation.allocations;
  }

  /**
   * Drop all operations and reset the sums; the lifecycle state is kept
   */
  clear(): void {
    this.recorded.length = 0;
    this.memoryTotal = 0;
    this.allocationTotal = 0;
  }

  /**
   * Subscribe to lifecycle transitions
   */
  onStateChange(handler: StateTransitionHandler): () => void {
    return this.stateMachine.onTransition(handler);
  }

  toJSON(): ProfileSessionSnapshot {
    return {
      sessionName: this.sessionName,
      state: this.state,
      startTime: this.startedAt,
      endTime: this.endedAt,
      duration: this.duration,
      totalMemoryUsed: this.memoryTotal,
      totalAllocations: this.allocationTotal,
      averageOperationDuration: this.averageOperationDuration,
      operations: [...this.recorded],
    };
  }
}

/**
 * Create a profile session
 */
export function createProfileSession(sessionName: string): ProfileSession {
  return new ProfileSession(sessionName);
}
