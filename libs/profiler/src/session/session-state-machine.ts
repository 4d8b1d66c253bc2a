/**
 * Session State Machine
 *
 * Manages the recording lifecycle of a profile session.
 *
 * @packageDocumentation
 */

import { InvalidStateError, SessionState } from '@dispatch-perf/types';
import type { SessionStateValue } from '@dispatch-perf/types';

/**
 * State transition event types
 */
export type StateTransitionEvent = { type: 'start' } | { type: 'stop' };

/**
 * Valid state transitions
 */
const VALID_TRANSITIONS: Record<SessionStateValue, SessionStateValue[]> = {
  not_started: ['running'],
  running: ['stopped'],
  stopped: ['running'],
};

/**
 * State transition handler
 */
export type StateTransitionHandler = (
  from: SessionStateValue,
  to: SessionStateValue,
  event: StateTransitionEvent,
) => void;

/**
 * Session State Machine
 *
 * Enforces valid state transitions and notifies listeners.
 */
export class SessionStateMachine {
  private state: SessionStateValue;
  private readonly handlers: Set<StateTransitionHandler>;

  constructor(
    /** Session name used in rejection messages */
    private readonly label: string,
    initialState: SessionStateValue = SessionState.NotStarted,
  ) {
    this.state = initialState;
    this.handlers = new Set();
  }

  /**
   * Get current state
   */
  getState(): SessionStateValue {
    return this.state;
  }

  /**
   * Subscribe to state transitions
   */
  onTransition(handler: StateTransitionHandler): () => void {
    this.handlers.add(handler);
    return () => {
      this.handlers.delete(handler);
    };
  }

  /**
   * Transition based on an event
   *
   * `commit` runs after the state changes and before handlers are notified,
   * so handlers see the owner fully updated.
   *
   * @throws InvalidStateError if the transition is invalid; the state is unchanged and `commit` is not called
   */
  transition(event: StateTransitionEvent, commit?: () => void): void {
    const targetState = this.getTargetState(event);

    if (!this.canTransition(targetState)) {
      throw new InvalidStateError(this.describeRejection(event), this.state);
    }

    const previousState = this.state;
    this.state = targetState;
    commit?.();

    // Notify handlers
    for (const handler of this.handlers) {
      try {
        handler(previousState, targetState, event);
      } catch {
        // Ignore handler errors
      }
    }
  }

  /**
   * Check if a transition to target state is valid
   */
  canTransition(targetState: SessionStateValue): boolean {
    const validTargets = VALID_TRANSITIONS[this.state];
    return validTargets.includes(targetState);
  }

  /**
   * Get the target state for an event
   */
  private getTargetState(event: StateTransitionEvent): SessionStateValue {
    switch (event.type) {
      case 'start':
        return SessionState.Running;
      case 'stop':
        return SessionState.Stopped;
    }
  }

  private describeRejection(event: StateTransitionEvent): string {
    switch (event.type) {
      case 'start':
        return `Cannot start session '${this.label}': session is already running`;
      case 'stop':
        return `Cannot stop session '${this.label}': session is not running`;
    }
  }

  /**
   * Clear all handlers
   */
  clearHandlers(): void {
    this.handlers.clear();
  }
}

/**
 * Create a new session state machine
 */
export function createSessionStateMachine(label: string, initialState?: SessionStateValue): SessionStateMachine {
  return new SessionStateMachine(label, initialState);
}
