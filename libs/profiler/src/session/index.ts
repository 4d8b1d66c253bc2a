export { ProfileSession, createProfileSession } from './profile-session';
export type { ProfileSessionSnapshot } from './profile-session';
export { SessionStateMachine, createSessionStateMachine } from './session-state-machine';
export type { StateTransitionEvent, StateTransitionHandler } from './session-state-machine';
export { createReadonlyView } from './readonly-view';
