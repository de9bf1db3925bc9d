/**
 * Primary server lifecycle state machine.
 *
 * Encodes the valid transitions of the server's lifecycle state. The server
 * refuses (and logs) anything else, so the status channel can never report
 * e.g. Stopped→ReadyToServe.
 *
 * Valid transitions:
 *   Initializing → WaitingEvent | Idle | Stopped
 *   WaitingEvent → ReadyToServe | Idle | Stopped
 *   ReadyToServe → Idle | Stopped
 *   Idle         → Initializing (reconfiguration) | Stopped
 */

export const LifecycleState = {
  Initializing: 0,
  WaitingEvent: 1,
  ReadyToServe: 2,
  Idle: 3,
  Stopped: 4,
} as const;

export type LifecycleState = (typeof LifecycleState)[keyof typeof LifecycleState];

export type LifecycleStateName = keyof typeof LifecycleState;

const STATE_NAMES: Record<LifecycleState, LifecycleStateName> = {
  0: 'Initializing',
  1: 'WaitingEvent',
  2: 'ReadyToServe',
  3: 'Idle',
  4: 'Stopped',
};

const VALID_TRANSITIONS: Record<LifecycleState, readonly LifecycleState[]> = {
  [LifecycleState.Initializing]: [LifecycleState.WaitingEvent, LifecycleState.Idle, LifecycleState.Stopped],
  [LifecycleState.WaitingEvent]: [LifecycleState.ReadyToServe, LifecycleState.Idle, LifecycleState.Stopped],
  [LifecycleState.ReadyToServe]: [LifecycleState.Idle, LifecycleState.Stopped],
  [LifecycleState.Idle]:         [LifecycleState.Initializing, LifecycleState.Stopped],
  [LifecycleState.Stopped]:      [],  // Terminal
};

export function stateName(state: LifecycleState): LifecycleStateName {
  return STATE_NAMES[state];
}

export function isLifecycleState(value: number): value is LifecycleState {
  return Object.prototype.hasOwnProperty.call(STATE_NAMES, value);
}

/**
 * Check if a lifecycle transition is valid.
 *
 * @returns true if transitioning from `from` to `to` is allowed
 */
export function canTransition(from: LifecycleState, to: LifecycleState): boolean {
  return VALID_TRANSITIONS[from].includes(to);
}

export function isTerminalState(state: LifecycleState): boolean {
  return VALID_TRANSITIONS[state].length === 0;
}

/**
 * Whether a worker should go ahead and request work from a server in this state.
 * A server that is still initializing or generating will answer once the event is ready.
 */
export function acceptsWorkRequests(state: LifecycleState): boolean {
  return (
    state === LifecycleState.Initializing ||
    state === LifecycleState.WaitingEvent ||
    state === LifecycleState.ReadyToServe
  );
}
