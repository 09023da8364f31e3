/**
 * Session State Machine
 *
 * Menu flow for one interactive session.
 *
 * State Flow:
 * MAIN_MENU → SCANNING → SELECT_INPUT → SELECT_OUTPUT → SELECT_FILES → CONVERTING → MAIN_MENU
 *          ↘ EXITED
 *
 * Rules:
 * - Cancelling any selection step returns to MAIN_MENU
 * - EXITED is terminal
 * - Invalid transitions throw errors
 */

import { StateTransitionError } from './errors/index.js';

export const SESSION_STATES = [
  'MAIN_MENU',
  'SCANNING',
  'SELECT_INPUT',
  'SELECT_OUTPUT',
  'SELECT_FILES',
  'CONVERTING',
  'EXITED',
] as const;

export type SessionState = typeof SESSION_STATES[number];

/**
 * Represents a state transition with metadata
 */
export interface SessionStateTransition {
  from: SessionState;
  to: SessionState;
  timestamp: Date;
  reason?: string;
}

/**
 * Valid state transitions
 * Maps each state to the set of states it can transition to
 */
const validTransitions: Record<SessionState, ReadonlySet<SessionState>> = {
  MAIN_MENU: new Set<SessionState>([
    'SCANNING',
    'MAIN_MENU', // Invalid choice, shown again
    'EXITED',
  ]),
  SCANNING: new Set<SessionState>([
    'SELECT_INPUT',
    'EXITED', // Nothing to convert
  ]),
  SELECT_INPUT: new Set<SessionState>([
    'SELECT_OUTPUT',
    'MAIN_MENU',
    'EXITED',
  ]),
  SELECT_OUTPUT: new Set<SessionState>([
    'SELECT_FILES',
    'MAIN_MENU',
    'EXITED',
  ]),
  SELECT_FILES: new Set<SessionState>([
    'CONVERTING',
    'MAIN_MENU',
    'EXITED',
  ]),
  CONVERTING: new Set<SessionState>([
    'MAIN_MENU',
    'EXITED',
  ]),
  EXITED: new Set<SessionState>([]), // Terminal state
};

/**
 * Check if a state transition is valid
 */
export function isValidTransition(from: SessionState, to: SessionState): boolean {
  return validTransitions[from].has(to);
}

/**
 * Get all valid next states from the current state
 */
export function getNextStates(current: SessionState): SessionState[] {
  return Array.from(validTransitions[current]);
}

export class SessionStateMachine {
  private currentState: SessionState;
  private readonly history: SessionStateTransition[] = [];

  constructor(initialState: SessionState = 'MAIN_MENU') {
    this.currentState = initialState;
  }

  getState(): SessionState {
    return this.currentState;
  }

  getHistory(): ReadonlyArray<SessionStateTransition> {
    return [...this.history];
  }

  canTransitionTo(targetState: SessionState): boolean {
    return isValidTransition(this.currentState, targetState);
  }

  /**
   * Transition to a new state
   * Throws StateTransitionError if the transition is invalid
   */
  transitionTo(targetState: SessionState, reason?: string): SessionStateTransition {
    if (!this.canTransitionTo(targetState)) {
      throw new StateTransitionError(this.currentState, targetState);
    }

    const transition: SessionStateTransition = {
      from: this.currentState,
      to: targetState,
      timestamp: new Date(),
      reason,
    };

    this.history.push(transition);
    this.currentState = targetState;

    return transition;
  }

  /**
   * Return to the main menu, e.g. after a cancelled selection
   */
  reset(reason?: string): SessionStateTransition {
    return this.transitionTo('MAIN_MENU', reason);
  }

  isTerminal(): boolean {
    return this.currentState === 'EXITED';
  }
}
