import { OrchestratorState, TRANSITIONS, ABORT_TRANSITIONS } from './states.js';
import type { AbortReason } from './states.js';

/**
 * Validate and execute a state transition.
 * Throws if the transition is invalid.
 */
export function transition(current: OrchestratorState, target: OrchestratorState): OrchestratorState {
  const valid = TRANSITIONS[current];
  if (!valid.includes(target)) {
    throw new Error(
      `Invalid transition: ${current} → ${target}. Valid: [${valid.join(', ')}]`
    );
  }
  return target;
}

/**
 * Return all valid next states from the current state.
 */
export function validNext(current: OrchestratorState): OrchestratorState[] {
  return TRANSITIONS[current];
}

/**
 * Validate and execute an abort transition back to idle.
 * Throws if the transition is not allowed for the given reason.
 */
export function abortTransition(
  current: OrchestratorState,
  target: OrchestratorState,
  reason: AbortReason,
): OrchestratorState {
  const allowed = ABORT_TRANSITIONS[reason];
  if (!allowed(current, target)) {
    throw new Error(
      `Invalid abort transition (${reason}): ${current} → ${target}`
    );
  }
  return target;
}

/**
 * Tracks the current state of one campaign's generation cycle and reports
 * every state it enters to the current watcher.
 */
export class StateTracker {
  private _state = OrchestratorState.IDLE;
  private listener: ((state: OrchestratorState) => void) | null = null;

  get state(): OrchestratorState {
    return this._state;
  }

  /** Report entered states to `listener` until the returned function is called. */
  watch(listener: (state: OrchestratorState) => void): () => void {
    this.listener = listener;
    return () => {
      if (this.listener === listener) this.listener = null;
    };
  }

  to(target: OrchestratorState): void {
    this._state = transition(this._state, target);
    this.listener?.(this._state);
  }

  abort(reason: AbortReason): void {
    if (this._state === OrchestratorState.IDLE) return;
    this._state = abortTransition(this._state, OrchestratorState.IDLE, reason);
    this.listener?.(this._state);
  }
}
