export enum OrchestratorState {
  IDLE = 'idle',
  RESOLVING_OPTIMIZER = 'resolving_optimizer',
  SUGGESTING = 'suggesting',
  FALLING_BACK = 'falling_back',
  BATCH_PERSISTED = 'batch_persisted',
}

// Valid transitions
export const TRANSITIONS: Record<OrchestratorState, OrchestratorState[]> = {
  [OrchestratorState.IDLE]:                [OrchestratorState.RESOLVING_OPTIMIZER],
  [OrchestratorState.RESOLVING_OPTIMIZER]: [OrchestratorState.SUGGESTING, OrchestratorState.FALLING_BACK],
  [OrchestratorState.SUGGESTING]:          [OrchestratorState.BATCH_PERSISTED, OrchestratorState.FALLING_BACK],
  [OrchestratorState.FALLING_BACK]:        [OrchestratorState.BATCH_PERSISTED],
  [OrchestratorState.BATCH_PERSISTED]:     [OrchestratorState.IDLE],
};

// Abort transitions — leave a half-finished generation without persisting anything
export type AbortReason = 'cancelled' | 'error';

export const ABORT_TRANSITIONS: Record<AbortReason, (current: OrchestratorState, target: OrchestratorState) => boolean> = {
  cancelled: (current, target) =>
    target === OrchestratorState.IDLE && current !== OrchestratorState.BATCH_PERSISTED,
  error: (current, target) =>
    target === OrchestratorState.IDLE,
};
