import type { RunBatch } from '../types.js';
import type { OrchestratorState } from './states.js';

export type ProgressListener = (state: OrchestratorState) => void;

/**
 * A batch generation in flight. `result` settles with the persisted batch,
 * or rejects (OperationCancelled after `cancel()`).
 */
export interface BatchTask {
  readonly result: Promise<RunBatch>;
  readonly cancelled: boolean;
  cancel(): void;
  onProgress(listener: ProgressListener): void;
}

export function startBatchTask(
  run: (signal: AbortSignal, progress: ProgressListener) => Promise<RunBatch>,
): BatchTask {
  const controller = new AbortController();
  const listeners: ProgressListener[] = [];
  const progress: ProgressListener = (state) => {
    for (const listener of listeners) listener(state);
  };

  return {
    result: run(controller.signal, progress),
    get cancelled() {
      return controller.signal.aborted;
    },
    cancel() {
      controller.abort();
    },
    onProgress(listener) {
      listeners.push(listener);
    },
  };
}
