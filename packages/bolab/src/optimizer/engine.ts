import type { JsonObject, Objective, Parameter, ParameterRow } from '../types.js';
import { OptimizerUnavailable } from '../errors.js';

/** One completed experiment as the engine sees it. */
export interface TrainingRow {
  parameters: ParameterRow;
  objectives: Record<string, number>;
}

export interface BuildRequest {
  parameters: Parameter[];
  objectives: Objective[];
  settings: JsonObject;
  measurements: TrainingRow[];
}

export interface Recommendation {
  rows: ParameterRow[];
  /** Updated engine state, when the engine keeps track of pending points. */
  state?: Buffer;
}

/**
 * The external Bayesian-optimization engine. State is an opaque blob the
 * engine produces and is handed back verbatim.
 */
export interface OptimizationEngine {
  readonly name: string;
  build(request: BuildRequest, signal: AbortSignal): Promise<Buffer>;
  recommend(state: Buffer, batchSize: number, signal: AbortSignal): Promise<Recommendation>;
}

/** Stand-in when the workspace names no engine: every call is unavailable. */
export class UnconfiguredEngine implements OptimizationEngine {
  readonly name = 'none';

  async build(): Promise<Buffer> {
    throw new OptimizerUnavailable('No optimization engine configured (set engine.command in .bolab/config.json)');
  }

  async recommend(): Promise<Recommendation> {
    throw new OptimizerUnavailable('No optimization engine configured (set engine.command in .bolab/config.json)');
  }
}
