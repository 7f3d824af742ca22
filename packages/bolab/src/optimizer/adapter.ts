import type { CampaignConfig, Measurement, OptimizerStateTag, Parameter, ParameterRow } from '../types.js';
import { BolabError, OptimizerUnavailable, StaleStateError, errorMessage } from '../errors.js';
import type { Emit } from '../events.js';
import { configHash } from '../campaign/config.js';
import { normalizeRow, rowSatisfiesSpace, rowViolations } from '../space/parameters.js';
import { nowIso } from '../utils.js';
import type { OptimizationEngine, TrainingRow } from './engine.js';
import { raceAbort } from './abort.js';
import { assertFresh, loadState, removeState, saveState, STATE_FORMAT } from './state-store.js';

/** Opaque reference to a live engine state held by the adapter. */
export interface OptimizerHandle {
  readonly id: number;
  readonly tag: OptimizerStateTag;
}

interface HandleEntry {
  tag: OptimizerStateTag;
  blob: Buffer;
  parameters: Parameter[];
}

export interface AdapterOptions {
  engine: OptimizationEngine;
  statePath: string;
  emit: Emit;
  now?: () => Date;
}

type RebuildReason = 'missing' | 'corrupt' | 'stale';

/** Engine failures of any kind become OptimizerUnavailable; storage errors pass through. */
function asUnavailable(err: unknown, what: string): BolabError {
  if (err instanceof BolabError) return err;
  return new OptimizerUnavailable(`${what} failed: ${errorMessage(err)}`, undefined, { cause: err });
}

/**
 * Bridges one campaign to the optimization engine. Owns the handle table
 * and optimizer_state.bin; decides between reusing, loading and rebuilding
 * engine state. Never retries: every failure is reported to the caller.
 */
export class OptimizerAdapter {
  private readonly handles = new Map<number, HandleEntry>();
  private nextId = 1;
  private current: OptimizerHandle | null = null;
  private readonly now: () => Date;

  constructor(private readonly options: AdapterOptions) {
    this.now = options.now ?? (() => new Date());
  }

  get engineName(): string {
    return this.options.engine.name;
  }

  /** Number of live handles. */
  get size(): number {
    return this.handles.size;
  }

  /**
   * Return a handle whose state matches `config` and `measurements`:
   * the live one, the one on disk, or a freshly built one.
   */
  async resolve(config: CampaignConfig, measurements: Measurement[], signal: AbortSignal): Promise<OptimizerHandle> {
    const hash = configHash(config);
    const count = measurements.length;

    if (this.current && this.handles.has(this.current.id)) {
      try {
        assertFresh(this.current.tag, this.engineName, hash, count);
        return this.current;
      } catch (err) {
        if (!(err instanceof StaleStateError)) throw err;
        this.release(this.current);
      }
    }

    let reason: RebuildReason = 'missing';
    const loaded = loadState(this.options.statePath);
    if (loaded.status === 'ok') {
      try {
        assertFresh(loaded.state.tag, this.engineName, hash, count);
        const handle = this.register(loaded.state.tag, loaded.state.blob, config.parameters);
        this.options.emit('optimizer_state_loaded', {
          config_version: loaded.state.tag.config_version,
          measurements: loaded.state.tag.measurements,
        });
        return handle;
      } catch (err) {
        if (!(err instanceof StaleStateError)) throw err;
        reason = 'stale';
      }
    } else if (loaded.status === 'corrupt') {
      reason = 'corrupt';
    }

    return this.rebuild(config, measurements, hash, reason, signal);
  }

  private async rebuild(
    config: CampaignConfig,
    measurements: Measurement[],
    hash: string,
    reason: RebuildReason,
    signal: AbortSignal,
  ): Promise<OptimizerHandle> {
    const training: TrainingRow[] = [];
    let excluded = 0;
    for (const m of measurements) {
      if (rowSatisfiesSpace(config.parameters, m.parameters)) {
        training.push({ parameters: normalizeRow(config.parameters, m.parameters), objectives: m.objectives });
      } else {
        excluded++;
      }
    }
    if (excluded > 0) {
      this.options.emit('measurements_excluded', { count: excluded, config_version: config.version });
    }

    let blob: Buffer;
    try {
      blob = await raceAbort(
        this.options.engine.build({
          parameters: config.parameters,
          objectives: config.objectives,
          settings: config.settings,
          measurements: training,
        }, signal),
        signal,
        () => new OptimizerUnavailable('Optimizer build aborted'),
      );
    } catch (err) {
      throw asUnavailable(err, 'Optimizer build');
    }

    const tag: OptimizerStateTag = {
      format: STATE_FORMAT,
      engine: this.options.engine.name,
      config_hash: hash,
      config_version: config.version,
      measurements: measurements.length,
      built_at: nowIso(this.now()),
    };
    const handle = this.register(tag, blob, config.parameters);
    this.persistState(handle);
    this.options.emit('optimizer_state_rebuilt', { reason, measurements: training.length, excluded });
    return handle;
  }

  /**
   * Ask the engine for exactly `batchSize` in-domain rows. Any deviation is
   * OptimizerUnavailable; nothing is returned partially.
   */
  async suggestBatch(handle: OptimizerHandle, batchSize: number, signal: AbortSignal): Promise<ParameterRow[]> {
    const entry = this.handles.get(handle.id);
    if (!entry) {
      throw new OptimizerUnavailable('Unknown or released optimizer handle', { handle: handle.id });
    }

    let rows: ParameterRow[];
    let state: Buffer | undefined;
    try {
      const recommendation = await raceAbort(
        this.options.engine.recommend(entry.blob, batchSize, signal),
        signal,
        () => new OptimizerUnavailable('Optimizer recommendation aborted'),
      );
      rows = recommendation.rows;
      state = recommendation.state;
    } catch (err) {
      if (!signal.aborted) this.discard(handle);
      throw asUnavailable(err, 'Optimizer recommendation');
    }

    if (rows.length !== batchSize) {
      throw new OptimizerUnavailable(`Optimizer returned ${rows.length} row(s), expected ${batchSize}`);
    }
    rows.forEach((row, index) => {
      const bad = rowViolations(entry.parameters, row);
      if (bad.length > 0) {
        throw new OptimizerUnavailable(`Optimizer row ${index} is outside the parameter space (${bad.join(', ')})`);
      }
    });

    if (state) {
      entry.blob = state;
      this.persistState(handle);
    }
    return rows.map(row => normalizeRow(entry.parameters, row));
  }

  /** Write the handle's tag and blob to optimizer_state.bin. */
  persistState(handle: OptimizerHandle): void {
    const entry = this.handles.get(handle.id);
    if (!entry) {
      throw new OptimizerUnavailable('Unknown or released optimizer handle', { handle: handle.id });
    }
    saveState(this.options.statePath, entry.tag, entry.blob);
  }

  /** Drop every live handle; the next resolve goes back to disk or rebuilds. */
  invalidate(): void {
    this.handles.clear();
    this.current = null;
  }

  /** Forget a state the engine could not use, in memory and on disk, so the next resolve rebuilds. */
  private discard(handle: OptimizerHandle): void {
    this.release(handle);
    removeState(this.options.statePath);
  }

  private register(tag: OptimizerStateTag, blob: Buffer, parameters: Parameter[]): OptimizerHandle {
    const handle: OptimizerHandle = { id: this.nextId++, tag };
    this.handles.set(handle.id, { tag, blob, parameters });
    this.current = handle;
    return handle;
  }

  private release(handle: OptimizerHandle): void {
    this.handles.delete(handle.id);
    if (this.current?.id === handle.id) this.current = null;
  }
}
