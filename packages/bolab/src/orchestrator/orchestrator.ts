import type Database from 'better-sqlite3';
import type {
  CampaignConfig, CampaignEdit, CampaignHistory, Measurement, ParameterRow, Provenance,
  RecordOutcome, ResultRow, RunBatch,
} from '../types.js';
import {
  BatchNotFound, BolabError, OperationCancelled, OptimizerUnavailable, ValidationError, errorMessage,
} from '../errors.js';
import type { Emit } from '../events.js';
import { configHash, editCampaignConfig, serializeCampaign, type EditResult } from '../campaign/config.js';
import { coverageIssues, desirability } from '../space/objectives.js';
import { normalizeRow, rowViolations } from '../space/parameters.js';
import {
  completeBatch, getBatch, insertBatch, insertCompletedBatch, listBatches,
  listMeasurements, listResults, nextSequence,
} from '../history/queries.js';
import { batchToCsv, type ImportedRow } from '../history/csv.js';
import type { OptimizerAdapter } from '../optimizer/adapter.js';
import { Deadline } from '../optimizer/abort.js';
import { FallbackSampler } from '../sampling/fallback.js';
import { randomSeed, seedFromString } from '../sampling/prng.js';
import { writeFileAtomic } from '../workspace/atomic.js';
import { runCsvPath, type CampaignPaths } from '../workspace/paths.js';
import { isPositiveInteger, nowIso } from '../utils.js';
import { OrchestratorState } from './states.js';
import { StateTracker } from './machine.js';
import { SerialQueue } from './queue.js';

export interface OrchestratorOptions {
  config: CampaignConfig;
  paths: CampaignPaths;
  db: Database.Database;
  adapter: OptimizerAdapter;
  emit: Emit;
  /** Deadline for one optimizer attempt (resolve + suggest). */
  timeoutMs: number;
  /** Base seed for fallback sampling; random per batch when null. */
  seed?: number | null;
  sampler?: FallbackSampler;
  now?: () => Date;
}

export interface GenerateOptions {
  signal?: AbortSignal;
  timeoutMs?: number;
  onProgress?: (state: OrchestratorState) => void;
}

/**
 * Owns one campaign: its config, run ledger and optimizer adapter.
 * Mutations run one at a time through a serial queue.
 */
export class CampaignOrchestrator {
  private readonly queue = new SerialQueue();
  private readonly tracker = new StateTracker();
  private readonly sampler: FallbackSampler;
  private readonly now: () => Date;
  private _config: CampaignConfig;
  private closed = false;

  constructor(private readonly options: OrchestratorOptions) {
    this._config = options.config;
    this.sampler = options.sampler ?? new FallbackSampler();
    this.now = options.now ?? (() => new Date());
  }

  get id(): string {
    return this._config.id;
  }

  get config(): CampaignConfig {
    return this._config;
  }

  get state(): OrchestratorState {
    return this.tracker.state;
  }

  private get db(): Database.Database {
    return this.options.db;
  }

  private assertOpen(): void {
    if (this.closed) {
      throw new BolabError(`Campaign ${this.id} is closed`, 'CAMPAIGN_CLOSED', { campaignId: this.id });
    }
  }

  // ── Suggestions ────────────────────────────────────────────

  /**
   * Produce and persist the next pending batch: optimizer first, random
   * sampling once if the optimizer is unavailable or misses the deadline.
   */
  async generateNextBatch(batchSize: number, options: GenerateOptions = {}): Promise<RunBatch> {
    this.assertOpen();
    if (!isPositiveInteger(batchSize)) {
      throw new ValidationError(`Batch size must be a positive integer, got ${batchSize}`);
    }
    return this.queue.run(() => this.generate(batchSize, options));
  }

  private async generate(batchSize: number, options: GenerateOptions): Promise<RunBatch> {
    this.assertOpen();
    if (options.signal?.aborted) {
      throw new OperationCancelled('Batch generation');
    }

    const timeoutMs = options.timeoutMs ?? this.options.timeoutMs;
    const unwatch = options.onProgress ? this.tracker.watch(options.onProgress) : () => {};
    const deadline = new Deadline(timeoutMs, options.signal);
    const config = this._config;
    const sequence = nextSequence(this.db);

    try {
      this.tracker.to(OrchestratorState.RESOLVING_OPTIMIZER);
      this.options.emit('optimizer_attempted', { batch_size: batchSize, engine: this.options.adapter.engineName });

      let rows: ParameterRow[];
      let provenance: Provenance = 'optimizer';
      let fallbackReason: string | null = null;
      let seed: number | null = null;

      try {
        const handle = await this.options.adapter.resolve(config, listMeasurements(this.db), deadline.signal);
        this.tracker.to(OrchestratorState.SUGGESTING);
        rows = await this.options.adapter.suggestBatch(handle, batchSize, deadline.signal);
      } catch (err) {
        if (deadline.cause === 'cancelled') throw new OperationCancelled('Batch generation');
        if (!(err instanceof OptimizerUnavailable)) throw err;

        fallbackReason = deadline.cause === 'timeout'
          ? `optimizer timed out after ${timeoutMs} ms`
          : err.message;
        this.options.emit('optimizer_unavailable', { reason: fallbackReason });
        this.tracker.to(OrchestratorState.FALLING_BACK);

        seed = this.batchSeed(sequence);
        rows = this.sampler.sample(config.parameters, batchSize, seed);
        provenance = 'fallback';
        this.options.emit('fallback_used', { reason: fallbackReason, seed });
      }

      if (deadline.cause === 'cancelled') {
        throw new OperationCancelled('Batch generation');
      }

      const batch = insertBatch(this.db, {
        generated_at: nowIso(this.now()),
        provenance,
        config_version: config.version,
        config_hash: configHash(config),
        fallback_reason: fallbackReason,
        seed,
        rows,
      });
      this.tracker.to(OrchestratorState.BATCH_PERSISTED);
      this.options.emit('batch_persisted', {
        batch_id: batch.batch_id,
        provenance: batch.provenance,
        rows: batch.rows.length,
        config_version: batch.config_version,
      });
      this.writeRunFile(batch);
      this.tracker.to(OrchestratorState.IDLE);
      return batch;
    } catch (err) {
      this.tracker.abort(err instanceof OperationCancelled ? 'cancelled' : 'error');
      throw err;
    } finally {
      deadline.dispose();
      unwatch();
    }
  }

  private batchSeed(sequence: number): number {
    const base = this.options.seed;
    return base === null || base === undefined ? randomSeed() : seedFromString(`${base}:${sequence}`);
  }

  // ── Results ────────────────────────────────────────────────

  /**
   * Append measured results for a pending batch and mark it completed.
   * Resubmitting a completed batch changes nothing.
   */
  async recordResults(batchId: string, rows: ResultRow[]): Promise<RecordOutcome> {
    this.assertOpen();
    return this.queue.run((): RecordOutcome => {
      this.assertOpen();
      const batch = getBatch(this.db, batchId);
      if (!batch) throw new BatchNotFound(batchId);

      if (batch.status === 'completed') {
        this.writeRunFile(batch);
        return { batch_id: batchId, status: 'already_completed', appended: 0 };
      }

      const issues = this.resultIssues(batch, rows);
      if (issues.length > 0) {
        throw new ValidationError(`Invalid results for ${batchId}`, issues);
      }

      const ordered = [...rows].sort((a, b) => a.row_index - b.row_index);
      completeBatch(this.db, batchId, ordered, nowIso(this.now()));
      const completed = getBatch(this.db, batchId);
      if (!completed) throw new BatchNotFound(batchId);

      this.options.emit('result_ingested', { batch_id: batchId, rows: ordered.length });
      this.writeRunFile(completed);
      return { batch_id: batchId, status: 'completed', appended: ordered.length };
    });
  }

  private resultIssues(batch: RunBatch, rows: ResultRow[]): string[] {
    const issues: string[] = [];
    const expected = batch.rows.length;
    if (rows.length !== expected) {
      issues.push(`expected ${expected} result row(s), got ${rows.length}`);
    }
    const seen = new Set<number>();
    for (const row of rows) {
      if (!Number.isInteger(row.row_index) || row.row_index < 0 || row.row_index >= expected) {
        issues.push(`row_index ${row.row_index} is not in 0..${expected - 1}`);
        continue;
      }
      if (seen.has(row.row_index)) {
        issues.push(`row_index ${row.row_index} appears more than once`);
      }
      seen.add(row.row_index);
      for (const problem of coverageIssues(this._config.objectives, row.values)) {
        issues.push(`row ${row.row_index}: ${problem}`);
      }
    }
    return issues;
  }

  /**
   * Append previously measured experiments as one completed batch.
   * Every row must lie in the current parameter space and carry every objective.
   */
  async importResults(rows: ImportedRow[]): Promise<RunBatch> {
    this.assertOpen();
    return this.queue.run(() => {
      this.assertOpen();
      const config = this._config;
      if (rows.length === 0) {
        throw new ValidationError('Nothing to import');
      }

      const issues: string[] = [];
      rows.forEach((row, i) => {
        const bad = rowViolations(config.parameters, row.parameters);
        if (bad.length > 0) issues.push(`row ${i}: out of domain (${bad.join(', ')})`);
        for (const problem of coverageIssues(config.objectives, row.values)) {
          issues.push(`row ${i}: ${problem}`);
        }
      });
      if (issues.length > 0) {
        throw new ValidationError('Invalid import', issues);
      }

      const at = nowIso(this.now());
      const batch = insertCompletedBatch(this.db, {
        generated_at: at,
        provenance: 'import',
        config_version: config.version,
        config_hash: configHash(config),
        fallback_reason: null,
        seed: null,
        rows: rows.map(r => normalizeRow(config.parameters, r.parameters)),
      }, rows.map((r, i) => ({ row_index: i, values: r.values })), at);

      this.options.emit('batch_persisted', {
        batch_id: batch.batch_id,
        provenance: batch.provenance,
        rows: batch.rows.length,
        config_version: batch.config_version,
      });
      this.options.emit('result_ingested', { batch_id: batch.batch_id, rows: batch.rows.length });
      this.writeRunFile(batch);
      return batch;
    });
  }

  // ── Config ─────────────────────────────────────────────────

  /**
   * Apply an edit and save config.json. Structural edits release the
   * optimizer state; the next suggestion rebuilds it.
   */
  async editConfig(edit: CampaignEdit): Promise<EditResult> {
    this.assertOpen();
    return this.queue.run(() => {
      this.assertOpen();
      const result = editCampaignConfig(this._config, edit, this.now());
      if (result.config === this._config) return result;

      writeFileAtomic(this.options.paths.config, serializeCampaign(result.config));
      this._config = result.config;
      if (result.structural) {
        this.options.adapter.invalidate();
      }
      this.options.emit('config_edited', { version: result.config.version, structural: result.structural });
      return result;
    });
  }

  // ── Reads ──────────────────────────────────────────────────

  getHistory(): CampaignHistory {
    this.assertOpen();
    const measurements = listMeasurements(this.db);
    return {
      campaign_id: this.id,
      config_version: this._config.version,
      batches: listBatches(this.db),
      results: listResults(this.db),
      best: this.best(measurements),
    };
  }

  getBatch(batchId: string): RunBatch {
    this.assertOpen();
    const batch = getBatch(this.db, batchId);
    if (!batch) throw new BatchNotFound(batchId);
    return batch;
  }

  private best(measurements: Measurement[]): (Measurement & { score: number }) | null {
    let best: (Measurement & { score: number }) | null = null;
    for (const m of measurements) {
      const score = desirability(this._config.objectives, m.objectives);
      if (score === null) continue;
      if (!best || score > best.score) best = { ...m, score };
    }
    return best;
  }

  /** Rewrite runs/<batch_id>.csv from the ledger. */
  exportBatch(batch: RunBatch): string {
    const file = runCsvPath(this.options.paths, batch.batch_id);
    writeFileAtomic(file, batchToCsv(this._config.parameters, batch));
    return file;
  }

  /**
   * Refresh the run file after the ledger has committed. The ledger is the
   * record; a failed write is reported and `bolab export` can redo it.
   */
  private writeRunFile(batch: RunBatch): void {
    try {
      this.exportBatch(batch);
    } catch (err) {
      this.options.emit('run_file_failed', { batch_id: batch.batch_id, reason: errorMessage(err) });
    }
  }

  /** Wait for queued work, then release the optimizer and the ledger. */
  async close(): Promise<void> {
    if (this.closed) return;
    await this.queue.run(() => {
      if (this.closed) return;
      this.closed = true;
      this.options.adapter.invalidate();
      this.db.close();
    });
  }
}
