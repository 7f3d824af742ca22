import * as fs from 'node:fs';
import type {
  CampaignConfig, CampaignEdit, CampaignHistory, CampaignSpec, RecordOutcome, ResultRow, RunBatch,
} from './types.js';
import { CampaignNotFound, errorMessage } from './errors.js';
import { campaignsDirFor, loadConfig, type BolabConfig } from './config.js';
import { createCampaignConfig, readCampaignDocument, serializeCampaign, type EditResult } from './campaign/config.js';
import { createEmitter, FanoutEventSink, JsonlEventSink, type EventSink } from './events.js';
import { openHistoryDb } from './history/connection.js';
import type { ImportedRow } from './history/csv.js';
import { OptimizerAdapter } from './optimizer/adapter.js';
import { UnconfiguredEngine, type OptimizationEngine } from './optimizer/engine.js';
import { ProcessEngine } from './optimizer/process-engine.js';
import { CampaignOrchestrator } from './orchestrator/orchestrator.js';
import { startBatchTask, type BatchTask, type ProgressListener } from './orchestrator/task.js';
import { writeFileAtomic } from './workspace/atomic.js';
import { acquireOwnerLock, type OwnerLock } from './workspace/lock.js';
import { campaignPaths, isCampaignId } from './workspace/paths.js';
import type { SettingsService } from './workspace/settings.js';

export interface ServiceOptions {
  /** Workspace root (the directory holding .bolab/). */
  root: string;
  config?: BolabConfig;
  engine?: OptimizationEngine;
  /** Receives every event next to the campaign's events.jsonl. */
  sink?: EventSink;
  settings?: SettingsService;
  now?: () => Date;
  pid?: number;
}

export interface CampaignSummary {
  id: string;
  name: string | null;
  version: number | null;
  updated_at: string | null;
  /** Why the config could not be read, when it could not. */
  error?: string;
}

export interface BatchRequestOptions {
  timeoutMs?: number;
  onProgress?: ProgressListener;
}

interface OpenCampaign {
  orchestrator: CampaignOrchestrator;
  lock: OwnerLock;
}

/** The engine a workspace config names, or one that is always unavailable. */
export function engineFromConfig(config: BolabConfig, root: string): OptimizationEngine {
  const { command, args } = config.engine;
  return command ? new ProcessEngine({ command, args, cwd: root }) : new UnconfiguredEngine();
}

/**
 * Entry point for front ends. Opens campaigns on demand (one orchestrator
 * and owner lock per campaign) and routes every operation to its owner.
 */
export class CampaignService {
  private readonly config: BolabConfig;
  private readonly engine: OptimizationEngine;
  private readonly now: () => Date;
  private readonly open = new Map<string, OpenCampaign>();

  constructor(private readonly options: ServiceOptions) {
    this.config = options.config ?? loadConfig(options.root);
    this.engine = options.engine ?? engineFromConfig(this.config, options.root);
    this.now = options.now ?? (() => new Date());
  }

  get campaignsDir(): string {
    return campaignsDirFor(this.options.root, this.config);
  }

  get workspaceConfig(): BolabConfig {
    return this.config;
  }

  // ── Campaign lifecycle ─────────────────────────────────────

  createCampaign(spec: CampaignSpec): CampaignConfig {
    const config = createCampaignConfig(spec, this.now());
    const paths = campaignPaths(this.campaignsDir, config.id);
    fs.mkdirSync(paths.runsDir, { recursive: true });
    writeFileAtomic(paths.config, serializeCampaign(config));
    return config;
  }

  listCampaigns(): CampaignSummary[] {
    if (!fs.existsSync(this.campaignsDir)) return [];
    const summaries: CampaignSummary[] = [];
    for (const entry of fs.readdirSync(this.campaignsDir, { withFileTypes: true })) {
      if (!entry.isDirectory() || !isCampaignId(entry.name)) continue;
      const id = entry.name;
      const live = this.open.get(id);
      if (live) {
        const c = live.orchestrator.config;
        summaries.push({ id, name: c.name, version: c.version, updated_at: c.updated_at });
        continue;
      }
      const file = campaignPaths(this.campaignsDir, id).config;
      if (!fs.existsSync(file)) continue;
      try {
        const { config } = readCampaignDocument(fs.readFileSync(file, 'utf-8'), this.now());
        summaries.push({ id, name: config.name, version: config.version, updated_at: config.updated_at });
      } catch (err) {
        summaries.push({ id, name: null, version: null, updated_at: null, error: errorMessage(err) });
      }
    }
    return summaries.sort((a, b) => (b.updated_at ?? '').localeCompare(a.updated_at ?? ''));
  }

  /**
   * Open (or return the already open) orchestrator for a campaign.
   * Takes the owner lock; a config stored in an older format is migrated
   * and written back.
   */
  openCampaign(id: string): CampaignOrchestrator {
    const live = this.open.get(id);
    if (live) return live.orchestrator;

    const paths = campaignPaths(this.campaignsDir, id);
    if (!fs.existsSync(paths.config)) {
      throw new CampaignNotFound(id);
    }

    const lock = acquireOwnerLock(paths.lock, id, this.options.pid);
    try {
      const { config, migratedFrom } = readCampaignDocument(fs.readFileSync(paths.config, 'utf-8'), this.now());
      if (migratedFrom !== null) {
        writeFileAtomic(paths.config, serializeCampaign(config));
      }

      const sinks: EventSink[] = [new JsonlEventSink(paths.events)];
      if (this.options.sink) sinks.push(this.options.sink);
      const emit = createEmitter(new FanoutEventSink(sinks), id, this.now);

      const db = openHistoryDb(paths.history);
      const orchestrator = new CampaignOrchestrator({
        config,
        paths,
        db,
        adapter: new OptimizerAdapter({ engine: this.engine, statePath: paths.state, emit, now: this.now }),
        emit,
        timeoutMs: this.config.engine.timeout_ms,
        seed: this.config.sampling.seed,
        now: this.now,
      });

      this.open.set(id, { orchestrator, lock });
      this.options.settings?.recordOpened(id, config.name, this.now());
      return orchestrator;
    } catch (err) {
      lock.release();
      throw err;
    }
  }

  async closeCampaign(id: string): Promise<void> {
    const live = this.open.get(id);
    if (!live) return;
    this.open.delete(id);
    try {
      await live.orchestrator.close();
    } finally {
      live.lock.release();
    }
  }

  async close(): Promise<void> {
    for (const id of [...this.open.keys()]) {
      await this.closeCampaign(id);
    }
  }

  // ── Operations ─────────────────────────────────────────────

  editCampaign(id: string, edit: CampaignEdit): Promise<EditResult> {
    return this.openCampaign(id).editConfig(edit);
  }

  /** Start generating a batch; the task can be cancelled until it is persisted. */
  generateNextBatch(id: string, batchSize: number, options: BatchRequestOptions = {}): BatchTask {
    const orchestrator = this.openCampaign(id);
    const task = startBatchTask((signal, progress) =>
      orchestrator.generateNextBatch(batchSize, { signal, timeoutMs: options.timeoutMs, onProgress: progress }),
    );
    if (options.onProgress) task.onProgress(options.onProgress);
    return task;
  }

  recordResults(id: string, batchId: string, rows: ResultRow[]): Promise<RecordOutcome> {
    return this.openCampaign(id).recordResults(batchId, rows);
  }

  importResults(id: string, rows: ImportedRow[]): Promise<RunBatch> {
    return this.openCampaign(id).importResults(rows);
  }

  getHistory(id: string): CampaignHistory {
    return this.openCampaign(id).getHistory();
  }
}
