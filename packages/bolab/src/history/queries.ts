import type Database from 'better-sqlite3';
import { z } from 'zod';
import type {
  BatchStatus, Measurement, ParameterRow, Provenance, ResultRow, RunBatch, RunResult,
} from '../types.js';
import { BatchNotFound, StorageError, ValidationError } from '../errors.js';

/**
 * Run ledger operations as named functions using prepared statements.
 * Each function takes a db instance so we can test with in-memory DBs.
 */

interface BatchRecord {
  batch_id: string;
  sequence: number;
  generated_at: string;
  status: string;
  provenance: string;
  config_version: number;
  config_hash: string;
  fallback_reason: string | null;
  seed: number | null;
  completed_at: string | null;
}

interface ResultRecord {
  batch_id: string;
  row_index: number;
  objectives: string;
  ingested_at: string;
}

interface MeasurementRecord extends ResultRecord {
  parameters: string;
}

const ParameterRowSchema = z.record(z.union([z.number(), z.string()]));
const ObjectiveValuesSchema = z.record(z.number());

function parseColumn<T>(schema: z.ZodType<T>, text: string, where: string): T {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    throw new StorageError(`Corrupt ledger entry in ${where}`, where, { cause: err });
  }
  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    throw new StorageError(`Corrupt ledger entry in ${where}`, where);
  }
  return parsed.data;
}

function toStatus(value: string): BatchStatus {
  if (value === 'pending' || value === 'completed') return value;
  throw new StorageError(`Unknown batch status '${value}'`, 'batches');
}

function toProvenance(value: string): Provenance {
  if (value === 'optimizer' || value === 'fallback' || value === 'import') return value;
  throw new StorageError(`Unknown batch provenance '${value}'`, 'batches');
}

export function formatBatchId(sequence: number): string {
  return `batch-${String(sequence).padStart(4, '0')}`;
}

// ── Batches ──────────────────────────────────────────────────

export interface NewBatch {
  generated_at: string;
  provenance: Provenance;
  config_version: number;
  config_hash: string;
  fallback_reason: string | null;
  seed: number | null;
  rows: ParameterRow[];
}

export function nextSequence(db: Database.Database): number {
  const row = db.prepare<[], { last: number }>(
    'SELECT COALESCE(MAX(sequence), 0) AS last FROM batches',
  ).get();
  return (row?.last ?? 0) + 1;
}

/**
 * Append a pending batch and its rows in one transaction.
 * The batch id is derived from the next free sequence number.
 */
/** Names of values JSON cannot carry (NaN and the infinities become null). */
function nonFiniteValues(row: ParameterRow): string[] {
  return Object.entries(row)
    .filter(([, value]) => typeof value === 'number' && !Number.isFinite(value))
    .map(([name]) => name);
}

export function insertBatch(db: Database.Database, batch: NewBatch): RunBatch {
  const issues = batch.rows.flatMap((row, index) =>
    nonFiniteValues(row).map(name => `row ${index}: '${name}' is not a finite number`));
  if (issues.length > 0) {
    throw new ValidationError('Refusing to store a batch with non-finite values', issues);
  }

  const insertHeader = db.prepare(`
    INSERT INTO batches (batch_id, sequence, generated_at, status, provenance, config_version, config_hash, fallback_reason, seed)
    VALUES (?, ?, ?, 'pending', ?, ?, ?, ?, ?)
  `);
  const insertRow = db.prepare(`
    INSERT INTO batch_rows (batch_id, row_index, parameters) VALUES (?, ?, ?)
  `);

  const batchId = db.transaction(() => {
    const sequence = nextSequence(db);
    const id = formatBatchId(sequence);
    insertHeader.run(
      id, sequence, batch.generated_at, batch.provenance,
      batch.config_version, batch.config_hash, batch.fallback_reason, batch.seed,
    );
    batch.rows.forEach((row, index) => {
      insertRow.run(id, index, JSON.stringify(row));
    });
    return id;
  })();

  const stored = getBatch(db, batchId);
  if (!stored) throw new BatchNotFound(batchId);
  return stored;
}

function batchRows(db: Database.Database, batchId: string): ParameterRow[] {
  return db.prepare<[string], { parameters: string }>(`
    SELECT parameters FROM batch_rows WHERE batch_id = ? ORDER BY row_index
  `).all(batchId).map(r => parseColumn(ParameterRowSchema, r.parameters, `batch_rows(${batchId})`));
}

function toBatch(db: Database.Database, record: BatchRecord): RunBatch {
  return {
    batch_id: record.batch_id,
    sequence: record.sequence,
    generated_at: record.generated_at,
    status: toStatus(record.status),
    provenance: toProvenance(record.provenance),
    config_version: record.config_version,
    config_hash: record.config_hash,
    fallback_reason: record.fallback_reason,
    seed: record.seed,
    completed_at: record.completed_at,
    rows: batchRows(db, record.batch_id),
  };
}

export function getBatch(db: Database.Database, batchId: string): RunBatch | null {
  const record = db.prepare<[string], BatchRecord>('SELECT * FROM batches WHERE batch_id = ?').get(batchId);
  return record ? toBatch(db, record) : null;
}

export function listBatches(db: Database.Database): RunBatch[] {
  return db.prepare<[], BatchRecord>('SELECT * FROM batches ORDER BY sequence')
    .all()
    .map(record => toBatch(db, record));
}

export function countBatches(db: Database.Database, status?: BatchStatus): number {
  const row = status
    ? db.prepare<[string], { n: number }>('SELECT COUNT(*) AS n FROM batches WHERE status = ?').get(status)
    : db.prepare<[], { n: number }>('SELECT COUNT(*) AS n FROM batches').get();
  return row?.n ?? 0;
}

// ── Results ──────────────────────────────────────────────────

/**
 * Append one result per row and flip the batch to completed, atomically.
 * Callers validate coverage first; the ledger only enforces uniqueness.
 */
export function completeBatch(
  db: Database.Database,
  batchId: string,
  results: ResultRow[],
  ingestedAt: string,
): RunResult[] {
  const insertResult = db.prepare(`
    INSERT INTO results (batch_id, row_index, objectives, ingested_at) VALUES (?, ?, ?, ?)
  `);
  const markCompleted = db.prepare(`
    UPDATE batches SET status = 'completed', completed_at = ? WHERE batch_id = ? AND status = 'pending'
  `);

  db.transaction(() => {
    for (const result of results) {
      insertResult.run(batchId, result.row_index, JSON.stringify(result.values), ingestedAt);
    }
    const info = markCompleted.run(ingestedAt, batchId);
    if (info.changes !== 1) {
      throw new BatchNotFound(batchId);
    }
  })();

  return results.map(r => ({
    batch_id: batchId,
    row_index: r.row_index,
    values: r.values,
    ingested_at: ingestedAt,
  }));
}

/**
 * Append an already-measured batch (rows and results) in one transaction.
 */
export function insertCompletedBatch(
  db: Database.Database,
  batch: NewBatch,
  results: ResultRow[],
  ingestedAt: string,
): RunBatch {
  const batchId = db.transaction(() => {
    const created = insertBatch(db, batch);
    completeBatch(db, created.batch_id, results, ingestedAt);
    return created.batch_id;
  })();
  const stored = getBatch(db, batchId);
  if (!stored) throw new BatchNotFound(batchId);
  return stored;
}

export function listResults(db: Database.Database, batchId?: string): RunResult[] {
  const records = batchId
    ? db.prepare<[string], ResultRecord>(`
        SELECT batch_id, row_index, objectives, ingested_at FROM results WHERE batch_id = ? ORDER BY row_index
      `).all(batchId)
    : db.prepare<[], ResultRecord>(`
        SELECT batch_id, row_index, objectives, ingested_at FROM results ORDER BY id
      `).all();
  return records.map(r => ({
    batch_id: r.batch_id,
    row_index: r.row_index,
    values: parseColumn(ObjectiveValuesSchema, r.objectives, `results(${r.batch_id})`),
    ingested_at: r.ingested_at,
  }));
}

/**
 * Every completed row joined with its parameters, in ingestion order.
 */
export function listMeasurements(db: Database.Database): Measurement[] {
  return db.prepare<[], MeasurementRecord>(`
    SELECT r.batch_id, r.row_index, br.parameters, r.objectives, r.ingested_at
    FROM results r
    JOIN batch_rows br ON br.batch_id = r.batch_id AND br.row_index = r.row_index
    ORDER BY r.id
  `).all().map(r => ({
    batch_id: r.batch_id,
    row_index: r.row_index,
    parameters: parseColumn(ParameterRowSchema, r.parameters, `batch_rows(${r.batch_id})`),
    objectives: parseColumn(ObjectiveValuesSchema, r.objectives, `results(${r.batch_id})`),
    ingested_at: r.ingested_at,
  }));
}

export function countResults(db: Database.Database): number {
  const row = db.prepare<[], { n: number }>('SELECT COUNT(*) AS n FROM results').get();
  return row?.n ?? 0;
}
