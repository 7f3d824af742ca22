import type Database from 'better-sqlite3';

/**
 * Migration system using user_version pragma — no migration table needed.
 * Each migration is an array index: migration[0] upgrades from version 0 to 1, etc.
 */

type Migration = (db: Database.Database) => void;

const migrations: Migration[] = [
  // Migration 001: v0 → v1 — batches, their rows, and measured results
  (db) => {
    db.exec(`
      CREATE TABLE batches (
        batch_id TEXT PRIMARY KEY,
        sequence INTEGER UNIQUE NOT NULL,
        generated_at TEXT NOT NULL,
        status TEXT NOT NULL DEFAULT 'pending' CHECK(status IN ('pending', 'completed')),
        provenance TEXT NOT NULL CHECK(provenance IN ('optimizer', 'fallback', 'import')),
        config_version INTEGER NOT NULL,
        config_hash TEXT NOT NULL,
        fallback_reason TEXT,
        seed INTEGER,
        completed_at TEXT
      );

      CREATE TABLE batch_rows (
        batch_id TEXT NOT NULL REFERENCES batches(batch_id),
        row_index INTEGER NOT NULL,
        parameters TEXT NOT NULL,
        PRIMARY KEY (batch_id, row_index)
      );

      CREATE TABLE results (
        id INTEGER PRIMARY KEY,
        batch_id TEXT NOT NULL,
        row_index INTEGER NOT NULL,
        objectives TEXT NOT NULL,
        ingested_at TEXT NOT NULL,
        UNIQUE (batch_id, row_index),
        FOREIGN KEY (batch_id, row_index) REFERENCES batch_rows(batch_id, row_index)
      );

      CREATE INDEX idx_batches_status ON batches(status);
    `);
  },

  // Migration 002: v1 → v2 — the ledger is append-only; batches may only flip pending → completed
  (db) => {
    db.exec(`
      CREATE TRIGGER batches_no_delete BEFORE DELETE ON batches
      BEGIN SELECT RAISE(ABORT, 'run history is append-only'); END;

      CREATE TRIGGER batches_status_only BEFORE UPDATE ON batches
      WHEN NOT (
        OLD.status = 'pending' AND NEW.status = 'completed'
        AND NEW.batch_id = OLD.batch_id
        AND NEW.sequence = OLD.sequence
        AND NEW.generated_at = OLD.generated_at
        AND NEW.provenance = OLD.provenance
        AND NEW.config_version = OLD.config_version
        AND NEW.config_hash = OLD.config_hash
        AND NEW.fallback_reason IS OLD.fallback_reason
        AND NEW.seed IS OLD.seed
      )
      BEGIN SELECT RAISE(ABORT, 'batches only move from pending to completed'); END;

      CREATE TRIGGER batch_rows_no_update BEFORE UPDATE ON batch_rows
      BEGIN SELECT RAISE(ABORT, 'run history is append-only'); END;

      CREATE TRIGGER batch_rows_no_delete BEFORE DELETE ON batch_rows
      BEGIN SELECT RAISE(ABORT, 'run history is append-only'); END;

      CREATE TRIGGER results_no_update BEFORE UPDATE ON results
      BEGIN SELECT RAISE(ABORT, 'run history is append-only'); END;

      CREATE TRIGGER results_no_delete BEFORE DELETE ON results
      BEGIN SELECT RAISE(ABORT, 'run history is append-only'); END;
    `);
  },
];

export const HISTORY_SCHEMA_VERSION = migrations.length;

/**
 * Run all pending migrations. Uses user_version pragma for tracking.
 */
export function runMigrations(db: Database.Database): void {
  const stored = db.pragma('user_version', { simple: true });
  const currentVersion = typeof stored === 'number' ? stored : 0;

  for (let i = currentVersion; i < migrations.length; i++) {
    db.transaction(() => {
      migrations[i](db);
      db.pragma(`user_version = ${i + 1}`);
    })();
  }
}
