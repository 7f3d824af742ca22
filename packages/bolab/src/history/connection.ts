import Database from 'better-sqlite3';
import * as fs from 'node:fs';
import * as path from 'node:path';
import { runMigrations } from './migrations.js';

/**
 * Open a campaign's run ledger with WAL mode and foreign keys.
 * Auto-runs migrations. Creates the parent directory when missing.
 */
export function openHistoryDb(dbPath: string): Database.Database {
  const dir = path.dirname(dbPath);
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true });
  }
  const db = new Database(dbPath);
  db.pragma('journal_mode = WAL');
  db.pragma('foreign_keys = ON');
  runMigrations(db);
  return db;
}

/**
 * Open a fresh in-memory ledger for testing.
 */
export function openTestDb(): Database.Database {
  const db = new Database(':memory:');
  db.pragma('foreign_keys = ON');
  runMigrations(db);
  return db;
}
