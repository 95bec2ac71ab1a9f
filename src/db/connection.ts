/**
 * SQLite run ledger connection
 */

import Database from 'better-sqlite3';
import type { Database as DatabaseType } from 'better-sqlite3';
import { mkdirSync } from 'fs';
import { dirname } from 'path';

export interface DbConnection {
  db: DatabaseType;
  close: () => void;
}

export type StorageMode = 'memory' | 'sqlite';

export interface ConnectionOptions {
  mode: StorageMode;
}

export function createConnection(dbPath: string, options: ConnectionOptions): DbConnection {
  const path = options.mode === 'memory' ? ':memory:' : dbPath;
  if (options.mode === 'sqlite') {
    mkdirSync(dirname(path), { recursive: true });
  }

  const db = new Database(path);

  if (options.mode === 'sqlite') {
    // Concurrent pipeline instances write events while the CLI may read history
    db.pragma('journal_mode = WAL');
    db.pragma('synchronous = NORMAL');
  }

  db.pragma('foreign_keys = ON');

  return {
    db,
    close: () => db.close(),
  };
}

export function runMigrations(db: DatabaseType): void {
  const schema = `
    CREATE TABLE IF NOT EXISTS schema_version (
      version INTEGER PRIMARY KEY,
      applied_at INTEGER NOT NULL
    );

    CREATE TABLE IF NOT EXISTS runs (
      id TEXT PRIMARY KEY,
      tag_ref TEXT NOT NULL,
      policy TEXT NOT NULL,
      started_at INTEGER NOT NULL,
      finished_at INTEGER,
      succeeded INTEGER,
      report_json TEXT
    );

    CREATE INDEX IF NOT EXISTS idx_runs_tag ON runs(tag_ref, started_at);

    CREATE TABLE IF NOT EXISTS events (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      run_id TEXT NOT NULL,
      artifact_name TEXT NOT NULL,
      ts INTEGER NOT NULL,
      from_state TEXT NOT NULL,
      to_state TEXT NOT NULL,
      payload_json TEXT NOT NULL,
      FOREIGN KEY (run_id) REFERENCES runs(id) ON DELETE CASCADE
    );

    CREATE INDEX IF NOT EXISTS idx_events_run ON events(run_id, artifact_name, id);

    INSERT OR IGNORE INTO schema_version (version, applied_at) VALUES (1, ${Date.now()});
  `;

  db.exec(schema);
}
