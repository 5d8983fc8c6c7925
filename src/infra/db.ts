import Database from 'better-sqlite3';
import fs from 'node:fs';
import path from 'node:path';

export type HistoryDb = Database.Database;

export function openDb(dbPath: string): HistoryDb {
  if (dbPath !== ':memory:') {
    const dir = path.dirname(dbPath);
    if (!fs.existsSync(dir)) fs.mkdirSync(dir, { recursive: true });
  }

  const db = new Database(dbPath);
  if (dbPath !== ':memory:') db.pragma('journal_mode = WAL');

  migrate(db);
  return db;
}

export function migrate(db: HistoryDb) {
  db.exec(`
    CREATE TABLE IF NOT EXISTS cycles (
      id TEXT PRIMARY KEY,
      revision INTEGER,
      outcome TEXT NOT NULL,
      paths_json TEXT NOT NULL,
      recompiled INTEGER NOT NULL,
      duration_ms INTEGER NOT NULL,
      diagnostics_json TEXT NOT NULL,
      created_at INTEGER NOT NULL
    );

    CREATE INDEX IF NOT EXISTS idx_cycles_created_at ON cycles(created_at);
    CREATE INDEX IF NOT EXISTS idx_cycles_outcome ON cycles(outcome);
  `);
}
