/**
 * SQLite database initialization.
 * Opens the database, enables WAL mode, and runs schema migrations.
 */

import Database from 'better-sqlite3';
import * as path from 'path';
import * as fs from 'fs';
import { defaultDbPath } from '../../config';

export const IN_MEMORY_DB = ':memory:';

const SCHEMA_SQL = `
-- ledger_checkpoints (ILedgerStore)
CREATE TABLE IF NOT EXISTS ledger_checkpoints (
  sequence       INTEGER PRIMARY KEY,
  state_hash     TEXT NOT NULL,
  state_json     TEXT NOT NULL,
  total_staked   TEXT NOT NULL,
  account_count  INTEGER NOT NULL,
  created_at     TEXT NOT NULL
);
CREATE INDEX IF NOT EXISTS idx_ledger_checkpoints_created ON ledger_checkpoints(created_at);
`;

export function openDatabase(dbPath?: string): Database.Database {
  const resolvedPath = dbPath ?? defaultDbPath();

  if (resolvedPath !== IN_MEMORY_DB) {
    const dir = path.dirname(resolvedPath);
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }
  }

  const db = new Database(resolvedPath);

  if (resolvedPath !== IN_MEMORY_DB) {
    db.pragma('journal_mode = WAL');
  }
  db.pragma('foreign_keys = ON');

  db.exec(SCHEMA_SQL);

  return db;
}
