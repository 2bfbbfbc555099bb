import Database from 'better-sqlite3';
import fs from 'node:fs';
import path from 'node:path';

export type SqliteDatabase = Database.Database;

export const DEFAULT_DB_PATH = 'memory/relaycast.db';

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS jobs (
    id TEXT PRIMARY KEY,
    name TEXT NOT NULL,
    status TEXT NOT NULL,
    identity_handles TEXT NOT NULL,
    recipient_set_id TEXT NOT NULL,
    template_id TEXT NOT NULL,
    total_targets INTEGER NOT NULL DEFAULT 0,
    sent_count INTEGER NOT NULL DEFAULT 0,
    success_count INTEGER NOT NULL DEFAULT 0,
    failed_count INTEGER NOT NULL DEFAULT 0,
    skipped_count INTEGER NOT NULL DEFAULT 0,
    recipient_cursor INTEGER NOT NULL DEFAULT 0,
    identity_cursor INTEGER NOT NULL DEFAULT 0,
    created_at TEXT NOT NULL,
    started_at TEXT,
    completed_at TEXT,
    scheduled_at TEXT,
    error_log TEXT NOT NULL DEFAULT '[]',
    updated_at DATETIME DEFAULT CURRENT_TIMESTAMP
  );

  CREATE INDEX IF NOT EXISTS idx_jobs_status
    ON jobs(status);

  CREATE TABLE IF NOT EXISTS recipient_sets (
    id TEXT PRIMARY KEY,
    name TEXT NOT NULL,
    source_count INTEGER NOT NULL DEFAULT 0,
    created_at DATETIME DEFAULT CURRENT_TIMESTAMP
  );

  CREATE TABLE IF NOT EXISTS recipients (
    set_id TEXT NOT NULL,
    position INTEGER NOT NULL,
    identifier TEXT NOT NULL,
    identifier_key TEXT NOT NULL,
    kind TEXT NOT NULL,
    resolved_id TEXT,
    resolved_handle TEXT,
    is_valid INTEGER NOT NULL DEFAULT 1,
    error_reason TEXT,
    PRIMARY KEY(set_id, position),
    UNIQUE(set_id, kind, identifier_key),
    FOREIGN KEY(set_id) REFERENCES recipient_sets(id) ON DELETE CASCADE
  );

  CREATE INDEX IF NOT EXISTS idx_recipients_valid
    ON recipients(set_id, is_valid, position);

  CREATE TABLE IF NOT EXISTS blacklist (
    identifier_key TEXT PRIMARY KEY,
    added_at DATETIME DEFAULT CURRENT_TIMESTAMP
  );
`;

/**
 * Open (or create) the relaycast database and apply the schema.
 * Pass `':memory:'` for an ephemeral database.
 */
export function openDatabase(dbPath: string = DEFAULT_DB_PATH): SqliteDatabase {
    if (dbPath !== ':memory:') {
        const dir = path.dirname(path.resolve(dbPath));
        if (!fs.existsSync(dir)) {
            fs.mkdirSync(dir, { recursive: true });
        }
    }

    const db = new Database(dbPath);
    if (dbPath !== ':memory:') {
        db.pragma('journal_mode = WAL');
    }
    db.pragma('foreign_keys = ON');
    db.exec(SCHEMA);
    return db;
}
