import { mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import Database from 'better-sqlite3';
import { config } from '../config.js';
import { createChildLogger } from '../logger.js';

const log = createChildLogger('db');

export type Db = Database.Database;

let _db: Db | null = null;

/** 스키마까지 만든 새 연결. 테스트는 ':memory:'로 직접 연다 */
export function openDb(path: string): Db {
  if (path !== ':memory:') mkdirSync(dirname(path), { recursive: true });
  const db = new Database(path);
  if (path !== ':memory:') {
    db.pragma('journal_mode = WAL');
    db.pragma('synchronous = NORMAL');
  }
  initSchema(db);
  return db;
}

export function getDb(): Db {
  if (!_db) {
    _db = openDb(config.db.path);
    log.info({ path: config.db.path }, 'Database initialized');
  }
  return _db;
}

export function closeDb(): void {
  if (_db) {
    _db.close();
    _db = null;
  }
}

function initSchema(db: Db): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS api_credentials (
      id          TEXT PRIMARY KEY,
      owner_id    TEXT NOT NULL,
      nickname    TEXT NOT NULL,
      api_key     TEXT NOT NULL,
      api_secret  TEXT NOT NULL,
      active      INTEGER NOT NULL DEFAULT 1,
      created_at  INTEGER NOT NULL
    );

    CREATE TABLE IF NOT EXISTS strategy_presets (
      id          TEXT PRIMARY KEY,
      owner_id    TEXT NOT NULL,
      name        TEXT NOT NULL,
      body        TEXT NOT NULL,
      updated_at  INTEGER NOT NULL
    );

    CREATE TABLE IF NOT EXISTS execution_outcomes (
      correlation_id  TEXT PRIMARY KEY,
      owner_id        TEXT NOT NULL,
      strategy_id     TEXT NOT NULL,
      status          TEXT NOT NULL,
      review_required INTEGER NOT NULL,
      body            TEXT NOT NULL,
      finalized_at    INTEGER NOT NULL
    );

    CREATE TABLE IF NOT EXISTS audit_log (
      id              INTEGER PRIMARY KEY AUTOINCREMENT,
      timestamp       INTEGER NOT NULL DEFAULT (strftime('%s','now') * 1000),
      level           TEXT NOT NULL,
      module          TEXT NOT NULL,
      action          TEXT NOT NULL,
      detail          TEXT,
      correlation_id  TEXT
    );

    CREATE INDEX IF NOT EXISTS idx_credentials_owner ON api_credentials(owner_id);
    CREATE INDEX IF NOT EXISTS idx_presets_owner ON strategy_presets(owner_id);
    CREATE INDEX IF NOT EXISTS idx_outcomes_owner ON execution_outcomes(owner_id, finalized_at);
    CREATE INDEX IF NOT EXISTS idx_audit_ts ON audit_log(timestamp);
  `);
}
