import * as fs from 'fs';
import * as path from 'path';
import Database from 'better-sqlite3';
import { databaseLogger } from '../logger';

export type Db = Database.Database;

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS users (
    user_id      INTEGER PRIMARY KEY,
    chat_id      INTEGER NOT NULL,
    display_name TEXT,
    role         TEXT CHECK(role IN ('self','partner','guest')) DEFAULT 'guest',
    created_at   DATETIME DEFAULT CURRENT_TIMESTAMP
  );

  CREATE TABLE IF NOT EXISTS focus_sessions (
    id             INTEGER PRIMARY KEY AUTOINCREMENT,
    user_id        INTEGER NOT NULL,
    started_at_utc TEXT NOT NULL,
    duration_min   INTEGER NOT NULL,
    tag            TEXT,
    phone_commit   INTEGER NOT NULL DEFAULT 0,
    phone_free     INTEGER,
    completed      INTEGER NOT NULL DEFAULT 0,
    notes          TEXT,
    created_at     DATETIME DEFAULT CURRENT_TIMESTAMP
  );
  CREATE INDEX IF NOT EXISTS idx_focus_user_started ON focus_sessions(user_id, started_at_utc);

  CREATE TABLE IF NOT EXISTS focus_daily (
    user_id             INTEGER,
    local_date          TEXT,
    sessions            INTEGER DEFAULT 0,
    phone_free_sessions INTEGER DEFAULT 0,
    PRIMARY KEY (user_id, local_date)
  );

  CREATE TABLE IF NOT EXISTS focus_streaks (
    user_id        INTEGER PRIMARY KEY,
    target_per_day INTEGER DEFAULT 1,
    last_date      TEXT,
    streak_days    INTEGER DEFAULT 0
  );

  CREATE TABLE IF NOT EXISTS reflection_artifacts (
    id         INTEGER PRIMARY KEY AUTOINCREMENT,
    timestamp  TEXT NOT NULL,
    type       TEXT NOT NULL,
    payload_id TEXT NOT NULL,
    recipient  TEXT NOT NULL,
    ack        TEXT
  );

  CREATE TABLE IF NOT EXISTS gamify_users (
    user_id    INTEGER PRIMARY KEY,
    xp         INTEGER NOT NULL DEFAULT 0,
    level      INTEGER NOT NULL DEFAULT 1,
    created_at TEXT DEFAULT (datetime('now'))
  );

  CREATE TABLE IF NOT EXISTS pomodoros (
    id           INTEGER PRIMARY KEY AUTOINCREMENT,
    user_id      INTEGER NOT NULL,
    start_ts     TEXT,
    end_ts       TEXT,
    duration_min INTEGER,
    phone_free   INTEGER DEFAULT 0,
    tag          TEXT,
    local_date   TEXT NOT NULL,
    created_at   TEXT NOT NULL
  );
  CREATE INDEX IF NOT EXISTS idx_pomodoros_date ON pomodoros(local_date, user_id);

  CREATE TABLE IF NOT EXISTS calls (
    id           INTEGER PRIMARY KEY AUTOINCREMENT,
    user_id      INTEGER NOT NULL,
    start_ts     TEXT,
    end_ts       TEXT,
    duration_min INTEGER,
    tag          TEXT,
    notes        TEXT,
    local_date   TEXT NOT NULL,
    created_at   TEXT NOT NULL
  );

  CREATE TABLE IF NOT EXISTS badges (
    id         INTEGER PRIMARY KEY AUTOINCREMENT,
    user_id    INTEGER NOT NULL,
    key        TEXT NOT NULL,
    label      TEXT,
    local_date TEXT NOT NULL,
    awarded_at TEXT NOT NULL,
    UNIQUE (user_id, key)
  );
`;

/**
 * Opens (creating if needed) the bot database and applies the schema. Pass ':memory:' in tests.
 */
export function openDatabase(dbPath: string): Db {
  if (dbPath !== ':memory:') {
    fs.mkdirSync(path.dirname(dbPath), { recursive: true });
  }
  const db = new Database(dbPath);
  db.pragma('journal_mode = WAL');
  db.exec(SCHEMA);
  databaseLogger.info({ dbPath }, 'Database ready');
  return db;
}
