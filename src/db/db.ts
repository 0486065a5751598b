// src/db/db.ts
import Database from 'better-sqlite3';
import { dirname, join } from 'path';
import { mkdirSync, existsSync } from 'fs';

// ./data/app.db unless DB_PATH says otherwise; tests run against ':memory:'
const DB_PATH = process.env.DB_PATH || join(process.cwd(), 'data', 'app.db');

if (DB_PATH !== ':memory:') {
  const dataDir = dirname(DB_PATH);
  if (!existsSync(dataDir)) {
    mkdirSync(dataDir, { recursive: true });
  }
}

const db: Database.Database = new Database(DB_PATH);

// WAL lets request handlers read while the cleanup job writes
db.pragma('journal_mode = WAL');

db.exec(`
  -- Encrypted OAuth tokens, one row per user
  CREATE TABLE IF NOT EXISTS auth (
    user_id TEXT PRIMARY KEY,
    refresh_token TEXT NOT NULL,
    access_token TEXT,
    expiry_date DATETIME
  );

  -- Cookie sessions
  CREATE TABLE IF NOT EXISTS sessions (
    session_id TEXT PRIMARY KEY,
    user_id TEXT NOT NULL,
    expires_at DATETIME NOT NULL,
    created_at DATETIME DEFAULT CURRENT_TIMESTAMP
  );

  CREATE INDEX IF NOT EXISTS idx_sessions_user_id ON sessions(user_id);
  CREATE INDEX IF NOT EXISTS idx_sessions_expires ON sessions(expires_at);

  -- Multi-match awaiting a numeric selection, at most one per session
  CREATE TABLE IF NOT EXISTS pending_confirmations (
    session_id TEXT PRIMARY KEY,
    action TEXT NOT NULL CHECK(action IN ('delete', 'move')),
    intent_json TEXT NOT NULL,
    matches_json TEXT NOT NULL,
    expires_at DATETIME NOT NULL,
    created_at DATETIME DEFAULT CURRENT_TIMESTAMP
  );

  CREATE INDEX IF NOT EXISTS idx_pending_expires ON pending_confirmations(expires_at);
`);

export default db;
