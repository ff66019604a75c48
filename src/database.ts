import Database from 'better-sqlite3';
import fs from 'fs';
import path from 'path';
import { config } from './config.js';

const DB_FILENAME = 'ledger.db';

let db: Database.Database | null = null;

/**
 * Open a ledger database and make sure the schema exists.
 * Pass ':memory:' for a throwaway database.
 */
export function openDatabase(filename: string): Database.Database {
  if (filename !== ':memory:') {
    fs.mkdirSync(path.dirname(filename), { recursive: true });
  }
  const database = new Database(filename);
  if (filename !== ':memory:') {
    database.pragma('journal_mode = WAL');
  }
  database.pragma('foreign_keys = ON');
  initializeSchema(database);
  return database;
}

/**
 * Process-wide ledger database under config.dataDir
 */
export function getDatabase(): Database.Database {
  if (!db) {
    db = openDatabase(path.join(config.dataDir, DB_FILENAME));
  }
  return db;
}

export function closeDatabase(): void {
  if (db) {
    db.close();
    db = null;
  }
}

// Points and volume columns hold integer hundredths (12.34 is stored as 1234).
function initializeSchema(database: Database.Database): void {
  database.exec(`
    CREATE TABLE IF NOT EXISTS wallets (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      user_id TEXT NOT NULL UNIQUE,
      handle TEXT,
      address TEXT NOT NULL,
      credential_ref TEXT NOT NULL,
      settings TEXT NOT NULL DEFAULT '{}',
      referral_code TEXT NOT NULL UNIQUE,
      referred_by TEXT REFERENCES wallets(referral_code) ON UPDATE CASCADE,
      total_points INTEGER NOT NULL DEFAULT 0 CHECK (total_points >= 0),
      total_volume INTEGER NOT NULL DEFAULT 0 CHECK (total_volume >= 0),
      created_at TEXT NOT NULL,
      CHECK (referred_by IS NULL OR referred_by <> referral_code)
    );

    CREATE INDEX IF NOT EXISTS idx_wallets_referred_by ON wallets(referred_by);
    CREATE INDEX IF NOT EXISTS idx_wallets_address ON wallets(address);

    CREATE TABLE IF NOT EXISTS points_history (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      user_id TEXT NOT NULL REFERENCES wallets(user_id),
      points_earned INTEGER NOT NULL CHECK (points_earned >= 0),
      points_type TEXT NOT NULL CHECK (points_type IN ('trade', 'referral_trade', 'referral_signup')),
      volume INTEGER,
      market_id TEXT,
      market_title TEXT,
      referred_user_id TEXT,
      description TEXT NOT NULL DEFAULT '',
      grant_key TEXT NOT NULL UNIQUE,
      created_at TEXT NOT NULL
    );

    CREATE INDEX IF NOT EXISTS idx_points_history_user_id ON points_history(user_id);
    CREATE INDEX IF NOT EXISTS idx_points_history_created_at ON points_history(created_at);
    CREATE INDEX IF NOT EXISTS idx_points_history_points_type ON points_history(points_type);

    CREATE TABLE IF NOT EXISTS copy_subscriptions (
      user_id TEXT NOT NULL REFERENCES wallets(user_id) ON DELETE CASCADE,
      target_wallet TEXT NOT NULL,
      target_name TEXT NOT NULL,
      scale_factor REAL NOT NULL DEFAULT 1 CHECK (scale_factor > 0),
      enabled INTEGER NOT NULL DEFAULT 1,
      created_at TEXT NOT NULL,
      PRIMARY KEY (user_id, target_wallet)
    );

    CREATE INDEX IF NOT EXISTS idx_copy_subscriptions_target ON copy_subscriptions(target_wallet);

    CREATE TABLE IF NOT EXISTS mirror_orders (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      event_key TEXT NOT NULL,
      user_id TEXT NOT NULL REFERENCES wallets(user_id),
      market_id TEXT NOT NULL,
      token_id TEXT NOT NULL,
      side TEXT NOT NULL CHECK (side IN ('BUY', 'SELL')),
      requested_size REAL NOT NULL,
      price REAL,
      order_type TEXT NOT NULL DEFAULT 'FOK',
      outcome TEXT NOT NULL CHECK (outcome IN ('pending', 'filled', 'killed', 'error', 'skipped')),
      order_id TEXT,
      detail TEXT,
      submitted_at TEXT NOT NULL,
      finalized_at TEXT,
      UNIQUE (user_id, event_key)
    );

    CREATE INDEX IF NOT EXISTS idx_mirror_orders_user_id ON mirror_orders(user_id);
  `);
}
