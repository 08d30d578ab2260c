import Database from 'better-sqlite3';
import { mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import { createLogger } from '../utils/logger.js';
import { resolveFromRoot } from '../utils/paths.js';

const logger = createLogger({ component: 'database' });

let db: Database.Database | null = null;

export function getDatabase(path?: string): Database.Database {
  if (db) {
    return db;
  }

  const dbPath = resolveFromRoot(path ?? process.env.DATABASE_PATH ?? 'data/devices.db');
  logger.info({ dbPath }, 'Initializing database');
  mkdirSync(dirname(dbPath), { recursive: true });

  db = new Database(dbPath);
  db.pragma('journal_mode = WAL');
  runMigrations(db);

  return db;
}

export function runMigrations(database: Database.Database): void {
  logger.info('Running database migrations');

  database.exec(`
    CREATE TABLE IF NOT EXISTS devices (
      device_key TEXT PRIMARY KEY,
      name TEXT NOT NULL,
      category TEXT NOT NULL,
      room TEXT,
      aliases TEXT NOT NULL DEFAULT '[]',
      position INTEGER NOT NULL,
      updated_at INTEGER DEFAULT (strftime('%s', 'now'))
    );

    CREATE INDEX IF NOT EXISTS idx_devices_position ON devices(position);
  `);

  logger.info('Database migrations complete');
}

export function closeDatabase(): void {
  if (db) {
    db.close();
    db = null;
    logger.info('Database connection closed');
  }
}
