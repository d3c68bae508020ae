import Database from 'better-sqlite3';
import { existsSync, mkdirSync } from 'fs';
import { dirname } from 'path';
import { initializeGovernanceTables } from '../migrations/createGovernanceTables';
import { logger } from './logger';

export const IN_MEMORY = ':memory:';

export function openDatabase(databasePath: string): Database.Database {
  if (databasePath !== IN_MEMORY) {
    const dir = dirname(databasePath);
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true });
    }
  }

  const db = new Database(databasePath);
  if (databasePath !== IN_MEMORY) {
    db.pragma('journal_mode = WAL');
  }
  db.pragma('foreign_keys = ON');
  // Writers fail fast with SQLITE_BUSY; retries happen in runSerializable
  db.pragma('busy_timeout = 50');

  initializeGovernanceTables(db);
  logger.info(`[Database] Initialized at ${databasePath}`);
  return db;
}
