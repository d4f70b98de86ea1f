import Database from 'better-sqlite3';
import { dirname, join } from 'path';
import { ensureDirSync } from '../utils/fs.js';

export type SqliteDatabase = Database.Database;

export const DATABASE_FILE = 'uplift.db';

/**
 * Open the runtime database. Subsystems create their own tables on top of
 * the returned handle; pass ':memory:' for a throwaway database.
 */
export function openDatabase(path: string): SqliteDatabase {
  if (path !== ':memory:') {
    ensureDirSync(dirname(path));
  }

  const db = new Database(path);
  db.pragma('journal_mode = WAL');
  db.pragma('synchronous = NORMAL');
  db.pragma('foreign_keys = ON');
  return db;
}

export function databasePath(dataDir: string): string {
  return join(dataDir, DATABASE_FILE);
}
