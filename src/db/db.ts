import Database from 'better-sqlite3';
import fs from 'node:fs';
import path from 'node:path';
import { resolvePath } from '../shared/utils.js';
import { HistoryDbError } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import { runMigrations } from './migrate.js';

/**
 * Open the run history database and bring its schema up to date.
 * `:memory:` is accepted for tests and throwaway runs.
 */
export function initDb(dbPath: string): Database.Database {
  const resolved = dbPath === ':memory:' ? ':memory:' : resolvePath(dbPath);

  if (resolved !== ':memory:') {
    fs.mkdirSync(path.dirname(resolved), { recursive: true });
  }

  let db: Database.Database;
  try {
    db = new Database(resolved);
    db.pragma('journal_mode = WAL');
    db.pragma('busy_timeout = 5000');
  } catch (err) {
    throw new HistoryDbError(`Failed to open run history at ${resolved}`, {
      path: resolved,
      cause: err instanceof Error ? err.message : String(err),
    });
  }

  try {
    runMigrations(db);
  } catch (err) {
    db.close();
    throw err;
  }

  logger.debug({ path: resolved }, 'Run history opened');
  return db;
}
