import fs from 'node:fs';
import path from 'node:path';
import type Database from 'better-sqlite3';
import { HistoryDbError, errorMessage } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import { getPackageRoot } from '../shared/utils.js';

const MIGRATION_FILE = /^\d{3}_[a-z0-9_]+\.sql$/;

export interface MigrationReport {
  applied: string[];
  skipped: string[];
}

export function defaultMigrationsDir(): string {
  return path.join(getPackageRoot(), 'src', 'db', 'migrations');
}

/** `NNN_name.sql` files in apply order. Anything else in the directory is an error. */
export function listMigrations(dir: string): string[] {
  if (!fs.existsSync(dir)) {
    throw new HistoryDbError(`Run history migrations not found: ${dir}`, { dir });
  }

  const files = fs.readdirSync(dir).filter((f) => f.endsWith('.sql'));
  const misnamed = files.filter((f) => !MIGRATION_FILE.test(f));
  if (misnamed.length > 0) {
    throw new HistoryDbError('Run history migrations must be named NNN_name.sql', { misnamed });
  }
  return files.sort();
}

/**
 * Bring the run history schema up to date. Each pending file runs in its own
 * transaction together with its `_migrations` entry.
 */
export function runMigrations(db: Database.Database, dir = defaultMigrationsDir()): MigrationReport {
  db.exec(`
    CREATE TABLE IF NOT EXISTS _migrations (
      name       TEXT PRIMARY KEY,
      applied_at TEXT NOT NULL DEFAULT (datetime('now'))
    );
  `);

  const known = new Set(
    db
      .prepare<[], { name: string }>('SELECT name FROM _migrations ORDER BY name')
      .all()
      .map((r) => r.name),
  );
  const record = db.prepare<[string]>('INSERT INTO _migrations (name) VALUES (?)');
  const applied: string[] = [];

  for (const migration of listMigrations(dir)) {
    if (known.has(migration)) continue;

    const sql = fs.readFileSync(path.join(dir, migration), 'utf-8');
    try {
      db.transaction(() => {
        db.exec(sql);
        record.run(migration);
      })();
    } catch (err) {
      throw new HistoryDbError(`Run history migration ${migration} failed`, {
        migration,
        applied,
        cause: errorMessage(err),
      });
    }
    applied.push(migration);
  }

  if (applied.length > 0) {
    logger.info({ history: db.name, applied }, 'Run history schema updated');
  }
  return { applied, skipped: [...known] };
}
