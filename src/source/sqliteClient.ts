import Database from 'better-sqlite3';
import { DataIntegrityError, TransientIOError, errorMessage } from '../shared/errors.js';
import { resolvePath } from '../shared/utils.js';
import { errorCode, type SqlClient, type SqlParam, type SqlRow } from './sqlClient.js';

const BUSY_CODES = new Set(['SQLITE_BUSY', 'SQLITE_LOCKED']);

/** `YYYY-MM-DD HH:MM:SS` in UTC, the layout SQLite's date functions use. */
export function toSqliteTimestamp(date: Date): string {
  return date.toISOString().replace('T', ' ').slice(0, 19);
}

function bindable(param: SqlParam): string | number | null {
  return param instanceof Date ? toSqliteTimestamp(param) : param;
}

function isRow(value: unknown): value is SqlRow {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * better-sqlite3 backed client for local runs against a copy of the upstream
 * tables. Timestamps are stored and bound as UTC text.
 */
export class SqliteClient implements SqlClient {
  private readonly db: Database.Database;
  private readonly owned: boolean;

  constructor(source: string | Database.Database) {
    if (typeof source === 'string') {
      this.db =
        source === ':memory:'
          ? new Database(source)
          : new Database(resolvePath(source), { readonly: true, fileMustExist: true });
      this.owned = true;
    } else {
      this.db = source;
      this.owned = false;
    }
  }

  async query(sql: string, params: readonly SqlParam[] = []): Promise<SqlRow[]> {
    try {
      const rows: unknown[] = this.db.prepare(sql).all(...params.map(bindable));
      return rows.filter(isRow);
    } catch (err) {
      const code = errorCode(err);
      if (code && BUSY_CODES.has(code)) {
        throw new TransientIOError(`Database busy: ${errorMessage(err)}`, { code });
      }
      throw new DataIntegrityError(`Query failed: ${errorMessage(err)}`, { code });
    }
  }

  async close(): Promise<void> {
    if (this.owned) this.db.close();
  }
}
