import mysql from 'mysql2/promise';
import type { Pool, RowDataPacket } from 'mysql2/promise';
import type { Config } from '../shared/config.js';
import {
  ConfigurationError,
  DataIntegrityError,
  TransientIOError,
  errorMessage,
} from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import { errorCode, type SqlClient, type SqlParam, type SqlRow } from './sqlClient.js';

const TRANSIENT_CODES = new Set([
  'PROTOCOL_CONNECTION_LOST',
  'PROTOCOL_SEQUENCE_TIMEOUT',
  'ER_CON_COUNT_ERROR',
  'ER_TOO_MANY_USER_CONNECTIONS',
  'ER_LOCK_WAIT_TIMEOUT',
  'ER_LOCK_DEADLOCK',
  'ER_SERVER_SHUTDOWN',
  'ER_QUERY_INTERRUPTED',
  'ER_CLIENT_INTERACTION_TIMEOUT',
]);

const CREDENTIAL_CODES = new Set(['ER_ACCESS_DENIED_ERROR', 'ER_DBACCESS_DENIED_ERROR', 'ER_BAD_DB_ERROR']);

export function classifyMysqlError(err: unknown): Error {
  const code = errorCode(err);
  const message = errorMessage(err);

  if (code && (TRANSIENT_CODES.has(code) || (code.startsWith('E') && !code.startsWith('ER_')))) {
    return new TransientIOError(`Database unavailable: ${message}`, { code });
  }
  if (code && CREDENTIAL_CODES.has(code)) {
    return new ConfigurationError(`Database rejected connection settings: ${message}`, { code });
  }
  return new DataIntegrityError(`Query failed: ${message}`, { code });
}

/**
 * Pooled mysql2 client. The pool is owned by whoever created the client and is
 * released by `close()`.
 */
export class MysqlClient implements SqlClient {
  private readonly pool: Pool;
  private readonly queryTimeoutMs: number;

  constructor(cfg: Config['database']) {
    this.queryTimeoutMs = cfg.query_timeout_ms;
    this.pool = mysql.createPool({
      host: cfg.host,
      port: cfg.port,
      user: cfg.user,
      password: cfg.password,
      database: cfg.database,
      timezone: cfg.timezone,
      connectTimeout: cfg.connect_timeout_ms,
      connectionLimit: cfg.connection_limit,
      waitForConnections: true,
      dateStrings: false,
    });
    logger.debug({ host: cfg.host, port: cfg.port, database: cfg.database }, 'MySQL pool created');
  }

  async query(sql: string, params: readonly SqlParam[] = []): Promise<SqlRow[]> {
    try {
      const [rows] = await this.pool.query<RowDataPacket[]>(
        { sql, timeout: this.queryTimeoutMs },
        [...params],
      );
      return rows;
    } catch (err) {
      throw classifyMysqlError(err);
    }
  }

  async close(): Promise<void> {
    await this.pool.end();
    logger.debug('MySQL pool closed');
  }
}
