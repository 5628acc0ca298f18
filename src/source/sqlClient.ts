export type SqlParam = string | number | Date | null;
export type SqlRow = Record<string, unknown>;

/**
 * Minimal read-only surface the DataSource needs from a database driver.
 * Implementations classify driver failures into TransientIOError,
 * DataIntegrityError or ConfigurationError.
 */
export interface SqlClient {
  query(sql: string, params?: readonly SqlParam[]): Promise<SqlRow[]>;
  close(): Promise<void>;
}

export function errorCode(err: unknown): string | undefined {
  if (err instanceof Error && 'code' in err && typeof err.code === 'string') {
    return err.code;
  }
  return undefined;
}
