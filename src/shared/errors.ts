export class ReportsError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'ReportsError';
  }
}

/** Bad or inconsistent configuration. Fatal, never retried. */
export class ConfigurationError extends ReportsError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'CONFIG_ERROR', details);
    this.name = 'ConfigurationError';
  }
}

/** Connection loss, timeouts, throttling. Retried with backoff, then escalated. */
export class TransientIOError extends ReportsError {
  constructor(message: string, details?: Record<string, unknown>, code = 'TRANSIENT_IO') {
    super(message, code, details);
    this.name = 'TransientIOError';
  }
}

export class RunTimeoutError extends TransientIOError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, details, 'RUN_TIMEOUT');
    this.name = 'RunTimeoutError';
  }
}

/** Header mismatch, malformed query, upstream schema drift. Fatal. */
export class DataIntegrityError extends ReportsError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'DATA_INTEGRITY', details);
    this.name = 'DataIntegrityError';
  }
}

export class NotificationError extends ReportsError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'NOTIFICATION_ERROR', details);
    this.name = 'NotificationError';
  }
}

export class HistoryDbError extends ReportsError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'HISTORY_DB_ERROR', details);
    this.name = 'HistoryDbError';
  }
}

export class UnknownReportError extends ReportsError {
  constructor(report: string) {
    super(`Unknown report: ${report}`, 'UNKNOWN_REPORT', { report });
    this.name = 'UnknownReportError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
