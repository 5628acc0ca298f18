import type Database from 'better-sqlite3';
import type { PipelineStage, RunResult, RunStatus } from '../report/types.js';
import { HistoryDbError } from '../shared/errors.js';

/** A persisted run, serialisable as-is. */
export interface RunRecord {
  id: string;
  report: string;
  status: RunStatus;
  windowStart: string | null;
  windowEnd: string | null;
  timezone: string | null;
  rowsFetched: number;
  rowsAppended: number;
  rowsSkippedAsDuplicate: number;
  failedStage: PipelineStage | null;
  errorKind: string | null;
  errorCode: string | null;
  errorMessage: string | null;
  notificationError: string | null;
  startedAt: string;
  finishedAt: string;
  durationMs: number;
}

interface RunRow {
  id: string;
  report: string;
  status: string;
  window_start: string | null;
  window_end: string | null;
  timezone: string | null;
  rows_fetched: number;
  rows_appended: number;
  rows_skipped: number;
  failed_stage: string | null;
  error_kind: string | null;
  error_code: string | null;
  error_message: string | null;
  notification_error: string | null;
  started_at: string;
  finished_at: string;
  duration_ms: number;
}

const RUN_STATUSES: readonly RunStatus[] = ['success', 'partial_failure', 'failure'];
const STAGES: readonly PipelineStage[] = ['setup', 'window', 'fetch', 'format', 'write', 'notify'];

function toStatus(value: string): RunStatus {
  const status = RUN_STATUSES.find((s) => s === value);
  if (!status) throw new HistoryDbError(`Unknown run status in history: ${value}`);
  return status;
}

function toStage(value: string | null): PipelineStage | null {
  return STAGES.find((s) => s === value) ?? null;
}

function toRecord(row: RunRow): RunRecord {
  return {
    id: row.id,
    report: row.report,
    status: toStatus(row.status),
    windowStart: row.window_start,
    windowEnd: row.window_end,
    timezone: row.timezone,
    rowsFetched: row.rows_fetched,
    rowsAppended: row.rows_appended,
    rowsSkippedAsDuplicate: row.rows_skipped,
    failedStage: toStage(row.failed_stage),
    errorKind: row.error_kind,
    errorCode: row.error_code,
    errorMessage: row.error_message,
    notificationError: row.notification_error,
    startedAt: row.started_at,
    finishedAt: row.finished_at,
    durationMs: row.duration_ms,
  };
}

export function recordRun(db: Database.Database, result: RunResult): void {
  db.prepare(
    `INSERT INTO runs (
       id, report, status, window_start, window_end, timezone,
       rows_fetched, rows_appended, rows_skipped,
       failed_stage, error_kind, error_code, error_message, notification_error,
       started_at, finished_at, duration_ms
     ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
  ).run(
    result.runId,
    result.report,
    result.status,
    result.window?.start.toISOString() ?? null,
    result.window?.end.toISOString() ?? null,
    result.window?.timezone ?? null,
    result.rowsFetched,
    result.rowsAppended,
    result.rowsSkippedAsDuplicate,
    result.failedStage ?? null,
    result.error?.kind ?? null,
    result.error?.code ?? null,
    result.error?.message ?? null,
    result.notificationError ?? null,
    result.startedAt.toISOString(),
    result.finishedAt.toISOString(),
    result.durationMs,
  );
}

export function getLastRun(db: Database.Database, report: string): RunRecord | null {
  const row = db
    .prepare<[string], RunRow>('SELECT * FROM runs WHERE report = ? ORDER BY started_at DESC, rowid DESC LIMIT 1')
    .get(report);
  return row ? toRecord(row) : null;
}

export function listRuns(
  db: Database.Database,
  opts: { report?: string; limit?: number } = {},
): RunRecord[] {
  const limit = Math.max(1, Math.min(opts.limit ?? 20, 500));
  const rows = opts.report
    ? db
        .prepare<[string, number], RunRow>(
          'SELECT * FROM runs WHERE report = ? ORDER BY started_at DESC, rowid DESC LIMIT ?',
        )
        .all(opts.report, limit)
    : db
        .prepare<[number], RunRow>('SELECT * FROM runs ORDER BY started_at DESC, rowid DESC LIMIT ?')
        .all(limit);
  return rows.map(toRecord);
}
