import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type Database from 'better-sqlite3';
import { initDb } from '../db.js';
import { getLastRun, listRuns, recordRun } from '../runLog.js';
import type { RunResult } from '../../report/types.js';

let db: Database.Database;

beforeEach(() => {
  db = initDb(':memory:');
});

afterEach(() => {
  db.close();
});

function result(overrides: Partial<RunResult> & Pick<RunResult, 'runId' | 'startedAt'>): RunResult {
  return {
    report: 'new-users',
    status: 'success',
    window: {
      start: new Date('2024-01-14T08:00:00Z'),
      end: new Date('2024-01-15T08:00:00Z'),
      timezone: 'UTC',
    },
    rowsFetched: 3,
    rowsAppended: 3,
    rowsSkippedAsDuplicate: 0,
    finishedAt: overrides.startedAt,
    durationMs: 0,
    ...overrides,
  };
}

describe('run log', () => {
  it('stores and reads back a run', () => {
    recordRun(db, result({ runId: 'run-1', startedAt: new Date('2024-01-15T08:00:01Z'), durationMs: 1500 }));

    expect(getLastRun(db, 'new-users')).toEqual({
      id: 'run-1',
      report: 'new-users',
      status: 'success',
      windowStart: '2024-01-14T08:00:00.000Z',
      windowEnd: '2024-01-15T08:00:00.000Z',
      timezone: 'UTC',
      rowsFetched: 3,
      rowsAppended: 3,
      rowsSkippedAsDuplicate: 0,
      failedStage: null,
      errorKind: null,
      errorCode: null,
      errorMessage: null,
      notificationError: null,
      startedAt: '2024-01-15T08:00:01.000Z',
      finishedAt: '2024-01-15T08:00:01.000Z',
      durationMs: 1500,
    });
  });

  it('keeps failure details and a missing window', () => {
    recordRun(
      db,
      result({
        runId: 'run-2',
        startedAt: new Date('2024-01-15T08:00:01Z'),
        status: 'failure',
        window: null,
        rowsFetched: 0,
        rowsAppended: 0,
        failedStage: 'window',
        error: { kind: 'ConfigurationError', code: 'CONFIG_ERROR', message: 'Lookback must be positive' },
        notificationError: 'SMTP down',
      }),
    );

    expect(getLastRun(db, 'new-users')).toMatchObject({
      status: 'failure',
      windowStart: null,
      failedStage: 'window',
      errorKind: 'ConfigurationError',
      errorCode: 'CONFIG_ERROR',
      errorMessage: 'Lookback must be positive',
      notificationError: 'SMTP down',
    });
  });

  it('returns the latest run per report', () => {
    recordRun(db, result({ runId: 'old', startedAt: new Date('2024-01-14T08:00:00Z') }));
    recordRun(db, result({ runId: 'new', startedAt: new Date('2024-01-15T08:00:00Z') }));
    recordRun(db, result({ runId: 'other', report: 'subscriptions', startedAt: new Date('2024-01-16T08:00:00Z') }));

    expect(getLastRun(db, 'new-users')?.id).toBe('new');
    expect(getLastRun(db, 'missing')).toBeNull();
  });

  it('lists newest first with filter and limit', () => {
    recordRun(db, result({ runId: 'a', startedAt: new Date('2024-01-13T08:00:00Z') }));
    recordRun(db, result({ runId: 'b', startedAt: new Date('2024-01-14T08:00:00Z') }));
    recordRun(db, result({ runId: 'c', report: 'subscriptions', startedAt: new Date('2024-01-15T08:00:00Z') }));

    expect(listRuns(db).map((r) => r.id)).toEqual(['c', 'b', 'a']);
    expect(listRuns(db, { report: 'new-users' }).map((r) => r.id)).toEqual(['b', 'a']);
    expect(listRuns(db, { limit: 1 }).map((r) => r.id)).toEqual(['c']);
  });
});
