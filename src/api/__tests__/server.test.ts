import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import Database from 'better-sqlite3';
import { createApp, errorCodeToHttpStatus } from '../server.js';
import { ReportService } from '../../report/service.js';
import { initDb } from '../../db/db.js';
import { MemoryBackend } from '../../sink/memoryBackend.js';
import { SqliteClient } from '../../source/sqliteClient.js';
import { parseConfig, type Config } from '../../shared/config.js';

const NOW = new Date('2024-01-15T08:10:00Z');

const usersReport = {
  title: 'New Users',
  from: 'users',
  id_column: 'user_id',
  created_at_column: 'creation_date',
  fields: [{ column: 'username', label: 'Username' }],
};

let upstream: Database.Database;
let history: Database.Database;
let services: ReportService[];

function appFor(reports: Record<string, unknown>) {
  const config: Readonly<Config> = parseConfig({
    database: { password: 'test-secret' },
    retry: { initial_delay_ms: 0 },
    reports,
  });
  const service = new ReportService(config, {
    sqlClient: new SqliteClient(upstream),
    historyDb: history,
    backendFor: (worksheet) => new MemoryBackend(worksheet),
    clock: () => NOW,
  });
  services.push(service);
  return createApp({ service, config });
}

beforeEach(() => {
  upstream = new Database(':memory:');
  upstream.exec('CREATE TABLE users (user_id INTEGER PRIMARY KEY, username TEXT, creation_date TEXT)');
  upstream.prepare('INSERT INTO users VALUES (?, ?, ?)').run(1, 'alice', '2024-01-14 09:00:00');
  history = initDb(':memory:');
  services = [];
});

afterEach(async () => {
  for (const service of services) await service.close();
  history.close();
  if (upstream.open) upstream.close();
});

describe('health and status', () => {
  it('GET /health reports a reachable database', async () => {
    const res = await appFor({ 'new-users': usersReport }).request('/health');
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ status: 'ok', db: true });
  });

  it('GET /health answers 503 when the database is gone', async () => {
    const app = appFor({ 'new-users': usersReport });
    upstream.close();

    const res = await app.request('/health');
    expect(res.status).toBe(503);
    expect(await res.json()).toEqual({ status: 'degraded', db: false });
  });

  it('GET /status masks credentials and shows the last runs', async () => {
    const app = appFor({ 'new-users': usersReport });
    await app.request('/reports/new-users/run', { method: 'POST' });

    const res = await app.request('/status');
    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({
      config: { database: { password: '***' } },
      lastRuns: { 'new-users': { status: 'success' } },
    });
  });
});

describe('run triggers', () => {
  it('POST / runs every enabled report', async () => {
    const res = await appFor({ 'new-users': usersReport }).request('/', { method: 'POST' });

    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({
      status: 'success',
      results: [
        {
          report: 'new-users',
          status: 'success',
          rowsFetched: 1,
          rowsAppended: 1,
          window: { start: '2024-01-14T08:00:00.000Z', end: '2024-01-15T08:00:00.000Z', timezone: 'UTC' },
        },
      ],
    });
  });

  it('POST /reports/:name/run answers 500 when the run fails', async () => {
    const app = appFor({ broken: { ...usersReport, from: 'missing_table' } });
    const res = await app.request('/reports/broken/run', { method: 'POST' });

    expect(res.status).toBe(500);
    expect(await res.json()).toMatchObject({
      status: 'failure',
      failedStage: 'fetch',
      error: { kind: 'DataIntegrityError', code: 'DATA_INTEGRITY' },
    });
  });

  it('POST /run answers 500 if any report failed', async () => {
    const app = appFor({ 'new-users': usersReport, broken: { ...usersReport, from: 'missing_table' } });
    const res = await app.request('/run', { method: 'POST' });

    expect(res.status).toBe(500);
    expect(await res.json()).toMatchObject({
      status: 'failure',
      results: [{ report: 'new-users', status: 'success' }, { report: 'broken', status: 'failure' }],
    });
  });

  it('answers 404 for an unknown report', async () => {
    const res = await appFor({ 'new-users': usersReport }).request('/reports/nope/run', { method: 'POST' });
    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({ error: 'Unknown report: nope', code: 'UNKNOWN_REPORT' });
  });
});

describe('listings', () => {
  it('GET /reports lists configured reports', async () => {
    const res = await appFor({ 'new-users': usersReport }).request('/reports');
    expect(await res.json()).toEqual([
      { name: 'new-users', title: 'New Users', enabled: true, cron: '0 8 * * *', worksheet: 'New Users', fields: ['Username'] },
    ]);
  });

  it('GET /runs filters and limits', async () => {
    const app = appFor({ 'new-users': usersReport });
    await app.request('/reports/new-users/run', { method: 'POST' });
    await app.request('/reports/new-users/run', { method: 'POST' });

    const res = await app.request('/runs?report=new-users&limit=1');
    expect(await res.json()).toMatchObject([{ report: 'new-users', rowsAppended: 0, rowsSkippedAsDuplicate: 1 }]);
  });

  it('GET /runs rejects a bad limit', async () => {
    const res = await appFor({ 'new-users': usersReport }).request('/runs?limit=abc');
    expect(res.status).toBe(400);
  });

  it('answers 404 for unknown paths', async () => {
    const res = await appFor({}).request('/nowhere');
    expect(res.status).toBe(404);
  });
});

describe('errorCodeToHttpStatus', () => {
  it('maps error codes', () => {
    expect(errorCodeToHttpStatus('UNKNOWN_REPORT')).toBe(404);
    expect(errorCodeToHttpStatus('CONFIG_ERROR')).toBe(400);
    expect(errorCodeToHttpStatus('DATA_INTEGRITY')).toBe(500);
  });
});
