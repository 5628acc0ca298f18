import type Database from 'better-sqlite3';
import { initDb } from '../db/db.js';
import { getLastRun, listRuns, recordRun, type RunRecord } from '../db/runLog.js';
import { EmailNotifier, LogNotifier, type Notifier } from '../push/notifier.js';
import type { MailSender } from '../push/email.js';
import { connectSpreadsheet, type SpreadsheetLocator } from '../sink/googleSheetsBackend.js';
import { MemoryBackend } from '../sink/memoryBackend.js';
import { SheetSink, type SheetBackend } from '../sink/sink.js';
import { DataSource, probeDatabase } from '../source/dataSource.js';
import { MysqlClient } from '../source/mysqlClient.js';
import type { SqlClient } from '../source/sqlClient.js';
import { SqliteClient } from '../source/sqliteClient.js';
import { configSecrets, worksheetName, type Config, type ReportDefinition } from '../shared/config.js';
import { ConfigurationError, UnknownReportError, errorMessage } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import { ReportFormatter } from './formatter.js';
import { ReportRunner, setupFailure, type RunnerSettings } from './runner.js';
import type { HealthStatus, RunResult } from './types.js';

export interface ReportSummary {
  name: string;
  title: string;
  enabled: boolean;
  cron: string;
  worksheet: string;
  fields: string[];
}

/** Collaborators that can be swapped out, mostly for tests. */
export interface ReportServiceOverrides {
  sqlClient?: SqlClient;
  /** Sheet backend for a worksheet; defaults follow `sheets.backend`. */
  backendFor?: (worksheet: string) => SheetBackend;
  mailSender?: MailSender;
  /** Run history database; opened from `history.path` when omitted. */
  historyDb?: Database.Database;
  clock?: () => Date;
  sleep?: (ms: number) => Promise<void>;
}

export function createSqlClient(database: Config['database']): SqlClient {
  if (database.driver === 'sqlite') {
    if (!database.path) {
      throw new ConfigurationError('database.path is required for the sqlite driver');
    }
    return new SqliteClient(database.path);
  }
  return new MysqlClient(database);
}

export function runnerSettings(config: Config): RunnerSettings {
  return {
    window: {
      lookbackHours: config.window.lookback_hours,
      timezone: config.window.timezone,
      alignTo: config.window.align_to,
    },
    retry: {
      maxAttempts: config.retry.max_attempts,
      initialDelayMs: config.retry.initial_delay_ms,
      factor: config.retry.factor,
      maxDelayMs: config.retry.max_delay_ms,
    },
    timeoutMs: config.run.timeout_ms,
  };
}

/**
 * Composition root: one runner per configured report, sharing the SQL client,
 * notifier settings and run history.
 */
export class ReportService {
  private readonly sqlClient: SqlClient;
  private readonly historyDb: Database.Database;
  private readonly secrets: string[];
  private readonly backends = new Map<string, SheetBackend>();
  private spreadsheet: SpreadsheetLocator | null = null;
  private readonly runners = new Map<string, ReportRunner>();

  constructor(
    private readonly config: Readonly<Config>,
    private readonly overrides: ReportServiceOverrides = {},
  ) {
    this.secrets = configSecrets(config);
    this.sqlClient = overrides.sqlClient ?? createSqlClient(config.database);
    this.historyDb = overrides.historyDb ?? initDb(config.history.path);
  }

  reportNames(): string[] {
    return Object.keys(this.config.reports);
  }

  describeReports(): ReportSummary[] {
    return Object.entries(this.config.reports).map(([name, def]) => ({
      name,
      title: def.title,
      enabled: def.enabled,
      cron: def.cron,
      worksheet: worksheetName(def),
      fields: def.fields.map((f) => f.label),
    }));
  }

  runner(name: string): ReportRunner {
    const existing = this.runners.get(name);
    if (existing) return existing;

    const def = this.config.reports[name];
    if (!def) throw new UnknownReportError(name);

    const runner = this.buildRunner(name, def);
    this.runners.set(name, runner);
    return runner;
  }

  /**
   * Run one report and record the outcome. Every failure, including a report
   * whose sink or source cannot be built, comes back as a failed result; only
   * an unknown report name is thrown.
   */
  async runReport(name: string): Promise<RunResult> {
    const def = this.config.reports[name];
    if (!def) throw new UnknownReportError(name);

    let runner: ReportRunner;
    try {
      runner = this.runner(name);
    } catch (err) {
      const result = await setupFailure(
        { report: name, notifier: this.notifier(def), secrets: this.secrets, clock: this.overrides.clock },
        err,
      );
      this.record(result);
      return result;
    }

    const result = await runner.run();
    this.record(result);
    return result;
  }

  /** Enabled reports, one after another; a failed report does not stop the rest. */
  async runAll(): Promise<RunResult[]> {
    const results: RunResult[] = [];
    for (const [name, def] of Object.entries(this.config.reports)) {
      if (!def.enabled) continue;
      results.push(await this.runReport(name));
    }
    return results;
  }

  async healthCheck(): Promise<HealthStatus> {
    return { db: await probeDatabase(this.sqlClient) };
  }

  lastRuns(): Record<string, RunRecord | null> {
    const out: Record<string, RunRecord | null> = {};
    for (const name of this.reportNames()) {
      out[name] = getLastRun(this.historyDb, name);
    }
    return out;
  }

  listRuns(opts: { report?: string; limit?: number } = {}): RunRecord[] {
    return listRuns(this.historyDb, opts);
  }

  async close(): Promise<void> {
    await this.sqlClient.close();
    if (!this.overrides.historyDb) this.historyDb.close();
  }

  private record(result: RunResult): void {
    try {
      recordRun(this.historyDb, result);
    } catch (err) {
      // history is for the status surface only; the run outcome stands
      logger.error({ report: result.report, runId: result.runId, error: errorMessage(err) }, 'Failed to record run');
    }
  }

  private backend(worksheet: string): SheetBackend {
    const existing = this.backends.get(worksheet);
    if (existing) return existing;

    let backend: SheetBackend;
    if (this.overrides.backendFor) {
      backend = this.overrides.backendFor(worksheet);
    } else if (this.config.sheets.backend === 'memory') {
      backend = new MemoryBackend(worksheet);
    } else {
      backend = this.googleSpreadsheet().worksheet(worksheet);
    }
    this.backends.set(worksheet, backend);
    return backend;
  }

  private googleSpreadsheet(): SpreadsheetLocator {
    if (!this.spreadsheet) {
      const sheets = this.config.sheets;
      this.spreadsheet = connectSpreadsheet({
        spreadsheetId: sheets.spreadsheet_id,
        spreadsheetName: sheets.spreadsheet_name,
        shareWith: sheets.share_with.length > 0 ? sheets.share_with : this.config.delivery.email.to,
        keyFile: sheets.key_file,
        timeoutMs: sheets.timeout_ms,
      });
    }
    return this.spreadsheet;
  }

  private notifier(def: ReportDefinition): Notifier {
    const email = this.config.delivery.email;
    if (email.enabled && email.to.length > 0) {
      return new EmailNotifier({
        title: def.title,
        email,
        secrets: this.secrets,
        sender: this.overrides.mailSender,
      });
    }
    return new LogNotifier(def.title, this.secrets);
  }

  private buildRunner(name: string, def: ReportDefinition): ReportRunner {
    const formatter = new ReportFormatter(def, {
      timezone: this.config.window.timezone,
      summaryMaxItems: this.config.summary.max_items,
    });
    const sink = new SheetSink(
      this.backend(worksheetName(def)),
      formatter.header(),
      this.config.sheets.append_batch_size,
    );

    return new ReportRunner({
      report: name,
      settings: runnerSettings(this.config),
      source: new DataSource(this.sqlClient, def),
      formatter,
      sink,
      notifier: this.notifier(def),
      secrets: this.secrets,
      clock: this.overrides.clock,
      sleep: this.overrides.sleep,
    });
  }
}
