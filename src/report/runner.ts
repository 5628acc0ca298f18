import type { Notifier } from '../push/notifier.js';
import type { Sink } from '../sink/sink.js';
import type { ReportSource } from '../source/dataSource.js';
import { ReportsError, RunTimeoutError, errorMessage } from '../shared/errors.js';
import { logger as rootLogger, type Logger } from '../shared/logger.js';
import { withRetry, type RetryOptions, type RetryPolicy } from '../shared/retry.js';
import { generateId, redactSecrets, sleep as defaultSleep, truncate } from '../shared/utils.js';
import type { ReportFormatter } from './formatter.js';
import type {
  HealthStatus,
  PipelineStage,
  ReportWindow,
  RunError,
  RunResult,
  RunState,
  RunStatus,
} from './types.js';
import { computeWindow, type WindowOptions } from './window.js';

export interface RunnerSettings {
  window: WindowOptions;
  retry: RetryPolicy;
  /** Wall-clock budget for one run. */
  timeoutMs: number;
}

export interface ReportRunnerDeps {
  report: string;
  settings: RunnerSettings;
  source: ReportSource;
  formatter: ReportFormatter;
  sink: Sink;
  notifier: Notifier;
  /** Scrubbed from error messages carried on the result. */
  secrets?: readonly string[];
  clock?: () => Date;
  sleep?: (ms: number) => Promise<void>;
  logger?: Logger;
}

interface Progress {
  window: ReportWindow | null;
  rowsFetched: number;
  rowsAppended: number;
  rowsSkippedAsDuplicate: number;
}

/** 2xx for success, 5xx for anything that did not complete cleanly. */
export function httpStatusForRun(result: Pick<RunResult, 'status'>): 200 | 500 {
  return result.status === 'success' ? 200 : 500;
}

/**
 * Runs one report end to end:
 * idle → window_computed → fetched → formatted → written → notified → done,
 * or failed(stage) from any of them.
 *
 * No state survives between runs. Overlapping runs are safe because the sink
 * skips rows whose fingerprint it already holds.
 */
export class ReportRunner {
  private readonly clock: () => Date;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(private readonly deps: ReportRunnerDeps) {
    this.clock = deps.clock ?? (() => new Date());
    this.sleep = deps.sleep ?? defaultSleep;
  }

  get report(): string {
    return this.deps.report;
  }

  async healthCheck(): Promise<HealthStatus> {
    return { db: await this.deps.source.healthCheck() };
  }

  async run(): Promise<RunResult> {
    const { report, settings, source, formatter, sink } = this.deps;
    const runId = generateId(12);
    const log = (this.deps.logger ?? rootLogger).child({ report, runId });
    const startedAt = this.clock();
    const deadline = startedAt.getTime() + settings.timeoutMs;
    const now = (): number => this.clock().getTime();

    const progress: Progress = { window: null, rowsFetched: 0, rowsAppended: 0, rowsSkippedAsDuplicate: 0 };
    let state: RunState = 'idle';
    let stage: PipelineStage = 'window';

    const advance = (next: RunState): void => {
      state = next;
      log.debug({ state }, 'Run state');
    };
    const checkDeadline = (): void => {
      if (now() >= deadline) {
        throw new RunTimeoutError(`Run exceeded ${settings.timeoutMs}ms before ${stage}`, { stage });
      }
    };
    const retryOptions = (label: string): RetryOptions => ({
      policy: settings.retry,
      label,
      deadline,
      logger: log,
      sleep: this.sleep,
      now,
    });

    log.info('Report run starting');
    let summaryText = '';

    try {
      const window = computeWindow(startedAt, settings.window);
      progress.window = window;
      advance('window_computed');

      stage = 'fetch';
      checkDeadline();
      const rows = await withRetry(() => source.fetchNew(window), retryOptions('fetch'));
      progress.rowsFetched = rows.length;
      advance('fetched');

      stage = 'format';
      const normalized = formatter.format(rows);
      summaryText = formatter.summaryText(rows);
      advance('formatted');

      stage = 'write';
      checkDeadline();
      await withRetry(() => sink.ensureHeader(), retryOptions('sink.ensureHeader'));
      await sink.appendNew(normalized, {
        retry: retryOptions('sink.append'),
        onSkipped: (count) => {
          progress.rowsSkippedAsDuplicate = count;
        },
        onAppended: (count) => {
          progress.rowsAppended += count;
        },
      });
      advance('written');
    } catch (err) {
      advance('failed');
      return finishFailed(this.resultContext(), runId, startedAt, stage, progress, err, log);
    }

    stage = 'notify';
    const result = buildResult(this.resultContext(), runId, startedAt, 'success', progress);
    let notificationError: string | undefined;
    try {
      await this.deps.notifier.notifySuccess(result, summaryText);
      advance('notified');
    } catch (err) {
      notificationError = redactSecrets(errorMessage(err), this.deps.secrets ?? []);
      log.warn({ error: notificationError }, 'Success notification failed');
    }

    advance('done');
    const final = buildResult(this.resultContext(), runId, startedAt, 'success', progress, { notificationError });
    log.info(
      {
        rowsFetched: final.rowsFetched,
        rowsAppended: final.rowsAppended,
        rowsSkippedAsDuplicate: final.rowsSkippedAsDuplicate,
        durationMs: final.durationMs,
      },
      'Report run complete',
    );
    return final;
  }

  private resultContext(): ResultContext {
    return {
      report: this.deps.report,
      notifier: this.deps.notifier,
      secrets: this.deps.secrets ?? [],
      clock: this.clock,
    };
  }
}

interface ResultContext {
  report: string;
  notifier: Notifier;
  secrets: readonly string[];
  clock: () => Date;
}

function scrub(ctx: ResultContext, message: string): string {
  return redactSecrets(message, ctx.secrets);
}

function buildResult(
  ctx: ResultContext,
  runId: string,
  startedAt: Date,
  status: RunStatus,
  progress: Progress,
  extra: { failedStage?: PipelineStage; error?: RunError; notificationError?: string } = {},
): RunResult {
  const finishedAt = ctx.clock();
  const result: RunResult = {
    runId,
    report: ctx.report,
    status,
    window: progress.window,
    rowsFetched: progress.rowsFetched,
    rowsAppended: progress.rowsAppended,
    rowsSkippedAsDuplicate: progress.rowsSkippedAsDuplicate,
    ...(extra.failedStage ? { failedStage: extra.failedStage } : {}),
    ...(extra.error ? { error: Object.freeze(extra.error) } : {}),
    ...(extra.notificationError ? { notificationError: extra.notificationError } : {}),
    startedAt,
    finishedAt,
    durationMs: finishedAt.getTime() - startedAt.getTime(),
  };
  return Object.freeze(result);
}

async function finishFailed(
  ctx: ResultContext,
  runId: string,
  startedAt: Date,
  stage: PipelineStage,
  progress: Progress,
  err: unknown,
  log: Logger,
): Promise<RunResult> {
  // Rows already in the sink stay there; the next run completes the batch.
  const status: RunStatus = progress.rowsAppended > 0 ? 'partial_failure' : 'failure';
  const error: RunError = {
    kind: err instanceof Error ? err.name : 'Error',
    code: err instanceof ReportsError ? err.code : 'UNEXPECTED',
    message: truncate(scrub(ctx, errorMessage(err)), 1000),
  };

  log.error(
    {
      stage,
      status,
      error,
      details: err instanceof ReportsError ? err.details : undefined,
      stack: err instanceof ReportsError ? undefined : err instanceof Error ? err.stack : undefined,
    },
    'Report run failed',
  );

  const result = buildResult(ctx, runId, startedAt, status, progress, { failedStage: stage, error });
  let notificationError: string | undefined;
  try {
    await ctx.notifier.notifyFailure(result, err);
  } catch (notifyErr) {
    notificationError = scrub(ctx, errorMessage(notifyErr));
    log.warn({ error: notificationError }, 'Failure notification failed');
  }

  return buildResult(ctx, runId, startedAt, status, progress, {
    failedStage: stage,
    error,
    notificationError,
  });
}

export interface SetupFailureOptions {
  report: string;
  notifier: Notifier;
  secrets?: readonly string[];
  clock?: () => Date;
  logger?: Logger;
}

/**
 * Result for a report whose pipeline could not be assembled, such as a sheet
 * sink with no spreadsheet to write to. The failure alert is still sent.
 */
export function setupFailure(options: SetupFailureOptions, err: unknown): Promise<RunResult> {
  const clock = options.clock ?? (() => new Date());
  const runId = generateId(12);
  const log = (options.logger ?? rootLogger).child({ report: options.report, runId });
  const progress: Progress = { window: null, rowsFetched: 0, rowsAppended: 0, rowsSkippedAsDuplicate: 0 };
  const ctx: ResultContext = {
    report: options.report,
    notifier: options.notifier,
    secrets: options.secrets ?? [],
    clock,
  };
  return finishFailed(ctx, runId, clock(), 'setup', progress, err, log);
}
