import { describeWindow, reportDate } from '../report/formatter.js';
import type { RunResult } from '../report/types.js';
import { NotificationError, errorMessage } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import { redactSecrets, truncate } from '../shared/utils.js';
import {
  createMailSender,
  renderHtml,
  renderText,
  sendEmail,
  type EmailConfig,
  type EmailSection,
  type MailSender,
  type RenderedEmail,
} from './email.js';

export const MAX_ERROR_DETAIL = 500;

export interface Notifier {
  notifySuccess(result: RunResult, summaryText: string): Promise<void>;
  notifyFailure(result: RunResult, error: unknown): Promise<void>;
}

function runDate(result: RunResult): string {
  return result.window ? reportDate(result.window) : result.startedAt.toISOString().slice(0, 10);
}

function errorKind(error: unknown): string {
  return error instanceof Error ? error.name : 'Error';
}

/**
 * Error class plus a bounded, credential-free detail line.
 */
export function describeFailure(error: unknown, secrets: readonly string[]): { kind: string; detail: string } {
  return {
    kind: errorKind(error),
    detail: truncate(redactSecrets(errorMessage(error), secrets), MAX_ERROR_DETAIL),
  };
}

export function buildSuccessEmail(title: string, result: RunResult, summaryText: string): RenderedEmail {
  const date = runDate(result);
  const sections: EmailSection[] = [
    { lines: [`${title} for ${date}`] },
    {
      lines: [
        ...(result.window ? [`Window: ${describeWindow(result.window)}`] : []),
        `Fetched: ${result.rowsFetched}`,
        `Appended: ${result.rowsAppended}`,
        `Already reported: ${result.rowsSkippedAsDuplicate}`,
      ],
    },
    { heading: 'Records', lines: summaryText.split('\n') },
    { lines: [`Total: ${result.rowsFetched}`] },
  ];

  return {
    subject: `${title} Report - ${date}`,
    text: renderText(sections),
    html: renderHtml(`${title} Report`, '#1a1a1a', sections),
  };
}

export function buildFailureEmail(
  title: string,
  result: RunResult,
  error: unknown,
  secrets: readonly string[],
): RenderedEmail {
  const date = runDate(result);
  const { kind, detail } = describeFailure(error, secrets);
  const status = result.status === 'partial_failure' ? 'partially failed' : 'failed';

  const sections: EmailSection[] = [
    { lines: [`${title} report for ${date} ${status}.`] },
    {
      lines: [
        `Stage: ${result.failedStage ?? 'unknown'}`,
        `Error: ${kind}`,
        `Detail: ${detail}`,
        ...(result.window ? [`Window: ${describeWindow(result.window)}`] : []),
        `Fetched: ${result.rowsFetched}`,
        `Appended before failure: ${result.rowsAppended}`,
        `Run: ${result.runId}`,
      ],
    },
  ];

  return {
    subject: `[FAILED] ${title} Report - ${date}`,
    text: renderText(sections),
    html: renderHtml(`${title} Report failed`, '#b42318', sections),
  };
}

export interface EmailNotifierOptions {
  title: string;
  email: EmailConfig;
  /** Values scrubbed from failure details. */
  secrets?: readonly string[];
  sender?: MailSender;
}

export class EmailNotifier implements Notifier {
  private readonly sender: MailSender;

  constructor(private readonly options: EmailNotifierOptions) {
    this.sender = options.sender ?? createMailSender(options.email);
  }

  async notifySuccess(result: RunResult, summaryText: string): Promise<void> {
    await this.deliver(buildSuccessEmail(this.options.title, result, summaryText));
  }

  async notifyFailure(result: RunResult, error: unknown): Promise<void> {
    await this.deliver(buildFailureEmail(this.options.title, result, error, this.options.secrets ?? []));
  }

  private async deliver(email: RenderedEmail): Promise<void> {
    try {
      await sendEmail(this.sender, this.options.email, email);
    } catch (err) {
      throw new NotificationError(
        `Email delivery failed: ${redactSecrets(errorMessage(err), this.options.secrets ?? [])}`,
        { subject: email.subject },
      );
    }
  }
}

/**
 * Used when email delivery is disabled: the summary goes to the log instead.
 */
export class LogNotifier implements Notifier {
  constructor(
    private readonly title: string,
    private readonly secrets: readonly string[] = [],
  ) {}

  async notifySuccess(result: RunResult, summaryText: string): Promise<void> {
    logger.info(
      { report: result.report, runId: result.runId, summary: truncate(summaryText, 500) },
      `${this.title} report (email disabled)`,
    );
  }

  async notifyFailure(result: RunResult, error: unknown): Promise<void> {
    const { kind, detail } = describeFailure(error, this.secrets);
    logger.error(
      { report: result.report, runId: result.runId, stage: result.failedStage, kind, detail },
      `${this.title} report failed (email disabled)`,
    );
  }
}
