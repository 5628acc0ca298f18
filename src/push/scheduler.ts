/**
 * Scheduler: one node-cron job per enabled report, evaluated in the
 * configured window timezone. Started by `reports serve --schedule`.
 */

import cron, { type ScheduledTask } from 'node-cron';
import type { Config } from '../shared/config.js';
import { ConfigurationError, errorMessage } from '../shared/errors.js';
import { logger } from '../shared/logger.js';

/** The part of ReportService the scheduler drives. */
export interface ScheduledRunner {
  runReport(name: string): Promise<{ status: string; rowsAppended: number }>;
}

let tasks: ScheduledTask[] = [];

async function runScheduled(runner: ScheduledRunner, report: string): Promise<void> {
  logger.info({ report }, 'Scheduled run starting');
  try {
    const result = await runner.runReport(report);
    logger.info({ report, status: result.status, rowsAppended: result.rowsAppended }, 'Scheduled run finished');
  } catch (err) {
    logger.error({ report, error: errorMessage(err) }, 'Scheduled run failed');
  }
}

/**
 * Validate every cron expression first so a typo in one report does not
 * leave the others half-scheduled.
 */
export function startScheduler(runner: ScheduledRunner, config: Readonly<Config>): string[] {
  const enabled = Object.entries(config.reports).filter(([, def]) => def.enabled);

  for (const [name, def] of enabled) {
    if (!cron.validate(def.cron)) {
      throw new ConfigurationError(`Invalid cron expression for report ${name}`, { report: name, cron: def.cron });
    }
  }

  stopScheduler();
  for (const [name, def] of enabled) {
    tasks.push(
      cron.schedule(
        def.cron,
        () => {
          void runScheduled(runner, name);
        },
        { timezone: config.window.timezone },
      ),
    );
  }

  const scheduled = enabled.map(([name]) => name);
  logger.info({ reports: scheduled, timezone: config.window.timezone }, 'Scheduler started');
  return scheduled;
}

export function stopScheduler(): void {
  if (tasks.length === 0) return;
  for (const task of tasks) task.stop();
  tasks = [];
  logger.info('Scheduler stopped');
}
