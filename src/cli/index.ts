#!/usr/bin/env node

import { Command } from 'commander';
import fs from 'node:fs';
import path from 'node:path';
import { loadConfig, worksheetName, writeDefaultConfig, type Config } from '../shared/config.js';
import { errorMessage } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import { getReportsDir, resolvePath } from '../shared/utils.js';
import { ReportService } from '../report/service.js';
import type { RunResult } from '../report/types.js';
import { describeWindow } from '../report/formatter.js';
import { startServer } from '../api/server.js';
import { serializeResult } from '../api/routes/reports.js';
import { startScheduler, stopScheduler } from '../push/scheduler.js';
import { sendTestEmail } from '../push/email.js';

const program = new Command();

program
  .name('reports')
  .description('Scheduled database reports to a spreadsheet log and email')
  .version('0.1.0')
  .option('-c, --config <path>', 'config file (defaults to a search from the working directory)');

async function config(): Promise<Readonly<Config>> {
  const opts = program.opts<{ config?: string }>();
  return loadConfig({ configPath: opts.config });
}

async function withService<T>(fn: (service: ReportService, cfg: Readonly<Config>) => Promise<T>): Promise<T> {
  const cfg = await config();
  const service = new ReportService(cfg);
  try {
    return await fn(service, cfg);
  } finally {
    await service.close();
  }
}

function describeResult(result: RunResult): string {
  const mark = result.status === 'success' ? '✓' : '✗';
  const counts = `fetched ${result.rowsFetched}, appended ${result.rowsAppended}, skipped ${result.rowsSkippedAsDuplicate}`;
  const lines = [`${mark} ${result.report}: ${result.status} (${counts})`];
  if (result.window) lines.push(`  window: ${describeWindow(result.window)}`);
  if (result.error) lines.push(`  ${result.failedStage ?? 'run'}: ${result.error.kind}: ${result.error.message}`);
  if (result.notificationError) lines.push(`  notification: ${result.notificationError}`);
  return lines.join('\n');
}

// === init ===
program
  .command('init')
  .description('Write a config file with the defaults')
  .option('-o, --out <path>', 'where to write it', path.join(getReportsDir(), 'config.yaml'))
  .option('-f, --force', 'overwrite an existing file')
  .action((opts: { out: string; force?: boolean }) => {
    const target = resolvePath(opts.out);
    if (fs.existsSync(target) && !opts.force) {
      log(`✓ ${target} already exists (use --force to overwrite)`);
      return;
    }
    writeDefaultConfig(target);
    log(`✓ ${target} created`);
  });

// === run ===
program
  .command('run [report]')
  .description('Run one report, or every enabled report')
  .option('--json', 'print results as JSON')
  .action(async (report: string | undefined, opts: { json?: boolean }) => {
    const results = await withService(async (service) =>
      report ? [await service.runReport(report)] : service.runAll(),
    );

    if (opts.json) {
      log(JSON.stringify(results.map(serializeResult), null, 2));
    } else if (results.length === 0) {
      log('No enabled reports.');
    } else {
      for (const result of results) log(describeResult(result));
    }

    if (results.some((r) => r.status !== 'success')) process.exitCode = 1;
  });

// === serve ===
program
  .command('serve')
  .description('Start the HTTP trigger and status server')
  .option('-p, --port <port>', 'port to listen on', (v) => Number.parseInt(v, 10))
  .option('--schedule', 'also run reports on their cron schedules')
  .action(async (opts: { port?: number; schedule?: boolean }) => {
    const cfg = await config();
    const service = new ReportService(cfg);
    const server = startServer({ service, config: cfg }, { port: opts.port });

    if (opts.schedule) {
      startScheduler(service, cfg);
    }

    const shutdown = async (): Promise<void> => {
      logger.info('Shutting down...');
      stopScheduler();
      server.close();
      await service.close();
    };
    const onSignal = (): void => {
      shutdown()
        .catch((err: unknown) => {
          logger.error({ error: errorMessage(err) }, 'Shutdown failed');
          process.exitCode = 1;
        })
        .finally(() => process.exit());
    };

    process.on('SIGINT', onSignal);
    process.on('SIGTERM', onSignal);
  });

// === health ===
program
  .command('health')
  .description('Check that the upstream database answers')
  .action(async () => {
    const { db } = await withService((service) => service.healthCheck());
    log(db ? '✓ Database: ok' : '✗ Database: unreachable');
    if (!db) process.exitCode = 1;
  });

// === status ===
program
  .command('status')
  .description('Show the last recorded run of each report')
  .action(async () => {
    const lastRuns = await withService(async (service) => service.lastRuns());
    for (const [name, run] of Object.entries(lastRuns)) {
      if (!run) {
        log(`${name.padEnd(20)} never run`);
        continue;
      }
      log(
        `${name.padEnd(20)} ${run.status.padEnd(16)} ${run.startedAt}  ` +
          `appended ${run.rowsAppended}, skipped ${run.rowsSkippedAsDuplicate}`,
      );
      if (run.errorMessage) log(`${''.padEnd(20)} ${run.errorKind ?? 'Error'}: ${run.errorMessage}`);
    }
  });

// === list ===
program
  .command('list')
  .description('List configured reports')
  .action(async () => {
    const cfg = await config();
    const entries = Object.entries(cfg.reports);
    if (entries.length === 0) {
      log('No reports configured.');
      return;
    }
    for (const [name, def] of entries) {
      const state = def.enabled ? 'enabled ' : 'disabled';
      log(`${name.padEnd(20)} ${state} ${def.cron.padEnd(14)} → ${worksheetName(def)}`);
    }
  });

// === test-email ===
program
  .command('test-email')
  .description('Send a test message with the configured SMTP settings')
  .action(async () => {
    const cfg = await config();
    const email = cfg.delivery.email;
    if (email.to.length === 0) {
      log('✗ delivery.email.to is empty (set it in the config or EMAIL_TO)');
      process.exitCode = 1;
      return;
    }
    await sendTestEmail(email);
    log(`✓ Test email sent to ${email.to.join(', ')}`);
  });

function log(msg: string): void {
  // eslint-disable-next-line no-console
  console.log(msg);
}

try {
  await program.parseAsync();
} catch (err) {
  logger.error({ error: errorMessage(err) }, 'Command failed');
  log(`✗ ${errorMessage(err)}`);
  process.exitCode = 1;
}
