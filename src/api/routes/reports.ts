import { Hono, type Context } from 'hono';
import type { AppContext } from '../server.js';
import { httpStatusForRun } from '../../report/runner.js';
import type { RunResult } from '../../report/types.js';

/** JSON shape of a run result returned by the trigger endpoints. */
export function serializeResult(result: RunResult) {
  return {
    runId: result.runId,
    report: result.report,
    status: result.status,
    window: result.window
      ? {
          start: result.window.start.toISOString(),
          end: result.window.end.toISOString(),
          timezone: result.window.timezone,
        }
      : null,
    rowsFetched: result.rowsFetched,
    rowsAppended: result.rowsAppended,
    rowsSkippedAsDuplicate: result.rowsSkippedAsDuplicate,
    failedStage: result.failedStage ?? null,
    error: result.error ?? null,
    notificationError: result.notificationError ?? null,
    startedAt: result.startedAt.toISOString(),
    finishedAt: result.finishedAt.toISOString(),
    durationMs: result.durationMs,
  };
}

export function reportRoutes(ctx: AppContext): Hono {
  const app = new Hono();

  // POST / and POST /run: every enabled report, as the external scheduler calls it
  const runAll = async (c: Context) => {
    const results = await ctx.service.runAll();
    const ok = results.every((r) => r.status === 'success');
    return c.json(
      { status: ok ? 'success' : 'failure', results: results.map(serializeResult) },
      ok ? 200 : 500,
    );
  };

  app.post('/', runAll);
  app.post('/run', runAll);

  app.post('/reports/:name/run', async (c) => {
    const result = await ctx.service.runReport(c.req.param('name'));
    return c.json(serializeResult(result), httpStatusForRun(result));
  });

  app.get('/reports', (c) => c.json(ctx.service.describeReports()));

  // GET /runs?report=&limit=
  app.get('/runs', (c) => {
    const report = c.req.query('report');
    const limitParam = c.req.query('limit');
    const limit = limitParam === undefined ? undefined : Number.parseInt(limitParam, 10);
    if (limit !== undefined && (!Number.isInteger(limit) || limit <= 0)) {
      return c.json({ error: 'limit must be a positive integer' }, 400);
    }
    return c.json(ctx.service.listRuns({ report: report || undefined, limit }));
  });

  return app;
}
