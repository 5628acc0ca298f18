import { Hono } from 'hono';
import { serve, type ServerType } from '@hono/node-server';
import type { ContentfulStatusCode } from 'hono/utils/http-status';
import type { Config } from '../shared/config.js';
import { ReportsError } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import type { ReportService } from '../report/service.js';
import { reportRoutes } from './routes/reports.js';
import { systemRoutes } from './routes/system.js';

export interface AppContext {
  service: ReportService;
  config: Readonly<Config>;
}

export function errorCodeToHttpStatus(code: string): ContentfulStatusCode {
  switch (code) {
    case 'UNKNOWN_REPORT':
      return 404;
    case 'CONFIG_ERROR':
      return 400;
    default:
      return 500;
  }
}

export function createApp(ctx: AppContext): Hono {
  const app = new Hono();

  app.route('/', reportRoutes(ctx));
  app.route('/', systemRoutes(ctx));

  app.onError((err, c) => {
    if (err instanceof ReportsError) {
      return c.json({ error: err.message, code: err.code }, errorCodeToHttpStatus(err.code));
    }
    logger.error({ error: err.message, stack: err.stack }, 'Unhandled error');
    return c.json({ error: 'Internal server error' }, 500);
  });

  app.notFound((c) => c.json({ error: 'Not found' }, 404));

  return app;
}

export function startServer(ctx: AppContext, opts: { port?: number; host?: string } = {}): ServerType {
  const port = opts.port ?? ctx.config.server.port;
  const hostname = opts.host ?? ctx.config.server.host;
  const app = createApp(ctx);

  return serve({ fetch: app.fetch, port, hostname }, (info) => {
    logger.info({ port: info.port, host: hostname }, 'Report server listening');
  });
}
