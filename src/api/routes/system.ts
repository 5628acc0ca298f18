import { Hono } from 'hono';
import type { AppContext } from '../server.js';
import { maskConfig } from '../../shared/config.js';

export function systemRoutes(ctx: AppContext): Hono {
  const app = new Hono();

  // GET /health: upstream database reachability
  app.get('/health', async (c) => {
    const { db } = await ctx.service.healthCheck();
    return c.json({ status: db ? 'ok' : 'degraded', db }, db ? 200 : 503);
  });

  // GET /status: config with credentials masked, plus the last run of each report
  app.get('/status', (c) => {
    return c.json({
      config: maskConfig(ctx.config),
      lastRuns: ctx.service.lastRuns(),
    });
  });

  return app;
}
