import { Hono } from 'hono';
import { cors } from 'hono/cors';
import { requestIdMiddleware } from './middleware/request-id.js';
import { createChatRoutes, CHAT_FALLBACK_MESSAGE } from './routes/chat.js';
import type { Runner } from './agents/runtime/runner.js';
import type { RunLimiter } from './lib/run-limiter.js';

export interface AppDeps {
  runner: Runner;
  limiter: RunLimiter;
  startAgent: string;
  allowedOrigins: string[];
  /** Reports whether the model provider has credentials configured */
  isProviderReady?: () => boolean;
  isShuttingDown?: () => boolean;
}

export function createApp(deps: AppDeps): Hono {
  const app = new Hono();
  const isShuttingDown = deps.isShuttingDown ?? (() => false);

  app.use('*', requestIdMiddleware);

  app.use('*', async (c, next) => {
    if (isShuttingDown() && c.req.path !== '/health') {
      return c.json({ error: 'Server is restarting. Please retry shortly.' }, 503);
    }
    await next();
  });

  app.use('*', async (c, next) => {
    await next();
    c.header('X-Content-Type-Options', 'nosniff');
    c.header('X-Frame-Options', 'DENY');
    c.header('Referrer-Policy', 'no-referrer');
  });

  app.use('*', cors({
    origin: deps.allowedOrigins,
    credentials: true,
  }));

  app.get('/health', (c) => {
    c.header('Cache-Control', 'no-store');
    const providerReady = deps.isProviderReady?.() ?? true;
    const runs = deps.limiter.stats();
    const status = isShuttingDown() ? 'draining' : providerReady ? 'ok' : 'degraded';
    return c.json({
      status,
      provider_ready: providerReady,
      active_runs: runs.active,
      max_concurrent_runs: runs.max,
      agents: deps.runner.graph.list().map(a => a.name),
      timestamp: new Date().toISOString(),
    });
  });

  app.route('/api/chat', createChatRoutes(deps));

  app.notFound((c) => {
    return c.json({ error: 'Not found' }, 404);
  });

  app.onError((err, c) => {
    const requestId = c.get('requestId');
    c.get('log').error({ err, path: c.req.path, method: c.req.method }, 'Unhandled error');
    return c.json({ error: 'Internal server error', message: CHAT_FALLBACK_MESSAGE, request_id: requestId }, 500);
  });

  return app;
}
