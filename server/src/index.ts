import { serve } from '@hono/node-server';
import { fileURLToPath } from 'node:url';
import path from 'node:path';
import { createApp } from './app.js';
import { createAgentCatalog, DEFAULT_START_AGENT } from './agents/catalog.js';
import { LlmGateway } from './agents/runtime/llm-gateway.js';
import { Runner } from './agents/runtime/runner.js';
import { getConfig, parseAllowedOrigins } from './lib/config.js';
import { createProvider, hasProviderCredentials } from './lib/llm.js';
import { HttpQuoteSource } from './lib/market-data.js';
import { RunLimiter } from './lib/run-limiter.js';
import logger from './lib/logger.js';

const config = getConfig();
let shuttingDown = false;

if (config.NODE_ENV === 'production' && !config.ALLOWED_ORIGINS) {
  logger.error('ALLOWED_ORIGINS not set in production — all cross-origin requests will be blocked');
}

// Agent graph is validated here; a ConfigurationError stops startup
const graph = createAgentCatalog({ quoteSource: new HttpQuoteSource({ baseUrl: config.QUOTE_API_URL }) });
const { provider, model, maxTokens } = createProvider(config);
const runner = new Runner({
  graph,
  gateway: new LlmGateway({ provider, model, maxTokens }),
  maxSteps: config.AGENT_MAX_STEPS,
  timeoutMs: config.RUN_TIMEOUT_MS,
  toolTimeoutMs: config.TOOL_TIMEOUT_MS,
});
const limiter = new RunLimiter(config.MAX_CONCURRENT_RUNS);

const app = createApp({
  runner,
  limiter,
  startAgent: DEFAULT_START_AGENT,
  allowedOrigins: parseAllowedOrigins(config),
  isProviderReady: () => hasProviderCredentials(config),
  isShuttingDown: () => shuttingDown,
});

let server: ReturnType<typeof serve> | null = null;

function waitForRunsToDrain(timeoutMs: number): Promise<boolean> {
  return new Promise((resolve) => {
    const deadline = Date.now() + timeoutMs;
    const poll = setInterval(() => {
      const { active } = limiter.stats();
      if (active === 0 || Date.now() >= deadline) {
        clearInterval(poll);
        resolve(active === 0);
      }
    }, 100);
    poll.unref();
  });
}

function shutdown(signal: string) {
  if (shuttingDown) return;
  if (!server) return;
  shuttingDown = true;
  logger.info({ signal, active_runs: limiter.stats().active }, 'Graceful shutdown initiated');

  // Stop accepting connections; in-flight runs get a short budget to finish
  server.close(() => {
    void waitForRunsToDrain(5_000).then((drained) => {
      logger.info({ drained }, 'HTTP server closed');
      process.exit(0);
    });
  });

  setTimeout(() => {
    logger.warn('Forcing exit after shutdown timeout');
    process.exit(1);
  }, 10_000).unref();
}

export function startServer() {
  if (server) return server;

  const port = config.PORT;
  logger.info({ port, provider: provider.name, model, agents: graph.list().map(a => a.name) }, 'Agent server starting');
  server = serve({ fetch: app.fetch, port });
  logger.info({ port }, `Server running at http://localhost:${port}`);

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('unhandledRejection', (reason) => {
    logger.error({ reason }, 'Unhandled promise rejection');
    shutdown('UNHANDLED_REJECTION');
  });
  process.on('uncaughtException', (err) => {
    logger.error({ err }, 'Uncaught exception');
    shutdown('UNCAUGHT_EXCEPTION');
  });

  return server;
}

function isMainModule(): boolean {
  const current = fileURLToPath(import.meta.url);
  const entry = process.argv[1];
  if (!entry) return false;
  return path.resolve(entry) === path.resolve(current);
}

if (isMainModule()) {
  startServer();
}

export { app };
