import { Hono } from 'hono';
import { serve } from '@hono/node-server';
import { cors } from 'hono/cors';
import { fileURLToPath } from 'node:url';
import path from 'node:path';
import { createCoordinator, type PipelineCoordinator } from './agents/coordinator.js';
import { getConfig, resolveProviderName, type DigestConfig } from './lib/config.js';
import logger from './lib/logger.js';
import { requestIdMiddleware } from './middleware/request-id.js';
import { createDigestRoutes } from './routes/digest.js';

export interface AppOptions {
  config?: DigestConfig;
  /** Coordinator for /api/digest; built lazily from config when omitted. */
  getCoordinator?: () => PipelineCoordinator;
}

let shuttingDown = false;

function healthSnapshot(config: DigestConfig) {
  const provider = resolveProviderName(config);
  const llmKeyPresent = provider === 'anthropic' ? Boolean(config.ANTHROPIC_API_KEY) : Boolean(config.OPENAI_API_KEY);
  const newsKeyPresent = Boolean(config.NEWS_API_KEY);
  const status = shuttingDown ? 'draining' : llmKeyPresent && newsKeyPresent ? 'ok' : 'degraded';
  return {
    status,
    shutting_down: shuttingDown,
    llm_provider: provider,
    llm_key_present: llmKeyPresent,
    news_key_present: newsKeyPresent,
    tracing: config.ENABLE_TRACING,
    timestamp: new Date().toISOString(),
  };
}

export function createApp(options: AppOptions = {}): Hono {
  const config = options.config ?? getConfig();
  let coordinator: PipelineCoordinator | null = null;
  const getCoordinator = options.getCoordinator ?? (() => (coordinator ??= createCoordinator(config)));

  const app = new Hono();

  app.use('*', requestIdMiddleware);

  app.use('*', async (c, next) => {
    if (shuttingDown && c.req.path !== '/health') {
      return c.json({ error: 'Server is restarting. Please retry shortly.' }, 503);
    }
    await next();
  });

  const allowedOrigins = config.ALLOWED_ORIGINS
    ? config.ALLOWED_ORIGINS.split(',').map((o) => o.trim())
    : config.NODE_ENV === 'production'
      ? []
      : ['http://localhost:5173'];
  app.use('*', cors({ origin: allowedOrigins }));

  app.get('/health', (c) => {
    c.header('Cache-Control', 'no-store');
    return c.json(healthSnapshot(config));
  });

  app.route('/api/digest', createDigestRoutes(getCoordinator));

  app.notFound((c) => c.json({ error: 'Not found' }, 404));

  app.onError((err, c) => {
    const requestId = c.get('requestId');
    logger.error({ err, requestId, path: c.req.path }, 'Unhandled error');
    return c.json({ error: 'Internal server error', request_id: requestId }, 500);
  });

  return app;
}

let server: ReturnType<typeof serve> | null = null;

function shutdown(signal: string) {
  if (shuttingDown || !server) return;
  shuttingDown = true;
  logger.info({ signal }, 'Graceful shutdown initiated');

  server.close(() => {
    logger.info('HTTP server closed');
    process.exit(0);
  });

  // Runs in flight can hold connections for several stage timeouts.
  setTimeout(() => {
    logger.warn('Forcing exit after shutdown timeout');
    process.exit(1);
  }, 10_000).unref();
}

export function startServer(config: DigestConfig = getConfig()) {
  if (server) return server;

  const app = createApp({ config });
  logger.info({ port: config.PORT }, 'Daily digest server starting');
  server = serve({ fetch: app.fetch, port: config.PORT });
  logger.info({ port: config.PORT }, `Server running at http://localhost:${config.PORT}`);

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
