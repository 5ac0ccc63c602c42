import { Hono } from 'hono';
import { cors } from 'hono/cors';
import { errorMessage } from '@beacon/core';
import type { Processor } from '@beacon/processor';
import { apiKeyAuth } from './middleware/auth';
import { logger } from './logger';
import { metricsRoutes } from './routes/metrics';
import { spansRoutes } from './routes/spans';
import { logsRoutes } from './routes/logs';
import { healthRoutes } from './routes/health';
import { alertsRoutes } from './routes/alerts';
import { statsRoutes } from './routes/stats';

const MAX_BODY_BYTES = 10 * 1024 * 1024;

export interface AppOptions {
  /** When set, every /v1 route requires this key as a bearer token */
  apiKey?: string;
  corsOrigins?: string[];
}

export function createApp(processor: Processor, options: AppOptions = {}): Hono {
  const app = new Hono();

  // Security Headers
  app.use('*', async (c, next) => {
    c.header('X-Content-Type-Options', 'nosniff');
    c.header('X-Frame-Options', 'DENY');
    if (process.env.NODE_ENV === 'production') {
      c.header('Strict-Transport-Security', 'max-age=31536000; includeSubDomains');
    }
    await next();
  });

  // Request Size Limits (10MB max)
  app.use('*', async (c, next) => {
    const contentLength = c.req.header('content-length');
    if (contentLength && parseInt(contentLength, 10) > MAX_BODY_BYTES) {
      logger.warn({ size: contentLength, maxSize: MAX_BODY_BYTES }, 'Request body too large');
      return c.json({ error: 'Request body too large (max 10MB)' }, 413);
    }
    await next();
  });

  app.use(
    '*',
    cors({
      origin: options.corsOrigins ?? '*',
      allowMethods: ['GET', 'POST', 'OPTIONS'],
      allowHeaders: ['Content-Type', 'Authorization'],
    })
  );

  // Liveness only; component health lives under /v1/health
  app.get('/health', (c) =>
    c.json({
      status: 'ok',
      processor: processor.isRunning() ? 'running' : 'stopped',
      timestamp: new Date().toISOString(),
      uptime: Math.round(process.uptime()),
    })
  );

  if (options.apiKey) {
    app.use('/v1/*', apiKeyAuth(options.apiKey));
  }

  app.route('/v1/metrics', metricsRoutes(processor));
  app.route('/v1/spans', spansRoutes(processor));
  app.route('/v1/logs', logsRoutes(processor));
  app.route('/v1/alerts', alertsRoutes(processor));
  app.route('/v1/stats', statsRoutes(processor));
  app.route('/v1', healthRoutes(processor));

  app.notFound((c) => c.json({ error: 'Not found' }, 404));

  app.onError((error, c) => {
    logger.error({ error: errorMessage(error), path: c.req.path }, 'Unhandled request error');
    return c.json({ error: 'Internal server error' }, 500);
  });

  return app;
}
