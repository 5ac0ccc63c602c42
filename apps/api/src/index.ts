import { serve } from '@hono/node-server';
import { loadConfig } from '@beacon/core';
import { Processor, loadAlertRules, loadEnvFile } from '@beacon/processor';
import { createApp } from './app';
import { logger } from './logger';

async function main(): Promise<void> {
  loadEnvFile(logger);
  const config = loadConfig();
  logger.level = config.logLevel;

  const rules = config.alertRulesPath ? await loadAlertRules(config.alertRulesPath) : [];
  const processor = new Processor(config, { rules });
  const app = createApp(processor, {
    apiKey: config.apiKey,
    corsOrigins: process.env.CORS_ORIGIN?.split(','),
  });

  processor.start();
  const server = serve({ fetch: app.fetch, port: config.apiPort }, (info) => {
    logger.info({ port: info.port, auth: Boolean(config.apiKey) }, 'Beacon API listening');
  });

  const shutdown = async (signal: string) => {
    logger.info({ signal }, 'Shutdown signal received, shutting down gracefully...');
    server.close();
    await processor.stop();
    logger.info('Graceful shutdown complete');
    process.exit(0);
  };

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.on(signal, () => {
      shutdown(signal).catch((error) => {
        logger.error({ error }, 'Shutdown failed');
        process.exit(1);
      });
    });
  }
}

main().catch((error) => {
  logger.error({ error }, 'Failed to start API');
  process.exit(1);
});
