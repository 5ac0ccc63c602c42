import { loadConfig } from '@beacon/core';
import { loadEnvFile } from './env';
import { loadAlertRules } from './rules';
import { Processor } from './processor';
import { logger } from './logger';

async function main(): Promise<void> {
  loadEnvFile();
  const config = loadConfig();
  logger.level = config.logLevel;

  const rules = config.alertRulesPath ? await loadAlertRules(config.alertRulesPath) : [];
  const processor = new Processor(config, { rules });

  const shutdown = async (signal: string) => {
    logger.info({ signal }, 'Shutdown signal received, shutting down gracefully...');
    await processor.stop();
    logger.info('Graceful shutdown complete');
    process.exit(0);
  };

  process.on('SIGINT', () => {
    shutdown('SIGINT').catch((error) => {
      logger.error({ error }, 'Shutdown failed');
      process.exit(1);
    });
  });
  process.on('SIGTERM', () => {
    shutdown('SIGTERM').catch((error) => {
      logger.error({ error }, 'Shutdown failed');
      process.exit(1);
    });
  });

  processor.start();
}

main().catch((error) => {
  logger.error({ error }, 'Failed to start processor');
  process.exit(1);
});
