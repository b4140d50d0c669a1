import { createApp } from './app.js';
import { loadConfig } from './config.js';
import { logger } from './logger.js';
import { createEtlService } from './services/etl-service.js';

async function main(): Promise<void> {
  const config = loadConfig();
  const etl = createEtlService(config);
  await etl.start();

  const app = createApp({
    databases: etl.databases,
    queue: etl.queue,
    history: etl.history,
    jwtSecret: config.jwtSecret,
  });

  const server = app.listen(config.apiPort, () => {
    logger.info({ port: config.apiPort }, 'api up');
  });

  const shutdown = (signal: string) => {
    logger.info({ signal }, 'shutting down');
    server.close();
    etl.close().catch((error: unknown) => {
      logger.error({ err: error }, 'error during shutdown');
      process.exitCode = 1;
    });
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);
}

main().catch((error: unknown) => {
  logger.fatal({ err: error }, 'failed to start');
  process.exitCode = 1;
});
