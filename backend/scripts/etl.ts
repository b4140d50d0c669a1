// Runs the pipeline once in the foreground and exits non-zero when a task fails.
import { loadConfig } from '../src/config.js';
import { logger } from '../src/logger.js';
import { createEtlService } from '../src/services/etl-service.js';

async function main(): Promise<number> {
  const etl = createEtlService(loadConfig());
  try {
    await etl.history.ensureSchema();
    const run = await etl.runner.createRun('cli');
    const outcome = await etl.runner.execute(run.id);
    if (outcome.status === 'success') {
      logger.info({ runId: run.id, summary: outcome.summary }, 'etl run succeeded');
      return 0;
    }
    logger.error({ runId: run.id, error: outcome.error }, 'etl run failed');
    return 1;
  } finally {
    await etl.close();
  }
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    logger.fatal({ err: error }, 'etl run crashed');
    process.exitCode = 1;
  });
