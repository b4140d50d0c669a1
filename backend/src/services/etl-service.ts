import type { AppConfig } from '../config.js';
import { createDatabase, type Database } from '../db.js';
import { HTTP_TIMEOUTS, createHttpClient } from '../http-client.js';
import { createChildLogger, logger } from '../logger.js';
import { ONLINE_ORDERS_DATASET, type DatasetDefinition } from '../pipeline/dataset.js';
import { KaggleFetcher, resolveKaggleCredential } from '../pipeline/fetcher.js';
import { createEtlDag } from '../pipeline/tasks.js';
import { PgDestinationRepository } from '../repositories/destination.js';
import { PgRunHistoryRepository, type RunHistoryRepository } from '../repositories/run-history.js';
import { PgStagingRepository } from '../repositories/staging.js';
import { DagRunner } from '../scheduler/dag-runner.js';
import { IntervalSchedule } from '../scheduler/interval-schedule.js';
import { RunQueue } from '../scheduler/run-queue.js';

export type EtlService = {
  dataset: DatasetDefinition;
  databases: Database[];
  history: RunHistoryRepository;
  runner: DagRunner;
  queue: RunQueue;
  schedule: IntervalSchedule;
  /** Creates the run history tables, resumes queued runs and starts the schedule. */
  start(): Promise<void>;
  close(): Promise<void>;
};

export function createEtlService(config: AppConfig, dataset: DatasetDefinition = ONLINE_ORDERS_DATASET): EtlService {
  const stagingDb = createDatabase('staging', config.staging);
  const destinationDb = createDatabase('destination', config.destination);
  const history = new PgRunHistoryRepository(destinationDb);

  const fetcher = new KaggleFetcher(
    createHttpClient({ baseURL: config.kaggle.apiBase, timeout: HTTP_TIMEOUTS.VERY_LONG }),
    createChildLogger({ component: 'fetcher' })
  );

  const dag = createEtlDag({
    dataset,
    datasetId: config.datasetId,
    downloadDir: config.downloadDir,
    resolveCredential: () => resolveKaggleCredential(config.kaggle),
    fetcher,
    staging: new PgStagingRepository(stagingDb, dataset),
    destination: new PgDestinationRepository(destinationDb, dataset),
  });

  const schedulerLogger = createChildLogger({ component: 'scheduler' });
  const runner = new DagRunner(dag, history, schedulerLogger, {
    retries: config.scheduler.retries,
    retryDelayMs: config.scheduler.retryDelayMs,
  });
  const queue = new RunQueue(runner, history, schedulerLogger);
  const schedule = new IntervalSchedule(queue, config.scheduler.intervalMinutes, schedulerLogger);

  return {
    dataset,
    databases: [stagingDb, destinationDb],
    history,
    runner,
    queue,
    schedule,
    async start() {
      await history.ensureSchema();
      await queue.initialize();
      schedule.start();
    },
    async close() {
      schedule.stop();
      await queue.whenIdle();
      await Promise.all([stagingDb.close(), destinationDb.close()]);
      logger.info('etl service stopped');
    },
  };
}
