import express, { type Express } from 'express';
import helmet from 'helmet';
import morgan from 'morgan';
import cors from 'cors';
import type { Database } from './db.js';
import { errorHandler } from './middleware/error-handler.js';
import { requireAuth } from './middleware/auth.js';
import type { RunHistoryRepository } from './repositories/run-history.js';
import { createEtlRunsRouter } from './routes/etl-runs.js';
import { createHealthRouter } from './routes/health.js';
import type { RunQueue } from './scheduler/run-queue.js';

export type AppDependencies = {
  databases: Database[];
  queue: RunQueue;
  history: RunHistoryRepository;
  jwtSecret?: string;
};

export function createApp(deps: AppDependencies): Express {
  const app = express();
  app.set('trust proxy', true);
  app.use(helmet());
  app.use(cors());
  app.use(express.json());
  app.use(morgan('combined'));

  app.use('/api/v1/health', createHealthRouter(deps.databases));

  app.use(requireAuth(deps.jwtSecret));

  app.use('/api/v1/etl', createEtlRunsRouter(deps.queue, deps.history));

  app.use(errorHandler);

  return app;
}
