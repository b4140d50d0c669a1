import { Router } from 'express';
import { z } from 'zod';
import { notFound } from '../errors.js';
import { requirePermission } from '../middleware/auth.js';
import type { RunHistoryRepository } from '../repositories/run-history.js';
import type { RunQueue } from '../scheduler/run-queue.js';
import { asyncHandler } from '../utils/async-handler.js';

const listQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(200).optional(),
});

const runParamsSchema = z.object({
  runId: z.string().uuid(),
});

export function createEtlRunsRouter(queue: RunQueue, history: RunHistoryRepository): Router {
  const router = Router();

  router.get(
    '/runs',
    requirePermission('etl:read', 'etl:run'),
    asyncHandler(async (req, res) => {
      const { limit } = listQuerySchema.parse(req.query);
      const runs = await history.listRuns(limit ?? 20);
      res.json({ runs });
    })
  );

  router.post(
    '/runs',
    requirePermission('etl:run'),
    asyncHandler(async (_req, res) => {
      const run = await queue.trigger('manual');
      res.status(202).json({
        runId: run.id,
        status: run.status,
        message: 'Run accepted. Processing will run asynchronously.',
      });
    })
  );

  router.get(
    '/runs/:runId',
    requirePermission('etl:read', 'etl:run'),
    asyncHandler(async (req, res) => {
      const params = runParamsSchema.safeParse(req.params);
      if (!params.success) {
        throw notFound('run not found');
      }
      const run = await history.getRun(params.data.runId);
      if (!run) {
        throw notFound('run not found');
      }
      res.json(run);
    })
  );

  return router;
}
