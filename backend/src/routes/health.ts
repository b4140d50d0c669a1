import { Router } from 'express';
import type { Database } from '../db.js';
import { asyncHandler } from '../utils/async-handler.js';

export function createHealthRouter(databases: Database[]): Router {
  const router = Router();

  router.get(
    '/',
    asyncHandler(async (_req, res) => {
      const checks: Record<string, string> = {};
      for (const database of databases) {
        const now = await database.query<{ now: Date }>('select now()');
        checks[database.name] = now.rows[0].now.toISOString();
      }
      res.json({ status: 'ok', time: new Date().toISOString(), databases: checks });
    })
  );

  return router;
}
