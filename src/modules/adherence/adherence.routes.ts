import { Router } from 'express';
import { requireAuthContext } from '../../auth';
import { owned, sendResult } from '../../routes/respond';
import { Storage } from '../../storage/storage';

export function adherenceRoutes(storage: Storage): Router {
  const router = Router();
  router.get(
    '/',
    requireAuthContext,
    owned(async (_req, res, ownerId) => sendResult(res, await storage.getWeeklyAdherence(ownerId)))
  );
  return router;
}
