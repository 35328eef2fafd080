import { Router } from 'express';
import { requireAuthContext } from '../../auth';
import { Storage } from '../../storage/storage';
import { dosageHistoryController } from './dosageHistory.controller';

export function dosageHistoryRoutes(storage: Storage): Router {
  const router = Router();
  const c = dosageHistoryController(storage);

  router.use(requireAuthContext);
  router.get('/', c.list);
  router.post('/', c.create);
  router.delete('/:id', c.remove);

  return router;
}
