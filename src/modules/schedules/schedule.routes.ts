import { Router } from 'express';
import { requireAuthContext } from '../../auth';
import { Storage } from '../../storage/storage';
import { scheduleController } from './schedule.controller';

export function scheduleRoutes(storage: Storage): Router {
  const router = Router();
  const c = scheduleController(storage);

  router.use(requireAuthContext);
  router.get('/', c.list);
  router.post('/', c.create);
  router.get('/:id', c.get);
  router.put('/:id', c.update);
  router.delete('/:id', c.remove);

  return router;
}

/** Today's schedules grouped by time. */
export function dailyRoutes(storage: Storage): Router {
  const router = Router();
  router.get('/', requireAuthContext, scheduleController(storage).daily);
  return router;
}
