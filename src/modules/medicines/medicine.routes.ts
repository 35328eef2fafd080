import { Router } from 'express';
import { requireAuthContext } from '../../auth';
import { Storage } from '../../storage/storage';
import { medicineController } from './medicine.controller';

export function medicineRoutes(storage: Storage): Router {
  const router = Router();
  const c = medicineController(storage);

  router.use(requireAuthContext);

  /* Aggregates (before /:id) */
  router.get('/expiry', c.expiry);
  router.get('/lowstock', c.lowStock);

  router.get('/', c.list);
  router.post('/', c.create);
  router.get('/:id', c.get);
  router.put('/:id', c.update);
  router.delete('/:id', c.remove);
  router.post('/:id/stock', c.addStock);

  return router;
}
