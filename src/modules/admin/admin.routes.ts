import { Router } from 'express';
import { requireAuthContext } from '../../auth';
import { requireRole } from '../../middleware/auth';
import { Storage } from '../../storage/storage';
import { adminController } from './admin.controller';

export function adminRoutes(storage: Storage): Router {
  const router = Router();
  const c = adminController(storage);

  router.use(requireAuthContext, requireRole(['admin']));
  router.get('/users', c.listUsers);
  router.put('/users/:userId/activate', c.activate);
  router.put('/users/:userId/deactivate', c.deactivate);
  router.delete('/users/:userId', c.remove);

  return router;
}
