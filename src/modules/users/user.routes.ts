import { Router } from 'express';
import { requireAuthContext } from '../../auth';
import { Mailer } from '../../mailer';
import { preventBodyLogging } from '../../security/safeLogger';
import { Storage } from '../../storage/storage';
import { UserControllerOptions, userController } from './user.controller';

export function userRoutes(storage: Storage, mailer: Mailer, options: UserControllerOptions): Router {
  const router = Router();
  const c = userController(storage, mailer, options);

  router.post('/register', preventBodyLogging, c.register);
  router.post('/login', preventBodyLogging, c.login);
  router.get('/profile', requireAuthContext, c.profile);
  router.put('/profile', requireAuthContext, c.updateProfile);
  router.put('/password', requireAuthContext, preventBodyLogging, c.changePassword);

  return router;
}
