import { Router } from 'express';
import { requireAuthContext } from '../../auth';
import { Mailer } from '../../mailer';
import { preventBodyLogging } from '../../security/safeLogger';
import { Storage } from '../../storage/storage';
import { AuthControllerOptions, authController } from './auth.controller';

export function authRoutes(storage: Storage, mailer: Mailer, options: AuthControllerOptions): Router {
  const router = Router();
  const c = authController(storage, mailer, options);

  router.post('/resetPassword', c.requestReset);
  router.post('/verifyResetToken', preventBodyLogging, c.verifyReset);
  router.post('/updatePassword', requireAuthContext, preventBodyLogging, c.updatePassword);
  router.post('/activateAccount', preventBodyLogging, c.activate);
  router.post('/logout', c.logout);

  return router;
}
