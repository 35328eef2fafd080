import { Router } from 'express';
import { Mailer } from '../mailer';
import { Storage } from '../storage/storage';
import { adherenceRoutes } from '../modules/adherence/adherence.routes';
import { adminRoutes } from '../modules/admin/admin.routes';
import { dosageHistoryRoutes } from '../modules/dosageHistory/dosageHistory.routes';
import { medicineRoutes } from '../modules/medicines/medicine.routes';
import { dailyRoutes, scheduleRoutes } from '../modules/schedules/schedule.routes';
import { authRoutes } from '../modules/users/auth.routes';
import { userRoutes } from '../modules/users/user.routes';

export type RouteOptions = { appUrl: string; sessionTtlSeconds: number };

export function apiRoutes(storage: Storage, mailer: Mailer, options: RouteOptions): Router {
  const router = Router();

  router.use('/user', userRoutes(storage, mailer, options));
  router.use('/auth', authRoutes(storage, mailer, options));
  router.use('/medicine', medicineRoutes(storage));
  router.use('/schedule', scheduleRoutes(storage));
  router.use('/daily', dailyRoutes(storage));
  router.use('/dosagehistory', dosageHistoryRoutes(storage));
  router.use('/adherence', adherenceRoutes(storage));
  router.use('/admin', adminRoutes(storage));

  return router;
}
