import { Storage } from '../../storage/storage';
import { owned, parseOr400, sendResult } from '../../routes/respond';
import { scheduleInputSchema } from './schedule.validators';

export function scheduleController(storage: Storage) {
  return {
    list: owned(async (_req, res, ownerId) => sendResult(res, await storage.getAllSchedules(ownerId))),

    get: owned(async (req, res, ownerId) => sendResult(res, await storage.getSchedule(ownerId, req.params.id))),

    create: owned(async (req, res, ownerId) => {
      const input = parseOr400(res, scheduleInputSchema, req.body);
      if (!input) return;
      return sendResult(res, await storage.createSchedule(ownerId, input), 201);
    }),

    update: owned(async (req, res, ownerId) => {
      const input = parseOr400(res, scheduleInputSchema, req.body);
      if (!input) return;
      return sendResult(res, await storage.updateSchedule(ownerId, req.params.id, input));
    }),

    remove: owned(async (req, res, ownerId) => {
      const result = await storage.deleteSchedule(ownerId, req.params.id);
      if (!result.success) return sendResult(res, result);
      return res.status(204).end();
    }),

    daily: owned(async (_req, res, ownerId) => sendResult(res, await storage.getDailySchedule(ownerId))),
  };
}
