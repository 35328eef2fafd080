import { Storage } from '../../storage/storage';
import { owned, parseOr400, sendResult } from '../../routes/respond';
import { parseLocal } from '../../utils/time.utils';
import { dateRangeQuerySchema, dosageHistoryInputSchema } from './dosageHistory.validators';

export function dosageHistoryController(storage: Storage) {
  return {
    list: owned(async (req, res, ownerId) => {
      const query = parseOr400(res, dateRangeQuerySchema, req.query);
      if (!query) return;
      if (query.start === undefined || query.end === undefined) {
        return sendResult(res, await storage.getAllDosageHistories(ownerId));
      }
      const start = parseLocal(query.start);
      const end = parseLocal(query.end);
      if (!start || !end) return res.status(400).json({ error: 'start and end must be local dates' });
      return sendResult(res, await storage.getDosageHistoriesInDateRange(ownerId, start, end));
    }),

    create: owned(async (req, res, ownerId) => {
      const input = parseOr400(res, dosageHistoryInputSchema, req.body);
      if (!input) return;
      const result = await storage.createDosageHistory(ownerId, input.medicineId, input.amount, input.scheduledTime, input.datetime);
      return sendResult(res, result, 201);
    }),

    remove: owned(async (req, res, ownerId) => {
      const result = await storage.deleteDosageHistory(ownerId, req.params.id);
      if (!result.success) return sendResult(res, result);
      return res.status(204).end();
    }),
  };
}
