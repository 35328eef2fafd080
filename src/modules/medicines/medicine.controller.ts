import { Storage } from '../../storage/storage';
import { owned, parseOr400, sendResult } from '../../routes/respond';
import { parseLocal } from '../../utils/time.utils';
import { addStockSchema, expiryQuerySchema, lowStockQuerySchema, medicineInputSchema } from './medicine.validators';

export function medicineController(storage: Storage) {
  return {
    list: owned(async (_req, res, ownerId) => sendResult(res, await storage.getAllMedicines(ownerId))),

    get: owned(async (req, res, ownerId) => sendResult(res, await storage.getMedicine(ownerId, req.params.id))),

    create: owned(async (req, res, ownerId) => {
      const input = parseOr400(res, medicineInputSchema, req.body);
      if (!input) return;
      return sendResult(res, await storage.createMedicine(ownerId, input), 201);
    }),

    update: owned(async (req, res, ownerId) => {
      const input = parseOr400(res, medicineInputSchema, req.body);
      if (!input) return;
      return sendResult(res, await storage.updateMedicine(ownerId, req.params.id, input));
    }),

    remove: owned(async (req, res, ownerId) => {
      const result = await storage.deleteMedicine(ownerId, req.params.id);
      if (!result.success) return sendResult(res, result);
      return res.status(204).end();
    }),

    addStock: owned(async (req, res, ownerId) => {
      const body = parseOr400(res, addStockSchema, req.body);
      if (!body) return;
      return sendResult(res, await storage.addStock(ownerId, req.params.id, body.amount));
    }),

    expiry: owned(async (req, res, ownerId) => {
      const query = parseOr400(res, expiryQuerySchema, req.query);
      if (!query) return;
      let asOf: Date | undefined;
      if (query.asOf) {
        asOf = parseLocal(query.asOf);
        if (!asOf) return res.status(400).json({ error: 'asOf must be a local date or date-time' });
      }
      return sendResult(res, await storage.medicineExpiry(ownerId, asOf));
    }),

    lowStock: owned(async (req, res, ownerId) => {
      const query = parseOr400(res, lowStockQuerySchema, req.query);
      if (!query) return;
      return sendResult(res, await storage.getLowStockMedicines(ownerId, query.threshold));
    }),
  };
}
