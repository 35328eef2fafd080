import { endOfDay, isWithinInterval, startOfDay } from 'date-fns';
import { dosageHistoryCodec, medicineCodec } from '../../storage/codec';
import { StorageContext, requireRecord } from '../../storage/context';
import { StoreFailure, storeErrors } from '../../storage/errors';
import { DosageHistory, Medicine } from '../../storage/records';
import { runGuarded } from '../../storage/transaction';
import { WriteOp } from '../../storage/client';
import { parseLocal, toLocalDateTime } from '../../utils/time.utils';

export type RecordDoseOptions = {
  scheduledTime?: string;
  /** Local date-time of the dose; defaults to now. */
  when?: string;
};

const notFound = (id: string) => `Dosage history with id ${id} not found`;

/** Newest first; ties keep a stable order by id. */
export function byDatetimeDesc(a: DosageHistory, b: DosageHistory): number {
  if (a.datetime === b.datetime) return a.id.localeCompare(b.id);
  return a.datetime < b.datetime ? 1 : -1;
}

export class DosageHistoryService {
  constructor(private readonly ctx: StorageContext) {}

  key(ownerId: string, id: string): string {
    return this.ctx.keys.entity('dosagehistory', ownerId, id);
  }

  /**
   * Records a dose and takes `amount` off the medicine's stock in one commit. Stock may
   * go negative.
   */
  record(ownerId: string, medicineId: string, amount: number, options: RecordDoseOptions = {}): Promise<DosageHistory> {
    const medicineKey = this.ctx.keys.entity('medicine', ownerId, medicineId);
    const datetime = this.#normalize(options.when);
    const id = this.ctx.newId();
    const history: DosageHistory = { id, datetime, medicineId, amount, scheduledTime: options.scheduledTime };

    return runGuarded(
      this.ctx.store,
      { watchKeys: [medicineKey], maxAttempts: this.ctx.maxAttempts, label: 'create dosage history' },
      async (session) => {
        const medicine = requireRecord(
          await session.get(medicineKey),
          medicineCodec,
          `Medicine with id ${medicineId} not found`
        );
        const updated: Medicine = { ...medicine, stock: medicine.stock - amount };
        return {
          writes: [
            { op: 'set', key: medicineKey, value: medicineCodec.encode(updated) },
            { op: 'set', key: this.key(ownerId, id), value: dosageHistoryCodec.encode(history) },
          ],
          result: history,
        };
      }
    );
  }

  /**
   * Removes a dose and puts its amount back on the medicine. When the medicine itself is
   * gone only the history record is removed.
   */
  async delete(ownerId: string, id: string): Promise<void> {
    const historyKey = this.key(ownerId, id);
    const existing = requireRecord(await this.ctx.store.get(historyKey), dosageHistoryCodec, notFound(id));
    const medicineKey = this.ctx.keys.entity('medicine', ownerId, existing.medicineId);

    await runGuarded(
      this.ctx.store,
      { watchKeys: [historyKey, medicineKey], maxAttempts: this.ctx.maxAttempts, label: 'delete dosage history' },
      async (session) => {
        const history = requireRecord(await session.get(historyKey), dosageHistoryCodec, notFound(id));
        const writes: WriteOp[] = [{ op: 'del', key: historyKey }];
        const rawMedicine = await session.get(medicineKey);
        if (rawMedicine !== null) {
          const medicine = medicineCodec.decode(rawMedicine);
          const restored: Medicine = { ...medicine, stock: medicine.stock + history.amount };
          writes.push({ op: 'set', key: medicineKey, value: medicineCodec.encode(restored) });
        }
        return { writes, result: undefined };
      }
    );
  }

  async list(ownerId: string): Promise<DosageHistory[]> {
    const all = await this.ctx.scanner.loadAll(this.ctx.keys.entityPattern('dosagehistory', ownerId), dosageHistoryCodec);
    return all.sort(byDatetimeDesc);
  }

  /** Whole local days `start`..`end`, both included. */
  async inRange(ownerId: string, start: Date, end: Date): Promise<DosageHistory[]> {
    const interval = { start: startOfDay(start), end: endOfDay(end) };
    if (interval.start > interval.end) return [];
    const all = await this.list(ownerId);
    return all.filter((h) => {
      const at = parseLocal(h.datetime);
      return at !== undefined && isWithinInterval(at, interval);
    });
  }

  #normalize(when: string | undefined): string {
    if (when === undefined) return toLocalDateTime(this.ctx.now());
    const parsed = parseLocal(when);
    if (!parsed) throw new StoreFailure(storeErrors.operation(`Invalid dose datetime: ${when}`, 'invalid_input'));
    return toLocalDateTime(parsed);
  }
}
