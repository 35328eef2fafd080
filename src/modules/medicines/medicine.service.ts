import { medicineCodec } from '../../storage/codec';
import { StorageContext, loadRecord, requireRecord } from '../../storage/context';
import { StoreFailure, storeErrors } from '../../storage/errors';
import { Medicine } from '../../storage/records';
import { runGuarded } from '../../storage/transaction';
import { MedicineInput } from './medicine.validators';

export const DEFAULT_LOW_STOCK_THRESHOLD = 10;

const notFound = (id: string) => `Medicine with id ${id} not found`;

export class MedicineService {
  constructor(private readonly ctx: StorageContext) {}

  key(ownerId: string, id: string): string {
    return this.ctx.keys.entity('medicine', ownerId, id);
  }

  get(ownerId: string, id: string): Promise<Medicine> {
    return loadRecord(this.ctx, this.key(ownerId, id), medicineCodec, notFound(id));
  }

  list(ownerId: string): Promise<Medicine[]> {
    return this.ctx.scanner.loadAll(this.ctx.keys.entityPattern('medicine', ownerId), medicineCodec);
  }

  async create(ownerId: string, input: MedicineInput): Promise<Medicine> {
    const medicine: Medicine = { id: this.ctx.newId(), ...input };
    await this.ctx.store.set(this.key(ownerId, medicine.id), medicineCodec.encode(medicine));
    return medicine;
  }

  /** Replaces every field but the id. A medicine deleted concurrently is not resurrected. */
  update(ownerId: string, id: string, input: MedicineInput): Promise<Medicine> {
    const key = this.key(ownerId, id);
    return runGuarded(
      this.ctx.store,
      { watchKeys: [key], maxAttempts: this.ctx.maxAttempts, label: 'update medicine' },
      async (session) => {
        requireRecord(await session.get(key), medicineCodec, notFound(id));
        const medicine: Medicine = { ...input, id };
        return { writes: [{ op: 'set', key, value: medicineCodec.encode(medicine) }], result: medicine };
      }
    );
  }

  /** Schedules and history that reference the medicine are left in place. */
  async delete(ownerId: string, id: string): Promise<void> {
    const removed = await this.ctx.store.del([this.key(ownerId, id)]);
    if (removed === 0) throw new StoreFailure(storeErrors.notFound(notFound(id)));
  }

  addStock(ownerId: string, id: string, amount: number): Promise<Medicine> {
    const key = this.key(ownerId, id);
    return runGuarded(
      this.ctx.store,
      { watchKeys: [key], maxAttempts: this.ctx.maxAttempts, label: 'add stock' },
      async (session) => {
        const current = requireRecord(await session.get(key), medicineCodec, notFound(id));
        const medicine: Medicine = { ...current, stock: current.stock + amount };
        return { writes: [{ op: 'set', key, value: medicineCodec.encode(medicine) }], result: medicine };
      }
    );
  }

  /** Stock strictly below `threshold`, lowest first. */
  async lowStock(ownerId: string, threshold = DEFAULT_LOW_STOCK_THRESHOLD): Promise<Medicine[]> {
    const medicines = await this.list(ownerId);
    return medicines.filter((m) => m.stock < threshold).sort((a, b) => a.stock - b.stock || a.name.localeCompare(b.name));
  }
}
