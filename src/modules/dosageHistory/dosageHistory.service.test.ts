import { createTestStorage } from '../../test.utils';
import { medicineCodec } from '../../storage/codec';

const OWNER = 'owner-1';

async function seedMedicine(stock: number) {
  const harness = createTestStorage();
  const medicine = await harness.storage.medicines.create(OWNER, { name: 'Metformin', dose: 500, unit: 'mg', stock });
  return { ...harness, medicine };
}

describe('DosageHistoryService', () => {
  it('takes the dose off the stock and puts it back on delete', async () => {
    const { storage, medicine } = await seedMedicine(30);

    const created = await storage.createDosageHistory(OWNER, medicine.id, 2.5, '08:00');
    if (!created.success) throw new Error(created.error.message);
    expect(created.data).toMatchObject({ medicineId: medicine.id, amount: 2.5, scheduledTime: '08:00', datetime: '2024-03-13T09:30:00' });
    expect((await storage.medicines.get(OWNER, medicine.id)).stock).toBe(27.5);

    const deleted = await storage.deleteDosageHistory(OWNER, created.data.id);
    expect(deleted.success).toBe(true);
    expect((await storage.medicines.get(OWNER, medicine.id)).stock).toBe(30);
    expect(await storage.histories.list(OWNER)).toEqual([]);
  });

  it('lets stock go negative', async () => {
    const { storage, medicine } = await seedMedicine(1);
    await storage.histories.record(OWNER, medicine.id, 3);
    expect((await storage.medicines.get(OWNER, medicine.id)).stock).toBe(-2);
  });

  it('reports NotFound for an unknown medicine and writes nothing', async () => {
    const { storage, store } = createTestStorage();
    const result = await storage.createDosageHistory(OWNER, 'missing', 1);
    expect(result).toEqual({
      success: false,
      error: { kind: 'NotFound', message: 'Medicine with id missing not found' },
    });
    expect(store.keys('*dosagehistory*')).toEqual([]);
  });

  it('serializes concurrent doses without losing updates', async () => {
    const { storage, medicine } = await seedMedicine(100);

    const results = await Promise.all(
      Array.from({ length: 8 }, () => storage.createDosageHistory(OWNER, medicine.id, 1.5))
    );

    expect(results.every((r) => r.success)).toBe(true);
    expect((await storage.medicines.get(OWNER, medicine.id)).stock).toBe(88);
    expect(await storage.histories.list(OWNER)).toHaveLength(8);
  });

  it('keeps stock balanced when doses, additions and deletions race', async () => {
    const harness = createTestStorage({ maxAttempts: 3 });
    const { storage } = harness;
    const medicine = await storage.medicines.create(OWNER, { name: 'Metformin', dose: 500, unit: 'mg', stock: 100 });
    const seeded = [];
    for (let i = 0; i < 4; i++) seeded.push(await storage.histories.record(OWNER, medicine.id, 2));
    expect((await storage.medicines.get(OWNER, medicine.id)).stock).toBe(92);

    const takes = Array.from({ length: 6 }, () => storage.createDosageHistory(OWNER, medicine.id, 1.5));
    const adds = Array.from({ length: 4 }, () => storage.addStock(OWNER, medicine.id, 5));
    const deletes = seeded.map((h) => storage.deleteDosageHistory(OWNER, h.id));
    const [taken, added, restored] = await Promise.all([Promise.all(takes), Promise.all(adds), Promise.all(deletes)]);

    for (const r of [...taken, ...added, ...restored]) {
      if (!r.success) expect(r.error).toMatchObject({ kind: 'OperationError', reason: 'retry_exhausted' });
    }
    const succeeded = (results: { success: boolean }[]) => results.filter((r) => r.success).length;
    const expected = 92 - 1.5 * succeeded(taken) + 5 * succeeded(added) + 2 * succeeded(restored);

    expect((await storage.medicines.get(OWNER, medicine.id)).stock).toBe(expected);
    expect(await storage.histories.list(OWNER)).toHaveLength(4 - succeeded(restored) + succeeded(taken));
  });

  it('refuses an impossible calendar date as bad input', async () => {
    const { storage, medicine, store } = await seedMedicine(10);
    const result = await storage.createDosageHistory(OWNER, medicine.id, 1, undefined, '2024-02-30T08:00:00');
    expect(result).toEqual({
      success: false,
      error: { kind: 'OperationError', reason: 'invalid_input', message: 'Invalid dose datetime: 2024-02-30T08:00:00' },
    });
    expect(store.keys('*dosagehistory*')).toEqual([]);
    expect((await storage.medicines.get(OWNER, medicine.id)).stock).toBe(10);
  });

  it('records the given local date-time', async () => {
    const { storage, medicine } = await seedMedicine(10);
    const history = await storage.histories.record(OWNER, medicine.id, 1, { when: '2024-03-10T21:05' });
    expect(history.datetime).toBe('2024-03-10T21:05:00');
  });

  it('still removes history whose medicine was deleted', async () => {
    const { storage, medicine } = await seedMedicine(10);
    const history = await storage.histories.record(OWNER, medicine.id, 1);
    await storage.medicines.delete(OWNER, medicine.id);

    expect((await storage.deleteDosageHistory(OWNER, history.id)).success).toBe(true);
    expect(await storage.histories.list(OWNER)).toEqual([]);
  });

  it('reports NotFound when deleting unknown history', async () => {
    const { storage } = createTestStorage();
    const result = await storage.deleteDosageHistory(OWNER, 'h-missing');
    expect(result).toEqual({
      success: false,
      error: { kind: 'NotFound', message: 'Dosage history with id h-missing not found' },
    });
  });

  it('restores stock that changed since the dose was taken', async () => {
    const { storage, medicine } = await seedMedicine(10);
    const history = await storage.histories.record(OWNER, medicine.id, 2);
    await storage.addStock(OWNER, medicine.id, 5);
    await storage.histories.delete(OWNER, history.id);
    expect((await storage.medicines.get(OWNER, medicine.id)).stock).toBe(15);
  });

  it('lists newest first and filters whole days inclusively', async () => {
    const { storage, medicine } = await seedMedicine(50);
    for (const when of ['2024-03-01T08:00:00', '2024-03-03T23:59:59', '2024-03-02T12:00:00', '2024-03-04T00:00:00']) {
      await storage.histories.record(OWNER, medicine.id, 1, { when });
    }

    const all = await storage.getAllDosageHistories(OWNER);
    if (!all.success) throw new Error(all.error.message);
    expect(all.data.map((h) => h.datetime)).toEqual([
      '2024-03-04T00:00:00',
      '2024-03-03T23:59:59',
      '2024-03-02T12:00:00',
      '2024-03-01T08:00:00',
    ]);

    const ranged = await storage.getDosageHistoriesInDateRange(OWNER, new Date(2024, 2, 2), new Date(2024, 2, 3));
    if (!ranged.success) throw new Error(ranged.error.message);
    expect(ranged.data.map((h) => h.datetime)).toEqual(['2024-03-03T23:59:59', '2024-03-02T12:00:00']);
  });

  it('keeps other owners apart', async () => {
    const { storage, medicine, store } = await seedMedicine(10);
    await storage.histories.record(OWNER, medicine.id, 1);
    expect(await storage.histories.list('owner-2')).toEqual([]);
    const raw = await store.get(storage.medicines.key(OWNER, medicine.id));
    expect(raw === null ? null : medicineCodec.decode(raw).stock).toBe(9);
  });
});
