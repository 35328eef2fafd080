import { createTestStorage } from '../../test.utils';
import { scheduleInputSchema } from './schedule.validators';

const OWNER = 'owner-1';

describe('ScheduleService', () => {
  it('persists days of week as a code string', async () => {
    const { storage, store, ctx } = createTestStorage();
    const created = await storage.createSchedule(OWNER, { medicineId: 'm1', time: '08:00', amount: 1, daysOfWeek: ['FR', 'MO', 'WE'] });
    if (!created.success) throw new Error(created.error.message);

    expect(created.data.daysOfWeek).toEqual(['FR', 'MO', 'WE']);
    const raw = await store.get(ctx.keys.entity('schedule', OWNER, created.data.id));
    expect(raw === null ? null : JSON.parse(raw).daysOfWeek).toBe('FR,MO,WE');

    const loaded = await storage.getSchedule(OWNER, created.data.id);
    expect(loaded.success && loaded.data.daysOfWeek).toEqual(['MO', 'WE', 'FR']);
  });

  it('updates and deletes', async () => {
    const { storage } = createTestStorage();
    const schedule = await storage.schedules.create(OWNER, { medicineId: 'm1', time: '08:00', amount: 1, daysOfWeek: [] });

    const updated = await storage.updateSchedule(OWNER, schedule.id, { medicineId: 'm1', time: '09:15', amount: 2, daysOfWeek: ['SA'] });
    expect(updated).toEqual({
      success: true,
      data: { id: schedule.id, medicineId: 'm1', time: '09:15', amount: 2, daysOfWeek: ['SA'] },
    });

    expect((await storage.deleteSchedule(OWNER, schedule.id)).success).toBe(true);
    const again = await storage.deleteSchedule(OWNER, schedule.id);
    expect(again).toEqual({ success: false, error: { kind: 'NotFound', message: `Schedule with id ${schedule.id} not found` } });
    expect(await storage.getAllSchedules(OWNER)).toEqual({ success: true, data: [] });
  });

  it('validates time and normalizes days', () => {
    expect(scheduleInputSchema.safeParse({ medicineId: 'm1', time: '8:00', amount: 1 }).success).toBe(false);
    const parsed = scheduleInputSchema.parse({ medicineId: 'm1', time: '08:00', amount: 1, daysOfWeek: ['su', 'xx', 'MO'] });
    expect(parsed.daysOfWeek).toEqual(['MO', 'SU']);
  });
});
