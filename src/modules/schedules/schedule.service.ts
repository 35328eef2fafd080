import { scheduleCodec } from '../../storage/codec';
import { StorageContext, loadRecord, requireRecord } from '../../storage/context';
import { StoreFailure, storeErrors } from '../../storage/errors';
import { Schedule } from '../../storage/records';
import { runGuarded } from '../../storage/transaction';
import { ScheduleInput } from './schedule.validators';

const notFound = (id: string) => `Schedule with id ${id} not found`;

export class ScheduleService {
  constructor(private readonly ctx: StorageContext) {}

  key(ownerId: string, id: string): string {
    return this.ctx.keys.entity('schedule', ownerId, id);
  }

  get(ownerId: string, id: string): Promise<Schedule> {
    return loadRecord(this.ctx, this.key(ownerId, id), scheduleCodec, notFound(id));
  }

  list(ownerId: string): Promise<Schedule[]> {
    return this.ctx.scanner.loadAll(this.ctx.keys.entityPattern('schedule', ownerId), scheduleCodec);
  }

  async create(ownerId: string, input: ScheduleInput): Promise<Schedule> {
    const schedule: Schedule = { id: this.ctx.newId(), ...input };
    await this.ctx.store.set(this.key(ownerId, schedule.id), scheduleCodec.encode(schedule));
    return schedule;
  }

  update(ownerId: string, id: string, input: ScheduleInput): Promise<Schedule> {
    const key = this.key(ownerId, id);
    return runGuarded(
      this.ctx.store,
      { watchKeys: [key], maxAttempts: this.ctx.maxAttempts, label: 'update schedule' },
      async (session) => {
        requireRecord(await session.get(key), scheduleCodec, notFound(id));
        const schedule: Schedule = { ...input, id };
        return { writes: [{ op: 'set', key, value: scheduleCodec.encode(schedule) }], result: schedule };
      }
    );
  }

  async delete(ownerId: string, id: string): Promise<void> {
    const removed = await this.ctx.store.del([this.key(ownerId, id)]);
    if (removed === 0) throw new StoreFailure(storeErrors.notFound(notFound(id)));
  }
}
