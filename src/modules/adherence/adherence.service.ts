import { endOfDay, startOfDay, subDays } from 'date-fns';
import { StorageContext } from '../../storage/context';
import { DailySchedule, MedicineWithExpiry, WeeklyAdherence } from '../../storage/records';
import { DosageHistoryService } from '../dosageHistory/dosageHistory.service';
import { MedicineService } from '../medicines/medicine.service';
import { ScheduleService } from '../schedules/schedule.service';
import { buildDailySchedule, computeExpiry, computeWeeklyAdherence } from './adherence.calc';

/** Read-side views joined in process from the owner's scanned records. */
export class AdherenceService {
  constructor(
    private readonly ctx: StorageContext,
    private readonly medicines: MedicineService,
    private readonly schedules: ScheduleService,
    private readonly histories: DosageHistoryService
  ) {}

  async dailySchedule(ownerId: string): Promise<DailySchedule> {
    const [schedules, medicines] = await Promise.all([this.schedules.list(ownerId), this.medicines.list(ownerId)]);
    return buildDailySchedule(schedules, medicines, this.ctx.now());
  }

  async weeklyAdherence(ownerId: string): Promise<WeeklyAdherence> {
    const today = startOfDay(this.ctx.now());
    const [schedules, histories] = await Promise.all([
      this.schedules.list(ownerId),
      this.histories.inRange(ownerId, subDays(today, 7), endOfDay(subDays(today, 1))),
    ]);
    return computeWeeklyAdherence(schedules, histories, today);
  }

  async medicineExpiry(ownerId: string, asOf: Date = this.ctx.now()): Promise<MedicineWithExpiry[]> {
    const [medicines, schedules] = await Promise.all([this.medicines.list(ownerId), this.schedules.list(ownerId)]);
    return computeExpiry(medicines, schedules, asOf);
  }
}
