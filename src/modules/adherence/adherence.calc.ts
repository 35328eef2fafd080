import { addDays, getDate, getMonth, startOfDay, subDays } from 'date-fns';
import {
  AdherenceStatus,
  DailySchedule,
  DayAdherence,
  DosageHistory,
  Medicine,
  MedicineWithExpiry,
  Schedule,
  TimeSlot,
  WeeklyAdherence,
} from '../../storage/records';
import { applicableDayCount, appliesOn, dayCodeOf, dayNameOf, toLocalDate, toLocalDateTime } from '../../utils/time.utils';

export function classifyDay(expected: number, taken: number): AdherenceStatus {
  if (expected <= 0 || taken <= 0) return 'NONE';
  return taken >= expected ? 'COMPLETE' : 'PARTIAL';
}

/**
 * Schedules due on `day`, grouped by time of day, earliest first. Schedules whose
 * medicine no longer exists are left out.
 */
export function buildDailySchedule(schedules: Schedule[], medicines: Medicine[], day: Date): DailySchedule {
  const code = dayCodeOf(day);
  const byId = new Map(medicines.map((m) => [m.id, m]));
  const slots = new Map<string, TimeSlot>();

  for (const schedule of schedules) {
    if (!appliesOn(schedule.daysOfWeek, code)) continue;
    const medicine = byId.get(schedule.medicineId);
    if (!medicine) continue;
    const slot = slots.get(schedule.time) ?? { time: schedule.time, medicines: [] };
    slot.medicines.push({ medicine, amount: schedule.amount });
    slots.set(schedule.time, slot);
  }

  return { schedule: Array.from(slots.values()).sort((a, b) => a.time.localeCompare(b.time)) };
}

/**
 * The seven whole days before `today`, oldest first. A day's expected count is the
 * number of schedules due that weekday; its taken count is the history entries on that
 * date for a medicine that was due.
 */
export function computeWeeklyAdherence(schedules: Schedule[], histories: DosageHistory[], today: Date): WeeklyAdherence {
  const takenByDate = new Map<string, DosageHistory[]>();
  for (const h of histories) {
    const date = h.datetime.slice(0, 10);
    const list = takenByDate.get(date) ?? [];
    list.push(h);
    takenByDate.set(date, list);
  }

  const days: DayAdherence[] = [];
  for (let back = 7; back >= 1; back--) {
    const day = subDays(startOfDay(today), back);
    const date = toLocalDate(day);
    const due = schedules.filter((s) => appliesOn(s.daysOfWeek, dayCodeOf(day)));
    const dueMedicines = new Set(due.map((s) => s.medicineId));
    const takenCount = (takenByDate.get(date) ?? []).filter((h) => dueMedicines.has(h.medicineId)).length;
    days.push({
      date,
      dayOfWeek: dayNameOf(day),
      dayNumber: getDate(day),
      month: getMonth(day) + 1,
      status: classifyDay(due.length, takenCount),
      expectedCount: due.length,
      takenCount,
    });
  }
  return { days };
}

/** Average amount taken per day across the schedules of one medicine. */
export function dailyConsumption(schedules: Schedule[]): number {
  return schedules.reduce((sum, s) => sum + (s.amount * applicableDayCount(s.daysOfWeek)) / 7, 0);
}

/**
 * Projected run-out date per scheduled medicine: `asOf` plus the whole days the stock
 * lasts at the scheduled rate. Unscheduled medicines are omitted; a zero rate gives null.
 */
export function computeExpiry(medicines: Medicine[], schedules: Schedule[], asOf: Date): MedicineWithExpiry[] {
  const byMedicine = new Map<string, Schedule[]>();
  for (const s of schedules) {
    const list = byMedicine.get(s.medicineId) ?? [];
    list.push(s);
    byMedicine.set(s.medicineId, list);
  }

  return medicines
    .filter((m) => byMedicine.has(m.id))
    .map((m) => {
      const perDay = dailyConsumption(byMedicine.get(m.id) ?? []);
      const expiryDate = perDay > 0 ? toLocalDateTime(addDays(asOf, Math.floor(m.stock / perDay))) : null;
      return { ...m, expiryDate };
    })
    .sort((a, b) => a.name.localeCompare(b.name));
}
