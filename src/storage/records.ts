import { z } from 'zod';

export const DAY_CODES = ['MO', 'TU', 'WE', 'TH', 'FR', 'SA', 'SU'] as const;
export type DayCode = (typeof DAY_CODES)[number];

export const DAY_NAMES: Record<DayCode, string> = {
  MO: 'MONDAY',
  TU: 'TUESDAY',
  WE: 'WEDNESDAY',
  TH: 'THURSDAY',
  FR: 'FRIDAY',
  SA: 'SATURDAY',
  SU: 'SUNDAY',
};

export function isDayCode(value: string): value is DayCode {
  return (DAY_CODES as readonly string[]).includes(value);
}

/**
 * Accepts the stored comma-joined form ("MO,WE,FR") or an array of codes. Unknown
 * codes are dropped, duplicates collapse, order follows the week.
 */
export const daysOfWeekSchema = z
  .union([z.string(), z.array(z.string())])
  .default('')
  .transform((value): DayCode[] => {
    const raw = Array.isArray(value) ? value : value.split(',');
    const codes = new Set(raw.map((c) => c.trim().toUpperCase()).filter(isDayCode));
    return DAY_CODES.filter((c) => codes.has(c));
  });

export const LOCAL_DATE_TIME = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}(:\d{2}(\.\d{1,9})?)?$/;
export const TIME_OF_DAY = /^([01]\d|2[0-3]):[0-5]\d$/;

export const medicineSchema = z.object({
  id: z.string().min(1),
  name: z.string(),
  dose: z.number(),
  unit: z.string(),
  stock: z.number(),
  description: z.string().nullish().transform((v) => v ?? undefined),
  bijsluiter: z.string().nullish().transform((v) => v ?? undefined),
});
export type Medicine = z.infer<typeof medicineSchema>;

export const scheduleSchema = z.object({
  id: z.string().min(1),
  medicineId: z.string().min(1),
  time: z.string(),
  amount: z.number(),
  daysOfWeek: daysOfWeekSchema,
});
export type Schedule = z.infer<typeof scheduleSchema>;

export const dosageHistorySchema = z.object({
  id: z.string().min(1),
  datetime: z.string().regex(LOCAL_DATE_TIME),
  medicineId: z.string().min(1),
  amount: z.number(),
  scheduledTime: z.string().nullish().transform((v) => v ?? undefined),
});
export type DosageHistory = z.infer<typeof dosageHistorySchema>;

export const userSchema = z.object({
  id: z.string().min(1),
  username: z.string().min(1),
  email: z.string().default(''),
  passwordHash: z.string().default(''),
  isActive: z.boolean().default(true),
  firstName: z.string().default(''),
  lastName: z.string().default(''),
  createdAt: z.string().optional(),
});
export type User = z.infer<typeof userSchema>;

/** User shape that is safe to hand to routes and logs. */
export type PublicUser = Omit<User, 'passwordHash'>;

export function toPublicUser(user: User): PublicUser {
  const { passwordHash: _omit, ...rest } = user;
  return rest;
}

export type MedicineScheduleItem = { medicine: Medicine; amount: number };
export type TimeSlot = { time: string; medicines: MedicineScheduleItem[] };
export type DailySchedule = { schedule: TimeSlot[] };

export type AdherenceStatus = 'NONE' | 'PARTIAL' | 'COMPLETE';
export type DayAdherence = {
  date: string;
  dayOfWeek: string;
  dayNumber: number;
  month: number;
  status: AdherenceStatus;
  expectedCount: number;
  takenCount: number;
};
export type WeeklyAdherence = { days: DayAdherence[] };

export type MedicineWithExpiry = Medicine & { expiryDate: string | null };
