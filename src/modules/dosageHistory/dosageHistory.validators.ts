import { z } from 'zod';
import { LOCAL_DATE_TIME, TIME_OF_DAY } from '../../storage/records';
import { parseLocal } from '../../utils/time.utils';

const LOCAL_DATE = /^\d{4}-\d{2}-\d{2}$/;

const isCalendarValue = (value: string) => parseLocal(value) !== undefined;

export const dosageHistoryInputSchema = z.object({
  medicineId: z.string().trim().min(1, 'medicineId is required'),
  amount: z.number().finite(),
  scheduledTime: z.string().regex(TIME_OF_DAY, 'scheduledTime must be HH:mm').optional(),
  datetime: z
    .string()
    .regex(LOCAL_DATE_TIME, 'datetime must be a local date-time like 2024-03-04T08:15:00')
    .refine(isCalendarValue, 'datetime is not a real calendar date')
    .optional(),
});
export type DosageHistoryInput = z.infer<typeof dosageHistoryInputSchema>;

export const dateRangeQuerySchema = z
  .object({
    start: z.string().regex(LOCAL_DATE, 'start must be yyyy-MM-dd').refine(isCalendarValue, 'start is not a real calendar date').optional(),
    end: z.string().regex(LOCAL_DATE, 'end must be yyyy-MM-dd').refine(isCalendarValue, 'end is not a real calendar date').optional(),
  })
  .refine((q) => (q.start === undefined) === (q.end === undefined), { message: 'start and end go together' });
