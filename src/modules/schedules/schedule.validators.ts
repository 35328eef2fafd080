import { z } from 'zod';
import { TIME_OF_DAY, daysOfWeekSchema } from '../../storage/records';

export const scheduleInputSchema = z.object({
  medicineId: z.string().trim().min(1, 'medicineId is required'),
  time: z.string().regex(TIME_OF_DAY, 'time must be HH:mm'),
  amount: z.number().finite(),
  daysOfWeek: daysOfWeekSchema,
});
export type ScheduleInput = z.infer<typeof scheduleInputSchema>;
