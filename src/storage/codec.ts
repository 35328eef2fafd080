import { z } from 'zod';
import { StoreFailure, storeErrors } from './errors';
import {
  DosageHistory,
  Medicine,
  Schedule,
  User,
  dosageHistorySchema,
  medicineSchema,
  scheduleSchema,
  userSchema,
} from './records';

export interface RecordCodec<T> {
  readonly name: string;
  encode(value: T): string;
  /** Throws a SerializationError {@link StoreFailure} for malformed text. */
  decode(raw: string): T;
  /** `null` instead of throwing; used by bulk scans which skip bad records. */
  tryDecode(raw: string): T | null;
}

export function createCodec<S extends z.ZodTypeAny>(
  name: string,
  schema: S,
  toStored: (value: z.output<S>) => unknown = (value) => value
): RecordCodec<z.output<S>> {
  type T = z.output<S>;
  const parse = (raw: string): { ok: true; value: T } | { ok: false; message: string } => {
    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (err) {
      return { ok: false, message: err instanceof Error ? err.message : 'invalid JSON' };
    }
    const parsed = schema.safeParse(json);
    if (!parsed.success) {
      const issues: z.ZodIssue[] = parsed.error.issues;
      return { ok: false, message: issues.map((i) => `${i.path.join('.') || '<root>'}: ${i.message}`).join('; ') };
    }
    const value: T = parsed.data;
    return { ok: true, value };
  };

  return {
    name,
    encode(value) {
      return JSON.stringify(toStored(value));
    },
    decode(raw) {
      const result = parse(raw);
      if (!result.ok) {
        throw new StoreFailure(storeErrors.serialization(`Failed to deserialize ${name}: ${result.message}`));
      }
      return result.value;
    },
    tryDecode(raw) {
      const result = parse(raw);
      return result.ok ? result.value : null;
    },
  };
}

export const medicineCodec: RecordCodec<Medicine> = createCodec('medicine', medicineSchema);

export const scheduleCodec: RecordCodec<Schedule> = createCodec('schedule', scheduleSchema, (schedule: Schedule) => ({
  ...schedule,
  daysOfWeek: schedule.daysOfWeek.join(','),
}));

export const dosageHistoryCodec: RecordCodec<DosageHistory> = createCodec('dosage history', dosageHistorySchema);

export const userCodec: RecordCodec<User> = createCodec('user', userSchema);
