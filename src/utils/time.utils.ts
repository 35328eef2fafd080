import { format, getDay, isValid, parseISO } from 'date-fns';
import { DAY_CODES, DayCode, DAY_NAMES } from '../storage/records';

const LOCAL_DATE_TIME_FORMAT = "yyyy-MM-dd'T'HH:mm:ss";

/** Wall-clock date-time without offset, e.g. 2024-03-04T08:15:00. */
export const toLocalDateTime = (date: Date) => format(date, LOCAL_DATE_TIME_FORMAT);

export const toLocalDate = (date: Date) => format(date, 'yyyy-MM-dd');

/** Local date-time or date string to a Date in the server's zone; undefined when unparseable. */
export const parseLocal = (value: string): Date | undefined => {
  const parsed = parseISO(value);
  return isValid(parsed) ? parsed : undefined;
};

// getDay: 0 = Sunday
const BY_JS_DAY: DayCode[] = ['SU', 'MO', 'TU', 'WE', 'TH', 'FR', 'SA'];

export const dayCodeOf = (date: Date): DayCode => BY_JS_DAY[getDay(date)];

export const dayNameOf = (date: Date): string => DAY_NAMES[dayCodeOf(date)];

/** An empty day list means the schedule applies every day. */
export const appliesOn = (daysOfWeek: DayCode[], day: DayCode) => daysOfWeek.length === 0 || daysOfWeek.includes(day);

export const applicableDayCount = (daysOfWeek: DayCode[]) => (daysOfWeek.length === 0 ? DAY_CODES.length : daysOfWeek.length);
