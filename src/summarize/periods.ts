import { endOfMonth, format, setDate, startOfMonth } from 'date-fns';
import { formatLocalDate, parseLocalDate } from '../entry/time';
import type { DateRange, LocalDate } from '../types/entry';

export type MonthKey = string; // yyyy-MM

/** 半月分界：1–15 与 16–月底 */
export const FIRST_HALF_LAST_DAY = 15;

export function monthOf(date: LocalDate): MonthKey {
  return date.slice(0, 7);
}

export function monthPeriod(month: MonthKey): DateRange {
  const first = parseLocalDate(`${month}-01`);
  return { start: formatLocalDate(startOfMonth(first)), end: formatLocalDate(endOfMonth(first)) };
}

/** The two biweekly periods of a month, in order. Together they cover the month exactly. */
export function biweeklyPeriods(month: MonthKey): [DateRange, DateRange] {
  const first = parseLocalDate(`${month}-01`);
  return [
    { start: formatLocalDate(first), end: formatLocalDate(setDate(first, FIRST_HALF_LAST_DAY)) },
    {
      start: formatLocalDate(setDate(first, FIRST_HALF_LAST_DAY + 1)),
      end: formatLocalDate(endOfMonth(first)),
    },
  ];
}

/** Which biweekly period of its month a date falls in (0 or 1). */
export function biweeklyIndexOf(date: LocalDate): 0 | 1 {
  return Number(date.slice(8, 10)) <= FIRST_HALF_LAST_DAY ? 0 : 1;
}

export function monthKeyOf(d: Date): MonthKey {
  return format(d, 'yyyy-MM');
}
