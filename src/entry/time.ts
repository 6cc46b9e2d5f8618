import { differenceInMinutes, format, isValid, parse } from 'date-fns';
import type { LocalDate, LocalTime } from '../types/entry';

const TIME_RE = /^([01]\d|2[0-3]):([0-5]\d)$/;
const DATE_RE = /^\d{4}-\d{2}-\d{2}$/;

export const DATE_FORMAT = 'yyyy-MM-dd';
// 固定参考日，避免 parse 的结果依赖“今天”
const REF = new Date(2000, 0, 1);

export function isLocalTime(value: unknown): value is LocalTime {
  return typeof value === 'string' && TIME_RE.test(value);
}

export function isLocalDate(value: unknown): value is LocalDate {
  if (typeof value !== 'string' || !DATE_RE.test(value)) return false;
  return isValid(parse(value, DATE_FORMAT, REF));
}

export function parseLocalDate(value: LocalDate): Date {
  const d = parse(value, DATE_FORMAT, REF);
  if (!isValid(d)) throw new Error(`[shift-sync] invalid local date: ${value}`);
  return d;
}

export function formatLocalDate(d: Date): LocalDate {
  return format(d, DATE_FORMAT);
}

/** Minutes from start to end; negative when the end is before the start. */
export function spanMinutes(
  date: LocalDate,
  startTime: LocalTime,
  endTime: LocalTime,
  endDate?: LocalDate,
): number {
  const start = parse(`${date} ${startTime}`, `${DATE_FORMAT} HH:mm`, REF);
  const end = parse(`${endDate ?? date} ${endTime}`, `${DATE_FORMAT} HH:mm`, REF);
  return differenceInMinutes(end, start);
}
