import { addDays, format, isValid, parse } from 'date-fns';
import { formatLocalDate, isLocalDate, isLocalTime, parseLocalDate, spanMinutes } from '../entry/time';
import { ValidationError } from '../errors';
import type { ExtractedEntry } from '../types/entry';

/** The punches table as scraped from the timesheet portal: header cells + row cells. */
export type PunchTable = {
  header: string[];
  rows: string[][];
};

export type SkippedPunch = {
  sourceId: string;
  status: string;
};

export type PunchTableParseResult = {
  entries: ExtractedEntry[];
  skipped: SkippedPunch[]; // Open / Rejected 的行
};

export const PUNCH_COLUMNS = {
  id: 'Id',
  serviceDate: 'Service Date',
  startTime: 'Start Time',
  endTime: 'End Time',
  amount: 'Amount',
  serviceCode: 'Service Code',
  status: 'Status',
} as const;

const IGNORED_STATUSES = new Set(['Open', 'Rejected']);
const REF = new Date(2000, 0, 1);

export function isPunchTable(value: unknown): value is PunchTable {
  if (typeof value !== 'object' || value === null) return false;
  if (!('header' in value) || !('rows' in value)) return false;
  const { header, rows } = value;
  return (
    Array.isArray(header) &&
    header.every((h) => typeof h === 'string') &&
    Array.isArray(rows) &&
    rows.every((r) => Array.isArray(r) && r.every((c) => typeof c === 'string'))
  );
}

/**
 * 把门户导出的表格转换成待校验的条目。
 * - 无法解析的单元格原样保留（或置空），交给 validateEntry 记录
 * - Open / Rejected 的行直接丢弃
 */
export function parsePunchTable(table: PunchTable, employeeId: string): PunchTableParseResult {
  const missing = Object.values(PUNCH_COLUMNS).filter((c) => !table.header.includes(c));
  if (missing.length > 0) {
    throw new ValidationError(`[punch-table] missing columns: ${missing.join(', ')}`, missing);
  }
  const col = (row: string[], name: string) => (row[table.header.indexOf(name)] ?? '').trim();

  const entries: ExtractedEntry[] = [];
  const skipped: SkippedPunch[] = [];

  for (const row of table.rows) {
    const sourceId = col(row, PUNCH_COLUMNS.id);
    const status = col(row, PUNCH_COLUMNS.status);
    if (IGNORED_STATUSES.has(status)) {
      skipped.push({ sourceId, status });
      continue;
    }
    const code = col(row, PUNCH_COLUMNS.serviceCode);
    const date = parseServiceDate(col(row, PUNCH_COLUMNS.serviceDate));
    const startTime = parseClockTime(col(row, PUNCH_COLUMNS.startTime));
    const endTime = parseClockTime(col(row, PUNCH_COLUMNS.endTime));
    const durationMinutes = parseAmount(col(row, PUNCH_COLUMNS.amount));
    const endDate = overnightEndDate(date, startTime, endTime, durationMinutes);
    entries.push({
      employeeId,
      sourceId: sourceId || undefined,
      date,
      startTime,
      endTime,
      ...(endDate ? { endDate } : {}),
      serviceCode: code === '' ? undefined : Number(code),
      durationMinutes,
    });
  }

  return { entries, skipped };
}

/**
 * 门户不写结束日期：结束时刻不晚于开始、且 Amount 放得进跨到次日的时段时，视为跨夜班。
 */
export function overnightEndDate(
  date: string | undefined,
  startTime: string | undefined,
  endTime: string | undefined,
  minutes: number | undefined,
): string | undefined {
  if (!isLocalDate(date) || !isLocalTime(startTime) || !isLocalTime(endTime)) return undefined;
  if (endTime > startTime || minutes === undefined || minutes <= 0) return undefined;
  const nextDay = formatLocalDate(addDays(parseLocalDate(date), 1));
  return minutes <= spanMinutes(date, startTime, endTime, nextDay) ? nextDay : undefined;
}

/** "Jul 28, 2025" → "2025-07-28" */
export function parseServiceDate(raw: string): string | undefined {
  if (!raw) return undefined;
  const d = parse(raw, 'MMM d, yyyy', REF);
  return isValid(d) ? format(d, 'yyyy-MM-dd') : raw;
}

/** "03:38 PM" → "15:38" */
export function parseClockTime(raw: string): string | undefined {
  if (!raw) return undefined;
  const d = parse(raw, 'hh:mm a', REF);
  return isValid(d) ? format(d, 'HH:mm') : raw;
}

/**
 * Amount cell → minutes. The portal writes either "H:MM" or a three-part value whose
 * last two parts are hours and minutes ("0:07:45").
 */
export function parseAmount(raw: string): number | undefined {
  if (!raw) return undefined;
  const parts = raw.split(':');
  const [h, m] = parts.length >= 3 ? parts.slice(1, 3) : parts;
  if (h === undefined || m === undefined) return undefined;
  if (!/^\d+$/.test(h) || !/^\d+$/.test(m)) return undefined;
  return Number(h) * 60 + Number(m);
}
