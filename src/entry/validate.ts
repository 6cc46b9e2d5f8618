import type { ExtractedEntry, ServiceCode, WorkEntry } from '../types/entry';
import { SERVICE_CODES } from '../types/entry';
import { isLocalDate, isLocalTime, spanMinutes } from './time';

export type ValidationProblemCode =
  | 'MISSING_FIELD'
  | 'INVALID_SERVICE_CODE'
  | 'INVALID_DATE'
  | 'INVALID_TIME'
  | 'END_BEFORE_START'
  | 'INVALID_DURATION'
  | 'EMPLOYEE_MISMATCH';

export type ValidationProblem = {
  code: ValidationProblemCode;
  field: keyof WorkEntry;
  message: string;
};

export type EntryValidationFailure = {
  sourceId?: string;
  entry: ExtractedEntry;
  problems: ValidationProblem[];
};

export type EntryValidationResult =
  | { ok: true; entry: WorkEntry }
  | { ok: false; failure: EntryValidationFailure };

const REQUIRED: Array<keyof WorkEntry> = [
  'employeeId',
  'date',
  'startTime',
  'endTime',
  'serviceCode',
  'durationMinutes',
  'sourceId',
];

export function isServiceCode(value: unknown): value is ServiceCode {
  return SERVICE_CODES.some((c) => c === value);
}

/**
 * 校验一条抽取结果。
 * - 缺字段 / 非枚举 service code / 结束早于开始 都视为非法（零时长的班次合法）
 * - `expectedEmployeeId` 给出时，员工不一致也算非法
 */
export function validateEntry(
  raw: ExtractedEntry,
  expectedEmployeeId?: string,
): EntryValidationResult {
  const problems: ValidationProblem[] = [];
  const missing = (field: keyof WorkEntry) =>
    problems.push({ code: 'MISSING_FIELD', field, message: `${field} is required` });

  for (const field of REQUIRED) {
    const v = raw[field];
    if (v === undefined || v === null || v === '') missing(field);
  }

  const { employeeId, date, startTime, endTime, endDate, serviceCode, durationMinutes, sourceId } =
    raw;

  if (employeeId && expectedEmployeeId !== undefined && employeeId !== expectedEmployeeId) {
    problems.push({
      code: 'EMPLOYEE_MISMATCH',
      field: 'employeeId',
      message: `entry belongs to ${employeeId}, not ${expectedEmployeeId}`,
    });
  }
  if (serviceCode !== undefined && !isServiceCode(serviceCode)) {
    problems.push({
      code: 'INVALID_SERVICE_CODE',
      field: 'serviceCode',
      message: `service code ${serviceCode} is not one of ${SERVICE_CODES.join(', ')}`,
    });
  }
  if (date && !isLocalDate(date)) {
    problems.push({ code: 'INVALID_DATE', field: 'date', message: `bad date "${date}"` });
  }
  if (endDate !== undefined && !isLocalDate(endDate)) {
    problems.push({ code: 'INVALID_DATE', field: 'endDate', message: `bad end date "${endDate}"` });
  }
  if (startTime && !isLocalTime(startTime)) {
    problems.push({
      code: 'INVALID_TIME',
      field: 'startTime',
      message: `bad start time "${startTime}"`,
    });
  }
  if (endTime && !isLocalTime(endTime)) {
    problems.push({ code: 'INVALID_TIME', field: 'endTime', message: `bad end time "${endTime}"` });
  }
  if (
    durationMinutes !== undefined &&
    (!Number.isInteger(durationMinutes) || durationMinutes < 0)
  ) {
    problems.push({
      code: 'INVALID_DURATION',
      field: 'durationMinutes',
      message: `duration must be a non-negative whole number of minutes, got ${durationMinutes}`,
    });
  }

  if (
    isLocalDate(date) &&
    isLocalTime(startTime) &&
    isLocalTime(endTime) &&
    (endDate === undefined || isLocalDate(endDate)) &&
    spanMinutes(date, startTime, endTime, endDate) < 0
  ) {
    problems.push({
      code: 'END_BEFORE_START',
      field: 'endTime',
      message: `shift ends (${endDate ?? date} ${endTime}) before it starts (${date} ${startTime})`,
    });
  }

  if (
    problems.length > 0 ||
    !employeeId ||
    !isLocalDate(date) ||
    !isLocalTime(startTime) ||
    !isLocalTime(endTime) ||
    !isServiceCode(serviceCode) ||
    durationMinutes === undefined ||
    !sourceId
  ) {
    return { ok: false, failure: { sourceId: sourceId || undefined, entry: raw, problems } };
  }

  const entry: WorkEntry = {
    employeeId,
    date,
    startTime,
    endTime,
    serviceCode,
    durationMinutes,
    sourceId,
  };
  if (endDate !== undefined) entry.endDate = endDate;
  return { ok: true, entry };
}
