import { readFileSync } from 'node:fs';
import { endOfMonth, startOfMonth } from 'date-fns';
import { formatInTimeZone } from 'date-fns-tz';
import { ValidationError, errorMessage } from '../errors';
import { isLocalDate, parseLocalDate, formatLocalDate } from '../entry/time';
import { isLogLevel } from '../logger';
import { defaultRetryPolicy } from '../sync/retry';
import type { DateRange } from '../types/entry';
import type { EmployeeConfig, RunConfig } from './types';

export const DEFAULT_TIMEZONE = 'America/Los_Angeles';

export const defaultRunConfig: Omit<RunConfig, 'employeeRoster' | 'dateRange'> = {
  dryRun: false,
  timezone: DEFAULT_TIMEZONE,
  callTimeoutMs: 10_000,
  deadlineMs: 10 * 60_000,
  syncConcurrency: 4,
  retry: defaultRetryPolicy,
  storePath: 'shift-sync.db',
  calendarTokenEnv: 'GOOGLE_CALENDAR_TOKEN',
  logLevel: 'info',
};

/** Month-to-date in `timezone`: the 1st of the current month through today. */
export function monthToDate(now: Date, timezone: string): DateRange {
  const today = formatInTimeZone(now, timezone, 'yyyy-MM-dd');
  return { start: `${today.slice(0, 7)}-01`, end: today };
}

/** "2025-07" → 2025-07-01 .. 2025-07-31 */
export function wholeMonth(month: string): DateRange {
  if (!/^\d{4}-\d{2}$/.test(month) || !isLocalDate(`${month}-01`)) {
    throw new ValidationError(`month must look like yyyy-MM, got "${month}"`);
  }
  const first = parseLocalDate(`${month}-01`);
  return { start: formatLocalDate(startOfMonth(first)), end: formatLocalDate(endOfMonth(first)) };
}

type Reader = {
  problems: string[];
  str(obj: Record<string, unknown>, key: string, path: string): string;
  optStr(obj: Record<string, unknown>, key: string, path: string): string | undefined;
  optInt(obj: Record<string, unknown>, key: string, path: string, min: number): number | undefined;
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function makeReader(): Reader {
  const problems: string[] = [];
  const optStr: Reader['optStr'] = (obj, key, path) => {
    const v = obj[key];
    if (v === undefined) return undefined;
    if (typeof v !== 'string' || v.trim() === '') {
      problems.push(`${path}.${key} must be a non-empty string`);
      return undefined;
    }
    return v;
  };
  return {
    problems,
    optStr,
    str(obj, key, path) {
      const v = optStr(obj, key, path);
      if (v === undefined && obj[key] === undefined) problems.push(`${path}.${key} is required`);
      return v ?? '';
    },
    optInt(obj, key, path, min) {
      const v = obj[key];
      if (v === undefined) return undefined;
      if (typeof v !== 'number' || !Number.isInteger(v) || v < min) {
        problems.push(`${path}.${key} must be an integer >= ${min}`);
        return undefined;
      }
      return v;
    },
  };
}

/**
 * 校验并补全运行配置。
 * 所有问题一次性收集后抛出 ValidationError，方便一次改完。
 */
export function parseRunConfig(raw: unknown, now: Date = new Date()): RunConfig {
  if (!isRecord(raw)) throw new ValidationError('config must be a JSON object');
  const r = makeReader();

  const roster: EmployeeConfig[] = [];
  const rawRoster = raw.employeeRoster;
  if (!Array.isArray(rawRoster) || rawRoster.length === 0) {
    r.problems.push('config.employeeRoster must be a non-empty array');
  } else {
    rawRoster.forEach((item: unknown, i) => {
      const path = `config.employeeRoster[${i}]`;
      if (!isRecord(item)) {
        r.problems.push(`${path} must be an object`);
        return;
      }
      const id = r.str(item, 'id', path);
      const email = r.str(item, 'email', path);
      if (email && !email.includes('@')) r.problems.push(`${path}.email is not an email address`);
      roster.push({
        id,
        displayName: r.optStr(item, 'displayName', path) ?? id,
        credentialsRef: r.str(item, 'credentialsRef', path),
        email,
        calendarId: r.str(item, 'calendarId', path),
        colorId: r.optStr(item, 'colorId', path) ?? '1',
      });
    });
    const ids = roster.map((e) => e.id);
    const dupes = ids.filter((id, i) => id && ids.indexOf(id) !== i);
    if (dupes.length > 0) r.problems.push(`duplicate employee ids: ${[...new Set(dupes)].join(', ')}`);
  }

  let timezone = r.optStr(raw, 'timezone', 'config') ?? defaultRunConfig.timezone;
  if (!isTimeZone(timezone)) {
    r.problems.push(`config.timezone "${timezone}" is not a known time zone`);
    timezone = defaultRunConfig.timezone;
  }

  let dateRange: DateRange | undefined;
  if (raw.dateRange !== undefined) {
    if (!isRecord(raw.dateRange)) {
      r.problems.push('config.dateRange must be an object');
    } else {
      const start = r.str(raw.dateRange, 'start', 'config.dateRange');
      const end = r.str(raw.dateRange, 'end', 'config.dateRange');
      if (!isLocalDate(start) || !isLocalDate(end)) {
        r.problems.push('config.dateRange.start/end must be yyyy-MM-dd dates');
      } else if (start > end) {
        r.problems.push('config.dateRange.start is after config.dateRange.end');
      } else {
        dateRange = { start, end };
      }
    }
  }

  if (raw.dryRun !== undefined && typeof raw.dryRun !== 'boolean') {
    r.problems.push('config.dryRun must be a boolean');
  }
  const logLevel = raw.logLevel ?? defaultRunConfig.logLevel;
  if (!isLogLevel(logLevel)) r.problems.push(`config.logLevel "${String(logLevel)}" is not a log level`);

  const retry = { ...defaultRunConfig.retry };
  if (raw.retry !== undefined) {
    if (!isRecord(raw.retry)) {
      r.problems.push('config.retry must be an object');
    } else {
      retry.maxAttempts = r.optInt(raw.retry, 'maxAttempts', 'config.retry', 1) ?? retry.maxAttempts;
      retry.baseDelayMs = r.optInt(raw.retry, 'baseDelayMs', 'config.retry', 0) ?? retry.baseDelayMs;
      retry.maxDelayMs = r.optInt(raw.retry, 'maxDelayMs', 'config.retry', 0) ?? retry.maxDelayMs;
    }
  }

  const config: RunConfig = {
    employeeRoster: roster,
    dateRange: dateRange ?? monthToDate(now, timezone),
    dryRun: raw.dryRun === true,
    timezone,
    callTimeoutMs: r.optInt(raw, 'callTimeoutMs', 'config', 1) ?? defaultRunConfig.callTimeoutMs,
    deadlineMs: r.optInt(raw, 'deadlineMs', 'config', 1) ?? defaultRunConfig.deadlineMs,
    syncConcurrency:
      r.optInt(raw, 'syncConcurrency', 'config', 1) ?? defaultRunConfig.syncConcurrency,
    retry,
    storePath: r.optStr(raw, 'storePath', 'config') ?? defaultRunConfig.storePath,
    extractDir: r.optStr(raw, 'extractDir', 'config'),
    calendarTokenEnv:
      r.optStr(raw, 'calendarTokenEnv', 'config') ?? defaultRunConfig.calendarTokenEnv,
    logLevel: isLogLevel(logLevel) ? logLevel : defaultRunConfig.logLevel,
  };

  if (r.problems.length > 0) {
    throw new ValidationError(`invalid config: ${r.problems.join('; ')}`, r.problems);
  }
  return config;
}

export function loadRunConfig(path: string, now: Date = new Date()): RunConfig {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, 'utf8'));
  } catch (err) {
    throw new ValidationError(`cannot read config ${path}: ${errorMessage(err)}`);
  }
  return parseRunConfig(raw, now);
}

function isTimeZone(tz: string): boolean {
  try {
    new Intl.DateTimeFormat('en-US', { timeZone: tz });
    return true;
  } catch {
    return false;
  }
}
