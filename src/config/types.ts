import type { LogLevel } from '../logger';
import type { RetryPolicy } from '../sync/retry';
import type { DateRange } from '../types/entry';

export type EmployeeConfig = {
  id: string;
  displayName: string;
  /** Name of the secret (e.g. an env var prefix) the extractor logs in with. */
  credentialsRef: string;
  email: string;
  calendarId: string;
  colorId: string;
};

export type RunConfig = {
  employeeRoster: EmployeeConfig[];
  dateRange: DateRange;
  dryRun: boolean;
  timezone: string;
  callTimeoutMs: number;
  deadlineMs: number;
  syncConcurrency: number;
  retry: RetryPolicy;
  storePath: string;
  extractDir?: string;
  calendarTokenEnv: string;
  logLevel: LogLevel;
};
