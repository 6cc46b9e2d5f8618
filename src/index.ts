export * from './types/entry';
export * from './types/summary';
export * from './types/calendar';
export * from './errors';
export * from './logger';

export { naturalKeyOf, splitNaturalKey, compareKeys } from './entry/natural-key';
export { validateEntry, isServiceCode } from './entry/validate';
export type {
  ValidationProblem,
  ValidationProblemCode,
  EntryValidationFailure,
  EntryValidationResult,
} from './entry/validate';
export { spanMinutes, isLocalDate, isLocalTime } from './entry/time';

export { reconcile } from './reconcile/reconcile';
export type * from './reconcile/types';
export { applyDecisions, toPersistedEntry } from './orchestrator/apply-decisions';
export type { ApplyOptions } from './orchestrator/apply-decisions';

export { aggregate } from './summarize/aggregate';
export { biweeklyPeriods, monthPeriod, monthOf, biweeklyIndexOf } from './summarize/periods';
export type { MonthKey } from './summarize/periods';

export {
  syncCalendar,
  planCalendarOps,
  calendarFingerprint,
  collectOutOfSync,
  collectOrphans,
} from './sync/sync';
export type * from './sync/types';
export { retryWithBackoff, withTimeout, backoffDelay, defaultRetryPolicy } from './sync/retry';
export type { RetryPolicy, RetryOptions, SleepFn } from './sync/retry';
export { KeyedMutex, mapWithConcurrency } from './sync/keyed-mutex';

export type * from './store/types';
export { MemoryEntryStore, MemoryMappingStore } from './store/memory-store';
export { SqliteStore } from './store/sqlite-store';
export type { SqliteStoreOptions } from './store/sqlite-store';

export { GoogleCalendarClient } from './calendar/google-calendar-client';
export type { FetchFn, GoogleCalendarClientOptions } from './calendar/google-calendar-client';
export { buildCalendarEvent, eventSummary } from './calendar/event';
export type { CalendarOwner, CalendarEventBody } from './calendar/event';

export type { Extractor } from './extract/types';
export { parsePunchTable, isPunchTable, PUNCH_COLUMNS } from './extract/punch-table';
export type { PunchTable, PunchTableParseResult } from './extract/punch-table';
export { createFileExtractor } from './extract/file-extractor';

export type { Notifier } from './notify/types';
export { renderSummaryReport, createLogNotifier } from './notify/report';
export { formatHhmm, formatHhmmss } from './notify/format';

export type * from './config/types';
export { parseRunConfig, loadRunConfig, monthToDate, wholeMonth, defaultRunConfig } from './config/load';

export { runDaily, runEmployee, overallStatus, countsOf } from './orchestrator/run-daily';
export { createRunContext } from './orchestrator/context';
export type { RunContext, RunContextParts } from './orchestrator/context';
export type * from './orchestrator/types';
