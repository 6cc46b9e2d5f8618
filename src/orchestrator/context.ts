import type { EmployeeConfig } from '../config/types';
import type { Extractor } from '../extract/types';
import type { Logger } from '../logger';
import { silentLogger } from '../logger';
import type { Notifier } from '../notify/types';
import type { EntryStore, MappingStore } from '../store/types';
import { KeyedMutex } from '../sync/keyed-mutex';
import type { SleepFn } from '../sync/retry';
import { sleep } from '../sync/retry';
import type { CalendarClient } from '../sync/types';

/**
 * Everything a run talks to, built once per run and handed to each step.
 * Tests swap any of these for in-process fakes.
 */
export type RunContext = {
  extractor: Extractor;
  entries: EntryStore;
  mappings: MappingStore;
  calendarFor: (employee: EmployeeConfig) => CalendarClient;
  notifier: Notifier;
  logger: Logger;
  now: () => Date;
  sleepFn: SleepFn;
  /** Per-employee reconciliation lock and per-key mapping lock share one instance. */
  locks: KeyedMutex;
};

export type RunContextParts = Pick<
  RunContext,
  'extractor' | 'entries' | 'mappings' | 'calendarFor' | 'notifier'
> &
  Partial<Pick<RunContext, 'logger' | 'now' | 'sleepFn' | 'locks'>>;

export function createRunContext(parts: RunContextParts): RunContext {
  return {
    ...parts,
    logger: parts.logger ?? silentLogger,
    now: parts.now ?? (() => new Date()),
    sleepFn: parts.sleepFn ?? sleep,
    locks: parts.locks ?? new KeyedMutex(),
  };
}
