import type { NaturalKey } from './entry';

export type CalendarMapping = {
  naturalKey: NaturalKey;
  employeeId: string;
  externalEventId: string;
  /** Calendar-relevant fields of the version last written to the calendar. */
  fingerprint: string;
  syncedAt: string; // ISO8601
};
