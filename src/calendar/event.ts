import type { NaturalKey, WorkEntry } from '../types/entry';
import { naturalKeyOf } from '../entry/natural-key';
import { formatHhmm } from '../notify/format';

export type CalendarOwner = {
  displayName: string;
  colorId: string; // Google 事件颜色，例如 "2" 绿色、"9" 蓝色
};

export type CalendarEventBody = {
  summary: string;
  start: { dateTime: string; timeZone: string };
  end: { dateTime: string; timeZone: string };
  colorId: string;
  extendedProperties: { private: { shiftSyncKey: NaturalKey; sourceId: string } };
};

export function eventSummary(entry: WorkEntry, owner: CalendarOwner): string {
  return `${owner.displayName} (${entry.serviceCode}) ${formatHhmm(entry.durationMinutes)}hrs`;
}

/** Wall-clock times plus an IANA zone; the calendar resolves the offset (DST included). */
export function buildCalendarEvent(
  entry: WorkEntry,
  owner: CalendarOwner,
  timeZone: string,
): CalendarEventBody {
  return {
    summary: eventSummary(entry, owner),
    start: { dateTime: `${entry.date}T${entry.startTime}:00`, timeZone },
    end: { dateTime: `${entry.endDate ?? entry.date}T${entry.endTime}:00`, timeZone },
    colorId: owner.colorId,
    extendedProperties: {
      private: { shiftSyncKey: naturalKeyOf(entry), sourceId: entry.sourceId },
    },
  };
}
