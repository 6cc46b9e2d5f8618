import { describe, it, expect } from 'vitest';
import type { FetchFn } from '../src';
import {
  FatalExternalError,
  GoogleCalendarClient,
  TransientExternalError,
  buildCalendarEvent,
  eventSummary,
} from '../src';
import { makeEntry } from './helpers/factories';

const OWNER = { displayName: 'Alice', colorId: '2' };
const TZ = 'America/Los_Angeles';
const EVENTS = 'https://www.googleapis.com/calendar/v3/calendars/alice%40group/events';

type Sent = { url: string; method?: string; auth: string | null; body: unknown };

function fakeFetch(respond: (sent: Sent) => Response | Promise<Response>) {
  const sent: Sent[] = [];
  const fetchFn: FetchFn = async (url, init) => {
    const s: Sent = {
      url,
      method: init?.method,
      auth: new Headers(init?.headers).get('Authorization'),
      body: typeof init?.body === 'string' ? JSON.parse(init.body) : undefined,
    };
    sent.push(s);
    return respond(s);
  };
  return { sent, fetchFn };
}

const clientWith = (fetchFn: FetchFn) =>
  new GoogleCalendarClient({
    calendarId: 'alice@group',
    owner: OWNER,
    timeZone: TZ,
    getAccessToken: async () => 'test-token',
    fetchFn,
  });

describe('calendar event', () => {
  it('titles the event with name, code and hours', () => {
    expect(eventSummary(makeEntry({ serviceCode: 331, durationMinutes: 225 }), OWNER)).toBe(
      'Alice (331) 03:45hrs',
    );
  });

  it('uses wall-clock times in the configured zone', () => {
    expect(buildCalendarEvent(makeEntry(), OWNER, TZ)).toEqual({
      summary: 'Alice (310) 08:00hrs',
      start: { dateTime: '2025-07-01T09:00:00', timeZone: TZ },
      end: { dateTime: '2025-07-01T17:00:00', timeZone: TZ },
      colorId: '2',
      extendedProperties: {
        private: { shiftSyncKey: 'emp-1::2025-07-01::09:00::310', sourceId: 's1' },
      },
    });
  });

  it('ends an overnight shift on the next day', () => {
    const overnight = makeEntry({ startTime: '22:00', endTime: '06:00', endDate: '2025-07-02' });
    expect(buildCalendarEvent(overnight, OWNER, TZ).end.dateTime).toBe('2025-07-02T06:00:00');
  });
});

describe('GoogleCalendarClient', () => {
  it('creates an event and returns its id', async () => {
    const { sent, fetchFn } = fakeFetch(() => new Response(JSON.stringify({ id: 'g-1' })));

    await expect(clientWith(fetchFn).create(makeEntry())).resolves.toBe('g-1');
    expect(sent).toEqual([
      {
        url: EVENTS,
        method: 'POST',
        auth: 'Bearer test-token',
        body: buildCalendarEvent(makeEntry(), OWNER, TZ),
      },
    ]);
  });

  it('exposes the owner settings that shape its events', () => {
    const client = clientWith(async () => new Response('{}'));
    expect(client.profile).toBe('["Alice","2","America/Los_Angeles"]');
  });

  it('updates and deletes by event id', async () => {
    const { sent, fetchFn } = fakeFetch(() => new Response(null, { status: 204 }));
    const client = clientWith(fetchFn);

    await client.update('g-1', makeEntry());
    await client.delete('g-1');

    expect(sent.map((s) => [s.method, s.url])).toEqual([
      ['PUT', `${EVENTS}/g-1`],
      ['DELETE', `${EVENTS}/g-1`],
    ]);
  });

  it('treats deleting a missing event as done', async () => {
    const { fetchFn } = fakeFetch(() => new Response('gone', { status: 410 }));
    await expect(clientWith(fetchFn).delete('g-1')).resolves.toBeUndefined();
  });

  it('classifies rate limits and server errors as transient', async () => {
    for (const status of [429, 503]) {
      const { fetchFn } = fakeFetch(() => new Response('busy', { status }));
      await expect(clientWith(fetchFn).update('g-1', makeEntry())).rejects.toBeInstanceOf(
        TransientExternalError,
      );
    }
  });

  it('classifies network failures as transient', async () => {
    const { fetchFn } = fakeFetch(() => Promise.reject(new Error('ECONNRESET')));
    await expect(clientWith(fetchFn).create(makeEntry())).rejects.toThrow(
      '[google-calendar] POST failed: ECONNRESET',
    );
  });

  it('classifies other rejections as fatal', async () => {
    const { fetchFn } = fakeFetch(() => new Response('forbidden', { status: 403 }));
    const err = await clientWith(fetchFn)
      .delete('g-1')
      .catch((e: unknown) => e);
    expect(err).toBeInstanceOf(FatalExternalError);
    expect(err instanceof Error && err.message).toBe('[google-calendar] DELETE 403 forbidden');
  });

  it('fails when a created event has no id', async () => {
    const { fetchFn } = fakeFetch(() => new Response(JSON.stringify({})));
    await expect(clientWith(fetchFn).create(makeEntry())).rejects.toBeInstanceOf(FatalExternalError);
  });
});
