import { FatalExternalError, TransientExternalError, errorMessage } from '../errors';
import type { CalendarClient } from '../sync/types';
import type { WorkEntry } from '../types/entry';
import type { CalendarOwner } from './event';
import { buildCalendarEvent } from './event';

export type FetchFn = (input: string, init?: RequestInit) => Promise<Response>;

export type GoogleCalendarClientOptions = {
  calendarId: string;
  owner: CalendarOwner;
  timeZone: string;
  /** OAuth access token with the calendar.events scope; obtaining it is the caller's job. */
  getAccessToken: () => Promise<string>;
  fetchFn?: FetchFn;
  baseUrl?: string;
};

const DEFAULT_BASE_URL = 'https://www.googleapis.com/calendar/v3';

/**
 * Minimal Google Calendar v3 events client.
 * - 429 / 408 / 5xx / network failures → TransientExternalError (retried upstream)
 * - everything else non-2xx → FatalExternalError
 * - delete of an already-gone event (404/410) counts as success
 */
export class GoogleCalendarClient implements CalendarClient {
  private readonly fetchFn: FetchFn;
  private readonly eventsUrl: string;
  readonly profile: string;

  constructor(private readonly opts: GoogleCalendarClientOptions) {
    this.fetchFn = opts.fetchFn ?? ((input, init) => fetch(input, init));
    this.profile = JSON.stringify([opts.owner.displayName, opts.owner.colorId, opts.timeZone]);
    const base = opts.baseUrl ?? DEFAULT_BASE_URL;
    this.eventsUrl = `${base}/calendars/${encodeURIComponent(opts.calendarId)}/events`;
  }

  async create(entry: WorkEntry): Promise<string> {
    const res = await this.request('POST', this.eventsUrl, entry);
    const body: unknown = await res.json();
    if (typeof body === 'object' && body !== null && 'id' in body && typeof body.id === 'string') {
      return body.id;
    }
    throw new FatalExternalError('[google-calendar] create response carried no event id');
  }

  async update(externalEventId: string, entry: WorkEntry): Promise<void> {
    await this.request('PUT', this.eventUrl(externalEventId), entry);
  }

  async delete(externalEventId: string): Promise<void> {
    await this.request('DELETE', this.eventUrl(externalEventId), undefined, [404, 410]);
  }

  private eventUrl(id: string) {
    return `${this.eventsUrl}/${encodeURIComponent(id)}`;
  }

  private async request(
    method: 'POST' | 'PUT' | 'DELETE',
    url: string,
    entry: WorkEntry | undefined,
    okStatuses: number[] = [],
  ): Promise<Response> {
    const token = await this.opts.getAccessToken();
    const headers: Record<string, string> = { Authorization: `Bearer ${token}` };
    let body: string | undefined;
    if (entry) {
      headers['Content-Type'] = 'application/json';
      body = JSON.stringify(buildCalendarEvent(entry, this.opts.owner, this.opts.timeZone));
    }

    let res: Response;
    try {
      res = await this.fetchFn(url, { method, headers, body });
    } catch (err) {
      throw new TransientExternalError(`[google-calendar] ${method} failed: ${errorMessage(err)}`, {
        cause: err,
      });
    }

    if (res.ok || okStatuses.includes(res.status)) return res;

    const detail = `[google-calendar] ${method} ${res.status} ${await safeText(res)}`.trim();
    if (res.status === 429 || res.status === 408 || res.status >= 500) {
      throw new TransientExternalError(detail);
    }
    throw new FatalExternalError(detail);
  }
}

function safeText(res: Response): Promise<string> {
  return res.text().then(
    (text) => text.slice(0, 200),
    (err: unknown) => `(unreadable body: ${errorMessage(err)})`,
  );
}
