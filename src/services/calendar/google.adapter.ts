import { google, calendar_v3 } from 'googleapis';
import { GoogleAuth } from 'google-auth-library';
import { DateTime } from 'luxon';
import { CalendarEvent, CalendarProvider, CreateEventInput } from '../../types/calendar';
import { BusyInterval, TimeInterval } from '../../types/scheduling';
import {
  CalendarProviderError,
  CalendarProviderErrorKind,
  describeError,
  errorStatus,
} from '../../utils/errors';
import { logger } from '../../utils/logger';

const PAGE_SIZE = 250;

/**
 * Google event ids must be base32hex ([a-v0-9]). Idempotency keys are sha256
 * hex, which already is; anything else is filtered down.
 */
export function googleEventIdFor(idempotencyKey: string): string {
  return idempotencyKey.toLowerCase().replace(/[^a-v0-9]/g, '');
}

export function classifyGoogleError(error: unknown): CalendarProviderErrorKind {
  const status = errorStatus(error);
  const message = describeError(error);
  if (status === 429) return 'RateLimited';
  if (status === 403 && /rate ?limit/i.test(message)) return 'RateLimited';
  if (status === 401 || status === 403) return 'Unauthorized';
  if (status === 404 || status === 410) return 'NotFound';
  if (status === 409) return 'SlotTaken';
  return 'TransientFailure';
}

function toProviderError(operation: string, error: unknown): CalendarProviderError {
  const kind = classifyGoogleError(error);
  return new CalendarProviderError(kind, `google.${operation}: ${describeError(error)}`, error);
}

function eventInterval(event: calendar_v3.Schema$Event, fallbackZone: string): TimeInterval | null {
  const start = event.start?.dateTime
    ? DateTime.fromISO(event.start.dateTime)
    : event.start?.date
      ? DateTime.fromISO(event.start.date, { zone: event.start.timeZone ?? fallbackZone })
      : null;
  const end = event.end?.dateTime
    ? DateTime.fromISO(event.end.dateTime)
    : event.end?.date
      ? DateTime.fromISO(event.end.date, { zone: event.end.timeZone ?? fallbackZone })
      : null;
  if (!start?.isValid || !end?.isValid || end <= start) return null;
  return { start: start.toUTC().toISO() ?? '', end: end.toUTC().toISO() ?? '' };
}

function toCalendarEvent(event: calendar_v3.Schema$Event, fallbackZone: string): CalendarEvent | null {
  const interval = eventInterval(event, fallbackZone);
  if (!event.id || !interval) return null;
  return {
    id: event.id,
    title: event.summary ?? '(no title)',
    start: interval.start,
    end: interval.end,
    attendees: (event.attendees ?? [])
      .map((a) => a.email)
      .filter((email): email is string => typeof email === 'string'),
    status: event.status ?? undefined,
    link: event.htmlLink ?? undefined,
  };
}

export class GoogleCalendarAdapter implements CalendarProvider {
  readonly name = 'google';
  private calendar: calendar_v3.Calendar;

  constructor(credentialsBase64: string | undefined) {
    if (!credentialsBase64) {
      throw new Error('GOOGLE_CALENDAR_CREDENTIALS not configured');
    }

    const credentials = JSON.parse(Buffer.from(credentialsBase64, 'base64').toString('utf8'));
    const auth = new GoogleAuth({
      credentials,
      scopes: ['https://www.googleapis.com/auth/calendar'],
    });

    this.calendar = google.calendar({ version: 'v3', auth });
  }

  /** Opaque (non-transparent), non-cancelled events in the window. */
  async listBusy(calendarId: string, windowStart: string, windowEnd: string): Promise<BusyInterval[]> {
    const busy: BusyInterval[] = [];
    let pageToken: string | undefined;

    do {
      let page: calendar_v3.Schema$Events;
      try {
        const response = await this.calendar.events.list({
          calendarId,
          timeMin: windowStart,
          timeMax: windowEnd,
          singleEvents: true,
          orderBy: 'startTime',
          maxResults: PAGE_SIZE,
          pageToken,
        });
        page = response.data;
      } catch (error) {
        throw toProviderError('listBusy', error);
      }

      const zone = page.timeZone ?? 'UTC';
      for (const event of page.items ?? []) {
        if (event.status === 'cancelled' || event.transparency === 'transparent') continue;
        const interval = eventInterval(event, zone);
        if (!interval) continue;
        busy.push({ interval, source: calendarId, eventId: event.id ?? undefined });
      }
      pageToken = page.nextPageToken ?? undefined;
    } while (pageToken);

    logger.debug('Google busy intervals loaded', { calendarId, busy: busy.length });
    return busy;
  }

  async createEvent(input: CreateEventInput): Promise<string> {
    const id = googleEventIdFor(input.idempotencyKey);

    try {
      const result = await this.calendar.events.insert({
        calendarId: input.calendarId,
        sendUpdates: 'all',
        requestBody: {
          id,
          summary: input.subject,
          start: { dateTime: input.interval.start, timeZone: input.timezone },
          end: { dateTime: input.interval.end, timeZone: input.timezone },
          attendees: input.attendees.map((email) => ({ email })),
          extendedProperties: { private: { idempotencyKey: input.idempotencyKey } },
        },
      });

      logger.info('Google Calendar event created', { eventId: result.data.id });
      return result.data.id ?? id;
    } catch (error) {
      // 409: an earlier attempt with this key already went through.
      if (errorStatus(error) === 409) {
        const existing = await this.findEvent(input.calendarId, input.idempotencyKey);
        if (existing) {
          logger.info('Google Calendar event already existed for key', { eventId: existing.id });
          return existing.id;
        }
      }
      throw toProviderError('createEvent', error);
    }
  }

  async updateEvent(calendarId: string, eventId: string, interval: TimeInterval): Promise<void> {
    try {
      await this.calendar.events.patch({
        calendarId,
        eventId,
        sendUpdates: 'all',
        requestBody: {
          start: { dateTime: interval.start },
          end: { dateTime: interval.end },
        },
      });
    } catch (error) {
      throw toProviderError('updateEvent', error);
    }
    logger.info('Google Calendar event updated', { eventId });
  }

  async deleteEvent(calendarId: string, eventId: string): Promise<void> {
    try {
      await this.calendar.events.delete({ calendarId, eventId, sendUpdates: 'all' });
    } catch (error) {
      throw toProviderError('deleteEvent', error);
    }
    logger.info('Google Calendar event cancelled', { eventId });
  }

  async findEvent(calendarId: string, idempotencyKey: string): Promise<CalendarEvent | null> {
    try {
      const result = await this.calendar.events.get({
        calendarId,
        eventId: googleEventIdFor(idempotencyKey),
      });
      if (result.data.status === 'cancelled') return null;
      return toCalendarEvent(result.data, 'UTC');
    } catch (error) {
      const kind = classifyGoogleError(error);
      if (kind === 'NotFound') return null;
      throw toProviderError('findEvent', error);
    }
  }

  async listEvents(calendarId: string, from: string, maxResults: number): Promise<CalendarEvent[]> {
    try {
      const response = await this.calendar.events.list({
        calendarId,
        timeMin: from,
        maxResults,
        singleEvents: true,
        orderBy: 'startTime',
      });
      const zone = response.data.timeZone ?? 'UTC';
      return (response.data.items ?? [])
        .map((event) => toCalendarEvent(event, zone))
        .filter((event): event is CalendarEvent => event !== null);
    } catch (error) {
      throw toProviderError('listEvents', error);
    }
  }
}
