import { BusyInterval, TimeInterval } from './scheduling';

export interface CalendarEvent {
  id: string;
  title: string;
  start: string;
  end: string;
  attendees?: string[];
  status?: string;
  link?: string;
}

export interface CreateEventInput {
  idempotencyKey: string;
  calendarId: string;
  interval: TimeInterval;
  subject: string;
  attendees: string[];
  timezone: string;
}

/**
 * Boundary to the calendar provider. Implementations throw
 * CalendarProviderError for every failure the core should react to.
 */
export interface CalendarProvider {
  readonly name: string;
  listBusy(calendarId: string, windowStart: string, windowEnd: string): Promise<BusyInterval[]>;
  createEvent(input: CreateEventInput): Promise<string>;
  updateEvent(calendarId: string, eventId: string, interval: TimeInterval): Promise<void>;
  deleteEvent(calendarId: string, eventId: string): Promise<void>;
  /** Event previously created with this idempotency key, or null. */
  findEvent(calendarId: string, idempotencyKey: string): Promise<CalendarEvent | null>;
  listEvents(calendarId: string, from: string, maxResults: number): Promise<CalendarEvent[]>;
}
