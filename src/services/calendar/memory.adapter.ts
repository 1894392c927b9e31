import { v4 as uuidv4 } from 'uuid';
import { CalendarEvent, CalendarProvider, CreateEventInput } from '../../types/calendar';
import { BusyInterval, TimeInterval } from '../../types/scheduling';
import { CalendarProviderError } from '../../utils/errors';
import { intervalsOverlap, toMillis } from '../../utils/interval';
import { logger } from '../../utils/logger';

interface StoredEvent extends CalendarEvent {
  calendarId: string;
  idempotencyKey?: string;
}

export interface InMemoryCalendarOptions {
  /** Reject creates that overlap an existing event with SlotTaken. */
  rejectOverlaps?: boolean;
}

/**
 * Calendar kept in process memory. Used for local development and as the
 * provider behind the tests.
 */
export class InMemoryCalendarAdapter implements CalendarProvider {
  readonly name = 'memory';
  private events = new Map<string, StoredEvent>();

  constructor(private options: InMemoryCalendarOptions = {}) {}

  /** Adds an event that was not booked through this service. */
  seed(calendarId: string, interval: TimeInterval, title = 'Busy'): CalendarEvent {
    const event: StoredEvent = {
      id: uuidv4(),
      calendarId,
      title,
      start: interval.start,
      end: interval.end,
      attendees: [],
      status: 'confirmed',
    };
    this.events.set(event.id, event);
    return event;
  }

  get eventCount(): number {
    return this.events.size;
  }

  async listBusy(calendarId: string, windowStart: string, windowEnd: string): Promise<BusyInterval[]> {
    const window = { start: windowStart, end: windowEnd };
    return this.eventsFor(calendarId)
      .filter((e) => intervalsOverlap({ start: e.start, end: e.end }, window))
      .map((e) => ({ interval: { start: e.start, end: e.end }, source: calendarId, eventId: e.id }));
  }

  async createEvent(input: CreateEventInput): Promise<string> {
    const existing = this.byKey(input.calendarId, input.idempotencyKey);
    if (existing) return existing.id;

    if (
      this.options.rejectOverlaps &&
      this.eventsFor(input.calendarId).some((e) => intervalsOverlap({ start: e.start, end: e.end }, input.interval))
    ) {
      throw new CalendarProviderError('SlotTaken', 'Slot overlaps an existing event');
    }

    const event: StoredEvent = {
      id: uuidv4(),
      calendarId: input.calendarId,
      idempotencyKey: input.idempotencyKey,
      title: input.subject,
      start: input.interval.start,
      end: input.interval.end,
      attendees: [...input.attendees],
      status: 'confirmed',
    };
    this.events.set(event.id, event);
    logger.debug('In-memory event created', { eventId: event.id, calendarId: input.calendarId });
    return event.id;
  }

  async updateEvent(calendarId: string, eventId: string, interval: TimeInterval): Promise<void> {
    const event = this.events.get(eventId);
    if (!event || event.calendarId !== calendarId) {
      throw new CalendarProviderError('NotFound', `Event ${eventId} not found`);
    }
    this.events.set(eventId, { ...event, start: interval.start, end: interval.end });
  }

  async deleteEvent(calendarId: string, eventId: string): Promise<void> {
    const event = this.events.get(eventId);
    if (!event || event.calendarId !== calendarId) {
      throw new CalendarProviderError('NotFound', `Event ${eventId} not found`);
    }
    this.events.delete(eventId);
  }

  async findEvent(calendarId: string, idempotencyKey: string): Promise<CalendarEvent | null> {
    const event = this.byKey(calendarId, idempotencyKey);
    return event ? this.toPublic(event) : null;
  }

  async listEvents(calendarId: string, from: string, maxResults: number): Promise<CalendarEvent[]> {
    const fromMs = toMillis(from);
    return this.eventsFor(calendarId)
      .filter((e) => toMillis(e.end) > fromMs)
      .slice(0, maxResults)
      .map((e) => this.toPublic(e));
  }

  private eventsFor(calendarId: string): StoredEvent[] {
    return [...this.events.values()]
      .filter((e) => e.calendarId === calendarId)
      .sort((a, b) => toMillis(a.start) - toMillis(b.start));
  }

  private byKey(calendarId: string, idempotencyKey: string): StoredEvent | undefined {
    return [...this.events.values()].find(
      (e) => e.calendarId === calendarId && e.idempotencyKey === idempotencyKey
    );
  }

  private toPublic(event: StoredEvent): CalendarEvent {
    return {
      id: event.id,
      title: event.title,
      start: event.start,
      end: event.end,
      attendees: event.attendees,
      status: event.status,
    };
  }
}
