import { createHash } from 'crypto';
import { CalendarEvent, CalendarProvider } from '../types/calendar';
import { BookingResult, TimeInterval } from '../types/scheduling';
import {
  CalendarProviderError,
  CalendarUnavailable,
  CalendarWriteConflict,
  describeError,
} from '../utils/errors';
import { intervalsOverlap, toMillis } from '../utils/interval';
import { logger } from '../utils/logger';
import { RetryPolicy, withRetry } from '../utils/retry';

export interface WriteRequest {
  idempotencyKey: string;
  calendarId: string;
  interval: TimeInterval;
  subject: string;
  attendees: string[];
  timezone: string;
  /** Present when an event already exists for the session: update instead of create. */
  eventId?: string;
}

export function idempotencyKeyFor(sessionId: string, intentId: string): string {
  return createHash('sha256').update(`${sessionId}:${intentId}`).digest('hex');
}

function sameInterval(event: CalendarEvent, interval: TimeInterval): boolean {
  return (
    toMillis(event.start) === toMillis(interval.start) && toMillis(event.end) === toMillis(interval.end)
  );
}

function isNotFound(error: unknown): boolean {
  return (
    error instanceof CalendarUnavailable &&
    error.cause instanceof CalendarProviderError &&
    error.cause.kind === 'NotFound'
  );
}

export class CalendarWriter {
  constructor(private provider: CalendarProvider, private retry: RetryPolicy) {}

  /**
   * Creates (or moves) the booking's event. A create that already happened
   * under the same idempotency key is found and returned as-is.
   */
  async write(request: WriteRequest): Promise<BookingResult> {
    let eventId = request.eventId;

    if (!eventId) {
      const prior = await this.attempt('findEvent', () =>
        this.provider.findEvent(request.calendarId, request.idempotencyKey)
      );
      if (prior && sameInterval(prior, request.interval)) {
        logger.info('Event already written for this booking', { eventId: prior.id });
        return { eventId: prior.id, finalInterval: request.interval, status: 'CREATED' };
      }
      eventId = prior?.id;
    }

    await this.ensureStillFree(request, eventId);

    if (eventId) {
      const updated = await this.tryUpdate(request, eventId);
      if (updated) return updated;
    }

    const createdId = await this.attempt('createEvent', () =>
      this.provider.createEvent({
        idempotencyKey: request.idempotencyKey,
        calendarId: request.calendarId,
        interval: request.interval,
        subject: request.subject,
        attendees: request.attendees,
        timezone: request.timezone,
      })
    );

    logger.info('Calendar event created', {
      eventId: createdId,
      calendarId: request.calendarId,
      provider: this.provider.name,
    });
    return { eventId: createdId, finalInterval: request.interval, status: 'CREATED' };
  }

  /** Deletes an event; an event that is already gone counts as deleted. */
  async cancel(calendarId: string, eventId: string): Promise<void> {
    try {
      await this.attempt('deleteEvent', () => this.provider.deleteEvent(calendarId, eventId));
      logger.info('Calendar event deleted', { eventId, calendarId });
    } catch (error) {
      if (!isNotFound(error)) throw error;
      logger.info('Calendar event already gone', { eventId, calendarId });
    }
  }

  private async tryUpdate(request: WriteRequest, eventId: string): Promise<BookingResult | null> {
    try {
      await this.attempt('updateEvent', () =>
        this.provider.updateEvent(request.calendarId, eventId, request.interval)
      );
    } catch (error) {
      if (!isNotFound(error)) throw error;
      logger.warn('Event to update no longer exists, creating a new one', { eventId });
      return null;
    }

    logger.info('Calendar event updated', { eventId, calendarId: request.calendarId });
    return { eventId, finalInterval: request.interval, status: 'UPDATED' };
  }

  /**
   * Re-reads the slot right before writing. Another booking may have landed
   * between resolution and now.
   */
  private async ensureStillFree(request: WriteRequest, ownEventId?: string): Promise<void> {
    const busy = await this.attempt('listBusy', () =>
      this.provider.listBusy(request.calendarId, request.interval.start, request.interval.end)
    );
    // The event being moved does not conflict with itself.
    const conflicting = busy.filter(
      (b) => intervalsOverlap(b.interval, request.interval) && (!ownEventId || b.eventId !== ownEventId)
    );
    if (conflicting.length > 0) {
      logger.warn('Slot taken before write', {
        calendarId: request.calendarId,
        conflicts: conflicting.length,
      });
      throw new CalendarWriteConflict();
    }
  }

  private async attempt<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await withRetry(fn, {
        ...this.retry,
        operation: `calendar.${operation}`,
        shouldRetry: (error) => error instanceof CalendarProviderError && error.retryable,
      });
    } catch (error) {
      if (error instanceof CalendarProviderError) {
        if (error.kind === 'SlotTaken') throw new CalendarWriteConflict(error.message);
        throw new CalendarUnavailable(
          `Calendar ${operation} failed: ${error.message}`,
          error,
          error.retryable
        );
      }
      throw new CalendarUnavailable(`Calendar ${operation} failed: ${describeError(error)}`, error);
    }
  }
}
