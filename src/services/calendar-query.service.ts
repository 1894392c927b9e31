import { DateTime } from 'luxon';
import { SchedulingConfig } from '../config/scheduling';
import { CalendarEvent, CalendarProvider } from '../types/calendar';
import { TimeInterval } from '../types/scheduling';
import { businessWindowFor } from '../utils/businessHours';
import { ValidationError } from '../utils/errors';
import { intervalFromDateTimes, intervalsOverlap, isValidInterval } from '../utils/interval';
import { logger } from '../utils/logger';

export interface DaySlot extends TimeInterval {
  available: boolean;
}

/**
 * Read-only calendar lookups for the HTTP shell. Always reads the provider
 * directly; the booking flow's cached index is not involved.
 */
export class CalendarQueryService {
  constructor(private provider: CalendarProvider, private config: SchedulingConfig) {}

  async upcomingEvents(maxResults: number, calendarId = this.config.calendarId): Promise<CalendarEvent[]> {
    return this.provider.listEvents(calendarId, new Date().toISOString(), maxResults);
  }

  async isFree(interval: TimeInterval, calendarId = this.config.calendarId): Promise<boolean> {
    if (!isValidInterval(interval)) {
      throw new ValidationError('start must be before end');
    }
    const busy = await this.provider.listBusy(calendarId, interval.start, interval.end);
    return !busy.some((b) => intervalsOverlap(b.interval, interval));
  }

  /**
   * Back-to-back slots of `durationMinutes` across the business day of `date`
   * (YYYY-MM-DD in `timezone`), each marked free or busy.
   */
  async slotsOn(
    date: string,
    durationMinutes: number,
    timezone = this.config.timezone,
    calendarId = this.config.calendarId
  ): Promise<DaySlot[]> {
    const day = DateTime.fromISO(date, { zone: timezone });
    if (!day.isValid) {
      throw new ValidationError(`Invalid date: ${date}`);
    }

    const window = businessWindowFor(day, this.config.businessHours);
    if (!window) return [];

    const busy = await this.provider.listBusy(
      calendarId,
      window.start.toUTC().toISO() ?? '',
      window.end.toUTC().toISO() ?? ''
    );

    const slots: DaySlot[] = [];
    let cursor = window.start;
    while (cursor.plus({ minutes: durationMinutes }) <= window.end) {
      const slotEnd = cursor.plus({ minutes: durationMinutes });
      const interval = intervalFromDateTimes(cursor, slotEnd);
      slots.push({ ...interval, available: !busy.some((b) => intervalsOverlap(b.interval, interval)) });
      cursor = slotEnd;
    }

    logger.debug('Day slots computed', { date, slots: slots.length });
    return slots;
  }
}
