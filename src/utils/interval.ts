import { DateTime } from 'luxon';
import { TimeInterval } from '../types/scheduling';

export const MINUTE_MS = 60_000;

export function toMillis(value: string): number {
  return DateTime.fromISO(value, { zone: 'utc' }).toMillis();
}

export function intervalFromMillis(startMs: number, endMs: number): TimeInterval {
  return {
    start: new Date(startMs).toISOString(),
    end: new Date(endMs).toISOString(),
  };
}

export function intervalFromDateTimes(start: DateTime, end: DateTime): TimeInterval {
  return intervalFromMillis(start.toMillis(), end.toMillis());
}

export function isValidInterval(interval: TimeInterval): boolean {
  const start = toMillis(interval.start);
  const end = toMillis(interval.end);
  return Number.isFinite(start) && Number.isFinite(end) && start < end;
}

/** Half-open overlap: touching endpoints do not overlap. */
export function overlapsMs(aStart: number, aEnd: number, bStart: number, bEnd: number): boolean {
  return aStart < bEnd && bStart < aEnd;
}

export function intervalsOverlap(a: TimeInterval, b: TimeInterval): boolean {
  return overlapsMs(toMillis(a.start), toMillis(a.end), toMillis(b.start), toMillis(b.end));
}

export function toZonedIso(value: string, timezone: string): string {
  return DateTime.fromISO(value, { zone: 'utc' }).setZone(timezone).toISO() ?? value;
}

/** "Tue, Mar 5, 3:00 PM – 3:30 PM" in the user's zone. */
export function formatInterval(interval: TimeInterval, timezone: string): string {
  const start = DateTime.fromISO(interval.start, { zone: 'utc' }).setZone(timezone).setLocale('en-US');
  const end = DateTime.fromISO(interval.end, { zone: 'utc' }).setZone(timezone).setLocale('en-US');
  const sameDay = start.hasSame(end, 'day');
  const endFormat = sameDay ? 'h:mm a' : 'EEE, MMM d, h:mm a';
  return `${start.toFormat('EEE, MMM d, h:mm a')} – ${end.toFormat(endFormat)}`;
}
