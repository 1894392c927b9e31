import { DateTime } from 'luxon';
import { TimeInterval } from '../types/scheduling';

export interface DayHours {
  open: string;
  close: string;
}

export interface BusinessHoursConfig {
  monday: DayHours | null;
  tuesday: DayHours | null;
  wednesday: DayHours | null;
  thursday: DayHours | null;
  friday: DayHours | null;
  saturday: DayHours | null;
  sunday: DayHours | null;
}

export const DEFAULT_BUSINESS_HOURS: BusinessHoursConfig = weekdayHours('09:00', '17:00');

const DAY_NAMES: (keyof BusinessHoursConfig)[] = [
  'monday', 'tuesday', 'wednesday', 'thursday', 'friday', 'saturday', 'sunday',
];

export function weekdayHours(open: string, close: string): BusinessHoursConfig {
  const hours = { open, close };
  return {
    monday: hours,
    tuesday: hours,
    wednesday: hours,
    thursday: hours,
    friday: hours,
    saturday: null,
    sunday: null,
  };
}

function atClock(day: DateTime, value: string): DateTime {
  const [hour, minute] = value.split(':').map(Number);
  return day.set({ hour, minute, second: 0, millisecond: 0 });
}

/**
 * Opening window for the calendar day `day` falls on, in `day`'s zone, or
 * null when closed.
 */
export function businessWindowFor(
  day: DateTime,
  config: BusinessHoursConfig = DEFAULT_BUSINESS_HOURS
): { start: DateTime; end: DateTime } | null {
  const dayHours = config[DAY_NAMES[day.weekday - 1]]; // Luxon weekday is 1-based (Mon=1)
  if (!dayHours) return null;

  const start = atClock(day, dayHours.open);
  const end = atClock(day, dayHours.close);
  return end > start ? { start, end } : null;
}

/** True when the interval sits entirely inside one day's opening hours in `timezone`. */
export function isWithinBusinessHours(
  interval: TimeInterval,
  timezone: string,
  config: BusinessHoursConfig = DEFAULT_BUSINESS_HOURS
): boolean {
  const start = DateTime.fromISO(interval.start, { zone: 'utc' }).setZone(timezone);
  const end = DateTime.fromISO(interval.end, { zone: 'utc' }).setZone(timezone);
  const window = businessWindowFor(start, config);
  if (!window) return false;
  return start >= window.start && end <= window.end;
}
