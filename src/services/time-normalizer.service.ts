import * as chrono from 'chrono-node';
import { DateTime } from 'luxon';
import { TimeInterval } from '../types/scheduling';
import { AmbiguousTimeExpression } from '../utils/errors';
import { BusinessHoursConfig, DEFAULT_BUSINESS_HOURS, businessWindowFor } from '../utils/businessHours';
import { intervalFromDateTimes } from '../utils/interval';
import { logger } from '../utils/logger';

export interface NormalizeContext {
  reference: Date;
  timezone: string;
  durationMinutes?: number;
  /** ISO weekday weeks start on (1 = Monday, 7 = Sunday). */
  weekStart?: number;
  businessHours?: BusinessHoursConfig;
  stepMinutes?: number;
  maxCandidates?: number;
}

export interface NormalizerDefaults {
  defaultDurationMinutes: number;
  weekStart: number;
  businessHours: BusinessHoursConfig;
  stepMinutes: number;
  maxCandidates: number;
}

interface Clock {
  day: DateTime;
  hour: number;
  minute: number;
  end?: { hour: number; minute: number };
}

interface DayWindow {
  start: DateTime;
  end: DateTime;
}

const NUMBER_WORDS: Record<string, number> = {
  a: 1, an: 1, one: 1, two: 2, three: 3, four: 4, five: 5, six: 6,
  seven: 7, eight: 8, nine: 9, ten: 10, eleven: 11, twelve: 12,
  fifteen: 15, twenty: 20, thirty: 30, forty: 40, 'forty-five': 45,
  'forty five': 45, sixty: 60, ninety: 90,
};

const NUMBER = '(\\d+(?:\\.\\d+)?|an?|one|two|three|four|five|six|seven|eight|nine|ten|eleven|twelve|fifteen|twenty|thirty|forty[- ]five|forty|sixty|ninety)';

const WEEKDAYS: Record<string, number> = {
  monday: 1, mon: 1,
  tuesday: 2, tue: 2, tues: 2,
  wednesday: 3, wed: 3,
  thursday: 4, thu: 4, thur: 4, thurs: 4,
  friday: 5, fri: 5,
  saturday: 6, sat: 6,
  sunday: 7, sun: 7,
};

const WEEKDAY_PATTERN = /\b(?:(this|next|coming)\s+)?(monday|tuesday|wednesday|thursday|friday|saturday|sunday|mon|tues|tue|wed|thurs|thur|thu|fri|sat|sun)\b/;

const DAY_PARTS: Record<string, { open: string; close: string }> = {
  morning: { open: '09:00', close: '12:00' },
  afternoon: { open: '12:00', close: '17:00' },
  evening: { open: '17:00', close: '20:00' },
  tonight: { open: '17:00', close: '20:00' },
};

// Used when the user names only days the business is closed on.
const FALLBACK_HOURS = { open: '09:00', close: '17:00' };

export const DEFAULT_NORMALIZER: NormalizerDefaults = {
  defaultDurationMinutes: 30,
  weekStart: 1,
  businessHours: DEFAULT_BUSINESS_HOURS,
  stepMinutes: 30,
  maxCandidates: 48,
};

function toNumber(token: string): number {
  const numeric = Number(token);
  if (Number.isFinite(numeric)) return numeric;
  return NUMBER_WORDS[token.replace(/\s+/g, ' ')] ?? NaN;
}

function atClock(day: DateTime, value: string): DateTime {
  const [hour, minute] = value.split(':').map(Number);
  return day.set({ hour, minute, second: 0, millisecond: 0 });
}

/**
 * Minutes described by a free-text duration ("45 minutes", "an hour and a
 * half", "1h30"), or null.
 */
export function parseDurationMinutes(text: string): number | null {
  const value = text.trim().toLowerCase();
  if (!value) return null;

  if (/\bhalf (?:an? )?hour\b/.test(value)) return 30;
  if (/\bquarter (?:of an )?hour\b/.test(value)) return 15;

  const compact = value.match(/\b(\d+)h(\d{1,2})m?\b/);
  if (compact) return Number(compact[1]) * 60 + Number(compact[2]);

  let total = 0;
  let matched = false;

  const hours = value.match(new RegExp(`\\b${NUMBER}\\s*-?\\s*(?:h|hr|hrs|hour|hours)(?![a-z])`));
  if (hours) {
    const amount = toNumber(hours[1]);
    if (Number.isFinite(amount)) {
      total += amount * 60;
      matched = true;
      if (/\band a half\b/.test(value)) total += 30;
    }
  }

  const minutes = value.match(new RegExp(`\\b${NUMBER}\\s*-?\\s*(?:m|min|mins|minute|minutes)(?![a-z])`));
  if (minutes) {
    const amount = toNumber(minutes[1]);
    if (Number.isFinite(amount)) {
      total += amount;
      matched = true;
    }
  }

  if (!matched) return null;
  const rounded = Math.round(total);
  return rounded > 0 && rounded <= 24 * 60 ? rounded : null;
}

/**
 * Turns natural-language time fragments into concrete UTC intervals relative
 * to a reference instant in the user's zone. Pure; never performs I/O.
 */
export class TimeExpressionNormalizer {
  private defaults: NormalizerDefaults;

  constructor(defaults: Partial<NormalizerDefaults> = {}) {
    this.defaults = { ...DEFAULT_NORMALIZER, ...defaults };
  }

  normalize(fragment: string, context: NormalizeContext): TimeInterval[] {
    const text = fragment.trim().toLowerCase().replace(/\s+/g, ' ');
    if (!text) {
      throw new AmbiguousTimeExpression(fragment, 'No time was given');
    }

    const ref = DateTime.fromJSDate(context.reference, { zone: context.timezone });
    if (!ref.isValid) {
      throw new AmbiguousTimeExpression(fragment, `Unknown time zone "${context.timezone}"`);
    }

    const durationMinutes = context.durationMinutes ?? this.defaults.defaultDurationMinutes;
    const weekStart = context.weekStart ?? this.defaults.weekStart;

    const offsetMinutes = this.parseRelativeOffset(text);
    if (offsetMinutes !== null) {
      const start = ref.plus({ minutes: offsetMinutes }).set({ second: 0, millisecond: 0 });
      return [intervalFromDateTimes(start, start.plus({ minutes: durationMinutes }))];
    }

    const clock = this.parseClock(text, ref);
    const days = this.resolveDays(text, ref, weekStart) ?? (clock ? [clock.day] : null);
    if (!days || days.length === 0) {
      throw new AmbiguousTimeExpression(fragment);
    }

    const candidates = clock
      ? this.clockCandidates(days, clock, ref, durationMinutes, context)
      : this.vagueCandidates(text, days, ref, durationMinutes, context);

    if (candidates.length === 0) {
      throw new AmbiguousTimeExpression(fragment, `"${fragment}" does not leave any upcoming time`);
    }

    logger.debug('Time expression normalized', {
      fragment,
      timezone: context.timezone,
      candidates: candidates.length,
    });

    return candidates;
  }

  /** "in 20 minutes", "in an hour": minutes from the reference, or null. */
  private parseRelativeOffset(text: string): number | null {
    if (/\bin half an hour\b/.test(text)) return 30;
    const match = text.match(new RegExp(`\\bin ${NUMBER}\\s*(minutes?|mins?|hours?|hrs?)\\b`));
    if (!match) return null;
    const amount = toNumber(match[1]);
    if (!Number.isFinite(amount)) return null;
    return match[2].startsWith('h') ? Math.round(amount * 60) : Math.round(amount);
  }

  private parseClock(text: string, ref: DateTime): Clock | null {
    if (/\bnoon\b/.test(text)) return { day: ref.startOf('day'), hour: 12, minute: 0 };
    if (/\bmidnight\b/.test(text)) return { day: ref.startOf('day'), hour: 0, minute: 0 };

    const results = chrono.parse(
      text,
      { instant: ref.toJSDate(), timezone: ref.offset },
      { forwardDate: true }
    );

    for (const result of results) {
      if (!result.start.isCertain('hour')) continue;
      const year = result.start.get('year');
      const month = result.start.get('month');
      const day = result.start.get('day');
      const hour = result.start.get('hour');
      if (year === null || month === null || day === null || hour === null) continue;

      const clock: Clock = {
        day: DateTime.fromObject({ year, month, day }, { zone: ref.zone }),
        hour,
        minute: result.start.get('minute') ?? 0,
      };

      const endHour = result.end?.isCertain('hour') ? result.end.get('hour') : null;
      if (result.end && endHour !== null) {
        clock.end = { hour: endHour, minute: result.end.get('minute') ?? 0 };
      }
      return clock;
    }

    return null;
  }

  private startOfWeek(ref: DateTime, weekStart: number): DateTime {
    const diff = (ref.weekday - weekStart + 7) % 7;
    return ref.startOf('day').minus({ days: diff });
  }

  private resolveDays(text: string, ref: DateTime, weekStart: number): DateTime[] | null {
    const today = ref.startOf('day');

    if (/\bday after tomorrow\b/.test(text)) return [today.plus({ days: 2 })];
    if (/\btomorrow\b/.test(text)) return [today.plus({ days: 1 })];
    if (/\b(today|tonight)\b/.test(text)) return [today];

    const weekend = text.match(/\b(this|next) weekend\b/);
    if (weekend) {
      const saturday = today.plus({ days: (6 - today.weekday + 7) % 7 });
      const first = weekend[1] === 'next' ? saturday.plus({ weeks: 1 }) : saturday;
      return [first, first.plus({ days: 1 })].filter((d) => d >= today);
    }

    if (/\bnext week\b/.test(text)) {
      const start = this.startOfWeek(ref, weekStart).plus({ weeks: 1 });
      return Array.from({ length: 7 }, (_, i) => start.plus({ days: i }));
    }

    if (/\b(this|later this|rest of the) week\b/.test(text)) {
      const end = this.startOfWeek(ref, weekStart).plus({ weeks: 1 });
      const days: DateTime[] = [];
      for (let d = today; d < end; d = d.plus({ days: 1 })) days.push(d);
      return days;
    }

    const weekday = text.match(WEEKDAY_PATTERN);
    if (weekday) {
      const target = WEEKDAYS[weekday[2]];
      if (weekday[1] === 'this' || weekday[1] === 'next') {
        const offset = (target - weekStart + 7) % 7;
        const week = this.startOfWeek(ref, weekStart).plus({ weeks: weekday[1] === 'next' ? 1 : 0 });
        return [week.plus({ days: offset })];
      }
      const ahead = (target - today.weekday + 7) % 7 || 7;
      return [today.plus({ days: ahead })];
    }

    const inDays = text.match(new RegExp(`\\bin ${NUMBER}\\s*(days?|weeks?)\\b`));
    if (inDays) {
      const amount = toNumber(inDays[1]);
      if (Number.isFinite(amount)) {
        const days = inDays[2].startsWith('week') ? amount * 7 : amount;
        return [today.plus({ days: Math.round(days) })];
      }
    }

    const results = chrono.parse(
      text,
      { instant: ref.toJSDate(), timezone: ref.offset },
      { forwardDate: true }
    );
    const dated = results.find((r) => r.start.isCertain('day') || r.start.isCertain('weekday'));
    if (dated) {
      const year = dated.start.get('year');
      const month = dated.start.get('month');
      const day = dated.start.get('day');
      if (year !== null && month !== null && day !== null) {
        return [DateTime.fromObject({ year, month, day }, { zone: ref.zone })];
      }
    }

    return null;
  }

  private clockCandidates(
    days: DateTime[],
    clock: Clock,
    ref: DateTime,
    durationMinutes: number,
    context: NormalizeContext
  ): TimeInterval[] {
    const businessHours = context.businessHours ?? this.defaults.businessHours;
    // Across a multi-day period only open days are plausible, unless none is open.
    const open = days.filter((d) => businessWindowFor(d, businessHours) !== null);
    const eligible = open.length > 0 ? open : days;

    const candidates: TimeInterval[] = [];
    for (const day of eligible) {
      const start = day.set({ hour: clock.hour, minute: clock.minute, second: 0, millisecond: 0 });
      if (start < ref) continue;

      let end = start.plus({ minutes: durationMinutes });
      if (clock.end) {
        const explicitEnd = day.set({ hour: clock.end.hour, minute: clock.end.minute, second: 0, millisecond: 0 });
        if (explicitEnd > start) end = explicitEnd;
      }
      candidates.push(intervalFromDateTimes(start, end));
    }
    return candidates;
  }

  private vagueCandidates(
    text: string,
    days: DateTime[],
    ref: DateTime,
    durationMinutes: number,
    context: NormalizeContext
  ): TimeInterval[] {
    const businessHours = context.businessHours ?? this.defaults.businessHours;
    const step = Math.max(1, context.stepMinutes ?? this.defaults.stepMinutes);
    const limit = context.maxCandidates ?? this.defaults.maxCandidates;
    const partMatch = text.match(/\b(morning|afternoon|evening|tonight)\b/);
    const part = partMatch ? DAY_PARTS[partMatch[1]] : undefined;

    const allClosed = days.every((d) => businessWindowFor(d, businessHours) === null);

    const candidates: TimeInterval[] = [];
    for (const day of days) {
      const window = this.windowFor(day, part, businessHours, allClosed);
      if (!window) continue;

      let cursor = window.start;
      if (cursor < ref) {
        const minutesIntoWindow = ref.diff(window.start, 'minutes').minutes;
        cursor = window.start.plus({ minutes: Math.ceil(minutesIntoWindow / step) * step });
      }

      for (; cursor.plus({ minutes: durationMinutes }) <= window.end; cursor = cursor.plus({ minutes: step })) {
        candidates.push(intervalFromDateTimes(cursor, cursor.plus({ minutes: durationMinutes })));
        if (candidates.length >= limit) return candidates;
      }
    }
    return candidates;
  }

  private windowFor(
    day: DateTime,
    part: { open: string; close: string } | undefined,
    businessHours: BusinessHoursConfig,
    useFallback: boolean
  ): DayWindow | null {
    if (part) {
      return { start: atClock(day, part.open), end: atClock(day, part.close) };
    }
    const open = businessWindowFor(day, businessHours);
    if (open) return open;
    if (!useFallback) return null;
    return { start: atClock(day, FALLBACK_HOURS.open), end: atClock(day, FALLBACK_HOURS.close) };
  }
}
