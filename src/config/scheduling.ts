import { env } from './env';
import { BusinessHoursConfig, weekdayHours } from '../utils/businessHours';
import { RetryPolicy } from '../utils/retry';

export interface SchedulingConfig {
  calendarId: string;
  timezone: string;
  /** ISO weekday the provider's weeks start on (1 = Monday, 7 = Sunday). */
  weekStart: number;
  defaultDurationMinutes: number;
  granularityMinutes: number;
  lookaheadDays: number;
  staleAfterMs: number;
  maxAlternatives: number;
  maxInvalidSelections: number;
  maxConflictRetries: number;
  businessHours: BusinessHoursConfig;
  refreshRetry: RetryPolicy;
  writeRetry: RetryPolicy;
}

export const DEFAULT_SCHEDULING_CONFIG: SchedulingConfig = {
  calendarId: 'primary',
  timezone: 'UTC',
  weekStart: 1,
  defaultDurationMinutes: 30,
  granularityMinutes: 15,
  lookaheadDays: 30,
  staleAfterMs: 60_000,
  maxAlternatives: 3,
  maxInvalidSelections: 3,
  maxConflictRetries: 2,
  businessHours: weekdayHours('09:00', '17:00'),
  refreshRetry: { maxAttempts: 3, initialDelayMs: 500, backoffFactor: 2 },
  writeRetry: { maxAttempts: 3, initialDelayMs: 500, backoffFactor: 2 },
};

export function buildSchedulingConfig(overrides: Partial<SchedulingConfig> = {}): SchedulingConfig {
  return {
    ...DEFAULT_SCHEDULING_CONFIG,
    ...overrides,
    refreshRetry: { ...DEFAULT_SCHEDULING_CONFIG.refreshRetry, ...overrides.refreshRetry },
    writeRetry: { ...DEFAULT_SCHEDULING_CONFIG.writeRetry, ...overrides.writeRetry },
  };
}

export function schedulingConfigFromEnv(): SchedulingConfig {
  return buildSchedulingConfig({
    calendarId: env.GOOGLE_CALENDAR_ID,
    timezone: env.DEFAULT_TIMEZONE,
    weekStart: env.WEEK_START,
    defaultDurationMinutes: env.DEFAULT_DURATION_MINUTES,
    granularityMinutes: env.SLOT_GRANULARITY_MINUTES,
    lookaheadDays: env.LOOKAHEAD_DAYS,
    staleAfterMs: env.AVAILABILITY_STALE_MS,
    maxConflictRetries: env.MAX_CONFLICT_RETRIES,
    businessHours: weekdayHours(env.BUSINESS_HOURS_START, env.BUSINESS_HOURS_END),
    refreshRetry: {
      maxAttempts: env.REFRESH_MAX_ATTEMPTS,
      initialDelayMs: env.RETRY_INITIAL_DELAY_MS,
      backoffFactor: 2,
    },
    writeRetry: {
      maxAttempts: env.WRITE_MAX_ATTEMPTS,
      initialDelayMs: env.RETRY_INITIAL_DELAY_MS,
      backoffFactor: 2,
    },
  });
}
