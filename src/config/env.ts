import dotenv from 'dotenv';
import { z } from 'zod';

dotenv.config();

const optionalString = z.preprocess(
  (value) => (typeof value === 'string' && value.trim() === '' ? undefined : value),
  z.string().min(1).optional()
);

const integer = (fallback: number) => z.coerce.number().int().nonnegative().default(fallback);

const envSchema = z.object({
  PORT: z.string().default('3000'),
  NODE_ENV: z.enum(['development', 'test', 'staging', 'production']).default('development'),
  REDIS_URL: z.string().min(1).default('redis://localhost:6379'),
  API_KEYS: optionalString,
  SENTRY_DSN: optionalString,

  CALENDAR_PROVIDER: z.enum(['google', 'memory']).default('memory'),
  GOOGLE_CALENDAR_CREDENTIALS: optionalString,
  GOOGLE_CALENDAR_ID: z.string().default('primary'),

  EXTRACTOR_PROVIDER: z.enum(['anthropic', 'openai', 'rules']).default('rules'),
  ANTHROPIC_API_KEY: optionalString,
  OPENAI_API_KEY: optionalString,

  SESSION_STORE: z.enum(['redis', 'memory']).default('redis'),
  SESSION_TTL_SECONDS: integer(1800),

  DEFAULT_TIMEZONE: z.string().default('UTC'),
  WEEK_START: z.coerce.number().int().min(1).max(7).default(1),
  DEFAULT_DURATION_MINUTES: integer(30),
  SLOT_GRANULARITY_MINUTES: integer(15),
  LOOKAHEAD_DAYS: integer(30),
  AVAILABILITY_STALE_MS: integer(60_000),
  REFRESH_MAX_ATTEMPTS: integer(3),
  WRITE_MAX_ATTEMPTS: integer(3),
  RETRY_INITIAL_DELAY_MS: integer(500),
  MAX_CONFLICT_RETRIES: integer(2),
  BUSINESS_HOURS_START: z.string().regex(/^\d{2}:\d{2}$/).default('09:00'),
  BUSINESS_HOURS_END: z.string().regex(/^\d{2}:\d{2}$/).default('17:00'),
});

export type Env = z.infer<typeof envSchema>;

const parsed = envSchema.safeParse(process.env);

if (!parsed.success) {
  console.error('❌ Invalid environment variables:', parsed.error.flatten().fieldErrors);
  process.exit(1);
}

export const env: Env = parsed.data;
