import * as Sentry from '@sentry/node';
import { createApp } from './app';
import { createServices } from './container';
import { env } from './config/env';
import { addCompensationJob, closeQueues } from './config/queue';
import { checkRedisHealth, connectRedis, disconnectRedis, redis } from './config/redis';
import { schedulingConfigFromEnv } from './config/scheduling';
import { CalendarProviderFactory } from './services/calendar/calendar.factory';
import { EntityExtractorFactory } from './services/extraction/extractor.factory';
import { InMemorySessionStore, RedisSessionStore } from './services/session-store.service';
import { SessionStore } from './types/session';
import { describeError } from './utils/errors';
import { logger } from './utils/logger';
import { startCompensationWorker } from './workers/compensation.worker';

if (env.SENTRY_DSN) {
  Sentry.init({
    dsn: env.SENTRY_DSN,
    environment: env.NODE_ENV,
    tracesSampleRate: env.NODE_ENV === 'production' ? 0.1 : 1.0,
  });
}

function createSessionStore(): SessionStore {
  if (env.SESSION_STORE === 'memory') {
    return new InMemorySessionStore(env.SESSION_TTL_SECONDS);
  }
  return new RedisSessionStore(
    {
      get: (key) => redis.get(key),
      set: (key, value, options) => redis.set(key, value, options),
      del: (key) => redis.del(key),
    },
    env.SESSION_TTL_SECONDS
  );
}

async function start() {
  try {
    const config = schedulingConfigFromEnv();
    const services = createServices({
      config,
      provider: CalendarProviderFactory.create(env.CALENDAR_PROVIDER, {
        googleCredentials: env.GOOGLE_CALENDAR_CREDENTIALS,
      }),
      store: createSessionStore(),
      extractor: EntityExtractorFactory.create(env.EXTRACTOR_PROVIDER, {
        timezone: config.timezone,
        anthropicApiKey: env.ANTHROPIC_API_KEY,
        openaiApiKey: env.OPENAI_API_KEY,
      }),
      compensate: addCompensationJob,
    });

    const usesRedisSessions = env.SESSION_STORE === 'redis';
    if (usesRedisSessions) {
      await connectRedis();
    }
    const worker = startCompensationWorker(services.writer);

    const app = createApp(services, {
      sentry: Boolean(env.SENTRY_DSN),
      healthChecks: usesRedisSessions ? { redis: checkRedisHealth } : {},
    });

    const server = app.listen(parseInt(env.PORT, 10), () => {
      logger.info(`Server running on port ${env.PORT}`, {
        env: env.NODE_ENV,
        calendar: env.CALENDAR_PROVIDER,
        extractor: env.EXTRACTOR_PROVIDER,
        sessions: env.SESSION_STORE,
      });
    });

    const shutdown = async (signal: string) => {
      logger.info('Shutting down', { signal });
      server.close();
      try {
        await worker.close();
        await closeQueues();
        await disconnectRedis();
        process.exit(0);
      } catch (error) {
        logger.error('Shutdown failed', { error: describeError(error) });
        process.exit(1);
      }
    };
    process.on('SIGTERM', (signal) => void shutdown(signal));
    process.on('SIGINT', (signal) => void shutdown(signal));
  } catch (error) {
    logger.error('Failed to start server', { error: describeError(error) });
    process.exit(1);
  }
}

void start();
