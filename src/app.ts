import express, { Express } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import rateLimit from 'express-rate-limit';
import * as Sentry from '@sentry/node';
import { Services } from './container';
import { errorHandler } from './middleware/errorHandler';
import { apiKeyAuth } from './middleware/auth';
import { createCalendarRouter } from './routes/calendar.routes';
import { createChatRouter } from './routes/chat.routes';

export interface AppOptions {
  sentry: boolean;
  healthChecks?: Record<string, () => Promise<{ status: string; error?: string }>>;
}

export function createApp(services: Services, options: AppOptions): Express {
  const app = express();

  app.use(helmet());
  app.use(cors());
  app.use(express.json());

  const limiter = rateLimit({
    windowMs: 60 * 1000,
    max: 100,
    standardHeaders: true,
    legacyHeaders: false,
  });
  app.use('/api', limiter);

  // Auth (skips health)
  app.use(apiKeyAuth);

  const timezone = services.config.timezone;
  app.use('/api/chat', createChatRouter(services.engine, timezone));
  app.use('/api/calendar', createCalendarRouter(services.calendarQuery, timezone));

  app.get('/health', async (_req, res) => {
    const checks: Record<string, { status: string; error?: string }> = {};
    for (const [name, check] of Object.entries(options.healthChecks ?? {})) {
      checks[name] = await check();
    }
    const healthy = Object.values(checks).every((c) => c.status === 'healthy');
    res.status(healthy ? 200 : 503).json({
      status: healthy ? 'ok' : 'degraded',
      calendar: services.provider.name,
      checks,
      timestamp: new Date().toISOString(),
    });
  });

  if (options.sentry) {
    Sentry.setupExpressErrorHandler(app);
  }
  app.use(errorHandler);

  return app;
}
