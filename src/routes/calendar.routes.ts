import { Router, Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import { CalendarQueryService } from '../services/calendar-query.service';
import { ValidationError } from '../utils/errors';
import { toZonedIso } from '../utils/interval';

const eventsQuery = z.object({
  max: z.coerce.number().int().min(1).max(50).default(10),
  calendar_id: z.string().min(1).optional(),
});

const availabilityQuery = z.object({
  start: z.string().datetime({ offset: true }),
  end: z.string().datetime({ offset: true }),
  calendar_id: z.string().min(1).optional(),
});

const slotsQuery = z.object({
  date: z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'date must be YYYY-MM-DD'),
  duration: z.coerce.number().int().min(5).max(480).default(60),
  timezone: z.string().optional(),
  calendar_id: z.string().min(1).optional(),
});

function parseQuery<S extends z.ZodTypeAny>(schema: S, query: unknown): z.output<S> {
  const parsed = schema.safeParse(query);
  if (!parsed.success) {
    throw new ValidationError(parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join(', '));
  }
  return parsed.data;
}

export function createCalendarRouter(calendar: CalendarQueryService, defaultTimezone: string): Router {
  const router = Router();

  router.get('/events', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const query = parseQuery(eventsQuery, req.query);
      const events = await calendar.upcomingEvents(query.max, query.calendar_id);
      res.json({ success: true, events });
    } catch (error) {
      next(error);
    }
  });

  router.get('/availability', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const query = parseQuery(availabilityQuery, req.query);
      const interval = {
        start: new Date(query.start).toISOString(),
        end: new Date(query.end).toISOString(),
      };
      const available = await calendar.isFree(interval, query.calendar_id);
      res.json({ success: true, available, ...interval });
    } catch (error) {
      next(error);
    }
  });

  router.get('/slots', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const query = parseQuery(slotsQuery, req.query);
      const timezone = query.timezone ?? defaultTimezone;
      const slots = await calendar.slotsOn(query.date, query.duration, timezone, query.calendar_id);
      res.json({
        success: true,
        date: query.date,
        timezone,
        slots: slots.map((slot) => ({
          start: toZonedIso(slot.start, timezone),
          end: toZonedIso(slot.end, timezone),
          available: slot.available,
        })),
      });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
