import { Router, Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import { BookingEngine } from '../services/booking-engine.service';
import { ValidationError } from '../utils/errors';
import { toZonedIso } from '../utils/interval';
import { TurnOutcome } from '../types/session';

const turnSchema = z.object({
  session_id: z.string().min(1).max(200),
  message: z.union([z.string().min(1).max(5000), z.number().int().positive()]),
});

const cancelSchema = z.object({
  session_id: z.string().min(1).max(200),
});

const rescheduleSchema = z.object({
  session_id: z.string().min(1).max(200),
  event_id: z.string().min(1),
  subject: z.string().min(1).max(200),
  duration_minutes: z.number().int().min(1).max(1440),
  attendees: z.array(z.string().email()).optional(),
  calendar_id: z.string().min(1).optional(),
  timezone: z.string().optional(),
});

function parse<T>(schema: z.ZodType<T>, body: unknown): T {
  const parsed = schema.safeParse(body);
  if (!parsed.success) {
    throw new ValidationError(parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join(', '));
  }
  return parsed.data;
}

/** Renders a turn outcome for the HTTP client; result times are shown in the user's zone. */
export function presentOutcome(outcome: TurnOutcome, timezone: string) {
  if ('result' in outcome) {
    const { eventId, finalInterval, status } = outcome.result;
    return {
      success: true,
      type: 'result' as const,
      result: {
        event_id: eventId,
        status,
        start: toZonedIso(finalInterval.start, timezone),
        end: toZonedIso(finalInterval.end, timezone),
      },
    };
  }
  if ('question' in outcome) {
    return { success: true, type: 'question' as const, question: outcome.question };
  }
  return { success: true, type: 'failure' as const, reason: outcome.failure };
}

export function createChatRouter(engine: BookingEngine, defaultTimezone: string): Router {
  const router = Router();

  router.post('/turn', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const body = parse(turnSchema, req.body);
      const outcome = await engine.ingestTurn(body.session_id, body.message);
      res.json(presentOutcome(outcome, defaultTimezone));
    } catch (error) {
      next(error);
    }
  });

  router.post('/cancel', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const body = parse(cancelSchema, req.body);
      const outcome = await engine.cancel(body.session_id);
      res.json(presentOutcome(outcome, defaultTimezone));
    } catch (error) {
      next(error);
    }
  });

  router.post('/reschedule', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const body = parse(rescheduleSchema, req.body);
      const outcome = await engine.reschedule(body.session_id, {
        eventId: body.event_id,
        subject: body.subject,
        durationMinutes: body.duration_minutes,
        attendees: body.attendees,
        calendarId: body.calendar_id,
        timezone: body.timezone,
      });
      res.json(presentOutcome(outcome, body.timezone ?? defaultTimezone));
    } catch (error) {
      next(error);
    }
  });

  return router;
}
