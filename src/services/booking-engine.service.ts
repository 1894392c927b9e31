import { BookingSession, CANCELLED_REASON, SessionDependencies, SessionTurn, createSessionRecord } from './booking-session';
import { parseExtractedEntities } from './extraction/extraction.schema';
import { CompensationJobData } from '../config/queue';
import { EntityExtractor } from '../types/extraction';
import { BookingResult } from '../types/scheduling';
import { SessionRecord, SessionStore, TurnInput, TurnOutcome } from '../types/session';
import { describeError } from '../utils/errors';
import { KeyedQueue } from '../utils/keyedQueue';
import { logger } from '../utils/logger';

const CANCEL_PHRASES = new Set(['cancel', 'never mind', 'nevermind', 'stop', 'cancel it', 'cancel that']);

export function isCancelRequest(text: string): boolean {
  const normalized = text.toLowerCase().replace(/[^a-z\s]/g, ' ').replace(/\s+/g, ' ').trim();
  return CANCEL_PHRASES.has(normalized);
}

export interface RescheduleRequest {
  eventId: string;
  subject: string;
  durationMinutes: number;
  attendees?: string[];
  calendarId?: string;
  timezone?: string;
}

export interface BookingEngineDependencies {
  store: SessionStore;
  extractor: EntityExtractor;
  session: SessionDependencies;
  compensate: (job: CompensationJobData) => Promise<void>;
}

interface TurnRecord {
  outcome: TurnOutcome;
  calendarId: string;
}

/**
 * Entry point for conversation turns. Turns for one session run one at a
 * time; different sessions run concurrently.
 */
export class BookingEngine {
  private queue = new KeyedQueue();
  private inflight = new Map<string, Promise<TurnRecord>>();

  constructor(private deps: BookingEngineDependencies) {}

  async ingestTurn(sessionId: string, input: TurnInput): Promise<TurnOutcome> {
    if (typeof input === 'string' && isCancelRequest(input)) {
      return this.cancel(sessionId);
    }

    const run = this.queue.run(sessionId, () => this.processTurn(sessionId, input));
    this.inflight.set(sessionId, run);

    try {
      const { outcome } = await run;
      return outcome;
    } finally {
      if (this.inflight.get(sessionId) === run) {
        this.inflight.delete(sessionId);
      }
    }
  }

  /**
   * Cancels the booking in progress. A turn that is still running is allowed
   * to finish first; if it wrote an event, a compensating delete is queued.
   */
  async cancel(sessionId: string): Promise<TurnOutcome> {
    const pending = this.inflight.get(sessionId);

    return this.queue.run(sessionId, async () => {
      const committed = pending ? await this.settledResult(sessionId, pending) : null;
      if (committed) {
        await this.deps.compensate({
          sessionId,
          calendarId: committed.calendarId,
          eventId: committed.result.eventId,
          reason: CANCELLED_REASON,
        });
        logger.info('Cancelled after commit, compensation queued', {
          sessionId,
          eventId: committed.result.eventId,
        });
        return { failure: CANCELLED_REASON };
      }

      const record = await this.deps.store.get(sessionId);
      if (!record) {
        return { failure: 'There is no booking in progress to cancel.' };
      }

      const outcome = new BookingSession(record, this.deps.session).cancel();
      await this.deps.store.delete(sessionId);
      return outcome;
    });
  }

  /** Starts a session that moves an existing event instead of creating one. */
  async reschedule(sessionId: string, request: RescheduleRequest): Promise<TurnOutcome> {
    return this.queue.run(sessionId, async () => {
      const record = createSessionRecord(
        sessionId,
        this.deps.session.config,
        {
          calendarId: request.calendarId,
          timezone: request.timezone,
          existingEventId: request.eventId,
          intent: {
            subject: request.subject,
            durationMinutes: request.durationMinutes,
            attendees: request.attendees ?? [],
          },
        },
        this.now()
      );
      await this.deps.store.set(record);
      logger.info('Reschedule started', { sessionId, eventId: request.eventId });
      return { question: `When would you like to move "${request.subject}" to?` };
    });
  }

  private async processTurn(sessionId: string, input: TurnInput): Promise<TurnRecord> {
    const record = (await this.deps.store.get(sessionId)) ?? this.newRecord(sessionId);
    const session = new BookingSession(record, this.deps.session);
    const turn = await this.toTurn(input, record);

    logger.info('Processing turn', { sessionId, state: record.state, kind: turn.kind });
    const outcome = await session.handleTurn(turn);

    if (session.isTerminal) {
      await this.deps.store.delete(sessionId);
    } else {
      await this.deps.store.set(session.toRecord());
    }

    return { outcome, calendarId: record.calendarId };
  }

  private async toTurn(input: TurnInput, record: SessionRecord): Promise<SessionTurn> {
    if (typeof input === 'number') {
      return { kind: 'selection', choice: input };
    }

    const trimmed = input.trim();
    if (record.state === 'AWAITING_DISAMBIGUATION' && /^\d+$/.test(trimmed)) {
      return { kind: 'selection', choice: Number(trimmed) };
    }

    const raw = await this.deps.extractor.extract(trimmed, record.intent);
    return { kind: 'entities', entities: parseExtractedEntities(raw) };
  }

  private async settledResult(
    sessionId: string,
    pending: Promise<TurnRecord>
  ): Promise<{ result: BookingResult; calendarId: string } | null> {
    try {
      const { outcome, calendarId } = await pending;
      if ('result' in outcome && outcome.result.status === 'CREATED') {
        return { result: outcome.result, calendarId };
      }
      return null;
    } catch (error) {
      logger.warn('In-flight turn failed before cancel', { sessionId, error: describeError(error) });
      return null;
    }
  }

  private newRecord(sessionId: string): SessionRecord {
    logger.info('Starting booking session', { sessionId });
    return createSessionRecord(sessionId, this.deps.session.config, {}, this.now());
  }

  private now(): Date {
    return this.deps.session.now?.() ?? new Date();
  }
}
