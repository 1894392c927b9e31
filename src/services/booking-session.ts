import { v4 as uuidv4 } from 'uuid';
import { AvailabilityIndex } from './availability.service';
import { CalendarWriter, idempotencyKeyFor } from './calendar-writer.service';
import { SlotResolver } from './slot-resolver.service';
import { NormalizeContext, TimeExpressionNormalizer, parseDurationMinutes } from './time-normalizer.service';
import { SchedulingConfig } from '../config/scheduling';
import { ExtractedEntities } from '../types/extraction';
import { BookingIntent, ResolutionOutcome, TERMINAL_STATES, TimeInterval } from '../types/scheduling';
import { SessionRecord, TurnOutcome } from '../types/session';
import {
  AmbiguousTimeExpression,
  AvailabilitySourceUnavailable,
  CalendarUnavailable,
  CalendarWriteConflict,
  NoAvailability,
  SessionAbandoned,
} from '../utils/errors';
import { MINUTE_MS, formatInterval, toMillis } from '../utils/interval';
import { logger } from '../utils/logger';
import { withRetry } from '../utils/retry';

export type SessionTurn =
  | { kind: 'entities'; entities: ExtractedEntities }
  | { kind: 'selection'; choice: number };

export interface SessionDependencies {
  normalizer: TimeExpressionNormalizer;
  resolver: SlotResolver;
  index: AvailabilityIndex;
  writer: CalendarWriter;
  config: SchedulingConfig;
  now?: () => Date;
}

export interface SessionSeed {
  calendarId?: string;
  timezone?: string;
  intent?: Partial<BookingIntent>;
  existingEventId?: string;
}

export const CANCELLED_REASON = 'cancelled';

const QUESTIONS = {
  subject: 'What is the meeting about?',
  duration: 'How long should the meeting be?',
  time: 'When would you like to meet?',
} as const;

export function createSessionRecord(
  id: string,
  config: SchedulingConfig,
  seed: SessionSeed = {},
  now: Date = new Date()
): SessionRecord {
  const timestamp = now.toISOString();
  return {
    id,
    intentId: uuidv4(),
    state: 'COLLECTING',
    intent: {
      attendees: [],
      candidateIntervals: [],
      ...seed.intent,
    },
    calendarId: seed.calendarId ?? config.calendarId,
    timezone: seed.timezone ?? config.timezone,
    alternatives: [],
    invalidSelections: 0,
    conflictRetries: 0,
    writeIssued: false,
    existingEventId: seed.existingEventId,
    createdAt: timestamp,
    updatedAt: timestamp,
  };
}

/**
 * Drives one booking conversation:
 * COLLECTING -> RESOLVING -> (AWAITING_DISAMBIGUATION ->) CONFIRMED | FAILED.
 *
 * Normalization and resolution problems become questions or a terminal
 * failure here; they never reach the caller as exceptions.
 */
export class BookingSession {
  private now: () => Date;

  constructor(private record: SessionRecord, private deps: SessionDependencies) {
    this.now = deps.now ?? (() => new Date());
  }

  get id(): string {
    return this.record.id;
  }

  get state(): SessionRecord['state'] {
    return this.record.state;
  }

  get isTerminal(): boolean {
    return TERMINAL_STATES.includes(this.record.state);
  }

  toRecord(): SessionRecord {
    return this.record;
  }

  async handleTurn(turn: SessionTurn): Promise<TurnOutcome> {
    const outcome = await this.dispatch(turn);
    this.record.updatedAt = this.now().toISOString();
    return outcome;
  }

  /** Moves a live session to FAILED. Terminal sessions are left as they are. */
  cancel(): TurnOutcome {
    if (this.isTerminal) return this.terminalOutcome();
    logger.info('Booking session cancelled', { sessionId: this.record.id, state: this.record.state });
    this.record.updatedAt = this.now().toISOString();
    return this.fail(CANCELLED_REASON);
  }

  private async dispatch(turn: SessionTurn): Promise<TurnOutcome> {
    switch (this.record.state) {
      case 'CONFIRMED':
      case 'FAILED':
        return this.terminalOutcome();

      case 'AWAITING_DISAMBIGUATION':
        return this.handleAwaiting(turn);

      case 'COLLECTING':
      case 'RESOLVING': {
        if (turn.kind === 'selection') {
          return { question: `There is nothing to choose from yet. ${this.nextQuestion() ?? QUESTIONS.time}` };
        }
        const problem = this.merge(turn.entities);
        if (problem) return { question: problem };
        return this.advance();
      }
    }
  }

  private async handleAwaiting(turn: SessionTurn): Promise<TurnOutcome> {
    if (turn.kind === 'selection') {
      const picked = this.record.alternatives[turn.choice - 1];
      if (Number.isInteger(turn.choice) && picked) {
        logger.info('Alternative selected', { sessionId: this.record.id, choice: turn.choice });
        this.record.intent.candidateIntervals = [picked];
        this.record.intent.constraintDescription = undefined;
        this.record.intent.timeText = undefined;
        this.record.alternatives = [];
        this.record.invalidSelections = 0;
        this.record.state = 'RESOLVING';
        return this.resolve();
      }
      return this.invalidSelection();
    }

    const { entities } = turn;
    const offersNewConstraint = entities.timeText !== undefined || entities.durationText !== undefined;
    if (!offersNewConstraint) {
      this.merge(entities);
      return this.invalidSelection();
    }

    const problem = this.merge(entities);
    if (problem) return this.invalidSelection(problem);

    this.record.alternatives = [];
    this.record.invalidSelections = 0;
    this.record.state = 'RESOLVING';
    return this.advance();
  }

  private invalidSelection(reprompt?: string): TurnOutcome {
    this.record.invalidSelections += 1;
    logger.info('Invalid selection', {
      sessionId: this.record.id,
      invalidSelections: this.record.invalidSelections,
    });

    if (this.record.invalidSelections >= this.deps.config.maxInvalidSelections) {
      return this.fail(new SessionAbandoned().message);
    }
    const count = this.record.alternatives.length;
    return {
      question: reprompt ?? `Please reply with a number from 1 to ${count}, or suggest another time.`,
    };
  }

  /** Applies validated fields to the intent. Returns a re-prompt when a field cannot be used. */
  private merge(entities: ExtractedEntities): string | null {
    const intent = this.record.intent;

    if (entities.subject) intent.subject = entities.subject;

    if (entities.attendees) {
      intent.attendees = [...new Set([...intent.attendees, ...entities.attendees])];
    }

    if (entities.durationText) {
      const minutes = parseDurationMinutes(entities.durationText);
      if (minutes === null) {
        return `I couldn't tell how long "${entities.durationText}" is. How many minutes should the meeting take?`;
      }
      intent.durationMinutes = minutes;
    }

    const timeText = entities.timeText ?? (entities.durationText ? intent.timeText : undefined);
    if (timeText) {
      try {
        this.applyTime(timeText);
      } catch (error) {
        if (!(error instanceof AmbiguousTimeExpression)) throw error;
        logger.info('Time expression rejected', { sessionId: this.record.id, fragment: error.fragment });
        this.clearTime();
        return `${error.message}. Could you give a day and time, like "Tuesday at 3pm"?`;
      }
    }

    return null;
  }

  /**
   * Turns time text into candidates: one interval for an exact time, a fuzzy
   * constraint for anything wider.
   */
  private applyTime(timeText: string): void {
    const intent = this.record.intent;
    const candidates = this.deps.normalizer.normalize(timeText, this.normalizeContext());

    intent.timeText = timeText;
    if (candidates.length === 1) {
      intent.candidateIntervals = candidates;
      intent.constraintDescription = undefined;
    } else {
      intent.candidateIntervals = [];
      intent.constraintDescription = timeText;
    }
  }

  private clearTime(): void {
    const intent = this.record.intent;
    intent.timeText = undefined;
    intent.candidateIntervals = [];
    intent.constraintDescription = undefined;
  }

  private nextQuestion(): string | null {
    const intent = this.record.intent;
    if (!intent.subject) return QUESTIONS.subject;
    if (!intent.durationMinutes) return QUESTIONS.duration;
    if (intent.candidateIntervals.length === 0 && !intent.constraintDescription) return QUESTIONS.time;
    return null;
  }

  private async advance(): Promise<TurnOutcome> {
    const question = this.nextQuestion();
    if (question) {
      this.record.state = 'COLLECTING';
      return { question };
    }
    this.record.state = 'RESOLVING';
    return this.resolve();
  }

  private async resolve(): Promise<TurnOutcome> {
    const { calendarId } = this.record;
    const intent = this.record.intent;

    try {
      await this.ensureAvailability();
    } catch (error) {
      if (!(error instanceof AvailabilitySourceUnavailable)) throw error;
      logger.warn('Availability still unavailable, session stays in RESOLVING', {
        sessionId: this.record.id,
        calendarId,
      });
      return {
        question: "I couldn't reach the calendar just now. Send any message and I'll try again.",
      };
    }

    let outcome: ResolutionOutcome;
    try {
      outcome = this.deps.resolver.resolve(intent, this.deps.index, {
        calendarIds: [calendarId],
        normalize: this.normalizeContext(),
        ignoreEventId: this.record.existingEventId,
      });
    } catch (error) {
      if (!(error instanceof AmbiguousTimeExpression)) throw error;
      this.clearTime();
      this.record.state = 'COLLECTING';
      return { question: `${error.message}. ${QUESTIONS.time}` };
    }

    switch (outcome.kind) {
      case 'accepted':
        return this.confirm(outcome.interval);

      case 'needs_disambiguation':
        this.record.state = 'AWAITING_DISAMBIGUATION';
        this.record.alternatives = outcome.alternatives;
        this.record.invalidSelections = 0;
        logger.info('Offering alternatives', {
          sessionId: this.record.id,
          alternatives: outcome.alternatives.length,
        });
        return { question: this.alternativesQuestion(outcome.alternatives) };

      case 'no_availability':
        return this.fail(new NoAvailability().message);
    }
  }

  /** Refreshes the snapshot when it is stale or does not reach the lookahead horizon. */
  private async ensureAvailability(): Promise<void> {
    const { index, config } = this.deps;
    const { calendarId } = this.record;
    const nowMs = this.now().getTime();
    const window: TimeInterval = {
      start: new Date(nowMs).toISOString(),
      end: new Date(nowMs + config.lookaheadDays * 24 * 60 * MINUTE_MS).toISOString(),
    };

    if (!index.isStale(calendarId) && index.covers(this.firstCandidateOrWindow(window), [calendarId])) {
      return;
    }

    await withRetry(() => index.refresh(calendarId, window), {
      ...config.refreshRetry,
      operation: 'availability.refresh',
      shouldRetry: (error) => error instanceof AvailabilitySourceUnavailable,
    });
  }

  private firstCandidateOrWindow(window: TimeInterval): TimeInterval {
    const first = this.record.intent.candidateIntervals[0];
    if (first && toMillis(first.start) >= toMillis(window.start)) return first;
    return { start: window.start, end: new Date(toMillis(window.start) + MINUTE_MS).toISOString() };
  }

  private async confirm(interval: TimeInterval): Promise<TurnOutcome> {
    if (this.record.result) {
      logger.info('Booking already written, returning stored result', { sessionId: this.record.id });
      this.record.state = 'CONFIRMED';
      return { result: this.record.result };
    }

    const intent = this.record.intent;
    this.record.writeIssued = true;

    try {
      const result = await this.deps.writer.write({
        idempotencyKey: idempotencyKeyFor(this.record.id, this.record.intentId),
        calendarId: this.record.calendarId,
        interval,
        subject: intent.subject ?? 'Meeting',
        attendees: intent.attendees,
        timezone: this.record.timezone,
        eventId: this.record.existingEventId,
      });

      this.record.result = result;
      this.record.state = 'CONFIRMED';
      logger.info('Booking confirmed', {
        sessionId: this.record.id,
        eventId: result.eventId,
        status: result.status,
      });
      return { result };
    } catch (error) {
      if (error instanceof CalendarWriteConflict) {
        return this.handleConflict();
      }
      if (error instanceof CalendarUnavailable) {
        logger.error('Calendar write failed', { sessionId: this.record.id, error: error.message });
        return this.fail(`The calendar could not be updated: ${error.message}`);
      }
      throw error;
    }
  }

  private async handleConflict(): Promise<TurnOutcome> {
    const { calendarId } = this.record;
    this.deps.index.invalidate(calendarId);
    this.record.conflictRetries += 1;

    logger.warn('Write conflict, re-resolving', {
      sessionId: this.record.id,
      conflictRetries: this.record.conflictRetries,
    });

    if (this.record.conflictRetries > this.deps.config.maxConflictRetries) {
      return this.fail('The calendar kept changing while booking. Please try again later.');
    }

    this.record.state = 'RESOLVING';
    return this.resolve();
  }

  private alternativesQuestion(alternatives: TimeInterval[]): string {
    const lines = alternatives.map(
      (slot, i) => `${i + 1}. ${formatInterval(slot, this.record.timezone)}`
    );
    return [
      'That time is not available. The closest open times are:',
      ...lines,
      'Reply with a number, or suggest another time.',
    ].join('\n');
  }

  private normalizeContext(): NormalizeContext {
    const { config } = this.deps;
    return {
      reference: this.now(),
      timezone: this.record.timezone,
      durationMinutes: this.record.intent.durationMinutes ?? config.defaultDurationMinutes,
      weekStart: config.weekStart,
      businessHours: config.businessHours,
    };
  }

  private fail(reason: string): TurnOutcome {
    this.record.state = 'FAILED';
    this.record.failureReason = reason;
    logger.info('Booking session failed', { sessionId: this.record.id, reason });
    return { failure: reason };
  }

  private terminalOutcome(): TurnOutcome {
    if (this.record.state === 'CONFIRMED' && this.record.result) {
      return { result: this.record.result };
    }
    return { failure: this.record.failureReason ?? CANCELLED_REASON };
  }
}
