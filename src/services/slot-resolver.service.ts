import { AvailabilityIndex } from './availability.service';
import { NormalizeContext, TimeExpressionNormalizer } from './time-normalizer.service';
import { BookingIntent, ResolutionOutcome, TimeInterval } from '../types/scheduling';
import { BusinessHoursConfig, isWithinBusinessHours } from '../utils/businessHours';
import { logger } from '../utils/logger';

export interface ResolveContext {
  calendarIds: string[];
  normalize: NormalizeContext;
  /** Event being rescheduled; its current slot does not count as busy. */
  ignoreEventId?: string;
}

export interface SlotResolverOptions {
  maxAlternatives: number;
  granularityMinutes: number;
  businessHours: BusinessHoursConfig;
}

/**
 * Picks a slot for an intent: the first free candidate in the order the user
 * gave them, otherwise nearby alternatives for the user to choose from. It
 * never substitutes a time on its own.
 */
export class SlotResolver {
  constructor(
    private normalizer: TimeExpressionNormalizer,
    private options: SlotResolverOptions
  ) {}

  /** Throws AmbiguousTimeExpression when a fuzzy constraint cannot be expanded. */
  resolve(intent: BookingIntent, index: AvailabilityIndex, context: ResolveContext): ResolutionOutcome {
    const candidates = this.candidatesFor(intent, context);
    if (candidates.length === 0) {
      return { kind: 'no_availability' };
    }

    const accepted = candidates.find(
      (c) => index.covers(c, context.calendarIds) && !index.overlaps(c, context.calendarIds, context.ignoreEventId)
    );
    if (accepted) {
      logger.debug('Candidate accepted', { interval: accepted });
      return { kind: 'accepted', interval: accepted };
    }

    const timezone = context.normalize.timezone;
    const alternatives = index.freeSlotsNear(
      candidates[0],
      this.options.maxAlternatives,
      this.options.granularityMinutes,
      (slot) => isWithinBusinessHours(slot, timezone, this.options.businessHours),
      context.calendarIds,
      context.ignoreEventId
    );

    logger.debug('All candidates conflict', {
      candidates: candidates.length,
      alternatives: alternatives.length,
    });

    if (alternatives.length === 0) {
      return { kind: 'no_availability' };
    }
    return { kind: 'needs_disambiguation', alternatives };
  }

  private candidatesFor(intent: BookingIntent, context: ResolveContext): TimeInterval[] {
    if (intent.candidateIntervals.length > 0) {
      return intent.candidateIntervals;
    }
    if (intent.constraintDescription) {
      return this.normalizer.normalize(intent.constraintDescription, {
        ...context.normalize,
        durationMinutes: intent.durationMinutes ?? context.normalize.durationMinutes,
      });
    }
    return [];
  }
}
