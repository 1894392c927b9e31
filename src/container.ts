import { SchedulingConfig } from './config/scheduling';
import { CompensationJobData } from './config/queue';
import { AvailabilityIndex } from './services/availability.service';
import { BookingEngine } from './services/booking-engine.service';
import { CalendarQueryService } from './services/calendar-query.service';
import { CalendarWriter } from './services/calendar-writer.service';
import { SlotResolver } from './services/slot-resolver.service';
import { TimeExpressionNormalizer } from './services/time-normalizer.service';
import { CalendarProvider } from './types/calendar';
import { EntityExtractor } from './types/extraction';
import { SessionStore } from './types/session';

export interface ServiceDependencies {
  config: SchedulingConfig;
  provider: CalendarProvider;
  store: SessionStore;
  extractor: EntityExtractor;
  compensate: (job: CompensationJobData) => Promise<void>;
  now?: () => Date;
}

export interface Services {
  config: SchedulingConfig;
  provider: CalendarProvider;
  index: AvailabilityIndex;
  writer: CalendarWriter;
  engine: BookingEngine;
  calendarQuery: CalendarQueryService;
}

export function createServices(deps: ServiceDependencies): Services {
  const { config, provider, store, extractor, compensate, now } = deps;

  const normalizer = new TimeExpressionNormalizer({
    defaultDurationMinutes: config.defaultDurationMinutes,
    weekStart: config.weekStart,
    businessHours: config.businessHours,
  });
  const index = new AvailabilityIndex(provider, {
    staleAfterMs: config.staleAfterMs,
    now: now ? () => now().getTime() : undefined,
  });
  const resolver = new SlotResolver(normalizer, {
    maxAlternatives: config.maxAlternatives,
    granularityMinutes: config.granularityMinutes,
    businessHours: config.businessHours,
  });
  const writer = new CalendarWriter(provider, config.writeRetry);

  const engine = new BookingEngine({
    store,
    extractor,
    compensate,
    session: { normalizer, resolver, index, writer, config, now },
  });

  return {
    config,
    provider,
    index,
    writer,
    engine,
    calendarQuery: new CalendarQueryService(provider, config),
  };
}
