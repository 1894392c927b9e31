import { CalendarProvider } from '../types/calendar';
import { BusyInterval, TimeInterval } from '../types/scheduling';
import { AvailabilitySourceUnavailable, describeError } from '../utils/errors';
import { MINUTE_MS, intervalFromMillis, overlapsMs, toMillis } from '../utils/interval';
import { logger } from '../utils/logger';

interface NormalizedBusy {
  startMs: number;
  endMs: number;
  eventId?: string;
}

/** Immutable view of one calendar's busy time over a fetched window. */
interface Snapshot {
  calendarId: string;
  windowStartMs: number;
  windowEndMs: number;
  busy: readonly NormalizedBusy[];
  intervals: readonly BusyInterval[];
  refreshedAt: number;
}

export interface AvailabilityOptions {
  staleAfterMs: number;
  now?: () => number;
}

/**
 * Cached busy intervals per calendar. A refresh builds a new snapshot and
 * swaps it in; readers never see a half-built one. Refreshes of the same
 * calendar are chained so they never interleave.
 */
export class AvailabilityIndex {
  private snapshots = new Map<string, Snapshot>();
  private refreshing = new Map<string, Promise<unknown>>();
  private now: () => number;

  constructor(private source: CalendarProvider, private options: AvailabilityOptions) {
    this.now = options.now ?? Date.now;
  }

  async refresh(calendarId: string, window: TimeInterval): Promise<void> {
    const previous = this.refreshing.get(calendarId) ?? Promise.resolve();
    const run = () => this.load(calendarId, window);
    const current = previous.then(run, run);
    this.refreshing.set(calendarId, current);

    try {
      await current;
    } finally {
      if (this.refreshing.get(calendarId) === current) {
        this.refreshing.delete(calendarId);
      }
    }
  }

  private async load(calendarId: string, window: TimeInterval): Promise<void> {
    const windowStartMs = toMillis(window.start);
    const windowEndMs = toMillis(window.end);

    let intervals: BusyInterval[];
    try {
      intervals = await this.source.listBusy(calendarId, window.start, window.end);
    } catch (error) {
      logger.warn('Availability refresh failed', { calendarId, error: describeError(error) });
      throw new AvailabilitySourceUnavailable(calendarId, error);
    }

    const busy = intervals
      .map((b) => ({ startMs: toMillis(b.interval.start), endMs: toMillis(b.interval.end), eventId: b.eventId }))
      .filter((b) => Number.isFinite(b.startMs) && Number.isFinite(b.endMs) && b.endMs > b.startMs)
      .sort((a, b) => a.startMs - b.startMs);

    this.snapshots.set(calendarId, {
      calendarId,
      windowStartMs,
      windowEndMs,
      busy,
      intervals: [...intervals],
      refreshedAt: this.now(),
    });

    logger.debug('Availability refreshed', { calendarId, busy: busy.length, window });
  }

  isStale(calendarId: string): boolean {
    const snapshot = this.snapshots.get(calendarId);
    if (!snapshot) return true;
    return this.now() - snapshot.refreshedAt > this.options.staleAfterMs;
  }

  invalidate(calendarId: string): void {
    this.snapshots.delete(calendarId);
  }

  busyIntervals(calendarId: string): readonly BusyInterval[] {
    return this.snapshots.get(calendarId)?.intervals ?? [];
  }

  /** True when every selected snapshot's window contains the interval. */
  covers(interval: TimeInterval, calendarIds?: string[]): boolean {
    const selected = this.select(calendarIds);
    if (selected.length === 0) return false;
    const startMs = toMillis(interval.start);
    const endMs = toMillis(interval.end);
    return selected.every((s) => startMs >= s.windowStartMs && endMs <= s.windowEndMs);
  }

  /** `ignoreEventId` leaves out an event that is being moved. */
  overlaps(interval: TimeInterval, calendarIds?: string[], ignoreEventId?: string): boolean {
    const selected = this.select(calendarIds);
    return this.overlapsMs(toMillis(interval.start), toMillis(interval.end), selected, ignoreEventId);
  }

  /**
   * Up to `count` mutually disjoint free slots as long as `interval`, searched
   * outward from its start one granularity step at a time (forward before
   * backward at equal distance), inside the refreshed window only.
   */
  freeSlotsNear(
    interval: TimeInterval,
    count: number,
    granularityMinutes: number,
    accept: (slot: TimeInterval) => boolean = () => true,
    calendarIds?: string[],
    ignoreEventId?: string
  ): TimeInterval[] {
    const selected = this.select(calendarIds);
    if (selected.length === 0 || count <= 0) return [];

    const horizonStart = Math.max(...selected.map((s) => s.windowStartMs));
    const horizonEnd = Math.min(...selected.map((s) => s.windowEndMs));
    const originMs = toMillis(interval.start);
    const lengthMs = toMillis(interval.end) - originMs;
    const stepMs = Math.max(1, granularityMinutes) * MINUTE_MS;
    if (lengthMs <= 0 || horizonEnd - horizonStart < lengthMs) return [];

    const found: TimeInterval[] = [];
    const taken: NormalizedBusy[] = [];

    const consider = (startMs: number): void => {
      const endMs = startMs + lengthMs;
      if (this.overlapsMs(startMs, endMs, selected, ignoreEventId)) return;
      if (taken.some((t) => overlapsMs(startMs, endMs, t.startMs, t.endMs))) return;
      const slot = intervalFromMillis(startMs, endMs);
      if (!accept(slot)) return;
      taken.push({ startMs, endMs });
      found.push(slot);
    };

    for (let step = 0; found.length < count; step++) {
      const forward = originMs + step * stepMs;
      const backward = originMs - step * stepMs;
      const forwardOpen = forward >= horizonStart && forward + lengthMs <= horizonEnd;
      const backwardOpen = step > 0 && backward >= horizonStart && backward + lengthMs <= horizonEnd;

      if (!forwardOpen && !backwardOpen && forward + lengthMs > horizonEnd && backward < horizonStart) {
        break;
      }
      if (forwardOpen) consider(forward);
      if (backwardOpen && found.length < count) consider(backward);
    }

    return found;
  }

  private select(calendarIds?: string[]): Snapshot[] {
    if (!calendarIds) return [...this.snapshots.values()];
    return calendarIds
      .map((id) => this.snapshots.get(id))
      .filter((s): s is Snapshot => s !== undefined);
  }

  private overlapsMs(startMs: number, endMs: number, snapshots: Snapshot[], ignoreEventId?: string): boolean {
    return snapshots.some((s) =>
      s.busy.some(
        (b) => (!ignoreEventId || b.eventId !== ignoreEventId) && overlapsMs(startMs, endMs, b.startMs, b.endMs)
      )
    );
  }
}
