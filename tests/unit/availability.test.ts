jest.mock('../../src/utils/logger', () => ({
  logger: {
    info: jest.fn(),
    debug: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
  },
}));

import { AvailabilityIndex } from '../../src/services/availability.service';
import { InMemoryCalendarAdapter } from '../../src/services/calendar/memory.adapter';
import { AvailabilitySourceUnavailable, CalendarProviderError } from '../../src/utils/errors';
import { utc } from '../helpers/scheduling';

const WINDOW = utc('2024-03-04T00:00', '2024-03-05T00:00');

describe('AvailabilityIndex', () => {
  let provider: InMemoryCalendarAdapter;
  let clock: number;
  let index: AvailabilityIndex;

  beforeEach(async () => {
    provider = new InMemoryCalendarAdapter();
    provider.seed('primary', utc('2024-03-04T10:00', '2024-03-04T11:00'));
    clock = Date.parse('2024-03-04T08:00:00.000Z');
    index = new AvailabilityIndex(provider, { staleAfterMs: 60_000, now: () => clock });
    await index.refresh('primary', WINDOW);
  });

  describe('overlaps', () => {
    it('should report an interval that intersects busy time', () => {
      expect(index.overlaps(utc('2024-03-04T10:30', '2024-03-04T11:30'))).toBe(true);
    });

    it('should treat touching endpoints as free', () => {
      expect(index.overlaps(utc('2024-03-04T09:00', '2024-03-04T10:00'))).toBe(false);
      expect(index.overlaps(utc('2024-03-04T11:00', '2024-03-04T12:00'))).toBe(false);
    });

    it('should only look at the selected calendars', () => {
      expect(index.overlaps(utc('2024-03-04T10:00', '2024-03-04T10:30'), ['team'])).toBe(false);
    });

    it('should leave out the event being moved', async () => {
      const moving = provider.seed('primary', utc('2024-03-04T14:00', '2024-03-04T15:00'));
      await index.refresh('primary', WINDOW);

      expect(index.overlaps(utc('2024-03-04T14:30', '2024-03-04T15:30'), ['primary'])).toBe(true);
      expect(index.overlaps(utc('2024-03-04T14:30', '2024-03-04T15:30'), ['primary'], moving.id)).toBe(false);
      expect(index.overlaps(utc('2024-03-04T10:30', '2024-03-04T11:30'), ['primary'], moving.id)).toBe(true);
    });
  });

  describe('covers', () => {
    it('should know which intervals fall inside the refreshed window', () => {
      expect(index.covers(utc('2024-03-04T23:00', '2024-03-05T00:00'))).toBe(true);
      expect(index.covers(utc('2024-03-04T23:30', '2024-03-05T00:30'))).toBe(false);
    });
  });

  describe('freeSlotsNear', () => {
    it('should search outward from the requested start', () => {
      const slots = index.freeSlotsNear(utc('2024-03-04T10:00', '2024-03-04T10:30'), 3, 15);

      expect(slots).toEqual([
        utc('2024-03-04T09:30', '2024-03-04T10:00'),
        utc('2024-03-04T11:00', '2024-03-04T11:30'),
        utc('2024-03-04T09:00', '2024-03-04T09:30'),
      ]);
    });

    it('should stop at the requested count', () => {
      const slots = index.freeSlotsNear(utc('2024-03-04T10:00', '2024-03-04T10:30'), 1, 15);

      expect(slots).toEqual([utc('2024-03-04T09:30', '2024-03-04T10:00')]);
    });

    it('should skip slots the filter rejects', () => {
      const slots = index.freeSlotsNear(
        utc('2024-03-04T10:00', '2024-03-04T10:30'),
        1,
        15,
        (slot) => slot.start >= '2024-03-04T11:00'
      );

      expect(slots).toEqual([utc('2024-03-04T11:00', '2024-03-04T11:30')]);
    });

    it('should return nothing when no snapshot exists', () => {
      index.invalidate('primary');

      expect(index.freeSlotsNear(utc('2024-03-04T10:00', '2024-03-04T10:30'), 3, 15)).toEqual([]);
    });
  });

  describe('refresh', () => {
    it('should keep the previous snapshot when the source fails', async () => {
      jest
        .spyOn(provider, 'listBusy')
        .mockRejectedValueOnce(new CalendarProviderError('TransientFailure', 'Backend error'));

      await expect(index.refresh('primary', WINDOW)).rejects.toThrow(AvailabilitySourceUnavailable);
      expect(index.busyIntervals('primary')).toHaveLength(1);
      expect(index.overlaps(utc('2024-03-04T10:00', '2024-03-04T10:30'))).toBe(true);
    });

    it('should replace the snapshot on success', async () => {
      provider.seed('primary', utc('2024-03-04T14:00', '2024-03-04T15:00'));

      await index.refresh('primary', WINDOW);

      expect(index.busyIntervals('primary')).toHaveLength(2);
    });

    it('should chain refreshes of the same calendar', async () => {
      let release: () => void = () => undefined;
      const gate = new Promise<void>((resolve) => {
        release = resolve;
      });
      const listBusy = jest.spyOn(provider, 'listBusy').mockImplementationOnce(async () => {
        await gate;
        return [];
      });

      const first = index.refresh('primary', WINDOW);
      const second = index.refresh('primary', WINDOW);
      await new Promise((resolve) => setImmediate(resolve));

      expect(listBusy).toHaveBeenCalledTimes(1);

      release();
      await Promise.all([first, second]);

      expect(listBusy).toHaveBeenCalledTimes(2);
      expect(index.busyIntervals('primary')).toHaveLength(1);
    });
  });

  describe('staleness', () => {
    it('should go stale after the configured age', () => {
      expect(index.isStale('primary')).toBe(false);

      clock += 60_001;

      expect(index.isStale('primary')).toBe(true);
    });

    it('should be stale after invalidate', () => {
      index.invalidate('primary');

      expect(index.isStale('primary')).toBe(true);
      expect(index.busyIntervals('primary')).toEqual([]);
    });
  });
});
