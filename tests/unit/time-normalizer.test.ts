jest.mock('../../src/utils/logger', () => ({
  logger: {
    info: jest.fn(),
    debug: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
  },
}));

import { TimeExpressionNormalizer, parseDurationMinutes } from '../../src/services/time-normalizer.service';
import { AmbiguousTimeExpression } from '../../src/utils/errors';
import { toZonedIso } from '../../src/utils/interval';
import { utc } from '../helpers/scheduling';

describe('TimeExpressionNormalizer', () => {
  const normalizer = new TimeExpressionNormalizer();

  describe('exact times', () => {
    it('should resolve "tomorrow at 10am" in the user zone', () => {
      const [slot, ...rest] = normalizer.normalize('tomorrow at 10am', {
        reference: new Date('2024-03-01T05:00:00.000Z'),
        timezone: 'UTC-5',
      });

      expect(rest).toHaveLength(0);
      expect(slot).toEqual(utc('2024-03-02T15:00', '2024-03-02T15:30'));
      expect(toZonedIso(slot.start, 'UTC-5')).toBe('2024-03-02T10:00:00.000-05:00');
    });

    it('should use the requested duration for the end', () => {
      const slots = normalizer.normalize('tomorrow at 10am', {
        reference: new Date('2024-03-04T08:00:00.000Z'),
        timezone: 'UTC',
        durationMinutes: 45,
      });

      expect(slots).toEqual([utc('2024-03-05T10:00', '2024-03-05T10:45')]);
    });

    it('should pick "next friday" from the week after the current one', () => {
      const reference = new Date('2024-03-10T12:00:00.000Z'); // Sunday

      const mondayWeeks = normalizer.normalize('next friday at 9am', {
        reference,
        timezone: 'UTC',
        weekStart: 1,
      });
      const sundayWeeks = normalizer.normalize('next friday at 9am', {
        reference,
        timezone: 'UTC',
        weekStart: 7,
      });

      expect(mondayWeeks[0].start).toBe('2024-03-15T09:00:00.000Z');
      expect(sundayWeeks[0].start).toBe('2024-03-22T09:00:00.000Z');
    });

    it('should move a bare weekday equal to today a week ahead', () => {
      const slots = normalizer.normalize('friday at 3pm', {
        reference: new Date('2024-03-15T08:00:00.000Z'), // Friday
        timezone: 'UTC',
      });

      expect(slots).toEqual([utc('2024-03-22T15:00', '2024-03-22T15:30')]);
    });

    it('should count relative offsets from the reference minute', () => {
      const slots = normalizer.normalize('in 2 hours', {
        reference: new Date('2024-03-04T08:10:30.000Z'),
        timezone: 'UTC',
      });

      expect(slots).toEqual([utc('2024-03-04T10:10', '2024-03-04T10:40')]);
    });
  });

  describe('fuzzy periods', () => {
    it('should expand "tomorrow afternoon" into stepped candidates', () => {
      const slots = normalizer.normalize('tomorrow afternoon', {
        reference: new Date('2024-03-04T08:00:00.000Z'),
        timezone: 'UTC',
        durationMinutes: 60,
      });

      expect(slots).toHaveLength(9);
      expect(slots[0]).toEqual(utc('2024-03-05T12:00', '2024-03-05T13:00'));
      expect(slots[8]).toEqual(utc('2024-03-05T16:00', '2024-03-05T17:00'));
    });

    it('should expand "this weekend" over both days even when the business is closed', () => {
      const slots = normalizer.normalize('this weekend', {
        reference: new Date('2024-03-04T08:00:00.000Z'),
        timezone: 'UTC',
        durationMinutes: 60,
      });

      expect(slots).toHaveLength(16);
      expect(slots[0]).toEqual(utc('2024-03-09T09:00', '2024-03-09T10:00'));
      expect(slots[8]).toEqual(utc('2024-03-10T09:00', '2024-03-10T10:00'));
      expect(slots[15]).toEqual(utc('2024-03-10T16:00', '2024-03-10T17:00'));
    });

    it('should start "next weekend" a week after this one', () => {
      const slots = normalizer.normalize('next weekend', {
        reference: new Date('2024-03-04T08:00:00.000Z'),
        timezone: 'UTC',
        durationMinutes: 60,
      });

      expect(slots).toHaveLength(16);
      expect(slots[0]).toEqual(utc('2024-03-16T09:00', '2024-03-16T10:00'));
    });

    it('should place a clock time on each weekend day', () => {
      const slots = normalizer.normalize('this weekend at 10am', {
        reference: new Date('2024-03-04T08:00:00.000Z'),
        timezone: 'UTC',
      });

      expect(slots).toEqual([
        utc('2024-03-09T10:00', '2024-03-09T10:30'),
        utc('2024-03-10T10:00', '2024-03-10T10:30'),
      ]);
    });
  });

  describe('rejections', () => {
    it('should throw AmbiguousTimeExpression for text with no time in it', () => {
      expect(() =>
        normalizer.normalize('whenever works', { reference: new Date(), timezone: 'UTC' })
      ).toThrow(AmbiguousTimeExpression);
    });

    it('should throw AmbiguousTimeExpression for an empty fragment', () => {
      expect(() => normalizer.normalize('  ', { reference: new Date(), timezone: 'UTC' })).toThrow(
        'No time was given'
      );
    });
  });
});

describe('parseDurationMinutes', () => {
  it.each([
    ['45 minutes', 45],
    ['an hour and a half', 90],
    ['1h30', 90],
    ['half an hour', 30],
    ['2 hours', 120],
    ['90 min', 90],
  ])('should read "%s" as %d minutes', (text, minutes) => {
    expect(parseDurationMinutes(text)).toBe(minutes);
  });

  it.each(['forever', '0 minutes', '25 hours', ''])('should reject "%s"', (text) => {
    expect(parseDurationMinutes(text)).toBeNull();
  });
});
