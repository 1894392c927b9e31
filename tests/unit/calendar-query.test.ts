jest.mock('../../src/utils/logger', () => ({
  logger: {
    info: jest.fn(),
    debug: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
  },
}));

jest.mock('../../src/config/env', () => ({
  env: {
    NODE_ENV: 'test',
    REDIS_URL: 'redis://localhost:6379',
  },
}));

import { InMemoryCalendarAdapter } from '../../src/services/calendar/memory.adapter';
import { CalendarQueryService } from '../../src/services/calendar-query.service';
import { ValidationError } from '../../src/utils/errors';
import { testConfig, utc } from '../helpers/scheduling';

describe('CalendarQueryService', () => {
  let provider: InMemoryCalendarAdapter;
  let query: CalendarQueryService;

  beforeEach(() => {
    provider = new InMemoryCalendarAdapter();
    provider.seed('primary', utc('2024-03-05T10:00', '2024-03-05T11:00'), 'Standup');
    query = new CalendarQueryService(provider, testConfig());
  });

  describe('isFree', () => {
    it('should check the interval against the calendar', async () => {
      await expect(query.isFree(utc('2024-03-05T10:30', '2024-03-05T11:30'))).resolves.toBe(false);
      await expect(query.isFree(utc('2024-03-05T11:00', '2024-03-05T11:30'))).resolves.toBe(true);
    });

    it('should reject an interval that ends before it starts', async () => {
      await expect(query.isFree(utc('2024-03-05T11:00', '2024-03-05T10:00'))).rejects.toThrow(ValidationError);
    });
  });

  describe('slotsOn', () => {
    it('should list the business day in back-to-back slots', async () => {
      const slots = await query.slotsOn('2024-03-05', 60, 'UTC');

      expect(slots).toHaveLength(8);
      expect(slots[0]).toEqual({ ...utc('2024-03-05T09:00', '2024-03-05T10:00'), available: true });
      expect(slots[1]).toEqual({ ...utc('2024-03-05T10:00', '2024-03-05T11:00'), available: false });
      expect(slots[7]).toEqual({ ...utc('2024-03-05T16:00', '2024-03-05T17:00'), available: true });
    });

    it('should return nothing on a closed day', async () => {
      await expect(query.slotsOn('2024-03-09', 60, 'UTC')).resolves.toEqual([]);
    });

    it('should reject an invalid date', async () => {
      await expect(query.slotsOn('next tuesday', 60, 'UTC')).rejects.toThrow(ValidationError);
    });
  });
});
