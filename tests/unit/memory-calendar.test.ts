jest.mock('../../src/utils/logger', () => ({
  logger: {
    info: jest.fn(),
    debug: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
  },
}));

import { validate, version } from 'uuid';
import { InMemoryCalendarAdapter } from '../../src/services/calendar/memory.adapter';
import { utc } from '../helpers/scheduling';

describe('InMemoryCalendarAdapter', () => {
  it('should give every event a random uuid', async () => {
    const calendar = new InMemoryCalendarAdapter();
    const seeded = calendar.seed('primary', utc('2024-03-05T10:00', '2024-03-05T11:00'));
    const created = await calendar.createEvent({
      idempotencyKey: 'key-1',
      calendarId: 'primary',
      interval: utc('2024-03-05T13:00', '2024-03-05T13:30'),
      subject: 'Design review',
      attendees: [],
      timezone: 'UTC',
    });

    for (const id of [seeded.id, created]) {
      expect(validate(id)).toBe(true);
      expect(version(id)).toBe(4);
    }
    expect(created).not.toBe(seeded.id);
  });

  it('should report busy time with the event behind it', async () => {
    const calendar = new InMemoryCalendarAdapter();
    const seeded = calendar.seed('primary', utc('2024-03-05T10:00', '2024-03-05T11:00'));

    await expect(
      calendar.listBusy('primary', '2024-03-05T00:00:00.000Z', '2024-03-06T00:00:00.000Z')
    ).resolves.toEqual([
      { interval: utc('2024-03-05T10:00', '2024-03-05T11:00'), source: 'primary', eventId: seeded.id },
    ]);
  });
});
