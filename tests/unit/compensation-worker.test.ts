jest.mock('../../src/config/env', () => ({
  env: {
    REDIS_URL: 'redis://localhost:6379',
    NODE_ENV: 'test',
  },
}));

jest.mock('../../src/utils/logger', () => ({
  logger: {
    info: jest.fn(),
    debug: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
  },
}));

const mockWorkerOn = jest.fn();
jest.mock('bullmq', () => ({
  Queue: jest.fn().mockImplementation(() => ({ add: jest.fn(), close: jest.fn() })),
  Worker: jest.fn().mockImplementation(() => ({ on: mockWorkerOn })),
}));

import { Worker } from 'bullmq';
import { CompensationJobData } from '../../src/config/queue';
import { InMemoryCalendarAdapter } from '../../src/services/calendar/memory.adapter';
import { CalendarWriter } from '../../src/services/calendar-writer.service';
import { CalendarProviderError } from '../../src/utils/errors';
import { processCompensation, startCompensationWorker } from '../../src/workers/compensation.worker';
import { NO_DELAY, utc } from '../helpers/scheduling';

describe('Compensation worker', () => {
  let provider: InMemoryCalendarAdapter;
  let writer: CalendarWriter;

  const job = (data: CompensationJobData) => ({ id: 'job-1', data, attemptsMade: 0 });

  beforeEach(() => {
    provider = new InMemoryCalendarAdapter();
    writer = new CalendarWriter(provider, NO_DELAY);
  });

  it('should delete the event written by a cancelled booking', async () => {
    const event = provider.seed('primary', utc('2024-03-05T10:00', '2024-03-05T10:45'));

    await processCompensation(
      job({ sessionId: 'session-1', calendarId: 'primary', eventId: event.id, reason: 'cancelled' }),
      writer
    );

    expect(provider.eventCount).toBe(0);
  });

  it('should succeed when the event is already gone', async () => {
    await expect(
      processCompensation(
        job({ sessionId: 'session-1', calendarId: 'primary', eventId: 'evt-gone', reason: 'cancelled' }),
        writer
      )
    ).resolves.toBeUndefined();
  });

  it('should rethrow so the queue retries', async () => {
    jest
      .spyOn(provider, 'deleteEvent')
      .mockRejectedValue(new CalendarProviderError('Unauthorized', 'Token expired'));

    await expect(
      processCompensation(
        job({ sessionId: 'session-1', calendarId: 'primary', eventId: 'evt1', reason: 'cancelled' }),
        writer
      )
    ).rejects.toThrow('Calendar deleteEvent failed: Token expired');
  });

  it('should start a worker on the compensation queue', () => {
    startCompensationWorker(writer);

    expect(Worker).toHaveBeenCalledWith(
      'calendar-compensation',
      expect.any(Function),
      expect.objectContaining({ concurrency: 2 })
    );
    expect(mockWorkerOn).toHaveBeenCalledWith('failed', expect.any(Function));
  });
});
