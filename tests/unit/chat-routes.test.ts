jest.mock('../../src/config/env', () => ({
  env: {
    NODE_ENV: 'test',
    REDIS_URL: 'redis://localhost:6379',
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

import { presentOutcome } from '../../src/routes/chat.routes';
import { utc } from '../helpers/scheduling';

describe('presentOutcome', () => {
  it('should show booked times in the user zone', () => {
    expect(
      presentOutcome(
        { result: { eventId: 'evt1', finalInterval: utc('2024-03-05T15:00', '2024-03-05T15:45'), status: 'CREATED' } },
        'America/New_York'
      )
    ).toEqual({
      success: true,
      type: 'result',
      result: {
        event_id: 'evt1',
        status: 'CREATED',
        start: '2024-03-05T10:00:00.000-05:00',
        end: '2024-03-05T10:45:00.000-05:00',
      },
    });
  });

  it('should pass questions through', () => {
    expect(presentOutcome({ question: 'How long should the meeting be?' }, 'UTC')).toEqual({
      success: true,
      type: 'question',
      question: 'How long should the meeting be?',
    });
  });

  it('should report failures with their reason', () => {
    expect(presentOutcome({ failure: 'cancelled' }, 'UTC')).toEqual({
      success: true,
      type: 'failure',
      reason: 'cancelled',
    });
  });
});
