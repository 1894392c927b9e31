jest.mock('../../src/utils/logger', () => ({
  logger: {
    info: jest.fn(),
    debug: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
  },
}));

import { AnthropicEntityExtractor } from '../../src/services/extraction/anthropic.extractor';
import { parseExtractedEntities } from '../../src/services/extraction/extraction.schema';
import { OpenAIEntityExtractor } from '../../src/services/extraction/openai.extractor';
import { RuleBasedEntityExtractor } from '../../src/services/extraction/rules.extractor';
import { BookingIntent } from '../../src/types/scheduling';
import { ServiceError } from '../../src/utils/errors';
import { EXTRACTION_TOOL_NAME } from '../../src/utils/prompts';
import { NOW } from '../helpers/scheduling';

const EMPTY_INTENT: BookingIntent = { attendees: [], candidateIntervals: [] };

function httpError(status: number, message: string): Error {
  return Object.assign(new Error(message), { status });
}

describe('parseExtractedEntities', () => {
  it('should keep valid fields', () => {
    expect(
      parseExtractedEntities({
        subject: '  Design review ',
        durationText: '45 minutes',
        timeText: 'tomorrow at 10am',
        attendees: ['Alice@Example.com'],
      })
    ).toEqual({
      subject: 'Design review',
      durationText: '45 minutes',
      timeText: 'tomorrow at 10am',
      attendees: ['alice@example.com'],
    });
  });

  it('should drop invalid fields one by one', () => {
    expect(
      parseExtractedEntities({
        subject: '',
        durationText: 30,
        timeText: 42,
        attendees: ['not-an-email', 'bob@example.com', 'BOB@example.com'],
      })
    ).toEqual({
      durationText: '30 minutes',
      attendees: ['bob@example.com'],
    });
  });

  it('should ignore nulls and unknown keys', () => {
    expect(parseExtractedEntities({ subject: null, location: 'Room 4' })).toEqual({});
  });

  it('should treat a non-object payload as an empty update', () => {
    expect(parseExtractedEntities('tomorrow')).toEqual({});
    expect(parseExtractedEntities(null)).toEqual({});
  });
});

describe('RuleBasedEntityExtractor', () => {
  const extractor = new RuleBasedEntityExtractor(() => NOW);

  it('should pull every field out of a complete request', () => {
    expect(
      extractor.extractSync(
        'Schedule a design review tomorrow at 10am for 45 minutes with alice@example.com',
        EMPTY_INTENT
      )
    ).toEqual({
      attendees: ['alice@example.com'],
      durationText: '45 minutes',
      timeText: 'tomorrow at 10am',
      subject: 'design review',
    });
  });

  it('should read "in 20 minutes" as a time, not a duration', () => {
    const entities = extractor.extractSync('in 20 minutes', { ...EMPTY_INTENT, subject: 'Standup' });

    expect(entities.durationText).toBeUndefined();
  });

  it('should take a plain answer as the subject', () => {
    expect(extractor.extractSync('Quarterly planning', EMPTY_INTENT)).toEqual({ subject: 'Quarterly planning' });
  });

  it('should read a bare number as minutes once the subject is known', () => {
    expect(extractor.extractSync('30', { ...EMPTY_INTENT, subject: 'Standup' })).toEqual({
      durationText: '30 minutes',
    });
  });

  it('should not take a generic word as the subject', () => {
    expect(extractor.extractSync('I need to set up a meeting', EMPTY_INTENT)).toEqual({});
  });
});

describe('AnthropicEntityExtractor', () => {
  const fallback = new RuleBasedEntityExtractor(() => NOW);
  const options = { timezone: 'UTC', initialDelayMs: 0, now: () => NOW };

  it('should return the tool input', async () => {
    const create = jest.fn().mockResolvedValue({
      content: [{ type: 'tool_use', id: 'tool-1', name: EXTRACTION_TOOL_NAME, input: { subject: 'Roadmap' } }],
      usage: { input_tokens: 10, output_tokens: 5 },
    });
    const extractor = new AnthropicEntityExtractor({ create }, fallback, options);

    await expect(extractor.extract('Roadmap sync', EMPTY_INTENT)).resolves.toEqual({ subject: 'Roadmap' });
    expect(create).toHaveBeenCalledWith(
      expect.objectContaining({ tool_choice: { type: 'tool', name: EXTRACTION_TOOL_NAME } })
    );
  });

  it('should back off on 429 and try again', async () => {
    const create = jest
      .fn()
      .mockRejectedValueOnce(httpError(429, 'Too many requests'))
      .mockResolvedValueOnce({
        content: [{ type: 'tool_use', id: 'tool-1', name: EXTRACTION_TOOL_NAME, input: { timeText: 'noon' } }],
      });
    const extractor = new AnthropicEntityExtractor({ create }, fallback, options);

    await expect(extractor.extract('at noon', EMPTY_INTENT)).resolves.toEqual({ timeText: 'noon' });
    expect(create).toHaveBeenCalledTimes(2);
  });

  it('should fall back to rules after repeated failures', async () => {
    const create = jest.fn().mockRejectedValue(httpError(500, 'Overloaded'));
    const extractor = new AnthropicEntityExtractor({ create }, fallback, options);

    await expect(extractor.extract('Quarterly planning', EMPTY_INTENT)).resolves.toEqual({
      subject: 'Quarterly planning',
    });
    expect(create).toHaveBeenCalledTimes(3);
  });

  it('should fall back to rules when the model answers in prose', async () => {
    const create = jest.fn().mockResolvedValue({ content: [{ type: 'text', text: 'Sure!' }] });
    const extractor = new AnthropicEntityExtractor({ create }, fallback, options);

    await expect(extractor.extract('Quarterly planning', EMPTY_INTENT)).resolves.toEqual({
      subject: 'Quarterly planning',
    });
  });

  it('should surface an authentication failure', async () => {
    const create = jest.fn().mockRejectedValue(httpError(401, 'invalid x-api-key'));
    const extractor = new AnthropicEntityExtractor({ create }, fallback, options);

    await expect(extractor.extract('Roadmap', EMPTY_INTENT)).rejects.toThrow(ServiceError);
    expect(create).toHaveBeenCalledTimes(1);
  });
});

describe('OpenAIEntityExtractor', () => {
  const fallback = new RuleBasedEntityExtractor(() => NOW);
  const options = { timezone: 'UTC', initialDelayMs: 0, now: () => NOW };

  const completion = (args: string) => ({
    choices: [
      {
        message: {
          role: 'assistant',
          content: null,
          tool_calls: [{ id: 'call-1', type: 'function', function: { name: EXTRACTION_TOOL_NAME, arguments: args } }],
        },
      },
    ],
  });

  it('should parse the function arguments', async () => {
    const create = jest.fn().mockResolvedValue(completion('{"durationText":"1 hour"}'));
    const extractor = new OpenAIEntityExtractor({ create }, fallback, options);

    await expect(extractor.extract('an hour', EMPTY_INTENT)).resolves.toEqual({ durationText: '1 hour' });
  });

  it('should turn malformed arguments into an empty update', async () => {
    const create = jest.fn().mockResolvedValue(completion('{"durationText":'));
    const extractor = new OpenAIEntityExtractor({ create }, fallback, options);

    await expect(extractor.extract('an hour', EMPTY_INTENT)).resolves.toEqual({});
  });

  it('should surface a bad request', async () => {
    const create = jest.fn().mockRejectedValue(httpError(400, 'Invalid schema'));
    const extractor = new OpenAIEntityExtractor({ create }, fallback, options);

    await expect(extractor.extract('an hour', EMPTY_INTENT)).rejects.toThrow(ServiceError);
  });
});
