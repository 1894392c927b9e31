import OpenAI from 'openai';
import { LlmExtractorOptions } from './anthropic.extractor';
import { RuleBasedEntityExtractor } from './rules.extractor';
import { BookingIntent } from '../../types/scheduling';
import { EntityExtractor } from '../../types/extraction';
import {
  EXTRACTION_PARAMETERS,
  EXTRACTION_TOOL_DESCRIPTION,
  EXTRACTION_TOOL_NAME,
  buildExtractionPrompt,
} from '../../utils/prompts';
import { ServiceError, describeError, errorStatus } from '../../utils/errors';
import { logger } from '../../utils/logger';
import { backoffDelay, sleep } from '../../utils/retry';

const DEFAULT_MODEL = 'gpt-4o-mini';

export interface OpenAICompletions {
  create(params: OpenAI.Chat.ChatCompletionCreateParamsNonStreaming): Promise<OpenAI.Chat.ChatCompletion>;
}

export class OpenAIEntityExtractor implements EntityExtractor {
  readonly name = 'openai';
  private now: () => Date;

  constructor(
    private completions: OpenAICompletions,
    private fallback: RuleBasedEntityExtractor,
    private options: LlmExtractorOptions
  ) {
    this.now = options.now ?? (() => new Date());
  }

  static fromApiKey(apiKey: string | undefined, options: LlmExtractorOptions): OpenAIEntityExtractor {
    if (!apiKey) {
      throw new Error('OPENAI_API_KEY not configured');
    }
    const client = new OpenAI({ apiKey });
    return new OpenAIEntityExtractor(client.chat.completions, new RuleBasedEntityExtractor(), options);
  }

  async extract(text: string, intent: BookingIntent): Promise<unknown> {
    const maxAttempts = this.options.maxAttempts ?? 3;
    const policy = { maxAttempts, initialDelayMs: this.options.initialDelayMs ?? 1000, backoffFactor: 2 };
    let lastError: unknown = null;

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      try {
        const response = await this.completions.create({
          model: DEFAULT_MODEL,
          messages: [
            {
              role: 'system',
              content: buildExtractionPrompt(intent, { timezone: this.options.timezone, now: this.now() }),
            },
            { role: 'user', content: text },
          ],
          tools: [
            {
              type: 'function',
              function: {
                name: EXTRACTION_TOOL_NAME,
                description: EXTRACTION_TOOL_DESCRIPTION,
                parameters: EXTRACTION_PARAMETERS,
              },
            },
          ],
          tool_choice: { type: 'function', function: { name: EXTRACTION_TOOL_NAME } },
          temperature: 0,
          max_tokens: 300,
        });

        const call = response.choices[0]?.message?.tool_calls?.[0];
        if (call && call.function.name === EXTRACTION_TOOL_NAME) {
          logger.debug('OpenAI extraction complete', { attempt, tokens: response.usage?.completion_tokens });
          return this.parseArguments(call.function.arguments);
        }

        logger.warn('OpenAI response had no function call, using rules', { attempt });
        return this.fallback.extract(text, intent);
      } catch (error) {
        lastError = error;
        const status = errorStatus(error);

        if (status === 429) {
          const delay = backoffDelay(policy, attempt);
          logger.warn('OpenAI rate limited, backing off', { attempt, delay });
          await sleep(delay);
          continue;
        }

        if ((status === 400 || status === 401) && error instanceof Error) {
          throw new ServiceError('OpenAI', 'extract', error, false);
        }

        logger.error('OpenAI error', { attempt, error: describeError(error) });
      }
    }

    logger.error('OpenAI failed after retries, using rule-based extraction', {
      error: describeError(lastError),
    });
    return this.fallback.extract(text, intent);
  }

  /** Function arguments arrive as a JSON string; malformed JSON yields an empty update. */
  private parseArguments(raw: string): unknown {
    try {
      const parsed: unknown = JSON.parse(raw);
      return parsed;
    } catch (error) {
      logger.warn('OpenAI returned malformed function arguments', { error: describeError(error) });
      return {};
    }
  }
}
