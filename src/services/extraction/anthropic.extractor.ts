import Anthropic from '@anthropic-ai/sdk';
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

const DEFAULT_MODEL = 'claude-3-5-haiku-latest';

export interface AnthropicMessages {
  create(params: Anthropic.MessageCreateParamsNonStreaming): Promise<Anthropic.Message>;
}

export interface LlmExtractorOptions {
  timezone: string;
  maxAttempts?: number;
  initialDelayMs?: number;
  now?: () => Date;
}

export class AnthropicEntityExtractor implements EntityExtractor {
  readonly name = 'anthropic';
  private now: () => Date;

  constructor(
    private messages: AnthropicMessages,
    private fallback: RuleBasedEntityExtractor,
    private options: LlmExtractorOptions
  ) {
    this.now = options.now ?? (() => new Date());
  }

  static fromApiKey(apiKey: string | undefined, options: LlmExtractorOptions): AnthropicEntityExtractor {
    if (!apiKey) {
      throw new Error('ANTHROPIC_API_KEY not configured');
    }
    const client = new Anthropic({ apiKey });
    return new AnthropicEntityExtractor(client.messages, new RuleBasedEntityExtractor(), options);
  }

  async extract(text: string, intent: BookingIntent): Promise<unknown> {
    const maxAttempts = this.options.maxAttempts ?? 3;
    const policy = { maxAttempts, initialDelayMs: this.options.initialDelayMs ?? 1000, backoffFactor: 2 };
    let lastError: unknown = null;

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      try {
        const response = await this.messages.create({
          model: DEFAULT_MODEL,
          system: buildExtractionPrompt(intent, { timezone: this.options.timezone, now: this.now() }),
          tools: [
            {
              name: EXTRACTION_TOOL_NAME,
              description: EXTRACTION_TOOL_DESCRIPTION,
              input_schema: EXTRACTION_PARAMETERS,
            },
          ],
          tool_choice: { type: 'tool', name: EXTRACTION_TOOL_NAME },
          messages: [{ role: 'user', content: text }],
          temperature: 0,
          max_tokens: 300,
        });

        const toolUse = response.content.find((block) => block.type === 'tool_use');
        if (toolUse && toolUse.type === 'tool_use') {
          logger.debug('Anthropic extraction complete', { attempt, tokens: response.usage?.output_tokens });
          return toolUse.input;
        }

        logger.warn('Anthropic response had no tool call, using rules', { attempt });
        return this.fallback.extract(text, intent);
      } catch (error) {
        lastError = error;
        const status = errorStatus(error);

        if (status === 429) {
          const delay = backoffDelay(policy, attempt);
          logger.warn('Anthropic rate limited, backing off', { attempt, delay });
          await sleep(delay);
          continue;
        }

        if ((status === 400 || status === 401) && error instanceof Error) {
          throw new ServiceError('Anthropic', 'extract', error, false);
        }

        logger.error('Anthropic error', { attempt, error: describeError(error) });
      }
    }

    logger.error('Anthropic failed after retries, using rule-based extraction', {
      error: describeError(lastError),
    });
    return this.fallback.extract(text, intent);
  }
}
