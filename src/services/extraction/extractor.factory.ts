import { AnthropicEntityExtractor } from './anthropic.extractor';
import { OpenAIEntityExtractor } from './openai.extractor';
import { RuleBasedEntityExtractor } from './rules.extractor';
import { EntityExtractor } from '../../types/extraction';

export interface ExtractorConfig {
  timezone: string;
  anthropicApiKey?: string;
  openaiApiKey?: string;
}

export class EntityExtractorFactory {
  static create(provider: string, config: ExtractorConfig): EntityExtractor {
    switch (provider) {
      case 'anthropic':
        return AnthropicEntityExtractor.fromApiKey(config.anthropicApiKey, { timezone: config.timezone });
      case 'openai':
        return OpenAIEntityExtractor.fromApiKey(config.openaiApiKey, { timezone: config.timezone });
      case 'rules':
        return new RuleBasedEntityExtractor();
      default:
        throw new Error(`Unsupported entity extractor: ${provider}`);
    }
  }
}
