import Anthropic from '@anthropic-ai/sdk';
import type { Config } from '../../config/validation.js';
import { logger } from '../../utils/logger.js';
import type { LLMService } from './LLMService.interface.js';
import { OpenAILLMService } from './OpenAILLMService.js';
import { AnthropicLLMService } from './AnthropicLLMService.js';
import { OpenAIClientFactory } from './OpenAIClientFactory.js';

export class LLMServiceFactory {
  private static instance: LLMService | null = null;
  private static instanceKey: string | null = null;

  static createLLMService(llm: Config['llm']): LLMService {
    const key = JSON.stringify(llm);
    if (this.instance && this.instanceKey === key) {
      return this.instance;
    }

    const options = {
      model: llm.model,
      maxTokens: llm.maxTokens,
      temperature: llm.temperature,
    };

    switch (llm.provider) {
      case 'openai':
        logger.info({ model: llm.model, baseUrl: llm.baseUrl }, 'Initializing OpenAI-compatible LLM service');
        this.instance = new OpenAILLMService(
          OpenAIClientFactory.getClient({ apiKey: llm.apiKey, baseUrl: llm.baseUrl, timeoutMs: llm.timeoutMs }),
          options
        );
        break;
      case 'anthropic':
        logger.info({ model: llm.model }, 'Initializing Anthropic LLM service');
        this.instance = new AnthropicLLMService(
          new Anthropic({
            apiKey: llm.apiKey,
            baseURL: llm.baseUrl,
            timeout: llm.timeoutMs,
            maxRetries: 2,
          }),
          options
        );
        break;
      default:
        throw new Error(`Unsupported LLM provider: ${llm.provider}`);
    }

    this.instanceKey = key;
    return this.instance;
  }

  static reset(): void {
    this.instance = null;
    this.instanceKey = null;
  }
}
