import type Anthropic from '@anthropic-ai/sdk';
import { logger } from '../../utils/logger.js';
import { GenerationError } from '../../utils/errors.js';
import type {
  GenerateOptions,
  JsonSchema,
  LLMService,
  LLMServiceOptions,
  StructuredResult,
} from './LLMService.interface.js';
import { STRUCTURED_OUTPUT_SYSTEM_PROMPT } from './prompts/structured-output.js';
import { resolveStructured } from './structuredOutput.js';

export class AnthropicLLMService implements LLMService {
  readonly model: string;

  constructor(private client: Anthropic, private options: LLMServiceOptions) {
    this.model = options.model;
  }

  async testConnection(): Promise<boolean> {
    try {
      await this.client.messages.create({
        model: this.options.model,
        max_tokens: 10,
        messages: [{ role: 'user', content: 'test' }],
      });
      return true;
    } catch {
      return false;
    }
  }

  async generate(prompt: string, options: GenerateOptions = {}): Promise<string> {
    return this.complete(prompt, undefined, options);
  }

  async *generateStream(prompt: string, options: GenerateOptions = {}): AsyncIterable<string> {
    try {
      const stream = await this.client.messages.create(
        {
          model: this.options.model,
          max_tokens: this.options.maxTokens,
          temperature: this.options.temperature,
          messages: [{ role: 'user', content: prompt }],
          stream: true,
        },
        { signal: options.signal }
      );

      for await (const event of stream) {
        if (event.type === 'content_block_delta' && event.delta.type === 'text_delta') {
          yield event.delta.text;
        }
      }
    } catch (error) {
      logger.error({ error, model: this.options.model }, 'Anthropic streaming failed');
      throw new GenerationError('Anthropic streaming failed', error);
    }
  }

  async generateStructured(
    prompt: string,
    schema: JsonSchema,
    options: GenerateOptions = {}
  ): Promise<StructuredResult> {
    return resolveStructured(
      () => this.complete(prompt, STRUCTURED_OUTPUT_SYSTEM_PROMPT(schema), options),
      () => this.generate(prompt, options),
      'anthropic'
    );
  }

  private async complete(prompt: string, system: string | undefined, options: GenerateOptions): Promise<string> {
    try {
      logger.debug({ model: this.options.model, promptLength: prompt.length }, 'Sending request to Anthropic');

      const message = await this.client.messages.create(
        {
          model: this.options.model,
          max_tokens: this.options.maxTokens,
          temperature: this.options.temperature,
          system,
          messages: [{ role: 'user', content: prompt }],
        },
        { signal: options.signal }
      );

      let text = '';
      for (const block of message.content) {
        if (block.type === 'text') {
          text += block.text;
        }
      }

      if (!text) {
        throw new GenerationError('Unexpected response type from Anthropic');
      }

      return text;
    } catch (error) {
      logger.error({ error, model: this.options.model }, 'Anthropic request failed');
      if (error instanceof GenerationError) {
        throw error;
      }
      throw new GenerationError('Anthropic API error', error);
    }
  }
}
