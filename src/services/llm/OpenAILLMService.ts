import type OpenAI from 'openai';
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

type ChatMessage = { role: 'system' | 'user'; content: string };

/**
 * Chat completions against any OpenAI-compatible endpoint (OpenAI itself,
 * or a local Ollama server through its /v1 API).
 */
export class OpenAILLMService implements LLMService {
  readonly model: string;

  constructor(private client: OpenAI, private options: LLMServiceOptions) {
    this.model = options.model;
  }

  async testConnection(): Promise<boolean> {
    try {
      await this.client.models.list();
      return true;
    } catch {
      return false;
    }
  }

  async generate(prompt: string, options: GenerateOptions = {}): Promise<string> {
    return this.complete([{ role: 'user', content: prompt }], false, options);
  }

  async *generateStream(prompt: string, options: GenerateOptions = {}): AsyncIterable<string> {
    try {
      const stream = await this.client.chat.completions.create(
        {
          model: this.options.model,
          messages: [{ role: 'user', content: prompt }],
          temperature: this.options.temperature,
          max_tokens: this.options.maxTokens,
          stream: true,
        },
        { signal: options.signal }
      );

      for await (const chunk of stream) {
        const delta = chunk.choices[0]?.delta?.content;
        if (delta) {
          yield delta;
        }
      }
    } catch (error) {
      logger.error({ error, model: this.options.model }, 'Streaming completion failed');
      throw new GenerationError('Streaming completion failed', error);
    }
  }

  async generateStructured(
    prompt: string,
    schema: JsonSchema,
    options: GenerateOptions = {}
  ): Promise<StructuredResult> {
    return resolveStructured(
      () =>
        this.complete(
          [
            { role: 'system', content: STRUCTURED_OUTPUT_SYSTEM_PROMPT(schema) },
            { role: 'user', content: prompt },
          ],
          true,
          options
        ),
      () => this.generate(prompt, options),
      'openai'
    );
  }

  private async complete(messages: ChatMessage[], jsonMode: boolean, options: GenerateOptions): Promise<string> {
    try {
      logger.debug(
        { model: this.options.model, jsonMode, promptLength: messages.reduce((sum, m) => sum + m.content.length, 0) },
        'Sending completion request'
      );

      const completion = await this.client.chat.completions.create(
        {
          model: this.options.model,
          messages,
          temperature: this.options.temperature,
          max_tokens: this.options.maxTokens,
          response_format: jsonMode ? { type: 'json_object' } : undefined,
        },
        { signal: options.signal }
      );

      const content = completion.choices[0]?.message?.content;
      if (content === null || content === undefined) {
        throw new GenerationError('Empty response from model');
      }

      return content;
    } catch (error) {
      logger.error({ error, model: this.options.model }, 'Completion request failed');
      if (error instanceof GenerationError) {
        throw error;
      }
      throw new GenerationError('Completion request failed', error);
    }
  }
}
