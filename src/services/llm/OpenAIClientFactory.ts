import OpenAI from 'openai';

export interface OpenAIClientOptions {
  apiKey: string;
  baseUrl?: string;
  timeoutMs: number;
}

export class OpenAIClientFactory {
  private static instance: OpenAI | null = null;
  private static instanceKey: string | null = null;

  static getClient(options: OpenAIClientOptions): OpenAI {
    const key = JSON.stringify([options.baseUrl ?? null, options.apiKey, options.timeoutMs]);
    if (this.instance && this.instanceKey === key) {
      return this.instance;
    }

    const clientConfig: { apiKey: string; baseURL?: string; timeout?: number; maxRetries?: number } = {
      apiKey: options.apiKey,
      timeout: options.timeoutMs,
      maxRetries: 2,
    };

    if (options.baseUrl) {
      clientConfig.baseURL = options.baseUrl;
    }

    this.instance = new OpenAI(clientConfig);
    this.instanceKey = key;
    return this.instance;
  }

  static reset(): void {
    this.instance = null;
    this.instanceKey = null;
  }
}
