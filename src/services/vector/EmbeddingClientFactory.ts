import OpenAI from 'openai';

export interface EmbeddingClientOptions {
  baseUrl: string;
  apiKey: string;
  timeoutMs: number;
}

export class EmbeddingClientFactory {
  private static instance: OpenAI | null = null;
  private static instanceKey: string | null = null;

  /** Returns the shared client, rebuilding it when the options change. */
  static getClient(options: EmbeddingClientOptions): OpenAI {
    const key = JSON.stringify([options.baseUrl, options.apiKey, options.timeoutMs]);
    if (this.instance && this.instanceKey === key) {
      return this.instance;
    }

    this.instance = new OpenAI({
      apiKey: options.apiKey,
      baseURL: options.baseUrl,
      timeout: options.timeoutMs,
      maxRetries: 2,
    });
    this.instanceKey = key;

    return this.instance;
  }

  static reset(): void {
    this.instance = null;
    this.instanceKey = null;
  }
}
