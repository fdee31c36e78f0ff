export interface GenerateOptions {
  signal?: AbortSignal;
}

export type JsonSchema = Record<string, unknown>;

export type StructuredResult =
  | { ok: true; data: unknown }
  | { ok: false; error: string; rawResponse: string };

export interface LLMService {
  readonly model: string;

  generate(prompt: string, options?: GenerateOptions): Promise<string>;
  generateStream(prompt: string, options?: GenerateOptions): AsyncIterable<string>;
  generateStructured(prompt: string, schema: JsonSchema, options?: GenerateOptions): Promise<StructuredResult>;
  testConnection(): Promise<boolean>;
}

export interface LLMServiceOptions {
  model: string;
  maxTokens: number;
  temperature: number;
}
