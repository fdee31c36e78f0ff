import { z } from 'zod';

const extensionSchema = z
  .string()
  .regex(/^\.[a-z0-9]+$/, 'must look like ".txt"');

export const configSchema = z.object({
  server: z.object({
    nodeEnv: z.enum(['development', 'production', 'test']).default('development'),
    port: z.number().int().positive().default(8000),
    host: z.string().min(1).default('0.0.0.0'),
    logLevel: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).optional(),
  }),
  llm: z.object({
    provider: z.enum(['openai', 'anthropic']).default('openai'),
    baseUrl: z.string().url().optional(),
    apiKey: z.string().min(1).default('ollama'),
    model: z.string().min(1).default('llama3'),
    maxTokens: z.number().int().positive().default(1024),
    temperature: z.number().min(0).max(2).default(0.1),
    timeoutMs: z.number().int().positive().default(120_000),
  }),
  embedding: z.object({
    baseUrl: z.string().url().default('http://localhost:11434/v1'),
    apiKey: z.string().min(1).default('ollama'),
    model: z.string().min(1).default('nomic-embed-text'),
    dimension: z.number().int().positive().default(768),
    batchSize: z.number().int().positive().default(64),
    timeoutMs: z.number().int().positive().default(60_000),
  }),
  storage: z.object({
    documentsDir: z.string().min(1).default('./data/documents'),
    indexPath: z.string().min(1).default('./data/vector_store.index'),
    extensions: z.array(extensionSchema).min(1).default(['.txt', '.md', '.pdf']),
    maxUploadSizeMB: z.number().positive().default(50),
  }),
  chunking: z
    .object({
      strategy: z.enum(['paragraph', 'sentence']).default('paragraph'),
      chunkSize: z.number().int().positive().default(1000),
      chunkOverlap: z.number().int().nonnegative().default(200),
    })
    .refine(c => c.chunkOverlap < c.chunkSize, {
      message: 'chunkOverlap must be smaller than chunkSize',
      path: ['chunkOverlap'],
    }),
  retrieval: z.object({
    topK: z.number().int().positive().default(3),
  }),
});

export type Config = z.infer<typeof configSchema>;
export type ChunkingStrategyName = Config['chunking']['strategy'];
