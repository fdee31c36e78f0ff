import 'dotenv/config';
import { ZodError } from 'zod';
import { configSchema, type Config } from './validation.js';

const DEFAULT_OPENAI_COMPATIBLE_URL = 'http://localhost:11434/v1';

const toInt = (value: string | undefined): number | undefined =>
  value ? parseInt(value, 10) : undefined;

const toFloat = (value: string | undefined): number | undefined =>
  value ? parseFloat(value) : undefined;

const toList = (value: string | undefined): string[] | undefined =>
  value
    ? value
        .split(',')
        .map(item => item.trim().toLowerCase())
        .filter(item => item.length > 0)
    : undefined;

const pickApiKey = (env: NodeJS.ProcessEnv): string | undefined => {
  if (env.LLM_API_KEY) return env.LLM_API_KEY;
  return env.LLM_PROVIDER === 'anthropic' ? env.ANTHROPIC_API_KEY : env.OPENAI_API_KEY;
};

export function buildRawConfig(env: NodeJS.ProcessEnv) {
  return {
    server: {
      nodeEnv: env.NODE_ENV,
      port: toInt(env.PORT),
      host: env.HOST || undefined,
      logLevel: env.LOG_LEVEL || undefined,
    },
    llm: {
      provider: env.LLM_PROVIDER || undefined,
      baseUrl: env.LLM_BASE_URL || (env.LLM_PROVIDER === 'anthropic' ? undefined : DEFAULT_OPENAI_COMPATIBLE_URL),
      apiKey: pickApiKey(env) || undefined,
      model: env.LLM_MODEL || undefined,
      maxTokens: toInt(env.LLM_MAX_TOKENS),
      temperature: toFloat(env.LLM_TEMPERATURE),
      timeoutMs: toInt(env.LLM_TIMEOUT_MS),
    },
    embedding: {
      baseUrl: env.EMBEDDING_BASE_URL || undefined,
      apiKey: env.EMBEDDING_API_KEY || undefined,
      model: env.EMBEDDING_MODEL || undefined,
      dimension: toInt(env.EMBEDDING_DIMENSION),
      batchSize: toInt(env.EMBEDDING_BATCH_SIZE),
      timeoutMs: toInt(env.EMBEDDING_TIMEOUT_MS),
    },
    storage: {
      documentsDir: env.DOCUMENTS_DIR || undefined,
      indexPath: env.VECTOR_STORE_PATH || undefined,
      extensions: toList(env.DOCUMENT_EXTENSIONS),
      maxUploadSizeMB: toFloat(env.MAX_UPLOAD_SIZE_MB),
    },
    chunking: {
      strategy: env.CHUNK_STRATEGY || undefined,
      chunkSize: toInt(env.CHUNK_SIZE),
      chunkOverlap: toInt(env.CHUNK_OVERLAP),
    },
    retrieval: {
      topK: toInt(env.TOP_K_RESULTS),
    },
  };
}

export function parseConfig(env: NodeJS.ProcessEnv): Config {
  return configSchema.parse(buildRawConfig(env));
}

function loadConfig(): Config {
  try {
    return parseConfig(process.env);
  } catch (error) {
    if (error instanceof ZodError) {
      console.error('\n❌ Invalid configuration:\n');
      error.issues.forEach(issue => {
        const field = issue.path.join('.');
        console.error(`  ${field}: ${issue.message}`);
      });
      console.error('\nCheck .env file and compare with .env.example\n');
    } else {
      console.error('Config error:', error);
    }
    process.exit(1);
  }
}

export const config = loadConfig();
