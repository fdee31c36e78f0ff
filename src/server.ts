import Fastify, { type FastifyBaseLogger, type FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import multipart from '@fastify/multipart';
import { logger } from './utils/logger.js';
import type { AppContext } from './context.js';
import { registerRoutes } from './api/routes.js';

export const APP_NAME = 'RAG-Powered Q&A System';
export const APP_VERSION = '1.0.0';

export async function buildServer(context: AppContext): Promise<FastifyInstance> {
  const { config, orchestrator, llm } = context;
  const baseLogger: FastifyBaseLogger = logger;

  const fastify = Fastify({ logger: baseLogger });

  await fastify.register(cors, { origin: true });

  await fastify.register(multipart, {
    limits: {
      fileSize: config.storage.maxUploadSizeMB * 1024 * 1024,
      files: 1,
    },
  });

  fastify.setErrorHandler((error, request, reply) => {
    if (error.validation) {
      logger.warn({ url: request.url, message: error.message }, 'Request validation failed');
      return reply.code(400).send({
        error: 'VALIDATION_ERROR',
        message: error.message,
      });
    }

    logger.error({ error, url: request.url }, 'Request error');
    return reply.code(500).send({
      error: 'INTERNAL_ERROR',
      message: error.message,
    });
  });

  fastify.get('/', async () => ({
    name: APP_NAME,
    version: APP_VERSION,
    status: 'running',
    model: llm.model,
    documentsDir: config.storage.documentsDir,
  }));

  fastify.get('/health', async () => {
    const llmOk = await llm.testConnection();
    const stats = orchestrator.stats();

    return {
      status: llmOk ? 'ok' : 'degraded',
      timestamp: new Date().toISOString(),
      environment: config.server.nodeEnv,
      vectors: stats.totalVectors,
      services: {
        llm: llmOk,
      },
    };
  });

  await registerRoutes(fastify, context);

  return fastify;
}
