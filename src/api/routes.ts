import type { FastifyInstance } from 'fastify';
import type { AppContext } from '../context.js';
import { createIngestHandler, createUploadHandler } from './handlers/ingest.handler.js';
import { createClearHandler, createDocumentsHandler, createStatsHandler } from './handlers/admin.handler.js';
import {
  createQueryHandler,
  createStreamQueryHandler,
  createStructuredQueryHandler,
} from './handlers/query.handler.js';
import { ingestResponseSchema, ingestErrorSchema } from './schemas/ingest.schema.js';
import {
  errorResponseSchema,
  statusMessageSchema,
  documentListSchema,
  statsResponseSchema,
} from './schemas/common.schema.js';
import {
  queryParamsSchema,
  queryResponseSchema,
  structuredQueryBodySchema,
  structuredQueryResponseSchema,
} from './schemas/query.schema.js';

export async function registerRoutes(fastify: FastifyInstance, context: AppContext) {
  const { orchestrator, config } = context;

  fastify.post('/ingest', {
    schema: {
      response: {
        200: ingestResponseSchema,
        400: ingestErrorSchema,
        500: errorResponseSchema,
      },
    },
    handler: createIngestHandler(orchestrator),
  });

  fastify.post('/upload', {
    schema: {
      response: {
        200: statusMessageSchema,
        400: errorResponseSchema,
        413: errorResponseSchema,
        500: errorResponseSchema,
      },
    },
    handler: createUploadHandler({
      documentsDir: config.storage.documentsDir,
      extensions: config.storage.extensions,
    }),
  });

  fastify.get('/query', {
    schema: {
      querystring: queryParamsSchema,
      response: {
        200: queryResponseSchema,
        400: errorResponseSchema,
        500: errorResponseSchema,
      },
    },
    handler: createQueryHandler(orchestrator),
  });

  fastify.get('/query_stream', {
    schema: {
      querystring: queryParamsSchema,
    },
    handler: createStreamQueryHandler(orchestrator),
  });

  fastify.post('/query_structured', {
    schema: {
      body: structuredQueryBodySchema,
      response: {
        200: structuredQueryResponseSchema,
        400: errorResponseSchema,
        500: errorResponseSchema,
      },
    },
    handler: createStructuredQueryHandler(orchestrator),
  });

  fastify.post('/clear', {
    schema: {
      response: {
        200: statusMessageSchema,
        500: errorResponseSchema,
      },
    },
    handler: createClearHandler(orchestrator),
  });

  fastify.get('/documents', {
    schema: {
      response: {
        200: documentListSchema,
        500: errorResponseSchema,
      },
    },
    handler: createDocumentsHandler(config.storage.documentsDir),
  });

  fastify.get('/stats', {
    schema: {
      response: {
        200: statsResponseSchema,
      },
    },
    handler: createStatsHandler(orchestrator),
  });
}
