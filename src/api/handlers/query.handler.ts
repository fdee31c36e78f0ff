import { Readable } from 'stream';
import type { FastifyRequest, FastifyReply } from 'fastify';
import { logger } from '../../utils/logger.js';
import { ValidationError } from '../../utils/errors.js';
import type { RAGOrchestrator } from '../../services/rag/RAGOrchestrator.js';
import type { QueryParams, StructuredQueryBody } from '../schemas/query.schema.js';
import { replySignal, sendError } from './reply.js';

export function createQueryHandler(orchestrator: RAGOrchestrator) {
  return async (
    request: FastifyRequest<{ Querystring: QueryParams }>,
    reply: FastifyReply
  ) => {
    try {
      const { question, top_k } = request.query;
      logger.debug({ question, topK: top_k }, 'Query request');

      const result = await orchestrator.query(question, { topK: top_k, signal: replySignal(reply) });

      return reply.code(200).send(result);
    } catch (error) {
      return sendError(reply, error, 'Query handler error');
    }
  };
}

export function createStreamQueryHandler(orchestrator: RAGOrchestrator) {
  return async (
    request: FastifyRequest<{ Querystring: QueryParams }>,
    reply: FastifyReply
  ) => {
    try {
      const { question, top_k } = request.query;
      logger.debug({ question, topK: top_k }, 'Streaming query request');

      const result = await orchestrator.streamQuery(question, { topK: top_k, signal: replySignal(reply) });

      return reply
        .code(200)
        .header('content-type', 'text/plain; charset=utf-8')
        .header('x-sources', encodeURIComponent(JSON.stringify(result.sources)))
        .send(Readable.from(result.answer));
    } catch (error) {
      return sendError(reply, error, 'Streaming query handler error');
    }
  };
}

export function createStructuredQueryHandler(orchestrator: RAGOrchestrator) {
  return async (
    request: FastifyRequest<{ Body: StructuredQueryBody }>,
    reply: FastifyReply
  ) => {
    try {
      const { question, response_format, top_k } = request.body;
      logger.debug({ question, topK: top_k }, 'Structured query request');

      const result = await orchestrator.queryStructured(question, parseResponseFormat(response_format), {
        topK: top_k,
        signal: replySignal(reply),
      });

      return reply.code(200).send(result);
    } catch (error) {
      return sendError(reply, error, 'Structured query handler error');
    }
  };
}

export function parseResponseFormat(value: unknown): unknown {
  if (typeof value !== 'string') {
    return value;
  }

  try {
    return JSON.parse(value);
  } catch (error) {
    throw new ValidationError('Invalid JSON format for response_format', { reason: String(error) });
  }
}
