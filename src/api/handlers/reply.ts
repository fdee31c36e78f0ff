import type { FastifyReply } from 'fastify';
import { logger } from '../../utils/logger.js';
import { ValidationError } from '../../utils/errors.js';

export function sendError(reply: FastifyReply, error: unknown, context: string) {
  if (error instanceof ValidationError) {
    logger.warn({ error: error.message, details: error.details }, context);
    return reply.code(400).send({
      error: error.code,
      message: error.message,
      details: error.details,
    });
  }

  logger.error({ error }, context);

  return reply.code(500).send({
    error: 'INTERNAL_ERROR',
    message: error instanceof Error ? error.message : 'Unknown error',
  });
}

/**
 * Aborts when the client goes away before the reply has been written.
 */
export function replySignal(reply: FastifyReply): AbortSignal {
  const controller = new AbortController();
  reply.raw.once('close', () => {
    if (!reply.raw.writableFinished) {
      controller.abort();
    }
  });
  return controller.signal;
}
