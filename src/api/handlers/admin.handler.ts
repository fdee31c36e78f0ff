import { readdir, stat } from 'fs/promises';
import { join } from 'path';
import type { FastifyRequest, FastifyReply } from 'fastify';
import { logger } from '../../utils/logger.js';
import type { RAGOrchestrator } from '../../services/rag/RAGOrchestrator.js';
import { sendError } from './reply.js';

export function createClearHandler(orchestrator: RAGOrchestrator) {
  return async (_request: FastifyRequest, reply: FastifyReply) => {
    try {
      logger.info('Index clear requested');
      const result = await orchestrator.clearIndex();
      return reply.code(200).send(result);
    } catch (error) {
      return sendError(reply, error, 'Clear handler error');
    }
  };
}

export function createStatsHandler(orchestrator: RAGOrchestrator) {
  return async (_request: FastifyRequest, reply: FastifyReply) => reply.code(200).send(orchestrator.stats());
}

export interface DocumentEntry {
  name: string;
  size: number;
  modified: string;
}

export function createDocumentsHandler(documentsDir: string) {
  return async (_request: FastifyRequest, reply: FastifyReply) => {
    try {
      const entries = await readdir(documentsDir, { withFileTypes: true });
      const documents: DocumentEntry[] = [];

      for (const entry of entries) {
        if (!entry.isFile()) continue;
        const info = await stat(join(documentsDir, entry.name));
        documents.push({ name: entry.name, size: info.size, modified: info.mtime.toISOString() });
      }
      documents.sort((a, b) => a.name.localeCompare(b.name));

      return reply.code(200).send({ status: 'success', documents, count: documents.length });
    } catch (error) {
      return sendError(reply, error, 'Documents handler error');
    }
  };
}
