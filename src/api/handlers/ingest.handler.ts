import { writeFile } from 'fs/promises';
import { basename, extname, join } from 'path';
import type { FastifyRequest, FastifyReply } from 'fastify';
import { logger } from '../../utils/logger.js';
import { ValidationError } from '../../utils/errors.js';
import type { RAGOrchestrator } from '../../services/rag/RAGOrchestrator.js';
import { sendError } from './reply.js';

export function createIngestHandler(orchestrator: RAGOrchestrator) {
  return async (_request: FastifyRequest, reply: FastifyReply) => {
    try {
      const result = await orchestrator.ingest();

      if (result.status === 'error') {
        return reply.code(400).send(result);
      }

      return reply.code(200).send(result);
    } catch (error) {
      return sendError(reply, error, 'Ingest handler error');
    }
  };
}

export interface UploadOptions {
  documentsDir: string;
  extensions: string[];
}

export function createUploadHandler(options: UploadOptions) {
  return async (request: FastifyRequest, reply: FastifyReply) => {
    try {
      const data = await request.file();

      if (!data) {
        throw new ValidationError('No file uploaded');
      }

      const fileName = sanitizeFileName(data.filename);
      const extension = extname(fileName).toLowerCase();
      if (!options.extensions.includes(extension)) {
        data.file.resume();
        throw new ValidationError(`Unsupported file type: ${extension || '(none)'}`, {
          allowed: options.extensions,
        });
      }

      const buffer = await data.toBuffer();
      await writeFile(join(options.documentsDir, fileName), buffer);

      logger.info({ fileName, size: buffer.length }, 'Received file upload');

      return reply.code(200).send({
        status: 'success',
        message: `File ${fileName} uploaded successfully`,
      });
    } catch (error) {
      if (error instanceof Error && 'statusCode' in error && error.statusCode === 413) {
        return reply.code(413).send({ error: 'FILE_TOO_LARGE', message: error.message });
      }
      return sendError(reply, error, 'Upload handler error');
    }
  };
}

export function sanitizeFileName(fileName: string): string {
  const name = basename(fileName.replace(/\\/g, '/')).trim();
  if (!name || name.startsWith('.')) {
    throw new ValidationError('Invalid file name', { fileName });
  }
  return name;
}
