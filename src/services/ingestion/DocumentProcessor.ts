import type { Dirent } from 'fs';
import { readdir, readFile } from 'fs/promises';
import { basename, extname, join } from 'path';
import pdfParse from 'pdf-parse/lib/pdf-parse.js';
import { logger } from '../../utils/logger.js';
import { ValidationError } from '../../utils/errors.js';
import { attachSource, type Chunk } from '../../domain/Chunk.js';
import type { ChunkingService } from '../chunking/ChunkingService.js';

export const DEFAULT_EXTENSIONS = ['.txt', '.md', '.pdf'];

const utf8 = new TextDecoder('utf-8', { fatal: true });

export class DocumentProcessor {
  constructor(
    private chunker: ChunkingService,
    private extensions: string[] = DEFAULT_EXTENSIONS
  ) {}

  async loadDocument(filePath: string): Promise<string> {
    const buffer = await readFile(filePath);

    if (extname(filePath).toLowerCase() === '.pdf') {
      const data = await pdfParse(buffer);
      logger.debug({ filePath, pageCount: data.numpages }, 'Processed PDF');
      return data.text;
    }

    try {
      return utf8.decode(buffer);
    } catch (error) {
      throw new ValidationError(`${basename(filePath)} is not valid UTF-8 text`, error);
    }
  }

  async processDocument(filePath: string): Promise<Chunk[]> {
    try {
      const text = await this.loadDocument(filePath);
      const documentName = basename(filePath);
      const source = {
        documentId: basename(filePath, extname(filePath)),
        documentPath: filePath,
        documentName,
      };

      const chunks = this.chunker.chunkText(text).map(chunk => attachSource(chunk, source));
      logger.debug({ documentName, chunkCount: chunks.length }, 'Processed document');
      return chunks;
    } catch (error) {
      logger.error({ error, filePath }, 'Document processing failed');
      return [];
    }
  }

  async listDocuments(directory: string, extensions: string[] = this.extensions): Promise<string[]> {
    let entries: Dirent[];
    try {
      entries = await readdir(directory, { withFileTypes: true });
    } catch (error) {
      logger.warn({ error, directory }, 'Documents directory could not be read');
      return [];
    }

    const wanted = new Set(extensions.map(ext => ext.toLowerCase()));
    const files: string[] = [];

    for (const ext of wanted) {
      const names = entries
        .filter(entry => entry.isFile() && extname(entry.name).toLowerCase() === ext)
        .map(entry => entry.name)
        .sort();
      files.push(...names.map(name => join(directory, name)));
    }

    return files;
  }

  async processDirectory(directory: string, extensions?: string[]): Promise<Chunk[]> {
    const files = await this.listDocuments(directory, extensions);
    logger.info({ directory, fileCount: files.length }, 'Processing documents');

    const allChunks: Chunk[] = [];
    for (let i = 0; i < files.length; i++) {
      const chunks = await this.processDocument(files[i]);
      allChunks.push(...chunks);
      logger.debug({ progress: `${i + 1}/${files.length}`, file: files[i], chunks: chunks.length }, 'Processing documents');
    }

    logger.info({ directory, fileCount: files.length, chunkCount: allChunks.length }, 'Processed documents');
    return allChunks;
  }
}
