import { logger } from '../../utils/logger.js';
import { ValidationError } from '../../utils/errors.js';
import { createTextChunk, type TextChunk } from '../../domain/Chunk.js';
import { ParagraphSegmentationStrategy } from './strategies/ParagraphSegmentationStrategy.js';
import { SentenceSegmentationStrategy } from './strategies/SentenceSegmentationStrategy.js';
import type { ChunkingStrategy, ChunkingStrategyName } from './types.js';

export class ChunkingService {
  private strategy: ChunkingStrategy;

  constructor(
    private chunkSize = 1000,
    private chunkOverlap = 200,
    strategy: ChunkingStrategyName = 'paragraph'
  ) {
    if (!Number.isInteger(chunkSize) || chunkSize <= 0) {
      throw new ValidationError('chunkSize must be a positive integer', { chunkSize });
    }
    if (!Number.isInteger(chunkOverlap) || chunkOverlap < 0 || chunkOverlap >= chunkSize) {
      throw new ValidationError('chunkOverlap must be a non-negative integer smaller than chunkSize', {
        chunkSize,
        chunkOverlap,
      });
    }

    this.strategy =
      strategy === 'sentence'
        ? new SentenceSegmentationStrategy(chunkSize, chunkOverlap)
        : new ParagraphSegmentationStrategy(chunkSize);
  }

  get strategyName(): ChunkingStrategyName {
    return this.strategy.name;
  }

  chunkText(text: string): TextChunk[] {
    if (!text.trim()) {
      return [];
    }

    const chunks = this.strategy.split(text).map(createTextChunk);

    logger.debug(
      {
        strategy: this.strategy.name,
        totalChunks: chunks.length,
        chunkSize: this.chunkSize,
        chunkOverlap: this.chunkOverlap,
        avgChunkSize: chunks.length > 0 ? Math.round(chunks.reduce((sum, c) => sum + c.length, 0) / chunks.length) : 0,
      },
      'Chunked text'
    );

    return chunks;
  }
}
