import type OpenAI from 'openai';
import { logger } from '../../utils/logger.js';
import { EmbeddingError } from '../../utils/errors.js';
import type { Embedder, RequestOptions } from './Embedder.interface.js';

export interface EmbeddingServiceOptions {
  model: string;
  dimension: number;
  batchSize: number;
}

export class EmbeddingService implements Embedder {
  readonly dimension: number;

  constructor(private client: OpenAI, private options: EmbeddingServiceOptions) {
    this.dimension = options.dimension;
  }

  async embedMany(texts: string[], requestOptions: RequestOptions = {}): Promise<number[][]> {
    if (texts.length === 0) {
      return [];
    }

    const embeddings: number[][] = [];
    const { batchSize } = this.options;

    try {
      for (let i = 0; i < texts.length; i += batchSize) {
        const batch = texts.slice(i, i + batchSize);
        embeddings.push(...(await this.embedBatch(batch, requestOptions)));

        if (texts.length > batchSize) {
          logger.debug(
            { batch: Math.floor(i / batchSize) + 1, processed: embeddings.length, total: texts.length },
            'Batch embeddings progress'
          );
        }
      }
    } catch (error) {
      logger.error({ error, count: texts.length }, 'Failed to generate embeddings');
      if (error instanceof EmbeddingError) {
        throw error;
      }
      throw new EmbeddingError('Embedding generation failed', error);
    }

    logger.debug({ count: embeddings.length, dimension: embeddings[0]?.length }, 'Generated embeddings');
    return embeddings;
  }

  async embedOne(text: string, requestOptions: RequestOptions = {}): Promise<number[]> {
    const [embedding] = await this.embedMany([text], requestOptions);
    if (!embedding) {
      throw new EmbeddingError('Embedding endpoint returned no vector');
    }
    return embedding;
  }

  private async embedBatch(batch: string[], requestOptions: RequestOptions): Promise<number[][]> {
    const response = await this.client.embeddings.create(
      {
        model: this.options.model,
        input: batch,
      },
      { signal: requestOptions.signal }
    );

    if (response.data.length !== batch.length) {
      throw new EmbeddingError(`Requested ${batch.length} embeddings but received ${response.data.length}`);
    }

    return response.data
      .slice()
      .sort((a, b) => a.index - b.index)
      .map(item => item.embedding);
  }
}
