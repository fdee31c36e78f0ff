import { logger } from '../../utils/logger.js';
import {
  DimensionMismatchError,
  EmbeddingError,
  EmptyCorpusError,
  ValidationError,
} from '../../utils/errors.js';
import { chunkMetadata } from '../../domain/Chunk.js';
import { readString, type QueryResult } from '../../domain/VectorRecord.js';
import type { DocumentProcessor } from '../ingestion/DocumentProcessor.js';
import type { Embedder } from '../vector/Embedder.interface.js';
import type { VectorStore } from '../vector/VectorStore.interface.js';
import type { JsonSchema, LLMService } from '../llm/LLMService.interface.js';
import { formatContext, RAG_ANSWER_PROMPT, RAG_STRUCTURED_PROMPT } from '../llm/prompts/rag-answer.js';
import type {
  ClearResult,
  IndexStats,
  IngestResult,
  QueryOptions,
  QueryResponse,
  SourceReference,
  StreamingQueryResponse,
  StructuredFailure,
} from './types.js';

const PREVIEW_LENGTH = 200;

export interface RAGOrchestratorDeps {
  documentProcessor: DocumentProcessor;
  embedder: Embedder;
  vectorStore: VectorStore;
  llm: LLMService;
  documentsDir: string;
  topK: number;
}

export class RAGOrchestrator {
  constructor(private deps: RAGOrchestratorDeps) {}

  async ingest(directory: string = this.deps.documentsDir): Promise<IngestResult> {
    const { documentProcessor, embedder, vectorStore } = this.deps;
    const startTime = Date.now();

    logger.info({ directory }, 'Starting ingestion');
    const chunks = await documentProcessor.processDirectory(directory);

    if (chunks.length === 0) {
      const error = new EmptyCorpusError('No documents found to process', { directory });
      logger.warn({ directory }, error.message);
      return { status: 'error', code: error.code, message: error.message };
    }

    const texts = chunks.map(chunk => chunk.text);
    const metadatas = chunks.map(chunkMetadata);

    try {
      logger.info({ chunkCount: chunks.length }, 'Generating embeddings');
      const embeddings = await embedder.embedMany(texts);
      vectorStore.addEmbeddings(texts, embeddings, metadatas);
    } catch (error) {
      if (
        error instanceof DimensionMismatchError ||
        error instanceof ValidationError ||
        error instanceof EmbeddingError
      ) {
        logger.error({ error, directory }, 'Ingestion batch rejected');
        return { status: 'error', code: error.code, message: error.message };
      }
      throw error;
    }

    await vectorStore.save();

    logger.info(
      {
        directory,
        chunksProcessed: chunks.length,
        totalVectors: vectorStore.size,
        processingTime: `${((Date.now() - startTime) / 1000).toFixed(1)}s`,
      },
      'Ingestion complete'
    );

    return { status: 'success', chunksProcessed: chunks.length, totalVectors: vectorStore.size };
  }

  async query(question: string, options: QueryOptions = {}): Promise<QueryResponse> {
    const results = await this.retrieve(question, options);
    const prompt = RAG_ANSWER_PROMPT(formatContext(results), question);
    const answer = await this.deps.llm.generate(prompt, { signal: options.signal });

    return {
      question,
      answer: answer.trim(),
      sources: toSources(results),
      timestamp: new Date().toISOString(),
    };
  }

  async streamQuery(question: string, options: QueryOptions = {}): Promise<StreamingQueryResponse> {
    const results = await this.retrieve(question, options);
    const prompt = RAG_ANSWER_PROMPT(formatContext(results), question);

    return {
      question,
      answer: this.deps.llm.generateStream(prompt, { signal: options.signal }),
      sources: toSources(results),
      timestamp: new Date().toISOString(),
    };
  }

  async queryStructured(
    question: string,
    responseFormat: unknown,
    options: QueryOptions = {}
  ): Promise<QueryResponse<unknown>> {
    if (!isJsonObject(responseFormat)) {
      throw new ValidationError('response_format must be a JSON object');
    }

    const results = await this.retrieve(question, options);
    const prompt = RAG_STRUCTURED_PROMPT(formatContext(results), question);
    const generated = await this.deps.llm.generateStructured(prompt, responseFormat, { signal: options.signal });

    let answer: unknown;
    if (generated.ok) {
      answer = generated.data;
    } else {
      const failure: StructuredFailure = { error: generated.error, raw_response: generated.rawResponse };
      answer = failure;
    }

    return {
      question,
      answer,
      sources: toSources(results),
      timestamp: new Date().toISOString(),
    };
  }

  async clearIndex(): Promise<ClearResult> {
    this.deps.vectorStore.clear();
    await this.deps.vectorStore.save();
    return { status: 'success', message: 'Vector store index cleared' };
  }

  stats(): IndexStats {
    const { vectorStore } = this.deps;
    const documents = new Set<string>();
    for (const record of vectorStore.getAllDocuments()) {
      const documentId = readString(record, 'documentId');
      if (documentId !== undefined) documents.add(documentId);
    }

    return {
      totalVectors: vectorStore.size,
      dimension: vectorStore.dimension,
      documents: documents.size,
    };
  }

  private async retrieve(question: string, options: QueryOptions): Promise<QueryResult[]> {
    if (!question.trim()) {
      throw new ValidationError('Question cannot be empty');
    }

    const topK = options.topK ?? this.deps.topK;
    if (!Number.isInteger(topK) || topK <= 0) {
      throw new ValidationError('top_k must be a positive integer', { topK });
    }

    const embedding = await this.deps.embedder.embedOne(question, { signal: options.signal });
    const results = this.deps.vectorStore.similaritySearch(embedding, topK);

    logger.debug({ topK, retrieved: results.length }, 'Retrieved context');
    return results;
  }
}

function toSources(results: QueryResult[]): SourceReference[] {
  return results.map(result => ({
    document: readString(result, 'documentName') ?? 'Unknown',
    score: result.score,
    text: result.text.length > PREVIEW_LENGTH ? `${result.text.slice(0, PREVIEW_LENGTH)}...` : result.text,
  }));
}

function isJsonObject(value: unknown): value is JsonSchema {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
