import { mkdir } from 'fs/promises';
import type { Config } from './config/validation.js';
import { logger } from './utils/logger.js';
import { ChunkingService } from './services/chunking/ChunkingService.js';
import { DocumentProcessor } from './services/ingestion/DocumentProcessor.js';
import type { Embedder } from './services/vector/Embedder.interface.js';
import { EmbeddingService } from './services/vector/EmbeddingService.js';
import { EmbeddingClientFactory } from './services/vector/EmbeddingClientFactory.js';
import { FlatVectorStore } from './services/vector/FlatVectorStore.js';
import type { VectorStore } from './services/vector/VectorStore.interface.js';
import type { LLMService } from './services/llm/LLMService.interface.js';
import { LLMServiceFactory } from './services/llm/LLMServiceFactory.js';
import { RAGOrchestrator } from './services/rag/RAGOrchestrator.js';

export interface AppContext {
  config: Config;
  embedder: Embedder;
  llm: LLMService;
  vectorStore: VectorStore;
  documentProcessor: DocumentProcessor;
  orchestrator: RAGOrchestrator;
}

export interface ContextOverrides {
  embedder?: Embedder;
  llm?: LLMService;
}

export async function createAppContext(config: Config, overrides: ContextOverrides = {}): Promise<AppContext> {
  const embedder =
    overrides.embedder ??
    new EmbeddingService(
      EmbeddingClientFactory.getClient({
        baseUrl: config.embedding.baseUrl,
        apiKey: config.embedding.apiKey,
        timeoutMs: config.embedding.timeoutMs,
      }),
      {
        model: config.embedding.model,
        dimension: config.embedding.dimension,
        batchSize: config.embedding.batchSize,
      }
    );
  const llm = overrides.llm ?? LLMServiceFactory.createLLMService(config.llm);

  const chunker = new ChunkingService(
    config.chunking.chunkSize,
    config.chunking.chunkOverlap,
    config.chunking.strategy
  );
  const documentProcessor = new DocumentProcessor(chunker, config.storage.extensions);

  const vectorStore = new FlatVectorStore(embedder.dimension, config.storage.indexPath);
  await vectorStore.load();

  await mkdir(config.storage.documentsDir, { recursive: true });

  const orchestrator = new RAGOrchestrator({
    documentProcessor,
    embedder,
    vectorStore,
    llm,
    documentsDir: config.storage.documentsDir,
    topK: config.retrieval.topK,
  });

  logger.info(
    {
      model: llm.model,
      strategy: chunker.strategyName,
      vectors: vectorStore.size,
      documentsDir: config.storage.documentsDir,
    },
    'RAG system initialized'
  );

  return { config, embedder, llm, vectorStore, documentProcessor, orchestrator };
}
