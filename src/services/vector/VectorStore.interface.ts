import type { QueryResult, RecordMetadata, VectorRecord } from '../../domain/VectorRecord.js';

export interface VectorStore {
  readonly dimension: number;
  readonly size: number;

  load(): Promise<void>;
  save(): Promise<void>;
  clear(): void;

  addEmbeddings(texts: string[], embeddings: number[][], metadatas?: RecordMetadata[]): number[];
  similaritySearch(query: number[], k: number): QueryResult[];

  getDocument(id: number): VectorRecord | undefined;
  getDocuments(ids: number[]): Array<VectorRecord | undefined>;
  getAllDocuments(): VectorRecord[];
}
