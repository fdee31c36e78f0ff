import { contentHash } from '../utils/hash.js';

export interface DocumentSource {
  documentId: string;
  documentPath: string;
  documentName: string;
}

export interface TextChunk {
  readonly text: string;
  readonly chunkId: string;
  readonly length: number;
}

export interface Chunk extends TextChunk, Readonly<DocumentSource> {}

export type ChunkMetadata = Omit<Chunk, 'text'>;

export function createTextChunk(text: string): TextChunk {
  return {
    text,
    chunkId: contentHash(text),
    length: text.length,
  };
}

export function attachSource(chunk: TextChunk, source: DocumentSource): Chunk {
  return {
    text: chunk.text,
    chunkId: chunk.chunkId,
    length: chunk.length,
    documentId: source.documentId,
    documentPath: source.documentPath,
    documentName: source.documentName,
  };
}

export function chunkMetadata(chunk: Chunk): ChunkMetadata {
  const { text: _text, ...metadata } = chunk;
  return metadata;
}
