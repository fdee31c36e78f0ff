import { mkdir, readFile, rename, writeFile } from 'fs/promises';
import { dirname } from 'path';
import { z } from 'zod';
import { logger } from '../../utils/logger.js';
import { DimensionMismatchError, PersistenceError, ValidationError } from '../../utils/errors.js';
import {
  createVectorRecord,
  type QueryResult,
  type RecordMetadata,
  type VectorRecord,
} from '../../domain/VectorRecord.js';
import type { VectorStore } from './VectorStore.interface.js';

const MAGIC = Buffer.from('FLATL2\u0000\u0001', 'latin1');
const HEADER_BYTES = MAGIC.length + 8;
const FLOAT_BYTES = 4;
const INITIAL_CAPACITY = 64;

const metadataValueSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]);
const sidecarSchema = z.array(
  z
    .object({
      text: z.string(),
      index: z.number().int().nonnegative(),
    })
    .catchall(metadataValueSchema)
);

interface DecodedIndex {
  count: number;
  vectors: Float32Array;
}

/**
 * Exact nearest-neighbour index over squared L2 distance.
 *
 * Vectors live in one growable Float32Array arena and records in a parallel
 * array; position `i` of one always belongs to position `i` of the other.
 * Both are only ever changed inside a single synchronous call.
 */
export class FlatVectorStore implements VectorStore {
  private vectors: Float32Array;
  private records: VectorRecord[] = [];
  private saveQueue: Promise<void> = Promise.resolve();

  constructor(readonly dimension: number, private indexPath: string) {
    if (!Number.isInteger(dimension) || dimension <= 0) {
      throw new ValidationError('Vector dimension must be a positive integer', { dimension });
    }
    this.vectors = new Float32Array(INITIAL_CAPACITY * dimension);
  }

  get size(): number {
    return this.records.length;
  }

  get metadataPath(): string {
    return `${this.indexPath}.json`;
  }

  addEmbeddings(texts: string[], embeddings: number[][], metadatas?: RecordMetadata[]): number[] {
    if (embeddings.length !== texts.length) {
      throw new ValidationError(`Got ${texts.length} texts but ${embeddings.length} embeddings`);
    }
    if (metadatas && metadatas.length !== texts.length) {
      throw new ValidationError(`Got ${texts.length} texts but ${metadatas.length} metadata entries`);
    }
    embeddings.forEach((embedding, position) => this.assertVector(embedding, position));

    if (texts.length === 0) {
      return [];
    }

    const start = this.records.length;
    this.ensureCapacity(start + texts.length);

    const handles: number[] = [];
    for (let i = 0; i < texts.length; i++) {
      const index = start + i;
      this.vectors.set(embeddings[i], index * this.dimension);
      this.records.push(createVectorRecord(texts[i], index, metadatas?.[i]));
      handles.push(index);
    }

    logger.debug({ added: handles.length, total: this.size }, 'Added embeddings');
    return handles;
  }

  similaritySearch(query: number[], k: number): QueryResult[] {
    this.assertVector(query);

    const limit = Math.floor(k);
    if (this.size === 0 || limit <= 0) {
      return [];
    }

    const q = Float32Array.from(query);
    const scored: Array<{ position: number; score: number }> = [];

    for (let position = 0; position < this.size; position++) {
      const offset = position * this.dimension;
      let score = 0;
      for (let j = 0; j < this.dimension; j++) {
        const diff = this.vectors[offset + j] - q[j];
        score += diff * diff;
      }
      scored.push({ position, score });
    }

    scored.sort((a, b) => a.score - b.score || a.position - b.position);

    const results: QueryResult[] = [];
    for (const { position, score } of scored.slice(0, limit)) {
      const record = this.records[position];
      if (!record) continue;
      results.push({ ...record, score });
    }

    return results;
  }

  getDocument(id: number): VectorRecord | undefined {
    if (!Number.isInteger(id) || id < 0 || id >= this.records.length) {
      return undefined;
    }
    return this.records[id];
  }

  getDocuments(ids: number[]): Array<VectorRecord | undefined> {
    return ids.map(id => this.getDocument(id));
  }

  getAllDocuments(): VectorRecord[] {
    return this.records.slice();
  }

  clear(): void {
    this.vectors = new Float32Array(INITIAL_CAPACITY * this.dimension);
    this.records = [];
    logger.info('Vector index cleared');
  }

  async save(): Promise<void> {
    const count = this.records.length;
    const blob = Buffer.alloc(HEADER_BYTES + count * this.dimension * FLOAT_BYTES);
    MAGIC.copy(blob, 0);
    blob.writeUInt32LE(this.dimension, MAGIC.length);
    blob.writeUInt32LE(count, MAGIC.length + 4);
    for (let i = 0; i < count * this.dimension; i++) {
      blob.writeFloatLE(this.vectors[i], HEADER_BYTES + i * FLOAT_BYTES);
    }
    const metadata = JSON.stringify(this.records);

    const write = this.saveQueue.then(() => this.writeArtifacts(blob, metadata, count));
    // a failed write is reported to its own caller; later saves still run
    this.saveQueue = write.catch(() => undefined);
    return write;
  }

  async load(): Promise<void> {
    let blob: Buffer;
    try {
      blob = await readFile(this.indexPath);
    } catch (error) {
      if (isNotFound(error)) {
        logger.info({ indexPath: this.indexPath }, 'No persisted vector index, starting empty');
      } else {
        logger.warn({ error, indexPath: this.indexPath }, 'Could not read vector index, starting empty');
      }
      this.reset();
      return;
    }

    try {
      const { count, vectors } = this.decodeIndex(blob);
      const records = sidecarSchema.parse(JSON.parse(await readFile(this.metadataPath, 'utf-8')));

      if (records.length !== count) {
        throw new PersistenceError(`Index holds ${count} vectors but metadata holds ${records.length} records`);
      }
      records.forEach((record, position) => {
        if (record.index !== position) {
          throw new PersistenceError(`Metadata record at ${position} claims index ${record.index}`);
        }
      });

      this.vectors = vectors;
      this.records = records;
      logger.info({ count, indexPath: this.indexPath }, 'Loaded vector index');
    } catch (error) {
      logger.warn({ error, indexPath: this.indexPath }, 'Failed to load vector index, starting empty');
      this.reset();
    }
  }

  private async writeArtifacts(blob: Buffer, metadata: string, count: number): Promise<void> {
    const indexTmp = `${this.indexPath}.tmp`;
    const metadataTmp = `${this.metadataPath}.tmp`;

    try {
      await mkdir(dirname(this.indexPath), { recursive: true });
      await writeFile(indexTmp, blob);
      await writeFile(metadataTmp, metadata, 'utf-8');
      await rename(indexTmp, this.indexPath);
      await rename(metadataTmp, this.metadataPath);
      logger.debug({ count, indexPath: this.indexPath }, 'Saved vector index');
    } catch (error) {
      logger.error({ error, indexPath: this.indexPath }, 'Failed to save vector index');
      throw new PersistenceError('Vector index save failed', error);
    }
  }

  private decodeIndex(blob: Buffer): DecodedIndex {
    if (blob.length < HEADER_BYTES || !blob.subarray(0, MAGIC.length).equals(MAGIC)) {
      throw new PersistenceError('Index file has an unknown format');
    }

    const dimension = blob.readUInt32LE(MAGIC.length);
    const count = blob.readUInt32LE(MAGIC.length + 4);

    if (dimension !== this.dimension) {
      throw new PersistenceError(`Index dimension ${dimension} does not match ${this.dimension}`);
    }
    if (blob.length !== HEADER_BYTES + count * dimension * FLOAT_BYTES) {
      throw new PersistenceError('Index file is truncated');
    }

    const vectors = new Float32Array(Math.max(count, INITIAL_CAPACITY) * dimension);
    for (let i = 0; i < count * dimension; i++) {
      vectors[i] = blob.readFloatLE(HEADER_BYTES + i * FLOAT_BYTES);
    }

    return { count, vectors };
  }

  private reset(): void {
    this.vectors = new Float32Array(INITIAL_CAPACITY * this.dimension);
    this.records = [];
  }

  private ensureCapacity(count: number): void {
    const capacity = this.vectors.length / this.dimension;
    if (count <= capacity) return;

    let next = capacity;
    while (next < count) next *= 2;

    const grown = new Float32Array(next * this.dimension);
    grown.set(this.vectors.subarray(0, this.records.length * this.dimension));
    this.vectors = grown;
  }

  private assertVector(vector: number[], position?: number): void {
    if (vector.length !== this.dimension) {
      throw new DimensionMismatchError(this.dimension, vector.length, position);
    }
    if (!vector.every(Number.isFinite)) {
      throw new ValidationError('Embedding contains non-finite values', { position });
    }
  }
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
