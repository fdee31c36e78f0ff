export type MetadataValue = string | number | boolean | null;

export type RecordMetadata = Record<string, MetadataValue>;

export type VectorRecord = Readonly<RecordMetadata> & {
  readonly text: string;
  readonly index: number;
};

export type QueryResult = VectorRecord & {
  readonly score: number;
};

export function createVectorRecord(text: string, index: number, metadata: RecordMetadata = {}): VectorRecord {
  return { ...metadata, text, index };
}

export function readString(record: VectorRecord, key: string): string | undefined {
  const value = record[key];
  return typeof value === 'string' ? value : undefined;
}
