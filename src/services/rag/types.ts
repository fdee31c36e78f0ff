export type IngestResult =
  | { status: 'success'; chunksProcessed: number; totalVectors: number }
  | { status: 'error'; code: string; message: string };

export interface SourceReference {
  document: string;
  score: number;
  text: string;
}

export interface QueryResponse<TAnswer = string> {
  question: string;
  answer: TAnswer;
  sources: SourceReference[];
  timestamp: string;
}

export interface StructuredFailure {
  error: string;
  raw_response: string;
}

export interface StreamingQueryResponse extends Omit<QueryResponse, 'answer'> {
  answer: AsyncIterable<string>;
}

export interface QueryOptions {
  topK?: number;
  signal?: AbortSignal;
}

export interface ClearResult {
  status: 'success';
  message: string;
}

export interface IndexStats {
  totalVectors: number;
  dimension: number;
  documents: number;
}
