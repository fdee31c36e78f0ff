export interface RequestOptions {
  signal?: AbortSignal;
}

export interface Embedder {
  readonly dimension: number;
  embedMany(texts: string[], options?: RequestOptions): Promise<number[][]>;
  embedOne(text: string, options?: RequestOptions): Promise<number[]>;
}
