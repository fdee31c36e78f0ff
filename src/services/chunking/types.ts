export type ChunkingStrategyName = 'paragraph' | 'sentence';

export interface ChunkingStrategy {
  readonly name: ChunkingStrategyName;
  split(text: string): string[];
}
