import { splitSentences } from '../sentences.js';
import type { ChunkingStrategy } from '../types.js';

const APPROX_CHARS_PER_WORD = 5;

export class SentenceSegmentationStrategy implements ChunkingStrategy {
  readonly name = 'sentence' as const;
  private overlapWords: number;

  constructor(private chunkSize: number, chunkOverlap: number) {
    this.overlapWords = Math.floor(chunkOverlap / APPROX_CHARS_PER_WORD);
  }

  split(text: string): string[] {
    const sentences = splitSentences(text).map(sentence => sentence.replace(/\s+/g, ' '));
    const chunks: string[] = [];
    let current = '';

    for (const sentence of sentences) {
      if (!current) {
        current = sentence;
      } else if (current.length + 1 + sentence.length <= this.chunkSize) {
        current = `${current} ${sentence}`;
      } else {
        chunks.push(current);
        current = this.seed(current, sentence);
      }
    }

    if (current) {
      chunks.push(current);
    }

    return chunks;
  }

  private seed(previous: string, sentence: string): string {
    if (this.overlapWords === 0) return sentence;

    const overlap = previous.split(' ').slice(-this.overlapWords);
    while (overlap.length > 0 && overlap.join(' ').length + 1 + sentence.length > this.chunkSize) {
      overlap.shift();
    }

    return overlap.length > 0 ? `${overlap.join(' ')} ${sentence}` : sentence;
  }
}
