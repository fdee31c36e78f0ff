import { packSentences, splitSentences } from '../sentences.js';
import type { ChunkingStrategy } from '../types.js';

const BLANK_LINE = /\n\s*\n/;
const PARAGRAPH_SEPARATOR = '\n\n';
const OVERLAP_PARAGRAPHS = 2;
const HEADING_MAX_LENGTH = 100;

export function isHeading(paragraph: string): boolean {
  if (paragraph.endsWith(':')) return true;

  return (
    paragraph.length < HEADING_MAX_LENGTH &&
    paragraph === paragraph.toUpperCase() &&
    paragraph !== paragraph.toLowerCase()
  );
}

export function splitParagraphs(text: string): string[] {
  return text
    .split(BLANK_LINE)
    .map(paragraph => paragraph.trim())
    .filter(paragraph => paragraph.length > 0);
}

export class ParagraphSegmentationStrategy implements ChunkingStrategy {
  readonly name = 'paragraph' as const;

  constructor(private chunkSize: number) {}

  split(text: string): string[] {
    const chunks: string[] = [];
    let buffer: string[] = [];
    let bufferLength = 0;
    // leading paragraphs of the buffer repeated from the previous chunk
    let carried = 0;

    const finalize = () => {
      chunks.push(buffer.join(PARAGRAPH_SEPARATOR));
    };

    for (const paragraph of splitParagraphs(text)) {
      if (buffer.length > 0 && bufferLength + PARAGRAPH_SEPARATOR.length + paragraph.length > this.chunkSize) {
        if (buffer.length > carried) {
          finalize();
        }
        buffer = this.overlapFor(buffer, paragraph);
        bufferLength = joinedLength(buffer);
        carried = buffer.length;
      }

      if (isHeading(paragraph) && buffer.length > 0) {
        if (buffer.length > carried) {
          finalize();
        }
        buffer = [];
        bufferLength = 0;
        carried = 0;
      }

      bufferLength = buffer.length === 0 ? paragraph.length : bufferLength + PARAGRAPH_SEPARATOR.length + paragraph.length;
      buffer.push(paragraph);
    }

    if (buffer.length > 0) {
      finalize();
    }

    return chunks.flatMap(chunk =>
      chunk.length <= this.chunkSize ? [chunk] : packSentences(splitSentences(chunk), this.chunkSize)
    );
  }

  /** Trailing paragraphs of `buffer`, at most two, that still fit beside `next`. */
  private overlapFor(buffer: string[], next: string): string[] {
    for (let keep = Math.min(OVERLAP_PARAGRAPHS, buffer.length); keep > 0; keep--) {
      const tail = buffer.slice(-keep);
      if (joinedLength([...tail, next]) <= this.chunkSize) {
        return tail;
      }
    }
    return [];
  }
}

function joinedLength(parts: string[]): number {
  if (parts.length === 0) return 0;
  return parts.reduce((sum, part) => sum + part.length, 0) + PARAGRAPH_SEPARATOR.length * (parts.length - 1);
}
