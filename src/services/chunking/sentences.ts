const SENTENCE_BOUNDARY = /(?<=[.!?])\s+/;

export function splitSentences(text: string): string[] {
  return text
    .split(SENTENCE_BOUNDARY)
    .map(sentence => sentence.trim())
    .filter(sentence => sentence.length > 0);
}

/**
 * Greedily groups sentences into space-joined chunks of at most `chunkSize`
 * characters. A sentence longer than `chunkSize` becomes a chunk on its own.
 */
export function packSentences(sentences: string[], chunkSize: number): string[] {
  const chunks: string[] = [];
  let current: string[] = [];
  let currentLength = 0;

  for (const sentence of sentences) {
    const nextLength = current.length === 0 ? sentence.length : currentLength + 1 + sentence.length;

    if (current.length > 0 && nextLength > chunkSize) {
      chunks.push(current.join(' '));
      current = [sentence];
      currentLength = sentence.length;
      continue;
    }

    current.push(sentence);
    currentLength = nextLength;
  }

  if (current.length > 0) {
    chunks.push(current.join(' '));
  }

  return chunks;
}
