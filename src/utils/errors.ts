export class ValidationError extends Error {
  code = 'VALIDATION_ERROR';
  constructor(message: string, public details?: unknown) {
    super(message);
    this.name = 'ValidationError';
  }
}

export class DimensionMismatchError extends Error {
  code = 'DIMENSION_MISMATCH';
  constructor(public expected: number, public actual: number, public position?: number) {
    super(
      position === undefined
        ? `Dimensionality mismatch: expected ${expected}, got ${actual}`
        : `Dimensionality mismatch at item ${position}: expected ${expected}, got ${actual}`
    );
    this.name = 'DimensionMismatchError';
  }
}

export class PersistenceError extends Error {
  code = 'PERSISTENCE_ERROR';
  constructor(message: string, public details?: unknown) {
    super(message);
    this.name = 'PersistenceError';
  }
}

export class EmbeddingError extends Error {
  code = 'EMBEDDING_ERROR';
  constructor(message: string, public details?: unknown) {
    super(message);
    this.name = 'EmbeddingError';
  }
}

export class GenerationError extends Error {
  code = 'GENERATION_ERROR';
  constructor(message: string, public details?: unknown) {
    super(message);
    this.name = 'GenerationError';
  }
}

export class EmptyCorpusError extends Error {
  code = 'EMPTY_CORPUS';
  constructor(message: string, public details?: unknown) {
    super(message);
    this.name = 'EmptyCorpusError';
  }
}
