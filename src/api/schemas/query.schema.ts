export const queryParamsSchema = {
  type: 'object',
  required: ['question'],
  properties: {
    question: { type: 'string' },
    top_k: { type: 'integer', minimum: 1, maximum: 100 },
  },
} as const;

export const structuredQueryBodySchema = {
  type: 'object',
  required: ['question', 'response_format'],
  properties: {
    question: { type: 'string' },
    response_format: { type: ['object', 'string'] },
    top_k: { type: 'integer', minimum: 1, maximum: 100 },
  },
} as const;

const sourceSchema = {
  type: 'object',
  properties: {
    document: { type: 'string' },
    score: { type: 'number' },
    text: { type: 'string' },
  },
  required: ['document', 'score', 'text'],
} as const;

export const queryResponseSchema = {
  type: 'object',
  properties: {
    question: { type: 'string' },
    answer: { type: 'string' },
    sources: { type: 'array', items: sourceSchema },
    timestamp: { type: 'string' },
  },
  required: ['question', 'answer', 'sources', 'timestamp'],
} as const;

export const structuredQueryResponseSchema = {
  type: 'object',
  properties: {
    question: { type: 'string' },
    answer: {},
    sources: { type: 'array', items: sourceSchema },
    timestamp: { type: 'string' },
  },
  required: ['question', 'answer', 'sources', 'timestamp'],
} as const;

export interface QueryParams {
  question: string;
  top_k?: number;
}

export interface StructuredQueryBody {
  question: string;
  response_format: unknown;
  top_k?: number;
}
