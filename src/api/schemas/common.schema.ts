export const errorResponseSchema = {
  type: 'object',
  properties: {
    error: { type: 'string' },
    message: { type: 'string' },
    details: {},
  },
  required: ['error', 'message'],
} as const;

export const statusMessageSchema = {
  type: 'object',
  properties: {
    status: { type: 'string' },
    message: { type: 'string' },
  },
  required: ['status', 'message'],
} as const;

export const documentListSchema = {
  type: 'object',
  properties: {
    status: { type: 'string' },
    documents: {
      type: 'array',
      items: {
        type: 'object',
        properties: {
          name: { type: 'string' },
          size: { type: 'number' },
          modified: { type: 'string' },
        },
        required: ['name', 'size', 'modified'],
      },
    },
    count: { type: 'number' },
  },
  required: ['status', 'documents', 'count'],
} as const;

export const statsResponseSchema = {
  type: 'object',
  properties: {
    totalVectors: { type: 'number' },
    dimension: { type: 'number' },
    documents: { type: 'number' },
  },
  required: ['totalVectors', 'dimension', 'documents'],
} as const;
