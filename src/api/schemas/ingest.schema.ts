export const ingestResponseSchema = {
  type: 'object',
  properties: {
    status: { type: 'string', enum: ['success'] },
    chunksProcessed: { type: 'number' },
    totalVectors: { type: 'number' },
  },
  required: ['status', 'chunksProcessed', 'totalVectors'],
} as const;

export const ingestErrorSchema = {
  type: 'object',
  properties: {
    status: { type: 'string', enum: ['error'] },
    code: { type: 'string' },
    message: { type: 'string' },
  },
  required: ['status', 'message'],
} as const;
