export const errorResponseSchema = {
  type: 'object',
  properties: {
    error: { type: 'string' },
    message: { type: 'string' },
    details: {},
  },
  required: ['error', 'message'],
} as const;

export const paginationQuerySchema = (maxLimit: number) =>
  ({
    type: 'object',
    properties: {
      limit: { type: 'integer', minimum: 1, maximum: maxLimit, default: Math.min(20, maxLimit) },
      offset: { type: 'integer', minimum: 0, default: 0 },
    },
  }) as const;
