export const generateReportBodySchema = {
  type: 'object',
  properties: {
    incidents: { type: 'array' },
    options: {
      type: 'object',
      additionalProperties: false,
      properties: {
        title: { type: 'string', minLength: 1, maxLength: 200 },
        locale: { type: 'string', enum: ['en', 'th'] },
        format: { type: 'string', enum: ['pdf', 'markdown'] },
        asOf: { type: 'string' },
        periodStart: { type: 'string' },
        periodEnd: { type: 'string' },
      },
    },
  },
  required: ['incidents'],
} as const;

export const reportParamsSchema = {
  type: 'object',
  properties: {
    name: { type: 'string', pattern: '^[A-Za-z0-9_-][A-Za-z0-9._-]*$' },
  },
  required: ['name'],
} as const;

export const artifactSchema = {
  type: 'object',
  properties: {
    name: { type: 'string' },
    sizeBytes: { type: ['number', 'null'] },
    createdAt: { type: 'string' },
    mimeType: { type: 'string' },
  },
  required: ['name', 'sizeBytes', 'createdAt', 'mimeType'],
} as const;

export const reportListResponseSchema = {
  type: 'object',
  properties: {
    items: { type: 'array', items: artifactSchema },
    total: { type: 'number' },
    limit: { type: 'number' },
    offset: { type: 'number' },
  },
  required: ['items', 'total', 'limit', 'offset'],
} as const;
