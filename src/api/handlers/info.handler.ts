import { readFile } from 'fs/promises';
import type { FastifyRequest, FastifyReply } from 'fastify';
import { logger } from '../../utils/logger.js';
import { sendError } from './errors.js';

export const SERVICE_INFO = {
  name: 'Incident Report Service',
  version: '1.0.0',
  description: 'Generate incident SLA reports with narrative summaries',
  endpoints: {
    'GET /': 'This information',
    'GET /health': 'Service health',
    'GET /sample-data': 'Sample incident data',
    'POST /generate-report': 'Generate a report from incident data',
    'GET /reports': 'List generated reports',
    'GET /reports/:name': 'Download a generated report',
  },
} as const;

export function createInfoHandler() {
  return async (_request: FastifyRequest, reply: FastifyReply) => reply.code(200).send(SERVICE_INFO);
}

export function createSampleDataHandler(sampleDataPath: string) {
  return async (_request: FastifyRequest, reply: FastifyReply) => {
    try {
      const raw = await readFile(sampleDataPath, 'utf-8');
      const data: unknown = JSON.parse(raw);
      return reply.code(200).send(data);
    } catch (error) {
      logger.error({ error, path: sampleDataPath }, 'Sample data handler error');
      return sendError(reply, new Error('Error loading sample data'));
    }
  };
}
