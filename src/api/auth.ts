import type { FastifyRequest, FastifyReply } from 'fastify';
import { logger } from '../utils/logger.js';

export const API_KEY_HEADER = 'x-api-key';

const PUBLIC_PATHS = new Set(['/health']);

/** Shared-key check; disabled when no key is configured. */
export function createApiKeyHook(apiKey: string | undefined) {
  if (!apiKey) {
    logger.warn('API_KEY not set; requests are not authenticated');
  }

  return async (request: FastifyRequest, reply: FastifyReply) => {
    if (!apiKey) return;

    const path = request.url.split('?')[0];
    if (PUBLIC_PATHS.has(path)) return;

    if (request.headers[API_KEY_HEADER] !== apiKey) {
      logger.warn({ url: path }, 'Rejected request with invalid API key');
      return reply.code(403).send({ error: 'FORBIDDEN', message: 'Invalid API Key' });
    }
  };
}
