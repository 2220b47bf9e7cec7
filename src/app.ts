import Fastify, { type FastifyInstance } from 'fastify';
import { logger } from './utils/logger.js';
import { createApiKeyHook } from './api/auth.js';
import { registerRoutes } from './api/routes.js';
import type { ReportService } from './services/report/ReportService.js';
import type { NarrativeService } from './services/llm/NarrativeService.interface.js';
import type { ReportStorage } from './services/storage/ReportStorage.interface.js';

export interface AppDependencies {
  reportService: ReportService;
  narrativeService: NarrativeService | null;
  storage: ReportStorage;
  apiKey?: string;
  sampleDataPath: string;
  maxListLimit: number;
  environment: string;
  bodyLimitBytes?: number;
}

export async function buildApp(deps: AppDependencies): Promise<FastifyInstance> {
  const fastify = Fastify({
    logger: false,
    bodyLimit: deps.bodyLimitBytes ?? 10 * 1024 * 1024,
  });

  fastify.setErrorHandler((error, request, reply) => {
    if (error.validation) {
      return reply.code(400).send({ error: 'VALIDATION_ERROR', message: error.message });
    }
    logger.error({ error, url: request.url }, 'Request error');
    return reply.code(500).send({
      error: 'INTERNAL_ERROR',
      message: error.message,
    });
  });

  fastify.addHook('onRequest', createApiKeyHook(deps.apiKey));

  fastify.addHook('onResponse', async (request, reply) => {
    logger.debug({ method: request.method, url: request.url, statusCode: reply.statusCode }, 'Request completed');
  });

  fastify.get('/health', async () => {
    const [llmOk, storageOk] = await Promise.all([
      deps.narrativeService ? deps.narrativeService.testConnection() : Promise.resolve(null),
      deps.storage.testConnection(),
    ]);

    return {
      status: storageOk && llmOk !== false ? 'ok' : 'degraded',
      timestamp: new Date().toISOString(),
      environment: deps.environment,
      services: {
        llm: llmOk === null ? 'disabled' : llmOk,
        storage: storageOk,
      },
    };
  });

  await registerRoutes(fastify, deps.reportService, {
    sampleDataPath: deps.sampleDataPath,
    maxListLimit: deps.maxListLimit,
  });

  return fastify;
}
