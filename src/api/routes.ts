import type { FastifyInstance } from 'fastify';
import {
  createGenerateReportHandler,
  createListReportsHandler,
  createDownloadReportHandler,
} from './handlers/report.handler.js';
import { createInfoHandler, createSampleDataHandler } from './handlers/info.handler.js';
import { errorResponseSchema, paginationQuerySchema } from './schemas/common.schema.js';
import {
  generateReportBodySchema,
  reportParamsSchema,
  reportListResponseSchema,
} from './schemas/report.schema.js';
import type { ReportService } from '../services/report/ReportService.js';

export interface RouteOptions {
  sampleDataPath: string;
  maxListLimit: number;
}

export async function registerRoutes(
  fastify: FastifyInstance,
  reportService: ReportService,
  options: RouteOptions
) {
  fastify.get('/', {
    handler: createInfoHandler(),
  });

  fastify.get('/sample-data', {
    handler: createSampleDataHandler(options.sampleDataPath),
  });

  fastify.post('/generate-report', {
    schema: {
      body: generateReportBodySchema,
      response: {
        400: errorResponseSchema,
        422: errorResponseSchema,
        500: errorResponseSchema,
      },
    },
    handler: createGenerateReportHandler(reportService),
  });

  fastify.get('/reports', {
    schema: {
      querystring: paginationQuerySchema(options.maxListLimit),
      response: {
        200: reportListResponseSchema,
        500: errorResponseSchema,
      },
    },
    handler: createListReportsHandler(reportService),
  });

  fastify.get('/reports/:name', {
    schema: {
      params: reportParamsSchema,
      response: {
        404: errorResponseSchema,
        500: errorResponseSchema,
      },
    },
    handler: createDownloadReportHandler(reportService),
  });
}
