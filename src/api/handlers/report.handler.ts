import type { FastifyRequest, FastifyReply } from 'fastify';
import { logger } from '../../utils/logger.js';
import type { GenerateReportOptions, ReportService } from '../../services/report/ReportService.js';
import { sendError } from './errors.js';

interface GenerateReportBody {
  incidents: unknown[];
  options?: GenerateReportOptions;
}

interface ListReportsQuery {
  limit: number;
  offset: number;
}

interface ReportParams {
  name: string;
}

const contentDisposition = (name: string) => `attachment; filename="${name}"`;

export function createGenerateReportHandler(reportService: ReportService) {
  return async (
    request: FastifyRequest<{ Body: GenerateReportBody }>,
    reply: FastifyReply
  ) => {
    try {
      const { incidents, options } = request.body;

      logger.info({ incidents: incidents.length, format: options?.format }, 'Report generation requested');

      const { artifact, content, document } = await reportService.generate({ incidents, options });

      return reply
        .code(200)
        .header('Content-Type', artifact.mimeType)
        .header('Content-Disposition', contentDisposition(artifact.name))
        .header('X-Report-Name', artifact.name)
        .header('X-Narrative-Source', document.narrative.source)
        .send(content);
    } catch (error) {
      logger.error({ error }, 'Generate report handler error');
      return sendError(reply, error);
    }
  };
}

export function createListReportsHandler(reportService: ReportService) {
  return async (
    request: FastifyRequest<{ Querystring: ListReportsQuery }>,
    reply: FastifyReply
  ) => {
    try {
      const { limit, offset } = request.query;
      const page = await reportService.list({ limit, offset });
      return reply.code(200).send(page);
    } catch (error) {
      logger.error({ error }, 'List reports handler error');
      return sendError(reply, error);
    }
  };
}

export function createDownloadReportHandler(reportService: ReportService) {
  return async (
    request: FastifyRequest<{ Params: ReportParams }>,
    reply: FastifyReply
  ) => {
    try {
      const { artifact, content } = await reportService.retrieve(request.params.name);
      return reply
        .code(200)
        .header('Content-Type', artifact.mimeType)
        .header('Content-Disposition', contentDisposition(artifact.name))
        .send(content);
    } catch (error) {
      logger.error({ error, name: request.params.name }, 'Download report handler error');
      return sendError(reply, error);
    }
  };
}
