import { config } from './config/index.js';
import { logger } from './utils/logger.js';
import { buildApp } from './app.js';
import type { SlaThresholds } from './domain/sla.js';
import { IncidentValidator } from './services/validation/IncidentValidator.js';
import { MetricsAggregator } from './services/metrics/MetricsAggregator.js';
import { NarrativeBuilder } from './services/narrative/NarrativeBuilder.js';
import { NarrativeGenerator } from './services/narrative/NarrativeGenerator.js';
import { NarrativeServiceFactory } from './services/llm/NarrativeServiceFactory.js';
import { ReportAssembler } from './services/report/ReportAssembler.js';
import { ReportMetadataBuilder } from './services/report/ReportMetadataBuilder.js';
import { ReportService, fileTemplateLoader } from './services/report/ReportService.js';
import { PdfRenderer } from './services/rendering/PdfRenderer.js';
import { MarkdownRenderer } from './services/rendering/MarkdownRenderer.js';
import { FileSystemStorage } from './services/storage/FileSystemStorage.js';

logger.info('Initializing services...');

const slaThresholds: SlaThresholds = {
  byPriority: {
    Critical: config.sla.criticalHours,
    High: config.sla.highHours,
    Medium: config.sla.mediumHours,
    Low: config.sla.lowHours,
  },
  otherHours: config.sla.otherHours,
};

const metadata = new ReportMetadataBuilder();

const storage = new FileSystemStorage(config.storage.reportPath, metadata);
await storage.init();

const narrativeService = NarrativeServiceFactory.createNarrativeService();

const reportService = new ReportService({
  validator: new IncidentValidator(),
  aggregator: new MetricsAggregator(slaThresholds),
  narrative: new NarrativeGenerator(narrativeService, new NarrativeBuilder(), {
    timeoutMs: config.llm.timeoutMs,
    maxRetries: config.llm.maxRetries,
  }),
  assembler: new ReportAssembler(config.report.decimals),
  metadata,
  renderers: {
    pdf: new PdfRenderer({ fontPath: config.report.pdfFontPath }),
    markdown: new MarkdownRenderer(),
  },
  storage,
  loadTemplate: fileTemplateLoader(config.report.templatePath),
  defaults: {
    title: config.report.title,
    locale: config.report.locale,
    format: config.report.format,
  },
});

logger.info({ slaThresholds, provider: config.llm.provider }, 'Services initialized');

const fastify = await buildApp({
  reportService,
  narrativeService,
  storage,
  apiKey: config.auth.apiKey,
  sampleDataPath: config.storage.sampleDataPath,
  maxListLimit: config.storage.maxListLimit,
  environment: config.server.nodeEnv,
});

const shutdown = async () => {
  logger.info('Shutting down gracefully...');
  await fastify.close();
  logger.info('Shutdown complete');
  process.exit(0);
};

process.on('SIGINT', shutdown);
process.on('SIGTERM', shutdown);

try {
  await fastify.listen({
    port: config.server.port,
    host: config.server.host,
  });
  logger.info(`Server listening on port ${config.server.port}`);
} catch (err) {
  logger.error(err);
  process.exit(1);
}
