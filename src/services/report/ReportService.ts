import { readFile } from 'fs/promises';
import type { ReportFormat } from '../../config/validation.js';
import { logger } from '../../utils/logger.js';
import { shortId } from '../../utils/uuid.js';
import {
  ArtifactNotFoundError,
  DocumentRenderError,
  TemplateError,
  ValidationError,
} from '../../utils/errors.js';
import type { IncidentValidator } from '../validation/IncidentValidator.js';
import { parseTimestamp } from '../validation/timestamps.js';
import type { MetricsAggregator } from '../metrics/MetricsAggregator.js';
import type { NarrativeGenerator } from '../narrative/NarrativeGenerator.js';
import type { NarrativeLocale } from '../narrative/types.js';
import type { DocumentRenderer } from '../rendering/DocumentRenderer.interface.js';
import type { ArtifactPage, ListOptions, ReportStorage } from '../storage/ReportStorage.interface.js';
import type { ReportAssembler } from './ReportAssembler.js';
import type { ReportMetadataBuilder } from './ReportMetadataBuilder.js';
import type { ArtifactMetadata, ReportDocument } from './types.js';

export interface GenerateReportOptions {
  title?: string;
  locale?: NarrativeLocale;
  format?: ReportFormat;
  asOf?: string | Date;
  periodStart?: string | Date;
  periodEnd?: string | Date;
}

export interface GenerateReportRequest {
  incidents: unknown;
  options?: GenerateReportOptions;
}

export interface GeneratedReport {
  document: ReportDocument;
  artifact: ArtifactMetadata;
  content: Buffer;
}

export interface ReportServiceDependencies {
  validator: IncidentValidator;
  aggregator: MetricsAggregator;
  narrative: NarrativeGenerator;
  assembler: ReportAssembler;
  metadata: ReportMetadataBuilder;
  renderers: Record<ReportFormat, DocumentRenderer>;
  storage: ReportStorage;
  loadTemplate: () => Promise<string>;
  defaults: {
    title: string;
    locale: NarrativeLocale;
    format: ReportFormat;
  };
  now?: () => Date;
}

export function fileTemplateLoader(path: string): () => Promise<string> {
  return async () => {
    try {
      return await readFile(path, 'utf-8');
    } catch (error) {
      logger.error({ error, path }, 'Failed to read report template');
      throw new TemplateError(`Report template could not be read: ${path}`);
    }
  };
}

function optionalDate(field: string, value: string | Date | undefined): Date | undefined {
  if (value === undefined) return undefined;
  const parsed = parseTimestamp(value);
  if (!parsed) {
    throw new ValidationError(`Option "${field}" has unparseable timestamp`, [
      { index: -1, field, message: `has unparseable timestamp ${JSON.stringify(value)}`, value },
    ]);
  }
  return parsed;
}

/**
 * One generation run: validate, aggregate, narrate, assemble, render, store.
 * Holds no per-request state; concurrent calls share nothing mutable.
 */
export class ReportService {
  private now: () => Date;

  constructor(private deps: ReportServiceDependencies) {
    this.now = deps.now ?? (() => new Date());
  }

  async generate(request: GenerateReportRequest): Promise<GeneratedReport> {
    const options = request.options ?? {};
    const generatedAt = this.now();
    const asOf = optionalDate('asOf', options.asOf) ?? generatedAt;
    const periodStart = optionalDate('periodStart', options.periodStart);
    const periodEnd = optionalDate('periodEnd', options.periodEnd);

    if (periodStart && periodEnd && periodStart.getTime() > periodEnd.getTime()) {
      throw new ValidationError('Option "periodStart" must not be later than "periodEnd"', [
        { index: -1, field: 'periodStart', message: 'must not be later than periodEnd' },
      ]);
    }

    const locale = options.locale ?? this.deps.defaults.locale;
    const format = options.format ?? this.deps.defaults.format;
    const renderer = this.deps.renderers[format];

    const records = this.deps.validator.validate(request.incidents);
    const metrics = this.deps.aggregator.aggregate(records, { asOf });

    const [narrative, template] = await Promise.all([
      this.deps.narrative.generate(metrics, locale),
      this.deps.loadTemplate(),
    ]);

    const document = this.deps.assembler.assemble({
      title: options.title ?? this.deps.defaults.title,
      periodStart,
      periodEnd,
      generatedAt,
      metrics,
      narrative,
      records,
      template,
    });

    const content = await this.render(renderer, document);

    const name = this.deps.metadata.buildName(generatedAt, {
      extension: renderer.extension,
      suffix: shortId(),
    });
    const artifact = await this.deps.storage.store(name, content);

    logger.info(
      {
        name,
        format,
        incidents: metrics.totals.total,
        narrative: narrative.source,
        size: content.length,
      },
      'Report generated'
    );

    return { document, artifact, content };
  }

  async list(options: ListOptions): Promise<ArtifactPage> {
    return this.deps.storage.list(options);
  }

  async retrieve(name: string): Promise<{ artifact: ArtifactMetadata; content: Buffer }> {
    const createdAt = this.deps.metadata.parseName(name);
    if (!createdAt) {
      throw new ArtifactNotFoundError(`Report not found: ${name}`, name);
    }
    const content = await this.deps.storage.retrieve(name);
    return { artifact: this.deps.metadata.build(name, createdAt, content.length), content };
  }

  private async render(renderer: DocumentRenderer, document: ReportDocument): Promise<Buffer> {
    try {
      return await renderer.render(document);
    } catch (error) {
      logger.error({ error, format: renderer.extension }, 'Report rendering failed');
      if (error instanceof DocumentRenderError) throw error;
      throw new DocumentRenderError('Report rendering failed', error);
    }
  }
}
