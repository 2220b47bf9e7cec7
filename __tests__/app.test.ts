import { readFile } from 'fs/promises';
import type { FastifyInstance } from 'fastify';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { buildApp } from '../src/app.js';
import { ComputationInvariantError } from '../src/utils/errors.js';
import { DEFAULT_SLA_THRESHOLDS } from '../src/domain/sla.js';
import { IncidentValidator } from '../src/services/validation/IncidentValidator.js';
import { MetricsAggregator } from '../src/services/metrics/MetricsAggregator.js';
import type { MetricsBundle } from '../src/services/metrics/types.js';
import { NarrativeBuilder } from '../src/services/narrative/NarrativeBuilder.js';
import { NarrativeGenerator } from '../src/services/narrative/NarrativeGenerator.js';
import { ReportAssembler } from '../src/services/report/ReportAssembler.js';
import { ReportMetadataBuilder } from '../src/services/report/ReportMetadataBuilder.js';
import { ReportService, fileTemplateLoader } from '../src/services/report/ReportService.js';
import { MarkdownRenderer } from '../src/services/rendering/MarkdownRenderer.js';
import { PdfRenderer } from '../src/services/rendering/PdfRenderer.js';
import { InMemoryStorage, scenarioRaw } from './helpers/fixtures.js';

const API_KEY = 'test-secret';
const headers = { 'x-api-key': API_KEY };

class InconsistentAggregator extends MetricsAggregator {
  aggregate(): MetricsBundle {
    throw new ComputationInvariantError('Compliance numerator is non-zero with an empty denominator', {
      withinSla: 1,
      breached: -1,
    });
  }
}

interface AppOverrides {
  loadTemplate?: () => Promise<string>;
  aggregator?: MetricsAggregator;
}

async function createApp(overrides: AppOverrides = {}) {
  const storage = new InMemoryStorage();
  const reportService = new ReportService({
    validator: new IncidentValidator(),
    aggregator: overrides.aggregator ?? new MetricsAggregator(DEFAULT_SLA_THRESHOLDS),
    narrative: new NarrativeGenerator(null, new NarrativeBuilder(), { timeoutMs: 50, maxRetries: 0 }),
    assembler: new ReportAssembler(),
    metadata: new ReportMetadataBuilder(),
    renderers: { pdf: new PdfRenderer(), markdown: new MarkdownRenderer() },
    storage,
    loadTemplate: overrides.loadTemplate ?? fileTemplateLoader('templates/report_template.md'),
    defaults: { title: 'Incident Report', locale: 'en', format: 'pdf' },
  });

  return buildApp({
    reportService,
    narrativeService: null,
    storage,
    apiKey: API_KEY,
    sampleDataPath: 'data/sample_data.json',
    maxListLimit: 100,
    environment: 'test',
  });
}

describe('HTTP API', () => {
  let app: FastifyInstance;

  beforeEach(async () => {
    app = await createApp();
  });

  afterEach(async () => {
    await app.close();
  });

  it('serves health without an API key', async () => {
    const response = await app.inject({ method: 'GET', url: '/health' });

    expect(response.statusCode).toBe(200);
    expect(response.json()).toMatchObject({
      status: 'ok',
      environment: 'test',
      services: { llm: 'disabled', storage: true },
    });
  });

  it('rejects requests without the API key', async () => {
    const response = await app.inject({ method: 'GET', url: '/' });

    expect(response.statusCode).toBe(403);
    expect(response.json()).toEqual({ error: 'FORBIDDEN', message: 'Invalid API Key' });
  });

  it('describes the service', async () => {
    const response = await app.inject({ method: 'GET', url: '/', headers });

    expect(response.statusCode).toBe(200);
    expect(response.json()).toMatchObject({ name: 'Incident Report Service' });
  });

  it('serves the sample data', async () => {
    const response = await app.inject({ method: 'GET', url: '/sample-data', headers });

    expect(response.statusCode).toBe(200);
    expect(response.json().incidents).toHaveLength(10);
  });

  it('generates a Markdown report from the sample data', async () => {
    const sample: { incidents: unknown[] } = JSON.parse(await readFile('data/sample_data.json', 'utf-8'));

    const response = await app.inject({
      method: 'POST',
      url: '/generate-report',
      headers,
      payload: { incidents: sample.incidents, options: { format: 'markdown', asOf: '2025-03-10T00:00:00Z' } },
    });

    expect(response.statusCode).toBe(200);
    expect(response.headers['content-type']).toBe('text/markdown; charset=utf-8');
    expect(response.headers['x-narrative-source']).toBe('fallback');
    const name = String(response.headers['x-report-name']);
    expect(response.headers['content-disposition']).toBe(`attachment; filename="${name}"`);
    expect(response.body.startsWith('# Incident Report\n')).toBe(true);
    expect(response.body).toContain('- Total Incidents: 10');
    expect(response.body.trimEnd().endsWith('Prepared by the incident reporting service.')).toBe(true);
  });

  it('generates a PDF report by default', async () => {
    const response = await app.inject({
      method: 'POST',
      url: '/generate-report',
      headers,
      payload: { incidents: scenarioRaw() },
    });

    expect(response.statusCode).toBe(200);
    expect(response.headers['content-type']).toBe('application/pdf');
    expect(response.rawPayload.subarray(0, 5).toString('latin1')).toBe('%PDF-');
  });

  it('rejects a body without incidents', async () => {
    const response = await app.inject({ method: 'POST', url: '/generate-report', headers, payload: {} });

    expect(response.statusCode).toBe(400);
    expect(response.json().error).toBe('VALIDATION_ERROR');
  });

  it('rejects an unsupported locale', async () => {
    const response = await app.inject({
      method: 'POST',
      url: '/generate-report',
      headers,
      payload: { incidents: [], options: { locale: 'fr' } },
    });

    expect(response.statusCode).toBe(400);
  });

  it('reports every invalid record field', async () => {
    const response = await app.inject({
      method: 'POST',
      url: '/generate-report',
      headers,
      payload: {
        incidents: [{ id: 'A', title: 'x', status: 'Open', priority: 'High', created_at: '31/12/2024' }, 7],
      },
    });

    expect(response.statusCode).toBe(400);
    const body = response.json();
    expect(body.error).toBe('VALIDATION_ERROR');
    expect(body.details).toEqual([
      { index: 0, field: 'created_at', message: 'has unparseable timestamp "31/12/2024"', value: '31/12/2024' },
      { index: 1, field: 'record', message: 'must be an object', value: 7 },
    ]);
  });

  it('lists and downloads generated reports', async () => {
    const generated = await app.inject({
      method: 'POST',
      url: '/generate-report',
      headers,
      payload: { incidents: scenarioRaw(), options: { format: 'markdown' } },
    });
    const name = String(generated.headers['x-report-name']);

    const list = await app.inject({ method: 'GET', url: '/reports?limit=5', headers });
    expect(list.statusCode).toBe(200);
    expect(list.json()).toMatchObject({ total: 1, limit: 5, offset: 0, items: [{ name }] });

    const download = await app.inject({ method: 'GET', url: `/reports/${name}`, headers });
    expect(download.statusCode).toBe(200);
    expect(download.body).toBe(generated.body);
  });

  it('rejects a list limit above the maximum', async () => {
    const response = await app.inject({ method: 'GET', url: '/reports?limit=1000', headers });
    expect(response.statusCode).toBe(400);
  });

  it('returns 404 for unknown reports', async () => {
    const response = await app.inject({
      method: 'GET',
      url: '/reports/incident_report_20250101_000000.pdf',
      headers,
    });

    expect(response.statusCode).toBe(404);
    expect(response.json().error).toBe('NOT_FOUND');
  });
});

describe('HTTP API with a broken template', () => {
  it('answers 422 naming the placeholder', async () => {
    const app = await createApp({ loadTemplate: async () => '# {{title}} {{owner}}' });

    const response = await app.inject({
      method: 'POST',
      url: '/generate-report',
      headers,
      payload: { incidents: [] },
    });
    await app.close();

    expect(response.statusCode).toBe(422);
    expect(response.json()).toEqual({
      error: 'TEMPLATE_ERROR',
      message: 'Template placeholder without value or default: {{owner}}',
      details: { placeholder: 'owner' },
    });
  });
});

describe('HTTP API with an inconsistent aggregation', () => {
  it('answers 500 with the invariant code rather than a client error', async () => {
    const app = await createApp({ aggregator: new InconsistentAggregator(DEFAULT_SLA_THRESHOLDS) });

    const response = await app.inject({
      method: 'POST',
      url: '/generate-report',
      headers,
      payload: { incidents: scenarioRaw() },
    });
    await app.close();

    expect(response.statusCode).toBe(500);
    expect(response.json()).toEqual({
      error: 'COMPUTATION_INVARIANT',
      message: 'Compliance numerator is non-zero with an empty denominator',
    });
  });
});
