import { describe, expect, it } from 'vitest';
import { TemplateError } from '../src/utils/errors.js';
import { ReportAssembler, resolvePeriod } from '../src/services/report/ReportAssembler.js';
import { parseTableRow } from '../src/services/report/tables.js';
import type { AssembleInput } from '../src/services/report/types.js';
import { at, incident, scenarioMetrics, scenarioRecords } from './helpers/fixtures.js';
import { DEFAULT_SLA_THRESHOLDS } from '../src/domain/sla.js';
import { MetricsAggregator } from '../src/services/metrics/MetricsAggregator.js';

const input = (overrides: Partial<AssembleInput> = {}): AssembleInput => ({
  title: 'Weekly Incidents',
  generatedAt: at('2025-01-01T12:00:00Z'),
  metrics: scenarioMetrics(),
  narrative: { source: 'generated', text: 'Summary text' },
  records: scenarioRecords(),
  template: '',
  ...overrides,
});

const assembler = new ReportAssembler();

describe('ReportAssembler', () => {
  it('fills header values', () => {
    const document = assembler.assemble(
      input({
        template:
          '# {{title}}\n{{period_start}} to {{period_end}}\n{{generated_at}} / {{as_of}}\n{{summary}} ({{narrative_source}})',
      })
    );

    expect(document.text).toBe(
      '# Weekly Incidents\n2025-01-01 to 2025-01-01\n2025-01-01 12:00:00 UTC / 2025-01-01 10:00:00 UTC\nSummary text (generated)'
    );
    expect(document.header).toEqual({
      title: 'Weekly Incidents',
      periodStart: '2025-01-01T00:00:00.000Z',
      periodEnd: '2025-01-01T00:00:00.000Z',
      generatedAt: '2025-01-01T12:00:00.000Z',
      asOf: '2025-01-01T10:00:00.000Z',
    });
  });

  it('fills metric values', () => {
    const document = assembler.assemble(
      input({
        template:
          '{{total_incidents}}|{{resolved_incidents}}|{{unresolved_incidents}}|{{resolution_rate}}|' +
          '{{avg_resolution_time}}|{{sla_compliance_rate}}|{{within_sla}}|{{sla_breached}}|{{sla_pending}}|{{status_mismatches}}',
      })
    );

    expect(document.text).toBe('2|1|1|50.00|2.00|50.00|1|1|0|0');
  });

  it('renders the priority table', () => {
    const document = assembler.assemble(input({ template: '{{priority_table}}' }));

    expect(document.text).toBe(
      [
        '| Priority | Total | Resolved | Unresolved | Within SLA | SLA Breached | Pending | Compliance Rate (%) | Avg Resolution (h) |',
        '| --- | --- | --- | --- | --- | --- | --- | --- | --- |',
        '| High | 2 | 1 | 1 | 1 | 1 | 0 | 100.00 | 2.00 |',
      ].join('\n')
    );
  });

  it('renders the SLA table for every known priority', () => {
    const document = assembler.assemble(input({ template: '{{sla_table}}' }));

    expect(document.text).toBe(
      [
        '| Priority | Threshold (h) | Within SLA | SLA Breached | Pending | Compliance Rate (%) |',
        '| --- | --- | --- | --- | --- | --- |',
        '| Critical | 4.00 | 0 | 0 | 0 | 0.00 |',
        '| High | 8.00 | 1 | 1 | 0 | 100.00 |',
        '| Medium | 24.00 | 0 | 0 | 0 | 0.00 |',
        '| Low | 72.00 | 0 | 0 | 0 | 0.00 |',
      ].join('\n')
    );
  });

  it('renders the incident and status tables', () => {
    const document = assembler.assemble(input({ template: '{{incident_table}}\n\n{{status_table}}' }));

    expect(document.text).toBe(
      [
        '| ID | Title | Priority | Status | Department | Category | Created (UTC) | Resolved (UTC) | Resolution (h) | SLA Status |',
        '| --- | --- | --- | --- | --- | --- | --- | --- | --- | --- |',
        '| INC-1 | Disk full | High | Resolved | IT | Network | 2025-01-01 00:00 | 2025-01-01 02:00 | 2.00 | Within SLA |',
        '| INC-2 | Login page down | High | Open | IT | Network | 2025-01-01 00:00 | - | - | Breach |',
        '',
        '| Status | Count |',
        '| --- | --- |',
        '| Resolved | 1 |',
        '| Open | 1 |',
      ].join('\n')
    );
  });

  it('notes groups whose compliance is undefined', () => {
    const records = [incident({ id: 'X', department: 'HR' })];
    const metrics = new MetricsAggregator(DEFAULT_SLA_THRESHOLDS).aggregate(records, {
      asOf: at('2025-01-01T01:00:00Z'),
    });

    const document = assembler.assemble(input({ metrics, records, template: '{{department_table}}' }));

    expect(document.text.split('\n').slice(-2)).toEqual([
      '',
      '_No resolved incidents (compliance shown as 0): HR_',
    ]);
  });

  it('escapes pipes and newlines so cells survive a round trip', () => {
    const records = [incident({ id: 'INC-9', title: 'Queue | worker\nstalled', status: 'Open' })];
    const document = assembler.assemble(input({ records, template: '{{incident_table}}' }));

    const dataRow = document.text.split('\n')[2];
    expect(dataRow).toContain('| Queue \\| worker stalled |');
    expect(parseTableRow(dataRow).slice(0, 2)).toEqual(['INC-9', 'Queue | worker stalled']);
  });

  it('parses numbers back from rendered rows', () => {
    const document = assembler.assemble(input({ template: '{{priority_table}}' }));
    const cells = parseTableRow(document.text.split('\n')[2]);

    expect(Number(cells[7]) / 100).toBeCloseTo(document.metrics.byPriority[0].complianceRate, 4);
    expect(Number(cells[8])).toBeCloseTo(document.metrics.byPriority[0].averageResolutionHours, 2);
  });

  it('uses inline defaults and extra values', () => {
    const template = '{{ title }} - {{footer|Thanks}} - {{team|none}}';

    expect(assembler.assemble(input({ template })).text).toBe('Weekly Incidents - Thanks - none');
    expect(
      assembler.assemble(input({ template, extraValues: { footer: 'Custom', title: 'Ignored' } })).text
    ).toBe('Weekly Incidents - Custom - none');
  });

  it('rejects placeholders without a value or default', () => {
    const template = '{{title}} {{owner}} {{owner}} {{region}}';

    expect(() => assembler.assemble(input({ template }))).toThrow(
      'Template placeholders without value or default: {{owner}}, {{region}}'
    );
    try {
      assembler.assemble(input({ template }));
    } catch (error) {
      expect(error).toBeInstanceOf(TemplateError);
      expect(error).toMatchObject({ placeholder: 'owner', code: 'TEMPLATE_ERROR' });
    }
  });

  it('honours explicit period bounds', () => {
    const document = assembler.assemble(
      input({
        template: '{{period_start}}..{{period_end}}',
        periodStart: at('2024-12-01T00:00:00Z'),
        periodEnd: at('2024-12-31T23:59:59Z'),
      })
    );
    expect(document.text).toBe('2024-12-01..2024-12-31');
  });

  it('uses the configured precision', () => {
    const document = new ReportAssembler(3).assemble(
      input({ template: '{{avg_resolution_time}} {{sla_compliance_rate}}' })
    );
    expect(document.text).toBe('2.000 50.000');
    expect(document.incidents[0].resolutionHours).toBe('2.000');
  });

  it('assembles a very large batch', () => {
    const records = Array.from({ length: 200_000 }, (_, i) =>
      incident({ id: `INC-${i}`, createdAt: new Date(Date.parse('2025-01-01T00:00:00Z') + i * 1000) })
    );

    const document = assembler.assemble(input({ records, template: '{{period_start}}..{{period_end}}' }));

    expect(document.text).toBe('2025-01-01..2025-01-03');
    expect(document.incidents).toHaveLength(200_000);
  }, 30_000);

  it('returns a frozen document', () => {
    const document = assembler.assemble(input({ template: '{{title}}' }));

    expect(Object.isFrozen(document)).toBe(true);
    expect(Object.isFrozen(document.header)).toBe(true);
    expect(Object.isFrozen(document.incidents[0])).toBe(true);
    expect(document.incidents[1].slaStatus).toBe('Breach');
  });
});

describe('resolvePeriod', () => {
  const asOf = at('2025-06-01T00:00:00Z');

  it('spans the earliest and latest creation times', () => {
    const records = [
      incident({ createdAt: at('2025-01-05T00:00:00Z') }),
      incident({ createdAt: at('2025-01-02T00:00:00Z') }),
    ];
    expect(resolvePeriod(records, asOf)).toEqual({
      start: at('2025-01-02T00:00:00Z'),
      end: at('2025-01-05T00:00:00Z'),
    });
  });

  it('handles batches far larger than the argument limit', () => {
    const base = Date.parse('2025-01-01T00:00:00Z');
    const records = Array.from({ length: 200_000 }, (_, i) =>
      incident({ id: `INC-${i}`, createdAt: new Date(base + ((i * 7919) % 200_000) * 60_000) })
    );

    expect(resolvePeriod(records, asOf)).toEqual({
      start: at('2025-01-01T00:00:00Z'),
      end: new Date(base + 199_999 * 60_000),
    });
  });

  it('falls back to the as-of time for an empty batch', () => {
    expect(resolvePeriod([], asOf)).toEqual({ start: asOf, end: asOf });
  });
});
