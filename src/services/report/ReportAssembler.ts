import { logger } from '../../utils/logger.js';
import { TemplateError } from '../../utils/errors.js';
import { DEFAULT_DECIMALS, fixed, percent } from '../../utils/format.js';
import type { IncidentRecord } from '../../domain/entities/Incident.js';
import { classifySla, resolutionHours, type SlaThresholds } from '../../domain/sla.js';
import { formatDate, formatUtc, formatUtcSeconds } from '../validation/timestamps.js';
import type { MetricsBundle } from '../metrics/types.js';
import { breakdownTable, incidentTable, slaTable, statusTable } from './tables.js';
import type { AssembleInput, IncidentDisplayRow, ReportDocument, ReportHeader } from './types.js';

/** `{{name}}` or `{{name|default text}}` */
const PLACEHOLDER_PATTERN = /\{\{\s*([A-Za-z0-9_]+)\s*(?:\|([^}]*))?\}\}/g;

export function toDisplayRow(
  record: IncidentRecord,
  thresholds: SlaThresholds,
  asOf: Date,
  decimals = DEFAULT_DECIMALS
): IncidentDisplayRow {
  const hours = resolutionHours(record);
  return {
    id: record.id,
    title: record.title,
    priority: record.priority,
    status: record.status,
    department: record.department,
    category: record.category,
    created: formatUtc(record.createdAt),
    resolved: hours !== null && record.resolvedAt ? formatUtc(record.resolvedAt) : '-',
    resolutionHours: hours !== null ? fixed(hours, decimals) : '-',
    slaStatus: classifySla(record, thresholds, asOf),
  };
}

export function resolvePeriod(
  records: readonly IncidentRecord[],
  asOf: Date,
  start?: Date,
  end?: Date
): { start: Date; end: Date } {
  if (records.length === 0) {
    return { start: start ?? asOf, end: end ?? asOf };
  }

  // Single pass; batch size is unbounded, so no argument spreading.
  let earliest = records[0].createdAt.getTime();
  let latest = earliest;
  for (const record of records) {
    const created = record.createdAt.getTime();
    if (created < earliest) earliest = created;
    if (created > latest) latest = created;
  }

  return {
    start: start ?? new Date(earliest),
    end: end ?? new Date(latest),
  };
}

export class ReportAssembler {
  constructor(private decimals: number = DEFAULT_DECIMALS) {}

  assemble(input: AssembleInput): ReportDocument {
    const { metrics, narrative } = input;
    const asOf = new Date(metrics.asOf);
    const period = resolvePeriod(input.records, asOf, input.periodStart, input.periodEnd);

    const incidents = input.records.map(record =>
      Object.freeze(toDisplayRow(record, metrics.slaThresholds, asOf, this.decimals))
    );

    const header: ReportHeader = Object.freeze({
      title: input.title,
      periodStart: period.start.toISOString(),
      periodEnd: period.end.toISOString(),
      generatedAt: input.generatedAt.toISOString(),
      asOf: metrics.asOf,
    });

    const values = this.buildValues(input, metrics, incidents, period);
    const text = this.substitute(input.template, values, input.extraValues ?? {});

    logger.debug(
      { incidents: incidents.length, length: text.length, narrative: narrative.source },
      'Report assembled'
    );

    return Object.freeze({
      header,
      narrative: Object.freeze({ ...narrative }),
      metrics,
      incidents: Object.freeze(incidents),
      text,
    });
  }

  private buildValues(
    input: AssembleInput,
    metrics: MetricsBundle,
    incidents: readonly IncidentDisplayRow[],
    period: { start: Date; end: Date }
  ): Map<string, string> {
    const d = this.decimals;
    return new Map<string, string>([
      ['title', input.title],
      ['period_start', formatDate(period.start)],
      ['period_end', formatDate(period.end)],
      ['generated_at', formatUtcSeconds(input.generatedAt)],
      ['as_of', formatUtcSeconds(new Date(metrics.asOf))],
      ['summary', input.narrative.text],
      ['narrative_source', input.narrative.source],
      ['total_incidents', String(metrics.totals.total)],
      ['resolved_incidents', String(metrics.totals.resolved)],
      ['unresolved_incidents', String(metrics.totals.unresolved)],
      ['resolution_rate', percent(metrics.resolutionRate, d)],
      ['avg_resolution_time', fixed(metrics.averageResolutionHours, d)],
      ['sla_compliance_rate', percent(metrics.sla.complianceRate, d)],
      ['within_sla', String(metrics.sla.withinSla)],
      ['sla_breached', String(metrics.sla.breached)],
      ['sla_pending', String(metrics.sla.pending)],
      ['status_mismatches', String(metrics.statusMismatches)],
      ['priority_table', breakdownTable('priority', metrics.byPriority, d)],
      ['department_table', breakdownTable('department', metrics.byDepartment, d)],
      ['category_table', breakdownTable('category', metrics.byCategory, d)],
      ['sla_table', slaTable(metrics, d)],
      ['status_table', statusTable(metrics.byStatus)],
      ['incident_table', incidentTable(incidents)],
    ]);
  }

  private substitute(
    template: string,
    values: ReadonlyMap<string, string>,
    extraValues: Readonly<Record<string, string>>
  ): string {
    const extras = new Map(Object.entries(extraValues));
    const missing: string[] = [];

    const text = template.replace(PLACEHOLDER_PATTERN, (match: string, name: string, fallback?: string) => {
      const value = values.get(name) ?? extras.get(name) ?? fallback;
      if (value === undefined) {
        missing.push(name);
        return match;
      }
      return value;
    });

    if (missing.length > 0) {
      const names = Array.from(new Set(missing));
      throw new TemplateError(
        `Template placeholder${names.length === 1 ? '' : 's'} without value or default: ${names
          .map(name => `{{${name}}}`)
          .join(', ')}`,
        names[0]
      );
    }

    return text;
  }
}
