import { KNOWN_PRIORITIES, OTHER_BUCKET } from '../../domain/entities/Incident.js';
import { thresholdFor } from '../../domain/sla.js';
import { fixed, percent } from '../../utils/format.js';
import type { BreakdownDimension, BreakdownRow, MetricsBundle, StatusCount } from '../metrics/types.js';
import type { IncidentDisplayRow } from './types.js';

export const BREAKDOWN_COLUMNS = [
  'Total',
  'Resolved',
  'Unresolved',
  'Within SLA',
  'SLA Breached',
  'Pending',
  'Compliance Rate (%)',
  'Avg Resolution (h)',
] as const;

export const SLA_COLUMNS = [
  'Priority',
  'Threshold (h)',
  'Within SLA',
  'SLA Breached',
  'Pending',
  'Compliance Rate (%)',
] as const;

export const STATUS_COLUMNS = ['Status', 'Count'] as const;

export const INCIDENT_COLUMNS = [
  'ID',
  'Title',
  'Priority',
  'Status',
  'Department',
  'Category',
  'Created (UTC)',
  'Resolved (UTC)',
  'Resolution (h)',
  'SLA Status',
] as const;

const DIMENSION_LABELS: Record<BreakdownDimension, string> = {
  priority: 'Priority',
  department: 'Department',
  category: 'Category',
};

export function escapeCell(value: string): string {
  return value.replace(/\r?\n|\r/g, ' ').replace(/\|/g, '\\|').trim();
}

function line(cells: readonly string[]): string {
  return `| ${cells.map(escapeCell).join(' | ')} |`;
}

export function markdownTable(headers: readonly string[], rows: readonly (readonly string[])[]): string {
  return [line(headers), line(headers.map(() => '---')), ...rows.map(line)].join('\n');
}

export function breakdownTable(
  dimension: BreakdownDimension,
  rows: readonly BreakdownRow[],
  decimals: number
): string {
  const table = markdownTable(
    [DIMENSION_LABELS[dimension], ...BREAKDOWN_COLUMNS],
    rows.map(row => [
      row.key,
      String(row.total),
      String(row.resolved),
      String(row.unresolved),
      String(row.withinSla),
      String(row.breached),
      String(row.pending),
      percent(row.complianceRate, decimals),
      fixed(row.averageResolutionHours, decimals),
    ])
  );

  const undefinedRates = rows.filter(row => !row.complianceDefined).map(row => row.key);
  if (undefinedRates.length === 0) return table;
  return `${table}\n\n_No resolved incidents (compliance shown as 0): ${undefinedRates.join(', ')}_`;
}

/** Known priorities in severity order, then Other when the batch had one. */
export function slaTable(metrics: MetricsBundle, decimals: number): string {
  const rowsByKey = new Map(metrics.byPriority.map(row => [row.key, row]));
  const keys: string[] = [...KNOWN_PRIORITIES];
  if (rowsByKey.has(OTHER_BUCKET)) keys.push(OTHER_BUCKET);

  return markdownTable(
    SLA_COLUMNS,
    keys.map(key => {
      const row = rowsByKey.get(key);
      return [
        key,
        fixed(thresholdFor(key, metrics.slaThresholds), decimals),
        String(row?.withinSla ?? 0),
        String(row?.breached ?? 0),
        String(row?.pending ?? 0),
        percent(row?.complianceRate ?? 0, decimals),
      ];
    })
  );
}

export function statusTable(rows: readonly StatusCount[]): string {
  return markdownTable(
    STATUS_COLUMNS,
    rows.map(row => [row.status, String(row.count)])
  );
}

export function incidentTable(rows: readonly IncidentDisplayRow[]): string {
  return markdownTable(
    INCIDENT_COLUMNS,
    rows.map(row => [
      row.id,
      row.title,
      row.priority,
      row.status,
      row.department,
      row.category,
      row.created,
      row.resolved,
      row.resolutionHours,
      row.slaStatus,
    ])
  );
}

/** Splits a pipe-table row into unescaped cell values. */
export function parseTableRow(row: string): string[] {
  const inner = row.trim().replace(/^\|/, '').replace(/\|$/, '');
  return inner.split(/(?<!\\)\|/).map(cell => cell.trim().replace(/\\\|/g, '|'));
}
