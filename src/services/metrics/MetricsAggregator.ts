import { logger } from '../../utils/logger.js';
import { ComputationInvariantError } from '../../utils/errors.js';
import {
  OTHER_BUCKET,
  isKnownPriority,
  isKnownStatus,
  type IncidentRecord,
  type SlaStatus,
} from '../../domain/entities/Incident.js';
import { classifySla, resolutionHours, type SlaThresholds } from '../../domain/sla.js';
import type { AggregateOptions, BreakdownRow, MetricsBundle, StatusCount } from './types.js';

interface GroupAccumulator {
  total: number;
  resolved: number;
  withinSla: number;
  breached: number;
  pending: number;
  resolutionHoursSum: number;
}

interface ClassifiedIncident {
  record: IncidentRecord;
  sla: SlaStatus;
  resolutionHours: number | null;
}

const emptyAccumulator = (): GroupAccumulator => ({
  total: 0,
  resolved: 0,
  withinSla: 0,
  breached: 0,
  pending: 0,
  resolutionHoursSum: 0,
});

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}

export function priorityBucket(priority: string): string {
  return isKnownPriority(priority) ? priority : OTHER_BUCKET;
}

export function statusBucket(status: string): string {
  return isKnownStatus(status) ? status : OTHER_BUCKET;
}

/**
 * Status text is advisory; the resolution timestamp decides. A mismatch is a
 * record whose text claims the opposite of what the timestamp says.
 */
function hasStatusMismatch(incident: ClassifiedIncident): boolean {
  const { status } = incident.record;
  const resolved = incident.resolutionHours !== null;
  if (status === 'Resolved' || status === 'Closed') return !resolved;
  if (status === 'Open' || status === 'In Progress') return resolved;
  return false;
}

export class MetricsAggregator {
  constructor(private thresholds: SlaThresholds) {}

  aggregate(records: readonly IncidentRecord[], options: AggregateOptions): MetricsBundle {
    const { asOf } = options;
    const classified: ClassifiedIncident[] = records.map(record => ({
      record,
      sla: classifySla(record, this.thresholds, asOf),
      resolutionHours: resolutionHours(record),
    }));

    const overall = emptyAccumulator();
    const byPriority = new Map<string, GroupAccumulator>();
    const byDepartment = new Map<string, GroupAccumulator>();
    const byCategory = new Map<string, GroupAccumulator>();
    const byStatus = new Map<string, number>();
    let statusMismatches = 0;

    for (const incident of classified) {
      this.accumulate(overall, incident);
      this.accumulate(this.group(byPriority, priorityBucket(incident.record.priority)), incident);
      this.accumulate(this.group(byDepartment, incident.record.department), incident);
      this.accumulate(this.group(byCategory, incident.record.category), incident);

      const status = statusBucket(incident.record.status);
      byStatus.set(status, (byStatus.get(status) ?? 0) + 1);

      if (hasStatusMismatch(incident)) statusMismatches++;
    }

    if (statusMismatches > 0) {
      logger.warn(
        { statusMismatches },
        'Status text disagrees with resolution timestamp; timestamp taken as authoritative'
      );
    }

    const bundle: MetricsBundle = {
      asOf: asOf.toISOString(),
      slaThresholds: {
        byPriority: { ...this.thresholds.byPriority },
        otherHours: this.thresholds.otherHours,
      },
      totals: {
        total: overall.total,
        resolved: overall.resolved,
        unresolved: overall.total - overall.resolved,
      },
      averageResolutionHours: average(overall.resolutionHoursSum, overall.resolved),
      resolutionRate: overall.total > 0 ? overall.resolved / overall.total : 0,
      sla: {
        withinSla: overall.withinSla,
        breached: overall.breached,
        pending: overall.pending,
        complianceRate: overallComplianceRate(overall.withinSla, overall.breached),
      },
      byPriority: toRows(byPriority),
      byDepartment: toRows(byDepartment),
      byCategory: toRows(byCategory),
      byStatus: Array.from(byStatus, ([status, count]): StatusCount => ({ status, count })),
      statusMismatches,
    };

    logger.debug(
      { total: bundle.totals.total, complianceRate: bundle.sla.complianceRate },
      'Incident metrics aggregated'
    );

    return deepFreeze(bundle);
  }

  private group(groups: Map<string, GroupAccumulator>, key: string): GroupAccumulator {
    let acc = groups.get(key);
    if (!acc) {
      acc = emptyAccumulator();
      groups.set(key, acc);
    }
    return acc;
  }

  private accumulate(acc: GroupAccumulator, incident: ClassifiedIncident): void {
    acc.total++;
    if (incident.resolutionHours !== null) {
      acc.resolved++;
      acc.resolutionHoursSum += incident.resolutionHours;
    }
    switch (incident.sla) {
      case 'Within SLA':
        acc.withinSla++;
        break;
      case 'Breach':
        acc.breached++;
        break;
      case 'Pending':
        acc.pending++;
        break;
    }
  }
}

function average(sum: number, count: number): number {
  return count > 0 ? sum / count : 0;
}

export function overallComplianceRate(withinSla: number, breached: number): number {
  const determined = withinSla + breached;
  if (determined === 0) {
    if (withinSla !== 0) {
      throw new ComputationInvariantError('Compliance numerator is non-zero with an empty denominator', {
        withinSla,
        breached,
      });
    }
    return 0;
  }
  return withinSla / determined;
}

function toRows(groups: Map<string, GroupAccumulator>): BreakdownRow[] {
  return Array.from(groups, ([key, acc]) => ({
    key,
    total: acc.total,
    resolved: acc.resolved,
    unresolved: acc.total - acc.resolved,
    withinSla: acc.withinSla,
    breached: acc.breached,
    pending: acc.pending,
    complianceRate: acc.resolved > 0 ? acc.withinSla / acc.resolved : 0,
    complianceDefined: acc.resolved > 0,
    averageResolutionHours: average(acc.resolutionHoursSum, acc.resolved),
  }));
}
