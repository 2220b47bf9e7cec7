import type { SlaThresholds } from '../../domain/sla.js';

export type BreakdownDimension = 'priority' | 'department' | 'category';

export interface BreakdownRow {
  readonly key: string;
  readonly total: number;
  readonly resolved: number;
  readonly unresolved: number;
  readonly withinSla: number;
  readonly breached: number;
  readonly pending: number;
  /** withinSla / resolved, or 0 when the group has nothing resolved. */
  readonly complianceRate: number;
  readonly complianceDefined: boolean;
  readonly averageResolutionHours: number;
}

export interface StatusCount {
  readonly status: string;
  readonly count: number;
}

export interface MetricsBundle {
  readonly asOf: string;
  readonly slaThresholds: SlaThresholds;
  readonly totals: {
    readonly total: number;
    readonly resolved: number;
    readonly unresolved: number;
  };
  readonly averageResolutionHours: number;
  readonly resolutionRate: number;
  readonly sla: {
    readonly withinSla: number;
    readonly breached: number;
    readonly pending: number;
    /** Over incidents with a determined outcome; pending ones are excluded. */
    readonly complianceRate: number;
  };
  readonly byPriority: readonly BreakdownRow[];
  readonly byDepartment: readonly BreakdownRow[];
  readonly byCategory: readonly BreakdownRow[];
  readonly byStatus: readonly StatusCount[];
  readonly statusMismatches: number;
}

export interface AggregateOptions {
  asOf: Date;
}
