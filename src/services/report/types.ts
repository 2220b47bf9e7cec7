import type { IncidentRecord, SlaStatus } from '../../domain/entities/Incident.js';
import type { MetricsBundle } from '../metrics/types.js';
import type { NarrativeResult } from '../narrative/types.js';

export interface IncidentDisplayRow {
  readonly id: string;
  readonly title: string;
  readonly priority: string;
  readonly status: string;
  readonly department: string;
  readonly category: string;
  readonly created: string;
  readonly resolved: string;
  readonly resolutionHours: string;
  readonly slaStatus: SlaStatus;
}

export interface ReportHeader {
  readonly title: string;
  readonly periodStart: string;
  readonly periodEnd: string;
  readonly generatedAt: string;
  readonly asOf: string;
}

export interface ReportDocument {
  readonly header: ReportHeader;
  readonly narrative: NarrativeResult;
  readonly metrics: MetricsBundle;
  readonly incidents: readonly IncidentDisplayRow[];
  readonly text: string;
}

export interface AssembleInput {
  title: string;
  periodStart?: Date;
  periodEnd?: Date;
  generatedAt: Date;
  metrics: MetricsBundle;
  narrative: NarrativeResult;
  records: readonly IncidentRecord[];
  template: string;
  extraValues?: Readonly<Record<string, string>>;
}

export interface ArtifactMetadata {
  name: string;
  sizeBytes: number | null;
  createdAt: string;
  mimeType: string;
}
