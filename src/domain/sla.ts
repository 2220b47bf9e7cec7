import {
  isKnownPriority,
  isResolved,
  type IncidentRecord,
  type KnownIncidentPriority,
  type SlaStatus,
} from './entities/Incident.js'

const MS_PER_HOUR = 60 * 60 * 1000

export interface SlaThresholds {
  byPriority: Readonly<Record<KnownIncidentPriority, number>>
  /** Applied to priorities outside the known set. */
  otherHours: number
}

export const DEFAULT_SLA_THRESHOLDS: SlaThresholds = {
  byPriority: {
    Critical: 4,
    High: 8,
    Medium: 24,
    Low: 72,
  },
  otherHours: 72,
}

export function hoursBetween(from: Date, to: Date): number {
  return (to.getTime() - from.getTime()) / MS_PER_HOUR
}

export function thresholdFor(priority: string, thresholds: SlaThresholds): number {
  return isKnownPriority(priority) ? thresholds.byPriority[priority] : thresholds.otherHours
}

export function resolutionHours(record: IncidentRecord): number | null {
  if (!isResolved(record) || record.resolvedAt === null) return null
  return hoursBetween(record.createdAt, record.resolvedAt)
}

/**
 * Resolved incidents are judged on their resolution time. Unresolved ones are
 * a breach once the elapsed time at `asOf` exceeds the threshold, and pending
 * until then.
 */
export function classifySla(record: IncidentRecord, thresholds: SlaThresholds, asOf: Date): SlaStatus {
  const threshold = thresholdFor(record.priority, thresholds)
  const duration = resolutionHours(record)

  if (duration !== null) {
    return duration <= threshold ? 'Within SLA' : 'Breach'
  }

  return hoursBetween(record.createdAt, asOf) > threshold ? 'Breach' : 'Pending'
}
