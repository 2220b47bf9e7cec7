export type KnownIncidentStatus = 'Open' | 'In Progress' | 'Resolved' | 'Closed'
export type KnownIncidentPriority = 'Critical' | 'High' | 'Medium' | 'Low'

// Unrecognized values are kept verbatim and grouped under "Other".
export type IncidentStatus = KnownIncidentStatus | (string & {})
export type IncidentPriority = KnownIncidentPriority | (string & {})

export type SlaStatus = 'Within SLA' | 'Breach' | 'Pending'

export const KNOWN_STATUSES: readonly KnownIncidentStatus[] = ['Open', 'In Progress', 'Resolved', 'Closed']
export const KNOWN_PRIORITIES: readonly KnownIncidentPriority[] = ['Critical', 'High', 'Medium', 'Low']

export const OTHER_BUCKET = 'Other'
export const UNSPECIFIED = 'Unspecified'

export interface IncidentRecord {
  id: string
  title: string
  description: string
  status: IncidentStatus
  priority: IncidentPriority
  department: string
  category: string
  createdAt: Date
  resolvedAt: Date | null
}

export function isKnownPriority(value: string): value is KnownIncidentPriority {
  return KNOWN_PRIORITIES.some(priority => priority === value)
}

export function isKnownStatus(value: string): value is KnownIncidentStatus {
  return KNOWN_STATUSES.some(status => status === value)
}

export function isResolved(record: IncidentRecord): boolean {
  return record.resolvedAt !== null && record.resolvedAt.getTime() >= record.createdAt.getTime()
}
