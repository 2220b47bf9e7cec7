import { logger } from '../../utils/logger.js';
import { ValidationError, type ValidationIssue } from '../../utils/errors.js';
import {
  UNSPECIFIED,
  type IncidentPriority,
  type IncidentRecord,
  type IncidentStatus,
} from '../../domain/entities/Incident.js';
import { parseTimestamp } from './timestamps.js';

type CanonicalField =
  | 'id'
  | 'title'
  | 'description'
  | 'status'
  | 'priority'
  | 'department'
  | 'category'
  | 'created_at'
  | 'resolved_at';

const FIELD_ALIASES: ReadonlyArray<readonly [CanonicalField, readonly string[]]> = [
  ['id', ['id', 'incident_id', 'incidentid']],
  ['title', ['title', 'summary', 'subject']],
  ['description', ['description', 'details']],
  ['status', ['status', 'state']],
  ['priority', ['priority', 'severity']],
  ['department', ['department', 'dept', 'team']],
  ['category', ['category', 'type']],
  ['created_at', ['created_at', 'created_date', 'created_on', 'created', 'createdat', 'opened_at']],
  ['resolved_at', ['resolved_at', 'resolution_date', 'resolved_on', 'resolved', 'resolvedat', 'closed_at']],
];

const STATUS_ALIASES: Record<string, IncidentStatus> = {
  open: 'Open',
  inprogress: 'In Progress',
  resolved: 'Resolved',
  closed: 'Closed',
};

const PRIORITY_ALIASES: Record<string, IncidentPriority> = {
  critical: 'Critical',
  high: 'High',
  medium: 'Medium',
  low: 'Low',
};

const normalizeKey = (key: string): string => key.toLowerCase().replace(/[\s_-]/g, '');

interface AliasMatch {
  field: CanonicalField;
  /** Position in the field's alias list; the canonical name is 0. */
  rank: number;
}

const ALIAS_LOOKUP: ReadonlyMap<string, AliasMatch> = (() => {
  const lookup = new Map<string, AliasMatch>();
  for (const [field, aliases] of FIELD_ALIASES) {
    aliases.forEach((alias, rank) => {
      const key = normalizeKey(alias);
      if (!lookup.has(key)) lookup.set(key, { field, rank });
    });
  }
  return lookup;
})();

function isRecordObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isBlank(value: unknown): boolean {
  return value === undefined || value === null || (typeof value === 'string' && value.trim() === '');
}

export function normalizeStatus(raw: string): IncidentStatus {
  const trimmed = raw.trim();
  return STATUS_ALIASES[normalizeKey(trimmed)] ?? trimmed;
}

export function normalizePriority(raw: string): IncidentPriority {
  const trimmed = raw.trim();
  return PRIORITY_ALIASES[normalizeKey(trimmed)] ?? trimmed;
}

/**
 * Turns raw incident payloads into `IncidentRecord`s. Every offending field of
 * every record is collected before a single `ValidationError` is thrown.
 */
export class IncidentValidator {
  validate(raw: unknown): IncidentRecord[] {
    if (!Array.isArray(raw)) {
      throw new ValidationError('Incident data must be an array', [
        { index: -1, field: 'incidents', message: 'must be an array', value: raw },
      ]);
    }

    const issues: ValidationIssue[] = [];
    const records: IncidentRecord[] = [];

    raw.forEach((entry, index) => {
      const record = this.validateRecord(entry, index, issues);
      if (record) records.push(record);
    });

    if (issues.length > 0) {
      const first = issues[0];
      logger.debug({ issueCount: issues.length }, 'Incident validation failed');
      throw new ValidationError(
        `Invalid incident data (${issues.length} issue${issues.length === 1 ? '' : 's'}): ` +
          `record ${first.index} field "${first.field}" ${first.message}`,
        issues
      );
    }

    logger.debug({ recordCount: records.length }, 'Incident validation passed');
    return records;
  }

  private validateRecord(entry: unknown, index: number, issues: ValidationIssue[]): IncidentRecord | null {
    if (!isRecordObject(entry)) {
      issues.push({ index, field: 'record', message: 'must be an object', value: entry });
      return null;
    }

    const fields = this.canonicalize(entry);
    const startCount = issues.length;
    const fail = (field: CanonicalField, message: string, value?: unknown) => {
      issues.push({ index, field, message, value });
    };

    const text = (field: CanonicalField, required: boolean): string | null => {
      const value = fields.get(field);
      if (isBlank(value)) {
        if (required) fail(field, 'is required', value);
        return null;
      }
      if (typeof value === 'string') return value.trim();
      if (typeof value === 'number' && Number.isFinite(value)) return String(value);
      fail(field, 'must be a string', value);
      return null;
    };

    const timestamp = (field: CanonicalField, required: boolean): Date | null => {
      const value = fields.get(field);
      if (isBlank(value)) {
        if (required) fail(field, 'is required', value);
        return null;
      }
      const parsed = parseTimestamp(value);
      if (!parsed) {
        fail(field, `has unparseable timestamp ${JSON.stringify(value)}`, value);
      }
      return parsed;
    };

    const id = text('id', true);
    const title = text('title', true);
    const description = text('description', false);
    const status = text('status', true);
    const priority = text('priority', true);
    const department = text('department', false);
    const category = text('category', false);
    const createdAt = timestamp('created_at', true);
    const resolvedAt = timestamp('resolved_at', false);

    if (createdAt && resolvedAt && resolvedAt.getTime() < createdAt.getTime()) {
      fail('resolved_at', 'must not be earlier than created_at', fields.get('resolved_at'));
    }

    if (
      issues.length > startCount ||
      id === null ||
      title === null ||
      status === null ||
      priority === null ||
      createdAt === null
    ) {
      return null;
    }

    return {
      id,
      title,
      description: description ?? '',
      status: normalizeStatus(status),
      priority: normalizePriority(priority),
      department: department ?? UNSPECIFIED,
      category: category ?? UNSPECIFIED,
      createdAt,
      resolvedAt,
    };
  }

  /**
   * When several keys name the same field, the best-ranked alias wins
   * regardless of key order; equal ranks keep the first key.
   */
  private canonicalize(entry: Record<string, unknown>): Map<CanonicalField, unknown> {
    const best = new Map<CanonicalField, { rank: number; value: unknown }>();
    for (const [key, value] of Object.entries(entry)) {
      const match = ALIAS_LOOKUP.get(normalizeKey(key));
      if (!match) continue;
      const current = best.get(match.field);
      if (!current || match.rank < current.rank) {
        best.set(match.field, { rank: match.rank, value });
      }
    }
    return new Map(Array.from(best, ([field, { value }]): [CanonicalField, unknown] => [field, value]));
  }
}
