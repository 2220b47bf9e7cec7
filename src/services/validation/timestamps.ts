const TIMESTAMP_PATTERN =
  /^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{2}):(\d{2})(?::(\d{2})(?:\.(\d{1,9}))?)?(Z|[+-]\d{2}:?\d{2})?)?$/;

/**
 * Parses the accepted ISO-8601 subset:
 * `YYYY-MM-DD`, `YYYY-MM-DD[T| ]HH:mm[:ss[.fff]]` with an optional `Z` or
 * `±HH:mm` / `±HHmm` offset. Values without an offset are read as UTC.
 *
 * Returns `null` for anything outside that set, including calendar-invalid
 * dates such as `2025-02-30`.
 */
export function parseTimestamp(value: unknown): Date | null {
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? null : new Date(value.getTime());
  }
  if (typeof value !== 'string') return null;

  const match = TIMESTAMP_PATTERN.exec(value.trim());
  if (!match) return null;

  const [, y, mo, d, h = '0', mi = '0', s = '0', fraction = '', offset] = match;
  const year = Number(y);
  const month = Number(mo);
  const day = Number(d);
  const hour = Number(h);
  const minute = Number(mi);
  const second = Number(s);
  const millis = Number(fraction.padEnd(3, '0').substring(0, 3));

  if (month < 1 || month > 12 || hour > 23 || minute > 59 || second > 59) return null;

  const utc = new Date(Date.UTC(year, month - 1, day, hour, minute, second, millis));
  if (utc.getUTCFullYear() !== year || utc.getUTCMonth() !== month - 1 || utc.getUTCDate() !== day) {
    return null;
  }

  const offsetMinutes = parseOffset(offset);
  if (offsetMinutes === null) return null;

  return new Date(utc.getTime() - offsetMinutes * 60_000);
}

function parseOffset(offset: string | undefined): number | null {
  if (!offset || offset === 'Z') return 0;

  const sign = offset.startsWith('-') ? -1 : 1;
  const digits = offset.substring(1).replace(':', '');
  const hours = Number(digits.substring(0, 2));
  const minutes = Number(digits.substring(2, 4));
  if (hours > 23 || minutes > 59) return null;

  return sign * (hours * 60 + minutes);
}

export function formatUtc(date: Date): string {
  return date.toISOString().substring(0, 16).replace('T', ' ');
}

export function formatUtcSeconds(date: Date): string {
  return `${date.toISOString().substring(0, 19).replace('T', ' ')} UTC`;
}

export function formatDate(date: Date): string {
  return date.toISOString().substring(0, 10);
}
