import type { TimestampInput } from './schema.js';

/**
 * Normalize a timestamp to ISO-8601 UTC with millisecond precision.
 * Strings without a zone designator are read as UTC.
 * @param column Column name used in the error message
 * @throws Error if the value is not a valid date
 */
export function toUtcTimestamp(value: TimestampInput | undefined, column: string): string | null {
  if (value === null || value === undefined) return null;

  let date: Date;
  if (value instanceof Date) {
    date = value;
  } else {
    const trimmed = value.trim();
    if (trimmed === '') return null;
    date = new Date(hasZone(trimmed) ? trimmed : `${trimmed.replace(' ', 'T')}Z`);
  }

  if (Number.isNaN(date.getTime())) {
    throw new Error(`Invalid timestamp for ${column}: ${String(value)}`);
  }
  return date.toISOString();
}

// Date-only strings ("2025-09-07") are already parsed as UTC
function hasZone(value: string): boolean {
  return /(Z|[+-]\d{2}:?\d{2})$/i.test(value) || /^\d{4}-\d{2}-\d{2}$/.test(value);
}
