function pad2(n: number): string {
  return String(n).padStart(2, '0');
}

/** Local calendar date as YYYY-MM-DD. */
export function formatLocalDate(date: Date): string {
  return `${date.getFullYear()}-${pad2(date.getMonth() + 1)}-${pad2(date.getDate())}`;
}

export function todayIso(now: Date = new Date()): string {
  return formatLocalDate(now);
}

export function addDays(date: Date, days: number): Date {
  return new Date(date.getTime() + days * 24 * 60 * 60 * 1000);
}

/**
 * DATE columns: pg hands back a Date at local midnight, SQLite the stored
 * string.
 */
export function toDateOnly(value: unknown): string | null {
  if (value === null || value === undefined || value === '') return null;
  if (value instanceof Date) return formatLocalDate(value);
  if (typeof value === 'string') return value.slice(0, 10);
  return null;
}

/** TIMESTAMP columns normalised to ISO-8601 UTC. */
export function toTimestamp(value: unknown): string | null {
  if (value === null || value === undefined || value === '') return null;
  if (value instanceof Date) return value.toISOString();
  if (typeof value === 'number') return new Date(value).toISOString();
  if (typeof value === 'string') {
    const parsed = new Date(value);
    return Number.isNaN(parsed.getTime()) ? value : parsed.toISOString();
  }
  return null;
}

export function compactDate(date: Date): string {
  return formatLocalDate(date).replace(/-/g, '');
}
