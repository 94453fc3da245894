// Column readers shared by the row mappers. Drivers disagree on booleans
// (SQLite 0/1), decimals (pg strings) and JSON (pg objects, SQLite text).

export type Row = Record<string, unknown>;

export function str(value: unknown, fallback = ''): string {
  if (value === null || value === undefined) return fallback;
  return String(value);
}

export function strOrNull(value: unknown): string | null {
  if (value === null || value === undefined) return null;
  return String(value);
}

export function bool(value: unknown): boolean {
  if (typeof value === 'string') return value === 'true' || value === 't' || value === '1';
  return Boolean(value);
}

export function jsonObject(value: unknown): Record<string, unknown> {
  let parsed: unknown = value;
  if (typeof value === 'string') {
    try {
      parsed = JSON.parse(value);
    } catch {
      return {};
    }
  }
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) return {};
  return Object.fromEntries(Object.entries(parsed));
}

export function isRow(value: unknown): value is Row {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
