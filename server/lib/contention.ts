import { ConcurrencyContentionError } from './errors';
import { logger } from './logger';

const CONTENTION_CODES = new Set([
  '55P03', // lock_not_available (lock_timeout)
  '40001', // serialization_failure
  '40P01', // deadlock_detected
  'SQLITE_BUSY',
  'SQLITE_LOCKED',
]);

function readStringProp(value: unknown, key: string): string | undefined {
  if (typeof value !== 'object' || value === null || !(key in value)) return undefined;
  const prop: unknown = Reflect.get(value, key);
  return typeof prop === 'string' ? prop : undefined;
}

export function isContentionError(error: unknown): boolean {
  if (error instanceof ConcurrencyContentionError) return true;
  const code = readStringProp(error, 'code');
  if (code && CONTENTION_CODES.has(code)) return true;
  return readStringProp(error, 'name') === 'KnexTimeoutError';
}

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export interface RetryOptions {
  attempts?: number;
  baseDelayMs?: number;
  operation?: string;
}

/**
 * Retries an operation that lost a row-lock race. Other errors pass through
 * untouched; exhausted retries surface as ConcurrencyContentionError.
 */
export async function withContentionRetry<T>(op: () => Promise<T>, options: RetryOptions = {}): Promise<T> {
  const { attempts = 3, baseDelayMs = 50, operation = 'operation' } = options;
  let lastError: unknown;

  for (let attempt = 1; attempt <= attempts; attempt++) {
    try {
      return await op();
    } catch (error) {
      if (!isContentionError(error)) throw error;
      lastError = error;
      logger.warn({ err: error, attempt, attempts, operation }, 'Lock contention, retrying');
      if (attempt < attempts) await delay(baseDelayMs * attempt);
    }
  }

  throw new ConcurrencyContentionError(lastError);
}
