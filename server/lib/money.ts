import { PAID_ROUNDING_TOLERANCE } from '../../shared/constants';

/**
 * Rounds to 2 decimal places, half away from zero. The small bias absorbs
 * binary representation error (1.005 * 100 === 100.49999999999999).
 */
export function round2(value: number): number {
  const sign = value < 0 ? -1 : 1;
  const rounded = (sign * Math.round(Math.abs(value) * 100 + 1e-7)) / 100;
  return rounded === 0 ? 0 : rounded;
}

/** DECIMAL columns come back as strings from pg and as numbers from SQLite. */
export function toNumber(value: unknown): number {
  if (typeof value === 'number') return value;
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : 0;
  }
  return 0;
}

export function lineTotal(quantity: number, unitPrice: number): number {
  return round2(quantity * unitPrice);
}

export function isWholeUnit(amount: number): boolean {
  return Number.isFinite(amount) && Number.isInteger(amount);
}

/** Collapses balances within the paid tolerance band to zero. */
export function settleBalance(balance: number, tolerance: number = PAID_ROUNDING_TOLERANCE): number {
  const rounded = round2(balance);
  return Math.abs(rounded) <= tolerance ? 0 : rounded;
}

export function sumBy<T>(items: readonly T[], pick: (item: T) => number): number {
  return round2(items.reduce((acc, item) => acc + pick(item), 0));
}
