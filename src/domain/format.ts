import type { IsoDate } from './types.js';

/** Round to currency precision; computations keep full precision until display */
export function roundCurrency(amount: number): number {
  return Math.round((amount + Number.EPSILON) * 100) / 100;
}

export function formatCurrency(amount: number): string {
  return `$${roundCurrency(amount).toFixed(2)}`;
}

/** Hours with one decimal, as shown on the period card */
export function formatHours(hours: number): string {
  return `${(Math.round(hours * 10) / 10).toFixed(1)}h`;
}

/** Local calendar date as YYYY-MM-DD */
export function today(now: Date = new Date()): IsoDate {
  const y = now.getFullYear();
  const m = String(now.getMonth() + 1).padStart(2, '0');
  const d = String(now.getDate()).padStart(2, '0');
  return `${y}-${m}-${d}`;
}

const ISO_DATE = /^\d{4}-\d{2}-\d{2}$/;

export function isIsoDate(value: string): boolean {
  if (!ISO_DATE.test(value)) return false;
  const [y, m, d] = value.split('-').map(Number);
  const date = new Date(y, m - 1, d);
  return date.getFullYear() === y && date.getMonth() === m - 1 && date.getDate() === d;
}
