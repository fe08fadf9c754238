import dayjs from 'dayjs';
import { effectiveDate, type Transaction } from '../entities/Transaction.js';
import { WINDOW_DAYS, type WindowSpec } from '../entities/Signal.js';

export const roundTo = (value: number, digits = 2): number => {
  const factor = 10 ** digits;
  const rounded = Math.round(value * factor) / factor;
  return rounded === 0 ? 0 : rounded;
};

export const clamp = (value: number, min: number, max: number): number => Math.min(max, Math.max(min, value));

export const sum = (values: number[]): number => values.reduce((total, value) => total + value, 0);

export const mean = (values: number[]): number => (values.length === 0 ? 0 : sum(values) / values.length);

export const median = (values: number[]): number => {
  if (values.length === 0) {
    return 0;
  }

  const sorted = [...values].sort((a, b) => a - b);
  const mid = Math.floor(sorted.length / 2);
  return sorted.length % 2 !== 0 ? sorted[mid] : (sorted[mid - 1] + sorted[mid]) / 2;
};

/** Population standard deviation. */
export const stdDev = (values: number[]): number => {
  if (values.length < 2) {
    return 0;
  }

  const avg = mean(values);
  return Math.sqrt(mean(values.map((value) => (value - avg) ** 2)));
};

/** Whole calendar days from `from` to `to`. */
export const daysBetween = (from: string, to: string): number => dayjs(to).diff(dayjs(from), 'day');

/** Gaps in days between consecutive dates; `dates` must already be sorted. */
export const dayGaps = (dates: string[]): number[] => {
  const gaps: number[] = [];
  for (let i = 1; i < dates.length; i += 1) {
    gaps.push(daysBetween(dates[i - 1], dates[i]));
  }
  return gaps;
};

export const windowDays = (window: WindowSpec): number => WINDOW_DAYS[window.timeWindow];

export const windowStart = (window: WindowSpec): string =>
  dayjs(window.asOf).subtract(windowDays(window), 'day').format('YYYY-MM-DD');

/** Monthly divisor for a window: 30-day months, so 30d → 1 and 180d → 6. */
export const windowMonths = (window: WindowSpec): number => windowDays(window) / 30;

export const inWindow = (txn: Transaction, window: WindowSpec): boolean => {
  const date = dayjs(effectiveDate(txn));
  return !date.isBefore(dayjs(windowStart(window)), 'day') && !date.isAfter(dayjs(window.asOf), 'day');
};

/** Chronological order with transactionId as tie-breaker, so detector output never depends on input order. */
export const byEffectiveDate = (a: Transaction, b: Transaction): number => {
  const left = effectiveDate(a);
  const right = effectiveDate(b);
  if (left !== right) {
    return left < right ? -1 : 1;
  }
  return a.transactionId < b.transactionId ? -1 : a.transactionId > b.transactionId ? 1 : 0;
};

export const compareCodePoints = (a: string, b: string): number => (a < b ? -1 : a > b ? 1 : 0);
