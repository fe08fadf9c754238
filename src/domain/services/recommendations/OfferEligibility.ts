import type { EligibilityCriteria, RangeConstraint } from '../../entities/CatalogItem.js';
import type { EligibilityCheck } from '../../entities/DecisionTrace.js';
import type { SignalBundle } from '../../entities/Signal.js';
import { roundTo } from '../IntervalMath.js';

type RangeField = 'credit_utilization' | 'subscription_count' | 'savings_balance' | 'monthly_recurring';

const RANGE_FIELDS: Record<RangeField, { signalField: string; read: (s: SignalBundle) => number }> = {
  // criteria express utilization as a 0-1 ratio
  credit_utilization: {
    signalField: 'creditUtilization.totalUtilization',
    read: (s) => roundTo(s.creditUtilization.totalUtilization / 100, 4),
  },
  subscription_count: {
    signalField: 'subscriptions.recurringMerchants',
    read: (s) => s.subscriptions.recurringMerchants.length,
  },
  savings_balance: {
    signalField: 'savingsBehavior.totalSavings',
    read: (s) => s.savingsBehavior.totalSavings,
  },
  monthly_recurring: {
    signalField: 'subscriptions.monthlyRecurring',
    read: (s) => s.subscriptions.monthlyRecurring,
  },
};

const RANGE_ORDER: RangeField[] = ['credit_utilization', 'subscription_count', 'savings_balance', 'monthly_recurring'];

const withinRange = (actual: number, constraint: RangeConstraint): boolean =>
  (constraint.min === undefined || actual >= constraint.min) &&
  (constraint.max === undefined || actual <= constraint.max);

export interface EligibilityResult {
  eligible: boolean;
  checks: EligibilityCheck[];
}

/** Every declared constraint must pass; an offer without criteria is always eligible. */
export const checkEligibility = (criteria: EligibilityCriteria, signals: SignalBundle): EligibilityResult => {
  const checks: EligibilityCheck[] = [];

  for (const field of RANGE_ORDER) {
    const constraint = criteria[field];
    if (!constraint) {
      continue;
    }
    const { signalField, read } = RANGE_FIELDS[field];
    const actual = read(signals);
    checks.push({ field, signalField, constraint: { ...constraint }, actual, passed: withinRange(actual, constraint) });
  }

  if (criteria.is_overdue) {
    const actual = signals.creditUtilization.isOverdue;
    checks.push({
      field: 'is_overdue',
      signalField: 'creditUtilization.isOverdue',
      constraint: { equals: criteria.is_overdue.equals },
      actual,
      passed: actual === criteria.is_overdue.equals,
    });
  }

  return { eligible: checks.every((check) => check.passed), checks };
};
