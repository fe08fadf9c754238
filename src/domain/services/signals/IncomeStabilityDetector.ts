import { isCheckingAccount, type Account } from '../../entities/Account.js';
import { effectiveDate, type Transaction } from '../../entities/Transaction.js';
import type { IncomeStabilitySignal, WindowSpec } from '../../entities/Signal.js';
import { categoryContains } from '../CategoryNormalizer.js';
import { dayGaps, median, roundTo, stdDev, sum, windowMonths } from '../IntervalMath.js';

export const PAYROLL_KEYWORDS = ['payroll', 'salary', 'direct deposit', 'paycheck'] as const;
export const EXCLUDED_KEYWORDS = ['savings', 'transfer', 'refund', 'tax'] as const;
const INCOME_CATEGORY_KEYWORDS = [...PAYROLL_KEYWORDS, 'income'] as const;

export const PAY_PERIOD_BANDS = [
  { label: 'weekly', min: 6, max: 8 },
  { label: 'biweekly', min: 13, max: 15 },
  { label: 'monthly', min: 28, max: 31 },
] as const;

export const MAX_REGULAR_GAP_STD_DEV = 7;

export const emptyIncomeStabilitySignal = (): IncomeStabilitySignal => ({
  medianPayGap: 0,
  irregularFrequency: false,
  cashFlowBuffer: 0,
  avgMonthlyExpenses: 0,
});

/**
 * Positive inflows that look like wages. Exclusions only look at the merchant
 * name: the standard taxonomy files payroll under a "Transfer" category.
 */
export const isPayrollCandidate = (txn: Transaction): boolean => {
  if (txn.amount <= 0) {
    return false;
  }

  const merchant = (txn.merchantName ?? '').toLowerCase();
  if (EXCLUDED_KEYWORDS.some((keyword) => merchant.includes(keyword))) {
    return false;
  }

  return (
    PAYROLL_KEYWORDS.some((keyword) => merchant.includes(keyword)) ||
    INCOME_CATEGORY_KEYWORDS.some((keyword) => categoryContains(txn.category, keyword))
  );
};

export const inPayPeriodBand = (gap: number): boolean =>
  PAY_PERIOD_BANDS.some((band) => gap >= band.min && gap <= band.max);

export const detectIncomeStability = (
  transactions: Transaction[],
  accounts: Account[],
  window: WindowSpec,
): IncomeStabilitySignal => {
  const paychecks = transactions.filter(isPayrollCandidate);
  if (paychecks.length < 2) {
    return emptyIncomeStabilitySignal();
  }

  const gaps = dayGaps(paychecks.map(effectiveDate));
  const medianGap = median(gaps);
  const irregularFrequency =
    !inPayPeriodBand(medianGap) || (gaps.length > 1 && stdDev(gaps) > MAX_REGULAR_GAP_STD_DEV);

  const spend = sum(transactions.filter((txn) => txn.amount < 0).map((txn) => Math.abs(txn.amount)));
  const avgMonthlyExpenses = spend / windowMonths(window);
  const checkingBalance = sum(accounts.filter(isCheckingAccount).map((account) => account.balance));

  return {
    medianPayGap: Math.trunc(medianGap),
    irregularFrequency,
    cashFlowBuffer: avgMonthlyExpenses > 0 ? roundTo(checkingBalance / avgMonthlyExpenses) : 0,
    avgMonthlyExpenses: roundTo(avgMonthlyExpenses),
  };
};
