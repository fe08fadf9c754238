import { hasCreditLimit, type Account } from '../../entities/Account.js';
import type { Transaction } from '../../entities/Transaction.js';
import type { CreditAccountUtilization, CreditUtilizationSignal, UtilizationLevel } from '../../entities/Signal.js';
import { categoryContains } from '../CategoryNormalizer.js';
import { roundTo, sum } from '../IntervalMath.js';

export const HIGH_UTILIZATION = 50;
export const MEDIUM_UTILIZATION = 30;

const MINIMUM_PAYMENT_RATE = 0.02;
const MINIMUM_PAYMENT_FLOOR = 25;
const MINIMUM_PAYMENT_TOLERANCE = 5;

export const emptyCreditUtilizationSignal = (): CreditUtilizationSignal => ({
  totalUtilization: 0,
  utilizationLevel: 'low',
  accounts: [],
  interestCharged: 0,
  minimumPaymentOnly: false,
  isOverdue: false,
});

export const utilizationLevel = (utilization: number): UtilizationLevel => {
  if (utilization >= HIGH_UTILIZATION) {
    return 'high';
  }
  if (utilization >= MEDIUM_UTILIZATION) {
    return 'medium';
  }
  return 'low';
};

// A balance in the customer's favor owes nothing.
const owed = (account: Account): number => Math.max(account.balance, 0);

const isInterestOrFee = (txn: Transaction): boolean =>
  txn.amount < 0 &&
  (categoryContains(txn.category, 'interest') ||
    categoryContains(txn.category, 'fee') ||
    (txn.merchantName ?? '').toLowerCase().includes('interest'));

/** Latest payment sits within a few dollars of the estimated minimum due. */
const paysMinimumOnly = (balance: number, payments: Transaction[]): boolean => {
  const latest = payments.at(-1);
  if (!latest) {
    return false;
  }

  const estimatedMinimum = Math.max(balance * MINIMUM_PAYMENT_RATE, MINIMUM_PAYMENT_FLOOR);
  return Math.abs(latest.amount - estimatedMinimum) <= MINIMUM_PAYMENT_TOLERANCE;
};

/**
 * Credit utilization over accounts with a positive limit. Accounts without a
 * limit are left out of both per-account and aggregate figures.
 */
export const detectCreditUtilization = (transactions: Transaction[], accounts: Account[]): CreditUtilizationSignal => {
  const eligible = accounts.filter(hasCreditLimit);
  if (eligible.length === 0) {
    return emptyCreditUtilizationSignal();
  }

  const details: CreditAccountUtilization[] = eligible.map((account) => {
    const accountTxns = transactions.filter((txn) => txn.accountId === account.accountId);
    const utilization = (owed(account) / account.limit) * 100;
    const interestCharged = sum(accountTxns.filter(isInterestOrFee).map((txn) => Math.abs(txn.amount)));

    return {
      accountId: account.accountId,
      subtype: account.subtype,
      mask: account.mask ?? null,
      balance: roundTo(account.balance),
      limit: roundTo(account.limit),
      utilization: roundTo(utilization),
      utilizationLevel: utilizationLevel(utilization),
      interestCharged: roundTo(interestCharged),
      minimumPaymentOnly: paysMinimumOnly(
        owed(account),
        accountTxns.filter((txn) => txn.amount > 0),
      ),
    };
  });

  const totalOwed = sum(eligible.map(owed));
  const totalLimit = sum(eligible.map((account) => account.limit));
  const totalUtilization = (totalOwed / totalLimit) * 100;

  return {
    totalUtilization: roundTo(totalUtilization),
    utilizationLevel: utilizationLevel(totalUtilization),
    accounts: details,
    interestCharged: roundTo(sum(details.map((detail) => detail.interestCharged))),
    minimumPaymentOnly: details.some((detail) => detail.minimumPaymentOnly),
    isOverdue: eligible.some((account) => account.isOverdue === true),
  };
};
