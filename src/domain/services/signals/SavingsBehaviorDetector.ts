import { isCheckingAccount, isSavingsAccount, type Account } from '../../entities/Account.js';
import type { Transaction } from '../../entities/Transaction.js';
import type { CoverageLevel, SavingsBehaviorSignal, WindowSpec } from '../../entities/Signal.js';
import { roundTo, sum, windowMonths } from '../IntervalMath.js';

export const emptySavingsBehaviorSignal = (): SavingsBehaviorSignal => ({
  totalSavings: 0,
  growthRate: 0,
  netInflow: 0,
  emergencyFundCoverage: 0,
  coverageLevel: 'low',
  avgMonthlyExpenses: 0,
  accounts: [],
});

export const coverageLevel = (totalSavings: number): CoverageLevel => {
  if (totalSavings > 10_000) {
    return 'excellent';
  }
  if (totalSavings > 5_000) {
    return 'good';
  }
  if (totalSavings > 1_000) {
    return 'building';
  }
  return 'low';
};

const netFlow = (transactions: Transaction[]): number => {
  const deposits = sum(transactions.filter((txn) => txn.amount > 0).map((txn) => txn.amount));
  const withdrawals = sum(transactions.filter((txn) => txn.amount < 0).map((txn) => Math.abs(txn.amount)));
  return deposits - withdrawals;
};

// No balance history is available, so the opening balance is backed out of
// the window's net flow.
const growthRate = (totalSavings: number, netInflow: number): number => {
  const openingBalance = totalSavings - netInflow;
  if (openingBalance > 0) {
    return ((totalSavings - openingBalance) / openingBalance) * 100;
  }
  return totalSavings > 0 ? 100 : 0;
};

export const detectSavingsBehavior = (
  transactions: Transaction[],
  accounts: Account[],
  window: WindowSpec,
): SavingsBehaviorSignal => {
  const savingsAccounts = accounts.filter(isSavingsAccount);
  if (savingsAccounts.length === 0) {
    return emptySavingsBehaviorSignal();
  }

  const savingsIds = new Set(savingsAccounts.map((account) => account.accountId));
  const checkingIds = new Set(accounts.filter(isCheckingAccount).map((account) => account.accountId));

  const netInflow = netFlow(transactions.filter((txn) => savingsIds.has(txn.accountId)));
  const totalSavings = sum(savingsAccounts.map((account) => account.balance));

  const checkingSpend = sum(
    transactions.filter((txn) => checkingIds.has(txn.accountId) && txn.amount < 0).map((txn) => Math.abs(txn.amount)),
  );
  const avgMonthlyExpenses = checkingSpend / windowMonths(window);
  const emergencyFundCoverage = avgMonthlyExpenses > 0 ? totalSavings / avgMonthlyExpenses : 0;

  return {
    totalSavings: roundTo(totalSavings),
    growthRate: roundTo(growthRate(totalSavings, netInflow)),
    netInflow: roundTo(netInflow),
    emergencyFundCoverage: roundTo(emergencyFundCoverage),
    coverageLevel: coverageLevel(totalSavings),
    avgMonthlyExpenses: roundTo(avgMonthlyExpenses),
    accounts: savingsAccounts.map((account) => ({
      accountId: account.accountId,
      subtype: account.subtype,
      balance: roundTo(account.balance),
      netInflow: roundTo(netFlow(transactions.filter((txn) => txn.accountId === account.accountId))),
    })),
  };
};
