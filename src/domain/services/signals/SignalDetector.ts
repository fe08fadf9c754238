import type { Account } from '../../entities/Account.js';
import type { Transaction } from '../../entities/Transaction.js';
import type { SignalBundle, WindowSpec } from '../../entities/Signal.js';
import { byEffectiveDate, compareCodePoints, inWindow } from '../IntervalMath.js';
import { detectCreditUtilization } from './CreditUtilizationDetector.js';
import { detectIncomeStability } from './IncomeStabilityDetector.js';
import { detectSavingsBehavior } from './SavingsBehaviorDetector.js';
import { detectSubscriptions } from './SubscriptionDetector.js';

/**
 * All four signals for a single user's ledger. Pure: the same
 * transactions, accounts and window always produce the same bundle.
 */
export const detectSignals = (transactions: Transaction[], accounts: Account[], window: WindowSpec): SignalBundle => {
  const windowed = transactions.filter((txn) => inWindow(txn, window)).sort(byEffectiveDate);

  return {
    subscriptions: detectSubscriptions(windowed),
    creditUtilization: detectCreditUtilization(windowed, accounts),
    savingsBehavior: detectSavingsBehavior(windowed, accounts, window),
    incomeStability: detectIncomeStability(windowed, accounts, window),
  };
};

export interface LedgerPartition {
  transactions: Transaction[];
  accounts: Account[];
}

/** Splits a multi-user ledger by userId in one pass. Users are returned in code-point order. */
export const partitionByUser = (transactions: Transaction[], accounts: Account[]): Map<string, LedgerPartition> => {
  const partitions = new Map<string, LedgerPartition>();
  const partitionFor = (userId: string): LedgerPartition => {
    let partition = partitions.get(userId);
    if (!partition) {
      partition = { transactions: [], accounts: [] };
      partitions.set(userId, partition);
    }
    return partition;
  };

  transactions.forEach((txn) => partitionFor(txn.userId).transactions.push(txn));
  accounts.forEach((account) => partitionFor(account.userId).accounts.push(account));

  return new Map([...partitions.entries()].sort(([a], [b]) => compareCodePoints(a, b)));
};

/**
 * Signals for every user in a batch ledger. Users share nothing, so each
 * partition is computed independently of the others.
 */
export const detectSignalsForBatch = (
  transactions: Transaction[],
  accounts: Account[],
  window: WindowSpec,
): Map<string, SignalBundle> => {
  const bundles = new Map<string, SignalBundle>();
  for (const [userId, partition] of partitionByUser(transactions, accounts)) {
    bundles.set(userId, detectSignals(partition.transactions, partition.accounts, window));
  }
  return bundles;
};
