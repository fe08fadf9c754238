import { effectiveDate, type Transaction } from '../../entities/Transaction.js';
import type { RecurringMerchantDetail, SubscriptionFrequency, SubscriptionSignal } from '../../entities/Signal.js';
import { compareCodePoints, dayGaps, mean, roundTo, sum } from '../IntervalMath.js';

export const MIN_OCCURRENCES = 3;
export const MONTHLY_INTERVAL = { min: 25, max: 34 } as const;
export const WEEKLY_INTERVAL = { min: 6, max: 8 } as const;
export const WEEKS_PER_MONTH = 4.33;

// A cadence alone is not enough: the merchant must be billed mostly online,
// or have shown up often enough that the cadence is not a coincidence.
export const MIN_ONLINE_RATIO = 0.5;
export const MIN_OCCURRENCES_WITHOUT_ONLINE = 4;

const UNKNOWN_MERCHANT = 'Unknown';

export const emptySubscriptionSignal = (): SubscriptionSignal => ({
  recurringMerchants: [],
  monthlyRecurring: 0,
  subscriptionShare: 0,
  merchantDetails: [],
});

export const classifyCadence = (meanInterval: number): SubscriptionFrequency | null => {
  if (meanInterval >= MONTHLY_INTERVAL.min && meanInterval <= MONTHLY_INTERVAL.max) {
    return 'monthly';
  }
  if (meanInterval >= WEEKLY_INTERVAL.min && meanInterval <= WEEKLY_INTERVAL.max) {
    return 'weekly';
  }
  return null;
};

const mostFrequentChannel = (charges: Transaction[]): string | null => {
  const counts = new Map<string, number>();
  for (const charge of charges) {
    if (charge.paymentChannel) {
      counts.set(charge.paymentChannel, (counts.get(charge.paymentChannel) ?? 0) + 1);
    }
  }

  let best: string | null = null;
  let bestCount = 0;
  for (const [channel, count] of [...counts.entries()].sort(([a], [b]) => compareCodePoints(a, b))) {
    if (count > bestCount) {
      best = channel;
      bestCount = count;
    }
  }
  return best;
};

interface MerchantEvaluation {
  detail: RecurringMerchantDetail;
  monthlyCost: number;
}

const evaluateMerchant = (merchant: string, charges: Transaction[]): MerchantEvaluation | null => {
  if (charges.length < MIN_OCCURRENCES) {
    return null;
  }

  const meanInterval = mean(dayGaps(charges.map(effectiveDate)));
  const frequency = classifyCadence(meanInterval);
  if (!frequency) {
    return null;
  }

  const onlineRatio = charges.filter((charge) => charge.paymentChannel === 'online').length / charges.length;
  const likelySubscription = onlineRatio >= MIN_ONLINE_RATIO || charges.length >= MIN_OCCURRENCES_WITHOUT_ONLINE;
  if (!likelySubscription) {
    return null;
  }

  const amount = mean(charges.map((charge) => Math.abs(charge.amount)));
  const monthlyEquivalent = frequency === 'monthly' ? amount : amount * WEEKS_PER_MONTH;

  return {
    detail: {
      merchant,
      frequency,
      amount: roundTo(amount),
      monthlyEquivalent: roundTo(monthlyEquivalent),
      occurrences: charges.length,
      meanIntervalDays: roundTo(meanInterval),
      paymentChannel: mostFrequentChannel(charges),
      onlineRatio: roundTo(onlineRatio),
    },
    monthlyCost: monthlyEquivalent,
  };
};

/**
 * Finds merchants billed on a monthly or weekly cadence.
 *
 * `transactions` must already be restricted to one user and one window and be
 * sorted chronologically.
 */
export const detectSubscriptions = (transactions: Transaction[]): SubscriptionSignal => {
  const spending = transactions.filter((txn) => txn.amount < 0);
  if (spending.length === 0) {
    return emptySubscriptionSignal();
  }

  const byMerchant = new Map<string, Transaction[]>();
  for (const txn of spending) {
    const merchant = txn.merchantName?.trim() || UNKNOWN_MERCHANT;
    const charges = byMerchant.get(merchant) ?? [];
    charges.push(txn);
    byMerchant.set(merchant, charges);
  }

  const merchantDetails: RecurringMerchantDetail[] = [];
  let monthlyRecurring = 0;

  for (const merchant of [...byMerchant.keys()].sort(compareCodePoints)) {
    const evaluation = evaluateMerchant(merchant, byMerchant.get(merchant) ?? []);
    if (evaluation) {
      merchantDetails.push(evaluation.detail);
      // unrounded, so the total does not drift by a cent per merchant
      monthlyRecurring += evaluation.monthlyCost;
    }
  }

  const totalSpend = sum(spending.map((txn) => Math.abs(txn.amount)));

  return {
    recurringMerchants: merchantDetails.map((detail) => detail.merchant),
    monthlyRecurring: roundTo(monthlyRecurring),
    subscriptionShare: totalSpend > 0 ? roundTo((monthlyRecurring / totalSpend) * 100) : 0,
    merchantDetails,
  };
};
