export const TIME_WINDOWS = ['30d', '180d'] as const;

export type TimeWindow = (typeof TIME_WINDOWS)[number];

export const WINDOW_DAYS: Record<TimeWindow, number> = {
  '30d': 30,
  '180d': 180,
};

export interface WindowSpec {
  timeWindow: TimeWindow;
  asOf: string; // ISO date, inclusive upper bound
}

export type SubscriptionFrequency = 'monthly' | 'weekly';

export interface RecurringMerchantDetail {
  merchant: string;
  frequency: SubscriptionFrequency;
  amount: number;
  monthlyEquivalent: number;
  occurrences: number;
  meanIntervalDays: number;
  paymentChannel: string | null;
  onlineRatio: number;
}

export interface SubscriptionSignal {
  recurringMerchants: string[];
  monthlyRecurring: number;
  subscriptionShare: number;
  merchantDetails: RecurringMerchantDetail[];
}

export type UtilizationLevel = 'high' | 'medium' | 'low';

export interface CreditAccountUtilization {
  accountId: string;
  subtype: string;
  mask: string | null;
  balance: number;
  limit: number;
  utilization: number;
  utilizationLevel: UtilizationLevel;
  interestCharged: number;
  minimumPaymentOnly: boolean;
}

export interface CreditUtilizationSignal {
  totalUtilization: number;
  utilizationLevel: UtilizationLevel;
  accounts: CreditAccountUtilization[];
  interestCharged: number;
  minimumPaymentOnly: boolean;
  isOverdue: boolean;
}

export type CoverageLevel = 'excellent' | 'good' | 'building' | 'low';

export interface SavingsAccountDetail {
  accountId: string;
  subtype: string;
  balance: number;
  netInflow: number;
}

export interface SavingsBehaviorSignal {
  totalSavings: number;
  growthRate: number;
  netInflow: number;
  emergencyFundCoverage: number;
  coverageLevel: CoverageLevel;
  avgMonthlyExpenses: number;
  accounts: SavingsAccountDetail[];
}

export interface IncomeStabilitySignal {
  medianPayGap: number;
  irregularFrequency: boolean;
  cashFlowBuffer: number;
  avgMonthlyExpenses: number;
}

export interface SignalBundle {
  subscriptions: SubscriptionSignal;
  creditUtilization: CreditUtilizationSignal;
  savingsBehavior: SavingsBehaviorSignal;
  incomeStability: IncomeStabilitySignal;
}

export const SIGNAL_TYPES = ['subscriptions', 'credit_utilization', 'savings_behavior', 'income_stability'] as const;

export type SignalType = (typeof SIGNAL_TYPES)[number];

export interface SignalDataByType {
  subscriptions: SubscriptionSignal;
  credit_utilization: CreditUtilizationSignal;
  savings_behavior: SavingsBehaviorSignal;
  income_stability: IncomeStabilitySignal;
}

export type SignalRecord = {
  [K in SignalType]: {
    userId: string;
    timeWindow: TimeWindow;
    signalType: K;
    signalData: SignalDataByType[K];
    computedAt: string; // ISO timestamp
  };
}[SignalType];

export const signalKey = (record: Pick<SignalRecord, 'userId' | 'timeWindow' | 'signalType'>): string =>
  `${record.userId}|${record.timeWindow}|${record.signalType}`;

/** Splits a bundle into the four persisted records, in SIGNAL_TYPES order. */
export const toSignalRecords = (
  userId: string,
  timeWindow: TimeWindow,
  bundle: SignalBundle,
  computedAt: string,
): SignalRecord[] => [
  { userId, timeWindow, signalType: 'subscriptions', signalData: bundle.subscriptions, computedAt },
  { userId, timeWindow, signalType: 'credit_utilization', signalData: bundle.creditUtilization, computedAt },
  { userId, timeWindow, signalType: 'savings_behavior', signalData: bundle.savingsBehavior, computedAt },
  { userId, timeWindow, signalType: 'income_stability', signalData: bundle.incomeStability, computedAt },
];

/** Reassembles a bundle from stored records; null unless all four signal types are present. */
export const fromSignalRecords = (records: SignalRecord[]): SignalBundle | null => {
  let subscriptions: SubscriptionSignal | undefined;
  let creditUtilization: CreditUtilizationSignal | undefined;
  let savingsBehavior: SavingsBehaviorSignal | undefined;
  let incomeStability: IncomeStabilitySignal | undefined;

  for (const record of records) {
    switch (record.signalType) {
      case 'subscriptions':
        subscriptions = record.signalData;
        break;
      case 'credit_utilization':
        creditUtilization = record.signalData;
        break;
      case 'savings_behavior':
        savingsBehavior = record.signalData;
        break;
      case 'income_stability':
        incomeStability = record.signalData;
        break;
    }
  }

  if (!subscriptions || !creditUtilization || !savingsBehavior || !incomeStability) {
    return null;
  }

  return { subscriptions, creditUtilization, savingsBehavior, incomeStability };
};
